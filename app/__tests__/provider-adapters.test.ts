import { ErrorClassificationService } from '../core/error-classification';
import { ProviderCallError } from '../core/errors';
import type { ApiFormat } from '../domain/entities';
import { createProviderAdapter } from '../infrastructure/providers/registry';
import { createTestLogger } from './support/fakes';

function createAdapter(apiFormat: ApiFormat, apiBase = 'https://llm.example.test/v1') {
  return createProviderAdapter(
    { providerId: 'provider-1', name: 'primary', apiBase, apiKey: 'test-secret', model: 'test-model', apiFormat },
    createTestLogger(),
    new ErrorClassificationService()
  );
}

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

describe('provider adapters', () => {
  let fetchMock: jest.SpyInstance<Promise<Response>, Parameters<typeof fetch>>;
  const signal = new AbortController().signal;

  beforeEach(() => {
    fetchMock = jest.spyOn(global, 'fetch');
  });

  afterEach(() => {
    fetchMock.mockRestore();
  });

  function sentRequest(): { url: unknown; headers: unknown; body: unknown } {
    const [url, init] = fetchMock.mock.calls[0] ?? [];
    return { url, headers: init?.headers, body: JSON.parse(String(init?.body)) };
  }

  describe('OpenAICompatibleAdapter', () => {
    it('sends a chat completion with image parts and reads the reply', async () => {
      fetchMock.mockResolvedValue(jsonResponse({
        model: 'test-model-2026',
        choices: [{ message: { role: 'assistant', content: '{"is_relevant": true}' } }],
        usage: { total_tokens: 17 }
      }));

      const result = await createAdapter('openai').complete(
        { systemPrompt: 'Be brief.', prompt: 'Assess: photo', imageUrls: ['https://cdn.example.test/a.png'] },
        signal
      );

      expect(result).toEqual({ content: '{"is_relevant": true}', tokensUsed: 17, model: 'test-model-2026' });
      expect(sentRequest()).toEqual({
        url: 'https://llm.example.test/v1/chat/completions',
        headers: { 'Authorization': 'Bearer test-secret', 'Content-Type': 'application/json' },
        body: {
          model: 'test-model',
          messages: [
            { role: 'system', content: 'Be brief.' },
            {
              role: 'user',
              content: [
                { type: 'text', text: 'Assess: photo' },
                { type: 'image_url', image_url: { url: 'https://cdn.example.test/a.png' } }
              ]
            }
          ],
          temperature: 0
        }
      });
    });

    it('does not append the endpoint twice', async () => {
      fetchMock.mockResolvedValue(jsonResponse({ choices: [{ message: { content: 'ok' } }] }));

      await createAdapter('openai', 'https://llm.example.test/v1/chat/completions/').complete({ prompt: 'hi' }, signal);

      expect(sentRequest().url).toBe('https://llm.example.test/v1/chat/completions');
    });

    it('probes with a tiny completion', async () => {
      fetchMock.mockResolvedValue(jsonResponse({ choices: [{ message: { content: 'Hello!' } }] }));

      await createAdapter('openai').probe(signal);

      expect(sentRequest().body).toEqual({
        model: 'test-model',
        messages: [{ role: 'user', content: 'Hello, this is a health check.' }],
        temperature: 0,
        max_tokens: 10
      });
    });

    it('classifies error statuses', async () => {
      fetchMock.mockResolvedValue(new Response('slow down', { status: 429 }));

      await expect(createAdapter('openai').complete({ prompt: 'hi' }, signal)).rejects.toMatchObject({
        category: 'rate_limit',
        statusCode: 429,
        providerId: 'provider-1',
        message: 'API returned error: 429 - slow down'
      });
    });

    it('treats an html page as an authentication problem', async () => {
      fetchMock.mockResolvedValue(new Response('<!DOCTYPE html><html>Sign in</html>', { status: 200 }));

      await expect(createAdapter('openai').complete({ prompt: 'hi' }, signal)).rejects.toMatchObject({ category: 'auth' });
    });

    it('rejects a reply without choices as malformed', async () => {
      fetchMock.mockResolvedValue(jsonResponse({ choices: [] }));

      const failure = createAdapter('openai').complete({ prompt: 'hi' }, signal);

      await expect(failure).rejects.toBeInstanceOf(ProviderCallError);
      await expect(failure).rejects.toMatchObject({ category: 'parse', message: 'Malformed response: missing choices' });
    });

    it('classifies a network failure', async () => {
      fetchMock.mockRejectedValue(new TypeError('fetch failed'));

      await expect(createAdapter('openai').complete({ prompt: 'hi' }, signal)).rejects.toMatchObject({
        category: 'network',
        message: 'fetch failed'
      });
    });
  });

  describe('AnthropicAdapter', () => {
    it('sends a messages request and joins the text blocks', async () => {
      fetchMock.mockResolvedValue(jsonResponse({
        content: [{ type: 'text', text: '{"is_relevant": ' }, { type: 'text', text: 'false}' }],
        usage: { input_tokens: 30, output_tokens: 12 }
      }));

      const result = await createAdapter('anthropic').complete(
        { systemPrompt: 'Be brief.', prompt: 'Assess: photo', imageUrls: ['https://cdn.example.test/a.png'] },
        signal
      );

      expect(result).toEqual({ content: '{"is_relevant": false}', tokensUsed: 42, model: 'test-model' });
      expect(sentRequest()).toEqual({
        url: 'https://llm.example.test/v1/messages',
        headers: { 'x-api-key': 'test-secret', 'anthropic-version': '2023-06-01', 'Content-Type': 'application/json' },
        body: {
          model: 'test-model',
          messages: [
            {
              role: 'user',
              content: [
                { type: 'text', text: 'Assess: photo' },
                { type: 'image', source: { type: 'url', url: 'https://cdn.example.test/a.png' } }
              ]
            }
          ],
          system: 'Be brief.',
          max_tokens: 1024,
          temperature: 0
        }
      });
    });

    it('maps 401 to an authentication failure', async () => {
      fetchMock.mockResolvedValue(new Response('{"error":"invalid x-api-key"}', { status: 401 }));

      await expect(createAdapter('anthropic').complete({ prompt: 'hi' }, signal)).rejects.toMatchObject({
        category: 'auth',
        statusCode: 401
      });
    });

    it('rejects a reply without text as malformed', async () => {
      fetchMock.mockResolvedValue(jsonResponse({ content: [{ type: 'tool_use', id: 'x' }] }));

      await expect(createAdapter('anthropic').complete({ prompt: 'hi' }, signal)).rejects.toMatchObject({
        category: 'parse',
        message: 'Malformed response: no text content block'
      });
    });
  });
});
