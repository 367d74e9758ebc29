import { BaseProviderAdapter, isRecord } from '../base';
import type { CompletionRequest, CompletionResult } from '../../../application/types';

type AnthropicContent =
  | { type: 'text'; text: string }
  | { type: 'image'; source: { type: 'url'; url: string } };

interface AnthropicRequest {
  model: string;
  messages: { role: 'user'; content: AnthropicContent[] }[];
  system?: string;
  max_tokens: number;
  temperature: number;
}

const DEFAULT_MAX_TOKENS = 1024;

export class AnthropicAdapter extends BaseProviderAdapter {
  private readonly anthropicVersion = '2023-06-01';

  protected get endpointPath(): string {
    return '/messages';
  }

  protected createHttpHeaders(): Record<string, string> {
    return {
      'x-api-key': this.configuration.apiKey,
      'anthropic-version': this.anthropicVersion,
      'Content-Type': 'application/json'
    };
  }

  protected async executeCompletion(request: CompletionRequest, signal: AbortSignal): Promise<CompletionResult> {
    const payload = await this.makeHttpRequest(this.buildRequest(request), signal);
    return this.parseResponse(payload);
  }

  private buildRequest(request: CompletionRequest): AnthropicRequest {
    const content: AnthropicContent[] = [
      { type: 'text', text: request.prompt },
      ...(request.imageUrls ?? []).map((url): AnthropicContent => ({ type: 'image', source: { type: 'url', url } }))
    ];

    return {
      model: this.configuration.model,
      messages: [{ role: 'user', content }],
      ...(request.systemPrompt !== undefined && { system: request.systemPrompt }),
      max_tokens: request.maxTokens ?? DEFAULT_MAX_TOKENS,
      temperature: request.temperature ?? 0
    };
  }

  private parseResponse(payload: unknown): CompletionResult {
    if (!isRecord(payload) || !Array.isArray(payload.content)) {
      throw this.malformedResponse('missing content blocks');
    }

    const text = payload.content
      .filter(isRecord)
      .filter(block => block.type === 'text' && typeof block.text === 'string')
      .map(block => String(block.text))
      .join('');

    if (text === '') {
      throw this.malformedResponse('no text content block');
    }

    const usage = payload.usage;
    const tokensUsed = isRecord(usage) && typeof usage.input_tokens === 'number' && typeof usage.output_tokens === 'number'
      ? usage.input_tokens + usage.output_tokens
      : undefined;

    return {
      content: text,
      tokensUsed,
      model: typeof payload.model === 'string' ? payload.model : this.configuration.model
    };
  }
}
