import { BaseProviderAdapter, isRecord } from '../base';
import type { CompletionRequest, CompletionResult } from '../../../application/types';

type OpenAIContentPart =
  | { type: 'text'; text: string }
  | { type: 'image_url'; image_url: { url: string } };

interface OpenAIMessage {
  role: 'system' | 'user';
  content: string | OpenAIContentPart[];
}

interface OpenAIChatRequest {
  model: string;
  messages: OpenAIMessage[];
  temperature: number;
  max_tokens?: number;
}

/**
 * Any endpoint speaking the `/chat/completions` dialect: OpenAI itself,
 * OpenRouter, Groq, local gateways and the like.
 */
export class OpenAICompatibleAdapter extends BaseProviderAdapter {
  protected get endpointPath(): string {
    return '/chat/completions';
  }

  protected async executeCompletion(request: CompletionRequest, signal: AbortSignal): Promise<CompletionResult> {
    const payload = await this.makeHttpRequest(this.buildRequest(request), signal);
    return this.parseResponse(payload);
  }

  private buildRequest(request: CompletionRequest): OpenAIChatRequest {
    const messages: OpenAIMessage[] = [];

    if (request.systemPrompt) {
      messages.push({ role: 'system', content: request.systemPrompt });
    }

    const imageUrls = request.imageUrls ?? [];
    messages.push({
      role: 'user',
      content: imageUrls.length === 0
        ? request.prompt
        : [
            { type: 'text', text: request.prompt },
            ...imageUrls.map((url): OpenAIContentPart => ({ type: 'image_url', image_url: { url } }))
          ]
    });

    return {
      model: this.configuration.model,
      messages,
      temperature: request.temperature ?? 0,
      ...(request.maxTokens !== undefined && { max_tokens: request.maxTokens })
    };
  }

  private parseResponse(payload: unknown): CompletionResult {
    if (!isRecord(payload) || !Array.isArray(payload.choices) || payload.choices.length === 0) {
      throw this.malformedResponse('missing choices');
    }

    const [choice] = payload.choices;
    const message = isRecord(choice) ? choice.message : undefined;
    const content = isRecord(message) ? message.content : undefined;

    if (typeof content !== 'string') {
      throw this.malformedResponse('missing choices[0].message.content');
    }

    const usage = payload.usage;
    const tokensUsed = isRecord(usage) && typeof usage.total_tokens === 'number' ? usage.total_tokens : undefined;

    return {
      content,
      tokensUsed,
      model: typeof payload.model === 'string' ? payload.model : this.configuration.model
    };
  }
}
