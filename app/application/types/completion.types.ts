export interface CompletionRequest {
  readonly systemPrompt?: string;
  readonly prompt: string;
  readonly imageUrls?: readonly string[];
  readonly maxTokens?: number;
  readonly temperature?: number;
}

export interface CompletionResult {
  readonly content: string;
  readonly tokensUsed?: number;
  readonly model?: string;
}
