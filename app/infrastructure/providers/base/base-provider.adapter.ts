import { ProviderCallError } from '../../../core/errors';
import type { ErrorClassificationService } from '../../../core/error-classification';
import { toError, type ILogger } from '../../../core/logging';
import type { CompletionRequest, CompletionResult } from '../../../application/types';
import type { ApiFormat } from '../../../domain/entities';

export interface ProviderAdapterConfiguration {
  readonly providerId: string;
  readonly name: string;
  readonly apiBase: string;
  readonly apiKey: string;
  readonly model: string;
  readonly apiFormat: ApiFormat;
}

export interface ProviderAdapter {
  readonly configuration: ProviderAdapterConfiguration;
  complete(request: CompletionRequest, signal: AbortSignal): Promise<CompletionResult>;
  probe(signal: AbortSignal): Promise<CompletionResult>;
}

export interface ProviderRequestContext {
  readonly requestId: string;
  readonly model: string;
  readonly endpoint: string;
  readonly startTime: number;
}

export const HEALTH_CHECK_PROMPT = 'Hello, this is a health check.';
export const HEALTH_CHECK_MAX_TOKENS = 10;

const ERROR_BODY_PREVIEW_LENGTH = 200;

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export abstract class BaseProviderAdapter implements ProviderAdapter {
  protected readonly logger: ILogger;
  public readonly configuration: ProviderAdapterConfiguration;

  constructor(
    configuration: ProviderAdapterConfiguration,
    logger: ILogger,
    protected readonly errorClassification: ErrorClassificationService
  ) {
    this.configuration = configuration;
    this.logger = logger.createChild(`${configuration.apiFormat}:${configuration.name}`);

    this.validateConfiguration();
  }

  async complete(request: CompletionRequest, signal: AbortSignal): Promise<CompletionResult> {
    const context = this.createRequestContext();

    try {
      this.logRequestStart(context, {
        promptLength: request.prompt.length,
        imageCount: request.imageUrls?.length ?? 0
      });

      const result = await this.executeCompletion(request, signal);

      this.logRequestSuccess(context, { tokensUsed: result.tokensUsed });
      return result;
    } catch (error) {
      const failure = this.errorClassification.toProviderCallError(error, this.configuration.providerId, {
        aborted: signal.aborted
      });
      this.logRequestError(context, failure);
      throw failure;
    }
  }

  async probe(signal: AbortSignal): Promise<CompletionResult> {
    return this.complete({ prompt: HEALTH_CHECK_PROMPT, maxTokens: HEALTH_CHECK_MAX_TOKENS }, signal);
  }

  protected abstract get endpointPath(): string;

  protected abstract executeCompletion(request: CompletionRequest, signal: AbortSignal): Promise<CompletionResult>;

  protected createHttpHeaders(): Record<string, string> {
    return {
      'Authorization': `Bearer ${this.configuration.apiKey}`,
      'Content-Type': 'application/json'
    };
  }

  /**
   * Accepts an api base with or without the endpoint path already appended.
   */
  protected resolveEndpoint(): string {
    const base = this.configuration.apiBase.replace(/\/+$/, '');
    return base.endsWith(this.endpointPath) ? base : `${base}${this.endpointPath}`;
  }

  protected async makeHttpRequest(body: unknown, signal: AbortSignal): Promise<unknown> {
    const response = await fetch(this.resolveEndpoint(), {
      method: 'POST',
      headers: this.createHttpHeaders(),
      body: JSON.stringify(body),
      signal
    });

    const text = await response.text();

    if (!response.ok) {
      throw new ProviderCallError(
        this.errorClassification.classifyStatusCode(response.status) ?? 'server',
        `API returned error: ${response.status} - ${text.slice(0, ERROR_BODY_PREVIEW_LENGTH)}`,
        { providerId: this.configuration.providerId, statusCode: response.status }
      );
    }

    try {
      return JSON.parse(text);
    } catch (error) {
      // A login or billing page served with 200 instead of JSON.
      const category = text.trimStart().startsWith('<') ? 'auth' : 'parse';
      throw new ProviderCallError(
        category,
        `Malformed response: ${toError(error).message}`,
        { providerId: this.configuration.providerId, statusCode: response.status, cause: error }
      );
    }
  }

  protected malformedResponse(detail: string): ProviderCallError {
    return new ProviderCallError('parse', `Malformed response: ${detail}`, {
      providerId: this.configuration.providerId
    });
  }

  private createRequestContext(): ProviderRequestContext {
    return {
      requestId: `${this.configuration.name}-${Date.now()}-${Math.random().toString(36).slice(2, 11)}`,
      model: this.configuration.model,
      endpoint: this.endpointPath,
      startTime: Date.now()
    };
  }

  private validateConfiguration(): void {
    if (!this.configuration.apiKey) {
      throw new Error(`API key is required for provider ${this.configuration.name}`);
    }
    if (!this.configuration.apiBase) {
      throw new Error(`API base is required for provider ${this.configuration.name}`);
    }
    if (!this.configuration.model) {
      throw new Error(`Model is required for provider ${this.configuration.name}`);
    }
  }

  private logRequestStart(context: ProviderRequestContext, metadata: Record<string, unknown>): void {
    this.logger.debug('Provider request initiated', {
      requestId: context.requestId,
      providerId: this.configuration.providerId,
      metadata: {
        model: context.model,
        endpoint: context.endpoint,
        ...metadata
      }
    });
  }

  private logRequestSuccess(context: ProviderRequestContext, metadata?: Record<string, unknown>): void {
    this.logger.info('Provider request completed successfully', {
      requestId: context.requestId,
      providerId: this.configuration.providerId,
      duration: Date.now() - context.startTime,
      metadata: {
        model: context.model,
        ...metadata
      }
    });
  }

  private logRequestError(context: ProviderRequestContext, error: ProviderCallError): void {
    this.logger.error('Provider request failed', error, {
      requestId: context.requestId,
      providerId: this.configuration.providerId,
      duration: Date.now() - context.startTime,
      metadata: {
        model: context.model,
        category: error.category,
        statusCode: error.statusCode
      }
    });
  }
}
