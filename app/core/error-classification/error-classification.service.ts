import { injectable } from 'inversify';
import { ProviderCallError, isRetryableCategory, type ProviderErrorCategory } from '../errors';

export interface ErrorPatternConfiguration {
  readonly htmlResponsePatterns: readonly string[];
  readonly timeoutPatterns: readonly string[];
  readonly rateLimitPatterns: readonly string[];
  readonly authPatterns: readonly string[];
  readonly networkPatterns: readonly string[];
  readonly serverPatterns: readonly string[];
  readonly parsePatterns: readonly string[];
}

export interface ErrorClassificationResult {
  readonly category: ProviderErrorCategory;
  readonly isRetryable: boolean;
  readonly statusCode?: number;
  readonly matchedPattern?: string;
}

export interface ErrorClassificationHints {
  readonly statusCode?: number;
  readonly aborted?: boolean;
}

const HTTP_STATUS_IN_MESSAGE = /\b(?:http|status)\s*:?\s*([1-5]\d{2})\b/i;

@injectable()
export class ErrorClassificationService {
  private readonly configuration: ErrorPatternConfiguration = {
    // An HTML page where JSON was expected usually means a login or key wall.
    htmlResponsePatterns: [
      "unexpected token '<'",
      'unexpected token <',
      '<!doctype html'
    ],
    timeoutPatterns: [
      'timeout',
      'timed out',
      'etimedout',
      'deadline exceeded'
    ],
    rateLimitPatterns: [
      'rate limit',
      'rate_limit',
      'too many requests',
      'quota exceeded'
    ],
    authPatterns: [
      'authentication',
      'api key',
      'api_key',
      'unauthorized',
      'forbidden',
      'permission denied',
      'invalid key'
    ],
    networkPatterns: [
      'econnrefused',
      'econnreset',
      'enotfound',
      'eai_again',
      'socket hang up',
      'fetch failed',
      'network error',
      'connection'
    ],
    serverPatterns: [
      'internal server error',
      'server error',
      'bad gateway',
      'service unavailable',
      'overloaded'
    ],
    parsePatterns: [
      'unexpected end of json',
      'is not valid json',
      'malformed response'
    ]
  };

  classifyError(error: unknown, hints: ErrorClassificationHints = {}): ErrorClassificationResult {
    if (error instanceof ProviderCallError) {
      return this.result(error.category, error.statusCode);
    }

    if (hints.aborted || this.isAbortError(error)) {
      return this.result('timeout', hints.statusCode);
    }

    const message = this.extractMessage(error).toLowerCase();
    const statusCode = hints.statusCode ?? this.extractStatusCode(message);

    if (statusCode !== undefined) {
      const byStatus = this.classifyStatusCode(statusCode);
      if (byStatus) {
        return this.result(byStatus, statusCode);
      }
    }

    const ordered: Array<[ProviderErrorCategory, readonly string[]]> = [
      ['auth', this.configuration.htmlResponsePatterns],
      ['timeout', this.configuration.timeoutPatterns],
      ['rate_limit', this.configuration.rateLimitPatterns],
      ['auth', this.configuration.authPatterns],
      ['network', this.configuration.networkPatterns],
      ['server', this.configuration.serverPatterns],
      ['parse', this.configuration.parsePatterns]
    ];

    for (const [category, patterns] of ordered) {
      const matchedPattern = this.findMatchingPattern(message, patterns);
      if (matchedPattern) {
        return { ...this.result(category, statusCode), matchedPattern };
      }
    }

    return this.result('client', statusCode);
  }

  classifyStatusCode(statusCode: number): ProviderErrorCategory | undefined {
    if (statusCode === 401 || statusCode === 403) return 'auth';
    if (statusCode === 429) return 'rate_limit';
    if (statusCode >= 500 && statusCode <= 599) return 'server';
    if (statusCode >= 400 && statusCode <= 499) return 'client';
    return undefined;
  }

  toProviderCallError(error: unknown, providerId: string, hints: ErrorClassificationHints = {}): ProviderCallError {
    if (error instanceof ProviderCallError) {
      return error.withProvider(providerId);
    }

    const classification = this.classifyError(error, hints);
    const message = hints.aborted && !this.isAbortError(error)
      ? 'Request aborted: deadline exceeded'
      : this.extractMessage(error);

    return new ProviderCallError(classification.category, message, {
      providerId,
      statusCode: classification.statusCode,
      cause: error
    });
  }

  isRetryableError(error: unknown): boolean {
    return this.classifyError(error).isRetryable;
  }

  getConfiguration(): ErrorPatternConfiguration {
    return { ...this.configuration };
  }

  private result(category: ProviderErrorCategory, statusCode?: number): ErrorClassificationResult {
    return {
      category,
      isRetryable: isRetryableCategory(category),
      ...(statusCode !== undefined && { statusCode })
    };
  }

  private isAbortError(error: unknown): boolean {
    return error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError');
  }

  private extractMessage(error: unknown): string {
    if (error instanceof Error) {
      const cause = error.cause instanceof Error ? ` (${error.cause.message})` : '';
      return `${error.message}${cause}`;
    }
    return String(error);
  }

  private extractStatusCode(message: string): number | undefined {
    const match = HTTP_STATUS_IN_MESSAGE.exec(message);
    return match ? Number(match[1]) : undefined;
  }

  private findMatchingPattern(errorMessage: string, patterns: readonly string[]): string | undefined {
    return patterns.find(pattern => errorMessage.includes(pattern));
  }
}
