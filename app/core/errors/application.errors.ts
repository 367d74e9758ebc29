export const PROVIDER_ERROR_CATEGORIES = [
  'network',
  'timeout',
  'auth',
  'rate_limit',
  'server',
  'client',
  'parse'
] as const;

export type ProviderErrorCategory = typeof PROVIDER_ERROR_CATEGORIES[number];

export type DispatchErrorCode = 'no_eligible_provider' | 'all_providers_exhausted';

const RETRYABLE_CATEGORIES: ReadonlySet<ProviderErrorCategory> = new Set(['network', 'timeout', 'server', 'rate_limit']);

export function isRetryableCategory(category: ProviderErrorCategory): boolean {
  return RETRYABLE_CATEGORIES.has(category);
}

export interface ProviderCallErrorOptions {
  readonly providerId?: string;
  readonly statusCode?: number;
  readonly cause?: unknown;
}

/**
 * A single failed call against one provider, already classified.
 */
export class ProviderCallError extends Error {
  readonly category: ProviderErrorCategory;
  readonly providerId?: string;
  readonly statusCode?: number;

  constructor(category: ProviderErrorCategory, message: string, options: ProviderCallErrorOptions = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'ProviderCallError';
    this.category = category;
    this.providerId = options.providerId;
    this.statusCode = options.statusCode;
  }

  get isRetryable(): boolean {
    return isRetryableCategory(this.category);
  }

  withProvider(providerId: string): ProviderCallError {
    if (this.providerId === providerId) {
      return this;
    }
    return new ProviderCallError(this.category, this.message, {
      providerId,
      statusCode: this.statusCode,
      cause: this.cause
    });
  }
}

export interface AttemptRecord {
  readonly providerId: string;
  readonly providerName: string;
  readonly category?: ProviderErrorCategory;
  readonly message?: string;
  readonly elapsedMs: number;
}

/**
 * Terminal failure of an analysis request. `lastError` holds the last concrete
 * provider failure when one was observed.
 */
export class DispatchError extends Error {
  readonly code: DispatchErrorCode;
  readonly lastError?: ProviderCallError;
  readonly attempts: readonly AttemptRecord[];

  constructor(code: DispatchErrorCode, message: string, lastError?: ProviderCallError, attempts: readonly AttemptRecord[] = []) {
    super(message, lastError ? { cause: lastError } : undefined);
    this.name = 'DispatchError';
    this.code = code;
    this.lastError = lastError;
    this.attempts = attempts;
  }
}

export class ProviderNotFoundError extends Error {
  readonly providerId: string;

  constructor(providerId: string) {
    super(`Provider not found: ${providerId}`);
    this.name = 'ProviderNotFoundError';
    this.providerId = providerId;
  }
}

export class ProviderConflictError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ProviderConflictError';
  }
}

export class ProviderValidationError extends Error {
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super(`Invalid provider: ${issues.join('; ')}`);
    this.name = 'ProviderValidationError';
    this.issues = issues;
  }
}

export class SettingsValidationError extends Error {
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super(`Invalid settings: ${issues.join('; ')}`);
    this.name = 'SettingsValidationError';
    this.issues = issues;
  }
}

export class BatchDisabledError extends Error {
  constructor() {
    super('Batch processing is disabled');
    this.name = 'BatchDisabledError';
  }
}

export class PromptTemplateNotFoundError extends Error {
  readonly templateName: string;

  constructor(templateName: string) {
    super(`Prompt template not found: ${templateName}`);
    this.name = 'PromptTemplateNotFoundError';
    this.templateName = templateName;
  }
}
