import { Elysia } from 'elysia';
import { toError, type ILogger } from '../../core/logging';
import {
  BatchDisabledError,
  DispatchError,
  PromptTemplateNotFoundError,
  ProviderConflictError,
  ProviderNotFoundError,
  ProviderValidationError,
  SettingsValidationError
} from '../../core/errors';

export interface ErrorResponse {
  error: {
    message: string;
    type: string;
    code?: string;
    details?: string;
  };
}

export interface MappedError {
  readonly status: number;
  readonly body: ErrorResponse;
}

function createErrorResponse(message: string, type: string, code?: string, details?: string): ErrorResponse {
  return {
    error: {
      message,
      type,
      ...(code !== undefined && { code }),
      ...(details !== undefined && { details })
    }
  };
}

/**
 * Maps a thrown value to an HTTP status and error body. `code` is the
 * framework's own error code (VALIDATION, NOT_FOUND, PARSE, ...).
 */
export function mapErrorToResponse(error: unknown, code: string | number): MappedError {
  if (error instanceof DispatchError) {
    const details = error.lastError ? `${error.lastError.category}: ${error.lastError.message}` : undefined;
    return error.code === 'no_eligible_provider'
      ? { status: 503, body: createErrorResponse(error.message, 'service_unavailable', error.code) }
      : { status: 502, body: createErrorResponse(error.message, 'upstream_error', error.code, details) };
  }

  if (error instanceof ProviderNotFoundError) {
    return { status: 404, body: createErrorResponse(error.message, 'not_found_error', 'provider_not_found') };
  }

  if (error instanceof ProviderConflictError) {
    return { status: 409, body: createErrorResponse(error.message, 'conflict_error', 'provider_conflict') };
  }

  if (error instanceof ProviderValidationError || error instanceof SettingsValidationError) {
    return { status: 400, body: createErrorResponse(error.message, 'validation_error', undefined, error.issues.join('; ')) };
  }

  if (error instanceof PromptTemplateNotFoundError) {
    return { status: 400, body: createErrorResponse(error.message, 'validation_error', 'unknown_template') };
  }

  if (error instanceof BatchDisabledError) {
    return { status: 409, body: createErrorResponse(error.message, 'conflict_error', 'batch_disabled') };
  }

  switch (code) {
    case 'VALIDATION':
      return { status: 400, body: createErrorResponse('Validation failed', 'validation_error', undefined, toError(error).message) };
    case 'NOT_FOUND':
      return { status: 404, body: createErrorResponse('Resource not found', 'not_found_error') };
    case 'PARSE':
      return { status: 400, body: createErrorResponse('Invalid request format', 'parse_error') };
    default:
      return { status: 500, body: createErrorResponse('Internal server error', 'internal_server_error') };
  }
}

export class ErrorPlugin {
  private readonly logger: ILogger;

  constructor(logger: ILogger) {
    this.logger = logger.createChild('ErrorPlugin');
  }

  createPlugin() {
    return new Elysia({ name: 'error' })
      .onError({ as: 'global' }, ({ error, code, set, request }) => {
        const mapped = mapErrorToResponse(error, code);

        if (mapped.status >= 500) {
          this.logger.error('API request failed', toError(error), {
            metadata: { code, method: request.method, url: request.url, status: mapped.status }
          });
        } else {
          this.logger.debug('API request rejected', {
            metadata: { code, method: request.method, url: request.url, status: mapped.status, message: mapped.body.error.message }
          });
        }

        set.status = mapped.status;
        return mapped.body;
      });
  }
}
