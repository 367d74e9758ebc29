export {
  PROVIDER_ERROR_CATEGORIES,
  isRetryableCategory,
  ProviderCallError,
  DispatchError,
  ProviderNotFoundError,
  ProviderConflictError,
  ProviderValidationError,
  SettingsValidationError,
  BatchDisabledError,
  PromptTemplateNotFoundError
} from './application.errors';
export type {
  ProviderErrorCategory,
  DispatchErrorCode,
  ProviderCallErrorOptions,
  AttemptRecord
} from './application.errors';
