export {
  BaseProviderAdapter,
  HEALTH_CHECK_PROMPT,
  HEALTH_CHECK_MAX_TOKENS,
  isRecord,
  type ProviderAdapter,
  type ProviderAdapterConfiguration,
  type ProviderRequestContext
} from './base-provider.adapter';
