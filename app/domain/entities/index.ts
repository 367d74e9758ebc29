export {
  MEDIA_TYPES,
  HEALTH_STATUSES,
  API_FORMATS,
  RESPONSE_TIME_EMA_ALPHA,
  DEFAULT_CAPABILITIES,
  Provider,
  createInitialHealth,
  createInitialStats,
  nextResponseTimeAverage,
  supportsMediaType
} from './provider.entity';
export type {
  MediaType,
  HealthStatus,
  ApiFormat,
  ProviderIdentity,
  ProviderConfiguration,
  ProviderConfigurationPatch,
  ProviderCapabilities,
  ProviderHealth,
  ProviderStats,
  HealthCheckResult,
  ProviderSnapshot,
  ProviderRecord
} from './provider.entity';
export { cacheEntryExpiresAt, isCacheEntryExpired } from './cache-entry.entity';
export type { CacheEntry } from './cache-entry.entity';
export type { RequestLogEntry, RequestType } from './request-log.entity';
