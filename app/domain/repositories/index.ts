export type { ProviderRepository } from './provider.repository';
export type { RequestLogRepository, RequestLogQuery } from './request-log.repository';
export type { SettingsRepository } from './settings.repository';
export type { CacheStore } from './cache.store';
