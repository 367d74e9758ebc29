export { MongoProviderRepository } from './provider.repository';
export { MongoRequestLogRepository } from './request-log.repository';
export { MongoSettingsRepository } from './settings.repository';
