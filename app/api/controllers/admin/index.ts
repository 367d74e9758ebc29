export { ProvidersController, presentProvider } from './providers.controller';
export { HealthChecksController } from './health-checks.controller';
export { CacheController } from './cache.controller';
export { StatsController } from './stats.controller';
export { SettingsController } from './settings.controller';
export { BatchController } from './batch.controller';
export { RequestLogsController } from './request-logs.controller';
