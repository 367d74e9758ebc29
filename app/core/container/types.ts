export const TYPES = {
  DatabaseService: Symbol.for('DatabaseService'),
  Logger: Symbol.for('Logger'),
  MetricsService: Symbol.for('MetricsService'),
  MetricsCollector: Symbol.for('MetricsCollector'),
  SecurityService: Symbol.for('SecurityService'),
  CryptoService: Symbol.for('CryptoService'),
  RateLimiter: Symbol.for('RateLimiter'),
  SettingsService: Symbol.for('SettingsService'),
  ErrorClassificationService: Symbol.for('ErrorClassificationService'),

  ProviderRepository: Symbol.for('ProviderRepository'),
  RequestLogRepository: Symbol.for('RequestLogRepository'),
  SettingsRepository: Symbol.for('SettingsRepository'),
  CacheStore: Symbol.for('CacheStore'),

  ProviderRegistryService: Symbol.for('ProviderRegistryService'),
  ProviderSelectorService: Symbol.for('ProviderSelectorService'),
  StatsTrackerService: Symbol.for('StatsTrackerService'),
  AdapterFactoryService: Symbol.for('AdapterFactoryService'),
  RequestCacheService: Symbol.for('RequestCacheService'),
  HealthMonitorService: Symbol.for('HealthMonitorService'),
  PollingWorkerService: Symbol.for('PollingWorkerService'),
  DispatcherService: Symbol.for('DispatcherService'),
  RequestLogService: Symbol.for('RequestLogService'),
  BatchQueueService: Symbol.for('BatchQueueService'),
  NotificationGateway: Symbol.for('NotificationGateway'),

  ContentAnalysisService: Symbol.for('ContentAnalysisService'),
  PromptTemplateService: Symbol.for('PromptTemplateService'),

  ProvidersController: Symbol.for('ProvidersController'),
  HealthChecksController: Symbol.for('HealthChecksController'),
  CacheController: Symbol.for('CacheController'),
  StatsController: Symbol.for('StatsController'),
  SettingsController: Symbol.for('SettingsController'),
  BatchController: Symbol.for('BatchController'),
  RequestLogsController: Symbol.for('RequestLogsController'),
  AnalysisController: Symbol.for('AnalysisController')
} as const;
