import 'reflect-metadata';
import { Container } from 'inversify';
import { TYPES } from './types';
import { Logger, type ILogger } from '../logging';
import { CryptoService, RateLimiter, SecurityService } from '../security';
import { PrometheusCollector, MetricsService } from '../metrics';
import { ErrorClassificationService } from '../error-classification';
import { DatabaseService } from '../../infrastructure/database';
import {
  MongoProviderRepository,
  MongoRequestLogRepository,
  MongoSettingsRepository
} from '../../infrastructure/repositories';
import { MemoryCacheStore, MongoCacheStore } from '../../infrastructure/cache';
import {
  AdapterFactoryService,
  BatchQueueService,
  DispatcherService,
  HealthMonitorService,
  PollingWorkerService,
  ProviderRegistryService,
  ProviderSelectorService,
  RequestCacheService,
  RequestLogService,
  SettingsService,
  StatsTrackerService,
  WebhookNotificationGateway
} from '../../domain/services';
import { ContentAnalysisService, PromptTemplateService } from '../../application/services';
import {
  ProvidersController,
  HealthChecksController,
  CacheController,
  StatsController,
  SettingsController,
  BatchController,
  RequestLogsController
} from '../../api/controllers/admin';
import { AnalysisController } from '../../api/controllers/v1';

export type CacheBackend = 'memory' | 'mongodb';

export interface ContainerConfiguration {
  environment: 'development' | 'production' | 'test';
  logLevel: 'error' | 'warn' | 'info' | 'debug';
  cacheBackend: CacheBackend;
}

export interface IApplicationContainer {
  initialize(): Promise<void>;
  get<T>(serviceIdentifier: symbol): T;
  isBound(serviceIdentifier: symbol): boolean;
  getConfiguration(): Readonly<ContainerConfiguration>;
  dispose(): Promise<void>;
}

const ENVIRONMENTS: readonly ContainerConfiguration['environment'][] = ['development', 'production', 'test'];
const LOG_LEVELS: readonly ContainerConfiguration['logLevel'][] = ['error', 'warn', 'info', 'debug'];
const CACHE_BACKENDS: readonly CacheBackend[] = ['memory', 'mongodb'];

function pick<T extends string>(value: string | undefined, allowed: readonly T[], fallback: T): T {
  return allowed.find(candidate => candidate === value) ?? fallback;
}

export class ApplicationContainer implements IApplicationContainer {
  private static instance: ApplicationContainer | null = null;
  private readonly container: Container;
  private readonly configuration: ContainerConfiguration;
  private isInitialized = false;

  private constructor(configuration?: Partial<ContainerConfiguration>) {
    this.configuration = this.buildConfiguration(configuration);
    this.container = new Container({ defaultScope: 'Singleton' });
    this.validateEnvironment();
  }

  public static getInstance(configuration?: Partial<ContainerConfiguration>): ApplicationContainer {
    if (!ApplicationContainer.instance) {
      ApplicationContainer.instance = new ApplicationContainer(configuration);
    }
    return ApplicationContainer.instance;
  }

  public async initialize(): Promise<void> {
    if (this.isInitialized) {
      throw new Error('Container is already initialized');
    }

    try {
      this.configureServices();
      this.validateServices();
      this.isInitialized = true;
    } catch (error) {
      throw new Error(`Container initialization failed: ${error instanceof Error ? error.message : String(error)}`, { cause: error });
    }
  }

  public get<T>(serviceIdentifier: symbol): T {
    this.ensureInitialized();

    try {
      return this.container.get<T>(serviceIdentifier);
    } catch (error) {
      throw new Error(`Failed to resolve service ${String(serviceIdentifier)}: ${error instanceof Error ? error.message : String(error)}`, { cause: error });
    }
  }

  public isBound(serviceIdentifier: symbol): boolean {
    return this.container.isBound(serviceIdentifier);
  }

  public getConfiguration(): Readonly<ContainerConfiguration> {
    return this.configuration;
  }

  public async dispose(): Promise<void> {
    await this.container.unbindAllAsync();
    this.isInitialized = false;
  }

  private buildConfiguration(userConfig?: Partial<ContainerConfiguration>): ContainerConfiguration {
    const defaultConfig: ContainerConfiguration = {
      environment: pick(process.env.NODE_ENV, ENVIRONMENTS, 'development'),
      logLevel: pick(process.env.LOG_LEVEL, LOG_LEVELS, 'info'),
      cacheBackend: pick(process.env.CACHE_BACKEND, CACHE_BACKENDS, 'memory')
    };

    return { ...defaultConfig, ...userConfig };
  }

  private validateEnvironment(): void {
    const cacheBackend = process.env.CACHE_BACKEND;
    if (cacheBackend && !CACHE_BACKENDS.some(backend => backend === cacheBackend)) {
      throw new Error(`Unsupported CACHE_BACKEND "${cacheBackend}", expected one of: ${CACHE_BACKENDS.join(', ')}`);
    }
  }

  private configureServices(): void {
    this.configureLogging();
    this.configureSecurity();
    this.configureMetrics();
    this.configureCore();
    this.configureRepositories();
    this.configureDomainServices();
    this.configureApplicationServices();
    this.configureControllers();
  }

  private configureLogging(): void {
    this.container
      .bind<ILogger>(TYPES.Logger)
      .toDynamicValue(() => new Logger('FeedSentry', { level: this.configuration.logLevel }))
      .inSingletonScope();
  }

  private configureSecurity(): void {
    this.container.bind(TYPES.CryptoService).to(CryptoService).inSingletonScope();
    this.container.bind(TYPES.RateLimiter).to(RateLimiter).inSingletonScope();
    this.container.bind(TYPES.SecurityService).to(SecurityService).inSingletonScope();
  }

  private configureMetrics(): void {
    this.container.bind(TYPES.MetricsCollector).to(PrometheusCollector).inSingletonScope();
    this.container.bind(TYPES.MetricsService).to(MetricsService).inSingletonScope();
  }

  private configureCore(): void {
    this.container.bind(TYPES.DatabaseService).to(DatabaseService).inSingletonScope();
    this.container.bind(TYPES.ErrorClassificationService).to(ErrorClassificationService).inSingletonScope();
    this.container.bind(TYPES.SettingsService).to(SettingsService).inSingletonScope();
  }

  private configureRepositories(): void {
    this.container.bind(TYPES.ProviderRepository).to(MongoProviderRepository).inSingletonScope();
    this.container.bind(TYPES.RequestLogRepository).to(MongoRequestLogRepository).inSingletonScope();
    this.container.bind(TYPES.SettingsRepository).to(MongoSettingsRepository).inSingletonScope();

    if (this.configuration.cacheBackend === 'mongodb') {
      this.container.bind(TYPES.CacheStore).to(MongoCacheStore).inSingletonScope();
    } else {
      this.container.bind(TYPES.CacheStore).to(MemoryCacheStore).inSingletonScope();
    }
  }

  private configureDomainServices(): void {
    this.container.bind(TYPES.ProviderRegistryService).to(ProviderRegistryService).inSingletonScope();
    this.container.bind(TYPES.ProviderSelectorService).to(ProviderSelectorService).inSingletonScope();
    this.container.bind(TYPES.StatsTrackerService).to(StatsTrackerService).inSingletonScope();
    this.container.bind(TYPES.AdapterFactoryService).to(AdapterFactoryService).inSingletonScope();
    this.container.bind(TYPES.RequestCacheService).to(RequestCacheService).inSingletonScope();
    this.container.bind(TYPES.RequestLogService).to(RequestLogService).inSingletonScope();
    this.container.bind(TYPES.DispatcherService).to(DispatcherService).inSingletonScope();
    this.container.bind(TYPES.HealthMonitorService).to(HealthMonitorService).inSingletonScope();
    this.container.bind(TYPES.BatchQueueService).to(BatchQueueService).inSingletonScope();
    this.container.bind(TYPES.PollingWorkerService).to(PollingWorkerService).inSingletonScope();
    this.container
      .bind(TYPES.NotificationGateway)
      .toDynamicValue(context => new WebhookNotificationGateway(context.container.get<ILogger>(TYPES.Logger)))
      .inSingletonScope();
  }

  private configureApplicationServices(): void {
    this.container.bind(TYPES.PromptTemplateService).to(PromptTemplateService).inSingletonScope();
    this.container.bind(TYPES.ContentAnalysisService).to(ContentAnalysisService).inSingletonScope();
  }

  private configureControllers(): void {
    this.container.bind(TYPES.ProvidersController).to(ProvidersController).inSingletonScope();
    this.container.bind(TYPES.HealthChecksController).to(HealthChecksController).inSingletonScope();
    this.container.bind(TYPES.CacheController).to(CacheController).inSingletonScope();
    this.container.bind(TYPES.StatsController).to(StatsController).inSingletonScope();
    this.container.bind(TYPES.SettingsController).to(SettingsController).inSingletonScope();
    this.container.bind(TYPES.BatchController).to(BatchController).inSingletonScope();
    this.container.bind(TYPES.RequestLogsController).to(RequestLogsController).inSingletonScope();

    this.container.bind(TYPES.AnalysisController).to(AnalysisController).inSingletonScope();
  }

  private validateServices(): void {
    const criticalServices = [TYPES.Logger, TYPES.DatabaseService, TYPES.CacheStore, TYPES.DispatcherService];

    for (const serviceType of criticalServices) {
      if (!this.container.isBound(serviceType)) {
        throw new Error(`Critical service ${String(serviceType)} is not bound`);
      }
    }

    const logger = this.container.get<ILogger>(TYPES.Logger);
    logger.info('Container validation completed successfully', {
      metadata: {
        environment: this.configuration.environment,
        cacheBackend: this.configuration.cacheBackend,
        servicesCount: criticalServices.length
      }
    });
  }

  private ensureInitialized(): void {
    if (!this.isInitialized) {
      throw new Error('Container must be initialized before use. Call initialize() first.');
    }
  }
}

export const container = ApplicationContainer.getInstance();
