import 'reflect-metadata';
import { container } from './core/container';
import { TYPES } from './core/container/types';
import { toError, type ILogger } from './core/logging';
import type { IDatabaseService } from './infrastructure/database';
import type { IRequestCacheService } from './domain/services/cache';
import type { IPollingWorkerService } from './domain/services/monitoring';
import type { IProviderRegistryService } from './domain/services/provider';
import type { IRequestLogService } from './domain/services/request';
import type { ISettingsService } from './domain/services/settings';

export interface BootstrapConfig {
  environment?: 'development' | 'production' | 'test';
  enableBackgroundJobs?: boolean;
}

export type ShutdownHook = () => Promise<void>;

export class ApplicationBootstrap {
  private logger?: ILogger;
  private databaseService?: IDatabaseService;
  private backgroundJobsStarted = false;
  private shuttingDown = false;

  constructor(private readonly config: BootstrapConfig = {}) {}

  async initialize(): Promise<void> {
    await container.initialize();
    this.logger = container.get<ILogger>(TYPES.Logger).createChild('Bootstrap');
    this.logger.info('Application bootstrap initialization started', {
      metadata: {
        environment: this.config.environment ?? process.env.NODE_ENV ?? 'development',
        nodeVersion: process.version,
        platform: process.platform,
        cacheBackend: container.getConfiguration().cacheBackend
      }
    });

    await this.initializeDatabase();
    await this.initializeSettings();
    await this.initializeProviders();

    if (this.config.enableBackgroundJobs !== false) {
      this.startBackgroundJobs();
    }

    this.logger.info('Application bootstrap initialized successfully');
  }

  private async initializeDatabase(): Promise<void> {
    this.databaseService = container.get<IDatabaseService>(TYPES.DatabaseService);
    await this.databaseService.connect();
    this.logger?.info('Database connection established successfully');
  }

  private async initializeSettings(): Promise<void> {
    const settingsService = container.get<ISettingsService>(TYPES.SettingsService);
    await settingsService.initialize();
    this.logger?.info('Runtime settings loaded', { metadata: { ...settingsService.get() } });
  }

  private async initializeProviders(): Promise<void> {
    const registry = container.get<IProviderRegistryService>(TYPES.ProviderRegistryService);
    const count = await registry.initialize();

    if (count === 0) {
      this.logger?.warn('No providers registered; analysis requests will fail until one is added');
    }
  }

  private startBackgroundJobs(): void {
    container.get<IRequestCacheService>(TYPES.RequestCacheService).startPurgeSchedule();
    container.get<IRequestLogService>(TYPES.RequestLogService).startRetentionSchedule();
    container.get<IPollingWorkerService>(TYPES.PollingWorkerService).start();
    this.backgroundJobsStarted = true;
    this.logger?.info('Background jobs started');
  }

  private stopBackgroundJobs(): void {
    if (!this.backgroundJobsStarted) {
      return;
    }

    container.get<IPollingWorkerService>(TYPES.PollingWorkerService).stop();
    container.get<IRequestCacheService>(TYPES.RequestCacheService).stopPurgeSchedule();
    container.get<IRequestLogService>(TYPES.RequestLogService).stopRetentionSchedule();
    this.backgroundJobsStarted = false;
    this.logger?.info('Background jobs stopped');
  }

  async shutdown(): Promise<void> {
    this.logger?.info('Application shutdown initiated');

    this.stopBackgroundJobs();

    if (container.isBound(TYPES.RequestLogService)) {
      await container.get<IRequestLogService>(TYPES.RequestLogService).flush();
    }

    if (this.databaseService) {
      await this.databaseService.disconnect();
      this.logger?.info('Database connection closed');
    }

    await container.dispose();
    this.logger?.info('Application shutdown completed successfully');
  }

  setupGracefulShutdown(beforeShutdown: ShutdownHook): void {
    const shutdownHandler = async (signal: string, exitCode: number): Promise<void> => {
      if (this.shuttingDown) {
        return;
      }
      this.shuttingDown = true;
      this.logger?.info(`Received ${signal}, initiating graceful shutdown`);

      try {
        await beforeShutdown();
        await this.shutdown();
        process.exit(exitCode);
      } catch (error) {
        this.logger?.error('Error during graceful shutdown', toError(error));
        process.exit(1);
      }
    };

    process.on('SIGTERM', () => {
      void shutdownHandler('SIGTERM', 0);
    });
    process.on('SIGINT', () => {
      void shutdownHandler('SIGINT', 0);
    });

    process.on('uncaughtException', (error) => {
      this.logger?.error('Uncaught exception', error);
      void shutdownHandler('UNCAUGHT_EXCEPTION', 1);
    });

    process.on('unhandledRejection', (reason) => {
      this.logger?.error('Unhandled rejection', toError(reason));
      void shutdownHandler('UNHANDLED_REJECTION', 1);
    });
  }
}
