import { Elysia, type AnyElysia } from 'elysia';
import { cors } from '@elysiajs/cors';
import { node } from '@elysiajs/node';
import type { ApplicationBootstrap } from './bootstrap';
import { container } from './core/container';
import { TYPES } from './core/container/types';
import type { ILogger } from './core/logging';
import type { IMetricsService } from './core/metrics';
import type { BaseController } from './api/controllers';
import { ErrorPlugin, MetricsPlugin, SnakeCasePlugin } from './api/plugins';

export interface ServerConfig {
  port: number;
  host: string;
  cors: {
    origin: string | boolean;
    credentials: boolean;
  };
}

const CONTROLLERS = [
  TYPES.AnalysisController,
  TYPES.ProvidersController,
  TYPES.HealthChecksController,
  TYPES.CacheController,
  TYPES.StatsController,
  TYPES.SettingsController,
  TYPES.BatchController,
  TYPES.RequestLogsController
] as const;

export class ApplicationServer {
  private app?: AnyElysia;
  private logger?: ILogger;
  private readonly config: ServerConfig;

  constructor(private readonly bootstrap: ApplicationBootstrap) {
    this.config = this.buildServerConfig();
  }

  async start(): Promise<void> {
    await this.bootstrap.initialize();

    this.logger = container.get<ILogger>(TYPES.Logger).createChild('Server');
    const metricsService = container.get<IMetricsService>(TYPES.MetricsService);

    const app = this.createApplication(metricsService);
    this.app = app;
    this.bootstrap.setupGracefulShutdown(() => this.stopHttp());

    app.listen({ port: this.config.port, hostname: this.config.host }, () => {
      this.logger?.info('Server started successfully', {
        metadata: {
          port: this.config.port,
          host: this.config.host,
          environment: process.env.NODE_ENV || 'development'
        }
      });
    });
  }

  async stop(): Promise<void> {
    this.logger?.info('Server shutdown initiated');
    await this.stopHttp();
    await this.bootstrap.shutdown();
    this.logger?.info('Server stopped successfully');
  }

  private async stopHttp(): Promise<void> {
    if (this.app) {
      await this.app.stop();
      this.app = undefined;
    }
  }

  private buildServerConfig(): ServerConfig {
    const origin = process.env.CORS_ORIGIN;
    return {
      port: parseInt(process.env.PORT || '8080', 10),
      host: process.env.HOST || '0.0.0.0',
      cors: {
        origin: origin !== undefined && origin !== '' ? origin : true,
        credentials: process.env.CORS_CREDENTIALS === 'true'
      }
    };
  }

  private createApplication(metricsService: IMetricsService): AnyElysia {
    const logger = container.get<ILogger>(TYPES.Logger);

    const app = new Elysia({ adapter: node() })
      .use(cors({ origin: this.config.cors.origin, credentials: this.config.cors.credentials }))
      .use(new ErrorPlugin(logger).createPlugin())
      .use(new MetricsPlugin(metricsService).createPlugin())
      .use(new SnakeCasePlugin().createPlugin())
      .get('/health', () => ({
        status: 'healthy',
        timestamp: new Date().toISOString(),
        uptime: process.uptime(),
        version: process.env.npm_package_version || '1.0.0'
      }))
      .get('/metrics', async () => {
        const metrics = await metricsService.getMetricsEndpoint();
        return new Response(metrics, {
          headers: { 'Content-Type': metricsService.getContentType() }
        });
      });

    for (const identifier of CONTROLLERS) {
      app.use(container.get<BaseController>(identifier).registerRoutes());
    }

    this.logger?.info('Routes registered', { metadata: { controllers: CONTROLLERS.length } });
    return app;
  }
}
