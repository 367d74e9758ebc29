import { Elysia, type AnyElysia } from 'elysia';
import { injectable } from 'inversify';
import { toError, type ILogger } from '../../core/logging';
import type { IMetricsService } from '../../core/metrics';
import type { ISecurityService } from '../../core/security';
import { generateRequestId } from '../../core/utils';
import { AuthPlugin } from '../plugins';

export interface ControllerConfiguration {
  readonly prefix: string;
}

export interface OperationContext {
  readonly requestId: string;
  readonly startTime: number;
}

@injectable()
export abstract class BaseController {
  protected readonly logger: ILogger;
  protected readonly metricsService: IMetricsService;
  protected abstract readonly configuration: ControllerConfiguration;

  constructor(logger: ILogger, metricsService: IMetricsService) {
    this.logger = logger.createChild(this.constructor.name);
    this.metricsService = metricsService;
  }

  public abstract registerRoutes(): AnyElysia;

  protected createApplication() {
    return new Elysia({ prefix: this.configuration.prefix });
  }

  /**
   * Runs one route handler with a request id, timing and failure logging.
   * Errors are rethrown untouched for the error plugin to map.
   */
  protected async executeWithContext<T>(
    operation: string,
    handler: (context: OperationContext) => Promise<T> | T
  ): Promise<T> {
    const context: OperationContext = { requestId: generateRequestId(), startTime: Date.now() };

    this.logger.debug(`${operation} started`, { requestId: context.requestId, operation });

    try {
      const result = await handler(context);

      this.logger.debug(`${operation} completed`, {
        requestId: context.requestId,
        operation,
        duration: Date.now() - context.startTime
      });

      return result;
    } catch (error) {
      const failure = toError(error);
      this.logger.warn(`${operation} failed`, {
        requestId: context.requestId,
        operation,
        duration: Date.now() - context.startTime,
        metadata: { error: failure.message, errorName: failure.name }
      });
      this.metricsService.recordError(failure.name, operation);
      throw error;
    }
  }
}

/**
 * Base for the operator surface under /admin; every route requires the
 * admin bearer token.
 */
@injectable()
export abstract class AdminController extends BaseController {
  private readonly authPlugin: AuthPlugin;

  constructor(logger: ILogger, metricsService: IMetricsService, securityService: ISecurityService) {
    super(logger, metricsService);
    this.authPlugin = new AuthPlugin(securityService, logger);
  }

  protected createAdminApplication() {
    return this.createApplication().use(this.authPlugin.createPlugin());
  }
}
