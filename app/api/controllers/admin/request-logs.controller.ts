import { injectable, inject } from 'inversify';
import { t } from 'elysia';
import { TYPES } from '../../../core/container/types';
import type { ILogger } from '../../../core/logging';
import type { IMetricsService } from '../../../core/metrics';
import type { ISecurityService } from '../../../core/security';
import type { IRequestLogService } from '../../../domain/services/request';
import { AdminController, type ControllerConfiguration } from '../base.controller';

const DEFAULT_LIMIT = 100;
const MAX_LIMIT = 1000;

@injectable()
export class RequestLogsController extends AdminController {
  protected readonly configuration: ControllerConfiguration = { prefix: '/admin' };

  constructor(
    @inject(TYPES.Logger) logger: ILogger,
    @inject(TYPES.MetricsService) metricsService: IMetricsService,
    @inject(TYPES.SecurityService) securityService: ISecurityService,
    @inject(TYPES.RequestLogService) private readonly requestLog: IRequestLogService
  ) {
    super(logger, metricsService, securityService);
  }

  public registerRoutes() {
    return this.createAdminApplication()
      .get('/request-logs', ({ query }) => {
        return this.executeWithContext('listRequestLogs', async () => {
          const limit = Math.min(query.limit ?? DEFAULT_LIMIT, MAX_LIMIT);
          const entries = await this.requestLog.recent({
            limit,
            ...(query.provider_id !== undefined && { providerId: query.provider_id }),
            ...(query.request_type !== undefined && { requestType: query.request_type })
          });

          return {
            object: 'list',
            data: entries.map(entry => ({ ...entry, object: 'request_log' }))
          };
        });
      }, {
        query: t.Object({
          provider_id: t.Optional(t.String()),
          request_type: t.Optional(t.Union([t.Literal('content_analysis'), t.Literal('health_check')])),
          limit: t.Optional(t.Numeric({ minimum: 1 }))
        })
      });
  }
}
