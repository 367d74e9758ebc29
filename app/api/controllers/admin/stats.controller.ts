import { injectable, inject } from 'inversify';
import { t } from 'elysia';
import { TYPES } from '../../../core/container/types';
import type { ILogger } from '../../../core/logging';
import type { IMetricsService } from '../../../core/metrics';
import type { ISecurityService } from '../../../core/security';
import type { IProviderRegistryService, IStatsTrackerService } from '../../../domain/services/provider';
import { AdminController, type ControllerConfiguration } from '../base.controller';

@injectable()
export class StatsController extends AdminController {
  protected readonly configuration: ControllerConfiguration = { prefix: '/admin' };

  constructor(
    @inject(TYPES.Logger) logger: ILogger,
    @inject(TYPES.MetricsService) metricsService: IMetricsService,
    @inject(TYPES.SecurityService) securityService: ISecurityService,
    @inject(TYPES.StatsTrackerService) private readonly statsTracker: IStatsTrackerService,
    @inject(TYPES.ProviderRegistryService) private readonly registry: IProviderRegistryService
  ) {
    super(logger, metricsService, securityService);
  }

  public registerRoutes() {
    return this.createAdminApplication()
      .get('/stats', () => {
        return this.executeWithContext('getUsageStats', () => ({
          object: 'usage_stats',
          ...this.statsTracker.getUsageStats()
        }));
      })
      .post('/stats/reset', ({ body }) => {
        return this.executeWithContext('resetUsageStats', async () => {
          const providerId = body?.provider_id;
          if (providerId !== undefined) {
            this.registry.require(providerId);
          }
          const reset = await this.statsTracker.reset(providerId);
          return { object: 'usage_stats_reset', reset, ...(providerId !== undefined && { providerId }) };
        });
      }, {
        body: t.Optional(t.Object({ provider_id: t.Optional(t.String({ minLength: 1 })) }))
      });
  }
}
