import { injectable, inject } from 'inversify';
import { t } from 'elysia';
import { TYPES } from '../../../core/container/types';
import type { ILogger } from '../../../core/logging';
import type { IMetricsService } from '../../../core/metrics';
import type { ISecurityService } from '../../../core/security';
import type { IRequestCacheService } from '../../../domain/services/cache';
import { AdminController, type ControllerConfiguration } from '../base.controller';

@injectable()
export class CacheController extends AdminController {
  protected readonly configuration: ControllerConfiguration = { prefix: '/admin' };

  constructor(
    @inject(TYPES.Logger) logger: ILogger,
    @inject(TYPES.MetricsService) metricsService: IMetricsService,
    @inject(TYPES.SecurityService) securityService: ISecurityService,
    @inject(TYPES.RequestCacheService) private readonly requestCache: IRequestCacheService
  ) {
    super(logger, metricsService, securityService);
  }

  public registerRoutes() {
    return this.createAdminApplication()
      .get('/cache', () => {
        return this.executeWithContext('getCacheStats', async () => ({
          object: 'cache_stats',
          ...(await this.requestCache.stats())
        }));
      })
      .delete('/cache', () => {
        return this.executeWithContext('clearCache', async () => ({
          object: 'cache',
          cleared: await this.requestCache.clear()
        }));
      })
      .delete('/cache/:fingerprint', ({ params, set }) => {
        return this.executeWithContext('invalidateCacheEntry', async () => {
          const invalidated = await this.requestCache.invalidate(params.fingerprint);
          if (!invalidated) {
            set.status = 404;
            return {
              error: {
                message: `Cache entry ${params.fingerprint} not found`,
                type: 'not_found_error',
                code: 'cache_entry_not_found'
              }
            };
          }
          return { fingerprint: params.fingerprint, object: 'cache_entry', deleted: true };
        });
      }, {
        params: t.Object({ fingerprint: t.String({ minLength: 1 }) })
      });
  }
}
