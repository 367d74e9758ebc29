import { injectable, inject } from 'inversify';
import { t } from 'elysia';
import { TYPES } from '../../../core/container/types';
import type { ILogger } from '../../../core/logging';
import type { IMetricsService } from '../../../core/metrics';
import type { ISecurityService } from '../../../core/security';
import type { ISettingsService } from '../../../domain/services/settings';
import { toCamelCase } from '../../plugins';
import { AdminController, type ControllerConfiguration } from '../base.controller';

@injectable()
export class SettingsController extends AdminController {
  protected readonly configuration: ControllerConfiguration = { prefix: '/admin' };

  constructor(
    @inject(TYPES.Logger) logger: ILogger,
    @inject(TYPES.MetricsService) metricsService: IMetricsService,
    @inject(TYPES.SecurityService) securityService: ISecurityService,
    @inject(TYPES.SettingsService) private readonly settings: ISettingsService
  ) {
    super(logger, metricsService, securityService);
  }

  public registerRoutes() {
    return this.createAdminApplication()
      .get('/settings', () => {
        return this.executeWithContext('getSettings', () => ({ object: 'settings', ...this.settings.get() }));
      })
      // SettingsService validates the individual fields.
      .patch('/settings', ({ body }) => {
        return this.executeWithContext('updateSettings', async () => {
          const updated = await this.settings.update(toCamelCase(body));
          return { object: 'settings', ...updated };
        });
      }, {
        body: t.Record(t.String(), t.Union([t.Boolean(), t.Number()]))
      });
  }
}
