import { injectable, inject } from 'inversify';
import { TYPES } from '../../../core/container/types';
import type { ILogger } from '../../../core/logging';
import type { IMetricsService } from '../../../core/metrics';
import type { ISecurityService } from '../../../core/security';
import type { IHealthMonitorService, IPollingWorkerService } from '../../../domain/services/monitoring';
import { AdminController, type ControllerConfiguration } from '../base.controller';

@injectable()
export class HealthChecksController extends AdminController {
  protected readonly configuration: ControllerConfiguration = { prefix: '/admin' };

  constructor(
    @inject(TYPES.Logger) logger: ILogger,
    @inject(TYPES.MetricsService) metricsService: IMetricsService,
    @inject(TYPES.SecurityService) securityService: ISecurityService,
    @inject(TYPES.HealthMonitorService) private readonly healthMonitor: IHealthMonitorService,
    @inject(TYPES.PollingWorkerService) private readonly pollingWorker: IPollingWorkerService
  ) {
    super(logger, metricsService, securityService);
  }

  public registerRoutes() {
    return this.createAdminApplication()
      .post('/health-checks', () => {
        return this.executeWithContext('runHealthChecks', async () => {
          const report = await this.healthMonitor.runNow();
          return { object: 'health_check_report', ...report };
        });
      })
      .get('/health-checks', () => {
        return this.executeWithContext('listHealthCheckResults', () => ({
          object: 'list',
          data: this.healthMonitor.getLastResults()
        }));
      })
      .get('/health-checks/status', () => {
        return this.executeWithContext('getHealthCheckStatus', () => ({
          object: 'health_check_status',
          ...this.healthMonitor.getStatus(),
          polling: this.pollingWorker.getStatus()
        }));
      });
  }
}
