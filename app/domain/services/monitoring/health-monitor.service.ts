import { injectable, inject } from 'inversify';
import { TYPES } from '../../../core/container/types';
import { ProviderNotFoundError } from '../../../core/errors';
import type { ErrorClassificationService } from '../../../core/error-classification';
import { toError, type ILogger } from '../../../core/logging';
import type { IMetricsService } from '../../../core/metrics';
import { abortable } from '../../../core/utils';
import type { HealthCheckResult, ProviderSnapshot } from '../../entities';
import type { IAdapterFactoryService } from '../provider/adapter-factory.service';
import type { IProviderRegistryService } from '../provider/provider-registry.service';
import type { IRequestLogService } from '../request';
import type { ISettingsService } from '../settings';

export interface HealthCheckReport {
  readonly startedAt: number;
  readonly completedAt: number;
  readonly results: HealthCheckResult[];
  readonly successCount: number;
  readonly failureCount: number;
}

export interface HealthMonitorStatus {
  readonly running: boolean;
  readonly lastRunAt?: number;
  readonly healthCheckCount: number;
  readonly intervalSeconds: number;
  readonly pollingEnabled: boolean;
  readonly autoHealthCheckEnabled: boolean;
}

export interface IHealthMonitorService {
  runNow(): Promise<HealthCheckReport>;
  getLastResults(): HealthCheckResult[];
  getStatus(): HealthMonitorStatus;
}

/**
 * Probes every active provider in parallel and folds the results into the
 * registry. Probes share provider state with dispatch, never a control path.
 */
@injectable()
export class HealthMonitorService implements IHealthMonitorService {
  private readonly logger: ILogger;
  private readonly lastResults = new Map<string, HealthCheckResult>();
  private inFlight: Promise<HealthCheckReport> | null = null;
  private lastRunAt?: number;
  private healthCheckCount = 0;

  constructor(
    @inject(TYPES.Logger) logger: ILogger,
    @inject(TYPES.ProviderRegistryService) private readonly providerRegistry: IProviderRegistryService,
    @inject(TYPES.AdapterFactoryService) private readonly adapterFactory: IAdapterFactoryService,
    @inject(TYPES.SettingsService) private readonly settingsService: ISettingsService,
    @inject(TYPES.ErrorClassificationService) private readonly errorClassification: ErrorClassificationService,
    @inject(TYPES.RequestLogService) private readonly requestLog: IRequestLogService,
    @inject(TYPES.MetricsService) private readonly metricsService: IMetricsService
  ) {
    this.logger = logger.createChild('HealthMonitorService');
  }

  /**
   * Joins the cycle already in flight, if any, rather than starting another.
   */
  runNow(): Promise<HealthCheckReport> {
    if (!this.inFlight) {
      this.inFlight = this.runCycle().finally(() => {
        this.inFlight = null;
      });
    }
    return this.inFlight;
  }

  getLastResults(): HealthCheckResult[] {
    return [...this.lastResults.values()]
      .filter(result => this.providerRegistry.get(result.providerId) !== undefined)
      .sort((a, b) => a.providerName.localeCompare(b.providerName));
  }

  getStatus(): HealthMonitorStatus {
    const settings = this.settingsService.get();
    return {
      running: this.inFlight !== null,
      lastRunAt: this.lastRunAt,
      healthCheckCount: this.healthCheckCount,
      intervalSeconds: settings.healthCheckIntervalSeconds,
      pollingEnabled: settings.pollingEnabled,
      autoHealthCheckEnabled: settings.autoHealthCheckEnabled
    };
  }

  private async runCycle(): Promise<HealthCheckReport> {
    const startedAt = Date.now();
    const providers = this.providerRegistry.list(true);

    const results = await Promise.all(providers.map(provider => this.checkProvider(provider)));

    this.lastRunAt = startedAt;
    this.healthCheckCount++;

    const successCount = results.filter(result => result.isSuccess).length;
    const report: HealthCheckReport = {
      startedAt,
      completedAt: Date.now(),
      results,
      successCount,
      failureCount: results.length - successCount
    };

    this.logger.info('Health check cycle completed', {
      duration: report.completedAt - startedAt,
      metadata: { providers: results.length, successCount, failureCount: report.failureCount }
    });
    return report;
  }

  private async checkProvider(provider: ProviderSnapshot): Promise<HealthCheckResult> {
    const startedAt = Date.now();
    const signal = AbortSignal.timeout(this.settingsService.get().probeTimeoutMs);
    let errorMessage: string | undefined;

    try {
      const adapter = this.adapterFactory.getAdapter(provider);
      await abortable(adapter.probe(signal), signal);
    } catch (error) {
      errorMessage = this.errorClassification.toProviderCallError(error, provider.id, { aborted: signal.aborted }).message;
    }

    const result: HealthCheckResult = {
      providerId: provider.id,
      providerName: provider.name,
      isSuccess: errorMessage === undefined,
      responseTimeMs: Date.now() - startedAt,
      errorMessage,
      checkedAt: Date.now()
    };

    this.lastResults.set(provider.id, result);
    this.metricsService.recordHealthCheck(provider.id, result.isSuccess);
    this.metricsService.updateProviderHealth(provider.id, result.isSuccess ? 'available' : 'unavailable');

    try {
      await this.providerRegistry.updateHealth(provider.id, result);
    } catch (error) {
      if (error instanceof ProviderNotFoundError) {
        this.logger.debug('Provider removed during health check', { providerId: provider.id });
      } else {
        this.logger.error('Failed to persist health check result', toError(error), { providerId: provider.id });
      }
    }

    this.requestLog.record({
      providerId: provider.id,
      requestType: 'health_check',
      isSuccess: result.isSuccess,
      errorMessage: result.errorMessage,
      responseTimeMs: result.responseTimeMs,
      isCached: false
    });

    if (!result.isSuccess) {
      this.logger.warn('Provider health check failed', {
        providerId: provider.id,
        metadata: { name: provider.name, error: result.errorMessage }
      });
    }

    return result;
  }
}
