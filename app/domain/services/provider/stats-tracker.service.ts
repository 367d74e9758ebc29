import { injectable, inject } from 'inversify';
import { TYPES } from '../../../core/container/types';
import { ProviderCallError } from '../../../core/errors';
import { toError, type ILogger } from '../../../core/logging';
import type { IMetricsService } from '../../../core/metrics';
import type { ProviderStats } from '../../entities';
import type { IProviderRegistryService } from './provider-registry.service';

export interface ProviderUsageStats extends ProviderStats {
  readonly providerId: string;
  readonly name: string;
  readonly isActive: boolean;
  readonly successRate: number;
}

export interface UsageStatsReport {
  readonly providers: ProviderUsageStats[];
  readonly totals: {
    readonly usageCount: number;
    readonly successCount: number;
    readonly errorCount: number;
  };
}

export interface IStatsTrackerService {
  recordSuccess(providerId: string, elapsedMs: number): Promise<void>;
  recordError(providerId: string, error?: unknown, elapsedMs?: number): Promise<void>;
  reset(providerId?: string): Promise<number>;
  getUsageStats(): UsageStatsReport;
}

/**
 * Usage bookkeeping for dispatch. A failed stats write never fails the request
 * that produced it: it is logged and counted instead.
 */
@injectable()
export class StatsTrackerService implements IStatsTrackerService {
  private readonly logger: ILogger;

  constructor(
    @inject(TYPES.Logger) logger: ILogger,
    @inject(TYPES.ProviderRegistryService) private readonly providerRegistry: IProviderRegistryService,
    @inject(TYPES.MetricsService) private readonly metricsService: IMetricsService
  ) {
    this.logger = logger.createChild('StatsTrackerService');
  }

  async recordSuccess(providerId: string, elapsedMs: number): Promise<void> {
    this.metricsService.recordProviderRequest(providerId, 'success', elapsedMs);

    try {
      await this.providerRegistry.recordUsage(providerId, { success: true, elapsedMs });
    } catch (error) {
      this.reportWriteFailure(providerId, error);
    }
  }

  async recordError(providerId: string, error?: unknown, elapsedMs: number = 0): Promise<void> {
    const category = error instanceof ProviderCallError ? error.category : undefined;
    const message = error === undefined ? undefined : toError(error).message;

    this.metricsService.recordProviderRequest(providerId, 'error', elapsedMs, category);

    try {
      await this.providerRegistry.recordUsage(providerId, { success: false, elapsedMs, error: message });
    } catch (writeError) {
      this.reportWriteFailure(providerId, writeError);
    }
  }

  async reset(providerId?: string): Promise<number> {
    return this.providerRegistry.resetStats(providerId);
  }

  getUsageStats(): UsageStatsReport {
    const providers = this.providerRegistry.list().map((provider): ProviderUsageStats => ({
      providerId: provider.id,
      name: provider.name,
      isActive: provider.isActive,
      ...provider.stats,
      successRate: provider.stats.usageCount === 0
        ? 0
        : Math.round((provider.stats.successCount / provider.stats.usageCount) * 10000) / 100
    }));

    return {
      providers,
      totals: providers.reduce(
        (totals, provider) => ({
          usageCount: totals.usageCount + provider.usageCount,
          successCount: totals.successCount + provider.successCount,
          errorCount: totals.errorCount + provider.errorCount
        }),
        { usageCount: 0, successCount: 0, errorCount: 0 }
      )
    };
  }

  private reportWriteFailure(providerId: string, error: unknown): void {
    this.metricsService.recordError('stats_write_failed', 'stats_tracker');
    this.logger.error('Failed to record provider usage', toError(error), { providerId });
  }
}
