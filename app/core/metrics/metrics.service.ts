import { injectable, inject } from 'inversify';
import { toError, type ILogger } from '../logging';
import { TYPES } from '../container/types';
import type { IMetricsCollector, MetricLabels } from './types';

export type AnalysisOutcomeLabel = 'cache_hit' | 'success' | 'no_eligible_provider' | 'all_providers_exhausted';

export type ProviderHealthLabel = 'available' | 'unknown' | 'unavailable';

export interface IMetricsService {
  recordHttpRequest(method: string, route: string, statusCode: number, duration: number): void;
  recordError(type: string, operation?: string): void;
  recordProviderRequest(providerId: string, status: 'success' | 'error', duration: number, category?: string): void;
  recordFailover(fromProviderId: string, category: string): void;
  recordAnalysisOutcome(outcome: AnalysisOutcomeLabel): void;
  recordCacheLookup(hit: boolean): void;
  updateCacheSize(entries: number): void;
  recordHealthCheck(providerId: string, success: boolean): void;
  updateProviderHealth(providerId: string, status: ProviderHealthLabel): void;
  updateBatchQueueSize(size: number): void;
  getMetricsEndpoint(): Promise<string>;
  getContentType(): string;
}

const HEALTH_GAUGE_VALUES: Record<ProviderHealthLabel, number> = {
  unavailable: 0,
  unknown: 1,
  available: 2
};

@injectable()
export class MetricsService implements IMetricsService {
  private readonly logger: ILogger;
  private readonly collector: IMetricsCollector;

  constructor(
    @inject(TYPES.Logger) logger: ILogger,
    @inject(TYPES.MetricsCollector) collector: IMetricsCollector
  ) {
    this.logger = logger.createChild('MetricsService');
    this.collector = collector;
  }

  recordHttpRequest(method: string, route: string, statusCode: number, duration: number): void {
    const labels: MetricLabels = {
      method: method.toUpperCase(),
      route,
      status_code: statusCode.toString()
    };

    this.collector.incrementCounter('http_requests_total', labels);
    this.collector.observeHistogram('http_request_duration_seconds', duration / 1000, labels);
  }

  recordError(type: string, operation?: string): void {
    const labels: MetricLabels = { error_type: type };

    if (operation) {
      labels.operation = operation;
    }

    this.collector.incrementCounter('errors_total', labels);
  }

  recordProviderRequest(providerId: string, status: 'success' | 'error', duration: number, category?: string): void {
    this.collector.incrementCounter('provider_requests_total', {
      provider: providerId,
      status,
      category: category ?? 'none'
    });
    this.collector.observeHistogram('provider_request_duration_seconds', duration / 1000, { provider: providerId, status });

    this.logger.debug('Provider request recorded', {
      providerId,
      metadata: { status, duration, category }
    });
  }

  recordFailover(fromProviderId: string, category: string): void {
    this.collector.incrementCounter('provider_failovers_total', { from_provider: fromProviderId, category });
  }

  recordAnalysisOutcome(outcome: AnalysisOutcomeLabel): void {
    this.collector.incrementCounter('analysis_requests_total', { outcome });
  }

  recordCacheLookup(hit: boolean): void {
    this.collector.incrementCounter('cache_lookups_total', { result: hit ? 'hit' : 'miss' });
  }

  updateCacheSize(entries: number): void {
    this.collector.setGauge('cache_entries', entries);
  }

  recordHealthCheck(providerId: string, success: boolean): void {
    this.collector.incrementCounter('health_checks_total', {
      provider: providerId,
      status: success ? 'success' : 'failure'
    });
  }

  updateProviderHealth(providerId: string, status: ProviderHealthLabel): void {
    this.collector.setGauge('provider_health_status', HEALTH_GAUGE_VALUES[status], { provider: providerId });
  }

  updateBatchQueueSize(size: number): void {
    this.collector.setGauge('batch_queue_size', size);
  }

  async getMetricsEndpoint(): Promise<string> {
    try {
      return await this.collector.getMetrics();
    } catch (error) {
      this.logger.error('Failed to get metrics endpoint data', toError(error));
      return '';
    }
  }

  getContentType(): string {
    return this.collector.getContentType();
  }
}
