import { injectable, inject } from 'inversify';
import { Registry, Counter, Gauge, Histogram, collectDefaultMetrics } from 'prom-client';
import { toError, type ILogger } from '../logging';
import { TYPES } from '../container/types';
import type {
  IMetricsCollector,
  MetricLabels,
  CounterMetric,
  GaugeMetric,
  HistogramMetric,
  MetricsConfig
} from './types';

@injectable()
export class PrometheusCollector implements IMetricsCollector {
  private readonly logger: ILogger;
  private readonly registry = new Registry();
  private readonly counters: Map<string, Counter<string>> = new Map();
  private readonly gauges: Map<string, Gauge<string>> = new Map();
  private readonly histograms: Map<string, Histogram<string>> = new Map();
  private readonly config: MetricsConfig;

  constructor(@inject(TYPES.Logger) logger: ILogger) {
    this.logger = logger.createChild('PrometheusCollector');
    this.config = this.buildConfig();
    this.registry.setDefaultLabels(this.config.defaultLabels);

    if (this.config.collectDefaultMetrics) {
      collectDefaultMetrics({ register: this.registry, prefix: `${this.config.prefix}_` });
    }

    this.initializeApplicationMetrics();
  }

  incrementCounter(name: string, labels?: MetricLabels, value: number = 1): void {
    try {
      const counter = this.getOrCreateCounter(name);

      if (labels) {
        counter.inc(labels, value);
      } else {
        counter.inc(value);
      }
    } catch (error) {
      this.logger.error('Failed to increment counter', toError(error), {
        metadata: { name, labels, value }
      });
    }
  }

  setGauge(name: string, value: number, labels?: MetricLabels): void {
    try {
      const gauge = this.getOrCreateGauge(name);

      if (labels) {
        gauge.set(labels, value);
      } else {
        gauge.set(value);
      }
    } catch (error) {
      this.logger.error('Failed to set gauge', toError(error), {
        metadata: { name, labels, value }
      });
    }
  }

  observeHistogram(name: string, value: number, labels?: MetricLabels): void {
    try {
      const histogram = this.getOrCreateHistogram(name);

      if (labels) {
        histogram.observe(labels, value);
      } else {
        histogram.observe(value);
      }
    } catch (error) {
      this.logger.error('Failed to observe histogram', toError(error), {
        metadata: { name, labels, value }
      });
    }
  }

  startTimer(name: string, labels?: MetricLabels): () => void {
    try {
      const histogram = this.getOrCreateHistogram(name);
      const endTimer = labels ? histogram.startTimer(labels) : histogram.startTimer();

      return () => {
        endTimer();
      };
    } catch (error) {
      this.logger.error('Failed to start timer', toError(error), {
        metadata: { name, labels }
      });

      return () => undefined;
    }
  }

  async getMetrics(): Promise<string> {
    try {
      return await this.registry.metrics();
    } catch (error) {
      this.logger.error('Failed to get metrics', toError(error));
      return '';
    }
  }

  getContentType(): string {
    return this.registry.contentType;
  }

  reset(): void {
    this.registry.resetMetrics();
    this.logger.info('Metrics registry reset');
  }

  private buildConfig(): MetricsConfig {
    return {
      enabled: process.env.METRICS_ENABLED !== 'false',
      prefix: process.env.METRICS_PREFIX || 'feedsentry',
      defaultLabels: {
        service: process.env.SERVICE_NAME || 'feedsentry',
        environment: process.env.NODE_ENV || 'development'
      },
      collectDefaultMetrics: process.env.COLLECT_DEFAULT_METRICS !== 'false'
    };
  }

  private initializeApplicationMetrics(): void {
    this.createCounter({
      name: 'http_requests_total',
      help: 'Total number of HTTP requests',
      labels: ['method', 'route', 'status_code']
    });

    this.createHistogram({
      name: 'http_request_duration_seconds',
      help: 'Duration of HTTP requests in seconds',
      labels: ['method', 'route', 'status_code'],
      buckets: [0.005, 0.01, 0.05, 0.1, 0.5, 1, 2, 5, 10]
    });

    this.createCounter({
      name: 'errors_total',
      help: 'Total number of application errors',
      labels: ['error_type', 'operation']
    });

    this.createCounter({
      name: 'provider_requests_total',
      help: 'Total number of provider completion attempts',
      labels: ['provider', 'status', 'category']
    });

    this.createHistogram({
      name: 'provider_request_duration_seconds',
      help: 'Duration of provider completion attempts in seconds',
      labels: ['provider', 'status'],
      buckets: [0.1, 0.25, 0.5, 1, 2, 5, 10, 30, 60]
    });

    this.createCounter({
      name: 'provider_failovers_total',
      help: 'Number of times a request moved on to the next provider',
      labels: ['from_provider', 'category']
    });

    this.createCounter({
      name: 'analysis_requests_total',
      help: 'Analysis requests by outcome',
      labels: ['outcome']
    });

    this.createCounter({
      name: 'cache_lookups_total',
      help: 'Request cache lookups by result',
      labels: ['result']
    });

    this.createGauge({
      name: 'cache_entries',
      help: 'Current number of request cache entries'
    });

    this.createCounter({
      name: 'health_checks_total',
      help: 'Provider health probes by outcome',
      labels: ['provider', 'status']
    });

    this.createGauge({
      name: 'provider_health_status',
      help: 'Provider health status (0=unavailable, 1=unknown, 2=available)',
      labels: ['provider']
    });

    this.createGauge({
      name: 'batch_queue_size',
      help: 'Pending batch analysis items'
    });
  }

  private createCounter(config: CounterMetric): Counter<string> {
    const counter = new Counter({
      name: `${this.config.prefix}_${config.name}`,
      help: config.help,
      labelNames: config.labels || [],
      registers: [this.registry]
    });

    this.counters.set(config.name, counter);
    return counter;
  }

  private createGauge(config: GaugeMetric): Gauge<string> {
    const gauge = new Gauge({
      name: `${this.config.prefix}_${config.name}`,
      help: config.help,
      labelNames: config.labels || [],
      registers: [this.registry]
    });

    this.gauges.set(config.name, gauge);
    return gauge;
  }

  private createHistogram(config: HistogramMetric): Histogram<string> {
    const histogram = new Histogram({
      name: `${this.config.prefix}_${config.name}`,
      help: config.help,
      labelNames: config.labels || [],
      buckets: config.buckets,
      registers: [this.registry]
    });

    this.histograms.set(config.name, histogram);
    return histogram;
  }

  private getOrCreateCounter(name: string): Counter<string> {
    return this.counters.get(name) ?? this.createCounter({ name, help: `Auto-generated counter: ${name}` });
  }

  private getOrCreateGauge(name: string): Gauge<string> {
    return this.gauges.get(name) ?? this.createGauge({ name, help: `Auto-generated gauge: ${name}` });
  }

  private getOrCreateHistogram(name: string): Histogram<string> {
    return this.histograms.get(name) ?? this.createHistogram({
      name,
      help: `Auto-generated histogram: ${name}`,
      buckets: [0.001, 0.01, 0.1, 1, 2, 5]
    });
  }
}
