export { PrometheusCollector } from './collectors';
export { MetricsService } from './metrics.service';
export type { IMetricsService, AnalysisOutcomeLabel, ProviderHealthLabel } from './metrics.service';
export type { IMetricsCollector, MetricLabels, MetricsConfig } from './types';
