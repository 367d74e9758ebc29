export interface MetricLabels {
  [key: string]: string | number;
}

export interface CounterMetric {
  name: string;
  help: string;
  labels?: string[];
}

export interface GaugeMetric {
  name: string;
  help: string;
  labels?: string[];
}

export interface HistogramMetric {
  name: string;
  help: string;
  labels?: string[];
  buckets?: number[];
}

export interface MetricsConfig {
  enabled: boolean;
  prefix: string;
  defaultLabels: Record<string, string>;
  collectDefaultMetrics: boolean;
}

export interface IMetricsCollector {
  incrementCounter(name: string, labels?: MetricLabels, value?: number): void;
  setGauge(name: string, value: number, labels?: MetricLabels): void;
  observeHistogram(name: string, value: number, labels?: MetricLabels): void;
  startTimer(name: string, labels?: MetricLabels): () => void;
  getMetrics(): Promise<string>;
  getContentType(): string;
  reset(): void;
}
