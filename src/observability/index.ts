export { MetricsCollector } from './metrics.js';
export type {
  MetricsSource,
  MetricSample,
  AggregateMetrics,
  MetricsCollectorOptions,
} from './metrics.js';
