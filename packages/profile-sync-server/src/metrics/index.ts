/**
 * Metrics module exports.
 */

export {
  type MetricLabels,
  type HistogramBucket,
  type HistogramSeries,
  type CounterMetric,
  type GaugeMetric,
  type HistogramMetric,
  type Metric,
  DEFAULT_DURATION_BUCKETS,
  PAYLOAD_SIZE_BUCKETS,
} from './types.js';

export { MetricsRegistry, defaultRegistry } from './registry.js';

export { createSyncMetrics, type SyncMetrics } from './sync-metrics.js';
