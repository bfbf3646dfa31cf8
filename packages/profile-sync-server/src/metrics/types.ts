/**
 * Metric shapes held by the registry.
 */

export type MetricLabels = Readonly<Record<string, string>>;

export interface HistogramBucket {
  /** Upper bound ("less than or equal") */
  le: number;
  count: number;
}

export interface HistogramSeries {
  buckets: HistogramBucket[];
  sum: number;
  count: number;
}

interface MetricBase {
  name: string;
  help: string;
}

/** Monotonically increasing value per label set. */
export interface CounterMetric extends MetricBase {
  type: 'counter';
  /** Serialized label set -> value */
  values: Map<string, number>;
}

export interface GaugeMetric extends MetricBase {
  type: 'gauge';
  values: Map<string, number>;
}

export interface HistogramMetric extends MetricBase {
  type: 'histogram';
  values: Map<string, HistogramSeries>;
  bucketBoundaries: readonly number[];
}

export type Metric = CounterMetric | GaugeMetric | HistogramMetric;

/** Timing buckets in seconds. */
export const DEFAULT_DURATION_BUCKETS: readonly number[] = [
  0.001, 0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10,
];

/** Profile payload size buckets in bytes, up to the default 64 KiB limit. */
export const PAYLOAD_SIZE_BUCKETS: readonly number[] = [
  64, 256, 1024, 4096, 16384, 32768, 65536,
];
