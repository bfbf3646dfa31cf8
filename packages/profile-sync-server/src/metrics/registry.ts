/**
 * Metrics registry - collects metrics and renders the Prometheus text format.
 */

import {
  type Metric,
  type MetricLabels,
  type CounterMetric,
  type GaugeMetric,
  type HistogramMetric,
  type HistogramSeries,
  DEFAULT_DURATION_BUCKETS,
} from './types.js';

function escapeLabelValue(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/"/g, '\\"').replace(/\n/g, '\\n');
}

/**
 * Serialize labels to a stable key, sorted by label name.
 */
function labelsToKey(labels: MetricLabels): string {
  return Object.keys(labels)
    .sort()
    .map(name => `${name}="${escapeLabelValue(labels[name] ?? '')}"`)
    .join(',');
}

function wrap(labelKey: string): string {
  return labelKey ? `{${labelKey}}` : '';
}

export class MetricsRegistry {
  private readonly metrics = new Map<string, Metric>();

  registerCounter(name: string, help: string): CounterMetric {
    const metric: CounterMetric = { name, help, type: 'counter', values: new Map() };
    this.register(metric);
    return metric;
  }

  registerGauge(name: string, help: string): GaugeMetric {
    const metric: GaugeMetric = { name, help, type: 'gauge', values: new Map() };
    this.register(metric);
    return metric;
  }

  registerHistogram(
    name: string,
    help: string,
    buckets: readonly number[] = DEFAULT_DURATION_BUCKETS
  ): HistogramMetric {
    const metric: HistogramMetric = {
      name,
      help,
      type: 'histogram',
      values: new Map(),
      bucketBoundaries: [...buckets].sort((a, b) => a - b),
    };
    this.register(metric);
    return metric;
  }

  incCounter(metric: CounterMetric, labels: MetricLabels = {}, value = 1): void {
    if (value < 0) {
      throw new Error(`Counter ${metric.name} cannot be decremented`);
    }
    const key = labelsToKey(labels);
    metric.values.set(key, (metric.values.get(key) ?? 0) + value);
  }

  setGauge(metric: GaugeMetric, value: number, labels: MetricLabels = {}): void {
    metric.values.set(labelsToKey(labels), value);
  }

  /**
   * Current value of a counter or gauge for a label set (0 when never touched).
   */
  valueOf(metric: CounterMetric | GaugeMetric, labels: MetricLabels = {}): number {
    return metric.values.get(labelsToKey(labels)) ?? 0;
  }

  observeHistogram(metric: HistogramMetric, value: number, labels: MetricLabels = {}): void {
    const key = labelsToKey(labels);
    let series: HistogramSeries | undefined = metric.values.get(key);
    if (!series) {
      series = {
        buckets: metric.bucketBoundaries.map(le => ({ le, count: 0 })),
        sum: 0,
        count: 0,
      };
      metric.values.set(key, series);
    }

    series.sum += value;
    series.count += 1;
    for (const bucket of series.buckets) {
      if (value <= bucket.le) bucket.count += 1;
    }
  }

  /**
   * Start a timer; calling the returned function records the elapsed seconds.
   */
  startTimer(metric: HistogramMetric, labels: MetricLabels = {}): () => number {
    const start = performance.now();
    return () => {
      const seconds = (performance.now() - start) / 1000;
      this.observeHistogram(metric, seconds, labels);
      return seconds;
    };
  }

  format(): string {
    const lines: string[] = [];

    for (const metric of this.metrics.values()) {
      lines.push(`# HELP ${metric.name} ${metric.help}`);
      lines.push(`# TYPE ${metric.name} ${metric.type}`);

      if (metric.type === 'histogram') {
        for (const [labelKey, series] of metric.values) {
          const prefix = labelKey ? `${labelKey},` : '';
          for (const bucket of series.buckets) {
            lines.push(`${metric.name}_bucket{${prefix}le="${bucket.le}"} ${bucket.count}`);
          }
          lines.push(`${metric.name}_bucket{${prefix}le="+Inf"} ${series.count}`);
          lines.push(`${metric.name}_sum${wrap(labelKey)} ${series.sum}`);
          lines.push(`${metric.name}_count${wrap(labelKey)} ${series.count}`);
        }
      } else {
        for (const [labelKey, value] of metric.values) {
          lines.push(`${metric.name}${wrap(labelKey)} ${value}`);
        }
      }

      lines.push('');
    }

    return lines.join('\n');
  }

  private register(metric: Metric): void {
    if (this.metrics.has(metric.name)) {
      throw new Error(`Metric ${metric.name} is already registered`);
    }
    this.metrics.set(metric.name, metric);
  }
}

/** Registry used by the CLI when none is injected. */
export const defaultRegistry = new MetricsRegistry();
