import { performance } from 'perf_hooks';

/**
 * Process-wide counters, gauges and histograms, keyed by sorted label set
 */

export type MetricLabels = Record<string, string>;

interface ValueMetric {
  help: string;
  values: Map<string, number>;
}

interface HistogramSeries {
  // Cumulative count per finite bucket; the +Inf bucket is `count`
  buckets: number[];
  sum: number;
  count: number;
}

interface HistogramMetric {
  help: string;
  bounds: number[];
  series: Map<string, HistogramSeries>;
}

export interface MetricsSnapshot {
  counters: Record<string, Record<string, number>>;
  gauges: Record<string, Record<string, number>>;
  histograms: Record<string, Record<string, { sum: number; count: number }>>;
}

export interface Timer {
  stop: () => number;
}

const DEFAULT_BOUNDS = [0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10];

export class MetricsCollector {
  private readonly counters = new Map<string, ValueMetric>();
  private readonly gauges = new Map<string, ValueMetric>();
  private readonly histograms = new Map<string, HistogramMetric>();

  counter(name: string, help: string = ''): void {
    this.valueMetric(this.counters, name, help);
  }

  gauge(name: string, help: string = ''): void {
    this.valueMetric(this.gauges, name, help);
  }

  histogram(name: string, help: string = '', bounds: number[] = DEFAULT_BOUNDS): void {
    this.histogramMetric(name, help, bounds);
  }

  incrementCounter(name: string, labels?: MetricLabels, value: number = 1): void {
    this.add(this.valueMetric(this.counters, name), labels, value);
  }

  incrementGauge(name: string, value: number = 1, labels?: MetricLabels): void {
    this.add(this.valueMetric(this.gauges, name), labels, value);
  }

  decrementGauge(name: string, value: number = 1, labels?: MetricLabels): void {
    this.incrementGauge(name, -value, labels);
  }

  observeHistogram(name: string, value: number, labels?: MetricLabels): void {
    const histogram = this.histogramMetric(name);
    const key = labelKey(labels);
    const series = histogram.series.get(key) ?? { buckets: histogram.bounds.map(() => 0), sum: 0, count: 0 };
    histogram.series.set(key, series);

    histogram.bounds.forEach((bound, index) => {
      if (value <= bound) {
        series.buckets[index] = (series.buckets[index] ?? 0) + 1;
      }
    });
    series.sum += value;
    series.count++;
  }

  /**
   * Start a timer; `stop` records the elapsed seconds and returns them
   */
  startTimer(name: string, labels?: MetricLabels): Timer {
    const startedAt = performance.now();
    return {
      stop: () => {
        const seconds = (performance.now() - startedAt) / 1000;
        this.observeHistogram(name, seconds, labels);
        return seconds;
      }
    };
  }

  async timeAsync<T>(name: string, fn: () => Promise<T>, labels?: MetricLabels): Promise<T> {
    const timer = this.startTimer(name, labels);
    try {
      return await fn();
    } finally {
      timer.stop();
    }
  }

  /**
   * Prometheus text exposition format
   */
  getPrometheusMetrics(): string {
    const lines: string[] = [];

    const header = (name: string, help: string, type: string): void => {
      if (help) {
        lines.push(`# HELP ${name} ${help}`);
      }
      lines.push(`# TYPE ${name} ${type}`);
    };

    for (const [name, counter] of this.counters) {
      header(name, counter.help, 'counter');
      for (const [key, value] of counter.values) {
        lines.push(`${name}${braces(key)} ${value}`);
      }
    }

    for (const [name, gauge] of this.gauges) {
      header(name, gauge.help, 'gauge');
      for (const [key, value] of gauge.values) {
        lines.push(`${name}${braces(key)} ${value}`);
      }
    }

    for (const [name, histogram] of this.histograms) {
      header(name, histogram.help, 'histogram');
      for (const [key, series] of histogram.series) {
        const prefix = key ? `${key},` : '';
        histogram.bounds.forEach((bound, index) => {
          lines.push(`${name}_bucket{${prefix}le="${bound}"} ${series.buckets[index] ?? 0}`);
        });
        lines.push(`${name}_bucket{${prefix}le="+Inf"} ${series.count}`);
        lines.push(`${name}_sum${braces(key)} ${series.sum}`);
        lines.push(`${name}_count${braces(key)} ${series.count}`);
      }
    }

    return lines.length > 0 ? `${lines.join('\n')}\n` : '';
  }

  /**
   * Plain-object view of every series, for the JSON metrics endpoint
   */
  snapshot(): MetricsSnapshot {
    const values = (metrics: Map<string, ValueMetric>): Record<string, Record<string, number>> =>
      Object.fromEntries([...metrics].map(([name, metric]) => [name, Object.fromEntries(metric.values)]));

    return {
      counters: values(this.counters),
      gauges: values(this.gauges),
      histograms: Object.fromEntries(
        [...this.histograms].map(([name, histogram]) => [
          name,
          Object.fromEntries(
            [...histogram.series].map(([key, series]) => [key, { sum: series.sum, count: series.count }])
          )
        ])
      )
    };
  }

  private valueMetric(registry: Map<string, ValueMetric>, name: string, help: string = ''): ValueMetric {
    let metric = registry.get(name);
    if (!metric) {
      metric = { help, values: new Map() };
      registry.set(name, metric);
    } else if (help && !metric.help) {
      metric.help = help;
    }
    return metric;
  }

  private histogramMetric(name: string, help: string = '', bounds: number[] = DEFAULT_BOUNDS): HistogramMetric {
    let metric = this.histograms.get(name);
    if (!metric) {
      metric = { help, bounds, series: new Map() };
      this.histograms.set(name, metric);
    } else if (help && !metric.help) {
      metric.help = help;
    }
    return metric;
  }

  private add(metric: ValueMetric, labels: MetricLabels | undefined, value: number): void {
    const key = labelKey(labels);
    metric.values.set(key, (metric.values.get(key) ?? 0) + value);
  }
}

function labelKey(labels?: MetricLabels): string {
  if (!labels) {
    return '';
  }
  return Object.entries(labels)
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([key, value]) => `${key}="${value}"`)
    .join(',');
}

function braces(key: string): string {
  return key ? `{${key}}` : '';
}

export const metrics = new MetricsCollector();

// HTTP
metrics.counter('toolstream_http_requests_total', 'Total HTTP requests');
metrics.histogram('toolstream_http_request_duration_seconds', 'HTTP request duration');
metrics.gauge('toolstream_http_requests_in_flight', 'HTTP requests currently being processed');
metrics.counter('toolstream_http_errors_total', 'Unhandled errors while serving HTTP requests');

// Sessions
metrics.counter('toolstream_sessions_created_total', 'Total sessions created');
metrics.counter('toolstream_sessions_expired_total', 'Sessions removed after their timeout');
metrics.counter('toolstream_sessions_terminated_total', 'Sessions ended by the client');

// RPC
metrics.counter('toolstream_rpc_requests_total', 'JSON-RPC messages dispatched');
metrics.counter('toolstream_rpc_errors_total', 'JSON-RPC error replies');
metrics.histogram('toolstream_tool_call_duration_seconds', 'Tool execution duration');

// Streams
metrics.gauge('toolstream_streams_active', 'Open server-push streams');
metrics.counter('toolstream_stream_frames_dropped_total', 'Frames dropped by a full event channel');
metrics.counter('toolstream_stream_backpressure_total', 'Times a stream paused for a buffering client');
