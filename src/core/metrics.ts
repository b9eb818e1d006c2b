import type { MetricLabels, Metrics } from '../types/index.js';

/**
 * Metrics sink that drops everything.
 */
export class NoOpMetrics implements Metrics {
  gauge(_name: string, _value: number, _labels?: MetricLabels): void {
    // No-op
  }

  counter(_name: string, _labels?: MetricLabels, _increment?: number): void {
    // No-op
  }

  histogram(_name: string, _value: number, _labels?: MetricLabels): void {
    // No-op
  }
}

/**
 * Summary of recorded histogram observations.
 */
export interface HistogramSummary {
  count: number;
  sum: number;
  min: number;
  max: number;
  mean: number;
}

/**
 * In-process metrics store.
 *
 * Keeps the last value of each gauge, running totals of counters and a
 * summary (not the samples) of each histogram. Series are keyed by name plus
 * sorted labels, e.g. `reward_warnings_total{code="EMPTY_INPUT"}`.
 */
export class InMemoryMetrics implements Metrics {
  private readonly gauges = new Map<string, number>();
  private readonly counters = new Map<string, number>();
  private readonly histograms = new Map<string, HistogramSummary>();

  gauge(name: string, value: number, labels?: MetricLabels): void {
    this.gauges.set(seriesKey(name, labels), value);
  }

  counter(name: string, labels?: MetricLabels, increment = 1): void {
    const key = seriesKey(name, labels);
    this.counters.set(key, (this.counters.get(key) ?? 0) + increment);
  }

  histogram(name: string, value: number, labels?: MetricLabels): void {
    const key = seriesKey(name, labels);
    const existing = this.histograms.get(key);
    if (!existing) {
      this.histograms.set(key, { count: 1, sum: value, min: value, max: value, mean: value });
      return;
    }
    const count = existing.count + 1;
    const sum = existing.sum + value;
    this.histograms.set(key, {
      count,
      sum,
      min: Math.min(existing.min, value),
      max: Math.max(existing.max, value),
      mean: sum / count,
    });
  }

  getGauge(name: string, labels?: MetricLabels): number | undefined {
    return this.gauges.get(seriesKey(name, labels));
  }

  getCounter(name: string, labels?: MetricLabels): number {
    return this.counters.get(seriesKey(name, labels)) ?? 0;
  }

  getHistogram(name: string, labels?: MetricLabels): HistogramSummary | undefined {
    return this.histograms.get(seriesKey(name, labels));
  }

  /**
   * Flat view of every series, for logging a run summary.
   */
  snapshot(): {
    gauges: Record<string, number>;
    counters: Record<string, number>;
    histograms: Record<string, HistogramSummary>;
  } {
    return {
      gauges: Object.fromEntries(this.gauges),
      counters: Object.fromEntries(this.counters),
      histograms: Object.fromEntries(this.histograms),
    };
  }
}

function seriesKey(name: string, labels?: MetricLabels): string {
  if (!labels) return name;
  const entries = Object.entries(labels).sort(([a], [b]) => a.localeCompare(b));
  if (entries.length === 0) return name;
  return `${name}{${entries.map(([k, v]) => `${k}="${v}"`).join(',')}}`;
}

/**
 * Create a no-op metrics instance.
 */
export function createMetrics(): Metrics {
  return new NoOpMetrics();
}
