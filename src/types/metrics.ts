/**
 * Metrics collection interface.
 *
 * The reward core only records; where the numbers go (memory, Prometheus,
 * nowhere) is decided by whoever builds the orchestrator.
 */

/**
 * Labels for metrics (key-value pairs).
 */
export type MetricLabels = Record<string, string>;

export interface Metrics {
  /**
   * Set a gauge value (can go up or down).
   * Example: reward_running_mean
   */
  gauge(name: string, value: number, labels?: MetricLabels): void;

  /**
   * Increment a counter (only goes up).
   * Example: reward_warnings_total
   */
  counter(name: string, labels?: MetricLabels, increment?: number): void;

  /**
   * Record a histogram observation.
   * Example: reward_compute_duration_ms
   */
  histogram(name: string, value: number, labels?: MetricLabels): void;
}
