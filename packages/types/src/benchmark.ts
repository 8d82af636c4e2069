import { BenchmarkEvent, BenchmarkLabels, BenchmarkMetricName } from './events';

/**
 * Send-latency statistics in microseconds
 */
export interface LatencyStats {
  count: number;
  min: number;
  mean: number;
  p50: number;
  p95: number;
  p99: number;
  max: number;
}

/**
 * Outcome of a single burst or sustained benchmark run.
 * `totalCount` always equals `okCount + queueFullCount + errorCount`.
 */
export interface BenchmarkResult {
  readonly totalCount: number;
  readonly okCount: number;
  readonly queueFullCount: number;
  readonly errorCount: number;
  readonly durationSeconds: number;
  /** Sends per second over the wall-clock duration */
  readonly throughput: number;
  readonly latencyStats: Readonly<LatencyStats>;
}

export type BenchmarkTestType = 'burst' | 'sustained';

/**
 * Metric updates describing one finished run, in publish order. The sidecar
 * applies the same list when it records a result directly.
 */
export function benchmarkEventsFromResult(result: BenchmarkResult, labels: BenchmarkLabels): BenchmarkEvent[] {
  const { latencyStats } = result;
  const updates: Array<[BenchmarkMetricName, number]> = [
    ['benchmark_tests_total', 1],
    ['benchmark_trades_published_total', result.totalCount],
    ['benchmark_throughput_trades_per_second', result.throughput],
    ['benchmark_latency_min_microseconds', latencyStats.min],
    ['benchmark_latency_mean_microseconds', latencyStats.mean],
    ['benchmark_latency_p50_microseconds', latencyStats.p50],
    ['benchmark_latency_p95_microseconds', latencyStats.p95],
    ['benchmark_latency_p99_microseconds', latencyStats.p99],
    ['benchmark_latency_max_microseconds', latencyStats.max],
    ['benchmark_queue_full_events_total', result.queueFullCount],
    ['benchmark_errors_total', result.errorCount]
  ];

  return updates.map(([metricName, value]): BenchmarkEvent => ({
    kind: 'benchmark',
    metricName,
    value,
    labels: { ...labels }
  }));
}
