import * as ss from 'simple-statistics';
import { LatencyStats } from '@tradewire/types';

export const EMPTY_LATENCY_STATS: Readonly<LatencyStats> = Object.freeze({
  count: 0,
  min: 0,
  mean: 0,
  p50: 0,
  p95: 0,
  p99: 0,
  max: 0
});

/**
 * Nearest-rank percentile of an ascending array: the value at
 * `ceil(p * n) - 1`, clamped to the array bounds.
 */
export function nearestRank(sorted: readonly number[], p: number): number {
  if (sorted.length === 0) {
    return 0;
  }
  // Tolerance keeps products like 0.95 * 100 from rounding up a rank
  const rank = Math.ceil(p * sorted.length - 1e-9) - 1;
  const index = Math.min(sorted.length - 1, Math.max(0, rank));
  return sorted[index];
}

/**
 * Summary statistics of latency samples in microseconds
 */
export function computeLatencyStats(samples: readonly number[]): LatencyStats {
  if (samples.length === 0) {
    return { ...EMPTY_LATENCY_STATS };
  }

  const sorted = [...samples].sort((a, b) => a - b);
  return {
    count: sorted.length,
    min: sorted[0],
    mean: ss.mean(sorted),
    p50: nearestRank(sorted, 0.5),
    p95: nearestRank(sorted, 0.95),
    p99: nearestRank(sorted, 0.99),
    max: sorted[sorted.length - 1]
  };
}

export function formatLatencyStats(stats: LatencyStats): string {
  return [
    `count=${stats.count}`,
    `min=${stats.min.toFixed(1)}μs`,
    `mean=${stats.mean.toFixed(1)}μs`,
    `p50=${stats.p50.toFixed(1)}μs`,
    `p95=${stats.p95.toFixed(1)}μs`,
    `p99=${stats.p99.toFixed(1)}μs`,
    `max=${stats.max.toFixed(1)}μs`
  ].join(' ');
}
