/**
 * Telemetry events carried over the pipeline transport.
 *
 * Events are immutable once constructed. The `kind` tag is resolved once at
 * decode time and never re-inspected downstream.
 */

export enum TradeSide {
  BUY = 'buy',
  SELL = 'sell'
}

export enum BenchmarkStatus {
  STARTED = 'started',
  RUNNING = 'running',
  COMPLETED = 'completed',
  FAILED = 'failed',
  ALERT = 'alert'
}

/**
 * A single executed trade as seen by the producer
 */
export interface TradeEvent {
  readonly kind: 'trade';
  readonly side: TradeSide;
  /** Non-negative traded quantity */
  readonly quantity: number;
  /** Unix epoch seconds */
  readonly timestamp: number;
}

/**
 * One benchmark metric update published by the harness
 */
export interface BenchmarkEvent {
  readonly kind: 'benchmark';
  readonly metricName: BenchmarkMetricName;
  readonly value: number;
  readonly labels: Readonly<BenchmarkLabels>;
}

/**
 * Lifecycle notice for a benchmark run or the self-monitor
 */
export interface BenchmarkStatusEvent {
  readonly kind: 'benchmark_status';
  readonly status: BenchmarkStatus;
  readonly testName: string;
  readonly timestamp: number;
  readonly message: string;
}

export type TelemetryEvent = TradeEvent | BenchmarkEvent | BenchmarkStatusEvent;

export type TelemetryEventKind = TelemetryEvent['kind'];

export const BENCHMARK_LABEL_NAMES = ['test_type', 'test_name'] as const;

export type BenchmarkLabelName = (typeof BENCHMARK_LABEL_NAMES)[number];

export type BenchmarkLabels = Partial<Record<BenchmarkLabelName, string>>;

/**
 * Benchmark metric catalogue. Counters accumulate increments, gauges keep
 * the last written value.
 */
export const BENCHMARK_METRICS = {
  benchmark_tests_total: {
    type: 'counter',
    help: 'Total number of benchmark runs completed'
  },
  benchmark_trades_published_total: {
    type: 'counter',
    help: 'Total number of trades published by benchmark runs'
  },
  benchmark_throughput_trades_per_second: {
    type: 'gauge',
    help: 'Publishing throughput of the last benchmark run'
  },
  benchmark_latency_min_microseconds: {
    type: 'gauge',
    help: 'Minimum send latency of the last benchmark run'
  },
  benchmark_latency_mean_microseconds: {
    type: 'gauge',
    help: 'Mean send latency of the last benchmark run'
  },
  benchmark_latency_p50_microseconds: {
    type: 'gauge',
    help: 'Median send latency of the last benchmark run'
  },
  benchmark_latency_p95_microseconds: {
    type: 'gauge',
    help: '95th percentile send latency of the last benchmark run'
  },
  benchmark_latency_p99_microseconds: {
    type: 'gauge',
    help: '99th percentile send latency of the last benchmark run'
  },
  benchmark_latency_max_microseconds: {
    type: 'gauge',
    help: 'Maximum send latency of the last benchmark run'
  },
  benchmark_queue_full_events_total: {
    type: 'counter',
    help: 'Total number of sends rejected because the send buffer was full'
  },
  benchmark_errors_total: {
    type: 'counter',
    help: 'Total number of sends that failed with a transport error'
  }
} as const satisfies Record<string, { type: MetricType; help: string }>;

export type BenchmarkMetricName = keyof typeof BENCHMARK_METRICS;

export const BENCHMARK_METRIC_NAMES: readonly BenchmarkMetricName[] = Object.keys(BENCHMARK_METRICS).filter(isBenchmarkMetricName);

export type MetricType = 'counter' | 'gauge';

export function isBenchmarkMetricName(name: string): name is BenchmarkMetricName {
  return Object.prototype.hasOwnProperty.call(BENCHMARK_METRICS, name);
}

export function isCounterMetric(name: BenchmarkMetricName): boolean {
  return BENCHMARK_METRICS[name].type === 'counter';
}
