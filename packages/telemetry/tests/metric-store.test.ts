import { describe, it, expect, beforeEach } from '@jest/globals';
import { BenchmarkStatus, TradeSide } from '@tradewire/types';
import { MetricStore } from '../src';

describe('MetricStore', () => {
  let store: MetricStore;

  beforeEach(() => {
    store = new MetricStore();
  });

  function value(key: string): number | undefined {
    return store.snapshot().get(key)?.value;
  }

  describe('Initial state', () => {
    it('should export both sides and the last trade timestamp at zero', () => {
      expect([...store.snapshot().keys()].sort()).toEqual([
        'last_trade_ts_seconds',
        'trades_total{side="buy"}',
        'trades_total{side="sell"}',
        'volume_total{side="buy"}',
        'volume_total{side="sell"}'
      ]);
      expect([...store.snapshot().values()].every((sample) => sample.value === 0)).toBe(true);
    });

    it('should expose zero-valued trade series', async () => {
      const lines = (await store.exposition()).split('\n');

      expect(lines).toContain('# HELP trades_total Total number of trades');
      expect(lines).toContain('# TYPE trades_total counter');
      expect(lines).toContain('trades_total{side="buy"} 0');
      expect(lines).toContain('trades_total{side="sell"} 0');
      expect(lines).toContain('volume_total{side="sell"} 0');
    });
  });

  describe('Trades', () => {
    it('should count trades and volume per side', () => {
      store.recordTrade(TradeSide.BUY, 1.5, 100);
      store.recordTrade(TradeSide.SELL, 2, 200);
      store.recordTrade(TradeSide.BUY, 0.5, 150);

      expect(value('trades_total{side="buy"}')).toBe(2);
      expect(value('trades_total{side="sell"}')).toBe(1);
      expect(value('volume_total{side="buy"}')).toBe(2);
      expect(value('volume_total{side="sell"}')).toBe(2);
      expect(value('last_trade_ts_seconds')).toBe(150);
    });

    it('should render recorded trades in the exposition', async () => {
      store.recordTrade(TradeSide.BUY, 1.5, 1700000000);
      const lines = (await store.exposition()).split('\n');

      expect(lines).toContain('trades_total{side="buy"} 1');
      expect(lines).toContain('volume_total{side="buy"} 1.5');
      expect(lines).toContain('last_trade_ts_seconds 1700000000');
    });

    it.each([-1, Number.NaN, Number.POSITIVE_INFINITY])('should reject quantity %p without writing', (quantity) => {
      const before = store.snapshot();

      expect(() => store.recordTrade(TradeSide.BUY, quantity, 100)).toThrow(RangeError);
      expect(store.snapshot()).toEqual(before);
    });

    it('should reject a non-finite timestamp without writing', () => {
      expect(() => store.recordTrade(TradeSide.SELL, 1, Number.NaN)).toThrow(RangeError);
      expect(value('trades_total{side="sell"}')).toBe(0);
    });
  });

  describe('Snapshot', () => {
    it('should not change when the store is written afterwards', () => {
      const snapshot = store.snapshot();
      store.recordTrade(TradeSide.BUY, 3, 10);

      expect(snapshot.get('trades_total{side="buy"}')?.value).toBe(0);
      expect(value('trades_total{side="buy"}')).toBe(1);
    });
  });

  describe('Benchmark metrics', () => {
    const labels = { test_type: 'burst', test_name: 'burst_100' };

    it('should increment counters and overwrite gauges', () => {
      store.recordBenchmark({ kind: 'benchmark', metricName: 'benchmark_tests_total', value: 1, labels });
      store.recordBenchmark({ kind: 'benchmark', metricName: 'benchmark_tests_total', value: 1, labels });
      store.recordBenchmark({ kind: 'benchmark', metricName: 'benchmark_latency_p95_microseconds', value: 40, labels });
      store.recordBenchmark({ kind: 'benchmark', metricName: 'benchmark_latency_p95_microseconds', value: 25, labels });

      expect(value('benchmark_tests_total{test_name="burst_100",test_type="burst"}')).toBe(2);
      expect(value('benchmark_latency_p95_microseconds{test_name="burst_100",test_type="burst"}')).toBe(25);
    });

    it('should keep unlabelled updates in their own series', () => {
      store.recordBenchmark({ kind: 'benchmark', metricName: 'benchmark_errors_total', value: 3, labels: {} });

      expect(value('benchmark_errors_total')).toBe(3);
    });

    it('should reject a negative counter increment', () => {
      expect(() =>
        store.recordBenchmark({ kind: 'benchmark', metricName: 'benchmark_errors_total', value: -1, labels })
      ).toThrow(RangeError);
      expect(value('benchmark_errors_total{test_name="burst_100",test_type="burst"}')).toBeUndefined();
    });

    it('should accept a negative gauge value', () => {
      store.recordBenchmark({ kind: 'benchmark', metricName: 'benchmark_latency_min_microseconds', value: -2, labels });
      expect(value('benchmark_latency_min_microseconds{test_name="burst_100",test_type="burst"}')).toBe(-2);
    });

    it('should record a whole result', async () => {
      store.recordBenchmarkResult(
        {
          totalCount: 100,
          okCount: 97,
          queueFullCount: 3,
          errorCount: 0,
          durationSeconds: 0.5,
          throughput: 200,
          latencyStats: { count: 100, min: 1, mean: 5, p50: 4, p95: 9, p99: 12, max: 20 }
        },
        labels
      );

      expect(value('benchmark_trades_published_total{test_name="burst_100",test_type="burst"}')).toBe(100);
      expect(value('benchmark_queue_full_events_total{test_name="burst_100",test_type="burst"}')).toBe(3);
      expect(value('benchmark_throughput_trades_per_second{test_name="burst_100",test_type="burst"}')).toBe(200);
      const lines = (await store.exposition()).split('\n');
      expect(lines.filter((line) => line.startsWith('benchmark_latency_max_microseconds{'))).toHaveLength(1);
      expect(lines).toContainEqual(expect.stringMatching(/^benchmark_latency_max_microseconds\{.*test_name="burst_100".*\} 20$/));
    });

    it('should count status notices per status and test', () => {
      const status = {
        kind: 'benchmark_status' as const,
        status: BenchmarkStatus.STARTED,
        testName: 'burst_100',
        timestamp: 1,
        message: ''
      };
      store.recordBenchmarkStatus(status);
      store.recordBenchmarkStatus(status);
      store.recordBenchmarkStatus({ ...status, status: BenchmarkStatus.COMPLETED });

      expect(value('benchmark_status_total{status="started",test_name="burst_100"}')).toBe(2);
      expect(value('benchmark_status_total{status="completed",test_name="burst_100"}')).toBe(1);
    });
  });

  it('should report the Prometheus content type', () => {
    expect(store.contentType).toBe('text/plain; version=0.0.4; charset=utf-8');
  });
});
