import { describe, it, expect, afterEach } from '@jest/globals';
import { BenchmarkStatus, LatencyStats, TelemetryEvent } from '@tradewire/types';
import { PublishClient, PullSocket, decode } from '@tradewire/transport';
import {
  BenchmarkSelfMonitor,
  DEFAULT_LATENCY_THRESHOLDS,
  LatencyMonitor,
  SELF_MONITOR_TEST_NAME,
  evaluateThresholds
} from '../src';

function stats(overrides: Partial<LatencyStats> = {}): LatencyStats {
  return { count: 10, min: 10, mean: 100, p50: 90, p95: 200, p99: 300, max: 400, ...overrides };
}

describe('LatencyMonitor', () => {
  it('should apply the default thresholds', () => {
    expect(new LatencyMonitor().thresholds).toEqual({ p95Us: 1000, p99Us: 5000, meanUs: 500 });
    expect(DEFAULT_LATENCY_THRESHOLDS.p95Us).toBe(1000);
  });

  it('should raise nothing within the thresholds', () => {
    const monitor = new LatencyMonitor();
    expect(monitor.check(stats(), 1000)).toEqual([]);
    expect(monitor.getSnapshots()).toHaveLength(1);
  });

  it('should raise one alert per exceeded threshold', () => {
    const monitor = new LatencyMonitor();
    const emitted: string[] = [];
    monitor.on('alert', (alert: string) => emitted.push(alert));

    const alerts = monitor.check(stats({ p95: 1500, p99: 6000, mean: 600 }), 1000);

    expect(alerts).toEqual([
      'P95 latency high: 1500.0μs > 1000.0μs',
      'P99 latency high: 6000.0μs > 5000.0μs',
      'Mean latency high: 600.0μs > 500.0μs'
    ]);
    expect(emitted).toEqual(alerts);
    expect(monitor.getAlerts()).toEqual(alerts.map((alert) => `1970-01-01T00:16:40.000Z: ${alert}`));
  });

  it('should ignore empty statistics', () => {
    const monitor = new LatencyMonitor({ thresholds: { p95Us: -1 } });
    expect(monitor.check(stats({ count: 0, p95: 0 }))).toEqual([]);
    expect(monitor.getSnapshots()).toEqual([]);
  });

  it('should bound its history', () => {
    const monitor = new LatencyMonitor({ historySize: 2 });
    [1, 2, 3].forEach((timestamp) => monitor.check(stats({ p95: timestamp }), timestamp));

    expect(monitor.getSnapshots().map((snapshot) => snapshot.timestamp)).toEqual([2, 3]);
  });

  it('should report the trend over a window', () => {
    const monitor = new LatencyMonitor();
    monitor.check(stats({ p95: 100, mean: 50 }), 100);
    monitor.check(stats({ p95: 150, mean: 40 }), 200);
    monitor.check(stats({ p95: 180, mean: 70 }), 290);

    expect(monitor.trend(150, 300)).toEqual({ p95TrendUs: 30, meanTrendUs: 30, samples: 2 });
    expect(monitor.trend(50, 300)).toBeNull();
    expect(monitor.getRecentSnapshots(1000, 300)).toHaveLength(3);
  });

  it('should evaluate thresholds strictly', () => {
    expect(evaluateThresholds(stats({ p95: 1000, p99: 5000, mean: 500 }), DEFAULT_LATENCY_THRESHOLDS)).toEqual([]);
  });
});

describe('BenchmarkSelfMonitor', () => {
  const clients: PublishClient[] = [];
  const pulls: PullSocket[] = [];

  async function receiver(): Promise<{ pull: PullSocket; endpoint: string }> {
    const pull = new PullSocket();
    pulls.push(pull);
    await pull.bind('tcp://127.0.0.1:0');
    const endpoint = pull.endpoint;
    if (!endpoint) {
      throw new Error('receiver is not bound');
    }
    return { pull, endpoint };
  }

  async function nextStatus(pull: PullSocket): Promise<TelemetryEvent> {
    const frame = await pull.receive(3000);
    if (!frame) {
      throw new Error('no status received');
    }
    const decoded = decode(frame);
    if (!decoded.success) {
      throw decoded.error;
    }
    return decoded.event;
  }

  afterEach(async () => {
    for (const c of clients.splice(0)) {
      c.close();
    }
    await Promise.all(pulls.splice(0).map((pull) => pull.close()));
  });

  it('should stop waiting for a receiver when the signal aborts', async () => {
    const placeholder = new PullSocket();
    await placeholder.bind('tcp://127.0.0.1:0');
    const endpoint = placeholder.endpoint ?? 'tcp://127.0.0.1:1';
    await placeholder.close();

    const monitor = new BenchmarkSelfMonitor({ endpoint, intervalMs: 50, connectTimeoutMs: 10000 });
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 50);

    const started = Date.now();
    await monitor.run(controller.signal);
    expect(Date.now() - started).toBeLessThan(5000);
  });

  it('should report no data before any status was sent', () => {
    const monitor = new BenchmarkSelfMonitor({ endpoint: 'tcp://127.0.0.1:1' });
    expect(monitor.health()).toEqual({ status: 'no_data' });
  });

  it('should raise exactly one alert when only the p95 threshold is exceeded', async () => {
    const { pull, endpoint } = await receiver();
    const client = PublishClient.connect(endpoint);
    clients.push(client);
    await client.waitForConnection(2000);
    const monitor = new BenchmarkSelfMonitor({
      endpoint,
      client,
      thresholds: { p95Us: -1, p99Us: 1e9, meanUs: 1e9 }
    });

    const alerts = monitor.tick();

    expect(alerts).toHaveLength(1);
    expect(alerts[0]).toMatch(/^P95 latency high: \d+\.\dμs > -1\.0μs$/);

    const running = await nextStatus(pull);
    expect(running).toMatchObject({
      kind: 'benchmark_status',
      testName: SELF_MONITOR_TEST_NAME,
      status: BenchmarkStatus.RUNNING,
      message: 'Health: P95=0.0μs, samples=0'
    });
    const alert = await nextStatus(pull);
    expect(alert).toMatchObject({ status: BenchmarkStatus.ALERT, message: `Benchmark system alert: ${alerts[0]}` });

    const health = monitor.health();
    expect(health.status).toBe('degraded');
  });

  it('should publish started, running and completed over a run', async () => {
    const { pull, endpoint } = await receiver();
    const monitor = new BenchmarkSelfMonitor({ endpoint, intervalMs: 50, socket: { reconnectIntervalMs: 20 } });
    const controller = new AbortController();

    const running = monitor.run(controller.signal);
    const statuses: string[] = [];
    while (!statuses.includes(BenchmarkStatus.RUNNING)) {
      const event = await nextStatus(pull);
      if (event.kind === 'benchmark_status') {
        statuses.push(event.status);
      }
    }
    controller.abort();
    await running;

    expect(statuses[0]).toBe(BenchmarkStatus.STARTED);

    let last = await nextStatus(pull);
    while (last.kind === 'benchmark_status' && last.status !== BenchmarkStatus.COMPLETED) {
      last = await nextStatus(pull);
    }
    expect(last).toMatchObject({ status: BenchmarkStatus.COMPLETED, testName: SELF_MONITOR_TEST_NAME });
  });
});
