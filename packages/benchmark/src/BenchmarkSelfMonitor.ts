import { BenchmarkStatus, LatencyStats } from '@tradewire/types';
import { Logger, sleep } from '@tradewire/utils';
import { EncodingError, PublishClient, PushSocketOptions } from '@tradewire/transport';
import { LatencyRecorder } from './LatencyRecorder';
import { LatencyMonitor, LatencyThresholds, evaluateThresholds } from './LatencyMonitor';

export const SELF_MONITOR_TEST_NAME = 'self_monitor';

export interface BenchmarkSelfMonitorOptions {
  /** Endpoint status messages are pushed to */
  endpoint: string;
  intervalMs?: number;
  /** How long `run` waits for a receiver before publishing `started` */
  connectTimeoutMs?: number;
  maxSamples?: number;
  thresholds?: Partial<LatencyThresholds>;
  socket?: PushSocketOptions;
  /** Use this client instead of connecting one; it is not closed by `run` */
  client?: PublishClient;
  logger?: Logger;
}

export type SelfMonitorHealth =
  | { status: 'no_data' }
  | {
      status: 'healthy' | 'degraded';
      latency: LatencyStats;
      issues: string[];
      thresholds: LatencyThresholds;
    };

const FLUSH_TIMEOUT_MS = 1000;

/**
 * Watches the publish latency of its own status messages, sent through the
 * same pipeline the benchmarks exercise, and raises alerts through it.
 */
export class BenchmarkSelfMonitor {
  readonly monitor: LatencyMonitor;
  private readonly recorder: LatencyRecorder;
  private readonly endpoint: string;
  private readonly intervalMs: number;
  private readonly connectTimeoutMs: number;
  private readonly socketOptions: PushSocketOptions;
  private readonly providedClient: PublishClient | undefined;
  private readonly logger: Logger;
  private client: PublishClient | null = null;

  constructor(options: BenchmarkSelfMonitorOptions) {
    this.endpoint = options.endpoint;
    this.intervalMs = options.intervalMs ?? 5000;
    this.connectTimeoutMs = options.connectTimeoutMs ?? 2000;
    this.recorder = new LatencyRecorder(options.maxSamples ?? 10000);
    this.monitor = new LatencyMonitor({ thresholds: options.thresholds });
    this.socketOptions = options.socket ?? {};
    this.providedClient = options.client;
    this.logger = options.logger ?? new Logger('BenchmarkSelfMonitor');
  }

  /**
   * Supervised task body: publishes `started`, then a `running` status and
   * any alerts every interval, and `completed` once the signal aborts
   */
  async run(signal: AbortSignal): Promise<void> {
    const client = this.providedClient ?? PublishClient.connect(this.endpoint, this.socketOptions);
    this.client = client;
    this.logger.info('Self-monitoring started', { endpoint: this.endpoint, intervalMs: this.intervalMs });

    try {
      if (!(await client.waitForConnection(this.connectTimeoutMs, signal)) && !signal.aborted) {
        this.logger.warn('No receiver connected yet, statuses are dropped until one is', { endpoint: this.endpoint });
      }
      this.publish(BenchmarkStatus.STARTED, 'Benchmark self-monitoring started');
      while (await sleep(this.intervalMs, signal)) {
        this.tick();
      }
      this.publish(BenchmarkStatus.COMPLETED, 'Benchmark self-monitoring stopped');
      await client.flush(FLUSH_TIMEOUT_MS);
    } finally {
      this.client = null;
      if (!this.providedClient) {
        client.close();
      }
      this.logger.info('Self-monitoring stopped');
    }
  }

  /**
   * One monitoring round. Returns the alerts raised.
   */
  tick(): string[] {
    const before = this.recorder.stats();
    this.publish(BenchmarkStatus.RUNNING, `Health: P95=${before.p95.toFixed(1)}μs, samples=${before.count}`);

    const alerts = this.monitor.check(this.recorder.stats());
    for (const alert of alerts) {
      this.logger.warn('Benchmark system alert', { alert });
      this.publish(BenchmarkStatus.ALERT, `Benchmark system alert: ${alert}`);
    }
    return alerts;
  }

  health(): SelfMonitorHealth {
    const latency = this.recorder.stats();
    if (latency.count === 0) {
      return { status: 'no_data' };
    }
    const thresholds = { ...this.monitor.thresholds };
    const issues = evaluateThresholds(latency, thresholds);
    return { status: issues.length > 0 ? 'degraded' : 'healthy', latency, issues, thresholds };
  }

  private publish(status: BenchmarkStatus, message: string): void {
    const client = this.client ?? this.providedClient;
    if (!client) {
      return;
    }
    const outcome = client.publishStatus(SELF_MONITOR_TEST_NAME, status, message);
    if (!(outcome.error instanceof EncodingError)) {
      this.recorder.record(outcome.elapsedUs);
    }
    if (!outcome.ok) {
      this.logger.debug('Status not delivered', { status, queueFull: outcome.queueFull });
    }
  }
}
