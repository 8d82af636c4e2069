import { performance } from 'perf_hooks';
import {
  BenchmarkResult,
  BenchmarkStatus,
  BenchmarkTestType,
  TradeSide,
  benchmarkEventsFromResult
} from '@tradewire/types';
import { Logger, sleep } from '@tradewire/utils';
import { EncodingError, PublishClient, PublishResult } from '@tradewire/transport';
import { LatencyRecorder } from './LatencyRecorder';

export interface PublishingBenchmarkOptions {
  /** Client the benchmark trades are sent through */
  client: PublishClient;
  /** Client benchmark results and statuses are published through, if any */
  metricsClient?: PublishClient;
  maxSamples?: number;
  logger?: Logger;
}

/**
 * Per-run tally of send outcomes and latencies
 */
class RunTally {
  okCount = 0;
  queueFullCount = 0;
  errorCount = 0;
  readonly latencies: LatencyRecorder;

  constructor(maxSamples: number) {
    this.latencies = new LatencyRecorder(maxSamples);
  }

  add(result: PublishResult): void {
    // Encoding failures never reach the socket, so they have no send latency
    if (!(result.error instanceof EncodingError)) {
      this.latencies.record(result.elapsedUs);
    }
    if (result.ok) {
      this.okCount++;
    } else if (result.queueFull) {
      this.queueFullCount++;
    } else {
      this.errorCount++;
    }
  }

  get totalCount(): number {
    return this.okCount + this.queueFullCount + this.errorCount;
  }

  toResult(durationSeconds: number): BenchmarkResult {
    const totalCount = this.totalCount;
    return Object.freeze({
      totalCount,
      okCount: this.okCount,
      queueFullCount: this.queueFullCount,
      errorCount: this.errorCount,
      durationSeconds,
      throughput: durationSeconds > 0 ? totalCount / durationSeconds : 0,
      latencyStats: Object.freeze(this.latencies.stats())
    });
  }
}

export function burstTestName(count: number): string {
  return `burst_${count}`;
}

export function sustainedTestName(rate: number): string {
  return `sustained_${rate}tps`;
}

/**
 * Measures what publishing costs the producer: every send call is timed
 * and classified as ok, queue_full or error.
 */
export class PublishingBenchmark {
  private readonly client: PublishClient;
  private readonly metricsClient: PublishClient | undefined;
  private readonly maxSamples: number;
  private readonly logger: Logger;
  private readonly results: BenchmarkResult[] = [];

  constructor(options: PublishingBenchmarkOptions) {
    this.client = options.client;
    this.metricsClient = options.metricsClient;
    this.maxSamples = options.maxSamples ?? 10000;
    this.logger = options.logger ?? new Logger('PublishingBenchmark');
  }

  /**
   * Send `count` trades back to back, alternating buy and sell
   */
  runBurst(count: number, quantity = 1): BenchmarkResult {
    if (!Number.isInteger(count) || count < 0) {
      throw new RangeError(`Burst count must be a non-negative integer, got ${count}`);
    }

    const tally = new RunTally(this.maxSamples);
    const started = performance.now();

    for (let i = 0; i < count; i++) {
      const side = i % 2 === 0 ? TradeSide.BUY : TradeSide.SELL;
      tally.add(this.client.publishTrade(side, quantity));
    }

    const result = tally.toResult((performance.now() - started) / 1000);
    this.results.push(result);
    this.logger.info('Burst run finished', { count, queueFull: result.queueFullCount, errors: result.errorCount });
    return result;
  }

  /**
   * Hold `rate` sends per second for `durationSeconds`.
   *
   * Each send is scheduled on a deadline `i / rate` seconds after the start,
   * so a late timer shortens the next sleep instead of drifting the rate.
   */
  async runSustained(durationSeconds: number, rate: number, signal?: AbortSignal): Promise<BenchmarkResult> {
    if (!Number.isFinite(durationSeconds) || durationSeconds < 0) {
      throw new RangeError(`Duration must be a non-negative number of seconds, got ${durationSeconds}`);
    }
    if (!Number.isFinite(rate) || rate <= 0) {
      throw new RangeError(`Rate must be a positive number of sends per second, got ${rate}`);
    }

    const tally = new RunTally(this.maxSamples);
    const intervalMs = 1000 / rate;
    const started = performance.now();
    const end = started + durationSeconds * 1000;

    while (performance.now() < end && !signal?.aborted) {
      const side = tally.totalCount % 2 === 0 ? TradeSide.BUY : TradeSide.SELL;
      tally.add(this.client.publishTrade(side, 1));

      const nextDeadline = started + tally.totalCount * intervalMs;
      if (!(await sleep(Math.max(0, nextDeadline - performance.now()), signal))) {
        break;
      }
    }

    const result = tally.toResult((performance.now() - started) / 1000);
    this.results.push(result);
    this.logger.info('Sustained run finished', {
      rate,
      durationSeconds: result.durationSeconds,
      sent: result.totalCount,
      throughput: result.throughput
    });
    return result;
  }

  /**
   * Publish a result as benchmark metric updates labelled with the test.
   * Returns the outcome of each update; nothing is published without a
   * metrics client.
   */
  publishResult(testType: BenchmarkTestType, testName: string, result: BenchmarkResult): PublishResult[] {
    if (!this.metricsClient) {
      this.logger.debug('No metrics client, result not published', { testName });
      return [];
    }

    const client = this.metricsClient;
    const outcomes = benchmarkEventsFromResult(result, { test_type: testType, test_name: testName }).map((event) =>
      client.publish(event)
    );

    const failed = outcomes.filter((outcome) => !outcome.ok).length;
    if (failed > 0) {
      this.logger.warn('Some benchmark metrics were not published', { testName, failed, total: outcomes.length });
    } else {
      this.logger.info('Published benchmark result', { testType, testName });
    }
    return outcomes;
  }

  publishStatus(testName: string, status: BenchmarkStatus, message = ''): PublishResult | null {
    if (!this.metricsClient) {
      return null;
    }
    const outcome = this.metricsClient.publishStatus(testName, status, message);
    if (!outcome.ok) {
      this.logger.debug('Status not published', { testName, status, queueFull: outcome.queueFull });
    }
    return outcome;
  }

  getResults(): BenchmarkResult[] {
    return [...this.results];
  }

  get tradeClient(): PublishClient {
    return this.client;
  }
}
