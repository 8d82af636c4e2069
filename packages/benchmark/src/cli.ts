#!/usr/bin/env node
/**
 * Benchmark runner CLI
 *
 * Runs publish-latency benchmarks against the pipeline and publishes the
 * results to the metrics sidecar.
 *
 * Usage:
 *   tradewire-bench burst [count]
 *   tradewire-bench sustained [durationSeconds] [rate]
 *   tradewire-bench comprehensive
 *   tradewire-bench profile [maxRate] [step] [--output <file>]
 *   tradewire-bench monitor [intervalSeconds]
 *
 * Trades go to PRODUCER_CONNECT_ADDRESS, results and statuses to
 * BENCHMARK_METRICS_ADDRESS.
 */

import { BenchmarkResult, BenchmarkStatus } from '@tradewire/types';
import { TradewireConfig, loadConfig } from '@tradewire/config';
import { Logger, TaskSupervisor, describeError, sleep } from '@tradewire/utils';
import { PublishClient, PushSocketOptions } from '@tradewire/transport';
import { BenchmarkSelfMonitor } from './BenchmarkSelfMonitor';
import { LatencyAnalyzer, formatDegradationAnalysis } from './LatencyAnalyzer';
import { PublishingBenchmark, burstTestName, sustainedTestName } from './PublishingBenchmark';
import { formatLatencyStats } from './latency-stats';

export type BenchCommand =
  | { name: 'burst'; count: number }
  | { name: 'sustained'; durationSeconds: number; rate: number }
  | { name: 'comprehensive' }
  | { name: 'profile'; maxRate: number; step: number; output?: string }
  | { name: 'monitor'; intervalSeconds: number }
  | { name: 'help' };

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

const CONNECT_TIMEOUT_MS = 2000;
const FLUSH_TIMEOUT_MS = 2000;

function parsePositiveInt(value: string | undefined, name: string, fallback: number): number {
  if (value === undefined) {
    return fallback;
  }
  if (!/^\d+$/.test(value) || Number(value) <= 0) {
    throw new UsageError(`${name} must be a positive integer, got "${value}"`);
  }
  return Number(value);
}

export function parseCommand(argv: readonly string[]): BenchCommand {
  const positional: string[] = [];
  let output: string | undefined;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case '--help':
      case '-h':
        return { name: 'help' };
      case '--output':
      case '-o':
        output = argv[++i];
        if (output === undefined) {
          throw new UsageError(`${arg} needs a file path`);
        }
        break;
      default:
        if (arg.startsWith('-')) {
          throw new UsageError(`Unknown option: ${arg}`);
        }
        positional.push(arg);
    }
  }

  const command = positional.at(0);
  const args = positional.slice(1);
  const expectArgs = (max: number): void => {
    if (args.length > max) {
      throw new UsageError(`Too many arguments for ${command}`);
    }
  };

  switch (command) {
    case undefined:
      throw new UsageError('Missing command');
    case 'burst':
      expectArgs(1);
      return { name: 'burst', count: parsePositiveInt(args[0], 'count', 1000) };
    case 'sustained':
      expectArgs(2);
      return {
        name: 'sustained',
        durationSeconds: parsePositiveInt(args[0], 'duration', 30),
        rate: parsePositiveInt(args[1], 'rate', 100)
      };
    case 'comprehensive':
      expectArgs(0);
      return { name: 'comprehensive' };
    case 'profile': {
      expectArgs(2);
      const maxRate = parsePositiveInt(args[0], 'maxRate', 1000);
      const step = parsePositiveInt(args[1], 'step', 100);
      if (step > maxRate) {
        throw new UsageError(`step (${step}) cannot exceed maxRate (${maxRate})`);
      }
      return output === undefined ? { name: 'profile', maxRate, step } : { name: 'profile', maxRate, step, output };
    }
    case 'monitor':
      expectArgs(1);
      return { name: 'monitor', intervalSeconds: parsePositiveInt(args[0], 'interval', 2) };
    default:
      throw new UsageError(`Unknown command: ${command}`);
  }
}

function printHelp(): void {
  console.log(`
Tradewire benchmark runner

Usage:
  tradewire-bench burst [count]                       (default 1000)
  tradewire-bench sustained [durationSeconds] [rate]  (default 30 100)
  tradewire-bench comprehensive
  tradewire-bench profile [maxRate] [step] [--output <file>]  (default 1000 100)
  tradewire-bench monitor [intervalSeconds]           (default 2)

Environment Variables:
  PRODUCER_CONNECT_ADDRESS   Endpoint benchmark trades are sent to
  BENCHMARK_METRICS_ADDRESS  Endpoint results and statuses are sent to
  LOG_LEVEL                  error | warn | info | debug
`);
}

export function formatResult(result: BenchmarkResult): string {
  return [
    '=== Publishing benchmark results ===',
    `Total trades: ${result.totalCount}`,
    `Duration: ${result.durationSeconds.toFixed(3)}s`,
    `Throughput: ${result.throughput.toFixed(1)} trades/sec`,
    `Sent: ${result.okCount}, queue full: ${result.queueFullCount}, errors: ${result.errorCount}`,
    `Latency: ${formatLatencyStats(result.latencyStats)}`
  ].join('\n');
}

function completionMessage(result: BenchmarkResult): string {
  return `Completed: ${result.throughput.toFixed(1)} tps, P95: ${result.latencyStats.p95.toFixed(1)}μs`;
}

/**
 * Publish `started`, run the body, then `completed` with its message, or
 * `failed` with the error before rethrowing it
 */
async function withStatus(
  benchmark: PublishingBenchmark,
  testName: string,
  startMessage: string,
  body: () => Promise<string>
): Promise<void> {
  benchmark.publishStatus(testName, BenchmarkStatus.STARTED, startMessage);
  try {
    const message = await body();
    benchmark.publishStatus(testName, BenchmarkStatus.COMPLETED, message);
  } catch (error) {
    benchmark.publishStatus(testName, BenchmarkStatus.FAILED, describeError(error));
    throw error;
  }
}

async function runBurst(benchmark: PublishingBenchmark, count: number): Promise<string> {
  const result = benchmark.runBurst(count);
  benchmark.publishResult('burst', burstTestName(count), result);
  console.log(formatResult(result));
  return completionMessage(result);
}

async function runSustained(benchmark: PublishingBenchmark, durationSeconds: number, rate: number): Promise<string> {
  const result = await benchmark.runSustained(durationSeconds, rate);
  benchmark.publishResult('sustained', sustainedTestName(rate), result);
  console.log(formatResult(result));
  return completionMessage(result);
}

async function runCommand(
  command: Exclude<BenchCommand, { name: 'help' } | { name: 'monitor' }>,
  benchmark: PublishingBenchmark,
  config: TradewireConfig,
  logger: Logger
): Promise<void> {
  switch (command.name) {
    case 'burst':
      return withStatus(benchmark, burstTestName(command.count), `Starting burst test with ${command.count} trades`, () =>
        runBurst(benchmark, command.count)
      );

    case 'sustained':
      return withStatus(
        benchmark,
        sustainedTestName(command.rate),
        `Starting sustained test: ${command.durationSeconds}s at ${command.rate} tps`,
        () => runSustained(benchmark, command.durationSeconds, command.rate)
      );

    case 'comprehensive': {
      const suite: Array<[string, () => Promise<string>]> = [
        ['Small burst', () => runBurst(benchmark, 100)],
        ['Medium burst', () => runBurst(benchmark, 1000)],
        ['Large burst', () => runBurst(benchmark, 5000)],
        ['Sustained low', () => runSustained(benchmark, 10, 50)],
        ['Sustained medium', () => runSustained(benchmark, 10, 200)],
        ['Sustained high', () => runSustained(benchmark, 10, 500)]
      ];
      return withStatus(benchmark, 'comprehensive', 'Starting comprehensive benchmark suite', async () => {
        for (const [index, [label, run]] of suite.entries()) {
          console.log(`\n${index + 1}. ${label}...`);
          benchmark.publishStatus('comprehensive', BenchmarkStatus.RUNNING, `Running ${label}`);
          await run();
          if (index < suite.length - 1) {
            await sleep(1000);
          }
        }
        return 'All tests completed successfully';
      });
    }

    case 'profile': {
      const analyzer = new LatencyAnalyzer(benchmark, {
        endpoint: config.producer.connectAddress,
        logger: logger.child('analyzer')
      });
      return withStatus(
        benchmark,
        'profile',
        `Starting latency profile: max_rate=${command.maxRate}, step=${command.step}`,
        async () => {
          const profiles = await analyzer.profile(command.maxRate, command.step);
          for (const { config: step, result } of profiles) {
            benchmark.publishResult('sustained', sustainedTestName(step.rate), result);
          }
          console.log(formatDegradationAnalysis(analyzer.analyzeDegradation(profiles)));
          if (command.output) {
            await analyzer.saveProfiles(command.output);
          }
          return `Profile completed up to ${command.maxRate} trades/sec`;
        }
      );
    }
  }
}

async function runMonitor(intervalSeconds: number, config: TradewireConfig, logger: Logger): Promise<number> {
  const monitor = new BenchmarkSelfMonitor({
    endpoint: config.producer.metricsAddress,
    intervalMs: intervalSeconds * 1000,
    maxSamples: config.benchmark.maxSamples,
    socket: socketOptions(config),
    logger: logger.child('self-monitor')
  });
  const supervisor = new TaskSupervisor(logger.child('supervisor'));
  supervisor.installSignalHandlers();
  supervisor.addTask('self-monitor', (signal) => monitor.run(signal));

  console.log('Benchmark self-monitoring active. Press Ctrl+C to stop.');
  const report = await supervisor.run();
  return report.faults.length > 0 || report.timedOut ? 1 : 0;
}

function socketOptions(config: TradewireConfig): PushSocketOptions {
  return {
    sendHighWaterMark: config.producer.sendHighWaterMark,
    reconnectIntervalMs: config.transport.reconnectIntervalMs,
    maxFrameBytes: config.transport.maxFrameBytes
  };
}

export async function main(argv: readonly string[] = process.argv.slice(2)): Promise<number> {
  let command: BenchCommand;
  try {
    command = parseCommand(argv);
  } catch (error) {
    if (error instanceof UsageError) {
      console.error(`Error: ${error.message}`);
      printHelp();
      return 1;
    }
    throw error;
  }

  if (command.name === 'help') {
    printHelp();
    return 0;
  }

  const config = loadConfig();
  const logger = new Logger('bench', { level: config.logLevel });

  if (command.name === 'monitor') {
    return runMonitor(command.intervalSeconds, config, logger);
  }

  const client = PublishClient.connect(config.producer.connectAddress, socketOptions(config));
  const metricsClient = PublishClient.connect(config.producer.metricsAddress, socketOptions(config));
  const benchmark = new PublishingBenchmark({
    client,
    metricsClient,
    maxSamples: config.benchmark.maxSamples,
    logger: logger.child('benchmark')
  });

  console.log(`Trading messages to: ${config.producer.connectAddress}`);
  console.log(`Benchmark metrics to: ${config.producer.metricsAddress}`);

  try {
    if (!(await metricsClient.waitForConnection(CONNECT_TIMEOUT_MS))) {
      logger.warn('Metrics endpoint not reachable, results will be dropped', {
        endpoint: config.producer.metricsAddress
      });
    }
    if (!(await client.waitForConnection(CONNECT_TIMEOUT_MS))) {
      logger.warn('Trade endpoint not reachable, sends will report queue_full', {
        endpoint: config.producer.connectAddress
      });
    }

    await runCommand(command, benchmark, config, logger);
    console.log('\nBenchmark results published to the metrics sidecar');
    return 0;
  } catch (error) {
    logger.error('Benchmark failed', error);
    return 1;
  } finally {
    await Promise.all([client.flush(FLUSH_TIMEOUT_MS), metricsClient.flush(FLUSH_TIMEOUT_MS)]);
    client.close();
    metricsClient.close();
  }
}

if (require.main === module) {
  main().then(
    (code) => process.exit(code),
    (error: unknown) => {
      console.error(error);
      process.exit(1);
    }
  );
}
