/**
 * @tradewire/benchmark - Publish-latency benchmarks
 */

export * from './latency-stats';
export * from './LatencyRecorder';
export * from './PublishingBenchmark';
export * from './LatencyMonitor';
export * from './BenchmarkSelfMonitor';
export * from './LatencyAnalyzer';
export type { BenchCommand } from './cli';
export { UsageError, parseCommand, formatResult } from './cli';
