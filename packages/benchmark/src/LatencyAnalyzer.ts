import { promises as fs } from 'fs';
import { z } from 'zod';
import { BenchmarkResult } from '@tradewire/types';
import { Logger, sleep } from '@tradewire/utils';
import { PublishingBenchmark } from './PublishingBenchmark';

export interface LatencyProfile {
  /** Unix epoch seconds */
  timestamp: number;
  testType: 'load_profile';
  config: { rate: number; durationSeconds: number };
  result: BenchmarkResult;
  environment: Record<string, string>;
}

export interface DegradationAnalysis {
  rates: number[];
  p50LatenciesUs: number[];
  p95LatenciesUs: number[];
  p99LatenciesUs: number[];
  queueFullRatesPct: number[];
  /** First rate whose p95 exceeds twice the first profile's p95 */
  p95DegradationRate?: number;
  /** First rate with more than 1% of sends rejected as queue_full */
  queueSaturationRate?: number;
}

export interface LatencyAnalyzerOptions {
  /** Endpoint recorded in each profile's environment */
  endpoint?: string;
  /** Pause between profiling steps */
  pauseMs?: number;
  logger?: Logger;
}

const P95_DEGRADATION_FACTOR = 2;
const QUEUE_SATURATION_PCT = 1;

const LatencyStatsSchema = z.object({
  count: z.number(),
  min: z.number(),
  mean: z.number(),
  p50: z.number(),
  p95: z.number(),
  p99: z.number(),
  max: z.number()
});

const LatencyProfileSchema = z.object({
  timestamp: z.number(),
  testType: z.literal('load_profile'),
  config: z.object({ rate: z.number().positive(), durationSeconds: z.number().nonnegative() }),
  result: z.object({
    totalCount: z.number().int().nonnegative(),
    okCount: z.number().int().nonnegative(),
    queueFullCount: z.number().int().nonnegative(),
    errorCount: z.number().int().nonnegative(),
    durationSeconds: z.number().nonnegative(),
    throughput: z.number().nonnegative(),
    latencyStats: LatencyStatsSchema
  }),
  environment: z.record(z.string(), z.string())
});

const ProfileFileSchema = z.array(LatencyProfileSchema);

/**
 * Latency behaviour under increasing load
 */
export class LatencyAnalyzer {
  private profiles: LatencyProfile[] = [];
  private readonly endpoint: string | undefined;
  private readonly pauseMs: number;
  private readonly logger: Logger;

  constructor(private readonly benchmark: PublishingBenchmark, options: LatencyAnalyzerOptions = {}) {
    this.endpoint = options.endpoint;
    this.pauseMs = options.pauseMs ?? 500;
    this.logger = options.logger ?? new Logger('LatencyAnalyzer');
  }

  /**
   * Run a sustained test at every rate from `step` to `maxRate`
   */
  async profile(maxRate = 1000, step = 100, durationSeconds = 5, signal?: AbortSignal): Promise<LatencyProfile[]> {
    if (!(step > 0) || !(maxRate >= step)) {
      throw new RangeError(`Profile needs 0 < step <= maxRate, got step=${step} maxRate=${maxRate}`);
    }

    const profiles: LatencyProfile[] = [];
    for (let rate = step; rate <= maxRate; rate += step) {
      if (signal?.aborted) {
        break;
      }
      this.logger.info(`Profiling ${rate} trades/sec`);
      const result = await this.benchmark.runSustained(durationSeconds, rate, signal);

      const profile: LatencyProfile = {
        timestamp: Date.now() / 1000,
        testType: 'load_profile',
        config: { rate, durationSeconds },
        result,
        environment: this.endpoint ? { endpoint: this.endpoint } : {}
      };
      profiles.push(profile);
      this.profiles.push(profile);

      if (rate + step <= maxRate && !(await sleep(this.pauseMs, signal))) {
        break;
      }
    }
    return profiles;
  }

  analyzeDegradation(profiles: readonly LatencyProfile[]): DegradationAnalysis {
    const analysis: DegradationAnalysis = {
      rates: [],
      p50LatenciesUs: [],
      p95LatenciesUs: [],
      p99LatenciesUs: [],
      queueFullRatesPct: []
    };

    for (const { config, result } of profiles) {
      if (result.latencyStats.count === 0) {
        continue;
      }
      analysis.rates.push(config.rate);
      analysis.p50LatenciesUs.push(result.latencyStats.p50);
      analysis.p95LatenciesUs.push(result.latencyStats.p95);
      analysis.p99LatenciesUs.push(result.latencyStats.p99);
      analysis.queueFullRatesPct.push(result.totalCount > 0 ? (result.queueFullCount / result.totalCount) * 100 : 0);
    }

    if (analysis.p95LatenciesUs.length >= 2) {
      const baseline = analysis.p95LatenciesUs[0];
      const index = analysis.p95LatenciesUs.findIndex((p95) => p95 > baseline * P95_DEGRADATION_FACTOR);
      if (index >= 0) {
        analysis.p95DegradationRate = analysis.rates[index];
      }
    }

    const saturated = analysis.queueFullRatesPct.findIndex((pct) => pct > QUEUE_SATURATION_PCT);
    if (saturated >= 0) {
      analysis.queueSaturationRate = analysis.rates[saturated];
    }

    return analysis;
  }

  getProfiles(): LatencyProfile[] {
    return [...this.profiles];
  }

  async saveProfiles(filePath: string): Promise<void> {
    await fs.writeFile(filePath, JSON.stringify(this.profiles, null, 2), 'utf8');
    this.logger.info(`Saved ${this.profiles.length} profiles`, { filePath });
  }

  /**
   * Replace the held profiles with those stored in `filePath`
   */
  async loadProfiles(filePath: string): Promise<LatencyProfile[]> {
    const text = await fs.readFile(filePath, 'utf8');
    const parsed = ProfileFileSchema.safeParse(JSON.parse(text));
    if (!parsed.success) {
      throw new Error(`Invalid profile file ${filePath}: ${parsed.error.message}`, { cause: parsed.error });
    }
    this.profiles = parsed.data;
    this.logger.info(`Loaded ${this.profiles.length} profiles`, { filePath });
    return this.getProfiles();
  }
}

export function formatDegradationAnalysis(analysis: DegradationAnalysis): string {
  const lines = ['=== Latency degradation analysis ==='];
  if (analysis.p95DegradationRate !== undefined) {
    lines.push(`P95 latency degrades significantly at: ${analysis.p95DegradationRate} trades/sec`);
  }
  if (analysis.queueSaturationRate !== undefined) {
    lines.push(`Queue saturation begins at: ${analysis.queueSaturationRate} trades/sec`);
  }
  analysis.rates.forEach((rate, i) => {
    lines.push(
      `  ${String(rate).padStart(4)} trades/sec: P95=${analysis.p95LatenciesUs[i].toFixed(1).padStart(6)}μs, ` +
        `queue full=${analysis.queueFullRatesPct[i].toFixed(1).padStart(4)}%`
    );
  });
  return lines.join('\n');
}
