import { LatencyStats } from '@tradewire/types';
import { computeLatencyStats } from './latency-stats';

/**
 * Bounded ring of per-call latency samples (microseconds). The oldest
 * sample is dropped once `maxSamples` is reached.
 */
export class LatencyRecorder {
  private samples: number[] = [];

  constructor(private readonly maxSamples: number = 10000) {
    if (!Number.isInteger(maxSamples) || maxSamples < 1) {
      throw new RangeError(`maxSamples must be a positive integer, got ${maxSamples}`);
    }
  }

  record(elapsedUs: number): void {
    this.samples.push(elapsedUs);
    if (this.samples.length > this.maxSamples) {
      this.samples.shift();
    }
  }

  stats(): LatencyStats {
    return computeLatencyStats(this.samples);
  }

  getSamples(): number[] {
    return [...this.samples];
  }

  get count(): number {
    return this.samples.length;
  }

  clear(): void {
    this.samples = [];
  }
}
