import { EventEmitter } from 'events';
import { LatencyStats } from '@tradewire/types';

export interface LatencyThresholds {
  p95Us: number;
  p99Us: number;
  meanUs: number;
}

export const DEFAULT_LATENCY_THRESHOLDS: Readonly<LatencyThresholds> = Object.freeze({
  p95Us: 1000,
  p99Us: 5000,
  meanUs: 500
});

export interface LatencySnapshot extends LatencyStats {
  /** Unix epoch seconds */
  timestamp: number;
}

export interface LatencyTrend {
  p95TrendUs: number;
  meanTrendUs: number;
  samples: number;
}

export interface LatencyMonitorOptions {
  thresholds?: Partial<LatencyThresholds>;
  historySize?: number;
}

/**
 * Threshold alerting over latency snapshots.
 *
 * Events: `alert` with the alert message, once per exceeded threshold.
 */
export class LatencyMonitor extends EventEmitter {
  readonly thresholds: LatencyThresholds;
  private readonly historySize: number;
  private snapshots: LatencySnapshot[] = [];
  private alerts: string[] = [];

  constructor(options: LatencyMonitorOptions = {}) {
    super();
    this.thresholds = { ...DEFAULT_LATENCY_THRESHOLDS, ...options.thresholds };
    this.historySize = options.historySize ?? 1000;
  }

  /**
   * Record a snapshot and return an alert message per exceeded threshold.
   * Empty statistics are ignored.
   */
  check(stats: LatencyStats, timestamp: number = Date.now() / 1000): string[] {
    if (stats.count === 0) {
      return [];
    }

    this.remember({ ...stats, timestamp });

    const alerts = evaluateThresholds(stats, this.thresholds);
    for (const alert of alerts) {
      this.alerts.push(`${new Date(timestamp * 1000).toISOString()}: ${alert}`);
      if (this.alerts.length > this.historySize) {
        this.alerts.shift();
      }
      this.emit('alert', alert);
    }
    return alerts;
  }

  getSnapshots(): LatencySnapshot[] {
    return [...this.snapshots];
  }

  /**
   * Snapshots taken at or after `now - seconds`
   */
  getRecentSnapshots(seconds: number, now: number = Date.now() / 1000): LatencySnapshot[] {
    const cutoff = now - seconds;
    return this.snapshots.filter((snapshot) => snapshot.timestamp >= cutoff);
  }

  getAlerts(): string[] {
    return [...this.alerts];
  }

  /**
   * Change of p95 and mean between the first and last snapshot of the
   * window, or null with fewer than two snapshots
   */
  trend(seconds: number, now?: number): LatencyTrend | null {
    const recent = this.getRecentSnapshots(seconds, now);
    if (recent.length < 2) {
      return null;
    }
    const first = recent[0];
    const last = recent[recent.length - 1];
    return {
      p95TrendUs: last.p95 - first.p95,
      meanTrendUs: last.mean - first.mean,
      samples: recent.length
    };
  }

  private remember(snapshot: LatencySnapshot): void {
    this.snapshots.push(snapshot);
    if (this.snapshots.length > this.historySize) {
      this.snapshots.shift();
    }
  }
}

export function evaluateThresholds(stats: LatencyStats, thresholds: LatencyThresholds): string[] {
  const alerts: string[] = [];
  if (stats.p95 > thresholds.p95Us) {
    alerts.push(`P95 latency high: ${stats.p95.toFixed(1)}μs > ${thresholds.p95Us.toFixed(1)}μs`);
  }
  if (stats.p99 > thresholds.p99Us) {
    alerts.push(`P99 latency high: ${stats.p99.toFixed(1)}μs > ${thresholds.p99Us.toFixed(1)}μs`);
  }
  if (stats.mean > thresholds.meanUs) {
    alerts.push(`Mean latency high: ${stats.mean.toFixed(1)}μs > ${thresholds.meanUs.toFixed(1)}μs`);
  }
  return alerts;
}
