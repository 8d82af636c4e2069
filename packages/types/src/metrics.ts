import { MetricType } from './events';

export interface MetricSample {
  readonly name: string;
  readonly labels: Readonly<Record<string, string>>;
  readonly type: MetricType;
  readonly value: number;
}

/**
 * Point-in-time copy of every metric, keyed by identity (`name{label="value"}`)
 */
export type MetricSnapshot = ReadonlyMap<string, MetricSample>;

/**
 * Build the identity key for a metric. Labels are sorted by name; an
 * unlabeled metric is keyed by its bare name.
 */
export function metricKey(name: string, labels: Readonly<Record<string, string>> = {}): string {
  const entries = Object.entries(labels).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  if (entries.length === 0) {
    return name;
  }
  return `${name}{${entries.map(([key, value]) => `${key}="${value}"`).join(',')}}`;
}

export interface HealthStatus {
  running: boolean;
  bind_address: string;
}
