import { Counter, Gauge, Registry } from 'prom-client';
import {
  BENCHMARK_LABEL_NAMES,
  BENCHMARK_METRICS,
  BENCHMARK_METRIC_NAMES,
  BenchmarkEvent,
  BenchmarkLabelName,
  BenchmarkLabels,
  BenchmarkMetricName,
  BenchmarkResult,
  BenchmarkStatusEvent,
  MetricSample,
  MetricSnapshot,
  MetricType,
  TradeSide,
  benchmarkEventsFromResult,
  metricKey
} from '@tradewire/types';

type BenchmarkInstrument =
  | { type: 'counter'; metric: Counter<BenchmarkLabelName> }
  | { type: 'gauge'; metric: Gauge<BenchmarkLabelName> };

/**
 * Trade and benchmark metrics backed by a prom-client registry.
 *
 * Single writer: every `record*` call runs to completion synchronously, so
 * readers on the same event loop never see a partially applied update.
 * Alongside the registry a plain mirror of every series is kept, which is
 * what `snapshot()` copies.
 */
export class MetricStore {
  private readonly registry: Registry;
  private readonly tradesTotal: Counter<'side'>;
  private readonly volumeTotal: Counter<'side'>;
  private readonly lastTradeTimestamp: Gauge;
  private readonly benchmarkStatusTotal: Counter<'status' | 'test_name'>;
  private readonly benchmarkInstruments = new Map<BenchmarkMetricName, BenchmarkInstrument>();
  private readonly samples = new Map<string, MetricSample>();

  constructor(registry: Registry = new Registry()) {
    this.registry = registry;

    this.tradesTotal = new Counter({
      name: 'trades_total',
      help: 'Total number of trades',
      labelNames: ['side'],
      registers: [this.registry]
    });

    this.volumeTotal = new Counter({
      name: 'volume_total',
      help: 'Total trading volume',
      labelNames: ['side'],
      registers: [this.registry]
    });

    this.lastTradeTimestamp = new Gauge({
      name: 'last_trade_ts_seconds',
      help: 'Timestamp of the last trade',
      registers: [this.registry]
    });

    this.benchmarkStatusTotal = new Counter({
      name: 'benchmark_status_total',
      help: 'Benchmark lifecycle notices by status',
      labelNames: ['status', 'test_name'],
      registers: [this.registry]
    });

    for (const name of BENCHMARK_METRIC_NAMES) {
      this.benchmarkInstruments.set(name, this.createBenchmarkInstrument(name));
    }

    // Both sides are exported from the start
    for (const side of [TradeSide.BUY, TradeSide.SELL]) {
      this.tradesTotal.inc({ side }, 0);
      this.volumeTotal.inc({ side }, 0);
      this.write('trades_total', 'counter', { side }, 0);
      this.write('volume_total', 'counter', { side }, 0);
    }
    this.write('last_trade_ts_seconds', 'gauge', {}, 0);
  }

  /**
   * Count one trade and its volume, and remember its timestamp
   *
   * @throws RangeError for a negative or non-finite quantity, or a
   * non-finite timestamp; nothing is written in that case
   */
  recordTrade(side: TradeSide, quantity: number, timestamp: number): void {
    if (!Number.isFinite(quantity) || quantity < 0) {
      throw new RangeError(`Trade quantity must be a finite non-negative number, got ${quantity}`);
    }
    if (!Number.isFinite(timestamp)) {
      throw new RangeError(`Trade timestamp must be finite, got ${timestamp}`);
    }

    this.tradesTotal.inc({ side }, 1);
    this.volumeTotal.inc({ side }, quantity);
    this.lastTradeTimestamp.set(timestamp);

    this.add('trades_total', 'counter', { side }, 1);
    this.add('volume_total', 'counter', { side }, quantity);
    this.write('last_trade_ts_seconds', 'gauge', {}, timestamp);
  }

  /**
   * Apply one benchmark metric update: counters are incremented by the
   * value, gauges set to it
   */
  recordBenchmark(event: BenchmarkEvent): void {
    const instrument = this.benchmarkInstruments.get(event.metricName);
    if (!instrument) {
      throw new Error(`Unknown benchmark metric: ${event.metricName}`);
    }
    if (!Number.isFinite(event.value)) {
      throw new RangeError(`Benchmark value must be finite, got ${event.value}`);
    }

    const labels = presentLabels(event.labels);
    switch (instrument.type) {
      case 'counter':
        if (event.value < 0) {
          throw new RangeError(`Counter ${event.metricName} cannot be decremented`);
        }
        instrument.metric.inc(labels, event.value);
        this.add(event.metricName, 'counter', labels, event.value);
        break;
      case 'gauge':
        instrument.metric.set(labels, event.value);
        this.write(event.metricName, 'gauge', labels, event.value);
        break;
    }
  }

  recordBenchmarkResult(result: BenchmarkResult, labels: BenchmarkLabels): void {
    for (const event of benchmarkEventsFromResult(result, labels)) {
      this.recordBenchmark(event);
    }
  }

  recordBenchmarkStatus(event: BenchmarkStatusEvent): void {
    const labels = { status: event.status, test_name: event.testName };
    this.benchmarkStatusTotal.inc(labels, 1);
    this.add('benchmark_status_total', 'counter', labels, 1);
  }

  /**
   * Copy of every series currently held
   */
  snapshot(): MetricSnapshot {
    const copy = new Map<string, MetricSample>();
    for (const [key, sample] of this.samples) {
      copy.set(key, { ...sample, labels: { ...sample.labels } });
    }
    return copy;
  }

  /**
   * Prometheus text exposition of the registry
   */
  exposition(): Promise<string> {
    return this.registry.metrics();
  }

  get contentType(): string {
    return this.registry.contentType;
  }

  getRegistry(): Registry {
    return this.registry;
  }

  private createBenchmarkInstrument(name: BenchmarkMetricName): BenchmarkInstrument {
    const { type, help } = BENCHMARK_METRICS[name];
    const configuration = {
      name,
      help,
      labelNames: BENCHMARK_LABEL_NAMES,
      registers: [this.registry]
    };
    return type === 'counter'
      ? { type, metric: new Counter(configuration) }
      : { type, metric: new Gauge(configuration) };
  }

  private add(name: string, type: MetricType, labels: Record<string, string>, amount: number): void {
    const current = this.samples.get(metricKey(name, labels))?.value ?? 0;
    this.write(name, type, labels, current + amount);
  }

  private write(name: string, type: MetricType, labels: Record<string, string>, value: number): void {
    this.samples.set(metricKey(name, labels), { name, labels: { ...labels }, type, value });
  }
}

function presentLabels(labels: Readonly<BenchmarkLabels>): Record<string, string> {
  const present: Record<string, string> = {};
  for (const name of BENCHMARK_LABEL_NAMES) {
    const value = labels[name];
    if (value !== undefined) {
      present[name] = value;
    }
  }
  return present;
}
