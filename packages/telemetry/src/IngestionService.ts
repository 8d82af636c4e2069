import { EventEmitter } from 'events';
import { HealthStatus, MetricSnapshot, TelemetryEvent } from '@tradewire/types';
import { Logger, waitForAbort } from '@tradewire/utils';
import { PullSocket, TransportError, decode } from '@tradewire/transport';
import { MetricStore } from './MetricStore';
import { TradeAnalysis, TradeAnalyzer } from './TradeAnalyzer';

export enum IngestionState {
  STOPPED = 'stopped',
  STARTING = 'starting',
  RUNNING = 'running',
  STOPPING = 'stopping'
}

export interface IngestionServiceOptions {
  /** Endpoint the pull socket binds, e.g. tcp://0.0.0.0:5555 */
  bindAddress: string;
  receiveTimeoutMs?: number;
  receiveHighWaterMark?: number;
  maxFrameBytes?: number;
  store?: MetricStore;
  analyzer?: TradeAnalyzer;
  logger?: Logger;
}

export interface IngestionStats {
  framesReceived: number;
  eventsApplied: number;
  decodeErrors: number;
}

type LoopOutcome = { ok: true } | { ok: false; error: unknown };

/**
 * Receives telemetry events from producers and applies them to the
 * metric store.
 *
 * stopped -> starting -> running -> stopping -> stopped. A bind failure in
 * `start` returns straight to stopped.
 *
 * Events: `stateChange` with the new state.
 */
export class IngestionService extends EventEmitter {
  readonly store: MetricStore;
  readonly analyzer: TradeAnalyzer;
  private readonly bindAddress: string;
  private readonly receiveTimeoutMs: number;
  private readonly receiveHighWaterMark: number;
  private readonly maxFrameBytes: number;
  private readonly logger: Logger;
  private state = IngestionState.STOPPED;
  private socket: PullSocket | null = null;
  private loopController: AbortController | null = null;
  private loop: Promise<LoopOutcome> | null = null;
  private loopFailed = false;
  private starting: Promise<void> | null = null;
  private stopping: Promise<void> | null = null;
  private readonly counters: IngestionStats = { framesReceived: 0, eventsApplied: 0, decodeErrors: 0 };

  constructor(options: IngestionServiceOptions) {
    super();
    this.bindAddress = options.bindAddress;
    this.receiveTimeoutMs = options.receiveTimeoutMs ?? 1000;
    this.receiveHighWaterMark = options.receiveHighWaterMark ?? 1000;
    this.maxFrameBytes = options.maxFrameBytes ?? 65536;
    this.store = options.store ?? new MetricStore();
    this.analyzer = options.analyzer ?? new TradeAnalyzer();
    this.logger = options.logger ?? new Logger('IngestionService');
  }

  getState(): IngestionState {
    return this.state;
  }

  get isRunning(): boolean {
    return this.state === IngestionState.RUNNING && !this.loopFailed;
  }

  /**
   * Actual bound endpoint while running (reports the real port for port 0)
   */
  get endpoint(): string | null {
    return this.socket?.endpoint ?? null;
  }

  /**
   * Bind and start the receive loop. No-op while running.
   *
   * @throws BindError when the address cannot be acquired; not retried
   */
  start(): Promise<void> {
    if (this.state === IngestionState.RUNNING) {
      return Promise.resolve();
    }
    if (!this.starting) {
      this.starting = this.bindAndRun().finally(() => {
        this.starting = null;
      });
    }
    return this.starting;
  }

  /**
   * Stop the receive loop and release the socket. Idempotent.
   */
  stop(): Promise<void> {
    if (!this.stopping) {
      this.stopping = this.shutdown().finally(() => {
        this.stopping = null;
      });
    }
    return this.stopping;
  }

  /**
   * Run for the lifetime of `signal`: start, wait for the signal or a loop
   * fault, and stop on every exit path. A loop fault rejects.
   */
  async serve(signal: AbortSignal): Promise<void> {
    await this.start();
    try {
      const loop = this.loop;
      if (!loop || signal.aborted) {
        return;
      }
      const outcome = await Promise.race([waitForAbort(signal).then(() => null), loop]);
      if (outcome && !outcome.ok) {
        throw outcome.error;
      }
    } finally {
      await this.stop();
    }
  }

  snapshot(): MetricSnapshot {
    return this.store.snapshot();
  }

  exposition(): Promise<string> {
    return this.store.exposition();
  }

  analysis(): TradeAnalysis {
    return this.analyzer.analyze();
  }

  health(): HealthStatus {
    return { running: this.isRunning, bind_address: this.bindAddress };
  }

  stats(): IngestionStats {
    return { ...this.counters };
  }

  private async bindAndRun(): Promise<void> {
    if (this.stopping) {
      await this.stopping;
    }

    this.setState(IngestionState.STARTING);
    const socket = new PullSocket({
      receiveHighWaterMark: this.receiveHighWaterMark,
      maxFrameBytes: this.maxFrameBytes,
      logger: this.logger.child('socket')
    });

    try {
      await socket.bind(this.bindAddress);
    } catch (error) {
      this.logger.error('Failed to bind receiver', error, { bindAddress: this.bindAddress });
      await socket.close();
      this.setState(IngestionState.STOPPED);
      throw error;
    }

    const controller = new AbortController();
    this.socket = socket;
    this.loopController = controller;
    this.loopFailed = false;
    this.loop = this.receiveLoop(socket, controller.signal).then(
      (): LoopOutcome => ({ ok: true }),
      (error: unknown): LoopOutcome => {
        this.loopFailed = true;
        this.logger.error('Receive loop failed', error);
        return { ok: false, error };
      }
    );
    this.setState(IngestionState.RUNNING);
    this.logger.info('Ingestion service started', { endpoint: socket.endpoint });
  }

  private async shutdown(): Promise<void> {
    if (this.starting) {
      // A failed start is reported to its own caller
      await this.starting.then(
        () => undefined,
        () => undefined
      );
    }
    if (this.state !== IngestionState.RUNNING) {
      return;
    }

    this.setState(IngestionState.STOPPING);
    this.loopController?.abort();
    await this.loop;
    await this.socket?.close();

    this.socket = null;
    this.loop = null;
    this.loopController = null;
    this.setState(IngestionState.STOPPED);
    this.logger.info('Ingestion service stopped', { stats: this.stats() });
  }

  private async receiveLoop(socket: PullSocket, signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      const frame = await socket.receive(this.receiveTimeoutMs, signal);
      if (frame === null) {
        if (!socket.isBound && !signal.aborted) {
          throw new TransportError('Receiver closed while the loop was running');
        }
        continue;
      }
      this.counters.framesReceived++;
      this.handleFrame(frame);
    }
  }

  private handleFrame(frame: Buffer): void {
    const result = decode(frame);
    if (!result.success) {
      this.counters.decodeErrors++;
      this.logger.warn('Dropping undecodable message', {
        field: result.error.field,
        reason: result.error.message
      });
      return;
    }

    this.dispatch(result.event);
    this.counters.eventsApplied++;
  }

  private dispatch(event: TelemetryEvent): void {
    switch (event.kind) {
      case 'trade':
        this.store.recordTrade(event.side, event.quantity, event.timestamp);
        this.analyzer.add(event);
        this.logger.debug('Recorded trade', { side: event.side, quantity: event.quantity });
        break;
      case 'benchmark':
        this.store.recordBenchmark(event);
        break;
      case 'benchmark_status':
        this.store.recordBenchmarkStatus(event);
        this.logger.info('Benchmark status', {
          status: event.status,
          testName: event.testName,
          message: event.message
        });
        break;
      default: {
        const unhandled: never = event;
        throw new Error(`Unhandled event: ${JSON.stringify(unhandled)}`);
      }
    }
  }

  private setState(state: IngestionState): void {
    this.state = state;
    this.emit('stateChange', state);
  }
}
