import {
  BenchmarkLabels,
  BenchmarkMetricName,
  BenchmarkStatus,
  TelemetryEvent,
  TradeSide
} from '@tradewire/types';
import { monotonicNs, nsToMicros } from '@tradewire/utils';
import { EncodingError, encode } from './codec';
import { PushSocket, PushSocketOptions } from './push-socket';

export interface PublishResult {
  ok: boolean;
  queueFull: boolean;
  error?: Error;
  /** Wall time of the send call in microseconds */
  elapsedUs: number;
}

/**
 * Fire-and-forget event publisher over a `PushSocket`.
 *
 * `publish` never throws for a rejected or unencodable event; the outcome
 * is always reported in the returned `PublishResult`.
 */
export class PublishClient {
  constructor(private readonly socket: PushSocket) {}

  /**
   * Create a client with its own socket connected to `endpoint`
   */
  static connect(endpoint: string, options: PushSocketOptions = {}): PublishClient {
    const socket = new PushSocket(options);
    socket.connect(endpoint);
    return new PublishClient(socket);
  }

  get pushSocket(): PushSocket {
    return this.socket;
  }

  publish(event: TelemetryEvent): PublishResult {
    let frame: Buffer;
    try {
      frame = encode(event);
    } catch (error) {
      if (error instanceof EncodingError) {
        return { ok: false, queueFull: false, error, elapsedUs: 0 };
      }
      throw error;
    }

    const started = monotonicNs();
    const outcome = this.socket.trySend(frame);
    const elapsedUs = nsToMicros(monotonicNs() - started);

    switch (outcome.status) {
      case 'ok':
        return { ok: true, queueFull: false, elapsedUs };
      case 'queue_full':
        return { ok: false, queueFull: true, elapsedUs };
      case 'error':
        return { ok: false, queueFull: false, error: outcome.error, elapsedUs };
    }
  }

  publishTrade(side: TradeSide, quantity: number, timestamp: number = Date.now() / 1000): PublishResult {
    return this.publish({ kind: 'trade', side, quantity, timestamp });
  }

  publishBenchmark(metricName: BenchmarkMetricName, value: number, labels: BenchmarkLabels = {}): PublishResult {
    return this.publish({ kind: 'benchmark', metricName, value, labels });
  }

  publishStatus(
    testName: string,
    status: BenchmarkStatus,
    message = '',
    timestamp: number = Date.now() / 1000
  ): PublishResult {
    return this.publish({ kind: 'benchmark_status', status, testName, timestamp, message });
  }

  waitForConnection(timeoutMs: number, signal?: AbortSignal): Promise<boolean> {
    return this.socket.waitForConnection(timeoutMs, signal);
  }

  flush(timeoutMs?: number): Promise<boolean> {
    return this.socket.flush(timeoutMs);
  }

  close(): void {
    this.socket.close();
  }
}
