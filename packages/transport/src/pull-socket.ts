import * as net from 'net';
import { EventEmitter } from 'events';
import { Logger, describeError } from '@tradewire/utils';
import { formatEndpoint, parseEndpoint } from './endpoint';
import { BindError } from './errors';
import { FrameDecoder } from './framing';

export interface PullSocketOptions {
  /** Inbox size at which reading from producers pauses */
  receiveHighWaterMark?: number;
  maxFrameBytes?: number;
  logger?: Logger;
}

type PullSocketState = 'idle' | 'binding' | 'bound' | 'closed';

type Waiter = (frame: Buffer | null) => void;

/**
 * Receiver end of the pipeline. Binds once and fans frames from every
 * connected producer into one inbox.
 *
 * When the inbox reaches `receiveHighWaterMark` all connections are paused
 * until `receive` drains it, so backpressure reaches the producers' send
 * buffers. The bound is soft: frames already decoded from one read are
 * always delivered.
 *
 * Events: `connection` and `disconnection`, both with the remote address.
 */
export class PullSocket extends EventEmitter {
  private server: net.Server | null = null;
  private readonly connections = new Set<net.Socket>();
  private inbox: Buffer[] = [];
  private waiters: Waiter[] = [];
  private state: PullSocketState = 'idle';
  private reading = true;
  private boundEndpoint: string | null = null;
  private closing: Promise<void> | null = null;
  private readonly receiveHighWaterMark: number;
  private readonly maxFrameBytes: number;
  private readonly logger: Logger;

  constructor(options: PullSocketOptions = {}) {
    super();
    this.receiveHighWaterMark = options.receiveHighWaterMark ?? 1000;
    this.maxFrameBytes = options.maxFrameBytes ?? 65536;
    this.logger = options.logger ?? new Logger('PullSocket');
  }

  /**
   * Acquire the address. Port 0 picks an ephemeral port, reported by
   * `endpoint` afterwards.
   *
   * @throws EndpointError for a malformed endpoint
   * @throws BindError when the address is unavailable or the socket was
   * already bound or closed
   */
  async bind(endpoint: string): Promise<void> {
    if (this.state !== 'idle') {
      throw new BindError(endpoint, new Error(`socket is ${this.state}`));
    }
    const { host, port } = parseEndpoint(endpoint);
    this.state = 'binding';

    const server = net.createServer((socket) => this.accept(socket));
    try {
      await new Promise<void>((resolve, reject) => {
        const onError = (error: Error): void => {
          server.removeListener('listening', onListening);
          reject(error);
        };
        const onListening = (): void => {
          server.removeListener('error', onError);
          resolve();
        };
        server.once('error', onError);
        server.once('listening', onListening);
        server.listen({ host, port, exclusive: true });
      });
    } catch (error) {
      if (this.getState() === 'binding') {
        this.state = 'idle';
      }
      throw new BindError(endpoint, error);
    }

    if (this.getState() !== 'binding') {
      // closed while binding
      server.close();
      throw new BindError(endpoint, new Error('socket closed during bind'));
    }

    server.on('error', (error) => {
      this.logger.error('Listener error', error, { endpoint: this.boundEndpoint });
    });

    const address = server.address();
    this.boundEndpoint =
      address !== null && typeof address === 'object' ? formatEndpoint(address.address, address.port) : endpoint;
    this.server = server;
    this.state = 'bound';
    this.logger.info('Bound', { endpoint: this.boundEndpoint });
  }

  /**
   * Actual bound endpoint, with the real port when bound to port 0
   */
  get endpoint(): string | null {
    return this.boundEndpoint;
  }

  get port(): number | null {
    const address = this.server?.address();
    return address !== null && typeof address === 'object' ? address.port : null;
  }

  get isBound(): boolean {
    return this.state === 'bound';
  }

  get queuedFrames(): number {
    return this.inbox.length;
  }

  get connectionCount(): number {
    return this.connections.size;
  }

  /**
   * Take the next frame. Resolves `null` on timeout, abort or close.
   */
  receive(timeoutMs: number, signal?: AbortSignal): Promise<Buffer | null> {
    const frame = this.inbox.shift();
    if (frame !== undefined) {
      this.resumeIfDrained();
      return Promise.resolve(frame);
    }
    if (this.state === 'closed' || signal?.aborted) {
      return Promise.resolve(null);
    }

    return new Promise<Buffer | null>((resolve) => {
      const finish: Waiter = (value) => {
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
        const index = this.waiters.indexOf(finish);
        if (index >= 0) {
          this.waiters.splice(index, 1);
        }
        resolve(value);
      };
      const onAbort = (): void => finish(null);
      const timer = setTimeout(() => finish(null), Math.max(0, timeoutMs));

      signal?.addEventListener('abort', onAbort, { once: true });
      this.waiters.push(finish);
    });
  }

  /**
   * Stop listening, drop every connection and release waiting receivers
   */
  close(): Promise<void> {
    if (!this.closing) {
      this.closing = this.shutdown();
    }
    return this.closing;
  }

  private getState(): PullSocketState {
    return this.state;
  }

  private async shutdown(): Promise<void> {
    this.state = 'closed';

    for (const waiter of [...this.waiters]) {
      waiter(null);
    }
    this.waiters = [];
    this.inbox = [];

    for (const socket of this.connections) {
      socket.destroy();
    }
    this.connections.clear();

    const server = this.server;
    this.server = null;
    if (server?.listening) {
      await new Promise<void>((resolve, reject) => {
        server.close((error) => (error ? reject(error) : resolve()));
      });
    }
    this.logger.info('Closed', { endpoint: this.boundEndpoint });
  }

  private accept(socket: net.Socket): void {
    if (this.state !== 'bound') {
      socket.destroy();
      return;
    }

    const remote = `${socket.remoteAddress}:${socket.remotePort}`;
    const decoder = new FrameDecoder(this.maxFrameBytes);
    this.connections.add(socket);
    socket.setNoDelay(true);
    if (!this.reading) {
      socket.pause();
    }
    this.logger.debug('Producer connected', { remote });
    this.emit('connection', remote);

    socket.on('data', (chunk: Buffer) => {
      let frames: Buffer[];
      try {
        frames = decoder.push(chunk);
      } catch (error) {
        this.logger.warn('Protocol violation, dropping connection', { remote, error: describeError(error) });
        socket.destroy();
        return;
      }
      for (const frame of frames) {
        this.deliver(frame);
      }
      this.pauseIfFull();
    });

    socket.on('error', (error) => {
      this.logger.debug('Producer connection error', { remote, error: describeError(error) });
    });

    socket.on('close', () => {
      this.connections.delete(socket);
      this.logger.debug('Producer disconnected', { remote });
      this.emit('disconnection', remote);
    });
  }

  private deliver(frame: Buffer): void {
    if (this.state !== 'bound') {
      return;
    }
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(frame);
    } else {
      this.inbox.push(frame);
    }
  }

  private pauseIfFull(): void {
    if (this.reading && this.inbox.length >= this.receiveHighWaterMark) {
      this.reading = false;
      for (const socket of this.connections) {
        socket.pause();
      }
    }
  }

  private resumeIfDrained(): void {
    if (!this.reading && this.inbox.length < this.receiveHighWaterMark) {
      this.reading = true;
      for (const socket of this.connections) {
        socket.resume();
      }
    }
  }
}
