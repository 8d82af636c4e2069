import * as net from 'net';
import { EventEmitter } from 'events';
import { Logger, describeError, sleep } from '@tradewire/utils';
import { parseConnectEndpoint } from './endpoint';
import { TransportError } from './errors';
import { encodeFrame } from './framing';

export type SendStatus = 'ok' | 'queue_full' | 'error';

export interface SendOutcome {
  status: SendStatus;
  error?: TransportError;
}

export interface PushSocketOptions {
  /** Frames queued per peer once its socket buffer is full */
  sendHighWaterMark?: number;
  reconnectIntervalMs?: number;
  maxFrameBytes?: number;
  // Disable Nagle's algorithm
  noDelay?: boolean;
  logger?: Logger;
}

interface Peer {
  endpoint: string;
  host: string;
  port: number;
  socket: net.Socket | null;
  connected: boolean;
  /** Set while the socket buffer is above its high-water mark */
  awaitingDrain: boolean;
  pending: Buffer[];
  reconnectTimer: NodeJS.Timeout | null;
}

const FLUSH_POLL_MS = 5;

/**
 * Producer end of the pipeline. Connects to one or more receivers and
 * distributes frames round-robin over the connected ones.
 *
 * Sends never block: a frame is either accepted into a bounded local buffer,
 * rejected as `queue_full`, or rejected as `error`. Nothing is retried.
 *
 * Events: `connected` and `disconnected`, both with the peer endpoint.
 */
export class PushSocket extends EventEmitter {
  private readonly peers: Peer[] = [];
  private readonly sendHighWaterMark: number;
  private readonly reconnectIntervalMs: number;
  private readonly maxFrameBytes: number;
  private readonly noDelay: boolean;
  private readonly logger: Logger;
  private nextPeer = 0;
  private closed = false;

  constructor(options: PushSocketOptions = {}) {
    super();
    this.sendHighWaterMark = options.sendHighWaterMark ?? 100;
    this.reconnectIntervalMs = options.reconnectIntervalMs ?? 100;
    this.maxFrameBytes = options.maxFrameBytes ?? 65536;
    this.noDelay = options.noDelay ?? true;
    this.logger = options.logger ?? new Logger('PushSocket');
  }

  /**
   * Start dialing a receiver. Returns immediately; the connection is
   * established (and re-established) in the background.
   *
   * @throws EndpointError for a malformed or wildcard endpoint
   */
  connect(endpoint: string): void {
    if (this.closed) {
      throw new TransportError('Socket is closed');
    }
    const { host, port } = parseConnectEndpoint(endpoint);
    const peer: Peer = {
      endpoint,
      host,
      port,
      socket: null,
      connected: false,
      awaitingDrain: false,
      pending: [],
      reconnectTimer: null
    };
    this.peers.push(peer);
    this.dial(peer);
  }

  /**
   * Resolve `true` once any peer is connected, `false` after `timeoutMs` or
   * when the signal aborts
   */
  waitForConnection(timeoutMs: number, signal?: AbortSignal): Promise<boolean> {
    if (this.connectedPeers > 0) {
      return Promise.resolve(true);
    }
    if (signal?.aborted) {
      return Promise.resolve(false);
    }
    return new Promise((resolve) => {
      const finish = (connected: boolean): void => {
        clearTimeout(timer);
        this.removeListener('connected', onConnected);
        signal?.removeEventListener('abort', onAbort);
        resolve(connected);
      };
      const onConnected = (): void => finish(true);
      const onAbort = (): void => finish(false);
      const timer = setTimeout(() => finish(false), timeoutMs);
      this.once('connected', onConnected);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  get connectedPeers(): number {
    return this.peers.filter((peer) => peer.connected).length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Hand one payload to the next available peer without waiting
   */
  trySend(payload: Buffer): SendOutcome {
    if (this.closed) {
      return { status: 'error', error: new TransportError('Socket is closed') };
    }
    if (payload.length > this.maxFrameBytes) {
      return {
        status: 'error',
        error: new TransportError(`Frame of ${payload.length} bytes exceeds limit of ${this.maxFrameBytes} bytes`)
      };
    }

    const peer = this.selectPeer();
    if (!peer || !peer.socket) {
      return { status: 'queue_full' };
    }

    const frame = encodeFrame(payload);
    if (peer.awaitingDrain) {
      peer.pending.push(frame);
      return { status: 'ok' };
    }

    try {
      if (!peer.socket.write(frame)) {
        peer.awaitingDrain = true;
      }
      return { status: 'ok' };
    } catch (error) {
      return { status: 'error', error: new TransportError(`Write failed: ${describeError(error)}`, { cause: error }) };
    }
  }

  /**
   * Wait until every connected peer has handed its buffered frames to the
   * kernel. Resolves `false` if that takes longer than `timeoutMs`.
   */
  async flush(timeoutMs = 1000): Promise<boolean> {
    const deadline = Date.now() + timeoutMs;
    while (this.hasBufferedFrames()) {
      if (this.closed || Date.now() >= deadline) {
        return false;
      }
      await sleep(FLUSH_POLL_MS);
    }
    return true;
  }

  /**
   * Destroy every peer connection and discard pending frames
   */
  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;

    for (const peer of this.peers) {
      if (peer.reconnectTimer) {
        clearTimeout(peer.reconnectTimer);
        peer.reconnectTimer = null;
      }
      peer.pending = [];
      peer.connected = false;
      peer.socket?.destroy();
      peer.socket = null;
    }
    this.logger.debug('Push socket closed', { peers: this.peers.length });
  }

  private selectPeer(): Peer | undefined {
    const count = this.peers.length;
    for (let offset = 0; offset < count; offset++) {
      const index = (this.nextPeer + offset) % count;
      const peer = this.peers[index];
      if (peer.connected && (!peer.awaitingDrain || peer.pending.length < this.sendHighWaterMark)) {
        this.nextPeer = (index + 1) % count;
        return peer;
      }
    }
    return undefined;
  }

  private hasBufferedFrames(): boolean {
    return this.peers.some(
      (peer) => peer.connected && (peer.pending.length > 0 || (peer.socket?.writableLength ?? 0) > 0)
    );
  }

  private dial(peer: Peer): void {
    const socket = net.createConnection({ host: peer.host, port: peer.port });
    socket.setNoDelay(this.noDelay);
    peer.socket = socket;

    socket.once('connect', () => {
      peer.connected = true;
      this.logger.debug('Connected', { endpoint: peer.endpoint });
      this.emit('connected', peer.endpoint);
    });

    socket.on('drain', () => {
      peer.awaitingDrain = false;
      this.flushPending(peer, socket);
    });

    socket.on('error', (error) => {
      this.logger.debug('Connection error', { endpoint: peer.endpoint, error: describeError(error) });
    });

    socket.on('close', () => {
      const wasConnected = peer.connected;
      peer.connected = false;
      peer.awaitingDrain = false;
      peer.pending = [];
      if (peer.socket === socket) {
        peer.socket = null;
      }
      if (wasConnected) {
        this.logger.debug('Disconnected', { endpoint: peer.endpoint });
        this.emit('disconnected', peer.endpoint);
      }
      this.scheduleReconnect(peer);
    });
  }

  private flushPending(peer: Peer, socket: net.Socket): void {
    while (peer.pending.length > 0 && !peer.awaitingDrain) {
      const frame = peer.pending.shift();
      if (frame && !socket.write(frame)) {
        peer.awaitingDrain = true;
      }
    }
  }

  private scheduleReconnect(peer: Peer): void {
    if (this.closed || peer.reconnectTimer) {
      return;
    }
    peer.reconnectTimer = setTimeout(() => {
      peer.reconnectTimer = null;
      if (!this.closed) {
        this.dial(peer);
      }
    }, this.reconnectIntervalMs);
    // Reconnect attempts alone never keep the process alive
    peer.reconnectTimer.unref();
  }
}
