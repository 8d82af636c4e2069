import { describeError } from '@tradewire/utils';

export class TransportError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TransportError';
  }
}

/**
 * The receiver could not acquire its address. Fatal for the ingestion
 * service; never retried.
 */
export class BindError extends TransportError {
  readonly endpoint: string;

  constructor(endpoint: string, cause: unknown) {
    super(`Failed to bind ${endpoint}: ${describeError(cause)}`, { cause });
    this.name = 'BindError';
    this.endpoint = endpoint;
  }
}
