/**
 * Endpoint addresses of the form `tcp://<host>:<port>`
 */

export interface Endpoint {
  host: string;
  port: number;
  /** `*` host: all interfaces, only meaningful on bind */
  wildcard: boolean;
}

export class EndpointError extends Error {
  readonly endpoint: string;

  constructor(endpoint: string, reason: string) {
    super(`Invalid endpoint "${endpoint}": ${reason}`);
    this.name = 'EndpointError';
    this.endpoint = endpoint;
  }
}

const ENDPOINT_PATTERN = /^tcp:\/\/(\*|\[[0-9a-fA-F:.]+\]|[^:/\s[\]]+):(\d{1,5})$/;

export function parseEndpoint(endpoint: string): Endpoint {
  const match = ENDPOINT_PATTERN.exec(endpoint);
  if (!match) {
    throw new EndpointError(endpoint, 'expected tcp://<host>:<port>');
  }

  const [, rawHost, rawPort] = match;
  const port = Number(rawPort);
  if (port > 65535) {
    throw new EndpointError(endpoint, `port ${port} out of range`);
  }

  const wildcard = rawHost === '*';
  const host = wildcard ? '0.0.0.0' : rawHost.replace(/^\[(.*)\]$/, '$1');
  return { host, port, wildcard };
}

/**
 * Endpoint usable by `PushSocket.connect`: a concrete host and port
 */
export function parseConnectEndpoint(endpoint: string): Endpoint {
  const parsed = parseEndpoint(endpoint);
  if (parsed.wildcard) {
    throw new EndpointError(endpoint, 'cannot connect to a wildcard host');
  }
  if (parsed.port === 0) {
    throw new EndpointError(endpoint, 'cannot connect to port 0');
  }
  return parsed;
}

export function formatEndpoint(host: string, port: number): string {
  return host.includes(':') ? `tcp://[${host}]:${port}` : `tcp://${host}:${port}`;
}
