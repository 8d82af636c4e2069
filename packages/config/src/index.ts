import * as dotenv from 'dotenv';
import Joi from 'joi';
import { parseConnectEndpoint, parseEndpoint } from '@tradewire/transport';

export type RunMode = 'dev' | 'prod';

export interface SidecarConfig {
  /** Pipeline endpoint the ingestion service binds, e.g. tcp://0.0.0.0:5555 */
  bindAddress: string;
  httpHost: string;
  httpPort: number;
  receiveTimeoutMs: number;
  receiveHighWaterMark: number;
  shutdownTimeoutMs: number;
  selfMonitor: {
    enabled: boolean;
    intervalMs: number;
  };
}

export interface ProducerConfig {
  /** Endpoint trade events are pushed to */
  connectAddress: string;
  /** Endpoint benchmark results and statuses are pushed to */
  metricsAddress: string;
  sendHighWaterMark: number;
}

export interface TransportConfig {
  reconnectIntervalMs: number;
  maxFrameBytes: number;
}

export interface BenchmarkConfig {
  maxSamples: number;
}

export interface TradewireConfig {
  mode: RunMode;
  logLevel: 'error' | 'warn' | 'info' | 'debug';
  sidecar: SidecarConfig;
  producer: ProducerConfig;
  transport: TransportConfig;
  benchmark: BenchmarkConfig;
}

export class ConfigValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigValidationError';
  }
}

// Endpoints are checked by the same parsers the sockets use
const bindEndpoint = Joi.string().custom((value: string) => {
  parseEndpoint(value);
  return value;
}, 'bind endpoint');

const connectEndpoint = Joi.string().custom((value: string) => {
  parseConnectEndpoint(value);
  return value;
}, 'connect endpoint');

/**
 * Raw environment schema. Defaults mirror a single-host setup where the
 * producer, the benchmark and the sidecar share one pipeline endpoint.
 */
const envSchema = Joi.object({
  MODE: Joi.string().valid('dev', 'prod').default('dev'),
  LOG_LEVEL: Joi.string().lowercase().valid('error', 'warn', 'info', 'debug').default('info'),

  SIDECAR_BIND_ADDRESS: bindEndpoint.default('tcp://0.0.0.0:5555'),
  SIDECAR_HTTP_HOST: Joi.string().hostname().default('0.0.0.0'),
  SIDECAR_HTTP_PORT: Joi.number().port().default(8001),
  SIDECAR_RECEIVE_TIMEOUT_MS: Joi.number().integer().min(10).max(60000).default(1000),
  SIDECAR_RECEIVE_HWM: Joi.number().integer().min(1).default(1000),
  SIDECAR_SHUTDOWN_TIMEOUT_MS: Joi.number().integer().min(100).default(10000),
  SELF_MONITOR_ENABLED: Joi.boolean().truthy('1').falsy('0').default(false),
  SELF_MONITOR_INTERVAL_MS: Joi.number().integer().min(100).default(5000),

  PRODUCER_CONNECT_ADDRESS: connectEndpoint.default('tcp://127.0.0.1:5555'),
  BENCHMARK_METRICS_ADDRESS: connectEndpoint.default('tcp://127.0.0.1:5555'),
  PRODUCER_SEND_HWM: Joi.number().integer().min(1).default(100),

  TRANSPORT_RECONNECT_INTERVAL_MS: Joi.number().integer().min(1).default(100),
  TRANSPORT_MAX_FRAME_BYTES: Joi.number().integer().min(64).max(16 * 1024 * 1024).default(65536),

  BENCHMARK_MAX_SAMPLES: Joi.number().integer().min(1).default(10000)
}).unknown(true);

interface RawEnv {
  MODE: RunMode;
  LOG_LEVEL: TradewireConfig['logLevel'];
  SIDECAR_BIND_ADDRESS: string;
  SIDECAR_HTTP_HOST: string;
  SIDECAR_HTTP_PORT: number;
  SIDECAR_RECEIVE_TIMEOUT_MS: number;
  SIDECAR_RECEIVE_HWM: number;
  SIDECAR_SHUTDOWN_TIMEOUT_MS: number;
  SELF_MONITOR_ENABLED: boolean;
  SELF_MONITOR_INTERVAL_MS: number;
  PRODUCER_CONNECT_ADDRESS: string;
  BENCHMARK_METRICS_ADDRESS: string;
  PRODUCER_SEND_HWM: number;
  TRANSPORT_RECONNECT_INTERVAL_MS: number;
  TRANSPORT_MAX_FRAME_BYTES: number;
  BENCHMARK_MAX_SAMPLES: number;
}

/**
 * Load configuration from environment variables.
 *
 * When no environment object is given, `.env` in the working directory is
 * loaded first (existing variables win) and `process.env` is used.
 *
 * @throws ConfigValidationError when a variable is out of range
 */
export function loadConfig(env?: NodeJS.ProcessEnv): TradewireConfig {
  let source = env;
  if (!source) {
    dotenv.config();
    source = process.env;
  }

  const { error, value } = envSchema.validate(source, { abortEarly: false, convert: true });
  if (error) {
    throw new ConfigValidationError(`Configuration validation failed: ${error.message}`);
  }

  return toConfig(value);
}

function toConfig(raw: RawEnv): TradewireConfig {
  return {
    mode: raw.MODE,
    logLevel: raw.LOG_LEVEL,
    sidecar: {
      bindAddress: raw.SIDECAR_BIND_ADDRESS,
      httpHost: raw.SIDECAR_HTTP_HOST,
      httpPort: raw.SIDECAR_HTTP_PORT,
      receiveTimeoutMs: raw.SIDECAR_RECEIVE_TIMEOUT_MS,
      receiveHighWaterMark: raw.SIDECAR_RECEIVE_HWM,
      shutdownTimeoutMs: raw.SIDECAR_SHUTDOWN_TIMEOUT_MS,
      selfMonitor: {
        enabled: raw.SELF_MONITOR_ENABLED,
        intervalMs: raw.SELF_MONITOR_INTERVAL_MS
      }
    },
    producer: {
      connectAddress: raw.PRODUCER_CONNECT_ADDRESS,
      metricsAddress: raw.BENCHMARK_METRICS_ADDRESS,
      sendHighWaterMark: raw.PRODUCER_SEND_HWM
    },
    transport: {
      reconnectIntervalMs: raw.TRANSPORT_RECONNECT_INTERVAL_MS,
      maxFrameBytes: raw.TRANSPORT_MAX_FRAME_BYTES
    },
    benchmark: {
      maxSamples: raw.BENCHMARK_MAX_SAMPLES
    }
  };
}
