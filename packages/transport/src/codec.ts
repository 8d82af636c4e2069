import { z } from 'zod';
import {
  BenchmarkStatus,
  TelemetryEvent,
  TradeSide,
  isBenchmarkMetricName,
  isCounterMetric
} from '@tradewire/types';

/**
 * Wire codec for telemetry events.
 *
 * Every message is a UTF-8 JSON object tagged by `type`. Field names on the
 * wire differ from the in-process event shape (`qty`, `ts`, `metric`,
 * `test_name`); the schemas below describe the wire side.
 */

export class DecodeError extends Error {
  /** Wire name of the offending field, or `payload` / `type` */
  readonly field: string;

  constructor(field: string, reason: string) {
    super(`Invalid ${field}: ${reason}`);
    this.name = 'DecodeError';
    this.field = field;
  }
}

export class EncodingError extends Error {
  readonly field: string;

  constructor(field: string, reason: string) {
    super(`Cannot encode ${field}: ${reason}`);
    this.name = 'EncodingError';
    this.field = field;
  }
}

export type DecodeResult =
  | { success: true; event: TelemetryEvent }
  | { success: false; error: DecodeError };

// ============================================================================
// Wire schemas
// ============================================================================

export const TradeWireSchema = z.object({
  type: z.literal('trade'),
  side: z.nativeEnum(TradeSide),
  qty: z.number().finite().nonnegative(),
  ts: z.number().finite()
});

export const BenchmarkLabelsWireSchema = z
  .object({
    test_type: z.string().optional(),
    test_name: z.string().optional()
  })
  .strict();

export const BenchmarkWireSchema = z
  .object({
    type: z.literal('benchmark'),
    metric: z.string().refine(isBenchmarkMetricName, { message: 'unknown benchmark metric' }),
    value: z.number().finite(),
    labels: BenchmarkLabelsWireSchema.default({})
  })
  .superRefine((message, ctx) => {
    // Runs even when `metric` failed its refinement above
    if (isBenchmarkMetricName(message.metric) && isCounterMetric(message.metric) && message.value < 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['value'],
        message: 'counter increments must be non-negative'
      });
    }
  });

export const BenchmarkStatusWireSchema = z.object({
  type: z.literal('benchmark_status'),
  status: z.nativeEnum(BenchmarkStatus),
  test_name: z.string(),
  ts: z.number().finite(),
  message: z.string().default('')
});

export type TradeWire = z.infer<typeof TradeWireSchema>;
export type BenchmarkWire = z.infer<typeof BenchmarkWireSchema>;
export type BenchmarkStatusWire = z.infer<typeof BenchmarkStatusWireSchema>;
export type WireMessage = TradeWire | BenchmarkWire | BenchmarkStatusWire;

type WireType = WireMessage['type'];

type WireParseResult = { success: true; data: WireMessage } | { success: false; error: z.ZodError };

function isWireType(value: unknown): value is WireType {
  return value === 'trade' || value === 'benchmark' || value === 'benchmark_status';
}

function firstIssueField(error: z.ZodError): { field: string; reason: string } {
  const issue = error.issues[0];
  if (!issue) {
    return { field: 'payload', reason: 'invalid message' };
  }
  const head = issue.path[0];
  return { field: head === undefined ? 'payload' : String(head), reason: issue.message };
}

// ============================================================================
// Encode
// ============================================================================

export function toWire(event: TelemetryEvent): WireMessage {
  switch (event.kind) {
    case 'trade':
      return { type: 'trade', side: event.side, qty: event.quantity, ts: event.timestamp };
    case 'benchmark':
      return { type: 'benchmark', metric: event.metricName, value: event.value, labels: { ...event.labels } };
    case 'benchmark_status':
      return {
        type: 'benchmark_status',
        status: event.status,
        test_name: event.testName,
        ts: event.timestamp,
        message: event.message
      };
  }
}

function validateWire(message: WireMessage): WireParseResult {
  switch (message.type) {
    case 'trade':
      return TradeWireSchema.safeParse(message);
    case 'benchmark':
      return BenchmarkWireSchema.safeParse(message);
    case 'benchmark_status':
      return BenchmarkStatusWireSchema.safeParse(message);
  }
}

/**
 * Serialize an event to its wire bytes.
 *
 * @throws EncodingError when the event breaks its own invariants
 */
export function encode(event: TelemetryEvent): Buffer {
  const parsed = validateWire(toWire(event));
  if (!parsed.success) {
    const { field, reason } = firstIssueField(parsed.error);
    throw new EncodingError(field, reason);
  }
  return Buffer.from(JSON.stringify(parsed.data), 'utf8');
}

// ============================================================================
// Decode
// ============================================================================

function fromWire(message: WireMessage): TelemetryEvent {
  switch (message.type) {
    case 'trade':
      return { kind: 'trade', side: message.side, quantity: message.qty, timestamp: message.ts };
    case 'benchmark':
      return { kind: 'benchmark', metricName: message.metric, value: message.value, labels: message.labels };
    case 'benchmark_status':
      return {
        kind: 'benchmark_status',
        status: message.status,
        testName: message.test_name,
        timestamp: message.ts,
        message: message.message
      };
  }
}

function parseWireType(type: WireType, raw: object): WireParseResult {
  switch (type) {
    case 'trade':
      return TradeWireSchema.safeParse(raw);
    case 'benchmark':
      return BenchmarkWireSchema.safeParse(raw);
    case 'benchmark_status':
      return BenchmarkStatusWireSchema.safeParse(raw);
  }
}

/**
 * Parse wire bytes into an event. Never throws: every failure is reported
 * as a `DecodeError` naming the first offending field.
 */
export function decode(bytes: Buffer | string): DecodeResult {
  const text = typeof bytes === 'string' ? bytes : bytes.toString('utf8');

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : 'malformed JSON';
    return { success: false, error: new DecodeError('payload', reason) };
  }

  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    return { success: false, error: new DecodeError('payload', 'expected a JSON object') };
  }

  const type = 'type' in raw ? raw.type : undefined;
  if (!isWireType(type)) {
    const reason = type === undefined ? 'missing message type' : `unknown message type ${JSON.stringify(type)}`;
    return { success: false, error: new DecodeError('type', reason) };
  }

  const parsed = parseWireType(type, raw);
  if (!parsed.success) {
    const { field, reason } = firstIssueField(parsed.error);
    return { success: false, error: new DecodeError(field, reason) };
  }

  return { success: true, event: fromWire(parsed.data) };
}
