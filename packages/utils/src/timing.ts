import { setTimeout as delay } from 'timers/promises';

// Checked by name: the rejection may come from another realm's Error
function isAbortError(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'name' in error && error.name === 'AbortError';
}

/**
 * Suspend for `ms` milliseconds. Resolves `false` when the signal aborted the
 * wait early, `true` otherwise.
 */
export async function sleep(ms: number, signal?: AbortSignal): Promise<boolean> {
  if (signal?.aborted) {
    return false;
  }
  try {
    await delay(Math.max(0, ms), undefined, { signal });
    return true;
  } catch (error) {
    if (signal?.aborted || isAbortError(error)) {
      return false;
    }
    throw error;
  }
}

/**
 * Resolve once the signal is aborted
 */
export function waitForAbort(signal: AbortSignal): Promise<void> {
  if (signal.aborted) {
    return Promise.resolve();
  }
  return new Promise((resolve) => {
    signal.addEventListener('abort', () => resolve(), { once: true });
  });
}

/**
 * Monotonic nanosecond clock for timing individual calls
 */
export function monotonicNs(): bigint {
  return process.hrtime.bigint();
}

export function nsToMicros(ns: bigint): number {
  return Number(ns) / 1000;
}
