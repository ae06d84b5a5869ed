import { setTimeout as delay } from 'node:timers/promises';

import { FetchError, SyncAbortedError } from '@/lib/errors';

export type Sleep = (ms: number, signal: AbortSignal) => Promise<void>;

export const sleep: Sleep = async (ms, signal) => {
  if (ms <= 0) {
    if (signal.aborted) throw new SyncAbortedError();
    return;
  }
  try {
    await delay(ms, undefined, { signal });
  } catch (err) {
    if (signal.aborted) throw new SyncAbortedError();
    throw err;
  }
};

export type RetryOptions = {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs?: number;
  signal: AbortSignal;
  sleep?: Sleep;
  onRetry?: (info: { attempt: number; delayMs: number; error: unknown }) => void;
};

export type RetryResult<T> =
  | { ok: true; value: T; attempts: number }
  | { ok: false; error: unknown; attempts: number };

function isTransient(err: unknown): boolean {
  return err instanceof FetchError && err.transient;
}

export function backoffDelay(
  attempt: number,
  baseDelayMs: number,
  maxDelayMs: number,
  retryAfterMs: number | null,
): number {
  const exponential = baseDelayMs * 2 ** (attempt - 1);
  return Math.min(Math.max(exponential, retryAfterMs ?? 0), maxDelayMs);
}

/**
 * Runs `task` until it succeeds, fails with a permanent error, or has been
 * attempted `maxAttempts` times. Only transient `FetchError`s are retried.
 * Aborting the signal rejects with `SyncAbortedError` instead of resolving.
 */
export async function withRetry<T>(
  task: (attempt: number) => Promise<T>,
  options: RetryOptions,
): Promise<RetryResult<T>> {
  const wait = options.sleep ?? sleep;
  const maxDelayMs = options.maxDelayMs ?? 30_000;

  for (let attempt = 1; ; attempt += 1) {
    if (options.signal.aborted) throw new SyncAbortedError();
    try {
      const value = await task(attempt);
      return { ok: true, value, attempts: attempt };
    } catch (err) {
      if (err instanceof SyncAbortedError || options.signal.aborted) {
        throw new SyncAbortedError();
      }
      if (!isTransient(err) || attempt >= options.maxAttempts) {
        return { ok: false, error: err, attempts: attempt };
      }
      const retryAfterMs = err instanceof FetchError ? err.retryAfterMs : null;
      const delayMs = backoffDelay(
        attempt,
        options.baseDelayMs,
        maxDelayMs,
        retryAfterMs,
      );
      options.onRetry?.({ attempt, delayMs, error: err });
      await wait(delayMs, options.signal);
    }
  }
}
