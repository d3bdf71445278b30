import { setTimeout as delay } from "node:timers/promises";
import { CancelledError, PipelineError } from "./errors.js";

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export class WaitTimeoutError extends Error {
  readonly elapsedMs: number;

  constructor(message: string, elapsedMs: number) {
    super(message);
    this.name = "WaitTimeoutError";
    this.elapsedMs = elapsedMs;
  }
}

export function throwIfAborted(signal: AbortSignal | undefined, phase = "run") {
  if (signal?.aborted) {
    throw new CancelledError(`Cancelled: ${phase}`);
  }
}

export const sleep: Sleep = async (ms, signal) => {
  throwIfAborted(signal, "sleep");
  try {
    await delay(ms, undefined, signal ? { signal } : undefined);
  } catch (err) {
    if (signal?.aborted) throw new CancelledError("Cancelled: sleep");
    throw err;
  }
};

export type WaitOptions = {
  timeoutMs: number;
  intervalMs?: number;
  backoffFactor?: number;
  maxIntervalMs?: number;
  description?: string;
  signal?: AbortSignal;
  now?: () => number;
  sleep?: Sleep;
};

/**
 * Polls `probe` until it resolves to something other than `undefined`, backing off
 * between polls. Throws `WaitTimeoutError` once `timeoutMs` has elapsed.
 */
export async function waitUntil<T>(probe: () => Promise<T | undefined>, options: WaitOptions): Promise<T> {
  const now = options.now ?? Date.now;
  const pause = options.sleep ?? sleep;
  const factor = options.backoffFactor ?? 1.5;
  const maxInterval = options.maxIntervalMs ?? 2000;
  const description = options.description ?? "condition";
  const startedAt = now();
  let interval = Math.max(1, options.intervalMs ?? 250);

  for (;;) {
    throwIfAborted(options.signal, `waiting for ${description}`);
    const value = await probe();
    if (value !== undefined) return value;

    const elapsed = now() - startedAt;
    const remaining = options.timeoutMs - elapsed;
    if (remaining <= 0) {
      throw new WaitTimeoutError(`Timed out after ${elapsed}ms waiting for ${description}`, elapsed);
    }
    await pause(Math.min(interval, remaining), options.signal);
    interval = Math.min(maxInterval, Math.round(interval * factor));
  }
}

export function isRetryable(err: unknown) {
  return err instanceof PipelineError && err.retryable;
}

export type RetryOptions = {
  attempts: number;
  baseDelayMs: number;
  factor?: number;
  maxDelayMs?: number;
  shouldRetry?: (err: unknown) => boolean;
  onRetry?: (info: { attempt: number; delayMs: number; error: unknown }) => void | Promise<void>;
  signal?: AbortSignal;
  sleep?: Sleep;
};

export async function retryWithBackoff<T>(fn: (attempt: number) => Promise<T>, options: RetryOptions): Promise<T> {
  const attempts = Math.max(1, Math.trunc(options.attempts));
  const factor = options.factor ?? 2;
  const maxDelay = options.maxDelayMs ?? 30_000;
  const shouldRetry = options.shouldRetry ?? isRetryable;
  const pause = options.sleep ?? sleep;

  for (let attempt = 1; ; attempt += 1) {
    throwIfAborted(options.signal);
    try {
      return await fn(attempt);
    } catch (err) {
      if (attempt >= attempts || !shouldRetry(err)) throw err;
      const delayMs = Math.min(maxDelay, Math.round(options.baseDelayMs * factor ** (attempt - 1)));
      await options.onRetry?.({ attempt, delayMs, error: err });
      await pause(delayMs, options.signal);
    }
  }
}
