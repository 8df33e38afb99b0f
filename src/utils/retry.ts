import { CancelledError } from "../errors.js";

export type RetryOptions = {
  maxAttempts?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  /** Aborting stops further attempts and interrupts a pending back-off. */
  signal?: AbortSignal;
  /** Return false to stop retrying on this error. */
  shouldRetry?: (err: unknown, attempt: number) => boolean;
  onRetry?: (err: unknown, attempt: number, delayMs: number) => void;
};

const DEFAULTS = {
  maxAttempts: 3,
  baseDelayMs: 500,
  maxDelayMs: 10_000,
};

/** Exponential back-off before attempt `attempt + 1`. */
export function backoffDelay(attempt: number, baseDelayMs: number, maxDelayMs: number): number {
  return Math.min(baseDelayMs * 2 ** (attempt - 1), maxDelayMs);
}

/** The reason a signal was aborted with, as an Error. */
export function abortReason(signal: AbortSignal | undefined): Error {
  const reason: unknown = signal?.reason;
  return reason instanceof Error ? reason : new CancelledError();
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) return Promise.reject(abortReason(signal));
  if (ms <= 0) return Promise.resolve();
  return new Promise((resolve, reject) => {
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(abortReason(signal));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Call `fn` until it resolves or the attempt budget runs out, backing off
 * exponentially in between. Rethrows the last error.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  opts?: RetryOptions,
): Promise<T> {
  const maxAttempts = opts?.maxAttempts ?? DEFAULTS.maxAttempts;
  const baseDelayMs = opts?.baseDelayMs ?? DEFAULTS.baseDelayMs;
  const maxDelayMs = opts?.maxDelayMs ?? DEFAULTS.maxDelayMs;

  let lastError: unknown;
  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (err) {
      lastError = err;
      if (attempt === maxAttempts) break;
      if (opts?.signal?.aborted) break;
      if (opts?.shouldRetry && !opts.shouldRetry(err, attempt)) break;
      const delay = backoffDelay(attempt, baseDelayMs, maxDelayMs);
      opts?.onRetry?.(err, attempt, delay);
      try {
        await sleep(delay, opts?.signal);
      } catch {
        // aborted mid back-off: surface the attempt's own error
        break;
      }
    }
  }
  throw lastError;
}
