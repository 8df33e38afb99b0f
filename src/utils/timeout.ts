import { TimeoutError } from "../errors.js";
import { abortReason } from "./retry.js";

export type TimeoutOptions = {
  /** Deadline for this call; undefined means no deadline of its own. */
  timeoutMs?: number;
  /** Outer signal; aborting it aborts the call with the outer reason. */
  signal?: AbortSignal;
};

/**
 * Run `fn` with its own AbortSignal, rejecting with a TimeoutError once
 * `timeoutMs` elapses. The signal handed to `fn` is aborted on timeout and
 * when the outer signal aborts. A late result from `fn` is discarded.
 */
export function withTimeout<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  opts: TimeoutOptions = {},
): Promise<T> {
  const { timeoutMs, signal: outer } = opts;
  if (outer?.aborted) return Promise.reject(abortReason(outer));
  if (timeoutMs !== undefined && timeoutMs <= 0) {
    return Promise.reject(new TimeoutError(0, "No time left before the deadline"));
  }

  const controller = new AbortController();

  return new Promise<T>((resolve, reject) => {
    let timer: NodeJS.Timeout | undefined;

    const cleanup = (): void => {
      if (timer) clearTimeout(timer);
      outer?.removeEventListener("abort", onOuterAbort);
    };

    const onOuterAbort = (): void => {
      const reason = abortReason(outer);
      cleanup();
      controller.abort(reason);
      reject(reason);
    };

    if (timeoutMs !== undefined) {
      timer = setTimeout(() => {
        const err = new TimeoutError(timeoutMs);
        cleanup();
        controller.abort(err);
        reject(err);
      }, timeoutMs);
    }
    outer?.addEventListener("abort", onOuterAbort, { once: true });

    let pending: Promise<T>;
    try {
      pending = fn(controller.signal);
    } catch (err) {
      cleanup();
      reject(err);
      return;
    }
    pending.then(
      (value) => {
        cleanup();
        resolve(value);
      },
      (err: unknown) => {
        cleanup();
        reject(err);
      },
    );
  });
}
