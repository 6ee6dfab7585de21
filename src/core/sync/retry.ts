/**
 * Timeouts, Sleeps and Bounded Retries
 */

import { TimeoutError, UpdateFailedError, errorMessage } from './errors.js';

// -----------------------------------------------------------------------------
// Types
// -----------------------------------------------------------------------------

export interface RetryPolicy {
  /** Total attempts, including the first */
  attempts: number;
  /** Per-attempt deadline (ms) */
  timeoutMs: number;
  /** Pause between a timed-out attempt and the next one (ms) */
  retryDelayMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  attempts: 3,
  timeoutMs: 1000,
  retryDelayMs: 1000,
};

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

// -----------------------------------------------------------------------------
// Primitives
// -----------------------------------------------------------------------------

/**
 * Resolve after `ms`, or early (without rejecting) once `signal` aborts.
 */
export const sleep: SleepFn = (ms, signal) => {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
};

/**
 * Race `operation` against a deadline. The operation itself is not
 * cancelled; a late result is discarded.
 */
export function withTimeout<T>(operation: Promise<T>, timeoutMs: number, label: string): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      reject(new TimeoutError(label, timeoutMs));
    }, timeoutMs);

    operation.then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (error: unknown) => {
        clearTimeout(timer);
        reject(error);
      }
    );
  });
}

// -----------------------------------------------------------------------------
// Retry
// -----------------------------------------------------------------------------

/**
 * Run `fn` under the policy's per-attempt timeout.
 *
 * Timeouts are retried after `retryDelayMs` until attempts run out; any other
 * error fails immediately. Both end as an UpdateFailedError.
 */
export async function retryOnTimeout<T>(
  fn: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  label: string,
  pause: SleepFn = sleep
): Promise<T> {
  for (let attempt = 1; ; attempt++) {
    try {
      return await withTimeout(fn(attempt), policy.timeoutMs, label);
    } catch (error) {
      if (!(error instanceof TimeoutError)) {
        throw new UpdateFailedError(`${label} failed: ${errorMessage(error)}`, { cause: error });
      }

      if (attempt >= policy.attempts) {
        throw new UpdateFailedError(`${label} failed: timed out`, { cause: error });
      }

      await pause(policy.retryDelayMs);
    }
  }
}
