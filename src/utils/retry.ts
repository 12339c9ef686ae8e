import { RetryPolicy } from '../types';

export type FailureClass = 'retryable' | 'fatal';

export type RetryResult<T> =
  | { status: 'success'; value: T; attempts: number }
  | { status: 'exhausted'; error: unknown; attempts: number }
  | { status: 'fatal'; error: unknown; attempts: number }
  | { status: 'cancelled'; attempts: number };

export interface RetryAttemptInfo {
  attempt: number;
  delayMs: number;
  error: unknown;
}

export interface RetryOptions {
  signal?: AbortSignal;
  onRetry?: (info: RetryAttemptInfo) => void;
}

// 1x, 2x, 4x ... of the base delay, capped
export const backoffDelay = (attempt: number, policy: RetryPolicy): number =>
  Math.min(policy.baseDelayMs * 2 ** (attempt - 1), policy.maxDelayMs);

/** Resolves after `ms`, or as soon as the signal aborts. Never rejects. */
export const sleep = (ms: number, signal?: AbortSignal): Promise<void> =>
  new Promise((resolve) => {
    if (signal?.aborted || ms <= 0) {
      resolve();
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });

/**
 * Runs `operation` up to `policy.maxAttempts` times. The outcome is returned as a
 * value; callers decide what an exhausted or fatal result means for them.
 */
export async function retryWithBackoff<T>(
  operation: (attempt: number) => Promise<T>,
  classify: (error: unknown) => FailureClass,
  policy: RetryPolicy,
  options: RetryOptions = {},
): Promise<RetryResult<T>> {
  const maxAttempts = Math.max(1, policy.maxAttempts);
  let lastError: unknown;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    if (options.signal?.aborted) {
      return { status: 'cancelled', attempts: attempt - 1 };
    }

    try {
      const value = await operation(attempt);
      return { status: 'success', value, attempts: attempt };
    } catch (error) {
      lastError = error;
      if (options.signal?.aborted) {
        return { status: 'cancelled', attempts: attempt };
      }
      if (classify(error) === 'fatal') {
        return { status: 'fatal', error, attempts: attempt };
      }
      if (attempt === maxAttempts) break;

      const delayMs = backoffDelay(attempt, policy);
      options.onRetry?.({ attempt, delayMs, error });
      await sleep(delayMs, options.signal);
    }
  }

  return { status: 'exhausted', error: lastError, attempts: maxAttempts };
}
