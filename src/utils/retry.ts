import { isRetryable } from './errors.js';

export interface RetryOptions {
  /** Total attempts, the first one included. */
  maxAttempts: number;
  /** Delay before each retry; the last entry repeats when attempts outnumber it. */
  backoffMs: readonly number[];
  signal?: AbortSignal;
  onRetry?: (error: Error, attempt: number) => void;
}

export const sleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions): Promise<T> {
  const { maxAttempts, backoffMs, signal, onRetry } = options;
  let lastError: Error | undefined;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));

      if (!isRetryable(error) || attempt === maxAttempts || signal?.aborted) {
        throw lastError;
      }

      onRetry?.(lastError, attempt);
      const delay = backoffMs[Math.min(attempt - 1, backoffMs.length - 1)] ?? 0;
      if (delay > 0) {
        await sleep(delay);
      }
    }
  }

  throw lastError ?? new Error('Retry loop exited without result');
}

/**
 * Rejects with `createError()` after `timeoutMs`, clearing the timer once
 * `promise` settles.
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  createError: () => Error
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(createError()), timeoutMs);
  });
  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}
