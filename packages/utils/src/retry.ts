/**
 * Retry
 *
 * Exponential backoff for calls against remote collaborators (bucket uploads).
 * An error that declares itself `retryable: false` ends the loop at once.
 */

import { setTimeout as sleep } from 'node:timers/promises';

export interface RetryOptions {
  maxAttempts: number;
  initialDelay: number; // milliseconds
  maxDelay: number; // milliseconds
  backoffMultiplier: number;
  retryIf: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number, delay: number) => void;
  /** Stops waiting between attempts; the last error is rethrown */
  signal?: AbortSignal;
}

/**
 * Errors from the acquisition taxonomy carry a `retryable` flag; anything
 * without one is assumed transient.
 */
export function isRetryable(error: unknown): boolean {
  if (typeof error === 'object' && error !== null && 'retryable' in error) {
    return error.retryable !== false;
  }
  return true;
}

const defaultOptions: RetryOptions = {
  maxAttempts: 3,
  initialDelay: 1000,
  maxDelay: 30000,
  backoffMultiplier: 2,
  retryIf: isRetryable,
};

export async function retry<T>(fn: (attempt: number) => Promise<T>, options: Partial<RetryOptions> = {}): Promise<T> {
  const opts: RetryOptions = { ...defaultOptions, ...options };
  let delay = opts.initialDelay;

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      if (attempt >= opts.maxAttempts || !opts.retryIf(error) || opts.signal?.aborted) {
        throw error;
      }

      opts.onRetry?.(error, attempt, delay);
      try {
        await sleep(delay, undefined, { signal: opts.signal });
      } catch {
        throw error;
      }
      delay = Math.min(delay * opts.backoffMultiplier, opts.maxDelay);
    }
  }
}
