import { describe, it, expect, vi } from 'vitest';
import { isRetryable, retry } from './retry.js';

class FlaggedError extends Error {
  constructor(readonly retryable: boolean) {
    super(retryable ? 'transient' : 'permanent');
  }
}

describe('retry', () => {
  it('backs off until the call succeeds', async () => {
    const onRetry = vi.fn();
    let calls = 0;

    const result = await retry(
      async (attempt) => {
        calls++;
        if (attempt < 3) throw new Error('connection reset');
        return 'stored';
      },
      { initialDelay: 1, backoffMultiplier: 2, onRetry }
    );

    expect(result).toBe('stored');
    expect(calls).toBe(3);
    expect(onRetry.mock.calls.map(([, attempt, delay]) => [attempt, delay])).toEqual([
      [1, 1],
      [2, 2],
    ]);
  });

  it('rethrows the last error once attempts run out', async () => {
    const fn = vi.fn(async () => {
      throw new FlaggedError(true);
    });

    await expect(retry(fn, { maxAttempts: 2, initialDelay: 1 })).rejects.toThrow('transient');
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it('stops at once on an error flagged as not retryable', async () => {
    const fn = vi.fn(async () => {
      throw new FlaggedError(false);
    });

    await expect(retry(fn, { maxAttempts: 5, initialDelay: 1 })).rejects.toThrow('permanent');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('gives up without waiting when the signal is aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const fn = vi.fn(async () => {
      throw new Error('connection reset');
    });

    await expect(retry(fn, { initialDelay: 60000, signal: controller.signal })).rejects.toThrow('connection reset');
    expect(fn).toHaveBeenCalledTimes(1);
  });
});

describe('isRetryable', () => {
  it('reads the retryable flag and treats unflagged errors as transient', () => {
    expect(isRetryable(new FlaggedError(false))).toBe(false);
    expect(isRetryable(new FlaggedError(true))).toBe(true);
    expect(isRetryable(new Error('socket hang up'))).toBe(true);
    expect(isRetryable('boom')).toBe(true);
  });
});
