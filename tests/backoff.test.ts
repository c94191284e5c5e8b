import { describe, it, expect, vi } from 'vitest';
import { BackoffPolicy, DEFAULT_BACKOFF, retryWithBackoff } from '../src/retry/backoff';
import { recordingSleep } from './utils';

describe('BackoffPolicy', () => {
  it('uses the default schedule', () => {
    const policy = new BackoffPolicy();
    expect(policy.maxAttempts).toBe(DEFAULT_BACKOFF.maxAttempts);
    expect([0, 1, 2].map((n) => policy.delayForAttempt(n))).toEqual([1000, 2000, 4000]);
  });

  it('honours custom base and multiplier', () => {
    const policy = new BackoffPolicy({ baseDelayMs: 250, multiplier: 3 });
    expect(policy.delayForAttempt(2)).toBe(2250);
  });

  it('reports whether another attempt remains', () => {
    const policy = new BackoffPolicy({ maxAttempts: 2 });
    expect(policy.hasAttemptsAfter(0)).toBe(true);
    expect(policy.hasAttemptsAfter(1)).toBe(false);
  });

  it('rejects invalid options', () => {
    expect(() => new BackoffPolicy({ maxAttempts: 0 })).toThrow(RangeError);
    expect(() => new BackoffPolicy({ multiplier: 0.5 })).toThrow(RangeError);
  });
});

describe('retryWithBackoff', () => {
  it('returns the first success without sleeping', async () => {
    const { sleep, delays } = recordingSleep();
    const result = await retryWithBackoff(() => Promise.resolve('ok'), {
      policy: new BackoffPolicy(),
      shouldRetry: () => true,
      sleep,
    });
    expect(result).toBe('ok');
    expect(delays).toEqual([]);
  });

  it('retries retryable errors with growing delays', async () => {
    const { sleep, delays } = recordingSleep();
    const fn = vi
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValueOnce(new Error('busy'))
      .mockRejectedValueOnce(new Error('busy'))
      .mockResolvedValueOnce('done');

    const result = await retryWithBackoff(fn, { policy: new BackoffPolicy(), shouldRetry: () => true, sleep });

    expect(result).toBe('done');
    expect(fn.mock.calls.map((c) => c[0])).toEqual([0, 1, 2]);
    expect(delays).toEqual([1000, 2000]);
  });

  it('rethrows the last error once attempts are used up', async () => {
    const { sleep, delays } = recordingSleep();
    const onRetry = vi.fn();
    const failure = new Error('still busy');

    await expect(
      retryWithBackoff(() => Promise.reject(failure), {
        policy: new BackoffPolicy({ maxAttempts: 3 }),
        shouldRetry: () => true,
        sleep,
        onRetry,
      })
    ).rejects.toBe(failure);
    expect(delays).toEqual([1000, 2000]);
    expect(onRetry).toHaveBeenCalledTimes(2);
  });

  it('does not retry errors the predicate rejects', async () => {
    const { sleep, delays } = recordingSleep();
    const fn = vi.fn<(attempt: number) => Promise<string>>().mockRejectedValue(new TypeError('bad'));

    await expect(
      retryWithBackoff(fn, { policy: new BackoffPolicy(), shouldRetry: (e) => !(e instanceof TypeError), sleep })
    ).rejects.toThrow('bad');
    expect(fn).toHaveBeenCalledTimes(1);
    expect(delays).toEqual([]);
  });
});
