import { setTimeout as delay } from 'node:timers/promises';

export type Sleeper = (ms: number) => Promise<void>;

export interface BackoffOptions {
  maxAttempts: number;
  baseDelayMs: number;
  multiplier: number;
}

export const DEFAULT_BACKOFF: BackoffOptions = {
  maxAttempts: 3,
  baseDelayMs: 1000,
  multiplier: 2,
};

export const realSleep: Sleeper = async (ms: number) => {
  await delay(ms);
};

/*
 * Exponential backoff schedule: attempt 0 waits baseDelayMs, each later
 * attempt multiplies the previous wait.
 */
export class BackoffPolicy {
  readonly maxAttempts: number;
  readonly baseDelayMs: number;
  readonly multiplier: number;

  constructor(options: Partial<BackoffOptions> = {}) {
    const merged = { ...DEFAULT_BACKOFF, ...options };
    if (!Number.isInteger(merged.maxAttempts) || merged.maxAttempts < 1) {
      throw new RangeError(`maxAttempts must be a positive integer, got ${merged.maxAttempts}`);
    }
    if (merged.baseDelayMs < 0 || merged.multiplier < 1) {
      throw new RangeError('baseDelayMs must be >= 0 and multiplier >= 1');
    }
    this.maxAttempts = merged.maxAttempts;
    this.baseDelayMs = merged.baseDelayMs;
    this.multiplier = merged.multiplier;
  }

  delayForAttempt(attempt: number): number {
    return this.baseDelayMs * Math.pow(this.multiplier, attempt);
  }

  hasAttemptsAfter(attempt: number): boolean {
    return attempt < this.maxAttempts - 1;
  }
}

export interface RetryOptions {
  policy: BackoffPolicy;
  shouldRetry: (error: unknown) => boolean;
  sleep?: Sleeper;
  onRetry?: (info: { attempt: number; delayMs: number; error: unknown }) => void;
}

/**
 * Runs `fn` until it resolves, the error is not retryable, or the policy's
 * attempts are used up. The last error is rethrown unchanged.
 */
export async function retryWithBackoff<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions
): Promise<T> {
  const sleep = options.sleep ?? realSleep;
  for (let attempt = 0; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (e: unknown) {
      if (!options.shouldRetry(e) || !options.policy.hasAttemptsAfter(attempt)) {
        throw e;
      }
      const delayMs = options.policy.delayForAttempt(attempt);
      options.onRetry?.({ attempt, delayMs, error: e });
      await sleep(delayMs);
    }
  }
}
