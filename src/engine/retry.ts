/**
 * Retry with exponential backoff for transient storage failures.
 *
 * Only TransientStorageError is retried; every other kind is final and is
 * rethrown on the first attempt.
 */

import { isRegistryError } from '../domain/errors';
import { Logger } from '../logger';

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  baseDelayMs: 50,
  maxDelayMs: 2000,
};

export interface RetryOptions {
  /** Label used in log lines. */
  operation: string;
  logger?: Logger;
  /** Injected for tests; defaults to a timer. */
  sleep?: (ms: number) => Promise<void>;
  /** Returns a value in [0, 1). Defaults to Math.random. */
  random?: () => number;
}

/**
 * Delay before the next attempt: base * 2^(attempt-1), with full jitter
 * over the upper half, capped at maxDelayMs.
 */
export function computeBackoff(policy: RetryPolicy, attempt: number, random: () => number = Math.random): number {
  const exponential = policy.baseDelayMs * Math.pow(2, attempt - 1);
  const capped = Math.min(exponential, policy.maxDelayMs);
  const half = capped / 2;
  return Math.round(half + random() * half);
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export async function withRetry<T>(
  policy: RetryPolicy,
  options: RetryOptions,
  fn: (attempt: number) => Promise<T>,
): Promise<T> {
  const wait = options.sleep ?? sleep;
  const maxAttempts = Math.max(1, policy.maxAttempts);

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (err) {
      if (!isRegistryError(err, 'TransientStorageError') || attempt >= maxAttempts) throw err;
      const delay = computeBackoff(policy, attempt, options.random);
      options.logger?.warn('Transient storage failure, retrying', {
        operation: options.operation,
        attempt,
        delayMs: delay,
        error: err.message,
      });
      await wait(delay);
    }
  }
}
