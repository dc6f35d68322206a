/**
 * @module retry-engine
 * RetryExecutor — re-invokes an operation under a bounded retry policy with
 * configurable backoff, recording every attempt.
 */

import type { RetryPolicy, AttemptResult } from './types.js';

/** Policy used when retry is enabled and the manifest declares none. */
export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 5,
  delay: '5s',
  backoff: 'exponential',
  backoffMultiplier: 2,
};

/**
 * Parse a human-readable delay string ("2s", "500ms") into milliseconds.
 */
export function parseDelay(delay: string): number {
  const trimmed = delay.trim();

  if (/^\d+$/.test(trimmed)) {
    return parseInt(trimmed, 10);
  }

  const match = trimmed.match(/^(\d+(?:\.\d+)?)\s*(ms|s|m|h)$/);
  if (!match) {
    throw new Error(`Invalid delay format: "${delay}". Expected "2s", "500ms", etc.`);
  }

  const [, amount = '0', unit = 'ms'] = match;

  const multipliers: Record<string, number> = {
    ms: 1,
    s: 1000,
    m: 60_000,
    h: 3_600_000,
  };

  return Math.round(parseFloat(amount) * (multipliers[unit] ?? 1));
}

/**
 * Compute the delay before the next attempt.
 *
 * @param baseDelayMs - Base delay in milliseconds
 * @param attempt - Attempt that just failed (1-based)
 * @param backoff - Backoff strategy
 * @param multiplier - Backoff multiplier (used by both linear and exponential)
 */
export function computeBackoffDelay(
  baseDelayMs: number,
  attempt: number,
  backoff?: 'linear' | 'exponential',
  multiplier = 2,
): number {
  if (!backoff || attempt <= 1) {
    return baseDelayMs;
  }

  const retryIndex = attempt - 1;

  switch (backoff) {
    case 'linear':
      return baseDelayMs * retryIndex * multiplier;
    case 'exponential':
      return baseDelayMs * Math.pow(multiplier, retryIndex - 1);
    default:
      return baseDelayMs;
  }
}

/** Result returned by RetryExecutor.execute() */
export interface RetryResult<T> {
  passed: boolean;
  value?: T;
  attempts: AttemptResult[];
  /** Error thrown by the last attempt when every attempt failed */
  finalError?: unknown;
}

export type SleepFn = (ms: number) => Promise<void>;

/**
 * RetryExecutor wraps an async operation with retry logic.
 *
 * The operation throws on failure and resolves on success.
 */
export class RetryExecutor {
  constructor(
    private readonly sleep: SleepFn = defaultSleep,
    private readonly onRetry?: (attempt: AttemptResult, delayMs: number) => void,
  ) {}

  /**
   * Run the operation until it succeeds or the policy's attempts are spent.
   *
   * @param fn - Async operation that throws on failure
   * @param policy - Retry configuration
   */
  async execute<T>(fn: () => Promise<T>, policy: RetryPolicy): Promise<RetryResult<T>> {
    const baseDelayMs = parseDelay(policy.delay);
    const maxAttempts = Math.max(1, policy.maxAttempts);
    const attempts: AttemptResult[] = [];
    let finalError: unknown;

    for (let i = 1; i <= maxAttempts; i++) {
      const attemptStart = Date.now();

      try {
        const value = await fn();

        attempts.push({
          attempt: i,
          passed: true,
          duration: Date.now() - attemptStart,
          timestamp: attemptStart,
        });

        return { passed: true, value, attempts };
      } catch (err) {
        finalError = err;
        const attempt: AttemptResult = {
          attempt: i,
          passed: false,
          error: err instanceof Error ? err.message : String(err),
          duration: Date.now() - attemptStart,
          timestamp: attemptStart,
        };
        attempts.push(attempt);

        if (i < maxAttempts) {
          const delay = computeBackoffDelay(
            baseDelayMs,
            i,
            policy.backoff,
            policy.backoffMultiplier ?? 2,
          );
          this.onRetry?.(attempt, delay);
          await this.sleep(delay);
        }
      }
    }

    return { passed: false, attempts, finalError };
  }
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
