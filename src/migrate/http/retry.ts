/**
 * Retry Policy
 *
 * Exponential backoff with jitter. Which statuses are retryable, and all
 * timing constants, are configuration rather than code.
 */

import { RateLimitError, TransientNetworkError } from '../errors.js';

export interface RetryPolicy {
  maxRetries: number;
  baseDelayMs: number;
  multiplier: number;
  maxDelayMs: number;
  jitterRatio: number;
  retryableStatuses: number[];
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxRetries: 3,
  baseDelayMs: 100,
  multiplier: 2,
  maxDelayMs: 60_000,
  jitterRatio: 0.25,
  retryableStatuses: [408, 429, 500, 502, 503, 504],
};

/**
 * Delay before retry number `attempt` (0-based).
 * `random` returns a value in [0, 1).
 */
export function computeBackoff(policy: RetryPolicy, attempt: number, random: () => number = Math.random): number {
  const exponential = policy.baseDelayMs * Math.pow(policy.multiplier, attempt);
  const capped = Math.min(exponential, policy.maxDelayMs);
  return Math.round(capped * (1 + random() * policy.jitterRatio));
}

/**
 * Delay to wait after a retryable error. A server hint wins over backoff.
 */
export function retryDelay(
  policy: RetryPolicy,
  error: RateLimitError | TransientNetworkError,
  attempt: number,
  random?: () => number,
): number {
  if (error.retryAfterMs !== undefined) {
    return error.retryAfterMs;
  }
  return computeBackoff(policy, attempt, random);
}

/**
 * Parse a Retry-After header: delta-seconds or an HTTP date.
 */
export function parseRetryAfter(header: string | null, now: number): number | undefined {
  if (!header) return undefined;

  const seconds = Number(header.trim());
  if (Number.isFinite(seconds) && seconds >= 0) {
    return Math.round(seconds * 1000);
  }

  const date = Date.parse(header);
  if (!Number.isNaN(date)) {
    return Math.max(0, date - now);
  }

  return undefined;
}
