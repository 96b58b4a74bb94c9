/**
 * Retry Policy Tests
 */

import { describe, it, expect } from 'vitest';
import { DEFAULT_RETRY_POLICY, computeBackoff, parseRetryAfter, retryDelay } from '../retry.js';
import { RateLimitError, TransientNetworkError } from '../../errors.js';

describe('computeBackoff', () => {
  it('should grow exponentially from the base delay', () => {
    const none = () => 0;
    expect(computeBackoff(DEFAULT_RETRY_POLICY, 0, none)).toBe(100);
    expect(computeBackoff(DEFAULT_RETRY_POLICY, 1, none)).toBe(200);
    expect(computeBackoff(DEFAULT_RETRY_POLICY, 2, none)).toBe(400);
  });

  it('should add jitter as a fraction of the delay', () => {
    expect(computeBackoff(DEFAULT_RETRY_POLICY, 2, () => 0.5)).toBe(450);
  });

  it('should cap the delay before jitter', () => {
    const policy = { ...DEFAULT_RETRY_POLICY, maxDelayMs: 1000, jitterRatio: 0 };
    expect(computeBackoff(policy, 10, () => 0.9)).toBe(1000);
  });
});

describe('retryDelay', () => {
  it('should prefer the server hint of a rate limit error', () => {
    expect(retryDelay(DEFAULT_RETRY_POLICY, new RateLimitError('slow down', 3000), 0, () => 0)).toBe(3000);
  });

  it('should fall back to backoff without a hint', () => {
    expect(retryDelay(DEFAULT_RETRY_POLICY, new RateLimitError('slow down'), 1, () => 0)).toBe(200);
    expect(retryDelay(DEFAULT_RETRY_POLICY, new TransientNetworkError('reset'), 0, () => 0)).toBe(100);
  });
});

describe('parseRetryAfter', () => {
  const now = Date.parse('Mon, 01 Jan 2024 00:00:00 GMT');

  it('should read delta-seconds', () => {
    expect(parseRetryAfter('2', now)).toBe(2000);
    expect(parseRetryAfter(' 0.5 ', now)).toBe(500);
  });

  it('should read an HTTP date relative to now', () => {
    expect(parseRetryAfter('Mon, 01 Jan 2024 00:00:05 GMT', now)).toBe(5000);
    expect(parseRetryAfter('Sun, 31 Dec 2023 23:59:00 GMT', now)).toBe(0);
  });

  it('should ignore missing or unreadable values', () => {
    expect(parseRetryAfter(null, now)).toBeUndefined();
    expect(parseRetryAfter('', now)).toBeUndefined();
    expect(parseRetryAfter('soon', now)).toBeUndefined();
  });
});
