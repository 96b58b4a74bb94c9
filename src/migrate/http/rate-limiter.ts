/**
 * Rate Limiter
 *
 * Token bucket with a concurrency cap. One limiter belongs to one API client
 * instance and is shared by every call that client makes, so it is the only
 * backpressure on a host: at most `requestsPerSecond + burst` requests start
 * in any one-second window, and at most `maxConcurrent` are in flight.
 */

import { systemClock, type Clock } from './clock.js';

export interface RateLimiterOptions {
  requestsPerSecond: number;
  burst: number;
  maxConcurrent: number;
}

export interface RateLimiterStats {
  inFlight: number;
  queued: number;
  tokens: number;
  started: number;
}

export class TokenBucketLimiter {
  private readonly rate: number;
  private readonly capacity: number;
  private readonly maxConcurrent: number;
  private readonly clock: Clock;

  private tokens: number;
  private lastRefill: number;
  private inFlight = 0;
  private started = 0;
  private readonly waiters: Array<() => void> = [];
  private tokenChain: Promise<void> = Promise.resolve();

  constructor(options: RateLimiterOptions, clock: Clock = systemClock) {
    this.rate = options.requestsPerSecond;
    this.capacity = options.burst;
    this.maxConcurrent = options.maxConcurrent;
    this.clock = clock;
    this.tokens = options.burst;
    this.lastRefill = clock.now();
  }

  /**
   * Run a task once a concurrency slot and a token are available.
   */
  async schedule<T>(task: () => Promise<T>): Promise<T> {
    await this.acquireSlot();
    try {
      await this.takeToken();
      return await task();
    } finally {
      this.releaseSlot();
    }
  }

  stats(): RateLimiterStats {
    this.refill();
    return {
      inFlight: this.inFlight,
      queued: this.waiters.length,
      tokens: this.tokens,
      started: this.started,
    };
  }

  // ─── Tokens ────────────────────────────────────────────────

  /** Token waits are chained so callers are served in arrival order. */
  private takeToken(): Promise<void> {
    const next = this.tokenChain.then(() => this.waitForToken());
    this.tokenChain = next.catch(() => undefined);
    return next;
  }

  private async waitForToken(): Promise<void> {
    for (;;) {
      this.refill();
      if (this.tokens >= 1) {
        this.tokens -= 1;
        this.started++;
        return;
      }
      const waitMs = Math.ceil(((1 - this.tokens) / this.rate) * 1000);
      await this.clock.sleep(waitMs);
    }
  }

  private refill(): void {
    const now = this.clock.now();
    const elapsed = now - this.lastRefill;
    if (elapsed > 0) {
      this.tokens = Math.min(this.capacity, this.tokens + (elapsed * this.rate) / 1000);
      this.lastRefill = now;
    }
  }

  // ─── Concurrency ───────────────────────────────────────────

  private acquireSlot(): Promise<void> {
    if (this.inFlight < this.maxConcurrent) {
      this.inFlight++;
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.waiters.push(() => {
        this.inFlight++;
        resolve();
      });
    });
  }

  private releaseSlot(): void {
    this.inFlight--;
    const next = this.waiters.shift();
    if (next) next();
  }
}
