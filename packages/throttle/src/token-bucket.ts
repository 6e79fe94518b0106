import type { RateLimitPolicy } from "./rate-limit-policy.js";

/**
 * Fractional token balance plus the time (ms) it was last refilled.
 * Created full; only the owning limiter mutates it.
 */
export class TokenBucket {
  constructor(
    public tokens: number,
    public lastRefill: number,
  ) {}

  static full(policy: RateLimitPolicy, now: number): TokenBucket {
    return new TokenBucket(policy.capacity, now);
  }

  /**
   * Add `elapsed * refillRatePerSecond` tokens, clamped to capacity.
   * A clock that moved backwards counts as no elapsed time.
   */
  refill(policy: RateLimitPolicy, now: number): void {
    const elapsedSeconds = Math.max(0, now - this.lastRefill) / 1000;
    this.tokens = Math.min(policy.capacity, this.tokens + elapsedSeconds * policy.refillRatePerSecond);
    this.lastRefill = Math.max(this.lastRefill, now);
  }

  /** Take `count` tokens if the balance covers them. Never partially consumes. */
  consume(count = 1): boolean {
    if (this.tokens >= count) {
      this.tokens -= count;
      return true;
    }
    return false;
  }
}
