import type { RateLimitPolicyInput } from "@dona/shared/validation";
import {
  GLOBAL_TIER,
  USER_TIER,
  commandName,
  commandTier,
  defaultPolicies,
} from "./config.js";
import type { Logger } from "./logger.js";
import { RateLimitPolicy } from "./rate-limit-policy.js";
import { TokenBucket } from "./token-bucket.js";

const STATS_RESET_INTERVAL_MS = 3_600_000;
const DEFAULT_CLEANUP_INTERVAL_MS = 3_600_000;
const DEFAULT_MAX_BUCKET_AGE_SECONDS = 3_600;

export type LimitType = "global" | "user" | "command";

export type RateLimitRejection =
  | { limitType: "global"; retryAfterSeconds: number }
  | { limitType: "user"; retryAfterSeconds: number }
  | { limitType: "command"; command: string; retryAfterSeconds: number };

export type RateLimitDecision = { allowed: true } | { allowed: false; rejection: RateLimitRejection };

export interface LimitSnapshot {
  tokensRemaining: number;
  maxTokens: number;
  refillRatePerMinute: number;
}

export interface LimitInfo {
  userLimit?: LimitSnapshot;
  commandLimit?: LimitSnapshot & { command: string };
}

export interface RateLimiterStats {
  activeBuckets: number;
  hitCounters: Record<string, number>;
  statsWindowStart: string;
}

export interface RateLimiterOptions {
  /**
   * Policies merged over the built-in defaults. Pass `includeDefaults: false`
   * to start from an empty policy table.
   */
  policies?: Record<string, RateLimitPolicy | RateLimitPolicyInput>;
  includeDefaults?: boolean;
  /** Interval in ms between idle-bucket sweeps once `start()` is called. */
  cleanupIntervalMs?: number;
  /** Buckets untouched for longer than this are removed by the periodic sweep. */
  maxBucketAgeSeconds?: number;
  logger?: Logger;
}

type TierOutcome = { passed: true } | { passed: false; retryAfterSeconds: number };

/**
 * Multi-tier token bucket admission control.
 *
 * Every request is checked against the `global` tier, then the requesting
 * user's tier, then (when a policy exists for it) the per-user command tier.
 * The first tier that rejects wins. Tokens taken by earlier tiers are not
 * returned when a later tier rejects.
 *
 * All state lives in this process. Each operation runs to completion on the
 * event loop, so refill-then-consume on a bucket is never interleaved with
 * another request or with the sweep.
 */
export class RateLimiter {
  private readonly policies = new Map<string, RateLimitPolicy>();
  private readonly buckets = new Map<string, TokenBucket>();
  private readonly hitCounters = new Map<string, number>();
  private statsWindowStart = Date.now();
  private cleanupTimer: ReturnType<typeof setInterval> | null = null;
  private readonly cleanupIntervalMs: number;
  private readonly maxBucketAgeSeconds: number;
  private readonly logger?: Logger;

  constructor(options: RateLimiterOptions = {}) {
    this.cleanupIntervalMs = options.cleanupIntervalMs ?? DEFAULT_CLEANUP_INTERVAL_MS;
    this.maxBucketAgeSeconds = options.maxBucketAgeSeconds ?? DEFAULT_MAX_BUCKET_AGE_SECONDS;
    this.logger = options.logger;

    const initial: Record<string, RateLimitPolicy | RateLimitPolicyInput> = {
      ...(options.includeDefaults === false ? {} : defaultPolicies),
      ...options.policies,
    };
    for (const [tier, policy] of Object.entries(initial)) {
      this.policies.set(tier, toPolicy(policy));
    }
  }

  /**
   * Start the periodic idle-bucket sweep.
   */
  start(): void {
    if (this.cleanupTimer) return;
    this.cleanupTimer = setInterval(
      () => this.cleanupOldBuckets(this.maxBucketAgeSeconds),
      this.cleanupIntervalMs,
    );
  }

  /**
   * Stop the sweep timer.
   */
  stop(): void {
    if (this.cleanupTimer) {
      clearInterval(this.cleanupTimer);
      this.cleanupTimer = null;
    }
  }

  /**
   * Register or replace the policy for a tier (`global`, `user`, or
   * `command:<name>`). Existing buckets keep their balance; the next refill
   * clamps it to the new capacity.
   */
  setPolicy(tier: string, policy: RateLimitPolicy | RateLimitPolicyInput): void {
    const resolved = toPolicy(policy);
    this.policies.set(tier, resolved);
    this.logger?.info({ tier, policy: resolved.toJSON() }, "Set rate limit policy");
  }

  policyFor(tier: string): RateLimitPolicy | undefined {
    return this.policies.get(tier);
  }

  /**
   * Admission check across the global, user and command tiers.
   *
   * `command` may be the slash command (`/dona-task`) or its tier name
   * (`command:/dona-task`). Commands without a registered policy are not
   * throttled at the command tier.
   */
  checkRateLimit(userId: string, command?: string | null, tokens = 1): RateLimitDecision {
    const now = Date.now();

    const global = this.checkTier(GLOBAL_TIER, GLOBAL_TIER, now, tokens);
    if (!global.passed) {
      return reject({ limitType: "global", retryAfterSeconds: global.retryAfterSeconds });
    }

    const user = this.checkTier(`${USER_TIER}:${userId}`, USER_TIER, now, tokens);
    if (!user.passed) {
      return reject({ limitType: "user", retryAfterSeconds: user.retryAfterSeconds });
    }

    if (command) {
      const tier = commandTier(command);
      if (this.policies.has(tier)) {
        const outcome = this.checkTier(`${tier}:${userId}`, tier, now, tokens);
        if (!outcome.passed) {
          return reject({
            limitType: "command",
            command: commandName(tier),
            retryAfterSeconds: outcome.retryAfterSeconds,
          });
        }
      }
    }

    return { allowed: true };
  }

  /**
   * Remaining tokens for the user's buckets. Only buckets that already exist
   * are reported; a user with no prior requests gets an empty object.
   */
  getLimitInfo(userId: string, command?: string | null): LimitInfo {
    const now = Date.now();
    const info: LimitInfo = {};

    const userSnapshot = this.snapshot(`${USER_TIER}:${userId}`, USER_TIER, now);
    if (userSnapshot) {
      info.userLimit = userSnapshot;
    }

    if (command) {
      const tier = commandTier(command);
      const commandSnapshot = this.snapshot(`${tier}:${userId}`, tier, now);
      if (commandSnapshot) {
        info.commandLimit = { command: commandName(tier), ...commandSnapshot };
      }
    }

    return info;
  }

  /**
   * Remove buckets that have not been refilled for more than `maxAgeSeconds`.
   * Returns the number removed.
   */
  cleanupOldBuckets(maxAgeSeconds = DEFAULT_MAX_BUCKET_AGE_SECONDS): number {
    const cutoff = Date.now() - maxAgeSeconds * 1000;
    let removed = 0;

    for (const [key, bucket] of this.buckets) {
      if (bucket.lastRefill < cutoff) {
        this.buckets.delete(key);
        removed++;
      }
    }

    if (removed > 0) {
      this.logger?.info({ removed, remaining: this.buckets.size }, "Cleaned up old rate limit buckets");
    }
    return removed;
  }

  /**
   * Bucket count and rejection counters. Counters are cleared on the first
   * read after an hour has passed since the previous reset.
   */
  getStats(): RateLimiterStats {
    const now = Date.now();
    if (now - this.statsWindowStart > STATS_RESET_INTERVAL_MS) {
      this.hitCounters.clear();
      this.statsWindowStart = now;
    }

    return {
      activeBuckets: this.buckets.size,
      hitCounters: Object.fromEntries(this.hitCounters),
      statsWindowStart: new Date(this.statsWindowStart).toISOString(),
    };
  }

  get bucketCount(): number {
    return this.buckets.size;
  }

  private checkTier(bucketKey: string, tier: string, now: number, tokens: number): TierOutcome {
    const policy = this.policies.get(tier);
    if (!policy) return { passed: true };

    let bucket = this.buckets.get(bucketKey);
    if (!bucket) {
      bucket = TokenBucket.full(policy, now);
      this.buckets.set(bucketKey, bucket);
    }

    bucket.refill(policy, now);
    if (bucket.consume(tokens)) {
      return { passed: true };
    }

    this.hitCounters.set(bucketKey, (this.hitCounters.get(bucketKey) ?? 0) + 1);
    const deficit = tokens - bucket.tokens;
    return { passed: false, retryAfterSeconds: Math.max(0, deficit / policy.refillRatePerSecond) };
  }

  private snapshot(bucketKey: string, tier: string, now: number): LimitSnapshot | undefined {
    const policy = this.policies.get(tier);
    const bucket = this.buckets.get(bucketKey);
    if (!policy || !bucket) return undefined;

    bucket.refill(policy, now);
    return {
      tokensRemaining: Math.floor(bucket.tokens),
      maxTokens: policy.capacity,
      refillRatePerMinute: policy.refillRatePerSecond * 60,
    };
  }
}

function toPolicy(policy: RateLimitPolicy | RateLimitPolicyInput): RateLimitPolicy {
  return policy instanceof RateLimitPolicy ? policy : RateLimitPolicy.from(policy);
}

function reject(rejection: RateLimitRejection): RateLimitDecision {
  return { allowed: false, rejection };
}
