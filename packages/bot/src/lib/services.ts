import { type Logger, RateLimiter } from "@dona/throttle";
import type { RateLimitSettings } from "../config.js";

/**
 * Limiter for the configured settings: built-in defaults, the user tier
 * sized from `userMax`/`userBurst`, then any explicit overrides.
 * Buckets are swept every `cleanupIntervalSeconds` once idle for the
 * limiter's default hour. Returns undefined when limiting is disabled.
 */
export function createRateLimiter(
  settings: RateLimitSettings,
  logger?: Logger,
): RateLimiter | undefined {
  if (!settings.enabled) return undefined;

  return new RateLimiter({
    policies: {
      user: {
        capacity: settings.userMax,
        refillRatePerSecond: settings.userMax / 60,
        burstSize: settings.userBurst,
      },
      ...settings.policies,
    },
    cleanupIntervalMs: settings.cleanupIntervalSeconds * 1000,
    logger,
  });
}
