import type { RateLimitPolicyInput } from "@dona/shared/validation";

export const GLOBAL_TIER = "global";
export const USER_TIER = "user";
export const COMMAND_TIER_PREFIX = "command:";

/** Built-in tiers. Command refill rates are per second (30/min ≈ 0.5/s). */
export const defaultPolicies = {
  global: { capacity: 1_000, refillRatePerSecond: 100, burstSize: 1_000 },
  user: { capacity: 60, refillRatePerSecond: 1, burstSize: 10 },
  "command:/dona-task": { capacity: 30, refillRatePerSecond: 0.5, burstSize: 5 },
  "command:/dona-remind": { capacity: 20, refillRatePerSecond: 0.33, burstSize: 3 },
  "command:/dona-summary": { capacity: 10, refillRatePerSecond: 0.17, burstSize: 2 },
  "command:/dona-metrics": { capacity: 5, refillRatePerSecond: 0.083, burstSize: 1 },
} satisfies Record<string, RateLimitPolicyInput>;

/**
 * Tier name for a command. Accepts either the bare slash command (`/dona-task`)
 * or the tier name itself (`command:/dona-task`).
 */
export function commandTier(command: string): string {
  return command.startsWith(COMMAND_TIER_PREFIX) ? command : `${COMMAND_TIER_PREFIX}${command}`;
}

/** Bare slash command for a command tier name. */
export function commandName(tier: string): string {
  return tier.startsWith(COMMAND_TIER_PREFIX) ? tier.slice(COMMAND_TIER_PREFIX.length) : tier;
}
