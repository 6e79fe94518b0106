import { z } from "zod";

// ---------------------------------------------------------------------------
// Slack identifiers
// ---------------------------------------------------------------------------

/** Slack user ID: `U` or `W` followed by uppercase alphanumerics. */
export const SlackUserId = z.string().regex(/^[UW][A-Z0-9]+$/, "Invalid Slack user ID");

/** Slash command name as Slack sends it, e.g. `/dona-task`. */
export const SlashCommandName = z
  .string()
  .regex(/^\/[a-z0-9][a-z0-9_-]*$/i, "Invalid slash command name");

// ---------------------------------------------------------------------------
// Rate limit tiers
// ---------------------------------------------------------------------------

/**
 * Tier name: `global`, `user`, or `command:<slash command>`.
 */
export const TierName = z
  .string()
  .regex(/^(global|user|command:\/[a-z0-9][a-z0-9_-]*)$/i, "Invalid rate limit tier");
export type TierName = z.infer<typeof TierName>;

/** One throttling tier. All three values must be finite and strictly positive. */
export const RateLimitPolicyInput = z
  .object({
    capacity: z.number().finite().positive(),
    refillRatePerSecond: z.number().finite().positive(),
    burstSize: z.number().finite().positive(),
  })
  .strict();
export type RateLimitPolicyInput = z.infer<typeof RateLimitPolicyInput>;

/** Tier name → policy, as accepted from configuration. */
export const RateLimitPolicyOverrides = z.record(TierName, RateLimitPolicyInput);
export type RateLimitPolicyOverrides = z.infer<typeof RateLimitPolicyOverrides>;

// ---------------------------------------------------------------------------
// Environment helpers
// ---------------------------------------------------------------------------

/** Comma-separated list, trimmed, empty entries dropped. */
export const CommaSeparatedList = z
  .string()
  .transform((value) =>
    value
      .split(",")
      .map((entry) => entry.trim())
      .filter((entry) => entry.length > 0),
  );

/** `"true"`/`"1"` → true, `"false"`/`"0"` → false (case-insensitive). */
export const BooleanFlag = z
  .string()
  .toLowerCase()
  .pipe(z.enum(["true", "false", "1", "0"]))
  .transform((value) => value === "true" || value === "1");

/** Environment string parsed as a number; must be finite and positive. */
export const PositiveNumber = z.coerce.number().finite().positive();

/** Environment string parsed as a port number. */
export const Port = z.coerce.number().int().min(1).max(65_535);
