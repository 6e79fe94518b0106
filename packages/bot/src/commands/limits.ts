import type { RateLimiter } from "@dona/throttle";
import type { CommandHandler } from "../lib/command-router.js";
import { formatLimitStatus } from "../lib/messages.js";

export const LIMITS_DISABLED_TEXT = "Rate limiting is currently disabled.";

/** `/dona-limits [command]`: the caller's remaining tokens. */
export function limitsCommand(rateLimiter: RateLimiter | undefined): CommandHandler {
  return ({ payload, respond }) => {
    if (!rateLimiter) {
      respond(LIMITS_DISABLED_TEXT);
      return;
    }

    const command = payload.text.trim();
    const info = rateLimiter.getLimitInfo(payload.user_id ?? "", command || undefined);
    respond(formatLimitStatus(info));
  };
}
