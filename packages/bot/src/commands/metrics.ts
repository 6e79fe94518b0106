import type { MetricsCollector } from "@dona/throttle";
import type { CommandHandler } from "../lib/command-router.js";
import { formatMetricsReport } from "../lib/messages.js";

export const ADMIN_ONLY_TEXT = "This command is only available to administrators.";

export interface MetricsCommandOptions {
  metrics: MetricsCollector;
  adminUsers: readonly string[];
  /** In `development` every user may run the command. */
  env: string;
}

/** `/dona-metrics [me]`: windowed metrics, optionally with the caller's own stats. */
export function metricsCommand(options: MetricsCommandOptions): CommandHandler {
  return ({ payload, respond }) => {
    const userId = payload.user_id;
    const isAdmin = userId !== undefined && options.adminUsers.includes(userId);
    if (options.env !== "development" && !isAdmin) {
      respond(ADMIN_ONLY_TEXT);
      return;
    }

    const summary = options.metrics.getSummary();
    const userStats =
      payload.text.trim() === "me" && userId ? options.metrics.getUserStats(userId) : undefined;
    respond(formatMetricsReport(summary, userStats));
  };
}
