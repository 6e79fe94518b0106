import type {
  LimitInfo,
  LimitSnapshot,
  MetricsSummary,
  RateLimitRejection,
  UserStats,
} from "@dona/throttle";

const HIGH_ERROR_RATE = 0.1;
const SLOW_AVERAGE_MS = 2000;

function minutes(retryAfterSeconds: number): string {
  const n = Math.max(1, Math.round(retryAfterSeconds / 60));
  return `${n} ${n > 1 ? "minutes" : "minute"}`;
}

/** User-facing reply for a rejected command, worded per tier. */
export function rejectionMessage(rejection: RateLimitRejection): string {
  const wait = minutes(rejection.retryAfterSeconds);

  switch (rejection.limitType) {
    case "global":
      return `⚠️ The system is experiencing heavy traffic right now. Please try again in ${wait}.`;
    case "command":
      return `⏱️ You've used \`${rejection.command}\` too many times. Please wait ${wait} before using it again.`;
    case "user":
      return (
        `🚦 You've hit your request limit. Please wait ${wait} before continuing.` +
        "\n\n_Tip: you can group several tasks into a single command._"
      );
  }
}

function limitLines(title: string, limit: LimitSnapshot): string[] {
  const pct = Math.round((limit.tokensRemaining / limit.maxTokens) * 100);
  return [
    `*${title}:*`,
    `• Remaining: ${limit.tokensRemaining}/${limit.maxTokens} (${pct}%)`,
    `• Refill rate: ${Math.round(limit.refillRatePerMinute)} requests/min`,
  ];
}

export function formatLimitStatus(info: LimitInfo): string {
  const sections = ["*📊 Rate Limit Status*"];

  if (info.userLimit) {
    sections.push(limitLines("User Limit", info.userLimit).join("\n"));
  }
  if (info.commandLimit) {
    sections.push(
      limitLines(`Command Limit (${info.commandLimit.command})`, info.commandLimit).join("\n"),
    );
  }
  if (!info.userLimit && !info.commandLimit) {
    sections.push("No rate limit usage recorded yet.");
  }

  return sections.join("\n\n");
}

/**
 * Admin-facing metrics digest. Request types are listed alphabetically;
 * the alerts section only appears when a type crosses a threshold.
 */
export function formatMetricsReport(summary: MetricsSummary, userStats?: UserStats): string {
  const types = Object.entries(summary.requestTypes).sort(([a], [b]) => a.localeCompare(b));
  const totalRequests = types.reduce((sum, [, stats]) => sum + stats.count, 0);
  const errors = summary.counters.errors ?? 0;
  const slow = summary.counters.slow_requests ?? 0;
  const errorRatePct = totalRequests > 0 ? (errors / totalRequests) * 100 : 0;

  const sections = [
    `*System Metrics*\n_Window: Last ${summary.windowMinutes} minutes_`,
    [
      "*Overall Statistics:*",
      `• Total Requests: ${totalRequests}`,
      `• Total Errors: ${errors} (${errorRatePct.toFixed(1)}%)`,
      `• Slow Requests: ${slow}`,
    ].join("\n"),
  ];

  if (types.length > 0) {
    const breakdown = types.map(([type, stats]) =>
      [
        `_${type}_`,
        `• Count: ${stats.count}`,
        `• Success: ${stats.successCount} | Errors: ${stats.errorCount}`,
        `• Avg Duration: ${Math.round(stats.avgDurationMs)}ms`,
        `• P95 Duration: ${Math.round(stats.p95DurationMs)}ms`,
        `• Max Duration: ${Math.round(stats.maxDurationMs)}ms`,
      ].join("\n"),
    );
    sections.push(["*Request Type Breakdown:*", ...breakdown].join("\n\n"));
  }

  if (userStats && userStats.totalRequests > 0) {
    const lines = ["*Your Statistics:*", `• Total Requests: ${userStats.totalRequests}`];
    for (const [type, stats] of Object.entries(userStats.requestTypes)) {
      lines.push(`• ${type}: ${stats.count} (avg ${Math.round(stats.avgDurationMs)}ms)`);
    }
    sections.push(lines.join("\n"));
  }

  const alerts: string[] = [];
  for (const [type, stats] of types) {
    if (stats.errorRate > HIGH_ERROR_RATE) {
      alerts.push(`• ⚠️ High error rate for ${type}: ${(stats.errorRate * 100).toFixed(1)}%`);
    }
    if (stats.avgDurationMs > SLOW_AVERAGE_MS) {
      alerts.push(`• 🐢 Slow responses for ${type}: avg ${Math.round(stats.avgDurationMs)}ms`);
    }
  }
  if (alerts.length > 0) {
    sections.push(["*Alerts:*", ...alerts].join("\n"));
  }

  return sections.join("\n\n");
}
