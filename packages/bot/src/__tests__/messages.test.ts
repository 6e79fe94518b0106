import type { MetricsSummary, RequestTypeStats } from "@dona/throttle";
import { describe, expect, it } from "vitest";
import { formatLimitStatus, formatMetricsReport, rejectionMessage } from "../lib/messages.js";

describe("rejectionMessage", () => {
  it("words the global tier", () => {
    expect(rejectionMessage({ limitType: "global", retryAfterSeconds: 0.01 })).toBe(
      "⚠️ The system is experiencing heavy traffic right now. Please try again in 1 minute.",
    );
  });

  it("names the command for the command tier", () => {
    expect(
      rejectionMessage({ limitType: "command", command: "/dona-task", retryAfterSeconds: 120 }),
    ).toBe("⏱️ You've used `/dona-task` too many times. Please wait 2 minutes before using it again.");
  });

  it("adds a tip for the user tier", () => {
    expect(rejectionMessage({ limitType: "user", retryAfterSeconds: 1 })).toBe(
      "🚦 You've hit your request limit. Please wait 1 minute before continuing." +
        "\n\n_Tip: you can group several tasks into a single command._",
    );
  });

  it("rounds the wait to whole minutes", () => {
    expect(rejectionMessage({ limitType: "global", retryAfterSeconds: 89 })).toContain("in 1 minute.");
    expect(rejectionMessage({ limitType: "global", retryAfterSeconds: 90 })).toContain("in 2 minutes.");
    expect(rejectionMessage({ limitType: "global", retryAfterSeconds: 150 })).toContain(
      "in 3 minutes.",
    );
  });
});

describe("formatLimitStatus", () => {
  it("renders the user and command limits", () => {
    const text = formatLimitStatus({
      userLimit: { tokensRemaining: 59, maxTokens: 60, refillRatePerMinute: 60 },
      commandLimit: {
        command: "/dona-remind",
        tokensRemaining: 19,
        maxTokens: 20,
        refillRatePerMinute: 0.33 * 60,
      },
    });

    expect(text).toBe(
      [
        "*📊 Rate Limit Status*",
        "",
        "*User Limit:*",
        "• Remaining: 59/60 (98%)",
        "• Refill rate: 60 requests/min",
        "",
        "*Command Limit (/dona-remind):*",
        "• Remaining: 19/20 (95%)",
        "• Refill rate: 20 requests/min",
      ].join("\n"),
    );
  });

  it("says so when nothing has been used", () => {
    expect(formatLimitStatus({})).toBe("*📊 Rate Limit Status*\n\nNo rate limit usage recorded yet.");
  });
});

function stats(overrides: Partial<RequestTypeStats>): RequestTypeStats {
  return {
    count: 1,
    successCount: 1,
    errorCount: 0,
    errorRate: 0,
    avgDurationMs: 100,
    minDurationMs: 100,
    maxDurationMs: 100,
    p95DurationMs: 100,
    p99DurationMs: 100,
    ...overrides,
  };
}

describe("formatMetricsReport", () => {
  const empty: MetricsSummary = {
    windowMinutes: 5,
    timestamp: "2026-03-02T09:00:00.000Z",
    requestTypes: {},
    counters: {},
  };

  it("renders totals, a sorted breakdown and alerts", () => {
    const summary: MetricsSummary = {
      ...empty,
      requestTypes: {
        "command:/b": stats({
          avgDurationMs: 2500.4,
          minDurationMs: 2500.4,
          maxDurationMs: 2500.4,
          p95DurationMs: 2500.4,
          p99DurationMs: 2500.4,
        }),
        "command:/a": stats({
          count: 3,
          successCount: 2,
          errorCount: 1,
          errorRate: 1 / 3,
          avgDurationMs: 150,
          maxDurationMs: 200,
          p95DurationMs: 200,
          p99DurationMs: 200,
        }),
      },
      counters: { errors: 1, slow_requests: 2 },
    };

    expect(formatMetricsReport(summary)).toBe(
      [
        "*System Metrics*",
        "_Window: Last 5 minutes_",
        "",
        "*Overall Statistics:*",
        "• Total Requests: 4",
        "• Total Errors: 1 (25.0%)",
        "• Slow Requests: 2",
        "",
        "*Request Type Breakdown:*",
        "",
        "_command:/a_",
        "• Count: 3",
        "• Success: 2 | Errors: 1",
        "• Avg Duration: 150ms",
        "• P95 Duration: 200ms",
        "• Max Duration: 200ms",
        "",
        "_command:/b_",
        "• Count: 1",
        "• Success: 1 | Errors: 0",
        "• Avg Duration: 2500ms",
        "• P95 Duration: 2500ms",
        "• Max Duration: 2500ms",
        "",
        "*Alerts:*",
        "• ⚠️ High error rate for command:/a: 33.3%",
        "• 🐢 Slow responses for command:/b: avg 2500ms",
      ].join("\n"),
    );
  });

  it("renders an empty window", () => {
    expect(formatMetricsReport(empty)).toBe(
      [
        "*System Metrics*",
        "_Window: Last 5 minutes_",
        "",
        "*Overall Statistics:*",
        "• Total Requests: 0",
        "• Total Errors: 0 (0.0%)",
        "• Slow Requests: 0",
      ].join("\n"),
    );
  });

  it("appends the caller's own stats", () => {
    const text = formatMetricsReport(
      { ...empty, requestTypes: { "command:/a": stats({ count: 2 }) } },
      {
        userId: "U1",
        totalRequests: 2,
        requestTypes: { "command:/a": { count: 2, avgDurationMs: 149.6 } },
      },
    );

    expect(text.endsWith("*Your Statistics:*\n• Total Requests: 2\n• command:/a: 2 (avg 150ms)")).toBe(
      true,
    );
  });

  it("omits the user section when the caller has no requests", () => {
    const text = formatMetricsReport(empty, { userId: "U1", totalRequests: 0, requestTypes: {} });
    expect(text).toBe(formatMetricsReport(empty));
  });
});
