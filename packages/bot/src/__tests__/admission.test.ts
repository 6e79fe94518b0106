import { MetricsCollector, RateLimiter } from "@dona/throttle";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { AdmissionController } from "../lib/admission.js";
import type { RequestClassification } from "../lib/classify.js";

function mockLogger() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

function mockResponder() {
  return { ack: vi.fn(), respond: vi.fn() };
}

function command(userId?: string, name = "/dona-task"): RequestClassification {
  return { kind: "command", command: name, text: "", userId, channelId: "C1", teamId: "T1" };
}

describe("AdmissionController", () => {
  let metrics: MetricsCollector;
  let logger: ReturnType<typeof mockLogger>;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date("2026-03-02T09:00:00.000Z"));
    metrics = new MetricsCollector();
    logger = mockLogger();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  function oneRequestPerUser() {
    return new RateLimiter({
      includeDefaults: false,
      policies: { user: { capacity: 1, refillRatePerSecond: 1, burstSize: 1 } },
    });
  }

  it("times an admitted command and records success", async () => {
    const admission = new AdmissionController({ rateLimiter: oneRequestPerUser(), metrics, logger });
    const next = vi.fn(() => {
      vi.advanceTimersByTime(120);
    });

    const result = await admission.run(command("U1"), mockResponder(), next);

    expect(result).toEqual({ admitted: true, durationMs: 120 });
    expect(next).toHaveBeenCalledTimes(1);
    expect(metrics.getSummary().requestTypes["command:/dona-task"]).toMatchObject({
      count: 1,
      successCount: 1,
      avgDurationMs: 120,
    });
  });

  it("short-circuits a rejected command", async () => {
    const admission = new AdmissionController({ rateLimiter: oneRequestPerUser(), metrics, logger });
    await admission.run(command("U1"), mockResponder(), () => {});

    const responder = mockResponder();
    const next = vi.fn();
    const result = await admission.run(command("U1"), responder, next);

    expect(result).toEqual({
      admitted: false,
      rejection: { limitType: "user", retryAfterSeconds: 1 },
    });
    expect(next).not.toHaveBeenCalled();
    expect(responder.ack).toHaveBeenCalledTimes(1);
    expect(responder.respond).toHaveBeenCalledTimes(1);
    expect(responder.respond).toHaveBeenCalledWith(
      "🚦 You've hit your request limit. Please wait 1 minute before continuing." +
        "\n\n_Tip: you can group several tasks into a single command._",
    );
    expect(metrics.getCounter("command:/dona-task:rate_limited")).toBe(1);
    expect(metrics.getSummary().requestTypes["command:/dona-task"]).toMatchObject({
      count: 2,
      successCount: 1,
      errorCount: 0,
    });
    expect(logger.warn).toHaveBeenCalledWith(
      { userId: "U1", command: "/dona-task", limitType: "user", retryAfterSeconds: 1 },
      "Rate limit exceeded",
    );
  });

  it("checks the command tier under the command's name", async () => {
    const rateLimiter = new RateLimiter({
      includeDefaults: false,
      policies: { "command:/dona-task": { capacity: 1, refillRatePerSecond: 0.5, burstSize: 1 } },
    });
    const admission = new AdmissionController({ rateLimiter, metrics, logger });
    await admission.run(command("U1"), mockResponder(), () => {});

    const responder = mockResponder();
    const result = await admission.run(command("U1"), responder, () => {});

    expect(result).toEqual({
      admitted: false,
      rejection: { limitType: "command", command: "/dona-task", retryAfterSeconds: 2 },
    });
    expect(responder.respond).toHaveBeenCalledWith(
      "⏱️ You've used `/dona-task` too many times. Please wait 1 minute before using it again.",
    );
  });

  it("lets a command without a user id through", async () => {
    const admission = new AdmissionController({ rateLimiter: oneRequestPerUser(), metrics, logger });
    const next = vi.fn();

    const result = await admission.run(command(undefined), mockResponder(), next);

    expect(result).toEqual({ admitted: true, durationMs: 0 });
    expect(next).toHaveBeenCalledTimes(1);
    expect(logger.warn).toHaveBeenCalledWith(
      { command: "/dona-task" },
      "Command without user id, allowing through",
    );
    expect(metrics.getUserStats("unknown").totalRequests).toBe(1);
  });

  it("never throttles events", async () => {
    const rateLimiter = oneRequestPerUser();
    const admission = new AdmissionController({ rateLimiter, metrics, logger });
    await admission.run(command("U1"), mockResponder(), () => {});

    const next = vi.fn();
    const result = await admission.run(
      { kind: "event", eventType: "app_mention", userId: "U1" },
      mockResponder(),
      next,
    );

    expect(result).toEqual({ admitted: true, durationMs: 0 });
    expect(next).toHaveBeenCalledTimes(1);
    expect(metrics.getSummary().requestTypes["event:app_mention"]?.successCount).toBe(1);
  });

  it("admits everything without a rate limiter", async () => {
    const admission = new AdmissionController({ metrics, logger });
    for (let i = 0; i < 5; i++) {
      const result = await admission.run(command("U1"), mockResponder(), () => {});
      expect(result.admitted).toBe(true);
    }
  });

  it("records and re-throws handler errors", async () => {
    const admission = new AdmissionController({ metrics, logger });
    const boom = new Error("boom");

    await expect(
      admission.run(command("U1", "/x"), mockResponder(), () => {
        vi.advanceTimersByTime(50);
        throw boom;
      }),
    ).rejects.toBe(boom);

    expect(metrics.getCounter("errors")).toBe(1);
    expect(metrics.getCounter("errors:command:/x")).toBe(1);
    expect(metrics.getCounter("command:/x:error")).toBe(1);
    expect(metrics.getSummary().requestTypes["command:/x"]).toMatchObject({
      count: 1,
      errorCount: 1,
      avgDurationMs: 50,
    });
    expect(logger.error).toHaveBeenCalledWith(
      { err: boom, requestType: "command:/x", userId: "U1", durationMs: 50 },
      "Request failed",
    );
  });

  it("re-throws rejected promises from async handlers", async () => {
    const admission = new AdmissionController({ metrics, logger });
    const boom = new Error("async boom");

    await expect(
      admission.run(command("U1", "/x"), mockResponder(), async () => {
        throw boom;
      }),
    ).rejects.toBe(boom);
    expect(metrics.getCounter("errors")).toBe(1);
  });

  describe("slow requests", () => {
    it("flags a success over the threshold", async () => {
      const admission = new AdmissionController({ metrics, logger });

      await admission.run(command("U1", "/x"), mockResponder(), () => {
        vi.advanceTimersByTime(3001);
      });

      expect(metrics.getCounter("slow_requests")).toBe(1);
      expect(logger.warn).toHaveBeenCalledWith(
        { requestType: "command:/x", userId: "U1", durationMs: 3001 },
        "Slow request",
      );
    });

    it("does not flag a request at the threshold", async () => {
      const admission = new AdmissionController({ metrics, logger });

      await admission.run(command("U1", "/x"), mockResponder(), () => {
        vi.advanceTimersByTime(3000);
      });

      expect(metrics.getCounter("slow_requests")).toBe(0);
    });

    it("flags a slow failure too", async () => {
      const admission = new AdmissionController({ metrics, logger, slowRequestThresholdMs: 100 });

      await expect(
        admission.run(command("U1", "/x"), mockResponder(), () => {
          vi.advanceTimersByTime(150);
          throw new Error("late");
        }),
      ).rejects.toThrow("late");

      expect(metrics.getCounter("slow_requests")).toBe(1);
      expect(metrics.getCounter("errors")).toBe(1);
    });
  });
});
