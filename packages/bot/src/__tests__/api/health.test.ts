import { RateLimiter } from "@dona/throttle";
import type { FastifyInstance } from "fastify";
import { afterEach, describe, expect, it } from "vitest";
import { createApp } from "../../index.js";
import { SECRET, commandBody, signedHeaders } from "./helpers.js";

describe("status routes", () => {
  let app: FastifyInstance;

  afterEach(async () => {
    await app?.close();
  });

  async function sendCommand(command: string) {
    const payload = commandBody({ command });
    await app.inject({
      method: "POST",
      url: "/slack/commands",
      headers: signedHeaders(payload, "application/x-www-form-urlencoded"),
      payload,
    });
  }

  describe("GET /health", () => {
    it("reports ok with no buckets when limiting is disabled", async () => {
      app = await createApp({ logger: false });

      const response = await app.inject({ method: "GET", url: "/health" });

      expect(response.statusCode).toBe(200);
      const body = response.json();
      expect(body.status).toBe("ok");
      expect(body.activeBuckets).toBe(0);
      expect(typeof body.uptimeSeconds).toBe("number");
    });

    it("counts the limiter's active buckets", async () => {
      app = await createApp({ signingSecret: SECRET, rateLimiter: new RateLimiter(), logger: false });

      await sendCommand("/dona-help");
      const response = await app.inject({ method: "GET", url: "/health" });

      // global + user:U1
      expect(response.json().activeBuckets).toBe(2);
    });
  });

  describe("GET /metrics", () => {
    it("returns the summary and a null limiter when limiting is disabled", async () => {
      app = await createApp({ signingSecret: SECRET, logger: false });

      await sendCommand("/dona-help");
      const response = await app.inject({ method: "GET", url: "/metrics" });

      expect(response.statusCode).toBe(200);
      const body = response.json();
      expect(body.rateLimiter).toBeNull();
      expect(body.summary.windowMinutes).toBe(5);
      expect(body.summary.requestTypes["command:/dona-help"].count).toBe(1);
      expect(body.summary.counters["command:/dona-help:success"]).toBe(1);
    });

    it("includes limiter stats when limiting is enabled", async () => {
      app = await createApp({
        signingSecret: SECRET,
        rateLimit: {
          enabled: true,
          userMax: 60,
          userBurst: 10,
          cleanupIntervalSeconds: 3600,
          policies: { "command:/dona-help": { capacity: 1, refillRatePerSecond: 0.001, burstSize: 1 } },
        },
        logger: false,
      });

      await sendCommand("/dona-help");
      await sendCommand("/dona-help");
      const response = await app.inject({ method: "GET", url: "/metrics" });

      const { rateLimiter } = response.json();
      expect(rateLimiter.activeBuckets).toBe(3);
      expect(rateLimiter.hitCounters).toEqual({ "command:/dona-help:U1": 1 });
    });
  });

  it("does not start background timers on its own", async () => {
    app = await createApp({ logger: false, rateLimiter: new RateLimiter() });

    expect(app.reporter.running).toBe(false);
  });
});
