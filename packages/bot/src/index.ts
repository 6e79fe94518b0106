import { randomUUID } from "node:crypto";
import { MetricsCollector, MetricsReporter, type RateLimiter } from "@dona/throttle";
import Fastify, { type FastifyInstance, type FastifyServerOptions } from "fastify";
import { helpCommand } from "./commands/help.js";
import { limitsCommand } from "./commands/limits.js";
import { metricsCommand } from "./commands/metrics.js";
import type { RateLimitSettings } from "./config.js";
import { reactionAddedHandler } from "./events/reaction-added.js";
import { AdmissionController } from "./lib/admission.js";
import { CommandRouter } from "./lib/command-router.js";
import { EventRouter } from "./lib/event-router.js";
import { createRateLimiter } from "./lib/services.js";
import { bodyParsersPlugin } from "./plugins/body-parsers.js";
import { commandsPlugin } from "./plugins/commands.js";
import { errorHandlerPlugin } from "./plugins/error-handler.js";
import { eventsPlugin } from "./plugins/events.js";
import { healthPlugin } from "./plugins/health.js";
import { metricsPlugin } from "./plugins/metrics.js";
import "./types.js";

export interface CreateAppOptions {
  /** Slack signing secret. Signature checks are skipped without one. */
  signingSecret?: string;
  /** Pre-built rate limiter (for testing). Takes precedence over `rateLimit`. */
  rateLimiter?: RateLimiter;
  /** Settings to build the rate limiter from. Limiting is off when neither is given. */
  rateLimit?: RateLimitSettings;
  /** Pre-built metrics collector (for testing). */
  metrics?: MetricsCollector;
  metricsWindowMinutes?: number;
  reportIntervalMs?: number;
  slowRequestThresholdMs?: number;
  /** User ids allowed to run `/dona-metrics` outside development. */
  adminUsers?: string[];
  /** Defaults to `development`. */
  env?: string;
  /** Fastify logger options. Defaults to true. */
  logger?: FastifyServerOptions["logger"];
}

export async function createApp(options: CreateAppOptions = {}): Promise<FastifyInstance> {
  const app = Fastify({
    logger: options.logger ?? true,
    genReqId: () => randomUUID(),
  });

  const rateLimiter =
    options.rateLimiter ??
    (options.rateLimit ? createRateLimiter(options.rateLimit, app.log) : undefined);
  const metrics =
    options.metrics ?? new MetricsCollector({ windowMinutes: options.metricsWindowMinutes });
  const reporter = new MetricsReporter({
    collector: metrics,
    intervalMs: options.reportIntervalMs,
    logger: app.log,
  });
  const admission = new AdmissionController({
    rateLimiter,
    metrics,
    slowRequestThresholdMs: options.slowRequestThresholdMs,
    logger: app.log,
  });

  const commandRouter = new CommandRouter()
    .register("/dona-help", helpCommand)
    .register("/dona-limits", limitsCommand(rateLimiter))
    .register(
      "/dona-metrics",
      metricsCommand({
        metrics,
        adminUsers: options.adminUsers ?? [],
        env: options.env ?? "development",
      }),
    );

  const eventRouter = new EventRouter().on("reaction_added", reactionAddedHandler(app.log));

  if (rateLimiter) {
    app.decorate("rateLimiter", rateLimiter);
  }
  if (options.signingSecret) {
    app.decorate("signingSecret", options.signingSecret);
  }
  app.decorate("metrics", metrics);
  app.decorate("reporter", reporter);
  app.decorate("admission", admission);
  app.decorate("commandRouter", commandRouter);
  app.decorate("eventRouter", eventRouter);

  app.addHook("onSend", async (request, reply) => {
    reply.header("x-request-id", request.id);
  });

  await app.register(errorHandlerPlugin);
  await app.register(bodyParsersPlugin);
  await app.register(healthPlugin);
  await app.register(metricsPlugin);
  await app.register(commandsPlugin);
  await app.register(eventsPlugin);

  return app;
}
