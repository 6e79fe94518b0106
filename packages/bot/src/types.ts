import type { MetricsCollector, MetricsReporter, RateLimiter } from "@dona/throttle";
import type { AdmissionController } from "./lib/admission.js";
import type { CommandRouter } from "./lib/command-router.js";
import type { EventRouter } from "./lib/event-router.js";

declare module "fastify" {
  interface FastifyInstance {
    /** Absent when rate limiting is disabled. */
    rateLimiter?: RateLimiter;
    metrics: MetricsCollector;
    reporter: MetricsReporter;
    admission: AdmissionController;
    commandRouter: CommandRouter;
    eventRouter: EventRouter;
    signingSecret?: string;
  }

  interface FastifyRequest {
    /** Unparsed request body, kept by the body parsers. */
    rawBody?: string;
  }
}
