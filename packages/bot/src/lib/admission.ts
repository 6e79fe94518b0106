import type { Logger, MetricsCollector, RateLimitRejection, RateLimiter } from "@dona/throttle";
import { type RequestClassification, requestTypeOf } from "./classify.js";
import { rejectionMessage } from "./messages.js";

const DEFAULT_SLOW_REQUEST_THRESHOLD_MS = 3000;
const UNKNOWN_USER = "unknown";

/** Transport hooks the controller needs when it short-circuits a request. */
export interface Responder {
  /** Acknowledge receipt to the platform. Not a reply to the user. */
  ack(): void;
  respond(text: string): void;
}

export type AdmissionResult =
  | { admitted: true; durationMs: number }
  | { admitted: false; rejection: RateLimitRejection };

export interface AdmissionControllerOptions {
  /** Omit to admit everything. */
  rateLimiter?: RateLimiter;
  metrics: MetricsCollector;
  slowRequestThresholdMs?: number;
  logger?: Logger;
}

/**
 * Wraps every inbound request: throttles commands through the rate limiter,
 * times the downstream handler and records the outcome in the collector.
 */
export class AdmissionController {
  private readonly rateLimiter?: RateLimiter;
  private readonly metrics: MetricsCollector;
  private readonly slowRequestThresholdMs: number;
  private readonly logger?: Logger;

  constructor(options: AdmissionControllerOptions) {
    this.rateLimiter = options.rateLimiter;
    this.metrics = options.metrics;
    this.slowRequestThresholdMs =
      options.slowRequestThresholdMs ?? DEFAULT_SLOW_REQUEST_THRESHOLD_MS;
    this.logger = options.logger;
  }

  /**
   * Admit or reject `request`. When admitted, `next` runs and its error, if
   * any, is recorded and re-thrown as is.
   */
  async run(
    request: RequestClassification,
    responder: Responder,
    next: () => void | Promise<void>,
  ): Promise<AdmissionResult> {
    const requestType = requestTypeOf(request);

    if (request.kind === "command") {
      if (!request.userId) {
        this.logger?.warn({ command: request.command }, "Command without user id, allowing through");
      } else if (this.rateLimiter) {
        const decision = this.rateLimiter.checkRateLimit(request.userId, `command:${request.command}`);
        if (!decision.allowed) {
          this.reject(request.command, request.userId, requestType, decision.rejection, responder);
          return { admitted: false, rejection: decision.rejection };
        }
      }
    }

    const userId = request.userId ?? UNKNOWN_USER;
    const start = Date.now();

    try {
      await next();
    } catch (err) {
      const durationMs = Date.now() - start;
      const message = err instanceof Error ? err.message : String(err);

      this.metrics.recordRequest({
        requestType,
        durationMs,
        status: "error",
        userId,
        metadata: { error: message },
      });
      this.metrics.incrementCounter("errors");
      this.metrics.incrementCounter(`errors:${requestType}`);
      this.logger?.error({ err, requestType, userId, durationMs }, "Request failed");
      this.checkSlow(requestType, userId, durationMs);
      throw err;
    }

    const durationMs = Date.now() - start;
    this.metrics.recordRequest({ requestType, durationMs, status: "success", userId });
    this.checkSlow(requestType, userId, durationMs);

    return { admitted: true, durationMs };
  }

  private reject(
    command: string,
    userId: string,
    requestType: string,
    rejection: RateLimitRejection,
    responder: Responder,
  ): void {
    responder.ack();

    this.metrics.recordRequest({
      requestType,
      durationMs: 0,
      status: "rate_limited",
      userId,
      metadata: { limitType: rejection.limitType, retryAfterSeconds: rejection.retryAfterSeconds },
    });

    this.logger?.warn(
      { userId, command, limitType: rejection.limitType, retryAfterSeconds: rejection.retryAfterSeconds },
      "Rate limit exceeded",
    );

    responder.respond(rejectionMessage(rejection));
  }

  private checkSlow(requestType: string, userId: string, durationMs: number): void {
    if (durationMs <= this.slowRequestThresholdMs) return;
    this.metrics.incrementCounter("slow_requests");
    this.logger?.warn({ requestType, userId, durationMs }, "Slow request");
  }
}
