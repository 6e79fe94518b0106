import { DonaError, ErrorCode } from "@dona/shared/errors";
import type { Logger } from "./logger.js";
import type { MetricsCollector, MetricsSummary } from "./metrics-collector.js";

const DEFAULT_INTERVAL_MS = 300_000;
const DEFAULT_STOP_TIMEOUT_MS = 5_000;
const HIGH_ERROR_RATE = 0.1;

export type MetricsSink = (summary: MetricsSummary) => void | Promise<void>;

export interface MetricsReporterOptions {
  collector: MetricsCollector;
  /** Interval between reports. Defaults to 5 minutes. */
  intervalMs?: number;
  /** How long `stop()` waits for an in-flight report. Defaults to 5s. */
  stopTimeoutMs?: number;
  logger?: Logger;
}

/**
 * Periodically pulls a summary from the collector, logs a digest and hands the
 * summary to every registered sink. A failing sink is logged and skipped.
 */
export class MetricsReporter {
  private readonly collector: MetricsCollector;
  private readonly intervalMs: number;
  private readonly stopTimeoutMs: number;
  private readonly logger?: Logger;
  private readonly sinks: MetricsSink[] = [];
  private timer: ReturnType<typeof setInterval> | null = null;
  private inFlight: Promise<void> | null = null;

  constructor(options: MetricsReporterOptions) {
    const intervalMs = options.intervalMs ?? DEFAULT_INTERVAL_MS;
    if (!Number.isFinite(intervalMs) || intervalMs <= 0) {
      throw new DonaError(
        ErrorCode.CONFIG.INVALID_REPORT_INTERVAL,
        "Metrics report interval must be positive",
        500,
        { intervalMs },
      );
    }

    this.collector = options.collector;
    this.intervalMs = intervalMs;
    this.stopTimeoutMs = options.stopTimeoutMs ?? DEFAULT_STOP_TIMEOUT_MS;
    this.logger = options.logger;
  }

  addSink(sink: MetricsSink): void {
    this.sinks.push(sink);
  }

  /** Report once right away, then every `intervalMs`. */
  start(): void {
    if (this.timer) {
      this.logger?.warn("Metrics reporter already running");
      return;
    }

    this.timer = setInterval(() => this.tick(), this.intervalMs);
    this.logger?.info({ intervalMs: this.intervalMs }, "Metrics reporter started");
    this.tick();
  }

  /**
   * Stop the timer and wait (bounded by `stopTimeoutMs`) for a report that is
   * already running.
   */
  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }

    if (this.inFlight) {
      let timeout: ReturnType<typeof setTimeout> | undefined;
      const expired = new Promise<void>((resolve) => {
        timeout = setTimeout(() => {
          this.logger?.warn({ timeoutMs: this.stopTimeoutMs }, "Metrics report still running at stop");
          resolve();
        }, this.stopTimeoutMs);
      });
      await Promise.race([this.inFlight, expired]);
      clearTimeout(timeout);
    }

    this.logger?.info("Metrics reporter stopped");
  }

  /** Produce one report immediately and resolve to its summary. */
  async reportNow(): Promise<MetricsSummary> {
    return this.report();
  }

  get running(): boolean {
    return this.timer !== null;
  }

  /** Start a report unless the previous one is still running. */
  private tick(): void {
    if (this.inFlight) return;
    this.inFlight = this.report()
      .then(() => undefined)
      .catch((err) => {
        this.logger?.error({ err }, "Metrics report failed");
      })
      .finally(() => {
        this.inFlight = null;
      });
  }

  private async report(): Promise<MetricsSummary> {
    const summary = this.collector.getSummary();
    this.logSummary(summary);

    for (const sink of this.sinks) {
      try {
        await sink(summary);
      } catch (err) {
        this.logger?.error({ err }, "Error in metrics sink");
      }
    }

    return summary;
  }

  private logSummary(summary: MetricsSummary): void {
    const types = Object.entries(summary.requestTypes);
    const totalRequests = types.reduce((sum, [, stats]) => sum + stats.count, 0);

    if (totalRequests === 0) {
      this.logger?.info("No requests in the last metrics window");
      return;
    }

    const errors = summary.counters.errors ?? 0;
    const slowRequests = summary.counters.slow_requests ?? 0;
    const errorRatePct = (errors / totalRequests) * 100;

    this.logger?.info(
      { windowMinutes: summary.windowMinutes, totalRequests, errors, slowRequests },
      `Metrics summary - Window: ${summary.windowMinutes}min, Requests: ${totalRequests}, ` +
        `Errors: ${errors} (${errorRatePct.toFixed(1)}%), Slow: ${slowRequests}`,
    );

    for (const [requestType, stats] of types) {
      this.logger?.debug(
        {
          requestType,
          count: stats.count,
          avgDurationMs: Math.round(stats.avgDurationMs),
          p95DurationMs: stats.p95DurationMs,
          errorCount: stats.errorCount,
        },
        "Request type metrics",
      );

      if (stats.errorRate > HIGH_ERROR_RATE) {
        this.logger?.warn(
          {
            requestType,
            errorRate: stats.errorRate,
            errorCount: stats.errorCount,
            totalCount: stats.count,
          },
          `High error rate for ${requestType}: ${(stats.errorRate * 100).toFixed(2)}%`,
        );
      }
    }
  }
}
