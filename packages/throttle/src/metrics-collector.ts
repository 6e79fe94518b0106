import { DonaError, ErrorCode } from "@dona/shared/errors";

const DEFAULT_WINDOW_MINUTES = 5;

export type RequestStatus = "success" | "error" | "rate_limited";

export interface RequestRecord {
  /** e.g. `command:/dona-task` or `event:app_mention`. */
  requestType: string;
  durationMs: number;
  status: RequestStatus;
  userId: string;
  metadata?: Record<string, unknown>;
}

export interface RequestSample {
  timestamp: number;
  durationMs: number;
  status: RequestStatus;
  userId: string;
  metadata: Record<string, unknown>;
}

export interface RequestTypeStats {
  count: number;
  successCount: number;
  errorCount: number;
  errorRate: number;
  avgDurationMs: number;
  minDurationMs: number;
  maxDurationMs: number;
  p95DurationMs: number;
  p99DurationMs: number;
}

export interface MetricsSummary {
  windowMinutes: number;
  timestamp: string;
  requestTypes: Record<string, RequestTypeStats>;
  counters: Record<string, number>;
}

export interface UserStats {
  userId: string;
  totalRequests: number;
  requestTypes: Record<string, { count: number; avgDurationMs: number }>;
}

export interface MetricsCollectorOptions {
  /** Retention window for raw samples. Defaults to 5 minutes. */
  windowMinutes?: number;
}

/**
 * Nearest-rank percentile: sort ascending, take index `floor(n * p / 100)`,
 * clamped to the last element. Returns 0 for an empty list.
 */
export function percentile(values: readonly number[], p: number): number {
  if (values.length === 0) return 0;
  const sorted = [...values].sort((a, b) => a - b);
  const index = Math.floor((sorted.length * p) / 100);
  return sorted[Math.min(index, sorted.length - 1)];
}

/**
 * Windowed request samples per request type plus process-lifetime counters.
 *
 * Samples older than the window are dropped on every insert and before every
 * read. Counters are never purged.
 */
export class MetricsCollector {
  readonly windowMinutes: number;
  private readonly samples = new Map<string, RequestSample[]>();
  private readonly counters = new Map<string, number>();

  constructor(options: MetricsCollectorOptions = {}) {
    const windowMinutes = options.windowMinutes ?? DEFAULT_WINDOW_MINUTES;
    if (!Number.isFinite(windowMinutes) || windowMinutes <= 0) {
      throw new DonaError(
        ErrorCode.CONFIG.INVALID_METRICS_WINDOW,
        "Metrics window must be a positive number of minutes",
        500,
        { windowMinutes },
      );
    }
    this.windowMinutes = windowMinutes;
  }

  recordRequest(record: RequestRecord): void {
    const sample: RequestSample = {
      timestamp: Date.now(),
      durationMs: record.durationMs,
      status: record.status,
      userId: record.userId,
      metadata: record.metadata ?? {},
    };

    const existing = this.samples.get(record.requestType);
    if (existing) {
      existing.push(sample);
    } else {
      this.samples.set(record.requestType, [sample]);
    }

    this.incrementCounter(`${record.requestType}:total`);
    this.incrementCounter(`${record.requestType}:${record.status}`);

    this.purge();
  }

  incrementCounter(name: string, value = 1): void {
    this.counters.set(name, (this.counters.get(name) ?? 0) + value);
  }

  getCounter(name: string): number {
    return this.counters.get(name) ?? 0;
  }

  getSummary(): MetricsSummary {
    this.purge();

    const requestTypes: Record<string, RequestTypeStats> = {};
    for (const [requestType, samples] of this.samples) {
      if (samples.length === 0) continue;
      requestTypes[requestType] = summarize(samples);
    }

    return {
      windowMinutes: this.windowMinutes,
      timestamp: new Date().toISOString(),
      requestTypes,
      counters: Object.fromEntries(this.counters),
    };
  }

  getUserStats(userId: string): UserStats {
    this.purge();

    const requestTypes: UserStats["requestTypes"] = {};
    let totalRequests = 0;

    for (const [requestType, samples] of this.samples) {
      const durations = samples.filter((s) => s.userId === userId).map((s) => s.durationMs);
      if (durations.length === 0) continue;

      totalRequests += durations.length;
      requestTypes[requestType] = { count: durations.length, avgDurationMs: average(durations) };
    }

    return { userId, totalRequests, requestTypes };
  }

  private purge(): void {
    const cutoff = Date.now() - this.windowMinutes * 60_000;

    for (const [requestType, samples] of this.samples) {
      const retained = samples.filter((s) => s.timestamp > cutoff);
      if (retained.length === 0) {
        this.samples.delete(requestType);
      } else if (retained.length !== samples.length) {
        this.samples.set(requestType, retained);
      }
    }
  }
}

function summarize(samples: RequestSample[]): RequestTypeStats {
  const durations = samples.map((s) => s.durationMs);
  const successCount = samples.filter((s) => s.status === "success").length;
  const errorCount = samples.filter((s) => s.status === "error").length;

  return {
    count: samples.length,
    successCount,
    errorCount,
    errorRate: errorCount / samples.length,
    avgDurationMs: average(durations),
    minDurationMs: durations.reduce((min, v) => Math.min(min, v)),
    maxDurationMs: durations.reduce((max, v) => Math.max(max, v)),
    p95DurationMs: percentile(durations, 95),
    p99DurationMs: percentile(durations, 99),
  };
}

function average(values: number[]): number {
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}
