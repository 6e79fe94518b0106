export {
  COMMAND_TIER_PREFIX,
  GLOBAL_TIER,
  USER_TIER,
  commandName,
  commandTier,
  defaultPolicies,
} from "./config.js";
export type { Logger } from "./logger.js";
export {
  MetricsCollector,
  percentile,
  type MetricsCollectorOptions,
  type MetricsSummary,
  type RequestRecord,
  type RequestSample,
  type RequestStatus,
  type RequestTypeStats,
  type UserStats,
} from "./metrics-collector.js";
export { MetricsReporter, type MetricsReporterOptions, type MetricsSink } from "./metrics-reporter.js";
export { RateLimitPolicy } from "./rate-limit-policy.js";
export {
  RateLimiter,
  type LimitInfo,
  type LimitSnapshot,
  type LimitType,
  type RateLimitDecision,
  type RateLimitRejection,
  type RateLimiterOptions,
  type RateLimiterStats,
} from "./rate-limiter.js";
export { TokenBucket } from "./token-bucket.js";
