import { DonaError, ErrorCode } from "@dona/shared/errors";
import {
  BooleanFlag,
  CommaSeparatedList,
  Port,
  PositiveNumber,
  RateLimitPolicyOverrides,
} from "@dona/shared/validation";
import { z } from "zod";

export interface RateLimitSettings {
  enabled: boolean;
  /** User tier capacity. Refills at `userMax / 60` tokens per second. */
  userMax: number;
  userBurst: number;
  /** Seconds between bucket sweeps. A bucket is swept after an hour idle. */
  cleanupIntervalSeconds: number;
  policies: RateLimitPolicyOverrides;
}

export interface AppConfig {
  port: number;
  host: string;
  logLevel: LogLevel;
  nodeEnv: string;
  slackSigningSecret: string;
  adminUsers: string[];
  rateLimit: RateLimitSettings;
  metrics: {
    windowMinutes: number;
    reportIntervalSeconds: number;
    slowRequestThresholdMs: number;
  };
}

const LogLevel = z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]);
type LogLevel = z.infer<typeof LogLevel>;

const Env = z.object({
  PORT: Port.default(3000),
  HOST: z.string().min(1).default("0.0.0.0"),
  LOG_LEVEL: LogLevel.default("info"),
  NODE_ENV: z.string().min(1).default("development"),
  ADMIN_USERS: CommaSeparatedList.default(""),
  RATE_LIMIT_ENABLED: BooleanFlag.default("true"),
  RATE_LIMIT_USER_MAX: PositiveNumber.default(60),
  RATE_LIMIT_USER_BURST: PositiveNumber.default(10),
  RATE_LIMIT_CLEANUP_INTERVAL: PositiveNumber.default(3600),
  RATE_LIMIT_POLICIES: z.string().optional(),
  METRICS_WINDOW_MINUTES: PositiveNumber.default(5),
  METRICS_REPORT_INTERVAL: PositiveNumber.default(300),
  SLOW_REQUEST_THRESHOLD_MS: PositiveNumber.default(3000),
});

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const slackSigningSecret = env.SLACK_SIGNING_SECRET;
  if (!slackSigningSecret) {
    throw new DonaError(
      ErrorCode.CONFIG.REQUIRED_ENV_VAR_MISSING,
      "SLACK_SIGNING_SECRET is required",
      500,
      { variable: "SLACK_SIGNING_SECRET" },
    );
  }

  const parsed = Env.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const variable = String(issue?.path[0] ?? "unknown");
    throw new DonaError(ErrorCode.CONFIG.INVALID_ENV_VAR, `${variable} is invalid`, 500, {
      variable,
      issue: issue?.message,
    });
  }

  const vars = parsed.data;

  return {
    port: vars.PORT,
    host: vars.HOST,
    logLevel: vars.LOG_LEVEL,
    nodeEnv: vars.NODE_ENV,
    slackSigningSecret,
    adminUsers: vars.ADMIN_USERS,
    rateLimit: {
      enabled: vars.RATE_LIMIT_ENABLED,
      userMax: vars.RATE_LIMIT_USER_MAX,
      userBurst: vars.RATE_LIMIT_USER_BURST,
      cleanupIntervalSeconds: vars.RATE_LIMIT_CLEANUP_INTERVAL,
      policies: parsePolicyOverrides(vars.RATE_LIMIT_POLICIES),
    },
    metrics: {
      windowMinutes: vars.METRICS_WINDOW_MINUTES,
      reportIntervalSeconds: vars.METRICS_REPORT_INTERVAL,
      slowRequestThresholdMs: vars.SLOW_REQUEST_THRESHOLD_MS,
    },
  };
}

function parsePolicyOverrides(raw: string | undefined): RateLimitPolicyOverrides {
  if (!raw) return {};

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    throw new DonaError(
      ErrorCode.CONFIG.INVALID_POLICY_OVERRIDES,
      "RATE_LIMIT_POLICIES is not valid JSON",
      500,
      { variable: "RATE_LIMIT_POLICIES" },
    );
  }

  const result = RateLimitPolicyOverrides.safeParse(json);
  if (!result.success) {
    throw new DonaError(
      ErrorCode.CONFIG.INVALID_POLICY_OVERRIDES,
      "RATE_LIMIT_POLICIES does not describe valid policies",
      500,
      {
        variable: "RATE_LIMIT_POLICIES",
        issues: result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`),
      },
    );
  }
  return result.data;
}
