/**
 * Error catalog. Every error that reaches a log line or an HTTP response
 * carries one of these codes.
 *
 * Ranges:
 * - 1000–1999 configuration (raised at startup, never on the request path)
 * - 2000–2999 bot service (Slack transport, payload validation)
 */
export const ErrorCode = {
  CONFIG: {
    INVALID_RATE_LIMIT_POLICY: "DONA-1000",
    INVALID_METRICS_WINDOW: "DONA-1001",
    INVALID_REPORT_INTERVAL: "DONA-1002",
    REQUIRED_ENV_VAR_MISSING: "DONA-1010",
    INVALID_ENV_VAR: "DONA-1011",
    INVALID_POLICY_OVERRIDES: "DONA-1012",
  },
  BOT: {
    BAD_REQUEST: "DONA-2000",
    INVALID_SLASH_COMMAND: "DONA-2001",
    INVALID_EVENT_PAYLOAD: "DONA-2002",
    MISSING_SIGNATURE: "DONA-2010",
    STALE_SIGNATURE: "DONA-2011",
    INVALID_SIGNATURE: "DONA-2012",
    INTERNAL_ERROR: "DONA-2999",
  },
} as const;

type ErrorGroups = typeof ErrorCode;

export type ErrorCodeValue = {
  [G in keyof ErrorGroups]: ErrorGroups[G][keyof ErrorGroups[G]];
}[keyof ErrorGroups];
