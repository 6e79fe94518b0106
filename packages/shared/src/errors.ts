export { ErrorCode, type ErrorCodeValue } from "./error-codes.js";
import type { ErrorCodeValue } from "./error-codes.js";

/** The `error` object of a failed HTTP response. */
export interface DonaErrorBody {
  code: ErrorCodeValue;
  message: string;
  status: number;
  requestId?: string;
  metadata?: Record<string, unknown>;
}

/**
 * Thrown by the limiter and collector for bad policies or windows, by
 * `loadConfig` for bad environment variables, and by the Slack routes for
 * unsigned or malformed requests. `status` is the HTTP status the bot
 * answers with when the error reaches a route.
 */
export class DonaError extends Error {
  constructor(
    public readonly code: ErrorCodeValue,
    message: string,
    public readonly status: number,
    public readonly metadata?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "DonaError";
  }

  /** Response body for this error, tagged with the request it failed. */
  toBody(requestId?: string): DonaErrorBody {
    const body: DonaErrorBody = { code: this.code, message: this.message, status: this.status };
    if (requestId) body.requestId = requestId;
    if (this.metadata) body.metadata = this.metadata;
    return body;
  }

  /** `JSON.stringify` hands its property key to `toJSON`, so no request id here. */
  toJSON(): DonaErrorBody {
    return this.toBody();
  }
}

export function isDonaError(err: unknown): err is DonaError {
  return err instanceof DonaError;
}
