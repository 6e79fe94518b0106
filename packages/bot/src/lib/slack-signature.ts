import { createHmac, timingSafeEqual } from "node:crypto";
import { DonaError, ErrorCode } from "@dona/shared/errors";

const VERSION = "v0";
export const MAX_SIGNATURE_AGE_SECONDS = 300;

/** `v0=` + hex HMAC-SHA256 of `v0:<timestamp>:<body>`. */
export function signSlackRequest(secret: string, timestamp: string, body: string): string {
  const digest = createHmac("sha256", secret).update(`${VERSION}:${timestamp}:${body}`).digest("hex");
  return `${VERSION}=${digest}`;
}

export interface SignedRequest {
  timestamp: string | undefined;
  signature: string | undefined;
  body: string;
}

/**
 * Throws a 401 `DonaError` unless the request carries a fresh signature made
 * with `secret`.
 */
export function verifySlackSignature(
  secret: string,
  request: SignedRequest,
  now: number = Date.now(),
): void {
  const { timestamp, signature, body } = request;
  if (!timestamp || !signature) {
    throw new DonaError(ErrorCode.BOT.MISSING_SIGNATURE, "Slack signature headers are required", 401);
  }

  const sentAt = Number(timestamp);
  if (!Number.isInteger(sentAt) || Math.abs(now / 1000 - sentAt) > MAX_SIGNATURE_AGE_SECONDS) {
    throw new DonaError(ErrorCode.BOT.STALE_SIGNATURE, "Slack request timestamp is too old", 401, {
      timestamp,
    });
  }

  const expected = Buffer.from(signSlackRequest(secret, timestamp, body));
  const received = Buffer.from(signature);
  if (expected.length !== received.length || !timingSafeEqual(expected, received)) {
    throw new DonaError(ErrorCode.BOT.INVALID_SIGNATURE, "Slack signature mismatch", 401);
  }
}
