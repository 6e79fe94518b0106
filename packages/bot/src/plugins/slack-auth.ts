import type { FastifyRequest } from "fastify";
import { verifySlackSignature } from "../lib/slack-signature.js";

function header(request: FastifyRequest, name: string): string | undefined {
  const value = request.headers[name];
  return Array.isArray(value) ? value[0] : value;
}

/**
 * preHandler for Slack routes. A no-op when the app was built without a
 * signing secret.
 */
export async function verifySlackRequest(request: FastifyRequest): Promise<void> {
  const secret = request.server.signingSecret;
  if (!secret) return;

  verifySlackSignature(secret, {
    timestamp: header(request, "x-slack-request-timestamp"),
    signature: header(request, "x-slack-signature"),
    body: request.rawBody ?? "",
  });
}
