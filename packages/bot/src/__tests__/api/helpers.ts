import { signSlackRequest } from "../../lib/slack-signature.js";

export const SECRET = "test-secret";

export function commandBody(fields: Record<string, string>): string {
  return new URLSearchParams({
    text: "",
    user_id: "U1",
    channel_id: "C1",
    team_id: "T1",
    ...fields,
  }).toString();
}

export function signedHeaders(body: string, contentType: string): Record<string, string> {
  const timestamp = String(Math.floor(Date.now() / 1000));
  return {
    "content-type": contentType,
    "x-slack-request-timestamp": timestamp,
    "x-slack-signature": signSlackRequest(SECRET, timestamp, body),
  };
}
