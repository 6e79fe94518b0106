import type { EventCallback, SlashCommandPayload } from "./slack-payloads.js";

interface Origin {
  userId?: string;
  channelId?: string;
  teamId?: string;
}

export type RequestClassification =
  | ({ kind: "command"; command: string; text: string } & Origin)
  | ({ kind: "event"; eventType: string } & Origin);

/** Metrics key for a request: `command:/dona-task`, `event:app_mention`. */
export function requestTypeOf(request: RequestClassification): string {
  return request.kind === "command" ? `command:${request.command}` : `event:${request.eventType}`;
}

export function classifyCommand(payload: SlashCommandPayload): RequestClassification {
  return {
    kind: "command",
    command: payload.command,
    text: payload.text,
    userId: payload.user_id,
    channelId: payload.channel_id,
    teamId: payload.team_id,
  };
}

export function classifyEvent(envelope: EventCallback): RequestClassification {
  return {
    kind: "event",
    eventType: envelope.event.type,
    userId: envelope.event.user,
    channelId: envelope.event.channel,
    teamId: envelope.team_id,
  };
}
