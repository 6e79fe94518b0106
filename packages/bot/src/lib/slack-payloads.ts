import { SlackUserId, SlashCommandName } from "@dona/shared/validation";
import { z } from "zod";

/** Slash command form fields. Unknown fields are dropped. */
export const SlashCommandPayload = z.object({
  command: SlashCommandName,
  text: z.string().default(""),
  user_id: SlackUserId.optional(),
  user_name: z.string().optional(),
  channel_id: z.string().optional(),
  team_id: z.string().optional(),
  response_url: z.string().url().optional(),
  trigger_id: z.string().optional(),
});
export type SlashCommandPayload = z.infer<typeof SlashCommandPayload>;

export const SlackEvent = z
  .object({
    type: z.string().min(1),
    user: z.string().optional(),
    channel: z.string().optional(),
    text: z.string().optional(),
    ts: z.string().optional(),
  })
  .passthrough();
export type SlackEvent = z.infer<typeof SlackEvent>;

export const UrlVerification = z.object({
  type: z.literal("url_verification"),
  challenge: z.string(),
});

export const EventCallback = z.object({
  type: z.literal("event_callback"),
  team_id: z.string().optional(),
  event_id: z.string().optional(),
  event: SlackEvent,
});
export type EventCallback = z.infer<typeof EventCallback>;

/** Events API envelope. */
export const SlackEventEnvelope = z.discriminatedUnion("type", [UrlVerification, EventCallback]);
export type SlackEventEnvelope = z.infer<typeof SlackEventEnvelope>;
