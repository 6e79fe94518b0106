import type { SlackEvent } from "./slack-payloads.js";

export type EventHandler = (event: SlackEvent) => void | Promise<void>;

/**
 * Fans an Events API event out to the handlers registered for its type.
 * Events nobody listens to are ignored.
 */
export class EventRouter {
  private readonly handlers = new Map<string, EventHandler[]>();

  on(eventType: string, handler: EventHandler): this {
    const existing = this.handlers.get(eventType);
    if (existing) {
      existing.push(handler);
    } else {
      this.handlers.set(eventType, [handler]);
    }
    return this;
  }

  async dispatch(event: SlackEvent): Promise<void> {
    for (const handler of this.handlers.get(event.type) ?? []) {
      await handler(event);
    }
  }
}
