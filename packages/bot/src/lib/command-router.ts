import type { SlashCommandPayload } from "./slack-payloads.js";

export type Respond = (text: string) => void;

export interface CommandContext {
  payload: SlashCommandPayload;
  respond: Respond;
}

export type CommandHandler = (context: CommandContext) => void | Promise<void>;

/** Maps slash command names to handlers. */
export class CommandRouter {
  private readonly handlers = new Map<string, CommandHandler>();

  register(command: string, handler: CommandHandler): this {
    this.handlers.set(command, handler);
    return this;
  }

  has(command: string): boolean {
    return this.handlers.has(command);
  }

  get commands(): string[] {
    return [...this.handlers.keys()];
  }

  async dispatch(payload: SlashCommandPayload, respond: Respond): Promise<void> {
    const handler = this.handlers.get(payload.command);
    if (!handler) {
      respond(`Sorry, I don't know the command \`${payload.command}\`.`);
      return;
    }
    await handler({ payload, respond });
  }
}
