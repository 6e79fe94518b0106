import type { CommandHandler } from "../lib/command-router.js";

export const HELP_TEXT = [
  ":wave: *Hi! I'm Dona, your team's executive assistant.*",
  "",
  "*Available commands:*",
  "• `/dona-help` - Show this help message",
  "• `/dona-limits [command]` - Check your remaining rate limit",
  "• `/dona-metrics [me]` - System metrics (administrators only)",
].join("\n");

export const helpCommand: CommandHandler = ({ respond }) => {
  respond(HELP_TEXT);
};
