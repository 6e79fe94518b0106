import type { Logger } from "@dona/throttle";
import type { EventHandler } from "../lib/event-router.js";

const DONE_REACTION = "white_check_mark";

/** `reaction_added`: a ✅ on a message is logged as a finished task. */
export function reactionAddedHandler(logger: Logger): EventHandler {
  return (event) => {
    const reaction = typeof event.reaction === "string" ? event.reaction : undefined;

    if (reaction === DONE_REACTION) {
      logger.info({ user: event.user, channel: event.channel }, "Task marked done");
    }
    logger.debug({ user: event.user, reaction }, "Reaction added");
  };
}
