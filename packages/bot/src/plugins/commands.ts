import { DonaError, ErrorCode } from "@dona/shared/errors";
import type { FastifyPluginAsync } from "fastify";
import fp from "fastify-plugin";
import type { Responder } from "../lib/admission.js";
import { classifyCommand } from "../lib/classify.js";
import { SlashCommandPayload } from "../lib/slack-payloads.js";
import { verifySlackRequest } from "./slack-auth.js";

const commandsRoute: FastifyPluginAsync = async (app) => {
  app.post("/slack/commands", { preHandler: [verifySlackRequest] }, async (request, reply) => {
    const parsed = SlashCommandPayload.safeParse(request.body);
    if (!parsed.success) {
      throw new DonaError(
        ErrorCode.BOT.INVALID_SLASH_COMMAND,
        "Invalid slash command payload",
        400,
        { issues: parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`) },
      );
    }
    const payload = parsed.data;

    // The HTTP response is the acknowledgement; replies ride along in its body.
    const messages: string[] = [];
    const responder: Responder = {
      ack: () => {},
      respond: (text) => {
        messages.push(text);
      },
    };

    await app.admission.run(classifyCommand(payload), responder, () =>
      app.commandRouter.dispatch(payload, responder.respond),
    );

    if (messages.length === 0) {
      return reply.status(200).send();
    }
    return reply.status(200).send({ response_type: "ephemeral", text: messages.join("\n\n") });
  });
};

export const commandsPlugin = fp(commandsRoute, { name: "commands" });
