import { DonaError, ErrorCode } from "@dona/shared/errors";
import type { FastifyPluginAsync } from "fastify";
import fp from "fastify-plugin";
import type { Responder } from "../lib/admission.js";
import { classifyEvent } from "../lib/classify.js";
import { SlackEventEnvelope } from "../lib/slack-payloads.js";
import { verifySlackRequest } from "./slack-auth.js";

const eventsRoute: FastifyPluginAsync = async (app) => {
  app.post("/slack/events", { preHandler: [verifySlackRequest] }, async (request, reply) => {
    const parsed = SlackEventEnvelope.safeParse(request.body);
    if (!parsed.success) {
      throw new DonaError(ErrorCode.BOT.INVALID_EVENT_PAYLOAD, "Invalid Events API payload", 400, {
        issues: parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`),
      });
    }
    const envelope = parsed.data;

    if (envelope.type === "url_verification") {
      return reply.status(200).send({ challenge: envelope.challenge });
    }

    // Events are never throttled, so nothing is ever said back here.
    const responder: Responder = {
      ack: () => {},
      respond: (text) => {
        request.log.warn({ eventType: envelope.event.type, text }, "Dropped reply to event");
      },
    };

    await app.admission.run(classifyEvent(envelope), responder, () =>
      app.eventRouter.dispatch(envelope.event),
    );

    return reply.status(200).send();
  });
};

export const eventsPlugin = fp(eventsRoute, { name: "events" });
