import { DonaError, ErrorCode } from "@dona/shared/errors";
import type { FastifyPluginAsync } from "fastify";
import fp from "fastify-plugin";

function asText(body: string | Buffer): string {
  return typeof body === "string" ? body : body.toString("utf8");
}

/**
 * JSON and urlencoded parsers that keep the unparsed body on
 * `request.rawBody` for signature verification.
 */
const bodyParsers: FastifyPluginAsync = async (app) => {
  app.decorateRequest("rawBody", undefined);

  app.removeContentTypeParser("application/json");
  app.addContentTypeParser("application/json", { parseAs: "string" }, (request, body, done) => {
    const text = asText(body);
    request.rawBody = text;
    if (text.length === 0) {
      done(null, {});
      return;
    }
    try {
      done(null, JSON.parse(text));
    } catch {
      done(
        new DonaError(ErrorCode.BOT.INVALID_EVENT_PAYLOAD, "Request body is not valid JSON", 400),
        undefined,
      );
    }
  });

  app.addContentTypeParser(
    "application/x-www-form-urlencoded",
    { parseAs: "string" },
    (request, body, done) => {
      const text = asText(body);
      request.rawBody = text;
      done(null, Object.fromEntries(new URLSearchParams(text)));
    },
  );
};

export const bodyParsersPlugin = fp(bodyParsers, { name: "body-parsers" });
