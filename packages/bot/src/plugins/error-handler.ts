import { DonaError, ErrorCode, isDonaError } from "@dona/shared/errors";
import type { FastifyError, FastifyPluginAsync } from "fastify";
import fp from "fastify-plugin";

const errorHandler: FastifyPluginAsync = async (app) => {
  app.setErrorHandler<FastifyError>((error, request, reply) => {
    if (isDonaError(error)) {
      return reply.status(error.status).send({ error: error.toBody(request.id) });
    }

    // Fastify's own client errors (unsupported media type, body too large, ...)
    if (typeof error.statusCode === "number" && error.statusCode >= 400 && error.statusCode < 500) {
      const badRequest = new DonaError(ErrorCode.BOT.BAD_REQUEST, error.message, error.statusCode, {
        fastifyCode: error.code,
      });
      return reply.status(error.statusCode).send({ error: badRequest.toBody(request.id) });
    }

    request.log.error({ err: error }, "Unhandled error");
    const fallback = new DonaError(ErrorCode.BOT.INTERNAL_ERROR, "Internal server error", 500);
    return reply.status(500).send({ error: fallback.toBody(request.id) });
  });
};

export const errorHandlerPlugin = fp(errorHandler, { name: "error-handler" });
