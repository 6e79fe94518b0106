import type { FastifyPluginAsync } from "fastify";
import fp from "fastify-plugin";

const metricsRoute: FastifyPluginAsync = async (app) => {
  app.get("/metrics", async (_request, reply) => {
    return reply.status(200).send({
      summary: app.metrics.getSummary(),
      rateLimiter: app.rateLimiter?.getStats() ?? null,
    });
  });
};

export const metricsPlugin = fp(metricsRoute, { name: "metrics" });
