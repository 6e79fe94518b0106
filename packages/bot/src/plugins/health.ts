import type { FastifyPluginAsync } from "fastify";
import fp from "fastify-plugin";

interface HealthResponse {
  status: "ok";
  uptimeSeconds: number;
  activeBuckets: number;
}

const healthRoute: FastifyPluginAsync = async (app) => {
  app.get("/health", async (_request, reply) => {
    const response: HealthResponse = {
      status: "ok",
      uptimeSeconds: Math.floor(process.uptime()),
      activeBuckets: app.rateLimiter?.bucketCount ?? 0,
    };

    return reply.status(200).send(response);
  });
};

export const healthPlugin = fp(healthRoute, { name: "health" });
