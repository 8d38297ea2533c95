import type { FastifyPluginAsync } from "fastify";
import type { Redis } from "ioredis";
import type { SessionHub } from "../domains/session/session.hub.js";

export const createHealthRoutes = (
  redis: Pick<Redis, "status">,
  hub: SessionHub,
): FastifyPluginAsync => {
  return async (fastify) => {
    fastify.get("/health", async (_request, reply) => {
      const redisOk = redis.status === "ready";
      const status = redisOk ? "ok" : "degraded";

      if (status !== "ok") {
        reply.code(503);
      }

      return {
        status,
        redis: redis.status,
        rooms: hub.getRoomCount(),
        uptime: process.uptime(),
        timestamp: new Date().toISOString(),
      };
    });
  };
};
