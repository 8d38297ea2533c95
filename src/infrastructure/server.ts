import Fastify from "fastify";
import type { FastifyError } from "fastify";
import { Server } from "socket.io";
import { createAdapter } from "@socket.io/redis-adapter";
import type { Redis } from "ioredis";
import { config } from "../config/index.js";
import { createAppContext, type AppContext } from "../context.js";
import { createMeetingRoutes } from "../domains/meeting/meeting.routes.js";
import { RedisMeetingStore } from "../domains/meeting/meeting.repository.js";
import { createSocketIoEmitter } from "../domains/session/session.types.js";
import { fail } from "../shared/errors.js";
import { initializeSocket } from "../socket/index.js";
import { createHealthRoutes } from "./health.js";
import { logger } from "./logger.js";
import { createMetricsRoutes } from "./metrics.js";
import { getRedisClient } from "./redis.js";

/**
 * Fastify instance sharing the app logger. Framework errors below 500
 * (malformed JSON, wrong content type) answer with the request-shape
 * error; anything else is an outage.
 */
export function createHttpServer() {
  const fastify = Fastify({ loggerInstance: logger });

  fastify.setErrorHandler<FastifyError>((error, request, reply) => {
    const statusCode = error.statusCode ?? 500;
    if (statusCode < 500) {
      reply.code(statusCode).send(fail("MissingRequiredField", { field: "body" }));
      return;
    }

    request.log.error({ err: error, url: request.url }, "Request failed");
    reply.code(503).send(fail("Unavailable"));
  });

  return fastify;
}

export type HttpServer = ReturnType<typeof createHttpServer>;

export async function registerRoutes(
  fastify: HttpServer,
  context: AppContext,
  redis: Pick<Redis, "status">,
): Promise<void> {
  await fastify.register(createMeetingRoutes(context.meetingController));
  await fastify.register(createHealthRoutes(redis, context.hub));
  await fastify.register(createMetricsRoutes(context.hub));
}

export interface BootstrapResult {
  server: HttpServer;
  io: Server;
  subClient: Redis;
  context: AppContext;
}

export async function bootstrapServer(): Promise<BootstrapResult> {
  const server = createHttpServer();

  // Redis adapter fans room broadcasts out across instances
  const pubClient = getRedisClient();
  const subClient = pubClient.duplicate();

  const io = new Server(server.server, {
    cors: {
      origin: [...config.CORS_ORIGINS],
      methods: ["GET", "POST"],
      credentials: true,
    },
    adapter: createAdapter(pubClient, subClient),
  });

  const context = createAppContext({
    store: new RedisMeetingStore(pubClient),
    emitter: createSocketIoEmitter(io),
    logger,
    maxCodeAttempts: config.MEETING_CODE_MAX_ATTEMPTS,
  });

  await registerRoutes(server, context, pubClient);
  initializeSocket(io, context);

  return { server, io, subClient, context };
}
