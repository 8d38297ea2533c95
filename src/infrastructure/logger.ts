import { pino, stdSerializers } from "pino";
import { config, isDev } from "../config/index.js";

const devTransport = {
  target: "pino-pretty",
  options: {
    translateTime: "HH:MM:ss Z",
    ignore: "pid,hostname,service",
    colorize: true,
  },
};

/**
 * Process-wide logger. Fastify shares this instance, so request logs and
 * meeting logs land in one stream tagged with the same service name.
 */
export const logger = pino({
  level: config.LOG_LEVEL,
  base: { service: "meeting-sync", pid: process.pid },
  serializers: { err: stdSerializers.err },
  ...(isDev && { transport: devTransport }),
});

export type Logger = typeof logger;
