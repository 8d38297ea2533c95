/**
 * Prometheus-compatible metrics for observability
 * Provides both JSON metrics (/metrics) and Prometheus format (/metrics/prometheus)
 */
import type { FastifyPluginAsync } from "fastify";
import os from "os";
import {
  Counter,
  Gauge,
  Histogram,
  Registry,
  collectDefaultMetrics,
} from "prom-client";
import type { SessionHub } from "../domains/session/session.hub.js";

// Create a custom registry
export const metricsRegistry = new Registry();

// Add default Node.js metrics (memory, CPU, event loop, etc.)
collectDefaultMetrics({ register: metricsRegistry });

/**
 * Application-specific metrics
 */
export const metrics = {
  // Socket Connections
  socketConnections: new Gauge({
    name: "meeting_sync_socket_connections_total",
    help: "Current number of active socket connections",
    registers: [metricsRegistry],
  }),

  // Rooms with at least one member on this process
  roomsActive: new Gauge({
    name: "meeting_sync_rooms_active",
    help: "Number of meeting rooms with connected members",
    registers: [metricsRegistry],
  }),

  // Socket event processing
  eventsTotal: new Counter({
    name: "meeting_sync_socket_events_total",
    help: "Total number of socket events processed",
    labelNames: ["event", "status"] as const,
    registers: [metricsRegistry],
  }),

  eventLatency: new Histogram({
    name: "meeting_sync_socket_event_latency_seconds",
    help: "Socket event processing latency in seconds",
    labelNames: ["event"] as const,
    buckets: [0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5],
    registers: [metricsRegistry],
  }),

  // Room broadcasts
  broadcastsTotal: new Counter({
    name: "meeting_sync_broadcasts_total",
    help: "Room broadcasts by event and outcome",
    labelNames: ["event", "status"] as const, // delivered, failed
    registers: [metricsRegistry],
  }),

  meetingsCreated: new Counter({
    name: "meeting_sync_meetings_created_total",
    help: "Total meetings created",
    registers: [metricsRegistry],
  }),

  codeCollisions: new Counter({
    name: "meeting_sync_code_collisions_total",
    help: "Meeting codes rejected at insert because another meeting claimed them",
    registers: [metricsRegistry],
  }),
};

/**
 * Metrics Fastify routes plugin
 */
export const createMetricsRoutes = (hub: SessionHub): FastifyPluginAsync => {
  return async (fastify) => {
    fastify.get("/metrics/prometheus", async (_request, reply) => {
      reply.header("Content-Type", metricsRegistry.contentType);
      return metricsRegistry.metrics();
    });

    fastify.get("/metrics", async () => {
      const memoryUsage = process.memoryUsage();

      return {
        system: {
          uptime: process.uptime(),
          memory: {
            rss: memoryUsage.rss,
            heapTotal: memoryUsage.heapTotal,
            heapUsed: memoryUsage.heapUsed,
            external: memoryUsage.external,
          },
          cpu: process.cpuUsage(),
          loadAverage: os.loadavg(),
        },
        application: {
          rooms: hub.getRoomCount(),
          roomMembers: hub.getRoomMemberCount(),
        },
        timestamp: new Date().toISOString(),
      };
    });
  };
};
