/**
 * Socket handler utilities
 * Provides a createHandler wrapper for consistent validation, error handling, and metrics
 */
import type { z } from "zod";
import type { Socket } from "socket.io";
import { logger } from "../infrastructure/logger.js";
import { metrics } from "../infrastructure/metrics.js";
import { parsePayload } from "../socket/schemas.js";
import { generateCorrelationId } from "./crypto.js";
import { fail, type Result } from "./errors.js";
import type { AppContext } from "../context.js";

/**
 * Handler function signature
 */
type HandlerFn<TPayload> = (
  payload: TPayload,
  socket: Socket,
  context: AppContext,
) => Promise<Result<unknown>>;

/**
 * Callback function signature from Socket.IO
 */
type SocketCallback = (result: Result<unknown>) => void;

/**
 * Create a wrapped socket event handler with:
 * - Zod schema validation (answers MissingRequiredField)
 * - Centralized error handling (thrown errors answer Unavailable)
 * - Logging with correlation IDs
 * - Metrics tracking
 *
 * @example
 * ```typescript
 * export const handleAdvance = createHandler(
 *   'agenda:advance',
 *   advancePointerSchema,
 *   async (payload, socket, context) =>
 *     context.meetingController.advancePointer(payload.meeting_id, payload.current_item),
 * );
 *
 * socket.on('agenda:advance', handleAdvance(socket, context));
 * ```
 */
export function createHandler<TPayload>(
  eventName: string,
  schema: z.ZodType<TPayload, z.ZodTypeDef, unknown>,
  handler: HandlerFn<TPayload>,
) {
  return (socket: Socket, context: AppContext) => {
    return async (rawPayload: unknown, callback?: SocketCallback) => {
      const startTime = Date.now();
      const requestId = generateCorrelationId();
      const observe = (status: string) => {
        metrics.eventsTotal.inc({ event: eventName, status });
        metrics.eventLatency.observe(
          { event: eventName },
          (Date.now() - startTime) / 1000,
        );
      };

      // 1. Validate payload
      const parsed = parsePayload(schema, rawPayload);
      if (!parsed.success) {
        logger.debug(
          {
            requestId,
            event: eventName,
            socketId: socket.id,
            details: parsed.details,
          },
          "Validation failed",
        );
        observe("invalid");
        callback?.(parsed);
        return;
      }

      // 2. Execute handler
      try {
        const result = await handler(parsed.data, socket, context);

        logger.debug(
          {
            requestId,
            event: eventName,
            socketId: socket.id,
            success: result.success,
            durationMs: Date.now() - startTime,
          },
          "Handler completed",
        );
        observe(result.success ? "success" : "rejected");

        callback?.(result);
      } catch (err) {
        logger.error(
          {
            err,
            requestId,
            event: eventName,
            socketId: socket.id,
            durationMs: Date.now() - startTime,
          },
          "Handler exception",
        );
        observe("error");

        callback?.(fail("Unavailable"));
      }
    };
  };
}
