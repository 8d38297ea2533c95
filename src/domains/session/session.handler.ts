import type { Socket } from "socket.io";
import type { AppContext } from "../../context.js";
import { logger } from "../../infrastructure/logger.js";
import { metrics } from "../../infrastructure/metrics.js";
import { createHandler } from "../../shared/handler.utils.js";
import { roomSchema, type RoomPayload } from "../../socket/schemas.js";

const handleJoin = createHandler(
  "join",
  roomSchema,
  async (payload: RoomPayload, socket, context) =>
    context.meetingController.joinSession(socket, payload.meeting_id),
);

const handleLeave = createHandler(
  "leave",
  roomSchema,
  async (payload: RoomPayload, socket, context) =>
    context.meetingController.leaveSession(socket, payload.meeting_id),
);

export const sessionHandler = (socket: Socket, context: AppContext) => {
  metrics.socketConnections.inc();

  socket.on("join", handleJoin(socket, context));
  socket.on("leave", handleLeave(socket, context));

  // A dropped connection leaves every room it was in
  socket.on("disconnect", async (reason) => {
    metrics.socketConnections.dec();
    try {
      const left = await context.hub.disconnect(socket.id);
      logger.info(
        { socketId: socket.id, reason, rooms: left },
        "Socket disconnected",
      );
    } catch (err) {
      logger.error({ err, socketId: socket.id }, "Disconnect cleanup failed");
    }
  });
};
