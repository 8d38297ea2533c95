import type { Server } from "socket.io";
import { logger } from "../infrastructure/logger.js";
import { registerAllDomains } from "../domains/index.js";
import type { AppContext } from "../context.js";

export function initializeSocket(io: Server, context: AppContext): void {
  io.on("connection", (socket) => {
    logger.info({ socketId: socket.id }, "Socket connected");
    registerAllDomains(socket, context);
  });
}
