/**
 * Session Domain - Barrel Export
 */
export { SessionHub } from "./session.hub.js";
export { sessionHandler } from "./session.handler.js";
export { RoomEvents, createSocketIoEmitter } from "./session.types.js";
export type {
  HubConnection,
  RoomEmitter,
  RoomEventName,
  StatusNotice,
} from "./session.types.js";
