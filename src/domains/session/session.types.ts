/**
 * Session domain types
 */
import type { Server } from "socket.io";

/** Events pushed to room members */
export const RoomEvents = {
  STATUS: "status",
  AGENDA_ITEM_ADDED: "agenda_item_added",
  NEXT_AGENDA_ITEM: "Next Agenda Item",
  MEETING_UPDATED: "meeting_updated",
} as const;

export type RoomEventName = (typeof RoomEvents)[keyof typeof RoomEvents];

/**
 * A participant connection that can be placed in rooms.
 * A Socket.IO socket satisfies this directly.
 */
export interface HubConnection {
  readonly id: string;
  join(room: string): unknown;
  leave(room: string): unknown;
}

/** Delivers one event to every current member of a room */
export interface RoomEmitter {
  emit(room: string, event: RoomEventName, payload: unknown): void;
}

export interface StatusNotice {
  meeting_id: string;
  connection_id: string;
  action: "joined" | "left";
  /** Members on this process after the change */
  members: number;
  msg: string;
}

export function createSocketIoEmitter(io: Server): RoomEmitter {
  return {
    emit: (room, event, payload) => {
      io.to(room).emit(event, payload);
    },
  };
}
