import type { Socket } from "socket.io";
import type { AppContext } from "../../context.js";
import { createHandler } from "../../shared/handler.utils.js";
import {
  addAgendaItemSchema,
  advancePointerSchema,
  createMeetingSchema,
  roomSchema,
  type AddAgendaItemPayload,
  type AdvancePointerPayload,
  type CreateMeetingPayload,
  type RoomPayload,
} from "../../socket/schemas.js";

const handleCreate = createHandler(
  "meeting:create",
  createMeetingSchema,
  async (payload: CreateMeetingPayload, _socket, context) =>
    context.meetingController.createMeeting(payload.meeting_name),
);

const handleGet = createHandler(
  "meeting:get",
  roomSchema,
  async (payload: RoomPayload, _socket, context) =>
    context.meetingController.getMeeting(payload.meeting_id),
);

const handleAddItem = createHandler(
  "agenda:add",
  addAgendaItemSchema,
  async (payload: AddAgendaItemPayload, _socket, context) =>
    context.meetingController.addAgendaItem(payload.meeting_id, payload.item),
);

const handleAdvance = createHandler(
  "agenda:advance",
  advancePointerSchema,
  async (payload: AdvancePointerPayload, _socket, context) =>
    context.meetingController.advancePointer(
      payload.meeting_id,
      payload.current_item,
    ),
);

export const meetingHandler = (socket: Socket, context: AppContext) => {
  socket.on("meeting:create", handleCreate(socket, context));
  socket.on("meeting:get", handleGet(socket, context));
  socket.on("agenda:add", handleAddItem(socket, context));
  socket.on("agenda:advance", handleAdvance(socket, context));
};
