/**
 * Meeting Domain - Barrel Export
 */
export { MeetingController } from "./meeting.controller.js";
export type { MeetingControllerOptions } from "./meeting.controller.js";
export { IdentifierService } from "./identifier.service.js";
export { RedisMeetingStore } from "./meeting.repository.js";
export type { MeetingStore } from "./meeting.repository.js";
export { serializeMeeting } from "./meeting.serializer.js";
export { meetingHandler } from "./meeting.handler.js";
export { createMeetingRoutes, statusForError } from "./meeting.routes.js";
export type {
  Meeting,
  MeetingView,
  MeetingUpdatePatch,
  AgendaItemAdded,
  PointerChanged,
  InsertMeetingOutcome,
} from "./meeting.types.js";
