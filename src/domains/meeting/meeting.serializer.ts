import type { AgendaItem } from "../agenda/agenda.types.js";
import type { Meeting, MeetingView } from "./meeting.types.js";

/**
 * Combine a meeting record with its agenda into the projection
 * returned by fetches and pushed as `meeting_updated`.
 */
export function serializeMeeting(
  meeting: Meeting,
  items: AgendaItem[],
): MeetingView {
  return {
    meeting_id: meeting.meeting_id,
    meeting_name: meeting.meeting_name,
    current_item: meeting.current_item,
    meeting_code: meeting.meeting_code,
    items,
  };
}
