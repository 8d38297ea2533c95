import type { AgendaItem } from "@src/domains/agenda/agenda.types.js";
import type { MeetingStore } from "@src/domains/meeting/meeting.repository.js";
import type {
  InsertMeetingOutcome,
  Meeting,
  MeetingUpdatePatch,
} from "@src/domains/meeting/meeting.types.js";

/**
 * In-process stand-in for the Redis store. Records are copied on the way
 * in and out so callers cannot mutate stored state by reference.
 */
export class InMemoryMeetingStore implements MeetingStore {
  private meetings = new Map<string, Meeting>();
  private codes = new Map<string, string>();
  private items = new Map<string, AgendaItem[]>();

  async insertMeeting(meeting: Meeting): Promise<InsertMeetingOutcome> {
    if (this.codes.has(meeting.meeting_code)) return "code_taken";
    this.codes.set(meeting.meeting_code, meeting.meeting_id);
    this.meetings.set(meeting.meeting_id, { ...meeting });
    return "inserted";
  }

  async findMeetingById(meetingId: string): Promise<Meeting | null> {
    const meeting = this.meetings.get(meetingId);
    return meeting ? { ...meeting } : null;
  }

  async findMeetingByCode(code: string): Promise<Meeting | null> {
    const meetingId = this.codes.get(code);
    return meetingId ? this.findMeetingById(meetingId) : null;
  }

  async updateMeetingFields(
    meetingId: string,
    patch: MeetingUpdatePatch,
  ): Promise<void> {
    const meeting = this.meetings.get(meetingId);
    if (!meeting) return;
    this.meetings.set(meetingId, { ...meeting, ...patch });
  }

  async insertAgendaItem(meetingId: string, item: AgendaItem): Promise<number> {
    const list = this.items.get(meetingId) ?? [];
    list.push(structuredClone(item));
    this.items.set(meetingId, list);
    return list.length;
  }

  async listAgendaItems(meetingId: string): Promise<AgendaItem[]> {
    return structuredClone(this.items.get(meetingId) ?? []);
  }

  async countAgendaItems(meetingId: string): Promise<number> {
    return this.items.get(meetingId)?.length ?? 0;
  }
}
