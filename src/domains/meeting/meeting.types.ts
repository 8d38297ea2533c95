/**
 * Meeting domain types
 */
import type { AgendaItem } from "../agenda/agenda.types.js";

export interface Meeting {
  meeting_id: string;
  meeting_name: string;
  /** Six-digit lookup alias, unique among stored meetings */
  meeting_code: string;
  /** Zero-based pointer into the agenda */
  current_item: number;
}

/** Fields that may change after creation */
export type MeetingUpdatePatch = Partial<Pick<Meeting, "current_item">>;

/** Meeting record joined with its ordered agenda */
export interface MeetingView extends Meeting {
  items: AgendaItem[];
}

export interface AgendaItemAdded {
  meeting_id: string;
  /** Position of the new item in the agenda */
  index: number;
  item: AgendaItem;
}

export interface PointerChanged {
  meeting_id: string;
  current_item: number;
}

export type InsertMeetingOutcome = "inserted" | "code_taken";
