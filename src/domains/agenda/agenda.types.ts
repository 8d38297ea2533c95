/**
 * Agenda domain types
 */

export const AGENDA_ITEM_TYPES = ["election", "motion", "info"] as const;

export type AgendaItemType = (typeof AGENDA_ITEM_TYPES)[number];

export interface ElectionItem {
  type: "election";
  title: string;
  /** Candidate position names, in ballot order */
  positions: string[];
}

export interface BaseMotion {
  owner: string;
  motion: string;
}

export interface MotionItem {
  type: "motion";
  title: string;
  description: string;
  baseMotions: BaseMotion[];
}

export interface InfoItem {
  type: "info";
  title: string;
  description: string;
}

export type AgendaItem = ElectionItem | MotionItem | InfoItem;
