/**
 * Agenda Domain - Barrel Export
 */
export {
  decodeAgendaItem,
  isAgendaItemType,
  summarizeAgendaItem,
} from "./agenda.codec.js";

export { AGENDA_ITEM_TYPES } from "./agenda.types.js";
export type {
  AgendaItem,
  AgendaItemType,
  ElectionItem,
  MotionItem,
  InfoItem,
  BaseMotion,
} from "./agenda.types.js";
