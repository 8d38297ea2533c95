/**
 * Meeting Repository - Redis-backed persistence gateway
 *
 * Layout:
 *   meeting:{id}          hash   meeting_id, meeting_name, meeting_code, current_item
 *   meeting:code:{code}   string meeting id (the uniqueness constraint on codes)
 *   meeting:{id}:items    list   JSON agenda items in insertion order
 *
 * Every method is a single Redis command or script, so each call is
 * atomic on its own. A meeting and its code key are written together by
 * one script: either both exist or neither does.
 */
import type { Redis } from "ioredis";
import { z } from "zod";
import type { AgendaItem } from "../agenda/agenda.types.js";
import { decodeAgendaItem } from "../agenda/agenda.codec.js";
import { CorruptRecordError } from "../../shared/errors.js";
import type {
  InsertMeetingOutcome,
  Meeting,
  MeetingUpdatePatch,
} from "./meeting.types.js";

/**
 * Minimal storage surface the meeting controller depends on
 */
export interface MeetingStore {
  insertMeeting(meeting: Meeting): Promise<InsertMeetingOutcome>;
  findMeetingById(meetingId: string): Promise<Meeting | null>;
  findMeetingByCode(code: string): Promise<Meeting | null>;
  updateMeetingFields(meetingId: string, patch: MeetingUpdatePatch): Promise<void>;

  /** Appends the item and returns the new agenda length */
  insertAgendaItem(meetingId: string, item: AgendaItem): Promise<number>;
  listAgendaItems(meetingId: string): Promise<AgendaItem[]>;
  countAgendaItems(meetingId: string): Promise<number>;
}

// Redis key patterns
const MEETING_KEY = (meetingId: string) => `meeting:${meetingId}`;
const CODE_KEY = (code: string) => `meeting:code:${code}`;
const ITEMS_KEY = (meetingId: string) => `meeting:${meetingId}:items`;

// Lua: claim the code and write the meeting hash in one step.
// KEYS: code key, meeting key. ARGV: id, name, code, current_item
const INSERT_MEETING_LUA = `
  if redis.call('exists', KEYS[1]) == 1 then
    return 0
  end
  redis.call('hset', KEYS[2],
    'meeting_id', ARGV[1],
    'meeting_name', ARGV[2],
    'meeting_code', ARGV[3],
    'current_item', ARGV[4])
  redis.call('set', KEYS[1], ARGV[1])
  return 1
`;

const storedMeetingSchema = z.object({
  meeting_id: z.string(),
  meeting_name: z.string(),
  meeting_code: z.string(),
  current_item: z.coerce.number().int().min(0),
});

export class RedisMeetingStore implements MeetingStore {
  constructor(private readonly redis: Redis) {}

  async insertMeeting(meeting: Meeting): Promise<InsertMeetingOutcome> {
    const inserted = await this.redis.eval(
      INSERT_MEETING_LUA,
      2,
      CODE_KEY(meeting.meeting_code),
      MEETING_KEY(meeting.meeting_id),
      meeting.meeting_id,
      meeting.meeting_name,
      meeting.meeting_code,
      String(meeting.current_item),
    );
    return inserted === 1 ? "inserted" : "code_taken";
  }

  async findMeetingById(meetingId: string): Promise<Meeting | null> {
    const key = MEETING_KEY(meetingId);
    const data = await this.redis.hgetall(key);
    // HGETALL answers an empty object for a missing key
    if (Object.keys(data).length === 0) return null;

    const parsed = storedMeetingSchema.safeParse(data);
    if (!parsed.success) {
      throw new CorruptRecordError(key, parsed.error.message);
    }
    return parsed.data;
  }

  async findMeetingByCode(code: string): Promise<Meeting | null> {
    const meetingId = await this.redis.get(CODE_KEY(code));
    if (!meetingId) return null;
    return this.findMeetingById(meetingId);
  }

  async updateMeetingFields(
    meetingId: string,
    patch: MeetingUpdatePatch,
  ): Promise<void> {
    const fields: Record<string, string> = {};
    if (patch.current_item !== undefined) {
      fields.current_item = String(patch.current_item);
    }
    if (Object.keys(fields).length === 0) return;

    await this.redis.hset(MEETING_KEY(meetingId), fields);
  }

  async insertAgendaItem(meetingId: string, item: AgendaItem): Promise<number> {
    return this.redis.rpush(ITEMS_KEY(meetingId), JSON.stringify(item));
  }

  async listAgendaItems(meetingId: string): Promise<AgendaItem[]> {
    const key = ITEMS_KEY(meetingId);
    const raw = await this.redis.lrange(key, 0, -1);

    return raw.map((entry, index) => {
      const decoded = decodeAgendaItem(parseJson(entry));
      if (!decoded.success) {
        throw new CorruptRecordError(`${key}[${index}]`, decoded.message);
      }
      return decoded.data;
    });
  }

  async countAgendaItems(meetingId: string): Promise<number> {
    return this.redis.llen(ITEMS_KEY(meetingId));
  }
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    // Undecodable text fails the codec's type check below
    return null;
  }
}
