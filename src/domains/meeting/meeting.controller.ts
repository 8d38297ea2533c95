/**
 * Meeting State Controller
 *
 * Orchestrates every meeting operation: validate, commit through the
 * store, then notify the meeting's room. A broadcast runs only after its
 * write has been persisted, and a failed broadcast never undoes the write;
 * observers that missed it catch up on their next fetch or join.
 *
 * The pointer bounds check reads the agenda length and then writes
 * without a lock. Agendas only grow, so an index that passed the check
 * stays valid while concurrent inserts land.
 */
import type { Logger } from "../../infrastructure/logger.js";
import { metrics } from "../../infrastructure/metrics.js";
import {
  fail,
  ok,
  MeetingCodeExhaustedError,
  type Result,
} from "../../shared/errors.js";
import { decodeAgendaItem, summarizeAgendaItem } from "../agenda/agenda.codec.js";
import type { AgendaItem } from "../agenda/agenda.types.js";
import type { SessionHub } from "../session/session.hub.js";
import {
  RoomEvents,
  type HubConnection,
  type RoomEventName,
} from "../session/session.types.js";
import type { IdentifierService } from "./identifier.service.js";
import type { MeetingStore } from "./meeting.repository.js";
import { serializeMeeting } from "./meeting.serializer.js";
import type {
  AgendaItemAdded,
  Meeting,
  MeetingView,
  PointerChanged,
} from "./meeting.types.js";

export interface MeetingControllerOptions {
  /** Insert attempts when a concurrent creation claims the same code */
  maxCreateAttempts: number;
}

export class MeetingController {
  constructor(
    private readonly store: MeetingStore,
    private readonly ids: IdentifierService,
    private readonly hub: SessionHub,
    private readonly logger: Logger,
    private readonly options: MeetingControllerOptions,
  ) {}

  async createMeeting(meetingName: string): Promise<Result<MeetingView>> {
    const name = meetingName.trim();
    if (name === "") return fail("MissingRequiredField", { field: "meeting_name" });

    const meetingId = this.ids.newMeetingId();

    for (let attempt = 1; attempt <= this.options.maxCreateAttempts; attempt++) {
      const meeting: Meeting = {
        meeting_id: meetingId,
        meeting_name: name,
        meeting_code: await this.ids.newMeetingCode(),
        current_item: 0,
      };

      const outcome = await this.store.insertMeeting(meeting);
      if (outcome === "inserted") {
        metrics.meetingsCreated.inc();
        this.logger.info(
          { meetingId, meetingCode: meeting.meeting_code },
          "Meeting created",
        );
        return ok(serializeMeeting(meeting, []));
      }

      metrics.codeCollisions.inc();
      this.logger.warn(
        { meetingId, meetingCode: meeting.meeting_code, attempt },
        "Meeting code claimed concurrently, drawing another",
      );
    }

    throw new MeetingCodeExhaustedError(this.options.maxCreateAttempts);
  }

  async getMeeting(meetingId: string): Promise<Result<MeetingView>> {
    const found = await this.findMeeting(meetingId);
    if (!found.success) return found;

    const items = await this.store.listAgendaItems(found.data.meeting_id);
    return ok(serializeMeeting(found.data, items));
  }

  async listAgendaItems(meetingId: string): Promise<Result<AgendaItem[]>> {
    const found = await this.findMeeting(meetingId);
    if (!found.success) return found;

    return ok(await this.store.listAgendaItems(found.data.meeting_id));
  }

  async addAgendaItem(
    meetingId: string,
    rawItem: unknown,
  ): Promise<Result<AgendaItemAdded>> {
    const found = await this.findMeeting(meetingId);
    if (!found.success) return found;

    const decoded = decodeAgendaItem(rawItem);
    if (!decoded.success) return decoded;

    const id = found.data.meeting_id;
    const length = await this.store.insertAgendaItem(id, decoded.data);
    const added: AgendaItemAdded = {
      meeting_id: id,
      index: length - 1,
      item: decoded.data,
    };

    this.logger.info(
      { meetingId: id, index: added.index, item: summarizeAgendaItem(decoded.data) },
      "Agenda item added",
    );

    await this.notify(id, RoomEvents.AGENDA_ITEM_ADDED, {
      meeting_id: id,
      item: decoded.data,
    });
    return ok(added);
  }

  async advancePointer(
    meetingId: string,
    newIndex: unknown,
  ): Promise<Result<MeetingView>> {
    const found = await this.findMeeting(meetingId);
    if (!found.success) return found;

    if (
      typeof newIndex !== "number" ||
      !Number.isInteger(newIndex) ||
      newIndex < 0
    ) {
      return fail("InvalidIndex", { current_item: newIndex });
    }

    const id = found.data.meeting_id;
    const count = await this.store.countAgendaItems(id);
    if (newIndex >= count) {
      return fail("IndexOutOfRange", {
        max_valid_index: Math.max(count - 1, 0),
        agenda_items: count,
      });
    }

    await this.store.updateMeetingFields(id, { current_item: newIndex });
    const items = await this.store.listAgendaItems(id);
    const view = serializeMeeting({ ...found.data, current_item: newIndex }, items);

    this.logger.info(
      { meetingId: id, from: found.data.current_item, to: newIndex },
      "Agenda pointer advanced",
    );

    const pointer: PointerChanged = { meeting_id: id, current_item: newIndex };
    // Emitted in call order: pointer change first, then the snapshot
    await Promise.all([
      this.notify(id, RoomEvents.NEXT_AGENDA_ITEM, pointer),
      this.notify(id, RoomEvents.MEETING_UPDATED, view),
    ]);
    return ok(view);
  }

  /**
   * Resolve a six-digit code. An unknown code is a normal outcome and
   * answers `null`, not an error.
   */
  async lookupByCode(
    code: string,
  ): Promise<Result<{ meeting_id: string } | null>> {
    const valid = this.ids.validateCode(code);
    if (!valid.success) return valid;

    const meeting = await this.store.findMeetingByCode(valid.data);
    return ok(meeting ? { meeting_id: meeting.meeting_id } : null);
  }

  /**
   * Place a connection in a meeting's room and hand back the current
   * projection so it starts from a consistent view.
   */
  async joinSession(
    connection: HubConnection,
    meetingId: string,
  ): Promise<Result<MeetingView>> {
    const view = await this.getMeeting(meetingId);
    if (!view.success) return view;

    await this.hub.join(connection, view.data.meeting_id);
    return view;
  }

  async leaveSession(
    connection: HubConnection,
    meetingId: string,
  ): Promise<Result<{ meeting_id: string; left: boolean }>> {
    const valid = this.ids.validateId(meetingId);
    if (!valid.success) return valid;

    const left = await this.hub.leave(connection, valid.data);
    return ok({ meeting_id: valid.data, left });
  }

  private async findMeeting(meetingId: string): Promise<Result<Meeting>> {
    const valid = this.ids.validateId(meetingId);
    if (!valid.success) return valid;

    const meeting = await this.store.findMeetingById(valid.data);
    if (!meeting) return fail("MeetingNotFound", { meeting_id: valid.data });
    return ok(meeting);
  }

  private async notify(
    meetingId: string,
    event: RoomEventName,
    payload: unknown,
  ): Promise<void> {
    try {
      await this.hub.broadcast(meetingId, event, payload);
    } catch (err) {
      this.logger.warn(
        { err, meetingId, event },
        "Broadcast failed after commit; observers will resync on next fetch",
      );
    }
  }
}
