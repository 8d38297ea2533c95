/**
 * Session Broadcast Hub
 *
 * One room per meeting id. Membership is tracked both ways
 * (meeting → connections, connection → meetings) so a disconnect can
 * leave every room it joined.
 *
 * A broadcast is handed to the transport at the instant of the call, so
 * it reaches exactly the members present then, and events for a room go
 * out in call order. A failed delivery affects only its own event.
 */
import type { Logger } from "../../infrastructure/logger.js";
import { metrics } from "../../infrastructure/metrics.js";
import {
  RoomEvents,
  type HubConnection,
  type RoomEmitter,
  type RoomEventName,
  type StatusNotice,
} from "./session.types.js";

export class SessionHub {
  private readonly rooms = new Map<string, Map<string, HubConnection>>();
  private readonly memberships = new Map<string, Set<string>>();
  private closed = false;

  constructor(
    private readonly emitter: RoomEmitter,
    private readonly logger: Logger,
  ) {}

  getRoomCount(): number {
    return this.rooms.size;
  }

  /** Connections in at least one room; idle sockets are not counted */
  getRoomMemberCount(): number {
    return this.memberships.size;
  }

  getMemberIds(meetingId: string): string[] {
    return [...(this.rooms.get(meetingId)?.keys() ?? [])];
  }

  isMember(connectionId: string, meetingId: string): boolean {
    return this.rooms.get(meetingId)?.has(connectionId) ?? false;
  }

  /**
   * Add a connection to a meeting's room. Joining a room the connection is
   * already in changes nothing and announces nothing.
   * @returns whether membership changed
   */
  async join(connection: HubConnection, meetingId: string): Promise<boolean> {
    this.assertOpen();
    let members = this.rooms.get(meetingId);
    if (members?.has(connection.id)) return false;

    if (!members) {
      members = new Map();
      this.rooms.set(meetingId, members);
      metrics.roomsActive.set(this.rooms.size);
    }
    members.set(connection.id, connection);

    let joined = this.memberships.get(connection.id);
    if (!joined) {
      joined = new Set();
      this.memberships.set(connection.id, joined);
    }
    joined.add(meetingId);

    await connection.join(meetingId);
    this.logger.debug(
      { meetingId, connectionId: connection.id, members: members.size },
      "Connection joined room",
    );

    await this.announce(meetingId, connection.id, "joined", members.size);
    return true;
  }

  /**
   * Remove a connection from a meeting's room.
   * @returns whether membership changed
   */
  async leave(connection: HubConnection, meetingId: string): Promise<boolean> {
    if (!this.removeMember(connection.id, meetingId)) return false;

    await connection.leave(meetingId);
    await this.announce(
      meetingId,
      connection.id,
      "left",
      this.rooms.get(meetingId)?.size ?? 0,
    );
    return true;
  }

  /**
   * Implicit leave for every room a dropped connection was in. The
   * transport has already detached it, so only membership and notices
   * are handled here.
   * @returns the meeting ids that were left
   */
  async disconnect(connectionId: string): Promise<string[]> {
    const joined = [...(this.memberships.get(connectionId) ?? [])];

    for (const meetingId of joined) {
      this.removeMember(connectionId, meetingId);
      await this.announce(
        meetingId,
        connectionId,
        "left",
        this.rooms.get(meetingId)?.size ?? 0,
      );
    }
    return joined;
  }

  /**
   * Deliver an event to every current member of a meeting's room.
   * The emit happens before this returns; the promise rejects if the
   * transport failed. Members who join later do not receive it.
   */
  broadcast(
    meetingId: string,
    event: RoomEventName,
    payload: unknown,
  ): Promise<void> {
    this.assertOpen();
    try {
      this.emitter.emit(meetingId, event, payload);
    } catch (err) {
      metrics.broadcastsTotal.inc({ event, status: "failed" });
      return Promise.reject(err);
    }
    metrics.broadcastsTotal.inc({ event, status: "delivered" });
    return Promise.resolve();
  }

  /** Drop all membership state. The hub accepts no work afterwards. */
  async close(): Promise<void> {
    this.closed = true;
    this.rooms.clear();
    this.memberships.clear();
    metrics.roomsActive.set(0);
  }

  private async announce(
    meetingId: string,
    connectionId: string,
    action: StatusNotice["action"],
    members: number,
  ): Promise<void> {
    const notice: StatusNotice = {
      meeting_id: meetingId,
      connection_id: connectionId,
      action,
      members,
      msg: `${connectionId} has ${action === "joined" ? "entered" : "left"} the room.`,
    };

    try {
      await this.broadcast(meetingId, RoomEvents.STATUS, notice);
    } catch (err) {
      this.logger.warn(
        { err, meetingId, connectionId, action },
        "Status notice failed",
      );
    }
  }

  private removeMember(connectionId: string, meetingId: string): boolean {
    const members = this.rooms.get(meetingId);
    if (!members?.delete(connectionId)) return false;

    if (members.size === 0) {
      this.rooms.delete(meetingId);
      metrics.roomsActive.set(this.rooms.size);
    }

    const joined = this.memberships.get(connectionId);
    joined?.delete(meetingId);
    if (joined?.size === 0) this.memberships.delete(connectionId);

    return true;
  }

  private assertOpen(): void {
    if (this.closed) throw new Error("SessionHub is closed");
  }
}
