import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { pino } from "pino";
import { createAppContext, type AppContext } from "@src/context.js";
import { statusForError } from "@src/domains/meeting/meeting.routes.js";
import { RoomEvents } from "@src/domains/session/session.types.js";
import {
  createHttpServer,
  registerRoutes,
  type HttpServer,
} from "@src/infrastructure/server.js";
import { InMemoryMeetingStore } from "../../../support/in-memory-meeting.store.js";
import { FakeRoomBus } from "../../../support/fake-room-bus.js";

const UNKNOWN_ID = "7d1c2b3a-1e2f-4a5b-8c6d-9e0f1a2b3c4d";

describe("meeting routes", () => {
  let store: InMemoryMeetingStore;
  let bus: FakeRoomBus;
  let context: AppContext;
  let app: HttpServer;

  beforeEach(async () => {
    store = new InMemoryMeetingStore();
    bus = new FakeRoomBus();
    context = createAppContext({
      store,
      emitter: bus,
      logger: pino({ level: "silent" }),
      maxCodeAttempts: 5,
    });
    app = createHttpServer();
    await registerRoutes(app, context, { status: "ready" });
    await app.ready();
  });

  afterEach(async () => {
    await app.close();
  });

  async function createMeeting(): Promise<{ meeting_id: string; meeting_code: string }> {
    const res = await app.inject({
      method: "POST",
      url: "/meetings",
      payload: { meeting_name: "Board Sync" },
    });
    return res.json();
  }

  // ─── POST /meetings ─────────────────────────────────────────

  describe("POST /meetings", () => {
    it("creates a meeting with 201", async () => {
      const res = await app.inject({
        method: "POST",
        url: "/meetings",
        payload: { meeting_name: "Board Sync" },
      });

      expect(res.statusCode).toBe(201);
      expect(res.json()).toEqual({
        meeting_id: expect.any(String),
        meeting_name: "Board Sync",
        current_item: 0,
        meeting_code: expect.stringMatching(/^\d{6}$/),
        items: [],
      });
    });

    it("answers 400 MissingRequiredField without a name", async () => {
      const res = await app.inject({ method: "POST", url: "/meetings", payload: {} });

      expect(res.statusCode).toBe(400);
      expect(res.json()).toEqual({
        success: false,
        error: "MissingRequiredField",
        message: "Missing or invalid required field",
        details: { field: "meeting_name" },
      });
    });

    it("answers 400 for a body that is not JSON", async () => {
      const res = await app.inject({
        method: "POST",
        url: "/meetings",
        headers: { "content-type": "application/json" },
        payload: "{not json",
      });

      expect(res.statusCode).toBe(400);
      expect(res.json()).toEqual(
        expect.objectContaining({
          error: "MissingRequiredField",
          details: { field: "body" },
        }),
      );
    });

    it("answers 503 Unavailable when the store fails", async () => {
      vi.spyOn(store, "insertMeeting").mockRejectedValue(new Error("Redis down"));

      const res = await app.inject({
        method: "POST",
        url: "/meetings",
        payload: { meeting_name: "Board Sync" },
      });

      expect(res.statusCode).toBe(503);
      expect(res.json()).toEqual({
        success: false,
        error: "Unavailable",
        message: "Service temporarily unavailable",
      });
    });
  });

  // ─── GET /meetings/:meetingId ───────────────────────────────

  describe("GET /meetings/:meetingId", () => {
    it("returns the meeting projection", async () => {
      const { meeting_id } = await createMeeting();

      const res = await app.inject({ method: "GET", url: `/meetings/${meeting_id}` });

      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual(
        expect.objectContaining({ meeting_id, meeting_name: "Board Sync", items: [] }),
      );
    });

    it("answers 404 for an unknown meeting", async () => {
      const res = await app.inject({ method: "GET", url: `/meetings/${UNKNOWN_ID}` });

      expect(res.statusCode).toBe(404);
      expect(res.json()).toEqual(expect.objectContaining({ error: "MeetingNotFound" }));
    });

    it("answers 400 for a malformed id", async () => {
      const res = await app.inject({ method: "GET", url: "/meetings/not-an-id" });

      expect(res.statusCode).toBe(400);
      expect(res.json()).toEqual(expect.objectContaining({ error: "InvalidIdentifier" }));
    });
  });

  // ─── Agenda items ───────────────────────────────────────────

  describe("/meetings/:meetingId/items", () => {
    const item = {
      type: "election",
      title: "Seats",
      positions: ["Chair", "Treasurer"],
    };

    it("adds an item with 201 and notifies the room", async () => {
      const { meeting_id } = await createMeeting();
      const viewer = bus.connect("viewer");
      await context.hub.join(viewer, meeting_id);

      const res = await app.inject({
        method: "POST",
        url: `/meetings/${meeting_id}/items`,
        payload: { item },
      });

      expect(res.statusCode).toBe(201);
      expect(res.json()).toEqual({ success: true, meeting_id, index: 0, item });
      expect(viewer.payloadsOf(RoomEvents.AGENDA_ITEM_ADDED)).toEqual([
        { meeting_id, item },
      ]);
    });

    it("lists items in order", async () => {
      const { meeting_id } = await createMeeting();
      const info = { type: "info", title: "Welcome", description: "" };
      await app.inject({
        method: "POST",
        url: `/meetings/${meeting_id}/items`,
        payload: { item: info },
      });
      await app.inject({
        method: "POST",
        url: `/meetings/${meeting_id}/items`,
        payload: { item },
      });

      const res = await app.inject({ method: "GET", url: `/meetings/${meeting_id}/items` });

      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual([info, item]);
    });

    it("answers 400 with the codec error", async () => {
      const { meeting_id } = await createMeeting();

      const res = await app.inject({
        method: "POST",
        url: `/meetings/${meeting_id}/items`,
        payload: { item: { type: "election", title: " " } },
      });

      expect(res.statusCode).toBe(400);
      expect(res.json()).toEqual(expect.objectContaining({ error: "MissingTitle" }));
    });

    it("answers 400 MissingRequiredField(item) without an item", async () => {
      const { meeting_id } = await createMeeting();

      const res = await app.inject({
        method: "POST",
        url: `/meetings/${meeting_id}/items`,
        payload: {},
      });

      expect(res.statusCode).toBe(400);
      expect(res.json()).toEqual(
        expect.objectContaining({ details: { field: "item" } }),
      );
    });
  });

  // ─── PUT /meetings/:meetingId/current-item ──────────────────

  describe("PUT /meetings/:meetingId/current-item", () => {
    it("moves the pointer and returns the meeting", async () => {
      const { meeting_id } = await createMeeting();
      await context.meetingController.addAgendaItem(meeting_id, {
        type: "info",
        title: "Welcome",
        description: "",
      });

      const res = await app.inject({
        method: "PUT",
        url: `/meetings/${meeting_id}/current-item`,
        payload: { current_item: 0 },
      });

      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual(expect.objectContaining({ meeting_id, current_item: 0 }));
    });

    it("answers 400 IndexOutOfRange past the end", async () => {
      const { meeting_id } = await createMeeting();

      const res = await app.inject({
        method: "PUT",
        url: `/meetings/${meeting_id}/current-item`,
        payload: { current_item: 3 },
      });

      expect(res.statusCode).toBe(400);
      expect(res.json()).toEqual({
        success: false,
        error: "IndexOutOfRange",
        message: "current_item is out of range",
        details: { max_valid_index: 0, agenda_items: 0 },
      });
    });
  });

  // ─── GET /meetings/code/:code ───────────────────────────────

  describe("GET /meetings/code/:code", () => {
    it("resolves a code to the meeting id", async () => {
      const { meeting_id, meeting_code } = await createMeeting();

      const res = await app.inject({ method: "GET", url: `/meetings/code/${meeting_code}` });

      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual({ meeting_id });
    });

    it("answers 404 with an empty object for an unknown code", async () => {
      const res = await app.inject({ method: "GET", url: "/meetings/code/000000" });

      expect(res.statusCode).toBe(404);
      expect(res.json()).toEqual({});
    });

    it("answers 400 InvalidCodeFormat for a malformed code", async () => {
      const res = await app.inject({ method: "GET", url: "/meetings/code/12ab56" });

      expect(res.statusCode).toBe(400);
      expect(res.json()).toEqual(expect.objectContaining({ error: "InvalidCodeFormat" }));
    });
  });

  // ─── health / metrics ───────────────────────────────────────

  it("reports health with the room count", async () => {
    const { meeting_id } = await createMeeting();
    await context.hub.join(bus.connect("viewer"), meeting_id);

    const res = await app.inject({ method: "GET", url: "/health" });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual(
      expect.objectContaining({ status: "ok", redis: "ready", rooms: 1 }),
    );
  });

  it("answers 503 from /health when Redis is not ready", async () => {
    const degraded = createHttpServer();
    await registerRoutes(degraded, context, { status: "reconnecting" });

    const res = await degraded.inject({ method: "GET", url: "/health" });

    expect(res.statusCode).toBe(503);
    expect(res.json()).toEqual(
      expect.objectContaining({ status: "degraded", redis: "reconnecting" }),
    );
    await degraded.close();
  });

  it("reports room members in the JSON metrics", async () => {
    const { meeting_id } = await createMeeting();
    await context.hub.join(bus.connect("viewer"), meeting_id);
    bus.connect("idle");

    const res = await app.inject({ method: "GET", url: "/metrics" });

    expect(res.statusCode).toBe(200);
    expect(res.json().application).toEqual({ rooms: 1, roomMembers: 1 });
  });

  it("exposes Prometheus metrics", async () => {
    await createMeeting();

    const res = await app.inject({ method: "GET", url: "/metrics/prometheus" });

    expect(res.statusCode).toBe(200);
    expect(res.body).toContain("meeting_sync_meetings_created_total");
  });
});

describe("statusForError", () => {
  it("maps error codes to HTTP statuses", () => {
    expect(statusForError("MeetingNotFound")).toBe(404);
    expect(statusForError("Unavailable")).toBe(503);
    expect(statusForError("InvalidIndex")).toBe(400);
    expect(statusForError("MissingRequiredField")).toBe(400);
  });
});
