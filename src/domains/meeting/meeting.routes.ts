/**
 * Meeting HTTP routes (Fastify plugin)
 */
import type { FastifyPluginAsync, FastifyReply } from "fastify";
import type { ErrorCode, Failure } from "../../shared/errors.js";
import {
  addAgendaItemBodySchema,
  advancePointerBodySchema,
  createMeetingSchema,
  parsePayload,
} from "../../socket/schemas.js";
import type { MeetingController } from "./meeting.controller.js";

interface MeetingParams {
  meetingId: string;
}

interface CodeParams {
  code: string;
}

export function statusForError(code: ErrorCode): number {
  switch (code) {
    case "MeetingNotFound":
      return 404;
    case "Unavailable":
      return 503;
    default:
      return 400;
  }
}

function sendFailure(reply: FastifyReply, failure: Failure): Failure {
  reply.code(statusForError(failure.error));
  return failure;
}

export const createMeetingRoutes = (
  controller: MeetingController,
): FastifyPluginAsync => {
  return async (fastify) => {
    fastify.post("/meetings", async (request, reply) => {
      const body = parsePayload(createMeetingSchema, request.body);
      if (!body.success) return sendFailure(reply, body);

      const result = await controller.createMeeting(body.data.meeting_name);
      if (!result.success) return sendFailure(reply, result);

      reply.code(201);
      return result.data;
    });

    fastify.get<{ Params: CodeParams }>(
      "/meetings/code/:code",
      async (request, reply) => {
        const result = await controller.lookupByCode(request.params.code);
        if (!result.success) return sendFailure(reply, result);

        if (!result.data) {
          reply.code(404);
          return {};
        }
        return result.data;
      },
    );

    fastify.get<{ Params: MeetingParams }>(
      "/meetings/:meetingId",
      async (request, reply) => {
        const result = await controller.getMeeting(request.params.meetingId);
        if (!result.success) return sendFailure(reply, result);
        return result.data;
      },
    );

    fastify.get<{ Params: MeetingParams }>(
      "/meetings/:meetingId/items",
      async (request, reply) => {
        const result = await controller.listAgendaItems(request.params.meetingId);
        if (!result.success) return sendFailure(reply, result);
        return result.data;
      },
    );

    fastify.post<{ Params: MeetingParams }>(
      "/meetings/:meetingId/items",
      async (request, reply) => {
        const body = parsePayload(addAgendaItemBodySchema, request.body);
        if (!body.success) return sendFailure(reply, body);

        const result = await controller.addAgendaItem(
          request.params.meetingId,
          body.data.item,
        );
        if (!result.success) return sendFailure(reply, result);

        reply.code(201);
        return { success: true, ...result.data };
      },
    );

    fastify.put<{ Params: MeetingParams }>(
      "/meetings/:meetingId/current-item",
      async (request, reply) => {
        const body = parsePayload(advancePointerBodySchema, request.body);
        if (!body.success) return sendFailure(reply, body);

        const result = await controller.advancePointer(
          request.params.meetingId,
          body.data.current_item,
        );
        if (!result.success) return sendFailure(reply, result);
        return result.data;
      },
    );
  };
};
