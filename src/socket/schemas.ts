import { z } from "zod";
import { fail, ok, type Result } from "../shared/errors.js";

// Identifier format is checked by the controller so it can answer InvalidIdentifier
const meetingIdSchema = z.string();

// The item and pointer are checked by the controller; here they only need to be present
const presentSchema = z.unknown().refine((value) => value !== undefined);

// ─────────────────────────────────────────────────────────────────
// Request Schemas (shared by socket events and HTTP bodies)
// ─────────────────────────────────────────────────────────────────

export const roomSchema = z.object({
  meeting_id: meetingIdSchema,
});

export const createMeetingSchema = z.object({
  meeting_name: z.string(),
});

export const addAgendaItemBodySchema = z.object({
  item: presentSchema,
});

export const advancePointerBodySchema = z.object({
  current_item: presentSchema,
});

export const addAgendaItemSchema = roomSchema.merge(addAgendaItemBodySchema);
export const advancePointerSchema = roomSchema.merge(advancePointerBodySchema);

export type RoomPayload = z.infer<typeof roomSchema>;
export type CreateMeetingPayload = z.infer<typeof createMeetingSchema>;
export type AddAgendaItemPayload = z.infer<typeof addAgendaItemSchema>;
export type AdvancePointerPayload = z.infer<typeof advancePointerSchema>;

/**
 * Parse a request payload, naming the first missing or mistyped field.
 */
export function parsePayload<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  payload: unknown,
): Result<T> {
  const parsed = schema.safeParse(payload ?? {});
  if (parsed.success) return ok(parsed.data);

  const field = parsed.error.issues[0]?.path[0];
  return fail("MissingRequiredField", {
    field: field === undefined ? "body" : String(field),
  });
}
