/**
 * Agenda Item Codec
 *
 * The single validation and construction boundary for agenda items.
 * Untrusted input is checked in a fixed order and the first violated
 * rule is reported:
 *
 *   1. `type` is one of election | motion | info  → InvalidItemType
 *   2. `title` is non-blank text                   → MissingTitle
 *   3. variant fields are present and well formed  → InvalidVariantField
 *
 * Successful output carries exactly the fields of its variant; anything
 * else on the input is dropped.
 */
import { z } from "zod";
import { fail, ok, type Result } from "../../shared/errors.js";
import {
  AGENDA_ITEM_TYPES,
  type AgendaItem,
  type AgendaItemType,
} from "./agenda.types.js";

// Variant field schemas. Key order here is the order fields are checked.
const electionFieldsSchema = z.object({
  positions: z.array(z.string()),
});

const baseMotionSchema = z.object({
  owner: z.string(),
  motion: z.string(),
});

const motionFieldsSchema = z.object({
  description: z.string(),
  baseMotions: z.array(baseMotionSchema),
});

const infoFieldsSchema = z.object({
  description: z.string(),
});

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function isAgendaItemType(value: unknown): value is AgendaItemType {
  return AGENDA_ITEM_TYPES.some((type) => type === value);
}

function assertNever(value: never): never {
  throw new Error(`Unhandled agenda item variant: ${String(value)}`);
}

function variantFailure(error: z.ZodError): Result<AgendaItem> {
  const field = error.issues[0]?.path[0];
  return fail("InvalidVariantField", {
    field: field === undefined ? "unknown" : String(field),
  });
}

function decodeVariant(
  type: AgendaItemType,
  title: string,
  raw: Record<string, unknown>,
): Result<AgendaItem> {
  switch (type) {
    case "election": {
      const parsed = electionFieldsSchema.safeParse(raw);
      if (!parsed.success) return variantFailure(parsed.error);
      return ok({ type, title, positions: parsed.data.positions });
    }
    case "motion": {
      const parsed = motionFieldsSchema.safeParse(raw);
      if (!parsed.success) return variantFailure(parsed.error);
      return ok({
        type,
        title,
        description: parsed.data.description,
        baseMotions: parsed.data.baseMotions.map(({ owner, motion }) => ({
          owner,
          motion,
        })),
      });
    }
    case "info": {
      const parsed = infoFieldsSchema.safeParse(raw);
      if (!parsed.success) return variantFailure(parsed.error);
      return ok({ type, title, description: parsed.data.description });
    }
    default:
      return assertNever(type);
  }
}

/**
 * Validate an untrusted agenda item and project it to its canonical form.
 * Pure and deterministic.
 */
export function decodeAgendaItem(raw: unknown): Result<AgendaItem> {
  const record: Record<string, unknown> = isRecord(raw) ? raw : {};
  const { type, title } = record;

  if (!isAgendaItemType(type)) {
    return fail("InvalidItemType", { allowed: [...AGENDA_ITEM_TYPES] });
  }

  if (typeof title !== "string" || title.trim() === "") {
    return fail("MissingTitle");
  }

  return decodeVariant(type, title.trim(), record);
}

/** One-line description of an item, for logs */
export function summarizeAgendaItem(item: AgendaItem): string {
  switch (item.type) {
    case "election":
      return `election "${item.title}" (${item.positions.length} positions)`;
    case "motion":
      return `motion "${item.title}" (${item.baseMotions.length} base motions)`;
    case "info":
      return `info "${item.title}"`;
    default:
      return assertNever(item);
  }
}
