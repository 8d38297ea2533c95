/**
 * Shared error codes, messages and the result shape every meeting
 * operation answers with.
 */
export const Errors = {
  // Identifiers
  InvalidIdentifier: "Invalid meeting identifier",
  InvalidCodeFormat: "Meeting code must be exactly six digits",

  // Meetings
  MeetingNotFound: "Meeting not found",
  MissingRequiredField: "Missing or invalid required field",

  // Agenda items
  InvalidItemType: "Agenda item type must be one of election, motion, info",
  MissingTitle: "Agenda item title is required",
  InvalidVariantField: "Invalid or missing agenda item field",

  // Pointer
  InvalidIndex: "current_item must be a non-negative integer",
  IndexOutOfRange: "current_item is out of range",

  // Infrastructure
  Unavailable: "Service temporarily unavailable",
} as const;

export type ErrorCode = keyof typeof Errors;

export interface Failure {
  success: false;
  error: ErrorCode;
  message: string;
  details?: Record<string, unknown>;
}

export type Result<T> = { success: true; data: T } | Failure;

export function ok<T>(data: T): Result<T> {
  return { success: true, data };
}

export function fail(
  error: ErrorCode,
  details?: Record<string, unknown>,
): Failure {
  return details
    ? { success: false, error, message: Errors[error], details }
    : { success: false, error, message: Errors[error] };
}

/**
 * Thrown when no free meeting code was found within the attempt cap.
 * Treated as an unavailability signal, not a validation failure.
 */
export class MeetingCodeExhaustedError extends Error {
  constructor(readonly attempts: number) {
    super(`No free meeting code after ${attempts} attempts`);
    this.name = "MeetingCodeExhaustedError";
  }
}

/** A persisted document that no longer matches its schema */
export class CorruptRecordError extends Error {
  constructor(
    readonly key: string,
    reason: string,
  ) {
    super(`Corrupt record at ${key}: ${reason}`);
    this.name = "CorruptRecordError";
  }
}
