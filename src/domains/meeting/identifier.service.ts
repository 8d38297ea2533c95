import { randomInt, randomUUID } from "node:crypto";
import {
  fail,
  ok,
  MeetingCodeExhaustedError,
  type Result,
} from "../../shared/errors.js";
import type { MeetingStore } from "./meeting.repository.js";

const UUID_PATTERN =
  /^[0-9a-f]{8}-[0-9a-f]{4}-[1-5][0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/i;
const CODE_PATTERN = /^[0-9]{6}$/;
const CODE_SPACE = 1_000_000;

export interface IdentifierServiceOptions {
  /** Upper bound on draws before giving up on a free code */
  maxCodeAttempts: number;
  /** Returns an integer in [0, 1_000_000); defaults to crypto.randomInt */
  drawCode?: () => number;
}

/**
 * Meeting identifiers (opaque UUIDs) and six-digit lookup codes.
 */
export class IdentifierService {
  private readonly drawCode: () => number;

  constructor(
    private readonly store: Pick<MeetingStore, "findMeetingByCode">,
    private readonly options: IdentifierServiceOptions,
  ) {
    this.drawCode = options.drawCode ?? (() => randomInt(0, CODE_SPACE));
  }

  newMeetingId(): string {
    return randomUUID();
  }

  validateId(text: string): Result<string> {
    if (!UUID_PATTERN.test(text)) return fail("InvalidIdentifier");
    return ok(text.toLowerCase());
  }

  validateCode(text: string): Result<string> {
    if (!CODE_PATTERN.test(text)) return fail("InvalidCodeFormat");
    return ok(text);
  }

  /**
   * Draw codes until one is not held by a stored meeting.
   *
   * The check is not atomic with the later insert; the store's own
   * uniqueness constraint catches the remaining race.
   */
  async newMeetingCode(): Promise<string> {
    for (let attempt = 1; attempt <= this.options.maxCodeAttempts; attempt++) {
      const code = String(this.drawCode()).padStart(6, "0");
      const existing = await this.store.findMeetingByCode(code);
      if (!existing) return code;
    }
    throw new MeetingCodeExhaustedError(this.options.maxCodeAttempts);
  }
}
