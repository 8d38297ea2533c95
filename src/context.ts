import type { Logger } from './infrastructure/logger.js';
import { IdentifierService } from './domains/meeting/identifier.service.js';
import { MeetingController } from './domains/meeting/meeting.controller.js';
import type { MeetingStore } from './domains/meeting/meeting.repository.js';
import { SessionHub } from './domains/session/session.hub.js';
import type { RoomEmitter } from './domains/session/session.types.js';

export interface AppContext {
  meetingController: MeetingController;
  hub: SessionHub;
}

export interface AppContextDeps {
  store: MeetingStore;
  emitter: RoomEmitter;
  logger: Logger;
  maxCodeAttempts: number;
  /** Overrides the random code source */
  drawCode?: () => number;
}

/** Wire the meeting core; one instance per process */
export function createAppContext(deps: AppContextDeps): AppContext {
  const hub = new SessionHub(deps.emitter, deps.logger);
  const ids = new IdentifierService(deps.store, {
    maxCodeAttempts: deps.maxCodeAttempts,
    drawCode: deps.drawCode,
  });
  const meetingController = new MeetingController(deps.store, ids, hub, deps.logger, {
    maxCreateAttempts: deps.maxCodeAttempts,
  });

  return { meetingController, hub };
}
