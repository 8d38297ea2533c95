/**
 * Domain Registry - Static registration for zero runtime overhead
 *
 * To add a domain: Import and add to domains array
 * To remove a domain: Remove import and entry from array
 */
import type { Socket } from "socket.io";
import type { AppContext } from "../context.js";

// Domain registration function type
export type DomainRegistration = (socket: Socket, ctx: AppContext) => void;

import { sessionHandler } from "./session/index.js";
import { meetingHandler } from "./meeting/index.js";

/**
 * All registered domains - session first so disconnect cleanup is in place
 * before any other listener runs
 */
export const domains: readonly DomainRegistration[] = [
  sessionHandler,
  meetingHandler,
];

/**
 * Register all domain handlers for a socket connection
 */
export function registerAllDomains(socket: Socket, ctx: AppContext): void {
  for (const register of domains) {
    register(socket, ctx);
  }
}
