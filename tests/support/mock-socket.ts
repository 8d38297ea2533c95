import { vi } from "vitest";
import type { Socket } from "socket.io";
import type { FakeConnection } from "./fake-room-bus.js";

type Listener = (...args: unknown[]) => unknown;

/**
 * Socket stand-in backed by a FakeConnection. Listeners registered through
 * `on` can be fired with `trigger`, which resolves once the listener has.
 */
export function createMockSocket(connection: FakeConnection) {
  const listeners = new Map<string, Listener>();

  const mock = {
    id: connection.id,
    join: vi.fn((room: string) => connection.join(room)),
    leave: vi.fn((room: string) => connection.leave(room)),
    on: vi.fn((event: string, listener: Listener) => {
      listeners.set(event, listener);
    }),
  };

  return {
    mock,
    socket: mock as unknown as Socket,
    events: () => [...listeners.keys()],
    async trigger(event: string, ...args: unknown[]): Promise<void> {
      const listener = listeners.get(event);
      if (!listener) throw new Error(`No listener for ${event}`);
      await listener(...args);
    },
  };
}
