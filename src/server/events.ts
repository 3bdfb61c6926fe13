/**
 * Server-sent events for live session updates.
 *
 * Each connected client receives the current snapshot first, then every
 * session event in order.
 */

import type { Context } from "hono";
import { streamSSE } from "hono/streaming";
import { silentLogger, type Logger } from "../logger.ts";
import type { Session, SessionEvent } from "../services/session.ts";

/** Backlog per client before its queue is replaced by a fresh snapshot */
export const MAX_PENDING_EVENTS = 500;

// ============================================================================
// Event Stream Manager
// ============================================================================

export function createEventStream(session: Session, log: Logger = silentLogger) {
  let clients = 0;
  let shuttingDown = false;
  const closers = new Set<() => void>();

  function handle(c: Context) {
    return streamSSE(c, async (stream) => {
      const pending: SessionEvent[] = [];
      let wake: (() => void) | null = null;
      let closed = shuttingDown;
      let eventId = 0;

      const close = () => {
        closed = true;
        wake?.();
      };

      const unsubscribe = session.subscribe((event) => {
        if (closed) return;
        if (pending.length >= MAX_PENDING_EVENTS) {
          pending.length = 0;
          pending.push({ type: "state", snapshot: session.getSnapshot() });
        } else {
          pending.push(event);
        }
        wake?.();
      });
      closers.add(close);
      clients++;
      log.debug(`Client connected. Total clients: ${clients}`);

      stream.onAbort(close);

      try {
        await stream.writeSSE({
          event: "state",
          id: String(eventId++),
          data: JSON.stringify({ type: "state", snapshot: session.getSnapshot() }),
        });

        while (!closed) {
          const event = pending.shift();
          if (!event) {
            await new Promise<void>((resolve) => {
              wake = resolve;
            });
            wake = null;
            continue;
          }
          await stream.writeSSE({
            event: event.type,
            id: String(eventId++),
            data: JSON.stringify(event),
          });
        }
      } finally {
        closers.delete(close);
        unsubscribe();
        clients--;
        log.debug(`Client disconnected. Total clients: ${clients}`);
      }
    });
  }

  /** End every open stream and refuse to hold new ones open */
  function close(): void {
    shuttingDown = true;
    for (const closeClient of [...closers]) closeClient();
  }

  return {
    handle,
    close,
    clientCount: () => clients,
  };
}

export type EventStream = ReturnType<typeof createEventStream>;
