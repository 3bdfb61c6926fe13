/**
 * Single-consumer mailbox.
 *
 * Background work posts immutable messages from anywhere; the handler runs
 * only from the drain tick, at most `maxPerTick` messages per tick. While a
 * backlog remains the next tick is scheduled immediately, otherwise after
 * `pollIntervalMs`.
 */

import { errorMessage, silentLogger, type Logger } from "../logger.ts";

export interface MailboxOptions {
  pollIntervalMs: number;
  maxPerTick: number;
}

export const DEFAULT_MAILBOX_OPTIONS: MailboxOptions = {
  pollIntervalMs: 50,
  maxPerTick: 50,
};

export function createMailbox<T>(
  handler: (message: T) => void,
  options: Partial<MailboxOptions> = {},
  log: Logger = silentLogger,
) {
  const { pollIntervalMs, maxPerTick } = { ...DEFAULT_MAILBOX_OPTIONS, ...options };
  const batchSize = Math.max(1, maxPerTick);
  const queue: T[] = [];
  let timer: ReturnType<typeof setTimeout> | null = null;
  let running = false;

  function post(message: T): void {
    queue.push(message);
  }

  /**
   * Deliver up to one batch. Returns the number of messages handled.
   */
  function drain(): number {
    let handled = 0;
    while (handled < batchSize && queue.length > 0) {
      const message = queue.shift();
      if (message === undefined) break;
      handled++;
      try {
        handler(message);
      } catch (err) {
        log.error("Mailbox handler failed", { error: errorMessage(err) });
      }
    }
    return handled;
  }

  function schedule(delayMs: number): void {
    timer = setTimeout(tick, delayMs);
  }

  function tick(): void {
    timer = null;
    if (!running) return;
    drain();
    schedule(queue.length > 0 ? 0 : pollIntervalMs);
  }

  function start(): void {
    if (running) return;
    running = true;
    schedule(pollIntervalMs);
  }

  function stop(): void {
    running = false;
    if (timer !== null) {
      clearTimeout(timer);
      timer = null;
    }
  }

  return {
    post,
    drain,
    start,
    stop,
    pending: () => queue.length,
    isRunning: () => running,
  };
}

export type Mailbox<T> = ReturnType<typeof createMailbox<T>>;
