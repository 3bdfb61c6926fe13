/**
 * Progress helpers: throttling, speed/ETA text, and the message shape used
 * to carry progress through the mailbox.
 */

import type { ProgressEvent } from "./media-types.ts";

export const DEFAULT_PROGRESS_INTERVAL_MS = 800;
export const UNKNOWN_VALUE = "—";

export type ProgressSource = "single" | "queue";

export interface ProgressMessage {
  type: "progress";
  source: ProgressSource;
  event: ProgressEvent;
}

/**
 * Forward "downloading" events at most once per interval; every other event
 * passes straight through. `reset` starts a fresh window (item boundaries).
 */
export function createProgressThrottle(
  forward: (event: ProgressEvent) => void,
  intervalMs = DEFAULT_PROGRESS_INTERVAL_MS,
  now: () => number = Date.now,
) {
  let lastForwarded: number | null = null;

  function push(event: ProgressEvent): void {
    if (event.status !== "downloading") {
      forward(event);
      return;
    }
    const ts = now();
    if (lastForwarded !== null && ts - lastForwarded < intervalMs) return;
    lastForwarded = ts;
    forward(event);
  }

  return {
    push,
    reset: () => {
      lastForwarded = null;
    },
  };
}

export type ProgressThrottle = ReturnType<typeof createProgressThrottle>;

export function formatSpeed(bytesPerSec: number | null | undefined): string {
  if (!bytesPerSec || bytesPerSec <= 0) return UNKNOWN_VALUE;
  const units = ["B/s", "KiB/s", "MiB/s", "GiB/s", "TiB/s"];
  let value = bytesPerSec;
  let unitIdx = 0;
  while (value >= 1024 && unitIdx < units.length - 1) {
    value /= 1024;
    unitIdx++;
  }
  return unitIdx === 0
    ? `${value.toFixed(0)} ${units[0]}`
    : `${value.toFixed(2)} ${units[unitIdx]}`;
}

export function formatEta(seconds: number | null | undefined): string {
  if (seconds === null || seconds === undefined || !Number.isFinite(seconds)) {
    return UNKNOWN_VALUE;
  }
  const total = Math.trunc(Math.max(0, seconds));
  const s = total % 60;
  const m = Math.trunc(total / 60) % 60;
  const h = Math.trunc(total / 3600);
  const ss = String(s).padStart(2, "0");
  if (h) return `${h}:${String(m).padStart(2, "0")}:${ss}`;
  return `${m}:${ss}`;
}

export function formatDuration(seconds: number): string {
  return formatEta(seconds);
}
