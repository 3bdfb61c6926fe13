/**
 * Sequential download queue.
 *
 * State machine: idle -> running(index) -> [finishing] -> idle.
 * One item runs at a time. Item workers report back through the mailbox;
 * only `receive` (called on the drain tick) advances the queue.
 */

import { randomUUID } from "node:crypto";
import { errorMessage, silentLogger, type Logger } from "../logger.ts";
import {
  buildQueueDownloadRequest,
  DEFAULT_NETWORK,
  type NetworkDefaults,
} from "./download-request.ts";
import { resolveFormatForMetadata } from "./format-selector.ts";
import {
  AUDIO_CONTAINERS,
  VIDEO_CONTAINERS,
  createCancelToken,
  type CancelToken,
  type DownloadOutcome,
  type MediaBackend,
  type QueueItem,
  type QueueSettings,
} from "./media-types.ts";
import type { ProgressMessage } from "./progress.ts";

// ============================================================================
// Validation
// ============================================================================

export type QueueSettingsIssue = "mode" | "codec" | "container" | "format";
export type QueueAddIssue = "missing_url" | "playlist" | "formats" | QueueSettingsIssue;

export const QUEUE_ADD_STATUS: Record<QueueAddIssue, string> = {
  missing_url: "Queue add failed: missing URL",
  playlist: "Queue add failed: playlists not allowed",
  formats: "Queue add failed: formats not loaded",
  mode: "Queue add failed: choose audio or video mode first",
  codec: "Queue add failed: choose a codec first",
  container: "Queue add failed: choose a container first",
  format: "Queue add failed: choose a format first",
};

const START_MISSING_DETAIL: Record<QueueSettingsIssue, string> = {
  mode: "audio/video mode",
  codec: "a codec choice",
  container: "a container choice",
  format: "a format choice",
};

function containerFitsMode(settings: QueueSettings): boolean {
  const allowed: readonly string[] =
    settings.mode === "audio" ? AUDIO_CONTAINERS : VIDEO_CONTAINERS;
  return allowed.includes(settings.container);
}

export function queueSettingsIssue(
  settings: QueueSettings,
): QueueSettingsIssue | null {
  if (settings.mode !== "audio" && settings.mode !== "video") return "mode";
  if (settings.mode === "video" && !settings.codec) return "codec";
  if (!settings.container || !containerFitsMode(settings)) return "container";
  if (!settings.formatLabel) return "format";
  return null;
}

export function queueAddIssue(
  url: string,
  playlistMode: boolean,
  formatsLoaded: boolean,
  settings: QueueSettings,
): QueueAddIssue | null {
  if (!url.trim()) return "missing_url";
  if (playlistMode) return "playlist";
  if (!formatsLoaded) return "formats";
  return queueSettingsIssue(settings);
}

/**
 * Message shown when a queue cannot start because an item is incomplete.
 */
export function queueStartMessage(index: number, issue: QueueSettingsIssue): string {
  return `Queue item ${index} is missing ${START_MISSING_DETAIL[issue]}.`;
}

export function firstInvalidQueueItem(
  items: readonly QueueItem[],
): { index: number; issue: QueueSettingsIssue } | null {
  for (let i = 0; i < items.length; i++) {
    const issue = queueSettingsIssue(items[i].settings);
    if (issue) return { index: i + 1, issue };
  }
  return null;
}

export function nextNonEmptyIndex(
  items: readonly QueueItem[],
  start: number,
): number | null {
  for (let i = Math.max(0, start); i < items.length; i++) {
    if (items[i].url.trim()) return i;
  }
  return null;
}

// ============================================================================
// Types
// ============================================================================

export type QueuePhase = "idle" | "running" | "finishing";
export type QueueOutcome = "success" | "failed" | "cancelled";

export interface QueueState {
  items: QueueItem[];
  active: boolean;
  index: number | null;
  failedItems: number;
  cancelRequested: boolean;
  phase: QueuePhase;
}

export type QueueStartResult =
  | { ok: true }
  | { ok: false; reason: "busy" }
  | { ok: false; reason: "empty" }
  | { ok: false; reason: "invalid"; index: number; issue: QueueSettingsIssue; message: string };

export type QueueEditResult =
  | { ok: true }
  | { ok: false; reason: "active" | "not_found" };

export interface QueueFinishResult {
  outcome: QueueOutcome;
  failedItems: number;
}

export type QueueMessage =
  | { type: "queue-item-started"; runId: number; index: number; label: string }
  | { type: "queue-item-done"; runId: number; index: number; outcome: DownloadOutcome };

export interface QueueFileSystem {
  ensureDir(path: string): Promise<void>;
}

export interface QueueEngineDeps {
  backend: MediaBackend;
  fs: QueueFileSystem;
  post: (message: QueueMessage | ProgressMessage) => void;
  /** Output directory used when an item captured none */
  defaultOutputDir: () => string;
  networkDefaults?: NetworkDefaults;
  /** Start is refused while this returns true (e.g. a single download runs) */
  isBusy?: () => boolean;
  onChange?: (state: QueueState) => void;
  onFinish?: (result: QueueFinishResult) => void;
  createId?: () => string;
  log?: Logger;
}

/**
 * Outcome of a finished run: cancelled beats failed beats success.
 */
export function queueFinishOutcome(cancelled: boolean, failedItems: number): QueueOutcome {
  if (cancelled) return "cancelled";
  if (failedItems > 0) return "failed";
  return "success";
}

// ============================================================================
// Engine
// ============================================================================

export function createQueueEngine(deps: QueueEngineDeps) {
  const log = deps.log ?? silentLogger;
  const createId = deps.createId ?? randomUUID;
  const networkDefaults = deps.networkDefaults ?? DEFAULT_NETWORK;

  let items: QueueItem[] = [];
  let active = false;
  let index: number | null = null;
  let failedItems = 0;
  let cancelRequested = false;
  let phase: QueuePhase = "idle";
  let runId = 0;
  let token: CancelToken | null = null;

  function getState(): QueueState {
    return {
      items: items.map((item) => ({ ...item, settings: { ...item.settings } })),
      active,
      index: active ? index : null,
      failedItems,
      cancelRequested,
      phase,
    };
  }

  function changed(): void {
    deps.onChange?.(getState());
  }

  // --------------------------------------------------------------------------
  // List edits
  // --------------------------------------------------------------------------

  function add(url: string, settings: QueueSettings): QueueItem {
    const item: QueueItem = {
      id: createId(),
      url,
      settings: { ...settings, subtitleLanguages: [...settings.subtitleLanguages] },
    };
    items.push(item);
    changed();
    return item;
  }

  function indicesOf(ids: readonly string[]): number[] {
    const wanted = new Set(ids);
    const found: number[] = [];
    items.forEach((item, i) => {
      if (wanted.has(item.id)) found.push(i);
    });
    return found;
  }

  function edit(ids: readonly string[], apply: (indices: number[]) => void): QueueEditResult {
    if (active) return { ok: false, reason: "active" };
    const indices = indicesOf(ids);
    if (indices.length === 0) return { ok: false, reason: "not_found" };
    apply(indices);
    changed();
    return { ok: true };
  }

  function remove(ids: readonly string[]): QueueEditResult {
    return edit(ids, (indices) => {
      const drop = new Set(indices);
      items = items.filter((_, i) => !drop.has(i));
    });
  }

  function swap(a: number, b: number): void {
    const tmp = items[a];
    items[a] = items[b];
    items[b] = tmp;
  }

  function moveUp(ids: readonly string[]): QueueEditResult {
    return edit(ids, (indices) => {
      for (const i of indices) {
        if (i > 0) swap(i - 1, i);
      }
    });
  }

  function moveDown(ids: readonly string[]): QueueEditResult {
    return edit(ids, (indices) => {
      for (const i of [...indices].reverse()) {
        if (i < items.length - 1) swap(i, i + 1);
      }
    });
  }

  function clear(): QueueEditResult {
    if (active) return { ok: false, reason: "active" };
    items = [];
    changed();
    return { ok: true };
  }

  // --------------------------------------------------------------------------
  // Run
  // --------------------------------------------------------------------------

  async function runItem(
    run: number,
    itemIndex: number,
    item: QueueItem,
    total: number,
    cancel: CancelToken,
  ): Promise<void> {
    const { url, settings } = item;
    let outcome: DownloadOutcome;
    try {
      const info = await deps.backend.fetchMetadata(url);
      const resolved = resolveFormatForMetadata(url, info, settings, log);
      deps.post({
        type: "queue-item-started",
        runId: run,
        index: itemIndex,
        label: `${itemIndex + 1}/${total} ${resolved.title || url}`,
      });

      const request = buildQueueDownloadRequest(
        url,
        settings,
        resolved,
        deps.defaultOutputDir(),
        networkDefaults,
      );
      if (request.playlistEnabled) {
        log.info("Playlist download", { items: request.playlistItems ?? "none" });
      }
      await deps.fs.ensureDir(request.outputDir);

      outcome = cancel.cancelled
        ? "cancelled"
        : await deps.backend.runDownload(request, cancel, (event) =>
            deps.post({ type: "progress", source: "queue", event }),
          );
    } catch (err) {
      log.error("Queue item failed", { url, error: errorMessage(err) });
      outcome = "error";
    }
    deps.post({ type: "queue-item-done", runId: run, index: itemIndex, outcome });
  }

  function runCurrent(): void {
    if (!active || index === null || token === null) return;
    const next = nextNonEmptyIndex(items, index);
    if (next === null) {
      finish(false);
      return;
    }
    index = next;
    const item = items[next];
    log.info(`Queue item ${next + 1}/${items.length}`, { url: item.url });
    changed();

    runItem(runId, next, item, items.length, token).catch((err) => {
      log.error("Queue worker crashed", { error: errorMessage(err) });
    });
  }

  function finish(cancelled: boolean): void {
    phase = "finishing";
    const outcome = queueFinishOutcome(cancelled, failedItems);
    const result: QueueFinishResult = { outcome, failedItems };

    active = false;
    index = null;
    failedItems = 0;
    cancelRequested = false;
    token = null;
    phase = "idle";

    if (outcome === "cancelled") {
      log.info("Queue stopped by cancellation");
    } else if (outcome === "failed") {
      log.warn(`Queue finished with ${result.failedItems} failed item(s)`);
    } else {
      log.info("Queue finished successfully");
    }
    changed();
    deps.onFinish?.(result);
  }

  function start(): QueueStartResult {
    if (active || deps.isBusy?.()) return { ok: false, reason: "busy" };
    if (items.length === 0) return { ok: false, reason: "empty" };

    const invalid = firstInvalidQueueItem(items);
    if (invalid) {
      return {
        ok: false,
        reason: "invalid",
        ...invalid,
        message: queueStartMessage(invalid.index, invalid.issue),
      };
    }

    active = true;
    index = 0;
    failedItems = 0;
    cancelRequested = false;
    phase = "running";
    runId++;
    token = createCancelToken();
    runCurrent();
    return { ok: true };
  }

  /**
   * Request cancellation. The running item stops at its next check point;
   * no further item starts.
   */
  function cancel(): boolean {
    if (!active || token === null) return false;
    cancelRequested = true;
    phase = "finishing";
    token.cancel();
    changed();
    return true;
  }

  /**
   * Apply a message posted by an item worker. Must run on the drain tick.
   */
  function receive(message: QueueMessage): void {
    if (message.runId !== runId || !active || message.index !== index) return;

    if (message.type === "queue-item-started") {
      return;
    }

    if (message.outcome === "error") failedItems++;
    if (message.outcome === "cancelled") cancelRequested = true;

    if (cancelRequested) {
      finish(true);
      return;
    }
    index = message.index + 1;
    runCurrent();
  }

  return {
    add,
    remove,
    moveUp,
    moveDown,
    clear,
    start,
    cancel,
    receive,
    getState,
    isActive: () => active,
  };
}

export type QueueEngine = ReturnType<typeof createQueueEngine>;
