/**
 * Download session: the surface a user interface drives.
 *
 * Holds the visible selection (URL, mode, container, codec, format and
 * options), enforces that at most one download runs at a time, and owns the
 * mailbox through which every background worker reports back.
 */

import { mkdir } from "node:fs/promises";
import { errorMessage, silentLogger, type Logger } from "../logger.ts";
import { buildDiagnosticsReport } from "./diagnostics.ts";
import {
  buildDownloadOptions,
  buildQueueSettings,
  buildSingleDownloadRequest,
  DEFAULT_NETWORK,
  expandOutputDir,
  type NetworkDefaults,
} from "./download-request.ts";
import { createFetchCoordinator, type FetchMessage, type FetchState } from "./fetch-coordinator.ts";
import { createFormatCache } from "./format-cache.ts";
import { humanizeBytes } from "./format-catalog.ts";
import { selectModeFormats, type ModeSelection } from "./format-selector.ts";
import { createMailbox, type MailboxOptions } from "./mailbox.ts";
import {
  AUDIO_CONTAINERS,
  ResourceError,
  VIDEO_CODECS,
  VIDEO_CONTAINERS,
  createCancelToken,
  type CancelToken,
  type DownloadOutcome,
  type DownloadRequest,
  type MediaBackend,
  type MediaMode,
  type ProgressEvent,
  type QueueItem,
  type QueueSettings,
  type RawDownloadOptions,
} from "./media-types.ts";
import type { ProgressMessage, ProgressSource } from "./progress.ts";
import {
  createQueueEngine,
  QUEUE_ADD_STATUS,
  queueAddIssue,
  type QueueAddIssue,
  type QueueEditResult,
  type QueueFileSystem,
  type QueueFinishResult,
  type QueueMessage,
  type QueueStartResult,
  type QueueState,
} from "./queue-engine.ts";
import {
  isMixedUrl,
  isPlaylistUrl,
  stripListParam,
  stripUrlWhitespace,
  toPlaylistUrl,
} from "./url-utils.ts";

// ============================================================================
// Types
// ============================================================================

export interface SessionConfig {
  defaultOutputDir: string;
  fetchDebounceMs: number;
  formatCacheMaxEntries: number;
  mailbox?: Partial<MailboxOptions>;
  networkDefaults?: NetworkDefaults;
}

export interface SessionDeps {
  backend: MediaBackend;
  fs?: QueueFileSystem;
  log?: Logger;
  now?: () => Date;
}

export type MixedUrlChoice = "video" | "playlist";

export interface UrlChangeRequest {
  force?: boolean;
  /** How to treat a watch URL that also names a playlist */
  mixedChoice?: MixedUrlChoice;
}

export interface Selection {
  mode: MediaMode | "";
  container: string;
  codec: string;
  formatLabel: string;
  convertToMp4: boolean;
  playlistEnabled: boolean;
  playlistItems: string;
  outputDir: string;
}

export interface SessionOptionsUpdate extends Partial<RawDownloadOptions> {
  convertToMp4?: boolean;
  playlistEnabled?: boolean;
  playlistItems?: string;
  outputDir?: string;
}

export type DownloadKind = "single" | "queue";

export interface SessionSnapshot {
  url: string;
  status: string;
  isPlaylist: boolean;
  mixedUrlPending: boolean;
  fetch: Pick<FetchState, "status" | "isFetching" | "lastFetchFailed">;
  previewTitle: string;
  audioLanguages: string[];
  selection: Selection;
  estimatedSize: string;
  formats: { labels: string[]; codecFallbackUsed: boolean };
  options: RawDownloadOptions;
  isDownloading: boolean;
  downloadKind: DownloadKind | null;
  cancelRequested: boolean;
  progress: ProgressEvent | null;
  progressItem: string;
  queue: QueueState;
}

export type SessionEvent =
  | { type: "state"; snapshot: SessionSnapshot }
  | { type: "progress"; source: ProgressSource; event: ProgressEvent }
  | { type: "item"; label: string }
  | { type: "single-finished"; outcome: DownloadOutcome }
  | { type: "queue-finished"; outcome: QueueFinishResult["outcome"]; failedItems: number };

export type SessionListener = (event: SessionEvent) => void;

export type SingleStartIssue = "busy" | "missing_url" | "mixed_url" | "formats_unavailable";

export type SingleStartResult =
  | { ok: true }
  | { ok: false; reason: SingleStartIssue; message: string }
  | { ok: false; reason: "cancelled"; message: string }
  | { ok: false; reason: "output_dir"; message: string; path: string };

export type QueueAddResult =
  | { ok: true; item: QueueItem }
  | { ok: false; reason: "busy" }
  | { ok: false; reason: QueueAddIssue; message: string };

export type SelectionResult =
  | { ok: true; labels: string[]; codecFallbackUsed: boolean }
  | { ok: false; reason: "invalid_mode" | "invalid_container" | "invalid_codec" | "busy" };

type SingleDoneMessage = { type: "single-done"; runId: number; outcome: DownloadOutcome };

export type ControlMessage = FetchMessage | QueueMessage | ProgressMessage | SingleDoneMessage;

const SINGLE_CANCELLED_MESSAGE = "Download cancelled";

const SINGLE_START_MESSAGES: Record<SingleStartIssue, string> = {
  busy: "A download is already running.",
  missing_url: "Please paste a video URL to download.",
  mixed_url: "Choose whether to download the video or the playlist.",
  formats_unavailable: "Formats have not been loaded yet.",
};

const FETCH_STATUS_TEXT: Record<FetchState["status"], string> = {
  idle: "Idle",
  fetching: "Fetching formats...",
  loaded: "Formats loaded",
  "loaded-cached": "Formats loaded (cached)",
  "no-formats": "No formats found",
  failed: "Could not fetch formats",
};

const CODEC_FALLBACK_STATUS =
  "Chosen codec not available for this container; showing all formats in container";

const EMPTY_RAW_OPTIONS: RawDownloadOptions = {
  networkTimeout: "",
  networkRetries: "",
  retryBackoff: "",
  subtitleLanguages: "",
  writeSubtitles: false,
  embedSubtitles: false,
  audioLanguage: "",
  customFilename: "",
};

export const defaultFileSystem: QueueFileSystem = {
  async ensureDir(path) {
    await mkdir(path, { recursive: true });
  },
};

// ============================================================================
// Session
// ============================================================================

export function createSession(config: SessionConfig, deps: SessionDeps) {
  const log = deps.log ?? silentLogger;
  const fs = deps.fs ?? defaultFileSystem;
  const now = deps.now ?? (() => new Date());
  const networkDefaults = config.networkDefaults ?? DEFAULT_NETWORK;
  const listeners = new Set<SessionListener>();

  let url = "";
  let status = "Idle";
  let urlIsPlaylist = false;
  let mixedUrlPending = false;
  let selection: Selection = emptySelection(config.defaultOutputDir);
  let modeFormats: ModeSelection = { labels: [], lookup: {}, codecFallbackUsed: false };
  let lastFallbackNotice = "";
  let rawOptions: RawDownloadOptions = {
    ...EMPTY_RAW_OPTIONS,
    networkTimeout: String(networkDefaults.timeoutSeconds),
    networkRetries: String(networkDefaults.retries),
    retryBackoff: String(networkDefaults.backoffSeconds),
  };

  let single: { runId: number; token: CancelToken } | null = null;
  /** Set while the output folder is created, before the worker starts */
  let startingToken: CancelToken | null = null;
  let singleRunId = 0;
  let cancelRequested = false;
  let progress: ProgressEvent | null = null;
  let progressItem = "";

  function emptySelection(outputDir: string): Selection {
    return {
      mode: "",
      container: "",
      codec: "",
      formatLabel: "",
      convertToMp4: false,
      playlistEnabled: false,
      playlistItems: "",
      outputDir,
    };
  }

  function emit(event: SessionEvent): void {
    for (const listener of listeners) {
      try {
        listener(event);
      } catch (err) {
        log.error("Session listener failed", { error: errorMessage(err) });
      }
    }
  }

  function emitState(): void {
    emit({ type: "state", snapshot: getSnapshot() });
  }

  function isDownloading(): boolean {
    return single !== null || startingToken !== null || queue.isActive();
  }

  // --------------------------------------------------------------------------
  // Collaborators
  // --------------------------------------------------------------------------

  const mailbox = createMailbox<ControlMessage>(handleMessage, config.mailbox, log);
  const cache = createFormatCache(config.formatCacheMaxEntries);

  const coordinator = createFetchCoordinator(
    { debounceMs: config.fetchDebounceMs },
    {
      backend: deps.backend,
      cache,
      post: mailbox.post,
      isBusy: isDownloading,
      onUpdate: onFetchUpdate,
      log,
    },
  );

  const queue = createQueueEngine({
    backend: deps.backend,
    fs,
    post: mailbox.post,
    defaultOutputDir: () => selection.outputDir || config.defaultOutputDir,
    networkDefaults,
    isBusy: () => single !== null || startingToken !== null,
    onChange: () => emitState(),
    onFinish: onQueueFinish,
    log,
  });

  function handleMessage(message: ControlMessage): void {
    switch (message.type) {
      case "fetch-result":
      case "fetch-error":
        coordinator.receive(message);
        return;
      case "queue-item-started":
        if (queue.isActive()) {
          progress = null;
          progressItem = message.label;
          emit({ type: "item", label: message.label });
        }
        queue.receive(message);
        return;
      case "queue-item-done":
        queue.receive(message);
        return;
      case "progress":
        onProgress(message);
        return;
      case "single-done":
        onSingleDone(message);
        return;
    }
  }

  function onProgress(message: ProgressMessage): void {
    if (message.event.status === "item") {
      progressItem = message.event.label;
      emit({ type: "item", label: message.event.label });
      return;
    }
    progress = message.event;
    emit({ type: "progress", source: message.source, event: message.event });
  }

  // --------------------------------------------------------------------------
  // Format selection
  // --------------------------------------------------------------------------

  function resetFormatSelection(): void {
    selection = {
      ...selection,
      container: "",
      codec: "",
      formatLabel: "",
      convertToMp4: false,
    };
  }

  function recomputeModeFormats(): void {
    const fetchState = coordinator.getState();
    const collection = fetchState.collection;
    modeFormats = collection
      ? selectModeFormats(selection.mode, selection.container, selection.codec, collection)
      : { labels: [], lookup: {}, codecFallbackUsed: false };

    if (modeFormats.codecFallbackUsed) {
      status = CODEC_FALLBACK_STATUS;
      const noticeKey = `${selection.mode}|${selection.container}|${selection.codec}`;
      if (noticeKey !== lastFallbackNotice) {
        lastFallbackNotice = noticeKey;
        log.info(CODEC_FALLBACK_STATUS, {
          container: selection.container,
          codec: selection.codec,
        });
      }
    } else if (status === CODEC_FALLBACK_STATUS) {
      status = FETCH_STATUS_TEXT[fetchState.status];
    }
    if (!modeFormats.lookup[selection.formatLabel]) {
      selection = { ...selection, formatLabel: "" };
    }
  }

  function onFetchUpdate(state: FetchState): void {
    if (mixedUrlPending && state.status === "idle") {
      status = SINGLE_START_MESSAGES.mixed_url;
    } else if (state.status !== "idle" || !isDownloading()) {
      status = FETCH_STATUS_TEXT[state.status];
    }
    const loaded = state.status === "loaded" || state.status === "loaded-cached";
    if (loaded && state.collection) {
      if (state.collection.isPlaylist) {
        selection = { ...selection, playlistEnabled: true };
      }
      resetFormatSelection();
    }
    recomputeModeFormats();
    emitState();
  }

  function onUrlChanged(rawUrl: string, request: UrlChangeRequest = {}): void {
    let next = stripUrlWhitespace(rawUrl);
    if (next && isMixedUrl(next)) {
      if (request.mixedChoice === "video") next = stripListParam(next);
      else if (request.mixedChoice === "playlist") next = toPlaylistUrl(next);
    }

    url = next;
    mixedUrlPending = next !== "" && isMixedUrl(next);
    urlIsPlaylist = next !== "" && !mixedUrlPending && isPlaylistUrl(next);
    selection = { ...emptySelection(selection.outputDir), playlistEnabled: urlIsPlaylist };
    modeFormats = { labels: [], lookup: {}, codecFallbackUsed: false };
    lastFallbackNotice = "";

    coordinator.onUrlChanged(next, {
      force: request.force,
      suppressFetch: mixedUrlPending,
    });
  }

  function onFetchFormats(force = false): void {
    if (mixedUrlPending) return;
    coordinator.fetchNow(force);
  }

  function applyModeFormats(
    mode: MediaMode | "",
    container: string,
    codec: string,
  ): SelectionResult {
    if (isDownloading()) return { ok: false, reason: "busy" };
    if (mode !== "" && mode !== "audio" && mode !== "video") {
      return { ok: false, reason: "invalid_mode" };
    }
    const containers: readonly string[] =
      mode === "audio" ? AUDIO_CONTAINERS : VIDEO_CONTAINERS;
    if (container !== "" && !containers.includes(container)) {
      return { ok: false, reason: "invalid_container" };
    }
    const normalizedCodec = codec.toLowerCase();
    if (
      normalizedCodec !== "" &&
      !VIDEO_CODECS.some((c) => c === normalizedCodec)
    ) {
      return { ok: false, reason: "invalid_codec" };
    }

    selection = {
      ...selection,
      mode,
      container,
      codec: mode === "video" ? normalizedCodec : "",
    };
    recomputeModeFormats();
    emitState();
    return {
      ok: true,
      labels: [...modeFormats.labels],
      codecFallbackUsed: modeFormats.codecFallbackUsed,
    };
  }

  function selectFormat(label: string): boolean {
    if (isDownloading() || !modeFormats.lookup[label]) return false;
    selection = { ...selection, formatLabel: label };
    emitState();
    return true;
  }

  function updateOptions(update: SessionOptionsUpdate): void {
    const { convertToMp4, playlistEnabled, playlistItems, outputDir, ...raw } = update;
    rawOptions = { ...rawOptions, ...raw };
    selection = {
      ...selection,
      convertToMp4: convertToMp4 ?? selection.convertToMp4,
      playlistEnabled: playlistEnabled ?? selection.playlistEnabled,
      playlistItems: playlistItems ?? selection.playlistItems,
      outputDir: outputDir ?? selection.outputDir,
    };
    emitState();
  }

  // --------------------------------------------------------------------------
  // Downloads
  // --------------------------------------------------------------------------

  function currentOptions() {
    return buildDownloadOptions(rawOptions, selection.mode === "video", networkDefaults);
  }

  function selectedFormat() {
    return modeFormats.lookup[selection.formatLabel] ?? null;
  }

  function captureQueueSettings(): QueueSettings {
    return buildQueueSettings({
      mode: selection.mode,
      container: selection.container,
      codec: selection.codec,
      convertToMp4: selection.convertToMp4,
      formatLabel: selection.formatLabel,
      format: selectedFormat(),
      outputDir: selection.outputDir,
      playlistItems: selection.playlistItems,
      options: currentOptions(),
    });
  }

  function singleIssue(): SingleStartIssue | null {
    if (isDownloading()) return "busy";
    if (!url) return "missing_url";
    if (mixedUrlPending) return "mixed_url";
    if (modeFormats.labels.length === 0) return "formats_unavailable";
    return null;
  }

  async function runSingle(
    runId: number,
    request: DownloadRequest,
    token: CancelToken,
  ): Promise<void> {
    let outcome: DownloadOutcome;
    try {
      outcome = await deps.backend.runDownload(request, token, (event) =>
        mailbox.post({ type: "progress", source: "single", event }),
      );
    } catch (err) {
      log.error("Download failed", { url: request.url, error: errorMessage(err) });
      outcome = "error";
    }
    mailbox.post({ type: "single-done", runId, outcome });
  }

  /**
   * Start downloading the current selection. The output directory is created
   * first; if that fails nothing starts.
   */
  async function startSingle(): Promise<SingleStartResult> {
    const issue = singleIssue();
    if (issue) {
      return { ok: false, reason: issue, message: SINGLE_START_MESSAGES[issue] };
    }

    const outputDir = expandOutputDir(selection.outputDir || config.defaultOutputDir);
    const mode: MediaMode = selection.mode === "audio" ? "audio" : "video";
    const { request, playlistNormalized } = buildSingleDownloadRequest({
      url,
      outputDir,
      format: selectedFormat(),
      formatLabel: selection.formatLabel,
      mode,
      container: selection.container,
      codec: selection.codec,
      convertToMp4: selection.convertToMp4,
      playlistEnabled: selection.playlistEnabled && (urlIsPlaylist || isFetchedPlaylist()),
      playlistItems: selection.playlistItems,
      options: currentOptions(),
    });

    const token = createCancelToken();
    startingToken = token;
    cancelRequested = false;
    try {
      await fs.ensureDir(outputDir);
    } catch (err) {
      startingToken = null;
      cancelRequested = false;
      const error = new ResourceError(
        `Could not create output folder: ${errorMessage(err)}`,
        outputDir,
      );
      log.error(error.message, { path: outputDir });
      status = "Output folder unavailable";
      emitState();
      coordinator.resume();
      return { ok: false, reason: "output_dir", message: error.message, path: error.path };
    }
    startingToken = null;

    if (token.cancelled) {
      cancelRequested = false;
      status = SINGLE_CANCELLED_MESSAGE;
      log.info("Download cancelled before it started", { url: request.url });
      emitState();
      emit({ type: "single-finished", outcome: "cancelled" });
      coordinator.resume();
      return { ok: false, reason: "cancelled", message: SINGLE_CANCELLED_MESSAGE };
    }

    if (playlistNormalized) {
      log.info("Playlist items normalized", { items: request.playlistItems });
    }

    singleRunId++;
    single = { runId: singleRunId, token };
    progress = null;
    progressItem = "";
    status = "Downloading...";
    emitState();

    runSingle(singleRunId, request, token).catch((err) => {
      log.error("Download worker crashed", { error: errorMessage(err) });
    });
    return { ok: true };
  }

  function onSingleDone(message: SingleDoneMessage): void {
    if (!single || single.runId !== message.runId) return;
    single = null;
    cancelRequested = false;
    status =
      message.outcome === "success"
        ? "Download complete"
        : message.outcome === "cancelled"
          ? SINGLE_CANCELLED_MESSAGE
          : "Download failed";
    emitState();
    emit({ type: "single-finished", outcome: message.outcome });
    coordinator.resume();
  }

  function isFetchedPlaylist(): boolean {
    return coordinator.getState().collection?.isPlaylist ?? false;
  }

  function addToQueue(): QueueAddResult {
    if (isDownloading()) return { ok: false, reason: "busy" };
    const settings = captureQueueSettings();
    const issue = queueAddIssue(
      url,
      urlIsPlaylist || isFetchedPlaylist() || isPlaylistUrl(url),
      modeFormats.labels.length > 0,
      settings,
    );
    if (issue) {
      status = QUEUE_ADD_STATUS[issue];
      log.info(QUEUE_ADD_STATUS[issue], { url });
      emitState();
      return { ok: false, reason: issue, message: QUEUE_ADD_STATUS[issue] };
    }
    return { ok: true, item: queue.add(url, settings) };
  }

  function startQueue(): QueueStartResult {
    const result = queue.start();
    if (result.ok) {
      cancelRequested = false;
      progress = null;
      progressItem = "";
      status = "Downloading queue...";
      emitState();
    } else if (result.reason === "invalid") {
      status = result.message;
      emitState();
    }
    return result;
  }

  function onQueueFinish(result: QueueFinishResult): void {
    cancelRequested = false;
    progress = null;
    progressItem = "";
    status = "Idle";
    emitState();
    emit({ type: "queue-finished", outcome: result.outcome, failedItems: result.failedItems });
    coordinator.resume();
  }

  /**
   * Request cancellation of whatever is running. Returns false when idle or
   * already cancelling.
   */
  function cancel(): boolean {
    if (!isDownloading() || cancelRequested) return false;
    cancelRequested = true;
    if (single) single.token.cancel();
    startingToken?.cancel();
    queue.cancel();
    status = "Cancelling download…";
    log.info("Cancellation requested");
    emitState();
    return true;
  }

  // --------------------------------------------------------------------------
  // Queue edits
  // --------------------------------------------------------------------------

  function removeFromQueue(ids: readonly string[]): QueueEditResult {
    return queue.remove(ids);
  }

  function moveQueueItems(ids: readonly string[], direction: "up" | "down"): QueueEditResult {
    return direction === "up" ? queue.moveUp(ids) : queue.moveDown(ids);
  }

  function clearQueue(): QueueEditResult {
    return queue.clear();
  }

  // --------------------------------------------------------------------------
  // Read side
  // --------------------------------------------------------------------------

  function getSnapshot(): SessionSnapshot {
    const fetchState = coordinator.getState();
    const collection = fetchState.collection;
    const queueState = queue.getState();
    return {
      url,
      status,
      isPlaylist: urlIsPlaylist || (collection?.isPlaylist ?? false),
      mixedUrlPending,
      fetch: {
        status: fetchState.status,
        isFetching: fetchState.isFetching,
        lastFetchFailed: fetchState.lastFetchFailed,
      },
      previewTitle: collection?.previewTitle ?? "",
      audioLanguages: collection ? [...collection.audioLanguages] : [],
      selection: { ...selection },
      estimatedSize: humanizeBytes(selectedFormat()?.filesize ?? null),
      formats: {
        labels: [...modeFormats.labels],
        codecFallbackUsed: modeFormats.codecFallbackUsed,
      },
      options: { ...rawOptions },
      isDownloading: isDownloading(),
      downloadKind: single || startingToken ? "single" : queueState.active ? "queue" : null,
      cancelRequested,
      progress,
      progressItem,
      queue: queueState,
    };
  }

  function subscribe(listener: SessionListener): () => void {
    listeners.add(listener);
    return () => {
      listeners.delete(listener);
    };
  }

  function diagnostics(): string {
    return buildDiagnosticsReport({
      generatedAt: now(),
      status,
      url,
      mode: selection.mode,
      container: selection.container,
      codec: selection.codec,
      formatLabel: selection.formatLabel,
      previewTitle: coordinator.getState().collection?.previewTitle ?? "",
      queueItems: queue.getState().items,
      queueActive: queue.isActive(),
      isDownloading: isDownloading(),
      options: currentOptions(),
    });
  }

  function start(): void {
    mailbox.start();
  }

  function dispose(): void {
    if (single) single.token.cancel();
    startingToken?.cancel();
    queue.cancel();
    coordinator.dispose();
    mailbox.stop();
    listeners.clear();
  }

  return {
    start,
    dispose,
    onUrlChanged,
    onFetchFormats,
    applyModeFormats,
    selectFormat,
    updateOptions,
    startSingle,
    addToQueue,
    startQueue,
    cancel,
    removeFromQueue,
    moveQueueItems,
    clearQueue,
    getSnapshot,
    subscribe,
    diagnostics,
  };
}

export type Session = ReturnType<typeof createSession>;
