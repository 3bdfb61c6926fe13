/**
 * Format fetch coordinator.
 *
 * Owns the debounce timer, the request sequence and the format cache.
 * Background fetches never touch state directly: they post a message to the
 * mailbox, and the mailbox handler routes it back through `receive`.
 */

import { errorMessage, silentLogger, type Logger } from "../logger.ts";
import { buildFormatCollection, formatsFromInfo } from "./format-catalog.ts";
import type { FormatCache } from "./format-cache.ts";
import type { FormatCollection, MediaBackend } from "./media-types.ts";

// ============================================================================
// Types
// ============================================================================

export type FetchStatus =
  | "idle"
  | "fetching"
  | "loaded"
  | "loaded-cached"
  | "no-formats"
  | "failed";

export type FetchMessage =
  | {
      type: "fetch-result";
      requestId: number;
      url: string;
      collection: FormatCollection;
      formatCount: number;
    }
  | {
      type: "fetch-error";
      requestId: number;
      url: string;
      error: string;
    };

export interface FetchState {
  url: string;
  collection: FormatCollection | null;
  isFetching: boolean;
  lastFetchFailed: boolean;
  status: FetchStatus;
}

export interface FetchCoordinatorConfig {
  debounceMs: number;
}

export interface FetchCoordinatorDeps {
  backend: Pick<MediaBackend, "fetchMetadata">;
  cache: FormatCache;
  post: (message: FetchMessage) => void;
  /** Fetches are skipped while this returns true (e.g. a download is running) */
  isBusy?: () => boolean;
  /** Called after every change of visible state */
  onUpdate?: (state: FetchState) => void;
  log?: Logger;
}

export interface UrlChangeOptions {
  force?: boolean;
  suppressFetch?: boolean;
}

export const DEFAULT_FETCH_DEBOUNCE_MS = 600;

// ============================================================================
// Coordinator
// ============================================================================

export function createFetchCoordinator(
  config: FetchCoordinatorConfig,
  deps: FetchCoordinatorDeps,
) {
  const log = deps.log ?? silentLogger;
  const isBusy = deps.isBusy ?? (() => false);

  const state: FetchState = {
    url: "",
    collection: null,
    isFetching: false,
    lastFetchFailed: false,
    status: "idle",
  };
  let requestSeq = 0;
  let activeRequestId: number | null = null;
  let lastFetchedUrl = "";
  let debounceTimer: ReturnType<typeof setTimeout> | null = null;
  /** A fetch skipped while busy, replayed by `resume` */
  let deferred: { force: boolean } | null = null;

  function notify(): void {
    deps.onUpdate?.(getState());
  }

  function cancelDebounce(): void {
    if (debounceTimer !== null) {
      clearTimeout(debounceTimer);
      debounceTimer = null;
    }
  }

  async function runWorker(url: string, requestId: number): Promise<void> {
    try {
      const info = await deps.backend.fetchMetadata(url);
      deps.post({
        type: "fetch-result",
        requestId,
        url,
        collection: buildFormatCollection(info),
        formatCount: formatsFromInfo(info).length,
      });
    } catch (err) {
      log.warn("Could not fetch formats", { url, error: errorMessage(err) });
      deps.post({ type: "fetch-error", requestId, url, error: errorMessage(err) });
    }
  }

  function loadCached(url: string, collection: FormatCollection): void {
    lastFetchedUrl = url;
    state.collection = collection;
    state.status = "loaded-cached";
    notify();
  }

  /**
   * Fetch formats for the current URL now: cache first, then a background
   * fetch. No-op without a URL or while a fetch is in flight. While busy the
   * request is held until `resume`.
   */
  function fetchNow(force = false): void {
    debounceTimer = null;
    const url = state.url;
    if (!url || state.isFetching) return;
    if (isBusy()) {
      deferred = { force: force || (deferred?.force ?? false) };
      log.debug("Fetch deferred until the download finishes", { url });
      return;
    }
    deferred = null;

    const cached = deps.cache.get(url);
    if (cached) {
      loadCached(url, cached);
      return;
    }
    if (url === lastFetchedUrl && !force && !state.lastFetchFailed) return;

    state.isFetching = true;
    state.lastFetchFailed = false;
    state.status = "fetching";
    lastFetchedUrl = url;
    requestSeq++;
    activeRequestId = requestSeq;
    log.debug("Fetching formats", { url, requestId: requestSeq });
    notify();

    runWorker(url, requestSeq).catch((err) => {
      log.error("Fetch worker crashed", { url, error: errorMessage(err) });
    });
  }

  function onUrlChanged(url: string, options: UrlChangeOptions = {}): void {
    cancelDebounce();
    deferred = null;
    state.url = url.trim();
    state.collection = null;
    if (!state.isFetching) state.status = "idle";
    notify();

    if (options.suppressFetch) return;
    if (options.force) {
      fetchNow(true);
      return;
    }
    debounceTimer = setTimeout(() => fetchNow(false), config.debounceMs);
  }

  /**
   * Apply a message posted by a fetch worker. Must run on the drain tick.
   */
  function receive(message: FetchMessage): void {
    if (message.requestId !== activeRequestId) {
      log.debug("Discarding stale fetch result", {
        url: message.url,
        requestId: message.requestId,
      });
      return;
    }

    activeRequestId = null;
    state.isFetching = false;

    if (message.url !== state.url) {
      // Keep the result for later, but the user has moved on
      if (message.type === "fetch-result" && message.formatCount > 0) {
        deps.cache.set(message.url, message.collection);
      } else if (message.type === "fetch-error") {
        lastFetchedUrl = "";
      }
      state.status = "idle";
      notify();
      fetchNow(false);
      return;
    }

    if (message.type === "fetch-error") {
      lastFetchedUrl = "";
      state.lastFetchFailed = true;
      state.collection = null;
      state.status = "failed";
      notify();
      return;
    }

    state.lastFetchFailed = false;
    if (message.formatCount === 0) {
      state.collection = null;
      state.status = "no-formats";
      notify();
      return;
    }

    state.collection = message.collection;
    state.status = "loaded";
    deps.cache.set(message.url, message.collection);
    notify();
  }

  /** Run a fetch that was skipped while busy, if any */
  function resume(): void {
    if (!deferred || isBusy()) return;
    const { force } = deferred;
    deferred = null;
    fetchNow(force);
  }

  function getState(): FetchState {
    return { ...state };
  }

  function dispose(): void {
    cancelDebounce();
    deferred = null;
    activeRequestId = null;
  }

  return {
    onUrlChanged,
    fetchNow,
    resume,
    receive,
    getState,
    dispose,
    /** Latest issued request id, 0 before the first fetch */
    latestRequestId: () => requestSeq,
  };
}

export type FetchCoordinator = ReturnType<typeof createFetchCoordinator>;
