/**
 * Shared types for format metadata, captured settings and download jobs.
 * Raw shapes mirror the JSON printed by `yt-dlp -J`; everything else is the
 * orchestration layer's own model.
 */

// ============================================================================
// Raw metadata (as reported by the extraction backend)
// ============================================================================

/**
 * One entry of the `formats` array of an info document.
 */
export interface RawFormat {
  format_id?: string;
  ext?: string;
  vcodec?: string | null;
  acodec?: string | null;
  height?: number | null;
  width?: number | null;
  fps?: number | null;
  tbr?: number | null;
  abr?: number | null;
  filesize?: number | null;
  filesize_approx?: number | null;
  format_note?: string | null;
  language?: string | null;
}

/**
 * Info document for a single video or a playlist.
 */
export interface RawInfo {
  _type?: string;
  id?: string;
  title?: string | null;
  formats?: RawFormat[];
  entries?: RawInfo[] | null;
}

// ============================================================================
// Format catalog
// ============================================================================

/**
 * Immutable format descriptor derived from a RawFormat, or a synthetic
 * "best available" directive when `synthetic` is set.
 */
export interface MediaFormatDescriptor {
  readonly formatId: string;
  readonly ext: string;
  readonly vcodec: string;
  readonly acodec: string;
  readonly height: number | null;
  readonly width: number | null;
  readonly fps: number | null;
  /** Total bitrate in kbps */
  readonly totalBitrate: number | null;
  /** Audio bitrate in kbps */
  readonly audioBitrate: number | null;
  /** Estimated size in bytes */
  readonly filesize: number | null;
  readonly formatNote: string;
  readonly language: string | null;
  readonly synthetic: boolean;
  /** Backend format expression for synthetic entries (e.g. "bestaudio/best") */
  readonly selector: string | null;
}

export type FormatLookup = Record<string, MediaFormatDescriptor>;

/**
 * Labeled formats for one fetched URL.
 */
export interface FormatCollection {
  videoLabels: string[];
  videoLookup: FormatLookup;
  audioLabels: string[];
  audioLookup: FormatLookup;
  audioLanguages: string[];
  previewTitle: string;
  isPlaylist: boolean;
}

// ============================================================================
// User intent
// ============================================================================

export type MediaMode = "audio" | "video";

export const VIDEO_CONTAINERS = ["mp4", "webm"] as const;
export const AUDIO_CONTAINERS = ["m4a", "opus"] as const;
export const VIDEO_CODECS = ["avc1", "av01"] as const;

export type VideoContainer = (typeof VIDEO_CONTAINERS)[number];
export type AudioContainer = (typeof AUDIO_CONTAINERS)[number];
export type VideoCodec = (typeof VIDEO_CODECS)[number];

/**
 * Network, subtitle and naming options after clamping and sanitizing.
 */
export interface DownloadOptions {
  networkTimeoutSeconds: number;
  networkRetries: number;
  retryBackoffSeconds: number;
  subtitleLanguages: string[];
  writeSubtitles: boolean;
  embedSubtitles: boolean;
  audioLanguage: string;
  customFilename: string;
}

/**
 * Options as typed by the user, before clamping.
 */
export interface RawDownloadOptions {
  networkTimeout: string;
  networkRetries: string;
  retryBackoff: string;
  subtitleLanguages: string;
  writeSubtitles: boolean;
  embedSubtitles: boolean;
  audioLanguage: string;
  customFilename: string;
}

/**
 * Settings snapshot captured when an item is added to the queue.
 * Empty strings mean "not chosen".
 */
export interface QueueSettings extends DownloadOptions {
  mode: MediaMode | "";
  container: string;
  codec: string;
  convertToMp4: boolean;
  formatLabel: string;
  estimatedSize: string;
  outputDir: string;
  playlistItems: string;
}

export interface QueueItem {
  id: string;
  url: string;
  settings: QueueSettings;
}

// ============================================================================
// Download jobs
// ============================================================================

/**
 * Fully resolved request handed to the download backend.
 */
export interface DownloadRequest {
  url: string;
  format: MediaFormatDescriptor | null;
  formatLabel: string;
  mode: MediaMode;
  container: string;
  codec: string;
  convertToMp4: boolean;
  outputDir: string;
  playlistEnabled: boolean;
  playlistItems: string | null;
  networkTimeoutSeconds: number;
  networkRetries: number;
  retryBackoffSeconds: number;
  subtitleLanguages: string[];
  writeSubtitles: boolean;
  embedSubtitles: boolean;
  audioLanguage: string;
  customFilename: string;
}

export type ProgressEvent =
  | { status: "downloading"; percent: number | null; speed: string; eta: string }
  | { status: "item"; label: string }
  | { status: "finished" }
  | { status: "cancelled" };

export type DownloadOutcome = "success" | "error" | "cancelled";

/**
 * Cooperative cancellation flag, polled by the backend.
 */
export interface CancelToken {
  readonly cancelled: boolean;
  cancel(): void;
}

export function createCancelToken(): CancelToken {
  let cancelled = false;
  return {
    get cancelled() {
      return cancelled;
    },
    cancel() {
      cancelled = true;
    },
  };
}

/**
 * Metadata and download collaborator.
 */
export interface MediaBackend {
  fetchMetadata(url: string): Promise<RawInfo>;
  runDownload(
    request: DownloadRequest,
    token: CancelToken,
    onProgress: (event: ProgressEvent) => void,
  ): Promise<DownloadOutcome>;
}

// ============================================================================
// Errors
// ============================================================================

/**
 * Network or extraction failure while retrieving metadata.
 */
export class FetchError extends Error {
  constructor(
    message: string,
    public readonly url: string,
  ) {
    super(message);
    this.name = "FetchError";
  }
}

/**
 * Metadata was retrieved but carries no formats at all.
 */
export class NoFormatsError extends Error {
  constructor(public readonly url: string) {
    super(`No formats found for ${url}`);
    this.name = "NoFormatsError";
  }
}

/**
 * A local resource (e.g. the output directory) is unavailable.
 */
export class ResourceError extends Error {
  constructor(
    message: string,
    public readonly path: string,
  ) {
    super(message);
    this.name = "ResourceError";
  }
}
