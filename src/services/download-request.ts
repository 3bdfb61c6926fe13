/**
 * Download request builder.
 *
 * Everything here is user-typed free text turned into bounded values:
 * nothing throws, bad input falls back to defaults or empty strings.
 */

import { homedir } from "node:os";
import { resolve } from "node:path";
import { humanizeBytes, isAudioOnly } from "./format-catalog.ts";
import type { ResolvedFormat } from "./format-selector.ts";
import type {
  DownloadOptions,
  DownloadRequest,
  MediaFormatDescriptor,
  MediaMode,
  QueueSettings,
  RawDownloadOptions,
} from "./media-types.ts";

// ============================================================================
// Bounds
// ============================================================================

export interface NetworkDefaults {
  timeoutSeconds: number;
  retries: number;
  backoffSeconds: number;
}

export const DEFAULT_NETWORK: NetworkDefaults = {
  timeoutSeconds: 20,
  retries: 3,
  backoffSeconds: 1.5,
};

export const NETWORK_BOUNDS = {
  timeoutSeconds: { min: 1, max: 300 },
  retries: { min: 0, max: 10 },
  backoffSeconds: { min: 0, max: 30 },
} as const;

export const MAX_FILENAME_LENGTH = 160;

const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;

function parseDecimal(value: string): number | null {
  const trimmed = value.trim();
  if (!DECIMAL_PATTERN.test(trimmed)) return null;
  const parsed = Number(trimmed);
  return Number.isFinite(parsed) ? parsed : null;
}

function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

/**
 * Parse an integer setting. Decimals are truncated ("2.9" -> 2); anything
 * unparsable yields the default, anything out of range is clamped.
 */
export function parseIntSetting(
  value: string,
  defaultValue: number,
  min: number,
  max: number,
): number {
  const parsed = parseDecimal(value);
  if (parsed === null) return defaultValue;
  return clamp(Math.trunc(parsed), min, max);
}

export function parseFloatSetting(
  value: string,
  defaultValue: number,
  min: number,
  max: number,
): number {
  const parsed = parseDecimal(value);
  if (parsed === null) return defaultValue;
  return clamp(parsed, min, max);
}

// ============================================================================
// Free-text fields
// ============================================================================

export function parseSubtitleLanguages(value: string): string[] {
  const languages: string[] = [];
  for (const token of value.split(",")) {
    const clean = token.trim().toLowerCase();
    if (clean && !languages.includes(clean)) languages.push(clean);
  }
  return languages;
}

const ILLEGAL_FILENAME_CHARS = /[\\/:*?"<>|\u0000-\u001f\u007f]+/g;

function collapseSpaces(value: string): string {
  return value.replace(/\s+/g, " ").trim();
}

function trimDots(value: string): string {
  return value.replace(/^\.+/, "").replace(/\.+$/, "");
}

/**
 * Turn a user-typed name into a safe file stem. Returns "" when nothing
 * usable remains, which means "use the default naming".
 */
export function sanitizeCustomFilename(value: string): string {
  let stem = collapseSpaces(value);
  stem = stem.replace(ILLEGAL_FILENAME_CHARS, " ");
  stem = trimDots(stem.trim());
  stem = collapseSpaces(stem);
  stem = stem.replace(/\.[A-Za-z0-9]{1,5}$/, "").trim();
  if (stem === "" || stem === "." || stem === "..") return "";
  return stem.slice(0, MAX_FILENAME_LENGTH);
}

/**
 * Strip all whitespace from a playlist selection.
 * `changed` is true when the input had whitespace to strip.
 */
export function normalizePlaylistItems(value: string): {
  items: string | null;
  changed: boolean;
} {
  const normalized = value.replace(/\s+/g, "");
  return {
    items: normalized || null,
    changed: value !== "" && normalized !== value,
  };
}

export function expandOutputDir(dir: string): string {
  const trimmed = dir.trim();
  if (trimmed === "~") return homedir();
  if (trimmed.startsWith("~/")) return resolve(homedir(), trimmed.slice(2));
  return resolve(trimmed);
}

// ============================================================================
// Builders
// ============================================================================

export function buildDownloadOptions(
  raw: RawDownloadOptions,
  isVideoMode: boolean,
  defaults: NetworkDefaults = DEFAULT_NETWORK,
): DownloadOptions {
  const writeSubtitles = raw.writeSubtitles && isVideoMode;
  return {
    networkTimeoutSeconds: parseIntSetting(
      raw.networkTimeout,
      defaults.timeoutSeconds,
      NETWORK_BOUNDS.timeoutSeconds.min,
      NETWORK_BOUNDS.timeoutSeconds.max,
    ),
    networkRetries: parseIntSetting(
      raw.networkRetries,
      defaults.retries,
      NETWORK_BOUNDS.retries.min,
      NETWORK_BOUNDS.retries.max,
    ),
    retryBackoffSeconds: parseFloatSetting(
      raw.retryBackoff,
      defaults.backoffSeconds,
      NETWORK_BOUNDS.backoffSeconds.min,
      NETWORK_BOUNDS.backoffSeconds.max,
    ),
    subtitleLanguages: parseSubtitleLanguages(raw.subtitleLanguages),
    writeSubtitles,
    embedSubtitles: writeSubtitles && raw.embedSubtitles,
    audioLanguage: raw.audioLanguage.trim(),
    customFilename: sanitizeCustomFilename(raw.customFilename),
  };
}

export interface QueueSettingsInput {
  mode: MediaMode | "";
  container: string;
  codec: string;
  convertToMp4: boolean;
  formatLabel: string;
  format: MediaFormatDescriptor | null;
  outputDir: string;
  playlistItems: string;
  options: DownloadOptions;
}

export function buildQueueSettings(input: QueueSettingsInput): QueueSettings {
  return {
    mode: input.mode,
    container: input.container,
    codec: input.codec,
    convertToMp4: input.convertToMp4,
    formatLabel: input.formatLabel,
    estimatedSize: humanizeBytes(input.format?.filesize ?? null),
    outputDir: input.outputDir,
    playlistItems: input.playlistItems.trim(),
    ...input.options,
    subtitleLanguages: [...input.options.subtitleLanguages],
  };
}

export interface SingleRequestInput {
  url: string;
  outputDir: string;
  format: MediaFormatDescriptor | null;
  formatLabel: string;
  mode: MediaMode;
  container: string;
  codec: string;
  convertToMp4: boolean;
  playlistEnabled: boolean;
  playlistItems: string;
  options: DownloadOptions;
}

export function buildSingleDownloadRequest(input: SingleRequestInput): {
  request: DownloadRequest;
  playlistNormalized: boolean;
} {
  const { items, changed } = normalizePlaylistItems(input.playlistItems);
  return {
    request: {
      url: input.url,
      format: input.format,
      formatLabel: input.formatLabel,
      mode: input.mode,
      container: input.container,
      codec: input.codec,
      convertToMp4: input.convertToMp4,
      outputDir: expandOutputDir(input.outputDir),
      playlistEnabled: input.playlistEnabled,
      playlistItems: input.playlistEnabled ? items : null,
      ...input.options,
      subtitleLanguages: [...input.options.subtitleLanguages],
    },
    playlistNormalized: changed,
  };
}

/**
 * Request for one queue item. Network options are re-clamped since the
 * captured settings may come from an older session.
 */
export function buildQueueDownloadRequest(
  url: string,
  settings: QueueSettings,
  resolved: ResolvedFormat,
  defaultOutputDir: string,
  defaults: NetworkDefaults = DEFAULT_NETWORK,
): DownloadRequest {
  const mode: MediaMode =
    settings.mode || (isAudioOnly(resolved.format) ? "audio" : "video");
  const { items } = normalizePlaylistItems(settings.playlistItems);
  const writeSubtitles = settings.writeSubtitles && mode === "video";

  return {
    url,
    format: resolved.format,
    formatLabel: resolved.formatLabel,
    mode,
    container: resolved.container,
    codec: settings.codec,
    convertToMp4: settings.convertToMp4,
    outputDir: expandOutputDir(settings.outputDir || defaultOutputDir),
    playlistEnabled: resolved.isPlaylist,
    playlistItems: resolved.isPlaylist ? items : null,
    networkTimeoutSeconds: parseIntSetting(
      String(settings.networkTimeoutSeconds),
      defaults.timeoutSeconds,
      NETWORK_BOUNDS.timeoutSeconds.min,
      NETWORK_BOUNDS.timeoutSeconds.max,
    ),
    networkRetries: parseIntSetting(
      String(settings.networkRetries),
      defaults.retries,
      NETWORK_BOUNDS.retries.min,
      NETWORK_BOUNDS.retries.max,
    ),
    retryBackoffSeconds: parseFloatSetting(
      String(settings.retryBackoffSeconds),
      defaults.backoffSeconds,
      NETWORK_BOUNDS.backoffSeconds.min,
      NETWORK_BOUNDS.backoffSeconds.max,
    ),
    subtitleLanguages: [...settings.subtitleLanguages],
    writeSubtitles,
    embedSubtitles: writeSubtitles && settings.embedSubtitles,
    audioLanguage: settings.audioLanguage,
    customFilename: sanitizeCustomFilename(settings.customFilename),
  };
}
