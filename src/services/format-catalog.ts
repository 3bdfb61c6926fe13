/**
 * Format catalog builder.
 * Turns raw format lists into labeled, de-duplicated, ordered collections.
 *
 * Design:
 * - Pure functions only (no I/O)
 * - Deterministic: identical input always yields identical ordered output
 */

import type {
  FormatCollection,
  FormatLookup,
  MediaFormatDescriptor,
  RawFormat,
  RawInfo,
} from "./media-types.ts";

export const BEST_AUDIO_LABEL = "Best audio only";
export const BEST_AUDIO_SELECTOR = "bestaudio/best";

const VIDEO_HEIGHT_FLOOR = 480;
const AUDIO_BITRATE_FLOOR = 128;
const IGNORED_LANGUAGES = new Set(["none", "und", "unknown", "n/a", "na"]);

export type LabeledFormat = [label: string, format: MediaFormatDescriptor];

// ============================================================================
// Descriptors
// ============================================================================

function positiveOrNull(value: number | null | undefined): number | null {
  return typeof value === "number" && Number.isFinite(value) && value > 0
    ? value
    : null;
}

/**
 * Estimated size in bytes from `filesize`, falling back to `filesize_approx`.
 */
export function estimateFilesizeBytes(raw: RawFormat): number | null {
  const value = raw.filesize || raw.filesize_approx;
  if (typeof value !== "number" || !Number.isFinite(value)) return null;
  const size = Math.trunc(value);
  return size > 0 ? size : null;
}

export function describeFormat(raw: RawFormat): MediaFormatDescriptor {
  const language =
    typeof raw.language === "string" ? raw.language.trim().toLowerCase() : "";
  return {
    formatId: raw.format_id ?? "",
    ext: raw.ext ?? "",
    vcodec: raw.vcodec ?? "",
    acodec: raw.acodec ?? "",
    height: positiveOrNull(raw.height),
    width: positiveOrNull(raw.width),
    fps: positiveOrNull(raw.fps),
    totalBitrate: positiveOrNull(raw.tbr),
    audioBitrate: positiveOrNull(raw.abr),
    filesize: estimateFilesizeBytes(raw),
    formatNote: raw.format_note ?? "",
    language: language || null,
    synthetic: false,
    selector: null,
  };
}

/**
 * Build a synthetic entry that stands for a backend format expression.
 */
export function syntheticFormat(
  selector: string,
  audioOnly: boolean,
): MediaFormatDescriptor {
  return {
    formatId: "",
    ext: "",
    vcodec: audioOnly ? "none" : "",
    acodec: "",
    height: null,
    width: null,
    fps: null,
    totalBitrate: null,
    audioBitrate: null,
    filesize: null,
    formatNote: "",
    language: null,
    synthetic: true,
    selector,
  };
}

export function isAudioOnly(format: MediaFormatDescriptor): boolean {
  return format.vcodec === "none";
}

function audioRate(format: MediaFormatDescriptor): number {
  return format.audioBitrate || format.totalBitrate || 0;
}

// ============================================================================
// Pipeline
// ============================================================================

/**
 * Split into video and audio lists and trim entries below the quality floor.
 * A floor applies only when something better than it exists; entries with
 * unknown height or bitrate are always kept.
 */
export function splitAndFilterFormats(formats: MediaFormatDescriptor[]): {
  video: MediaFormatDescriptor[];
  audio: MediaFormatDescriptor[];
} {
  const videoHeights = formats
    .filter((f) => !isAudioOnly(f))
    .map((f) => f.height || 0);
  const maxHeight = videoHeights.length > 0 ? Math.max(...videoHeights) : 0;
  const minHeight = maxHeight <= VIDEO_HEIGHT_FLOOR ? 0 : VIDEO_HEIGHT_FLOOR;

  const audioRates = formats.filter(isAudioOnly).map(audioRate);
  const maxRate = audioRates.length > 0 ? Math.max(...audioRates) : 0;
  const minRate = maxRate <= AUDIO_BITRATE_FLOOR ? 0 : AUDIO_BITRATE_FLOOR;

  const video: MediaFormatDescriptor[] = [];
  const audio: MediaFormatDescriptor[] = [];
  for (const format of formats) {
    if (!isAudioOnly(format)) {
      if (format.height && format.height < minHeight) continue;
      video.push(format);
    } else {
      const rate = audioRate(format);
      if (rate && rate < minRate) continue;
      audio.push(format);
    }
  }
  return { video, audio };
}

/**
 * Keep one representative per (kind, container, codec, height, fps), the one
 * with the highest bitrate. Ties keep the first seen.
 */
export function collapseFormats(
  formats: MediaFormatDescriptor[],
): MediaFormatDescriptor[] {
  const collapsed = new Map<string, MediaFormatDescriptor>();
  const bitrate = (f: MediaFormatDescriptor) =>
    f.totalBitrate || f.audioBitrate || 0;

  for (const format of formats) {
    const audio = isAudioOnly(format);
    const signature = JSON.stringify([
      audio,
      format.ext,
      audio ? format.acodec : format.vcodec,
      audio ? 0 : format.height || 0,
      audio ? 0 : format.fps || 0,
    ]);
    const current = collapsed.get(signature);
    if (!current || bitrate(format) > bitrate(current)) {
      collapsed.set(signature, format);
    }
  }
  return [...collapsed.values()];
}

/**
 * Video before audio, mp4 first, AVC first, then tallest, then highest bitrate.
 */
export function sortFormats(
  formats: MediaFormatDescriptor[],
): MediaFormatDescriptor[] {
  const key = (f: MediaFormatDescriptor): number[] => [
    isAudioOnly(f) ? 1 : 0,
    f.ext === "mp4" ? 0 : 1,
    f.vcodec.includes("avc") ? 0 : 1,
    -(f.height || 0),
    -audioRate(f),
  ];

  return [...formats].sort((a, b) => {
    const ka = key(a);
    const kb = key(b);
    for (let i = 0; i < ka.length; i++) {
      if (ka[i] !== kb[i]) return ka[i] - kb[i];
    }
    return 0;
  });
}

export function humanizeBytes(sizeBytes: number | null): string {
  if (!sizeBytes) return "";
  if (sizeBytes < 1024) return `${sizeBytes} B`;

  const units = ["KiB", "MiB", "GiB", "TiB"];
  let value = sizeBytes;
  let unitIdx = -1;
  while (value >= 1024 && unitIdx < units.length - 1) {
    value /= 1024;
    unitIdx++;
  }
  if (unitIdx <= 0) return `${value.toFixed(0)} ${units[0]}`;
  return `${value.toFixed(1)} ${units[unitIdx]}`;
}

export function labelFormat(format: MediaFormatDescriptor): string {
  const ext = format.ext.toUpperCase();
  const size = humanizeBytes(format.filesize);

  if (isAudioOnly(format)) {
    const rate = format.audioBitrate || format.totalBitrate;
    const quality = rate ? `${Math.trunc(rate)}k` : "Audio";
    const codec = format.acodec || "audio";
    const sizePart = size ? ` ~${size}` : "";
    return `Audio ${ext} ${quality} (${codec})${sizePart} [${format.formatId}]`;
  }

  let res = format.height ? `${format.height}p` : "Video";
  if (format.height && format.width) {
    res = `${format.height}p ${format.width}x${format.height}`;
  }
  const codecs = [format.vcodec, format.acodec]
    .filter((c) => c && c !== "none")
    .join(" + ");

  const parts = [res, ext];
  if (format.fps) parts.push(`${format.fps}fps`);
  if (format.formatNote) parts.push(`[${format.formatNote}]`);
  if (size) parts.push(`~${size}`);
  if (codecs) parts.push(`(${codecs})`);
  return `${parts.join(" ")} [${format.formatId}]`;
}

/**
 * Collapse, sort and label. Entries without a format id are dropped; a label
 * seen before gets the format id appended.
 */
export function buildLabeledFormats(
  formats: MediaFormatDescriptor[],
): LabeledFormat[] {
  const seen = new Set<string>();
  const labeled: LabeledFormat[] = [];
  for (const format of sortFormats(collapseFormats(formats))) {
    if (!format.formatId) continue;
    let label = labelFormat(format);
    if (seen.has(label)) {
      label = `${label} (${format.formatId})`;
    }
    seen.add(label);
    labeled.push([label, format]);
  }
  return labeled;
}

export function extractAudioLanguages(
  formats: MediaFormatDescriptor[],
): string[] {
  const languages = new Set<string>();
  for (const format of formats) {
    if (!isAudioOnly(format) || !format.language) continue;
    if (IGNORED_LANGUAGES.has(format.language)) continue;
    languages.add(format.language);
  }
  return [...languages].sort();
}

// ============================================================================
// Info documents
// ============================================================================

/**
 * Formats of a single video, or of the first entry of a playlist.
 */
export function formatsFromInfo(info: RawInfo): RawFormat[] {
  let entry: RawInfo = info;
  if (info._type === "playlist" && info.entries && info.entries.length > 0) {
    entry = info.entries[0] ?? {};
  }
  return entry.formats ?? [];
}

export function isPlaylistInfo(info: RawInfo): boolean {
  return info._type === "playlist" || Array.isArray(info.entries);
}

function collapseWhitespace(value: string): string {
  return value.split(/\s+/).filter(Boolean).join(" ");
}

export function previewTitleFromInfo(info: RawInfo): string {
  const title = collapseWhitespace(info.title ?? "");
  if (title) return title;
  const first = info.entries?.[0];
  return first ? collapseWhitespace(first.title ?? "") : "";
}

function toLookup(labeled: LabeledFormat[]): FormatLookup {
  const lookup: FormatLookup = {};
  for (const [label, format] of labeled) {
    lookup[label] = format;
  }
  return lookup;
}

export function buildFormatCollection(info: RawInfo): FormatCollection {
  const formats = formatsFromInfo(info).map(describeFormat);
  const { video, audio } = splitAndFilterFormats(formats);
  const videoLabeled = buildLabeledFormats(video);
  const audioLabeled = buildLabeledFormats(audio);
  audioLabeled.unshift([
    BEST_AUDIO_LABEL,
    syntheticFormat(BEST_AUDIO_SELECTOR, true),
  ]);

  return {
    videoLabels: videoLabeled.map(([label]) => label),
    videoLookup: toLookup(videoLabeled),
    audioLabels: audioLabeled.map(([label]) => label),
    audioLookup: toLookup(audioLabeled),
    audioLanguages: extractAudioLanguages(formats),
    previewTitle: previewTitleFromInfo(info),
    isPlaylist: isPlaylistInfo(info),
  };
}
