/**
 * Mode/container/codec filtering over a format collection, with a
 * deterministic fallback chain.
 */

import type { Logger } from "../logger.ts";
import {
  BEST_AUDIO_LABEL,
  BEST_AUDIO_SELECTOR,
  buildFormatCollection,
  formatsFromInfo,
  isPlaylistInfo,
  syntheticFormat,
} from "./format-catalog.ts";
import {
  NoFormatsError,
  VIDEO_CODECS,
  VIDEO_CONTAINERS,
  type FormatCollection,
  type FormatLookup,
  type MediaFormatDescriptor,
  type MediaMode,
  type QueueSettings,
  type RawInfo,
} from "./media-types.ts";

export const BEST_AVAILABLE_LABEL = "Best available";
export const BEST_AVAILABLE_SELECTOR = "bestvideo+bestaudio/best";

export interface ModeSelection {
  labels: string[];
  lookup: FormatLookup;
  codecFallbackUsed: boolean;
}

const EMPTY_SELECTION: ModeSelection = {
  labels: [],
  lookup: {},
  codecFallbackUsed: false,
};

function includesValue<T extends string>(
  values: readonly T[],
  value: string,
): value is T {
  return values.some((v) => v === value);
}

/**
 * Case-insensitive codec match. `avc1` also matches h264 and `av01` also
 * matches av1; an empty or "any" preference matches everything.
 */
export function codecMatchesPreference(vcodec: string, pref: string): boolean {
  const codec = vcodec.trim().toLowerCase();
  const wanted = pref.trim().toLowerCase();
  if (!wanted || wanted === "any") return true;
  if (wanted.startsWith("avc1")) {
    return codec.includes("avc1") || codec.includes("h264");
  }
  if (wanted.startsWith("av01")) {
    return codec.includes("av01") || codec.includes("av1");
  }
  return codec.includes(wanted);
}

function filterVideoFormats(
  collection: FormatCollection,
  container: string,
  codec: string,
  allowAnyCodec: boolean,
): { labels: string[]; lookup: FormatLookup } {
  const labels: string[] = [];
  const lookup: FormatLookup = {};

  for (const label of collection.videoLabels) {
    const format = collection.videoLookup[label];
    if (!format) continue;
    if (!format.synthetic) {
      if (format.ext.toLowerCase() !== container) continue;
      if (!allowAnyCodec && !codecMatchesPreference(format.vcodec, codec)) {
        continue;
      }
    }
    labels.push(label);
    lookup[label] = format;
  }
  return { labels, lookup };
}

function bestAvailable(): ModeSelection {
  return {
    labels: [BEST_AVAILABLE_LABEL],
    lookup: {
      [BEST_AVAILABLE_LABEL]: syntheticFormat(BEST_AVAILABLE_SELECTOR, false),
    },
    codecFallbackUsed: false,
  };
}

/**
 * Labels offered for a mode/container/codec choice.
 *
 * Video needs both a known container and a known codec, otherwise nothing is
 * offered. When nothing matches the codec the codec is ignored
 * (`codecFallbackUsed`), and when nothing matches the container either a
 * single synthetic "Best available" entry is returned.
 */
export function selectModeFormats(
  mode: MediaMode | "",
  container: string,
  codec: string,
  collection: FormatCollection,
): ModeSelection {
  if (mode === "audio") {
    if (collection.audioLabels.length === 0) {
      return {
        labels: [BEST_AUDIO_LABEL],
        lookup: {
          [BEST_AUDIO_LABEL]: syntheticFormat(BEST_AUDIO_SELECTOR, true),
        },
        codecFallbackUsed: false,
      };
    }
    return {
      labels: [...collection.audioLabels],
      lookup: { ...collection.audioLookup },
      codecFallbackUsed: false,
    };
  }

  if (mode !== "video") return EMPTY_SELECTION;
  if (
    !includesValue(VIDEO_CONTAINERS, container) ||
    !includesValue(VIDEO_CODECS, codec)
  ) {
    return EMPTY_SELECTION;
  }

  const exact = filterVideoFormats(collection, container, codec, false);
  if (exact.labels.length > 0) {
    return { ...exact, codecFallbackUsed: false };
  }

  const anyCodec = filterVideoFormats(collection, container, codec, true);
  if (anyCodec.labels.length > 0) {
    return { ...anyCodec, codecFallbackUsed: true };
  }

  return bestAvailable();
}

export interface ResolvedFormat {
  formatLabel: string;
  format: MediaFormatDescriptor;
  container: string;
  isPlaylist: boolean;
  title: string;
}

/**
 * Re-resolve a captured selection against freshly fetched metadata.
 *
 * The captured label wins when it is still offered; otherwise the first
 * offered label is used and the substitution is logged. Throws
 * NoFormatsError only when the metadata has no formats at all.
 */
export function resolveFormatForMetadata(
  url: string,
  info: RawInfo,
  settings: Pick<QueueSettings, "mode" | "container" | "codec" | "formatLabel">,
  log: Logger,
): ResolvedFormat {
  if (formatsFromInfo(info).length === 0) {
    throw new NoFormatsError(url);
  }

  const collection = buildFormatCollection(info);
  let selection = selectModeFormats(
    settings.mode,
    settings.container,
    settings.codec,
    collection,
  );
  if (selection.codecFallbackUsed) {
    log.info("Chosen codec not available; using any codec for container", {
      url,
      container: settings.container,
      codec: settings.codec,
    });
  }
  if (selection.labels.length === 0) {
    selection = bestAvailable();
  }

  const desired = settings.formatLabel;
  let formatLabel = selection.labels[0];
  if (desired && selection.lookup[desired]) {
    formatLabel = desired;
  } else if (desired) {
    log.info(`Format '${desired}' missing; using '${formatLabel}'`, { url });
  }

  return {
    formatLabel,
    format:
      selection.lookup[formatLabel] ??
      syntheticFormat(BEST_AVAILABLE_SELECTOR, false),
    container: settings.container,
    isPlaylist: isPlaylistInfo(info),
    title: collection.previewTitle,
  };
}
