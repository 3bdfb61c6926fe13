/**
 * Plain-text diagnostics report of the session state.
 * URLs are reduced to their `v` and `list` parameters.
 */

import type { DownloadOptions, QueueItem } from "./media-types.ts";

export interface DiagnosticsInput {
  generatedAt: Date;
  status: string;
  url: string;
  mode: string;
  container: string;
  codec: string;
  formatLabel: string;
  previewTitle: string;
  queueItems: readonly QueueItem[];
  queueActive: boolean;
  isDownloading: boolean;
  options: DownloadOptions;
}

const MAX_TITLE_LENGTH = 120;

export function sanitizeUrlForReport(value: string): string {
  const raw = value.trim();
  if (!raw) return "";
  let parsed: URL;
  try {
    parsed = new URL(raw);
  } catch {
    return raw;
  }

  const safe = new URLSearchParams();
  for (const key of ["v", "list"]) {
    for (const v of parsed.searchParams.getAll(key)) {
      safe.append(key, v);
    }
  }
  parsed.search = safe.toString();
  parsed.hash = "";
  return parsed.toString();
}

/**
 * ISO timestamp without milliseconds.
 */
function isoSeconds(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, "Z");
}

const flag = (value: boolean) => (value ? "1" : "0");

export function buildDiagnosticsReport(input: DiagnosticsInput): string {
  const { options } = input;
  const lines = [
    `generated_at=${isoSeconds(input.generatedAt)}`,
    `status=${input.status}`,
    `url=${sanitizeUrlForReport(input.url)}`,
    `mode=${input.mode}`,
    `container=${input.container}`,
    `codec=${input.codec}`,
    `format=${input.formatLabel}`,
    `queue_items=${input.queueItems.length}`,
    `queue_active=${flag(input.queueActive)}`,
    `is_downloading=${flag(input.isDownloading)}`,
    `preview_title=${input.previewTitle.slice(0, MAX_TITLE_LENGTH)}`,
    `network_timeout_s=${options.networkTimeoutSeconds}`,
    `network_retries=${options.networkRetries}`,
    `retry_backoff_s=${options.retryBackoffSeconds}`,
    `write_subtitles=${flag(options.writeSubtitles)}`,
    `embed_subtitles=${flag(options.embedSubtitles)}`,
    `subtitle_languages=${options.subtitleLanguages.join(",")}`,
    `audio_language=${options.audioLanguage}`,
    `custom_filename=${options.customFilename}`,
    "",
    "[queue]",
  ];

  input.queueItems.forEach((item, i) => {
    lines.push(
      JSON.stringify({
        index: i + 1,
        url: sanitizeUrlForReport(item.url),
        mode: item.settings.mode,
        container: item.settings.container,
        codec: item.settings.codec,
        format: item.settings.formatLabel,
      }),
    );
  });

  return `${lines.join("\n").trim()}\n`;
}
