/**
 * yt-dlp backend: metadata fetch and download over a spawned process.
 *
 * Design:
 * - Pure argument builders and line parsers (testable)
 * - Process runner interface for dependency injection
 */

import { spawn } from "node:child_process";
import { createInterface } from "node:readline";
import { silentLogger, type Logger } from "../logger.ts";
import { isAudioOnly } from "./format-catalog.ts";
import {
  AUDIO_CONTAINERS,
  FetchError,
  VIDEO_CONTAINERS,
  type CancelToken,
  type DownloadOutcome,
  type DownloadRequest,
  type MediaBackend,
  type ProgressEvent,
  type RawFormat,
  type RawInfo,
} from "./media-types.ts";
import { formatPlaylistItemLabel, parsePlaylistRanges } from "./playlist-range.ts";
import {
  createProgressThrottle,
  DEFAULT_PROGRESS_INTERVAL_MS,
  formatDuration,
  formatEta,
  formatSpeed,
} from "./progress.ts";

// ============================================================================
// Process Runner Interface
// ============================================================================

export interface ProcessOutput {
  success: boolean;
  code: number;
  stdout: string;
  stderr: string;
}

export type OutputStream = "stdout" | "stderr";

export interface SpawnedProcess {
  /** Resolves with the exit code (-1 when the process could not start) */
  exited: Promise<number>;
  kill(): void;
}

/**
 * Process runner interface for dependency injection.
 */
export interface ProcessRunner {
  run(cmd: string, args: string[]): Promise<ProcessOutput>;
  spawn(
    cmd: string,
    args: string[],
    onLine: (line: string, stream: OutputStream) => void,
  ): SpawnedProcess;
}

/**
 * Default process runner using node:child_process.
 */
export const defaultProcessRunner: ProcessRunner = {
  run(cmd, args) {
    return new Promise((resolve) => {
      const child = spawn(cmd, args, { stdio: ["ignore", "pipe", "pipe"] });
      const stdout: Buffer[] = [];
      const stderr: Buffer[] = [];
      child.stdout.on("data", (chunk: Buffer) => stdout.push(chunk));
      child.stderr.on("data", (chunk: Buffer) => stderr.push(chunk));
      child.on("error", (err) => {
        resolve({ success: false, code: -1, stdout: "", stderr: err.message });
      });
      child.on("close", (code) => {
        resolve({
          success: code === 0,
          code: code ?? -1,
          stdout: Buffer.concat(stdout).toString("utf8"),
          stderr: Buffer.concat(stderr).toString("utf8"),
        });
      });
    });
  },

  spawn(cmd, args, onLine) {
    const child = spawn(cmd, args, { stdio: ["ignore", "pipe", "pipe"] });
    createInterface({ input: child.stdout, crlfDelay: Infinity }).on(
      "line",
      (line) => onLine(line, "stdout"),
    );
    createInterface({ input: child.stderr, crlfDelay: Infinity }).on(
      "line",
      (line) => onLine(line, "stderr"),
    );
    const exited = new Promise<number>((resolve) => {
      child.on("error", (err) => {
        onLine(err.message, "stderr");
        resolve(-1);
      });
      child.on("close", (code) => resolve(code ?? -1));
    });
    return {
      exited,
      kill: () => {
        child.kill();
      },
    };
  },
};

// ============================================================================
// Metadata parsing (pure functions)
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function str(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

function num(value: unknown): number | null {
  return typeof value === "number" && Number.isFinite(value) ? value : null;
}

function toRawFormat(value: unknown): RawFormat | null {
  if (!isRecord(value)) return null;
  return {
    format_id: str(value.format_id),
    ext: str(value.ext),
    vcodec: str(value.vcodec) ?? null,
    acodec: str(value.acodec) ?? null,
    height: num(value.height),
    width: num(value.width),
    fps: num(value.fps),
    tbr: num(value.tbr),
    abr: num(value.abr),
    filesize: num(value.filesize),
    filesize_approx: num(value.filesize_approx),
    format_note: str(value.format_note) ?? null,
    language: str(value.language) ?? null,
  };
}

function toRawInfo(value: unknown, depth = 0): RawInfo | null {
  if (!isRecord(value)) return null;
  const info: RawInfo = {
    _type: str(value._type),
    id: str(value.id),
    title: str(value.title) ?? null,
  };
  if (Array.isArray(value.formats)) {
    info.formats = value.formats
      .map(toRawFormat)
      .filter((f): f is RawFormat => f !== null);
  }
  if (Array.isArray(value.entries) && depth === 0) {
    info.entries = value.entries
      .map((entry) => toRawInfo(entry, depth + 1))
      .filter((e): e is RawInfo => e !== null);
  }
  return info;
}

/**
 * Parse `yt-dlp -J` output. Returns null when it is not a JSON object.
 */
export function parseInfoJson(output: string): RawInfo | null {
  try {
    const data: unknown = JSON.parse(output);
    return toRawInfo(data);
  } catch {
    return null;
  }
}

// ============================================================================
// Command Builders (pure functions)
// ============================================================================

export const PROGRESS_PREFIX = "[progress]";
export const ITEM_PREFIX = "[item]";

const PROGRESS_TEMPLATE =
  `download:${PROGRESS_PREFIX} %(progress.status)s|%(progress.downloaded_bytes)s|` +
  "%(progress.total_bytes)s|%(progress.total_bytes_estimate)s|" +
  "%(progress.speed)s|%(progress.eta)s";

const ITEM_TEMPLATE =
  `before_dl:${ITEM_PREFIX} %(playlist_index)s|%(n_entries)s|%(title)s`;

export function buildMetadataArgs(url: string, socketTimeoutSeconds: number): string[] {
  return [
    "-J",
    "--no-warnings",
    "--playlist-items", "1",
    "--socket-timeout", String(socketTimeoutSeconds),
    "--", url,
  ];
}

function preferAudioLanguage(format: string, language: string): string {
  if (!/^[A-Za-z0-9-]+$/.test(language)) return format;
  const [first] = format.split("/");
  if (!first.includes("bestaudio")) return format;
  return `${first.replace("bestaudio", `bestaudio[language=${language}]`)}/${format}`;
}

/**
 * Backend format expression for a request.
 */
export function buildFormatSelector(request: DownloadRequest): string {
  const format = request.format;
  let selector: string;
  if (format?.selector) {
    selector = format.selector;
  } else if (format?.formatId) {
    const videoOnly =
      !isAudioOnly(format) && (format.acodec === "" || format.acodec === "none");
    selector = videoOnly ? `${format.formatId}+bestaudio/best` : format.formatId;
  } else {
    selector = "bestvideo+bestaudio/best";
  }
  return request.audioLanguage
    ? preferAudioLanguage(selector, request.audioLanguage)
    : selector;
}

function audioFormatFor(container: string): string {
  if (AUDIO_CONTAINERS.some((c) => c === container)) return container;
  return container === "webm" ? "opus" : "m4a";
}

function outputTemplate(request: DownloadRequest): string {
  if (request.customFilename) {
    return request.playlistEnabled
      ? `${request.customFilename} - %(playlist_index)s.%(ext)s`
      : `${request.customFilename}.%(ext)s`;
  }
  return request.playlistEnabled
    ? "%(playlist_index)s - %(title)s.%(ext)s"
    : "%(title)s.%(ext)s";
}

/**
 * Build yt-dlp download arguments.
 */
export function buildDownloadArgs(request: DownloadRequest): string[] {
  const args: string[] = [
    "--newline",
    "--progress",
    "--no-simulate",
    "--progress-template", PROGRESS_TEMPLATE,
    "--print", ITEM_TEMPLATE,
    "-f", buildFormatSelector(request),
    "-P", request.outputDir,
    "-o", outputTemplate(request),
  ];

  // Container handling
  const selected = VIDEO_CONTAINERS.some((c) => c === request.container)
    ? request.container
    : "";
  const target = selected || (request.format?.ext ?? "").toLowerCase();
  const audioOnly =
    request.mode === "audio" ||
    (request.format !== null && isAudioOnly(request.format));

  if (audioOnly) {
    args.push("-x", "--audio-format", audioFormatFor(request.container || target));
  } else if (target === "mp4" || (target === "webm" && request.convertToMp4)) {
    args.push("--merge-output-format", "mp4");
    args.push("--recode-video", "mp4");
    args.push("--postprocessor-args", "VideoConvertor:-movflags +faststart");
  } else if (target === "webm") {
    args.push("--merge-output-format", "webm");
  }

  // Network policy
  args.push("--socket-timeout", String(request.networkTimeoutSeconds));
  args.push("--retries", String(request.networkRetries));
  args.push("--fragment-retries", String(request.networkRetries));
  args.push("--retry-sleep", String(request.retryBackoffSeconds));

  // Subtitles
  if (request.writeSubtitles) {
    args.push("--write-subs");
    if (request.subtitleLanguages.length > 0) {
      args.push("--sub-langs", request.subtitleLanguages.join(","));
    }
    if (request.embedSubtitles) {
      args.push("--embed-subs");
    }
  }

  // Playlist
  if (request.playlistEnabled) {
    args.push("--yes-playlist");
    if (request.playlistItems) {
      args.push("--playlist-items", request.playlistItems);
    }
  } else {
    args.push("--no-playlist");
  }

  args.push("--", request.url);
  return args;
}

// ============================================================================
// Output parsing (pure functions)
// ============================================================================

function fieldNumber(value: string | undefined): number | null {
  if (value === undefined || value === "" || value === "NA" || value === "None") {
    return null;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : null;
}

/**
 * Parse one line printed through the progress template.
 */
export function parseProgressLine(line: string): ProgressEvent | null {
  const start = line.indexOf(PROGRESS_PREFIX);
  if (start === -1) return null;
  const [status, downloaded, total, estimate, speed, eta] = line
    .slice(start + PROGRESS_PREFIX.length)
    .trim()
    .split("|");

  if (status === "finished") return { status: "finished" };
  if (status !== "downloading") return null;

  const done = fieldNumber(downloaded);
  const size = fieldNumber(total) ?? fieldNumber(estimate);
  return {
    status: "downloading",
    percent: done && size ? (done / size) * 100 : null,
    speed: formatSpeed(fieldNumber(speed)),
    eta: formatEta(fieldNumber(eta)),
  };
}

/**
 * Parse one `[item]` line into a display label: "k of N title" for playlist
 * entries, the title alone otherwise.
 */
export function parseItemLine(
  line: string,
  playlistItems: string | null,
): ProgressEvent | null {
  const start = line.indexOf(ITEM_PREFIX);
  if (start === -1) return null;
  const [indexText, countText, ...titleParts] = line
    .slice(start + ITEM_PREFIX.length)
    .trim()
    .split("|");
  const title = titleParts.join("|").trim();
  const index = fieldNumber(indexText);
  if (index === null) return { status: "item", label: title };

  const ranges = playlistItems ? parsePlaylistRanges(playlistItems) : null;
  const position = formatPlaylistItemLabel(ranges, index, fieldNumber(countText));
  return { status: "item", label: title ? `${position} ${title}` : position };
}

// ============================================================================
// Backend
// ============================================================================

export interface YtDlpBackendConfig {
  ytdlpPath: string;
  /** Socket timeout for metadata fetches */
  metadataTimeoutSeconds: number;
  progressIntervalMs?: number;
  cancelPollMs?: number;
}

const STDERR_TAIL_LINES = 3;

export function createYtDlpBackend(
  config: YtDlpBackendConfig,
  runner: ProcessRunner = defaultProcessRunner,
  log: Logger = silentLogger,
): MediaBackend {
  const progressIntervalMs = config.progressIntervalMs ?? DEFAULT_PROGRESS_INTERVAL_MS;
  const cancelPollMs = config.cancelPollMs ?? 200;

  async function fetchMetadata(url: string): Promise<RawInfo> {
    const args = buildMetadataArgs(url, config.metadataTimeoutSeconds);
    const result = await runner.run(config.ytdlpPath, args);
    if (!result.success) {
      const detail = result.stderr.trim().split("\n").slice(-1)[0] ?? "";
      throw new FetchError(
        `yt-dlp exited with code ${result.code}${detail ? `: ${detail}` : ""}`,
        url,
      );
    }
    const info = parseInfoJson(result.stdout);
    if (!info) {
      throw new FetchError("yt-dlp returned unreadable metadata", url);
    }
    return info;
  }

  async function runDownload(
    request: DownloadRequest,
    token: CancelToken,
    onProgress: (event: ProgressEvent) => void,
  ): Promise<DownloadOutcome> {
    const throttle = createProgressThrottle(onProgress, progressIntervalMs);
    const stderrTail: string[] = [];
    const startedAt = Date.now();

    log.info("Starting download", { url: request.url, format: request.formatLabel });

    const proc = runner.spawn(
      config.ytdlpPath,
      buildDownloadArgs(request),
      (line, stream) => {
        if (stream === "stderr") {
          stderrTail.push(line);
          if (stderrTail.length > STDERR_TAIL_LINES) stderrTail.shift();
          return;
        }
        const event =
          parseProgressLine(line) ?? parseItemLine(line, request.playlistItems);
        if (!event) return;
        if (event.status === "item") throttle.reset();
        throttle.push(event);
      },
    );

    let cancelled = false;
    const poll = setInterval(() => {
      if (token.cancelled && !cancelled) {
        cancelled = true;
        proc.kill();
      }
    }, cancelPollMs);

    let code: number;
    try {
      code = await proc.exited;
    } finally {
      clearInterval(poll);
    }

    const elapsed = formatDuration((Date.now() - startedAt) / 1000);
    if (cancelled) {
      log.info("Download cancelled", { url: request.url, elapsed });
      onProgress({ status: "cancelled" });
      return "cancelled";
    }
    if (code !== 0) {
      log.error("Download failed", {
        url: request.url,
        code,
        stderr: stderrTail.join(" "),
        elapsed,
      });
      return "error";
    }
    log.info("Download complete", { url: request.url, elapsed });
    return "success";
  }

  return { fetchMetadata, runDownload };
}

