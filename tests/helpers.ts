/**
 * Shared fixtures and in-process fakes for tests.
 */

import { vi } from "vitest";
import type { Logger } from "../src/logger.ts";
import type {
  CancelToken,
  DownloadOutcome,
  DownloadRequest,
  MediaBackend,
  ProgressEvent,
  QueueSettings,
  RawFormat,
  RawInfo,
} from "../src/services/media-types.ts";

export const MIB = 1024 * 1024;

export const SAMPLE_FORMATS: RawFormat[] = [
  {
    format_id: "18",
    ext: "mp4",
    vcodec: "avc1.42001E",
    acodec: "mp4a.40.2",
    height: 360,
    width: 640,
    fps: 30,
    tbr: 500,
    filesize: MIB,
  },
  {
    format_id: "137",
    ext: "mp4",
    vcodec: "avc1.640028",
    acodec: "none",
    height: 1080,
    width: 1920,
    fps: 30,
    tbr: 4000,
  },
  {
    format_id: "248",
    ext: "webm",
    vcodec: "vp9",
    acodec: "none",
    height: 1080,
    width: 1920,
    fps: 30,
    tbr: 3000,
  },
  {
    format_id: "140",
    ext: "m4a",
    vcodec: "none",
    acodec: "mp4a.40.2",
    abr: 129.5,
    filesize: 3 * MIB,
    language: "EN",
  },
  {
    format_id: "251",
    ext: "webm",
    vcodec: "none",
    acodec: "opus",
    abr: 160,
    language: "en",
  },
  {
    format_id: "139",
    ext: "m4a",
    vcodec: "none",
    acodec: "mp4a.40.5",
    abr: 48,
  },
];

export const LABEL_137 = "1080p 1920x1080 MP4 30fps (avc1.640028) [137]";
export const LABEL_248 = "1080p 1920x1080 WEBM 30fps (vp9) [248]";
export const LABEL_251 = "Audio WEBM 160k (opus) [251]";
export const LABEL_140 = "Audio M4A 129k (mp4a.40.2) ~3.0 MiB [140]";

export function sampleInfo(title = "Sample Clip"): RawInfo {
  return { id: "abc", title, formats: SAMPLE_FORMATS.map((f) => ({ ...f })) };
}

export function createTestLogger(): Logger & {
  debug: ReturnType<typeof vi.fn>;
  info: ReturnType<typeof vi.fn>;
  warn: ReturnType<typeof vi.fn>;
  error: ReturnType<typeof vi.fn>;
} {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

export function makeSettings(overrides: Partial<QueueSettings> = {}): QueueSettings {
  return {
    mode: "video",
    container: "mp4",
    codec: "avc1",
    convertToMp4: false,
    formatLabel: LABEL_137,
    estimatedSize: "",
    outputDir: "/tmp/clips",
    playlistItems: "",
    networkTimeoutSeconds: 20,
    networkRetries: 3,
    retryBackoffSeconds: 1.5,
    subtitleLanguages: [],
    writeSubtitles: false,
    embedSubtitles: false,
    audioLanguage: "",
    customFilename: "",
    ...overrides,
  };
}

interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (err: Error) => void;
}

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => {};
  let reject: (err: Error) => void = () => {};
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

export interface DownloadCall {
  request: DownloadRequest;
  token: CancelToken;
  onProgress: (event: ProgressEvent) => void;
  finish: (outcome: DownloadOutcome) => void;
}

/**
 * Backend whose metadata fetches and downloads complete only when the test
 * says so.
 */
export function createFakeBackend() {
  const fetches: { url: string; result: Deferred<RawInfo> }[] = [];
  const downloads: DownloadCall[] = [];

  const backend: MediaBackend = {
    fetchMetadata(url) {
      const result = deferred<RawInfo>();
      fetches.push({ url, result });
      return result.promise;
    },
    runDownload(request, token, onProgress) {
      const done = deferred<DownloadOutcome>();
      downloads.push({ request, token, onProgress, finish: done.resolve });
      return done.promise;
    },
  };

  return { backend, fetches, downloads };
}

/**
 * Let detached promise chains settle.
 */
export async function flushPromises(): Promise<void> {
  for (let i = 0; i < 5; i++) {
    await Promise.resolve();
  }
}
