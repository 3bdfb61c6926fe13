import { describe, expect, it } from "vitest";
import { BEST_AUDIO_LABEL, buildFormatCollection } from "../src/services/format-catalog.ts";
import {
  BEST_AVAILABLE_LABEL,
  codecMatchesPreference,
  resolveFormatForMetadata,
  selectModeFormats,
} from "../src/services/format-selector.ts";
import { NoFormatsError } from "../src/services/media-types.ts";
import {
  createTestLogger,
  LABEL_137,
  LABEL_140,
  LABEL_248,
  LABEL_251,
  sampleInfo,
} from "./helpers.ts";

describe("codecMatchesPreference", () => {
  it("should treat h264 as avc1 and av1 as av01", () => {
    expect(codecMatchesPreference("h264", "avc1")).toBe(true);
    expect(codecMatchesPreference("AV1", "av01")).toBe(true);
    expect(codecMatchesPreference("vp9", "avc1")).toBe(false);
  });

  it("should match everything for an empty or 'any' preference", () => {
    expect(codecMatchesPreference("vp9", "")).toBe(true);
    expect(codecMatchesPreference("vp9", "any")).toBe(true);
  });
});

describe("selectModeFormats", () => {
  const collection = buildFormatCollection(sampleInfo());

  it("should return exact container and codec matches", () => {
    const result = selectModeFormats("video", "mp4", "avc1", collection);
    expect(result.labels).toEqual([LABEL_137]);
    expect(result.codecFallbackUsed).toBe(false);
  });

  it("should ignore the codec when nothing in the container matches it", () => {
    const result = selectModeFormats("video", "webm", "av01", collection);
    expect(result.labels).toEqual([LABEL_248]);
    expect(result.codecFallbackUsed).toBe(true);
  });

  it("should fall back to best available when the container has nothing", () => {
    const mp4Only = buildFormatCollection({
      formats: [{ format_id: "137", ext: "mp4", vcodec: "avc1", acodec: "none", height: 1080 }],
    });
    const result = selectModeFormats("video", "webm", "avc1", mp4Only);
    expect(result.labels).toEqual([BEST_AVAILABLE_LABEL]);
    expect(result.lookup[BEST_AVAILABLE_LABEL]?.selector).toBe("bestvideo+bestaudio/best");
    expect(result.codecFallbackUsed).toBe(false);
  });

  it("should offer nothing for video without a known container and codec", () => {
    expect(selectModeFormats("video", "mkv", "avc1", collection).labels).toEqual([]);
    expect(selectModeFormats("video", "mp4", "", collection).labels).toEqual([]);
    expect(selectModeFormats("", "mp4", "avc1", collection).labels).toEqual([]);
  });

  it("should return every audio label in audio mode", () => {
    const result = selectModeFormats("audio", "m4a", "", collection);
    expect(result.labels).toEqual([BEST_AUDIO_LABEL, LABEL_251, LABEL_140]);
  });
});

describe("resolveFormatForMetadata", () => {
  const settings = { mode: "video" as const, container: "mp4", codec: "avc1" };

  it("should keep the captured label when still offered", () => {
    const log = createTestLogger();
    const resolved = resolveFormatForMetadata(
      "https://example.com/watch?v=abc",
      sampleInfo(),
      { ...settings, formatLabel: LABEL_137 },
      log,
    );
    expect(resolved.formatLabel).toBe(LABEL_137);
    expect(resolved.format.formatId).toBe("137");
    expect(resolved.container).toBe("mp4");
    expect(resolved.title).toBe("Sample Clip");
    expect(resolved.isPlaylist).toBe(false);
    expect(log.info).not.toHaveBeenCalled();
  });

  it("should substitute the first label and log it when the label is gone", () => {
    const log = createTestLogger();
    const resolved = resolveFormatForMetadata(
      "https://example.com/watch?v=abc",
      sampleInfo(),
      { ...settings, formatLabel: "720p MP4 [22]" },
      log,
    );
    expect(resolved.formatLabel).toBe(LABEL_137);
    expect(log.info).toHaveBeenCalledWith(
      `Format '720p MP4 [22]' missing; using '${LABEL_137}'`,
      { url: "https://example.com/watch?v=abc" },
    );
  });

  it("should log the codec fallback", () => {
    const log = createTestLogger();
    const resolved = resolveFormatForMetadata(
      "u",
      sampleInfo(),
      { mode: "video", container: "webm", codec: "av01", formatLabel: LABEL_248 },
      log,
    );
    expect(resolved.formatLabel).toBe(LABEL_248);
    expect(log.info).toHaveBeenCalledWith(
      "Chosen codec not available; using any codec for container",
      { url: "u", container: "webm", codec: "av01" },
    );
  });

  it("should throw NoFormatsError when the metadata has no formats", () => {
    expect(() =>
      resolveFormatForMetadata(
        "u",
        { title: "Nothing" },
        { ...settings, formatLabel: "" },
        createTestLogger(),
      ),
    ).toThrow(NoFormatsError);
  });
});
