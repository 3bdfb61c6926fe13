import { describe, expect, it } from "vitest";
import {
  BEST_AUDIO_LABEL,
  buildFormatCollection,
  collapseFormats,
  describeFormat,
  estimateFilesizeBytes,
  extractAudioLanguages,
  humanizeBytes,
  labelFormat,
  previewTitleFromInfo,
  sortFormats,
  splitAndFilterFormats,
} from "../src/services/format-catalog.ts";
import { LABEL_137, LABEL_140, LABEL_248, LABEL_251, sampleInfo } from "./helpers.ts";

describe("humanizeBytes", () => {
  it("should render bytes below one KiB as-is", () => {
    expect(humanizeBytes(512)).toBe("512 B");
  });

  it("should render KiB without decimals", () => {
    expect(humanizeBytes(2048)).toBe("2 KiB");
  });

  it("should render larger units with one decimal", () => {
    expect(humanizeBytes(5 * 1024 * 1024)).toBe("5.0 MiB");
    expect(humanizeBytes(1.5 * 1024 * 1024 * 1024)).toBe("1.5 GiB");
  });

  it("should return empty string for unknown size", () => {
    expect(humanizeBytes(null)).toBe("");
    expect(humanizeBytes(0)).toBe("");
  });
});

describe("estimateFilesizeBytes", () => {
  it("should prefer filesize and fall back to the approximation", () => {
    expect(estimateFilesizeBytes({ filesize: 100, filesize_approx: 200 })).toBe(100);
    expect(estimateFilesizeBytes({ filesize: null, filesize_approx: 250.7 })).toBe(250);
    expect(estimateFilesizeBytes({})).toBe(null);
  });
});

describe("describeFormat", () => {
  it("should normalize missing and non-positive fields", () => {
    const format = describeFormat({
      format_id: "1",
      ext: "mp4",
      height: 0,
      fps: -1,
      language: "  DE ",
    });
    expect(format.height).toBe(null);
    expect(format.fps).toBe(null);
    expect(format.vcodec).toBe("");
    expect(format.language).toBe("de");
    expect(format.synthetic).toBe(false);
  });
});

describe("splitAndFilterFormats", () => {
  it("should drop low-quality entries when better ones exist", () => {
    const formats = sampleInfo().formats?.map(describeFormat) ?? [];
    const { video, audio } = splitAndFilterFormats(formats);
    expect(video.map((f) => f.formatId)).toEqual(["137", "248"]);
    expect(audio.map((f) => f.formatId)).toEqual(["140", "251"]);
  });

  it("should keep everything when nothing exceeds the floors", () => {
    const formats = [
      describeFormat({ format_id: "a", vcodec: "avc1", height: 360 }),
      describeFormat({ format_id: "b", vcodec: "none", abr: 64 }),
    ];
    const { video, audio } = splitAndFilterFormats(formats);
    expect(video).toHaveLength(1);
    expect(audio).toHaveLength(1);
  });
});

describe("collapseFormats", () => {
  it("should keep the highest bitrate per signature", () => {
    const low = describeFormat({ format_id: "a", ext: "mp4", vcodec: "avc1", height: 720, tbr: 1000 });
    const high = describeFormat({ format_id: "b", ext: "mp4", vcodec: "avc1", height: 720, tbr: 2000 });
    const other = describeFormat({ format_id: "c", ext: "webm", vcodec: "vp9", height: 720, tbr: 900 });
    expect(collapseFormats([low, high, other]).map((f) => f.formatId)).toEqual(["b", "c"]);
  });

  it("should keep the first entry on equal bitrate", () => {
    const a = describeFormat({ format_id: "a", ext: "mp4", vcodec: "avc1", height: 720, tbr: 1000 });
    const b = describeFormat({ format_id: "b", ext: "mp4", vcodec: "avc1", height: 720, tbr: 1000 });
    expect(collapseFormats([a, b]).map((f) => f.formatId)).toEqual(["a"]);
  });
});

describe("sortFormats", () => {
  it("should order video before audio, mp4 and AVC first, then tallest", () => {
    const formats = [
      describeFormat({ format_id: "aud", ext: "m4a", vcodec: "none", abr: 128 }),
      describeFormat({ format_id: "webm720", ext: "webm", vcodec: "vp9", height: 720 }),
      describeFormat({ format_id: "mp4av1", ext: "mp4", vcodec: "av01", height: 1080 }),
      describeFormat({ format_id: "mp4avc720", ext: "mp4", vcodec: "avc1", height: 720 }),
      describeFormat({ format_id: "mp4avc1080", ext: "mp4", vcodec: "avc1", height: 1080 }),
    ];
    expect(sortFormats(formats).map((f) => f.formatId)).toEqual([
      "mp4avc1080",
      "mp4avc720",
      "mp4av1",
      "webm720",
      "aud",
    ]);
  });
});

describe("labelFormat", () => {
  it("should label video formats with all known parts", () => {
    const format = describeFormat({
      format_id: "22",
      ext: "mp4",
      vcodec: "avc1",
      acodec: "mp4a",
      height: 720,
      fps: 30,
      format_note: "720p",
      filesize: 2048,
    });
    expect(labelFormat(format)).toBe("720p MP4 30fps [720p] ~2 KiB (avc1 + mp4a) [22]");
  });

  it("should label audio formats", () => {
    const format = describeFormat({ format_id: "9", ext: "m4a", vcodec: "none", abr: 64.9 });
    expect(labelFormat(format)).toBe("Audio M4A 64k (audio) [9]");
  });
});

describe("extractAudioLanguages", () => {
  it("should ignore placeholder languages and sort", () => {
    const formats = [
      describeFormat({ format_id: "1", vcodec: "none", language: "fr" }),
      describeFormat({ format_id: "2", vcodec: "none", language: "und" }),
      describeFormat({ format_id: "3", vcodec: "none", language: "de" }),
      describeFormat({ format_id: "4", vcodec: "avc1", language: "es" }),
    ];
    expect(extractAudioLanguages(formats)).toEqual(["de", "fr"]);
  });
});

describe("previewTitleFromInfo", () => {
  it("should collapse whitespace and fall back to the first entry", () => {
    expect(previewTitleFromInfo({ title: "  A   B\n C " })).toBe("A B C");
    expect(previewTitleFromInfo({ title: "", entries: [{ title: "First  one" }] })).toBe(
      "First one",
    );
  });
});

describe("buildFormatCollection", () => {
  it("should build labeled video and audio sets", () => {
    const collection = buildFormatCollection(sampleInfo());
    expect(collection.videoLabels).toEqual([LABEL_137, LABEL_248]);
    expect(collection.audioLabels).toEqual([BEST_AUDIO_LABEL, LABEL_251, LABEL_140]);
    expect(collection.audioLookup[BEST_AUDIO_LABEL]?.selector).toBe("bestaudio/best");
    expect(collection.audioLanguages).toEqual(["en"]);
    expect(collection.previewTitle).toBe("Sample Clip");
    expect(collection.isPlaylist).toBe(false);
  });

  it("should take formats from the first playlist entry", () => {
    const collection = buildFormatCollection({
      _type: "playlist",
      title: "  My   List ",
      entries: [sampleInfo("First")],
    });
    expect(collection.videoLabels).toEqual([LABEL_137, LABEL_248]);
    expect(collection.previewTitle).toBe("My List");
    expect(collection.isPlaylist).toBe(true);
  });

  it("should offer only the synthetic audio entry without formats", () => {
    const collection = buildFormatCollection({ title: "Empty" });
    expect(collection.videoLabels).toEqual([]);
    expect(collection.audioLabels).toEqual([BEST_AUDIO_LABEL]);
  });
});
