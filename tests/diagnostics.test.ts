import { describe, expect, it } from "vitest";
import {
  buildDiagnosticsReport,
  sanitizeUrlForReport,
} from "../src/services/diagnostics.ts";
import { LABEL_137, makeSettings } from "./helpers.ts";

describe("sanitizeUrlForReport", () => {
  it("should keep only v and list and drop the fragment", () => {
    expect(
      sanitizeUrlForReport("https://www.youtube.com/watch?v=abc&si=tracking&list=PL1&t=30#frag"),
    ).toBe("https://www.youtube.com/watch?v=abc&list=PL1");
  });

  it("should return unparsable input trimmed", () => {
    expect(sanitizeUrlForReport("  not a url ")).toBe("not a url");
    expect(sanitizeUrlForReport("")).toBe("");
  });
});

describe("buildDiagnosticsReport", () => {
  it("should render key=value lines and a queue section", () => {
    const report = buildDiagnosticsReport({
      generatedAt: new Date("2026-01-02T03:04:05.678Z"),
      status: "Idle",
      url: "https://www.youtube.com/watch?v=abc&si=x",
      mode: "video",
      container: "mp4",
      codec: "avc1",
      formatLabel: LABEL_137,
      previewTitle: "Sample Clip",
      queueItems: [
        {
          id: "q1",
          url: "https://www.youtube.com/watch?v=def&pp=1",
          settings: makeSettings(),
        },
      ],
      queueActive: false,
      isDownloading: false,
      options: {
        networkTimeoutSeconds: 20,
        networkRetries: 3,
        retryBackoffSeconds: 1.5,
        subtitleLanguages: ["en", "de"],
        writeSubtitles: true,
        embedSubtitles: false,
        audioLanguage: "",
        customFilename: "",
      },
    });

    expect(report.split("\n")).toEqual([
      "generated_at=2026-01-02T03:04:05Z",
      "status=Idle",
      "url=https://www.youtube.com/watch?v=abc",
      "mode=video",
      "container=mp4",
      "codec=avc1",
      `format=${LABEL_137}`,
      "queue_items=1",
      "queue_active=0",
      "is_downloading=0",
      "preview_title=Sample Clip",
      "network_timeout_s=20",
      "network_retries=3",
      "retry_backoff_s=1.5",
      "write_subtitles=1",
      "embed_subtitles=0",
      "subtitle_languages=en,de",
      "audio_language=",
      "custom_filename=",
      "",
      "[queue]",
      JSON.stringify({
        index: 1,
        url: "https://www.youtube.com/watch?v=def",
        mode: "video",
        container: "mp4",
        codec: "avc1",
        format: LABEL_137,
      }),
      "",
    ]);
  });
});
