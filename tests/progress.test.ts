import { describe, expect, it } from "vitest";
import type { ProgressEvent } from "../src/services/media-types.ts";
import {
  createProgressThrottle,
  formatEta,
  formatSpeed,
} from "../src/services/progress.ts";

const downloading = (percent: number): ProgressEvent => ({
  status: "downloading",
  percent,
  speed: "1 B/s",
  eta: "0:01",
});

describe("createProgressThrottle", () => {
  it("should forward downloading events at most once per interval", () => {
    let now = 1000;
    const forwarded: ProgressEvent[] = [];
    const throttle = createProgressThrottle((e) => forwarded.push(e), 800, () => now);

    throttle.push(downloading(1));
    now = 1500;
    throttle.push(downloading(2));
    now = 1800;
    throttle.push(downloading(3));

    expect(forwarded).toEqual([downloading(1), downloading(3)]);
  });

  it("should always forward other events", () => {
    const now = 1000;
    const forwarded: ProgressEvent[] = [];
    const throttle = createProgressThrottle((e) => forwarded.push(e), 800, () => now);
    throttle.push(downloading(1));
    throttle.push({ status: "finished" });
    throttle.push({ status: "item", label: "2 of 3" });
    expect(forwarded).toHaveLength(3);
  });

  it("should start a fresh window after reset", () => {
    const now = 1000;
    const forwarded: ProgressEvent[] = [];
    const throttle = createProgressThrottle((e) => forwarded.push(e), 800, () => now);
    throttle.push(downloading(1));
    throttle.reset();
    throttle.push(downloading(0));
    expect(forwarded).toEqual([downloading(1), downloading(0)]);
  });
});

describe("formatSpeed", () => {
  it("should scale to binary units", () => {
    expect(formatSpeed(500)).toBe("500 B/s");
    expect(formatSpeed(1536)).toBe("1.50 KiB/s");
    expect(formatSpeed(3 * 1024 * 1024)).toBe("3.00 MiB/s");
  });

  it("should show a dash for unknown speed", () => {
    expect(formatSpeed(null)).toBe("—");
    expect(formatSpeed(0)).toBe("—");
  });
});

describe("formatEta", () => {
  it("should render minutes and hours", () => {
    expect(formatEta(5)).toBe("0:05");
    expect(formatEta(125)).toBe("2:05");
    expect(formatEta(3725)).toBe("1:02:05");
  });

  it("should show a dash for unknown eta", () => {
    expect(formatEta(null)).toBe("—");
    expect(formatEta(Number.POSITIVE_INFINITY)).toBe("—");
  });
});
