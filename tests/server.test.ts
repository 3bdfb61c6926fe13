/**
 * Tests for the HTTP layer, driven through app.request().
 */

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createServer } from "../src/server/index.ts";
import { createSession } from "../src/services/session.ts";
import {
  createFakeBackend,
  flushPromises,
  LABEL_137,
  sampleInfo,
} from "./helpers.ts";

const VIDEO_URL = "https://example.com/watch?v=abc";

function setup() {
  const { backend, fetches, downloads } = createFakeBackend();
  const fs = { ensureDir: vi.fn(async (_path: string) => {}) };
  const session = createSession(
    {
      defaultOutputDir: "/tmp/clips",
      fetchDebounceMs: 600,
      formatCacheMaxEntries: 10,
      mailbox: { pollIntervalMs: 10 },
    },
    { backend, fs },
  );
  session.start();
  const { app, events } = createServer({ session });
  return { app, events, session, fetches, downloads };
}

function send(method: string, body?: unknown): RequestInit {
  return {
    method,
    headers: { "Content-Type": "application/json" },
    body: body === undefined ? undefined : JSON.stringify(body),
  };
}

describe("createServer", () => {
  let ctx: ReturnType<typeof setup>;

  beforeEach(() => {
    vi.useFakeTimers();
    ctx = setup();
  });

  afterEach(() => {
    ctx.session.dispose();
    vi.useRealTimers();
  });

  /** Set the URL, resolve the fetch and pick the 1080p mp4 format */
  async function prepareVideo(): Promise<void> {
    await ctx.app.request("/api/url", send("PUT", { url: VIDEO_URL, force: true }));
    ctx.fetches[0]?.result.resolve(sampleInfo());
    await flushPromises();
    await vi.advanceTimersByTimeAsync(20);
    await ctx.app.request("/api/selection", send("PUT", { mode: "video", container: "mp4", codec: "avc1" }));
    await ctx.app.request("/api/selection/format", send("PUT", { label: LABEL_137 }));
  }

  // ==========================================================================
  // Health and status
  // ==========================================================================

  describe("GET /health", () => {
    it("should report ok", async () => {
      const res = await ctx.app.request("/health");
      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({ status: "ok" });
    });
  });

  describe("GET /api/status", () => {
    it("should return the idle snapshot", async () => {
      const res = await ctx.app.request("/api/status");
      expect(await res.json()).toMatchObject({ url: "", status: "Idle", isDownloading: false });
    });
  });

  // ==========================================================================
  // URL and selection
  // ==========================================================================

  describe("PUT /api/url", () => {
    it("should require a url", async () => {
      const res = await ctx.app.request("/api/url", send("PUT", {}));
      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ error: "url is required" });
    });

    it("should reject an unknown mixed URL choice", async () => {
      const res = await ctx.app.request(
        "/api/url",
        send("PUT", { url: VIDEO_URL, mixedChoice: "both" }),
      );
      expect(res.status).toBe(400);
    });

    it("should set the URL and start fetching when forced", async () => {
      const res = await ctx.app.request("/api/url", send("PUT", { url: VIDEO_URL, force: true }));
      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({ url: VIDEO_URL, status: "Fetching formats..." });
      expect(ctx.fetches.map((f) => f.url)).toEqual([VIDEO_URL]);
    });
  });

  describe("PUT /api/selection", () => {
    it("should reject an unknown mode", async () => {
      const res = await ctx.app.request("/api/selection", send("PUT", { mode: "film" }));
      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ error: "mode must be 'audio' or 'video'", field: "mode" });
    });

    it("should reject a container outside the mode", async () => {
      const res = await ctx.app.request(
        "/api/selection",
        send("PUT", { mode: "video", container: "m4a", codec: "avc1" }),
      );
      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ error: "Invalid selection", reason: "invalid_container" });
    });

    it("should return the offered labels", async () => {
      await ctx.app.request("/api/url", send("PUT", { url: VIDEO_URL, force: true }));
      ctx.fetches[0]?.result.resolve(sampleInfo());
      await flushPromises();
      await vi.advanceTimersByTimeAsync(20);

      const res = await ctx.app.request(
        "/api/selection",
        send("PUT", { mode: "video", container: "mp4", codec: "avc1" }),
      );
      expect(await res.json()).toEqual({ ok: true, labels: [LABEL_137], codecFallbackUsed: false });
    });
  });

  describe("PUT /api/selection/format", () => {
    it("should reject labels that are not offered", async () => {
      const res = await ctx.app.request("/api/selection/format", send("PUT", { label: "nope" }));
      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ error: "Unknown format", label: "nope" });
    });
  });

  describe("PUT /api/options", () => {
    it("should reject malformed JSON", async () => {
      const res = await ctx.app.request("/api/options", {
        method: "PUT",
        headers: { "Content-Type": "application/json" },
        body: "{",
      });
      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ error: "Invalid JSON body" });
    });

    it("should reject values of the wrong type", async () => {
      const res = await ctx.app.request("/api/options", send("PUT", { networkRetries: 5 }));
      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        error: "Invalid value for networkRetries",
        field: "networkRetries",
      });
    });

    it("should apply known options", async () => {
      const res = await ctx.app.request(
        "/api/options",
        send("PUT", { outputDir: "/tmp/other", writeSubtitles: true, unknown: 1 }),
      );
      expect(await res.json()).toMatchObject({
        selection: { outputDir: "/tmp/other" },
        options: { writeSubtitles: true },
      });
    });
  });

  // ==========================================================================
  // Downloads
  // ==========================================================================

  describe("POST /api/download", () => {
    it("should explain why nothing started", async () => {
      const res = await ctx.app.request("/api/download", send("POST"));
      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        error: "Please paste a video URL to download.",
        reason: "missing_url",
      });
    });

    it("should start once and refuse a second start", async () => {
      await prepareVideo();

      const first = await ctx.app.request("/api/download", send("POST"));
      expect(first.status).toBe(202);
      expect(ctx.downloads).toHaveLength(1);

      const second = await ctx.app.request("/api/download", send("POST"));
      expect(second.status).toBe(409);

      const cancel = await ctx.app.request("/api/cancel", send("POST"));
      expect(await cancel.json()).toEqual({ cancelled: true });
      expect(ctx.downloads[0]?.token.cancelled).toBe(true);
    });
  });

  describe("POST /api/cancel", () => {
    it("should report nothing cancelled when idle", async () => {
      const res = await ctx.app.request("/api/cancel", send("POST"));
      expect(await res.json()).toEqual({ cancelled: false });
    });
  });

  // ==========================================================================
  // Queue
  // ==========================================================================

  describe("queue routes", () => {
    it("should reject adding without a URL", async () => {
      const res = await ctx.app.request("/api/queue", send("POST"));
      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        error: "Queue add failed: missing URL",
        reason: "missing_url",
      });
    });

    it("should refuse to start an empty queue", async () => {
      const res = await ctx.app.request("/api/queue/start", send("POST"));
      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ error: "Queue is empty", reason: "empty" });
    });

    it("should report unknown items", async () => {
      const res = await ctx.app.request("/api/queue/missing", { method: "DELETE" });
      expect(res.status).toBe(404);
    });

    it("should validate the move direction", async () => {
      const res = await ctx.app.request("/api/queue/x/move", send("POST", { direction: "left" }));
      expect(res.status).toBe(400);
    });

    it("should add, move and remove items", async () => {
      await prepareVideo();

      const added = await ctx.app.request("/api/queue", send("POST"));
      expect(added.status).toBe(201);
      expect(await added.json()).toMatchObject({
        url: VIDEO_URL,
        settings: { formatLabel: LABEL_137 },
      });
      const id = ctx.session.getSnapshot().queue.items[0]?.id ?? "";

      const listed = await ctx.app.request("/api/queue");
      expect(await listed.json()).toMatchObject({ items: [{ id, url: VIDEO_URL }] });

      const moved = await ctx.app.request(
        `/api/queue/${id}/move`,
        send("POST", { direction: "down" }),
      );
      expect(await moved.json()).toEqual({ success: true });

      const removed = await ctx.app.request(`/api/queue/${id}`, { method: "DELETE" });
      expect(removed.status).toBe(200);
      expect(ctx.session.getSnapshot().queue.items).toEqual([]);
    });

    it("should reject edits while the queue runs", async () => {
      await prepareVideo();
      await ctx.app.request("/api/queue", send("POST"));

      const started = await ctx.app.request("/api/queue/start", send("POST"));
      expect(started.status).toBe(202);

      const cleared = await ctx.app.request("/api/queue", { method: "DELETE" });
      expect(cleared.status).toBe(409);
      expect(await cleared.json()).toEqual({ error: "Queue is running" });
    });
  });

  // ==========================================================================
  // Diagnostics and events
  // ==========================================================================

  describe("GET /api/diagnostics", () => {
    it("should return a plain text report", async () => {
      const res = await ctx.app.request("/api/diagnostics");
      expect(res.headers.get("Content-Type")).toContain("text/plain");
      const text = await res.text();
      expect(text.split("\n")[1]).toBe("status=Idle");
    });
  });

  describe("GET /api/events", () => {
    it("should send the current snapshot first", async () => {
      const res = await ctx.app.request("/api/events");
      expect(res.headers.get("Content-Type")).toContain("text/event-stream");

      const reader = res.body?.getReader();
      const chunk = await reader?.read();
      const text = new TextDecoder().decode(chunk?.value);
      expect(text.startsWith("event: state\n")).toBe(true);
      expect(ctx.events.clientCount()).toBe(1);
      await reader?.cancel();
    });

    it("should end open streams when closed", async () => {
      const res = await ctx.app.request("/api/events");
      const reader = res.body?.getReader();
      await reader?.read();
      expect(ctx.events.clientCount()).toBe(1);

      ctx.events.close();
      const next = await reader?.read();
      expect(next?.done).toBe(true);
      expect(ctx.events.clientCount()).toBe(0);
    });

    it("should send only the snapshot to clients that connect after closing", async () => {
      ctx.events.close();
      const res = await ctx.app.request("/api/events");
      const text = await res.text();
      expect(text.startsWith("event: state\n")).toBe(true);
      expect(text.match(/^event: /gm)).toHaveLength(1);
      expect(ctx.events.clientCount()).toBe(0);
    });
  });
});
