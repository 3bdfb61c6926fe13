/**
 * REST API over the download session.
 *
 * Endpoints:
 * - GET    /api/status              - Session snapshot
 * - PUT    /api/url                 - Set the URL ({ url, force?, mixedChoice? })
 * - POST   /api/formats/fetch       - Fetch formats now ({ force? })
 * - PUT    /api/selection           - Mode/container/codec
 * - PUT    /api/selection/format    - Choose a format label
 * - PUT    /api/options             - Partial download options
 * - POST   /api/download            - Start a single download
 * - POST   /api/cancel              - Cancel the running download or queue
 * - GET    /api/queue               - Queue state
 * - POST   /api/queue               - Add the current selection to the queue
 * - DELETE /api/queue               - Clear the queue
 * - DELETE /api/queue/:id           - Remove one item
 * - POST   /api/queue/:id/move      - Move one item ({ direction })
 * - POST   /api/queue/start         - Start the queue
 * - GET    /api/diagnostics         - Plain text report
 */

import { Hono, type Context } from "hono";
import type { QueueEditResult } from "../services/queue-engine.ts";
import type {
  MixedUrlChoice,
  Session,
  SessionOptionsUpdate,
} from "../services/session.ts";
import type { MediaMode } from "../services/media-types.ts";

// ============================================================================
// Types
// ============================================================================

export interface ApiDependencies {
  session: Session;
}

type Body = Record<string, unknown>;

// ============================================================================
// Body helpers
// ============================================================================

function isRecord(value: unknown): value is Body {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Parse a JSON body. Missing or malformed bodies read as `{}`; a body that
 * is valid JSON but not an object yields null.
 */
async function readBody(c: Context): Promise<Body | null> {
  const text = await c.req.text();
  if (!text.trim()) return {};
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return null;
  }
  return isRecord(parsed) ? parsed : null;
}

function optionalString(body: Body, key: string): string | undefined {
  const value = body[key];
  return typeof value === "string" ? value : undefined;
}

function optionalBoolean(body: Body, key: string): boolean | undefined {
  const value = body[key];
  return typeof value === "boolean" ? value : undefined;
}

function isMixedChoice(value: unknown): value is MixedUrlChoice {
  return value === "video" || value === "playlist";
}

function isModeOrEmpty(value: string): value is MediaMode | "" {
  return value === "" || value === "audio" || value === "video";
}

const STRING_OPTIONS = [
  "networkTimeout",
  "networkRetries",
  "retryBackoff",
  "subtitleLanguages",
  "audioLanguage",
  "customFilename",
  "playlistItems",
  "outputDir",
] as const;

const BOOLEAN_OPTIONS = [
  "writeSubtitles",
  "embedSubtitles",
  "convertToMp4",
  "playlistEnabled",
] as const;

/**
 * Pick known option fields, rejecting ones with the wrong type.
 */
function parseOptionsUpdate(
  body: Body,
): { ok: true; update: SessionOptionsUpdate } | { ok: false; field: string } {
  const update: SessionOptionsUpdate = {};
  for (const key of STRING_OPTIONS) {
    if (!(key in body)) continue;
    const value = optionalString(body, key);
    if (value === undefined) return { ok: false, field: key };
    update[key] = value;
  }
  for (const key of BOOLEAN_OPTIONS) {
    if (!(key in body)) continue;
    const value = optionalBoolean(body, key);
    if (value === undefined) return { ok: false, field: key };
    update[key] = value;
  }
  return { ok: true, update };
}

function editResponse(c: Context, result: QueueEditResult) {
  if (result.ok) return c.json({ success: true });
  if (result.reason === "active") {
    return c.json({ error: "Queue is running" }, 409);
  }
  return c.json({ error: "Queue item not found" }, 404);
}

// ============================================================================
// API Factory
// ============================================================================

/**
 * Create the API router.
 */
export function createApiRouter(deps: ApiDependencies) {
  const { session } = deps;
  const api = new Hono();

  // ==========================================================================
  // Session
  // ==========================================================================

  api.get("/status", (c: Context) => c.json(session.getSnapshot()));

  api.put("/url", async (c: Context) => {
    const body = await readBody(c);
    const url = body ? optionalString(body, "url") : undefined;
    if (!body || url === undefined) {
      return c.json({ error: "url is required" }, 400);
    }
    const mixedChoice = body.mixedChoice;
    if (mixedChoice !== undefined && !isMixedChoice(mixedChoice)) {
      return c.json({ error: "mixedChoice must be 'video' or 'playlist'" }, 400);
    }
    session.onUrlChanged(url, {
      force: optionalBoolean(body, "force"),
      mixedChoice,
    });
    return c.json(session.getSnapshot());
  });

  api.post("/formats/fetch", async (c: Context) => {
    const body = await readBody(c);
    if (!body) return c.json({ error: "Invalid JSON body" }, 400);
    session.onFetchFormats(optionalBoolean(body, "force") ?? false);
    return c.json(session.getSnapshot());
  });

  api.put("/selection", async (c: Context) => {
    const body = await readBody(c);
    if (!body) return c.json({ error: "Invalid JSON body" }, 400);
    const mode = optionalString(body, "mode") ?? "";
    if (!isModeOrEmpty(mode)) {
      return c.json({ error: "mode must be 'audio' or 'video'", field: "mode" }, 400);
    }
    const result = session.applyModeFormats(
      mode,
      optionalString(body, "container") ?? "",
      optionalString(body, "codec") ?? "",
    );
    if (!result.ok) {
      if (result.reason === "busy") {
        return c.json({ error: "A download is running" }, 409);
      }
      return c.json({ error: "Invalid selection", reason: result.reason }, 400);
    }
    return c.json(result);
  });

  api.put("/selection/format", async (c: Context) => {
    const body = await readBody(c);
    const label = body ? optionalString(body, "label") : undefined;
    if (label === undefined) {
      return c.json({ error: "label is required" }, 400);
    }
    if (session.getSnapshot().isDownloading) {
      return c.json({ error: "A download is running" }, 409);
    }
    if (!session.selectFormat(label)) {
      return c.json({ error: "Unknown format", label }, 400);
    }
    return c.json({ success: true, label });
  });

  api.put("/options", async (c: Context) => {
    const body = await readBody(c);
    if (!body) return c.json({ error: "Invalid JSON body" }, 400);
    const parsed = parseOptionsUpdate(body);
    if (!parsed.ok) {
      return c.json({ error: `Invalid value for ${parsed.field}`, field: parsed.field }, 400);
    }
    session.updateOptions(parsed.update);
    return c.json(session.getSnapshot());
  });

  // ==========================================================================
  // Downloads
  // ==========================================================================

  api.post("/download", async (c: Context) => {
    const result = await session.startSingle();
    if (result.ok) return c.json({ success: true }, 202);
    if (result.reason === "busy" || result.reason === "cancelled") {
      return c.json({ error: result.message, reason: result.reason }, 409);
    }
    if (result.reason === "output_dir") {
      return c.json({ error: result.message, reason: result.reason, path: result.path }, 500);
    }
    return c.json({ error: result.message, reason: result.reason }, 400);
  });

  api.post("/cancel", (c: Context) => {
    return c.json({ cancelled: session.cancel() });
  });

  // ==========================================================================
  // Queue
  // ==========================================================================

  api.get("/queue", (c: Context) => c.json(session.getSnapshot().queue));

  api.post("/queue", (c: Context) => {
    const result = session.addToQueue();
    if (result.ok) return c.json(result.item, 201);
    if (result.reason === "busy") {
      return c.json({ error: "A download is running", reason: result.reason }, 409);
    }
    return c.json({ error: result.message, reason: result.reason }, 400);
  });

  api.delete("/queue", (c: Context) => editResponse(c, session.clearQueue()));

  api.post("/queue/start", (c: Context) => {
    const result = session.startQueue();
    if (result.ok) return c.json({ success: true }, 202);
    if (result.reason === "busy") {
      return c.json({ error: "A download is running", reason: result.reason }, 409);
    }
    if (result.reason === "empty") {
      return c.json({ error: "Queue is empty", reason: result.reason }, 400);
    }
    return c.json(
      {
        error: result.message,
        reason: result.reason,
        index: result.index,
        issue: result.issue,
      },
      400,
    );
  });

  api.delete("/queue/:id", (c: Context) => {
    return editResponse(c, session.removeFromQueue([c.req.param("id")]));
  });

  api.post("/queue/:id/move", async (c: Context) => {
    const body = await readBody(c);
    const direction = body ? body.direction : undefined;
    if (direction !== "up" && direction !== "down") {
      return c.json({ error: "direction must be 'up' or 'down'" }, 400);
    }
    return editResponse(c, session.moveQueueItems([c.req.param("id")], direction));
  });

  // ==========================================================================
  // Diagnostics
  // ==========================================================================

  api.get("/diagnostics", (c: Context) => c.text(session.diagnostics()));

  return api;
}
