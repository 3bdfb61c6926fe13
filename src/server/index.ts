/**
 * HTTP server for clipqueue.
 *
 * Routes:
 * - /api/*       - REST API over the download session
 * - /api/events  - Server-sent session events
 * - /health      - Health check
 */

import { Hono, type Context } from "hono";
import { cors } from "hono/cors";
import { logger } from "hono/logger";
import { silentLogger, type Logger } from "../logger.ts";
import type { Session } from "../services/session.ts";
import { createApiRouter } from "./api.ts";
import { createEventStream, type EventStream } from "./events.ts";

// ============================================================================
// Types
// ============================================================================

/**
 * Server dependencies.
 */
export interface ServerDependencies {
  session: Session;
  log?: Logger;
}

export interface Server {
  app: Hono;
  events: EventStream;
}

// ============================================================================
// Server Factory
// ============================================================================

export function createServer(deps: ServerDependencies): Server {
  const { session } = deps;
  const log = deps.log ?? silentLogger;
  const events = createEventStream(session, log);

  const app = new Hono();

  // Middleware
  app.use("*", logger((message) => log.info(message)));
  app.use("*", cors({
    origin: "*",
    allowMethods: ["GET", "POST", "PUT", "DELETE", "OPTIONS"],
    allowHeaders: ["Content-Type"],
  }));

  // ==========================================================================
  // API Routes
  // ==========================================================================

  app.get("/api/events", (c: Context) => events.handle(c));
  app.route("/api", createApiRouter({ session }));

  // ==========================================================================
  // Health Check
  // ==========================================================================

  app.get("/health", (c: Context) => {
    return c.json({ status: "ok", timestamp: new Date().toISOString() });
  });

  app.onError((err, c) => {
    log.error("Unhandled request error", { path: c.req.path, error: err.message });
    return c.json({ error: "Internal server error" }, 500);
  });

  return { app, events };
}
