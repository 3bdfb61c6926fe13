/**
 * Main entry point for clipqueue.
 *
 * Initializes and starts:
 * - yt-dlp backend
 * - Download session (fetch coordinator, queue, mailbox)
 * - HTTP server (API + events)
 */

import { serve, type ServerType } from "@hono/node-server";
import { loadConfigFromEnv, type Config } from "./config.ts";
import { createLogger, errorMessage } from "./logger.ts";
import { createServer } from "./server/index.ts";
import { expandOutputDir } from "./services/download-request.ts";
import { createSession, defaultFileSystem } from "./services/session.ts";
import { createYtDlpBackend, defaultProcessRunner } from "./services/ytdlp-backend.ts";

// ============================================================================
// Graceful Shutdown
// ============================================================================

interface Cleanup {
  name: string;
  fn: () => void | Promise<void>;
}

const cleanupTasks: Cleanup[] = [];
let log = createLogger("main");

function registerCleanup(name: string, fn: () => void | Promise<void>): void {
  cleanupTasks.push({ name, fn });
}

async function shutdown(signal: string): Promise<void> {
  log.info(`Received ${signal}, shutting down...`);

  for (const task of cleanupTasks.reverse()) {
    try {
      log.info(`Cleaning up: ${task.name}`);
      await task.fn();
    } catch (err) {
      log.error(`Error during cleanup of ${task.name}`, { error: errorMessage(err) });
    }
  }

  log.info("Shutdown complete");
  process.exit(0);
}

function closeServer(server: ServerType): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
}

// ============================================================================
// Main
// ============================================================================

async function main(): Promise<void> {
  log.info("Starting clipqueue...");

  // 1. Parse configuration
  const configResult = loadConfigFromEnv();
  if (!configResult.ok) {
    log.error("Configuration error", {
      errors: configResult.errors.map((e) => ({ field: e.field, message: e.message })),
    });
    process.exit(1);
  }
  const config: Config = configResult.config;
  log = createLogger("main", config.logLevel);
  const outputDir = expandOutputDir(config.outputDir);
  log.info("Configuration loaded", {
    port: config.port,
    outputDir,
    ytdlpPath: config.ytdlpPath,
  });

  // 2. Make sure the default output folder exists
  await defaultFileSystem.ensureDir(outputDir);

  // 3. Initialize services
  const backend = createYtDlpBackend(
    {
      ytdlpPath: config.ytdlpPath,
      metadataTimeoutSeconds: config.networkTimeoutSeconds,
      progressIntervalMs: config.progressIntervalMs,
    },
    defaultProcessRunner,
    createLogger("ytdlp", config.logLevel),
  );

  const session = createSession(
    {
      defaultOutputDir: outputDir,
      fetchDebounceMs: config.fetchDebounceMs,
      formatCacheMaxEntries: config.formatCacheMaxEntries,
      mailbox: {
        pollIntervalMs: config.mailboxPollMs,
        maxPerTick: config.mailboxMaxPerTick,
      },
      networkDefaults: {
        timeoutSeconds: config.networkTimeoutSeconds,
        retries: config.networkRetries,
        backoffSeconds: config.retryBackoffSeconds,
      },
    },
    { backend, log: createLogger("session", config.logLevel) },
  );
  session.start();
  registerCleanup("Session", () => session.dispose());
  log.info("Services initialized");

  // 4. Create and start HTTP server
  const server = createServer({ session, log: createLogger("http", config.logLevel) });
  const httpServer = serve({ fetch: server.app.fetch, port: config.port });
  registerCleanup("HTTP Server", () => closeServer(httpServer));
  // Runs before the server closes: open SSE streams would hold it open
  registerCleanup("Event streams", () => server.events.close());
  log.info(`HTTP server listening on port ${config.port}`);

  // 5. Set up signal handlers
  process.on("SIGINT", () => {
    shutdown("SIGINT").catch((err) => log.error("Shutdown failed", { error: errorMessage(err) }));
  });
  process.on("SIGTERM", () => {
    shutdown("SIGTERM").catch((err) => log.error("Shutdown failed", { error: errorMessage(err) }));
  });
}

main().catch((err) => {
  log.error("Fatal error", { error: errorMessage(err) });
  process.exit(1);
});
