/**
 * Configuration types and parsing for clipqueue.
 * All functions are pure and easily testable.
 */

import { isLogLevel, type LogLevel } from "./logger.ts";

export interface Config {
  port: number;
  outputDir: string;
  ytdlpPath: string;
  logLevel: LogLevel;
  fetchDebounceMs: number;
  formatCacheMaxEntries: number;
  mailboxPollMs: number;
  mailboxMaxPerTick: number;
  progressIntervalMs: number;
  networkTimeoutSeconds: number;
  networkRetries: number;
  retryBackoffSeconds: number;
}

export interface ConfigInput {
  PORT?: string;
  OUTPUT_DIR?: string;
  YTDLP_PATH?: string;
  LOG_LEVEL?: string;
  FETCH_DEBOUNCE_MS?: string;
  FORMAT_CACHE_MAX_ENTRIES?: string;
  MAILBOX_POLL_MS?: string;
  MAILBOX_MAX_PER_TICK?: string;
  PROGRESS_INTERVAL_MS?: string;
  NETWORK_TIMEOUT_SECONDS?: string;
  NETWORK_RETRIES?: string;
  RETRY_BACKOFF_SECONDS?: string;
}

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly field: string,
  ) {
    super(message);
    this.name = "ConfigError";
  }
}

export type ConfigResult =
  | { ok: true; config: Config }
  | { ok: false; errors: ConfigError[] };

export const DEFAULT_OUTPUT_DIR = "~/Downloads";

/**
 * Parse and validate configuration from environment variables.
 * Pure function - no I/O, only transforms input to output.
 */
export function parseConfig(input: ConfigInput): ConfigResult {
  const errors: ConfigError[] = [];

  function take<T>(result: ParseResult<T>, fallback: T): T {
    if (!result.ok) {
      errors.push(result.error);
      return fallback;
    }
    return result.value;
  }

  const port = take(parsePort(input.PORT), 3001);

  const logLevelRaw = input.LOG_LEVEL?.trim().toLowerCase() || "info";
  let logLevel: LogLevel = "info";
  if (isLogLevel(logLevelRaw)) {
    logLevel = logLevelRaw;
  } else {
    errors.push(
      new ConfigError(
        `LOG_LEVEL must be one of debug, info, warn, error, got: ${input.LOG_LEVEL}`,
        "LOG_LEVEL",
      ),
    );
  }

  const config: Config = {
    port,
    outputDir: input.OUTPUT_DIR?.trim() || DEFAULT_OUTPUT_DIR,
    ytdlpPath: input.YTDLP_PATH?.trim() || "yt-dlp",
    logLevel,
    fetchDebounceMs: take(
      parseNonNegativeInt(input.FETCH_DEBOUNCE_MS, "FETCH_DEBOUNCE_MS", 600),
      600,
    ),
    formatCacheMaxEntries: take(
      parsePositiveInt(input.FORMAT_CACHE_MAX_ENTRIES, "FORMAT_CACHE_MAX_ENTRIES", 100),
      100,
    ),
    mailboxPollMs: take(
      parsePositiveInt(input.MAILBOX_POLL_MS, "MAILBOX_POLL_MS", 50),
      50,
    ),
    mailboxMaxPerTick: take(
      parsePositiveInt(input.MAILBOX_MAX_PER_TICK, "MAILBOX_MAX_PER_TICK", 50),
      50,
    ),
    progressIntervalMs: take(
      parseNonNegativeInt(input.PROGRESS_INTERVAL_MS, "PROGRESS_INTERVAL_MS", 800),
      800,
    ),
    networkTimeoutSeconds: take(
      parsePositiveInt(input.NETWORK_TIMEOUT_SECONDS, "NETWORK_TIMEOUT_SECONDS", 20),
      20,
    ),
    networkRetries: take(
      parseNonNegativeInt(input.NETWORK_RETRIES, "NETWORK_RETRIES", 3),
      3,
    ),
    retryBackoffSeconds: take(
      parseNonNegativeNumber(input.RETRY_BACKOFF_SECONDS, "RETRY_BACKOFF_SECONDS", 1.5),
      1.5,
    ),
  };

  if (errors.length > 0) {
    return { ok: false, errors };
  }
  return { ok: true, config };
}

/**
 * Load config from process.env (convenience wrapper).
 * This is the only impure function - it reads from environment.
 */
export function loadConfigFromEnv(): ConfigResult {
  const env = process.env;
  return parseConfig({
    PORT: env.PORT,
    OUTPUT_DIR: env.OUTPUT_DIR,
    YTDLP_PATH: env.YTDLP_PATH,
    LOG_LEVEL: env.LOG_LEVEL,
    FETCH_DEBOUNCE_MS: env.FETCH_DEBOUNCE_MS,
    FORMAT_CACHE_MAX_ENTRIES: env.FORMAT_CACHE_MAX_ENTRIES,
    MAILBOX_POLL_MS: env.MAILBOX_POLL_MS,
    MAILBOX_MAX_PER_TICK: env.MAILBOX_MAX_PER_TICK,
    PROGRESS_INTERVAL_MS: env.PROGRESS_INTERVAL_MS,
    NETWORK_TIMEOUT_SECONDS: env.NETWORK_TIMEOUT_SECONDS,
    NETWORK_RETRIES: env.NETWORK_RETRIES,
    RETRY_BACKOFF_SECONDS: env.RETRY_BACKOFF_SECONDS,
  });
}

// Helper functions (pure)

type ParseResult<T> = { ok: true; value: T } | { ok: false; error: ConfigError };

const INTEGER = /^\d+$/;
const DECIMAL = /^(\d+\.?\d*|\.\d+)$/;

function parsePort(value: string | undefined): ParseResult<number> {
  if (!value || value.trim() === "") {
    return { ok: true, value: 3001 };
  }

  const trimmed = value.trim();
  const num = INTEGER.test(trimmed) ? parseInt(trimmed, 10) : NaN;
  if (isNaN(num) || num < 1 || num > 65535) {
    return {
      ok: false,
      error: new ConfigError(
        `PORT must be a valid port number (1-65535), got: ${value}`,
        "PORT",
      ),
    };
  }

  return { ok: true, value: num };
}

function parseNonNegativeInt(
  value: string | undefined,
  field: string,
  defaultValue: number,
): ParseResult<number> {
  if (!value || value.trim() === "") {
    return { ok: true, value: defaultValue };
  }

  const trimmed = value.trim();
  if (!INTEGER.test(trimmed)) {
    return {
      ok: false,
      error: new ConfigError(
        `${field} must be a non-negative integer, got: ${value}`,
        field,
      ),
    };
  }

  return { ok: true, value: parseInt(trimmed, 10) };
}

function parsePositiveInt(
  value: string | undefined,
  field: string,
  defaultValue: number,
): ParseResult<number> {
  if (!value || value.trim() === "") {
    return { ok: true, value: defaultValue };
  }

  const trimmed = value.trim();
  const num = INTEGER.test(trimmed) ? parseInt(trimmed, 10) : NaN;
  if (isNaN(num) || num < 1) {
    return {
      ok: false,
      error: new ConfigError(
        `${field} must be a positive integer, got: ${value}`,
        field,
      ),
    };
  }

  return { ok: true, value: num };
}

function parseNonNegativeNumber(
  value: string | undefined,
  field: string,
  defaultValue: number,
): ParseResult<number> {
  if (!value || value.trim() === "") {
    return { ok: true, value: defaultValue };
  }

  const trimmed = value.trim();
  if (!DECIMAL.test(trimmed)) {
    return {
      ok: false,
      error: new ConfigError(
        `${field} must be a non-negative number, got: ${value}`,
        field,
      ),
    };
  }

  return { ok: true, value: Number(trimmed) };
}
