/**
 * Leveled console logger.
 *
 * Output format: `[LEVEL] [scope] message {"json":"data"}`
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export interface Logger {
  debug(msg: string, data?: Record<string, unknown>): void;
  info(msg: string, data?: Record<string, unknown>): void;
  warn(msg: string, data?: Record<string, unknown>): void;
  error(msg: string, data?: Record<string, unknown>): void;
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export function createLogger(scope: string, level: LogLevel = "info"): Logger {
  const threshold = LOG_LEVELS.indexOf(level);

  const write = (
    msgLevel: LogLevel,
    sink: (...args: unknown[]) => void,
    msg: string,
    data?: Record<string, unknown>,
  ) => {
    if (LOG_LEVELS.indexOf(msgLevel) < threshold) return;
    sink(
      `[${msgLevel.toUpperCase()}] [${scope}] ${msg}`,
      data ? JSON.stringify(data) : "",
    );
  };

  return {
    debug: (msg, data) => write("debug", console.debug, msg, data),
    info: (msg, data) => write("info", console.log, msg, data),
    warn: (msg, data) => write("warn", console.warn, msg, data),
    error: (msg, data) => write("error", console.error, msg, data),
  };
}

/**
 * Logger that discards everything. Handy as a default dependency.
 */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
