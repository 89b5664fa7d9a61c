/**
 * Structured logging.
 *
 * Every component takes a `Logger` through its options instead of reaching
 * for a global instance, so tests can capture output per component.
 */

import { isDev } from "./dev";

// =============================================================================
// Types
// =============================================================================

export type LogLevel = "debug" | "info" | "warn" | "error";

/** Extra structured data attached to a log entry. */
export type LogFields = Record<string, unknown>;

export interface Logger {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
}

/** Console-shaped sink the console logger writes to. */
export type LogSink = Pick<Console, "debug" | "info" | "warn" | "error">;

export interface ConsoleLoggerOptions {
  /** Label prepended as `[prefix]` (default: "loadflight") */
  prefix?: string;
  /** Minimum level written (default: "debug" in development, "warn" in production) */
  level?: LogLevel;
  /** Where entries go (default: console) */
  sink?: LogSink;
}

/** Numeric rank of each level, lowest first. */
export const logLevels: Readonly<Record<LogLevel, number>> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(logLevels, value);
}

// =============================================================================
// Loggers
// =============================================================================

/**
 * Logger that writes `[prefix] message` and the fields object to a console.
 *
 * @example
 * ```ts
 * const logger = consoleLogger({ prefix: "enterprises", level: "info" });
 * logger.warn("Attempt 1 failed, retrying in 500ms", { attempt: 1 });
 * // console.warn("[enterprises] Attempt 1 failed, retrying in 500ms", { attempt: 1 })
 * ```
 */
export function consoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const prefix = options.prefix ?? "loadflight";
  const threshold = logLevels[options.level ?? (isDev() ? "debug" : "warn")];
  const sink = options.sink ?? console;

  const write =
    (level: LogLevel) =>
    (message: string, fields?: LogFields): void => {
      if (logLevels[level] < threshold) return;
      const line = `[${prefix}] ${message}`;
      if (fields === undefined) {
        sink[level](line);
      } else {
        sink[level](line, fields);
      }
    };

  return {
    debug: write("debug"),
    info: write("info"),
    warn: write("warn"),
    error: write("error"),
  };
}

/** Logger that discards everything. */
export const noopLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};

/**
 * Derive a logger whose entries carry fixed fields.
 *
 * @example
 * ```ts
 * const log = withFields(logger, { loadId: "a1b2c3d4" });
 * log.info("Repository query completed", { count: 4 });
 * // fields: { loadId: "a1b2c3d4", count: 4 }
 * ```
 */
export function withFields(logger: Logger, fixed: LogFields): Logger {
  const wrap =
    (level: LogLevel) =>
    (message: string, fields?: LogFields): void =>
      logger[level](message, { ...fixed, ...fields });

  return {
    debug: wrap("debug"),
    info: wrap("info"),
    warn: wrap("warn"),
    error: wrap("error"),
  };
}

let defaultLogger: Logger | undefined;

/** Shared console logger used when a component is given none. */
export function getDefaultLogger(): Logger {
  if (!defaultLogger) {
    defaultLogger = consoleLogger();
  }
  return defaultLogger;
}
