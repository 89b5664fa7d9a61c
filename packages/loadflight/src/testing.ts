/**
 * Test helpers for code built on loadflight.
 *
 * @packageDocumentation
 */

import type { LogFields, Logger, LogLevel } from "./logger";

export interface LogEntry {
  level: LogLevel;
  message: string;
  fields: LogFields | undefined;
}

export interface MemoryLogger extends Logger {
  readonly entries: readonly LogEntry[];
  /** Entries of one level, in order */
  at(level: LogLevel): LogEntry[];
  clear(): void;
}

/**
 * Logger that records every entry.
 *
 * @example
 * ```ts
 * const logger = memoryLogger();
 * await executeWithRetry(flaky, { logger, maxRetries: 2 });
 * expect(logger.at("warn")).toHaveLength(2);
 * ```
 */
export function memoryLogger(): MemoryLogger {
  const entries: LogEntry[] = [];
  const record =
    (level: LogLevel) =>
    (message: string, fields?: LogFields): void => {
      entries.push({ level, message, fields });
    };

  return {
    get entries() {
      return entries;
    },
    at: (level) => entries.filter((entry) => entry.level === level),
    clear() {
      entries.length = 0;
    },
    debug: record("debug"),
    info: record("info"),
    warn: record("warn"),
    error: record("error"),
  };
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve(value: T): void;
  reject(error: unknown): void;
}

/** A promise settled from outside, for holding an operation open. */
export function deferred<T = void>(): Deferred<T> {
  let resolve: (value: T) => void = () => {};
  let reject: (error: unknown) => void = () => {};
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}
