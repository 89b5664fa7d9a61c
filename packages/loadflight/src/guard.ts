/**
 * Single-flight guard: at most one execution of a logical load in flight.
 *
 * Concurrent callers are rejected, never queued. A rejected call does no
 * work and touches no state.
 */

import { DisposedError, GuardReleaseError } from "./errors";
import { getDefaultLogger, type Logger } from "./logger";

export type SingleFlightResult<T> =
  | { status: "completed"; value: T }
  | { status: "skipped" };

export interface SingleFlightOptions {
  /** Label used in log entries and errors (default: "operation") */
  name?: string;
  logger?: Logger;
}

export interface SingleFlightGuard {
  /** Whether a holder is currently inside the guard */
  readonly busy: boolean;

  /**
   * Non-blocking acquire.
   * @returns false if another caller holds the guard
   */
  tryEnter(): boolean;

  /**
   * Release the guard. Must run in the `finally` block paired with a
   * successful `tryEnter()`.
   * @throws GuardReleaseError when the guard is not held
   */
  release(): void;

  /**
   * Run `fn` inside the guard, or skip it when the guard is held.
   * The guard is released on every path, including cancellation and failure.
   */
  run<T>(
    fn: () => Promise<T> | T,
    context?: Record<string, unknown>
  ): Promise<SingleFlightResult<T>>;

  /** Later calls throw `DisposedError`. */
  dispose(): void;
}

/**
 * Create a single-flight guard.
 *
 * @example
 * ```ts
 * const loadGuard = singleFlight({ name: "Enterprise loading", logger });
 *
 * const result = await loadGuard.run(() => loadEnterprises());
 * if (result.status === "skipped") {
 *   // another load is already running
 * }
 * ```
 */
export function singleFlight(
  options: SingleFlightOptions = {}
): SingleFlightGuard {
  const name = options.name ?? "operation";
  const logger = options.logger ?? getDefaultLogger();
  let held = false;
  let disposed = false;

  const assertAlive = () => {
    if (disposed) {
      throw new DisposedError(`guard "${name}"`);
    }
  };

  const tryEnter = () => {
    assertAlive();
    if (held) return false;
    held = true;
    return true;
  };

  const release = () => {
    if (!held) {
      throw new GuardReleaseError(name);
    }
    held = false;
  };

  return {
    get busy() {
      return held;
    },

    tryEnter,
    release,

    async run<T>(
      fn: () => Promise<T> | T,
      context?: Record<string, unknown>
    ): Promise<SingleFlightResult<T>> {
      if (!tryEnter()) {
        logger.info(`${name} already in progress, skipping duplicate request`, context);
        return { status: "skipped" };
      }

      try {
        return { status: "completed", value: await fn() };
      } finally {
        release();
      }
    },

    dispose() {
      disposed = true;
    },
  };
}
