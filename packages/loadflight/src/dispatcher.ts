/**
 * Dispatcher bridge: "run this on the UI-confined execution context".
 *
 * Everything that owns UI-bound state (lists, executor state consumers)
 * mutates it through a `Dispatcher`. A headless target uses the
 * `immediateDispatcher()` pass-through; a host with a real UI loop adapts its
 * own scheduler to the same two methods; `serialDispatcher()` is an explicit
 * event loop for servers and tests.
 */

import { AsyncLocalStorage } from "node:async_hooks";
import { DisposedError } from "./errors";
import { getDefaultLogger, type Logger } from "./logger";
import { microtask } from "./utils/microtask";

// =============================================================================
// Types
// =============================================================================

export interface Dispatcher {
  /**
   * Whether the caller is already on the dispatcher's context.
   * When true, callers may mutate UI-bound state directly.
   */
  checkAccess(): boolean;

  /**
   * Run `fn` on the dispatcher's context and resolve with its result.
   * Errors thrown (or rejected) inside `fn` reject the returned promise.
   */
  invoke<T>(fn: () => T | PromiseLike<T>): Promise<T>;
}

export interface SerialDispatcher extends Dispatcher {
  /** Jobs waiting to run (not counting the running one) */
  readonly pending: number;
  /** Resolves once the queue is empty and no job is running */
  idle(): Promise<void>;
  /** Reject queued and future jobs with `DisposedError` */
  dispose(): void;
}

export interface SerialDispatcherOptions {
  /** Name used in log entries (default: "dispatcher") */
  name?: string;
  logger?: Logger;
}

// =============================================================================
// Immediate dispatcher
// =============================================================================

/**
 * Synchronous pass-through: every caller is "on" the context, so `invoke`
 * runs `fn` right away.
 */
export function immediateDispatcher(): Dispatcher {
  return {
    checkAccess: () => true,
    invoke<T>(fn: () => T | PromiseLike<T>): Promise<T> {
      try {
        return Promise.resolve(fn());
      } catch (error) {
        return Promise.reject(error);
      }
    },
  };
}

// =============================================================================
// Serial dispatcher
// =============================================================================

/** Identity of one job run; async continuations inherit it */
type JobToken = { readonly id: number };

interface Job {
  run: (token: JobToken) => Promise<void>;
  cancel: (error: Error) => void;
}

/**
 * Single-context event loop.
 *
 * - Jobs run one at a time, in the order they were invoked
 * - An async job holds the context until it settles
 * - `invoke` from inside a running job runs inline (no self-deadlock)
 * - `checkAccess()` is true only inside the running job; work a job leaves
 *   behind (timers, detached promises) loses access once the job settles
 *
 * @example
 * ```ts
 * const ui = serialDispatcher({ name: "ui" });
 *
 * await ui.invoke(() => {
 *   ui.checkAccess(); // true
 * });
 * ui.checkAccess(); // false
 * ```
 */
export function serialDispatcher(
  options: SerialDispatcherOptions = {}
): SerialDispatcher {
  const name = options.name ?? "dispatcher";
  const logger = options.logger ?? getDefaultLogger();
  // Other dispatchers use their own storage
  const context = new AsyncLocalStorage<JobToken>();
  const queue: Job[] = [];
  const idleWaiters: VoidFunction[] = [];
  let running = false;
  let disposed = false;
  let nextJobId = 0;
  let currentJob: JobToken | undefined;

  const checkAccess = () =>
    currentJob !== undefined && context.getStore() === currentJob;

  const notifyIdle = () => {
    const waiters = idleWaiters.splice(0, idleWaiters.length);
    for (const resolve of waiters) {
      resolve();
    }
  };

  const drain = async () => {
    running = true;
    try {
      let job = queue.shift();
      while (job) {
        const token: JobToken = { id: ++nextJobId };
        currentJob = token;
        try {
          await job.run(token);
        } finally {
          currentJob = undefined;
        }
        job = queue.shift();
      }
    } finally {
      running = false;
      notifyIdle();
    }
  };

  const schedule = () => {
    if (running) return;
    running = true;
    microtask(() => {
      drain().catch((error: unknown) => {
        logger.error(`${name} drain failed`, { error });
      });
    });
  };

  const invoke = <T>(fn: () => T | PromiseLike<T>): Promise<T> => {
    if (disposed) {
      return Promise.reject(new DisposedError(name));
    }

    if (checkAccess()) {
      try {
        return Promise.resolve(fn());
      } catch (error) {
        return Promise.reject(error);
      }
    }

    return new Promise<T>((resolve, reject) => {
      queue.push({
        run: (token) =>
          context.run(token, async () => {
            try {
              resolve(await fn());
            } catch (error) {
              reject(error);
            }
          }),
        cancel: reject,
      });
      schedule();
    });
  };

  return {
    checkAccess,
    invoke,

    get pending() {
      return queue.length;
    },

    idle(): Promise<void> {
      if (!running && queue.length === 0) {
        return Promise.resolve();
      }
      return new Promise((resolve) => {
        idleWaiters.push(resolve);
      });
    },

    dispose(): void {
      if (disposed) return;
      disposed = true;
      const cancelled = queue.splice(0, queue.length);
      for (const job of cancelled) {
        job.cancel(new DisposedError(name));
      }
      logger.debug(`${name} disposed`, { cancelled: cancelled.length });
    },
  };
}
