/**
 * Async operation executor.
 *
 * Runs background work while exposing `isLoading`, `statusMessage` and
 * `progressPercentage` to bound UI, and guarantees the state returns to idle
 * on every path: success, cancellation and failure.
 */

import { immediateDispatcher, type Dispatcher } from "./dispatcher";
import { emitter } from "./emitter";
import {
  DisposedError,
  isCancellation,
  throwIfCancelled,
  toCancellationError,
} from "./errors";
import { getDefaultLogger, type Logger } from "./logger";
import type { ProgressReporter } from "./progress/reporter";
import type {
  Disposable,
  Listener,
  OperationState,
  Unsubscribe,
} from "./types";

// =============================================================================
// Types
// =============================================================================

/** Passed to every operation. */
export interface OperationContext {
  /** Cancellation signal of the epoch the operation started in */
  readonly signal: AbortSignal;
  /** Epoch the operation started in */
  readonly epoch: number;
  /** Throw `CancellationError` if the signal has been aborted */
  throwIfCancelled(): void;
}

export type Operation<T> = (context: OperationContext) => Promise<T> | T;

export interface ExecuteOptions {
  /**
   * Mirrored into `progressPercentage` and driven to 100 on success.
   * Reset when no running call already mirrors it; the mirrored value never
   * decreases within one loading interval.
   */
  progress?: ProgressReporter;
  /** Shown while the operation runs (ignored when empty) */
  statusMessage?: string;
}

/**
 * User-facing failure notification (toast, dialog, banner).
 * Invoked on the dispatcher after a non-cancellation failure.
 */
export interface ErrorReporter {
  report(
    error: unknown,
    context: { operation: string }
  ): void | PromiseLike<void>;
}

export interface ExecutorOptions {
  /** Label used in log entries (default: "executor") */
  name?: string;
  /** Context error reports run on (default: immediate) */
  dispatcher?: Dispatcher;
  logger?: Logger;
  errorReporter?: ErrorReporter;
}

/** `dispose()` aborts running calls; subscribers still receive the final idle state. */
export interface OperationExecutor extends Disposable {
  /** Current cancellation epoch */
  readonly epoch: number;
  /** Signal handed to operations started now */
  readonly signal: AbortSignal;
  readonly disposed: boolean;

  getState(): OperationState;
  subscribe(listener: Listener<OperationState>): Unsubscribe;

  /**
   * Run `operation` with loading/status/progress state.
   *
   * - Cancellation is logged at info and rethrown as `CancellationError`
   * - A result that arrives after its epoch was cancelled is discarded the same way
   * - Any other failure is logged at error, reported, and rethrown
   * - State is reset in a `finally` block on every path
   */
  execute<T>(operation: Operation<T>, options?: ExecuteOptions): Promise<T>;

  /** Abort the current epoch */
  cancelOperations(): void;
  /** Abort the current epoch and start a new one */
  resetCancellation(): void;
}

export const idleOperationState: OperationState = Object.freeze({
  isLoading: false,
  statusMessage: "",
  progressPercentage: undefined,
});

// =============================================================================
// Implementation
// =============================================================================

/**
 * Create an operation executor.
 *
 * Overlapping `execute` calls share one loading interval: `isLoading` turns
 * true when the first starts and false when the last settles.
 *
 * @example
 * ```ts
 * const executor = operationExecutor({ name: "enterprises", logger, errorReporter });
 *
 * executor.subscribe((state) => view.render(state));
 *
 * const enterprises = await executor.execute(
 *   ({ signal }) => executeWithRetry(() => repository.getAll(), { signal }),
 *   { statusMessage: "Loading enterprises..." }
 * );
 * ```
 */
export function operationExecutor(
  options: ExecutorOptions = {}
): OperationExecutor {
  const name = options.name ?? "executor";
  const dispatcher = options.dispatcher ?? immediateDispatcher();
  const logger = options.logger ?? getDefaultLogger();
  const { errorReporter } = options;
  const changes = emitter<OperationState>();

  let state = idleOperationState;
  let controller = new AbortController();
  let epoch = 0;
  let active = 0;
  let disposed = false;
  // Reporters mirrored into state, shared by overlapping calls
  const mirrored = new Map<ProgressReporter, { calls: number; detach: Unsubscribe }>();

  const setState = (patch: Partial<OperationState>) => {
    const next = { ...state, ...patch };
    if (
      next.isLoading === state.isLoading &&
      next.statusMessage === state.statusMessage &&
      next.progressPercentage === state.progressPercentage
    ) {
      return;
    }
    state = Object.freeze(next);
    changes.emit(state);
  };

  const attachProgress = (progress: ProgressReporter) => {
    const existing = mirrored.get(progress);
    if (existing) {
      existing.calls++;
      return;
    }
    const detach = progress.on((snapshot) =>
      setState({
        progressPercentage: Math.max(
          state.progressPercentage ?? 0,
          snapshot.percentage
        ),
      })
    );
    mirrored.set(progress, { calls: 1, detach });
    progress.reset();
  };

  const detachProgress = (progress: ProgressReporter) => {
    const entry = mirrored.get(progress);
    if (!entry) return;
    entry.calls--;
    if (entry.calls === 0) {
      mirrored.delete(progress);
      entry.detach();
    }
  };

  const reportFailure = async (error: unknown, operation: string) => {
    if (!errorReporter) return;
    try {
      await dispatcher.invoke(() => errorReporter.report(error, { operation }));
    } catch (reportError) {
      logger.error("Failed to report operation error", {
        executor: name,
        error: reportError,
      });
    }
  };

  const execute = async <T>(
    operation: Operation<T>,
    executeOptions: ExecuteOptions = {}
  ): Promise<T> => {
    if (typeof operation !== "function") {
      throw new TypeError("operation must be a function");
    }
    if (disposed) {
      throw new DisposedError(`executor "${name}"`);
    }

    const { progress, statusMessage } = executeOptions;
    const signal = controller.signal;
    const context: OperationContext = {
      signal,
      epoch,
      throwIfCancelled: () => throwIfCancelled(signal),
    };

    active++;
    try {
      setState({
        isLoading: true,
        ...(statusMessage ? { statusMessage } : {}),
      });

      if (progress) {
        attachProgress(progress);
      }

      const result = await operation(context);
      // Work from a cancelled epoch does not complete
      if (signal.aborted) {
        throw toCancellationError(signal.reason);
      }

      progress?.report(100);
      return result;
    } catch (error) {
      if (isCancellation(error) || signal.aborted) {
        logger.info("Operation was cancelled", {
          executor: name,
          epoch: context.epoch,
        });
        throw toCancellationError(isCancellation(error) ? error : signal.reason);
      }

      logger.error("Error executing async operation", {
        executor: name,
        operation: statusMessage ?? name,
        error,
      });
      await reportFailure(error, statusMessage ?? name);
      throw error;
    } finally {
      if (progress) {
        detachProgress(progress);
      }
      active--;
      if (active === 0) {
        setState(idleOperationState);
        if (disposed) {
          changes.clear();
        }
      }
    }
  };

  return {
    get epoch() {
      return epoch;
    },
    get signal() {
      return controller.signal;
    },
    get disposed() {
      return disposed;
    },

    getState: () => state,

    subscribe(listener) {
      return changes.on(listener);
    },

    execute,

    cancelOperations() {
      controller.abort();
    },

    resetCancellation() {
      controller.abort();
      controller = new AbortController();
      epoch++;
    },

    dispose() {
      if (disposed) return;
      disposed = true;
      controller.abort();
      // In-flight calls still emit the idle state
      if (active === 0) {
        changes.clear();
      }
    },
  };
}
