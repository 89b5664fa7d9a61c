/**
 * Custom error classes for loadflight.
 * Using named error classes helps with error identification and handling.
 */

/**
 * Base class for all loadflight errors.
 */
export class LoadflightError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "LoadflightError";
  }
}

// =============================================================================
// Cancellation
// =============================================================================

/**
 * Thrown when an operation observes a cancelled signal, either because the
 * caller cancelled it or because the cancellation epoch was reset.
 *
 * Never retried.
 */
export class CancellationError extends LoadflightError {
  constructor(message = "Operation was cancelled", options?: { cause?: unknown }) {
    super(message, options);
    this.name = "CancellationError";
  }
}

// =============================================================================
// Retry
// =============================================================================

/**
 * Terminal failure raised once every retry attempt has failed.
 * The last attempt's error is kept as `cause`.
 */
export class RetryExhaustedError extends LoadflightError {
  readonly attempts: number;

  constructor(attempts: number, cause: unknown) {
    super(`Operation failed after ${attempts} attempts`, { cause });
    this.name = "RetryExhaustedError";
    this.attempts = attempts;
  }
}

// =============================================================================
// Lifecycle
// =============================================================================

/**
 * Thrown when calling into an executor, guard or dispatcher after `dispose()`.
 */
export class DisposedError extends LoadflightError {
  constructor(target: string) {
    super(`Cannot use disposed ${target}`);
    this.name = "DisposedError";
  }
}

/**
 * Thrown when a single-flight guard is released without being held.
 */
export class GuardReleaseError extends LoadflightError {
  constructor(name: string) {
    super(
      `Guard "${name}" was released without a matching tryEnter(). ` +
        `Release only in the finally block paired with a successful tryEnter().`
    );
    this.name = "GuardReleaseError";
  }
}

/**
 * Thrown when configuration values are out of range.
 */
export class ConfigError extends LoadflightError {
  /** Setting or environment variable that was rejected */
  readonly key: string;
  readonly reason: string;

  constructor(key: string, reason: string) {
    super(`Invalid configuration "${key}": ${reason}`);
    this.name = "ConfigError";
    this.key = key;
    this.reason = reason;
  }
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Check whether an error represents cancellation.
 *
 * Recognises loadflight's `CancellationError` and the `AbortError` that
 * `fetch`, timers and `AbortSignal.throwIfAborted()` raise.
 */
export function isCancellation(error: unknown): boolean {
  if (error instanceof CancellationError) return true;
  return error instanceof Error && error.name === "AbortError";
}

/**
 * Normalise a cancellation reason into a `CancellationError`.
 */
export function toCancellationError(reason: unknown): CancellationError {
  if (reason instanceof CancellationError) return reason;
  return new CancellationError("Operation was cancelled", { cause: reason });
}

/**
 * Throw a `CancellationError` if the signal is aborted.
 */
export function throwIfCancelled(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw toCancellationError(signal.reason);
  }
}
