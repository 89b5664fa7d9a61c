/**
 * Bounded exponential-backoff retry.
 *
 * ```ts
 * const enterprises = await executeWithRetry(
 *   () => repository.getAll(),
 *   { maxRetries: 3, signal, logger }
 * );
 * ```
 */

import {
  CancellationError,
  RetryExhaustedError,
  isCancellation,
  throwIfCancelled,
  toCancellationError,
} from "./errors";
import { defaultConfig } from "./config";
import { noopLogger, type Logger } from "./logger";

// =============================================================================
// Types
// =============================================================================

/** Abort-aware sleep; rejects with `CancellationError` when the signal aborts. */
export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface RetryOptions {
  /** Retries after the first attempt (default: 3, so 4 attempts) */
  maxRetries?: number;
  /** First delay in ms, doubled after every retry (default: 500) */
  baseDelay?: number;
  /** Upper bound for a single delay in ms */
  maxDelay?: number;
  /** Randomize each delay by ±30% (default: false) */
  jitter?: boolean;
  /** Cancellation signal checked before every attempt and every sleep */
  signal?: AbortSignal;
  /** Receives one warning per retry */
  logger?: Logger;
  /** Called before each sleep with the failed attempt number (1-based) */
  onRetry?: (info: RetryAttemptInfo) => void;
  /** Replace the sleep implementation (tests, custom schedulers) */
  sleep?: SleepFn;
}

export interface RetryAttemptInfo {
  /** 1-based number of the attempt that just failed */
  attempt: number;
  /** Delay before the next attempt, in ms */
  delay: number;
  error: unknown;
}

/** Operation retried by the policy; receives the 0-based attempt index. */
export type RetryOperation<T> = (attempt: number) => Promise<T> | T;

// =============================================================================
// Delay
// =============================================================================

/**
 * Abort-aware delay. Resolves after `ms`, or rejects with a
 * `CancellationError` as soon as `signal` aborts.
 */
export const sleep: SleepFn = (ms, signal) =>
  new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(toCancellationError(signal.reason));
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(toCancellationError(signal?.reason));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);

    signal?.addEventListener("abort", onAbort, { once: true });
  });

/** Randomize a delay by ±30%. */
export function withJitter(delay: number, random: () => number = Math.random) {
  const jitter = delay * 0.3 * (random() * 2 - 1);
  return Math.max(0, Math.round(delay + jitter));
}

// =============================================================================
// Retry
// =============================================================================

/**
 * Run `operation`, retrying non-cancellation failures with doubling delays.
 *
 * Attempts run for `0..maxRetries` inclusive. With the defaults the delays
 * are 500ms, 1000ms, 2000ms. When every attempt fails a
 * `RetryExhaustedError` is thrown with the last error as its `cause`.
 *
 * Cancellation (from the signal or thrown by the operation) is never retried
 * and surfaces as `CancellationError`.
 */
export async function executeWithRetry<T>(
  operation: RetryOperation<T>,
  options: RetryOptions = {}
): Promise<T> {
  const maxRetries = options.maxRetries ?? defaultConfig.maxRetries;
  const { signal, onRetry, maxDelay } = options;
  const logger = options.logger ?? noopLogger;
  const wait = options.sleep ?? sleep;
  let delay = options.baseDelay ?? defaultConfig.baseDelay;
  let lastError: unknown;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    throwIfCancelled(signal);

    try {
      return await operation(attempt);
    } catch (error) {
      if (isCancellation(error) || signal?.aborted) {
        throw error instanceof CancellationError
          ? error
          : toCancellationError(signal?.reason ?? error);
      }

      lastError = error;

      if (attempt < maxRetries) {
        const bounded = maxDelay === undefined ? delay : Math.min(delay, maxDelay);
        const actual = options.jitter ? withJitter(bounded) : bounded;

        logger.warn(`Attempt ${attempt + 1} failed, retrying in ${actual}ms`, {
          attempt: attempt + 1,
          delay: actual,
          error,
        });
        onRetry?.({ attempt: attempt + 1, delay: actual, error });

        throwIfCancelled(signal);
        await wait(actual, signal);
        delay *= 2;
      }
    }
  }

  throw new RetryExhaustedError(maxRetries + 1, lastError);
}

/**
 * Reusable retry policy bound to a set of options.
 *
 * @example
 * ```ts
 * const withRetry = retryPolicy({ maxRetries: 2, logger });
 * const accounts = await withRetry(() => repository.getAll(), signal);
 * ```
 */
export function retryPolicy(defaults: RetryOptions = {}) {
  return <T>(operation: RetryOperation<T>, signal?: AbortSignal): Promise<T> =>
    executeWithRetry(operation, {
      ...defaults,
      signal: signal ?? defaults.signal,
    });
}

export type RetryPolicy = ReturnType<typeof retryPolicy>;
