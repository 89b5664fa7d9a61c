/**
 * Shared types for loadflight.
 */

// =============================================================================
// Listeners
// =============================================================================

/** A function notified with a payload. */
export type Listener<T> = (value: T) => void;

/** Unsubscribe function returned by every `on()` / `subscribe()`. */
export type Unsubscribe = VoidFunction;

// =============================================================================
// Equality
// =============================================================================

/** Named equality strategies. */
export type EqualityShorthand = "strict" | "shallow" | "deep";

/**
 * Equality strategy used to match items.
 * - "strict": Object.is
 * - "shallow": compare top-level keys/indices
 * - "deep": structural comparison
 * - function: custom comparator
 */
export type Equality<T = unknown> =
  | EqualityShorthand
  | ((a: T, b: T) => boolean);

// =============================================================================
// Disposal
// =============================================================================

/** Anything that releases resources on `dispose()`. */
export interface Disposable {
  dispose(): void;
}

// =============================================================================
// Operation state
// =============================================================================

/**
 * Loading state an executor exposes to bound UI.
 *
 * Returns to `{ isLoading: false, statusMessage: "", progressPercentage: undefined }`
 * whenever the last active operation ends.
 */
export interface OperationState {
  readonly isLoading: boolean;
  readonly statusMessage: string;
  /** 0..100 while an operation reports progress, undefined otherwise */
  readonly progressPercentage: number | undefined;
}

/** One named phase of a multi-phase operation. */
export interface ProgressStep {
  readonly title: string;
  readonly description: string;
  readonly isCompleted: boolean;
  readonly isInProgress: boolean;
}

/** Input shape for declaring steps. */
export interface ProgressStepInit {
  title: string;
  description?: string;
}
