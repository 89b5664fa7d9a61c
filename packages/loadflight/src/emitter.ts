import type { Listener, Unsubscribe } from "./types";

/**
 * Event emitter interface for pub/sub pattern.
 *
 * @template T - The type of payload emitted to listeners (defaults to void)
 */
export interface Emitter<T = void> {
  /**
   * Subscribe to events.
   *
   * @returns Unsubscribe function (idempotent - safe to call multiple times)
   */
  on(listener: Listener<T>): Unsubscribe;

  /** Emit an event to all registered listeners. */
  emit(payload: T): void;

  /** Remove all registered listeners. */
  clear(): void;
}

/**
 * Creates an event emitter for managing and notifying listeners.
 *
 * Every change notification in loadflight goes through one of these:
 * executor state, progress reporters, step trackers and dispatched lists.
 *
 * @example
 * ```ts
 * const changes = emitter<string>();
 *
 * const unsubscribe = changes.on((message) => {
 *   console.log("Received:", message);
 * });
 *
 * changes.emit("Hello"); // Logs: "Received: Hello"
 * unsubscribe();
 * ```
 */
export function emitter<T = void>(): Emitter<T> {
  /**
   * Using a Set provides O(1) removal and prevents duplicate listeners.
   */
  const listeners = new Set<Listener<T>>();

  return {
    on(listener): Unsubscribe {
      listeners.add(listener);
      return () => {
        listeners.delete(listener);
      };
    },

    emit(payload: T): void {
      // Snapshot - Set iteration would include listeners added during emit
      const copy = Array.from(listeners);
      const len = copy.length;
      for (let i = 0; i < len; i++) {
        copy[i](payload);
      }
    },

    clear(): void {
      listeners.clear();
    },
  };
}
