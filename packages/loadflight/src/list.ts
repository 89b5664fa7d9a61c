/**
 * Ordered list for UI-bound items whose writes are marshaled through a
 * dispatcher.
 *
 * Every mutation builds the next array and swaps it in as one frozen
 * snapshot, then raises exactly one change event. A reader never sees a
 * half-applied mutation, and `replaceAll` never exposes an empty
 * in-between state.
 */

import type { Dispatcher } from "./dispatcher";
import { emitter } from "./emitter";
import { resolveEquality } from "./equality";
import type { Equality, Listener, Unsubscribe } from "./types";

// =============================================================================
// Types
// =============================================================================

export type ListChange<T> =
  | { type: "add"; index: number; items: readonly T[] }
  | { type: "remove"; index: number; items: readonly T[] }
  | { type: "move"; from: number; to: number; item: T }
  | { type: "reset"; items: readonly T[] };

export interface ListChangeEvent<T> {
  change: ListChange<T>;
  /** Snapshot after the change */
  items: readonly T[];
}

export interface DispatchedListOptions<T> {
  initial?: Iterable<T>;
  /** How `remove()` matches items (default: "strict") */
  equality?: Equality<T>;
}

export interface DispatchedList<T> extends Iterable<T> {
  /** Current frozen snapshot */
  readonly items: readonly T[];
  readonly length: number;
  at(index: number): T | undefined;

  /** Discard the contents and adopt `items`, in order, as one change */
  replaceAll(items: Iterable<T>): Promise<void>;
  add(item: T): Promise<void>;
  /** Append several items as one change (no event for an empty batch) */
  addRange(items: Iterable<T>): Promise<void>;
  insert(index: number, item: T): Promise<void>;
  /** @returns whether a matching item was removed */
  remove(item: T): Promise<boolean>;
  removeAt(index: number): Promise<T | undefined>;
  move(from: number, to: number): Promise<void>;
  clear(): Promise<void>;

  /** Subscribe to change events */
  on(listener: Listener<ListChangeEvent<T>>): Unsubscribe;
}

// =============================================================================
// Implementation
// =============================================================================

/**
 * Create a dispatcher-marshaled list.
 *
 * Callers on the dispatcher's context mutate directly; any other caller's
 * mutation is queued through `dispatcher.invoke` and the returned promise
 * settles once it has been applied.
 *
 * Reads (`items`, `at`, iteration) are meant for the dispatcher's context.
 *
 * @example
 * ```ts
 * const enterprises = dispatchedList<Enterprise>(ui, { equality: "deep" });
 *
 * enterprises.on(({ change }) => render(change));
 * await enterprises.replaceAll(await repository.getAll());
 * ```
 */
export function dispatchedList<T>(
  dispatcher: Dispatcher,
  options: DispatchedListOptions<T> = {}
): DispatchedList<T> {
  const equals = resolveEquality(options.equality);
  const changes = emitter<ListChangeEvent<T>>();
  let snapshot: readonly T[] = Object.freeze(Array.from(options.initial ?? []));

  const commit = (next: T[], change: ListChange<T>) => {
    snapshot = Object.freeze(next);
    changes.emit({ change, items: snapshot });
  };

  const dispatch = <R>(mutation: () => R): Promise<R> => {
    if (dispatcher.checkAccess()) {
      try {
        return Promise.resolve(mutation());
      } catch (error) {
        return Promise.reject(error);
      }
    }
    return dispatcher.invoke(mutation);
  };

  const clampIndex = (index: number, length: number) =>
    Math.max(0, Math.min(index, length));

  const assertIndex = (index: number, length: number) => {
    if (!Number.isInteger(index) || index < 0 || index >= length) {
      throw new RangeError(`Index ${index} is out of range (length ${length})`);
    }
  };

  return {
    get items() {
      return snapshot;
    },

    get length() {
      return snapshot.length;
    },

    at(index: number) {
      return snapshot[index];
    },

    [Symbol.iterator]() {
      return snapshot[Symbol.iterator]();
    },

    replaceAll(items) {
      const next = Array.from(items);
      return dispatch(() => {
        commit(next, { type: "reset", items: next });
      });
    },

    add(item) {
      return dispatch(() => {
        commit([...snapshot, item], {
          type: "add",
          index: snapshot.length,
          items: [item],
        });
      });
    },

    addRange(items) {
      const batch = Array.from(items);
      return dispatch(() => {
        if (batch.length === 0) return;
        commit([...snapshot, ...batch], {
          type: "add",
          index: snapshot.length,
          items: batch,
        });
      });
    },

    insert(index, item) {
      return dispatch(() => {
        const at = clampIndex(index, snapshot.length);
        const next = [...snapshot];
        next.splice(at, 0, item);
        commit(next, { type: "add", index: at, items: [item] });
      });
    },

    remove(item) {
      return dispatch(() => {
        const index = snapshot.findIndex((candidate) => equals(candidate, item));
        if (index < 0) return false;
        const removed = snapshot[index];
        const next = [...snapshot];
        next.splice(index, 1);
        commit(next, { type: "remove", index, items: [removed] });
        return true;
      });
    },

    removeAt(index) {
      return dispatch(() => {
        if (index < 0 || index >= snapshot.length) return undefined;
        const removed = snapshot[index];
        const next = [...snapshot];
        next.splice(index, 1);
        commit(next, { type: "remove", index, items: [removed] });
        return removed;
      });
    },

    move(from, to) {
      return dispatch(() => {
        assertIndex(from, snapshot.length);
        assertIndex(to, snapshot.length);
        if (from === to) return;
        const next = [...snapshot];
        const [item] = next.splice(from, 1);
        next.splice(to, 0, item);
        commit(next, { type: "move", from, to, item });
      });
    },

    clear() {
      return dispatch(() => {
        if (snapshot.length === 0) return;
        commit([], { type: "reset", items: [] });
      });
    },

    on(listener) {
      return changes.on(listener);
    },
  };
}
