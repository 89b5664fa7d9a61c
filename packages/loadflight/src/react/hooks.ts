/**
 * React bindings for loadflight state.
 *
 * Each hook subscribes a component to one source and re-renders on change.
 */

import { useCallback, useSyncExternalStore } from "react";
import type { OperationExecutor } from "../executor";
import type { DispatchedList } from "../list";
import type { StepProgress, StepProgressState } from "../progress/steps";
import type { OperationState } from "../types";

/**
 * Subscribe to an executor's loading state.
 *
 * @example
 * ```tsx
 * function LoadingBar({ executor }: { executor: OperationExecutor }) {
 *   const { isLoading, statusMessage } = useOperationState(executor);
 *   return isLoading ? <span>{statusMessage}</span> : null;
 * }
 * ```
 */
export function useOperationState(executor: OperationExecutor): OperationState {
  const subscribe = useCallback(
    (onChange: VoidFunction) => executor.subscribe(onChange),
    [executor]
  );
  return useSyncExternalStore(subscribe, executor.getState, executor.getState);
}

/**
 * Subscribe to a step tracker.
 */
export function useStepProgress(progress: StepProgress): StepProgressState {
  const subscribe = useCallback(
    (onChange: VoidFunction) => progress.subscribe(onChange),
    [progress]
  );
  return useSyncExternalStore(subscribe, progress.getState, progress.getState);
}

/**
 * Subscribe to a dispatched list's snapshot.
 *
 * The snapshot is swapped as a whole on every mutation, so the returned
 * array is stable between changes.
 */
export function useListItems<T>(list: DispatchedList<T>): readonly T[] {
  const subscribe = useCallback(
    (onChange: VoidFunction) => list.on(onChange),
    [list]
  );
  const getSnapshot = useCallback(() => list.items, [list]);
  return useSyncExternalStore(subscribe, getSnapshot, getSnapshot);
}
