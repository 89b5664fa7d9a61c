import { emitter } from "../emitter";
import { getDefaultLogger, type Logger } from "../logger";
import type {
  Listener,
  ProgressStep,
  ProgressStepInit,
  Unsubscribe,
} from "../types";

export interface StepProgressState {
  readonly operationName: string;
  readonly statusMessage: string;
  readonly currentStepIndex: number;
  readonly inProgress: boolean;
  readonly canCancel: boolean;
  readonly steps: readonly ProgressStep[];
}

export interface StepProgressOptions {
  logger?: Logger;
}

export interface StepProgress {
  /** Cancellation signal of the current operation; renewed by start/reset */
  readonly signal: AbortSignal;
  /** Completed steps as a percentage of all steps */
  readonly percentage: number;

  getState(): StepProgressState;
  subscribe(listener: Listener<StepProgressState>): Unsubscribe;

  start(operationName: string, steps: readonly ProgressStepInit[]): void;
  update(stepIndex: number, statusMessage: string): void;
  complete(): void;
  fail(reason: string): void;
  cancel(): void;
  reset(): void;
}

const idleState: StepProgressState = Object.freeze({
  operationName: "",
  statusMessage: "",
  currentStepIndex: 0,
  inProgress: false,
  canCancel: false,
  steps: Object.freeze([]),
});

/**
 * Named multi-step progress for phase-level feedback.
 *
 * `update(i)` marks every step before `i` completed and step `i` in
 * progress. `complete()` freezes all steps as completed; `fail()` leaves
 * them as they were, so the UI shows how far the operation got.
 *
 * @example
 * ```ts
 * const progress = stepProgress({ logger });
 *
 * progress.start("Loading Enterprises", [
 *   { title: "Connecting", description: "Establishing database connection" },
 *   { title: "Querying", description: "Executing database query" },
 * ]);
 * progress.update(1, "Query running...");
 * progress.complete();
 * ```
 */
export function stepProgress(options: StepProgressOptions = {}): StepProgress {
  const logger = options.logger ?? getDefaultLogger();
  const changes = emitter<StepProgressState>();
  let state = idleState;
  let controller = new AbortController();

  const setState = (patch: Partial<StepProgressState>) => {
    state = Object.freeze({ ...state, ...patch });
    changes.emit(state);
  };

  const renewSignal = () => {
    controller.abort();
    controller = new AbortController();
  };

  const freezeSteps = (steps: ProgressStep[]) =>
    Object.freeze(steps.map((step) => Object.freeze(step)));

  return {
    get signal() {
      return controller.signal;
    },

    get percentage() {
      const total = state.steps.length;
      if (total === 0) return 0;
      const done = state.steps.filter((step) => step.isCompleted).length;
      return (done / total) * 100;
    },

    getState: () => state,

    subscribe(listener) {
      return changes.on(listener);
    },

    start(operationName, steps) {
      logger.info(`Starting progress tracking for operation: ${operationName}`, {
        steps: steps.length,
      });
      renewSignal();
      setState({
        operationName,
        statusMessage: "Initializing...",
        currentStepIndex: 0,
        inProgress: true,
        canCancel: true,
        steps: freezeSteps(
          steps.map((step) => ({
            title: step.title,
            description: step.description ?? "",
            isCompleted: false,
            isInProgress: false,
          }))
        ),
      });
    },

    update(stepIndex, statusMessage) {
      if (stepIndex < 0 || stepIndex >= state.steps.length) return;

      setState({
        currentStepIndex: stepIndex,
        statusMessage,
        steps: freezeSteps(
          state.steps.map((step, i) =>
            i < stepIndex
              ? { ...step, isCompleted: true, isInProgress: false }
              : i === stepIndex
              ? { ...step, isInProgress: true }
              : { ...step }
          )
        ),
      });
      logger.debug("Progress updated", { stepIndex, message: statusMessage });
    },

    complete() {
      logger.info(`Operation completed successfully: ${state.operationName}`);
      setState({
        statusMessage: "Operation completed successfully",
        inProgress: false,
        canCancel: false,
        steps: freezeSteps(
          state.steps.map((step) => ({
            ...step,
            isCompleted: true,
            isInProgress: false,
          }))
        ),
      });
    },

    fail(reason) {
      logger.error(`Operation failed: ${state.operationName}`, { reason });
      setState({
        statusMessage: `Operation failed: ${reason}`,
        inProgress: false,
        canCancel: false,
      });
    },

    cancel() {
      if (!state.canCancel || !state.inProgress) return;
      logger.info(`Operation cancelled by user: ${state.operationName}`);
      controller.abort();
      setState({
        statusMessage: "Operation cancelled",
        inProgress: false,
        canCancel: false,
      });
    },

    reset() {
      renewSignal();
      state = idleState;
      changes.emit(state);
    },
  };
}
