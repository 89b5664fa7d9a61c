export {
  progressReporter,
  type ProgressReporter,
  type ProgressReporterOptions,
  type ProgressSnapshot,
} from "./reporter";

export {
  stepProgress,
  type StepProgress,
  type StepProgressOptions,
  type StepProgressState,
} from "./steps";
