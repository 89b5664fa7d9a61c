import { emitter } from "../emitter";
import type { Listener, Unsubscribe } from "../types";

export interface ProgressSnapshot {
  /** 0..100, never lower than a value reported earlier in the same run */
  percentage: number;
  statusMessage: string;
}

export interface ProgressReporterOptions {
  /**
   * Quantize percentages to this many steps (e.g. 20 → multiples of 5).
   * Omit for no quantization.
   */
  steps?: number;
  /** Clock used for `elapsed()` (default: performance.now) */
  now?: () => number;
}

export interface ProgressReporter {
  readonly percentage: number;
  readonly statusMessage: string;

  /** Back to 0% and "Ready"; restarts the elapsed clock */
  reset(): void;

  /** Report a percentage (clamped to 0..100, never regresses) */
  report(percentage: number): void;
  /** Report a status message and a percentage */
  report(message: string, percentage: number): void;

  /** Milliseconds since the last `reset()` (or creation) */
  elapsed(): number;

  on(listener: Listener<ProgressSnapshot>): Unsubscribe;
}

const clamp = (value: number) =>
  Number.isNaN(value) ? 0 : Math.min(Math.max(value, 0), 100);

/**
 * Percentage progress for one operation at a time.
 *
 * Reported values are clamped to 0..100 and the visible value is the
 * running maximum, so late or out-of-order reports never move the bar
 * backwards. Every report emits one change.
 *
 * @example
 * ```ts
 * const progress = progressReporter();
 * progress.on(({ percentage }) => bar.set(percentage));
 *
 * progress.report("Querying", 40);
 * progress.report(25); // still 40
 * ```
 */
export function progressReporter(
  options: ProgressReporterOptions = {}
): ProgressReporter {
  const now = options.now ?? (() => performance.now());
  const steps = options.steps;
  const changes = emitter<ProgressSnapshot>();
  let percentage = 0;
  let statusMessage = "Ready";
  let startedAt = now();

  const quantize = (value: number) =>
    steps && steps > 0 ? (Math.floor((value / 100) * steps) / steps) * 100 : value;

  const notify = () => changes.emit({ percentage, statusMessage });

  function report(percentage: number): void;
  function report(message: string, percentage: number): void;
  function report(messageOrPercentage: string | number, value?: number): void {
    if (typeof messageOrPercentage === "string") {
      statusMessage = messageOrPercentage;
      percentage = Math.max(percentage, quantize(clamp(value ?? 0)));
    } else {
      percentage = Math.max(percentage, quantize(clamp(messageOrPercentage)));
    }
    notify();
  }

  return {
    get percentage() {
      return percentage;
    },
    get statusMessage() {
      return statusMessage;
    },

    reset() {
      percentage = 0;
      statusMessage = "Ready";
      startedAt = now();
      notify();
    },

    report,

    elapsed() {
      return now() - startedAt;
    },

    on(listener) {
      return changes.on(listener);
    },
  };
}
