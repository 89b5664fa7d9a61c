/**
 * Race work against a fixed delay.
 *
 * Operations are not time-bounded by default. A caller that needs a bound
 * races the work explicitly and treats "delay won" as its own outcome,
 * distinct from success and from failure.
 */

import { toCancellationError } from "./errors";

export type TimeoutRaceResult<T> =
  | { status: "completed"; value: T }
  | { status: "timedOut"; after: number };

/**
 * Resolve with the work's value, or with `{ status: "timedOut" }` once `ms`
 * elapses first. A failure of the work rejects; an aborted signal rejects
 * with `CancellationError`. The timer is always cleared.
 *
 * The work is not stopped when the delay wins; pass the same signal to the
 * work if it should be abandoned.
 *
 * @example
 * ```ts
 * const outcome = await raceTimeout(repository.getAll(), 30_000, signal);
 * if (outcome.status === "timedOut") {
 *   progress.fail("Database query timed out");
 *   return;
 * }
 * list.replaceAll(outcome.value);
 * ```
 */
export function raceTimeout<T>(
  work: PromiseLike<T>,
  ms: number,
  signal?: AbortSignal
): Promise<TimeoutRaceResult<T>> {
  return new Promise<TimeoutRaceResult<T>>((resolve, reject) => {
    if (signal?.aborted) {
      reject(toCancellationError(signal.reason));
      return;
    }

    let settled = false;
    const finish = () => {
      settled = true;
      clearTimeout(timer);
      signal?.removeEventListener("abort", onAbort);
    };
    const onAbort = () => {
      if (settled) return;
      finish();
      reject(toCancellationError(signal?.reason));
    };
    const timer = setTimeout(() => {
      if (settled) return;
      finish();
      resolve({ status: "timedOut", after: ms });
    }, ms);

    signal?.addEventListener("abort", onAbort, { once: true });

    work.then(
      (value) => {
        if (settled) return;
        finish();
        resolve({ status: "completed", value });
      },
      (error: unknown) => {
        if (settled) return;
        finish();
        reject(error);
      }
    );
  });
}
