/**
 * Abort signal composition.
 */

export interface LinkedSignal {
  readonly signal: AbortSignal;
  /** Abort the linked signal directly */
  abort(reason?: unknown): void;
  /** Detach from the source signals */
  dispose(): void;
}

/**
 * A signal that aborts when any source aborts, or when `abort()` is called.
 * Sources that are already aborted abort it immediately.
 *
 * @example
 * ```ts
 * const linked = linkSignals(context.signal, progress.signal);
 * try {
 *   await repository.getAll(linked.signal);
 * } finally {
 *   linked.dispose();
 * }
 * ```
 */
export function linkSignals(
  ...sources: ReadonlyArray<AbortSignal | undefined>
): LinkedSignal {
  const controller = new AbortController();
  const detachers: VoidFunction[] = [];

  const dispose = () => {
    for (const detach of detachers.splice(0)) detach();
  };

  for (const source of sources) {
    if (!source) continue;
    if (source.aborted) {
      controller.abort(source.reason);
      break;
    }
    const onAbort = () => {
      dispose();
      controller.abort(source.reason);
    };
    source.addEventListener("abort", onAbort, { once: true });
    detachers.push(() => source.removeEventListener("abort", onAbort));
  }

  if (controller.signal.aborted) dispose();

  return {
    signal: controller.signal,
    abort(reason) {
      dispose();
      controller.abort(reason);
    },
    dispose,
  };
}
