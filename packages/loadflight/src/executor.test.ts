import { describe, it, expect, vi } from "vitest";
import { operationExecutor, idleOperationState } from "./executor";
import { progressReporter } from "./progress/reporter";
import { executeWithRetry } from "./retry";
import { serialDispatcher } from "./dispatcher";
import { CancellationError, DisposedError } from "./errors";
import { deferred, memoryLogger } from "./testing";
import type { OperationState } from "./types";

function setup(options: Parameters<typeof operationExecutor>[0] = {}) {
  const logger = memoryLogger();
  const executor = operationExecutor({ name: "test", logger, ...options });
  const states: OperationState[] = [];
  executor.subscribe((state) => states.push(state));
  return { executor, logger, states };
}

describe("operationExecutor", () => {
  describe("success", () => {
    it("should expose loading state while running and return the result", async () => {
      const { executor, states } = setup();
      const gate = deferred<string[]>();

      const running = executor.execute(() => gate.promise, {
        statusMessage: "Loading enterprises...",
      });

      expect(executor.getState()).toEqual({
        isLoading: true,
        statusMessage: "Loading enterprises...",
        progressPercentage: undefined,
      });

      gate.resolve(["Water", "Sewer"]);
      expect(await running).toEqual(["Water", "Sewer"]);
      expect(executor.getState()).toEqual(idleOperationState);
      expect(states.map((s) => s.isLoading)).toEqual([true, false]);
    });

    it("should not set an empty status message", async () => {
      const { executor } = setup();
      let seen: OperationState | undefined;

      await executor.execute(() => {
        seen = executor.getState();
      }, { statusMessage: "" });

      expect(seen).toEqual({
        isLoading: true,
        statusMessage: "",
        progressPercentage: undefined,
      });
    });

    it("should reset progress, mirror it, and drive it to 100 on success", async () => {
      const { executor, states } = setup();
      const progress = progressReporter();
      progress.report(70);

      await executor.execute(
        () => {
          progress.report("Querying", 40);
          progress.report(20);
        },
        { progress }
      );

      expect(states.map((s) => s.progressPercentage)).toEqual([
        undefined,
        0,
        40,
        100,
        undefined,
      ]);
      expect(progress.percentage).toBe(100);
    });

    it("should pass the epoch's signal to the operation", async () => {
      const { executor } = setup();

      const context = await executor.execute((ctx) => ctx);

      expect(context.epoch).toBe(0);
      expect(context.signal).toBe(executor.signal);
      expect(context.signal.aborted).toBe(false);
    });
  });

  describe("failure", () => {
    it("should log, report, rethrow and reset state", async () => {
      const report = vi.fn();
      const { executor, logger } = setup({ errorReporter: { report } });
      const failure = new Error("connection refused");

      await expect(
        executor.execute(
          async () => {
            throw failure;
          },
          { statusMessage: "Saving enterprise changes..." }
        )
      ).rejects.toBe(failure);

      expect(executor.getState()).toEqual(idleOperationState);
      expect(logger.at("error")).toEqual([
        {
          level: "error",
          message: "Error executing async operation",
          fields: {
            executor: "test",
            operation: "Saving enterprise changes...",
            error: failure,
          },
        },
      ]);
      expect(report).toHaveBeenCalledWith(failure, {
        operation: "Saving enterprise changes...",
      });
    });

    it("should report on the dispatcher", async () => {
      const ui = serialDispatcher({ logger: memoryLogger() });
      let onUi = false;
      const { executor } = setup({
        dispatcher: ui,
        errorReporter: {
          report: () => {
            onUi = ui.checkAccess();
          },
        },
      });

      await expect(
        executor.execute(() => {
          throw new Error("boom");
        })
      ).rejects.toThrow("boom");

      expect(onUi).toBe(true);
    });

    it("should log a failing error reporter and still rethrow the original", async () => {
      const reporterFailure = new Error("toast unavailable");
      const { executor, logger } = setup({
        errorReporter: {
          report: () => {
            throw reporterFailure;
          },
        },
      });

      await expect(
        executor.execute(() => {
          throw new Error("original");
        })
      ).rejects.toThrow("original");

      expect(logger.at("error").map((e) => e.message)).toEqual([
        "Error executing async operation",
        "Failed to report operation error",
      ]);
    });

    it("should reject a non-function operation", async () => {
      const { executor, states } = setup();
      const notAFunction: unknown = "load";

      await expect(
        // Callers without types can still pass anything
        Reflect.apply(executor.execute, executor, [notAFunction])
      ).rejects.toThrow("operation must be a function");
      expect(states).toEqual([]);
    });
  });

  describe("cancellation", () => {
    it("should log at info, rethrow CancellationError and not report", async () => {
      const report = vi.fn();
      const { executor, logger } = setup({ errorReporter: { report } });
      const gate = deferred();

      const running = executor.execute(async (ctx) => {
        await gate.promise;
        ctx.throwIfCancelled();
      });
      executor.cancelOperations();
      gate.resolve();

      await expect(running).rejects.toBeInstanceOf(CancellationError);
      expect(executor.getState()).toEqual(idleOperationState);
      expect(logger.at("info").map((e) => e.message)).toEqual([
        "Operation was cancelled",
      ]);
      expect(logger.at("error")).toEqual([]);
      expect(report).not.toHaveBeenCalled();
    });

    it("should treat any failure after cancellation as cancellation", async () => {
      const { executor } = setup();
      const gate = deferred();

      const running = executor.execute(async () => {
        await gate.promise;
        throw new Error("socket closed");
      });
      executor.cancelOperations();
      gate.resolve();

      await expect(running).rejects.toBeInstanceOf(CancellationError);
    });

    it("should cancel a retry backoff and never retry", async () => {
      const { executor } = setup();
      let attempts = 0;

      const running = executor.execute(({ signal }) =>
        executeWithRetry(
          async () => {
            attempts++;
            throw new Error("transient");
          },
          { signal, baseDelay: 10_000, logger: memoryLogger() }
        )
      );
      setTimeout(() => executor.cancelOperations(), 20);

      await expect(running).rejects.toBeInstanceOf(CancellationError);
      expect(attempts).toBe(1);
      expect(executor.getState().isLoading).toBe(false);
    });
  });

  describe("epochs", () => {
    it("should invalidate work from an old epoch on resetCancellation()", async () => {
      const { executor } = setup();
      const gate = deferred();

      const stale = executor.execute(async (ctx) => {
        await gate.promise;
        ctx.throwIfCancelled();
        return "stale";
      });
      const oldSignal = executor.signal;

      executor.resetCancellation();
      gate.resolve();

      await expect(stale).rejects.toBeInstanceOf(CancellationError);
      expect(oldSignal.aborted).toBe(true);
      expect(executor.epoch).toBe(1);
      expect(executor.signal.aborted).toBe(false);
      await expect(executor.execute((ctx) => ctx.epoch)).resolves.toBe(1);
    });

    it("should discard a result that arrives after resetCancellation()", async () => {
      const { executor, logger } = setup();
      const gate = deferred();

      const stale = executor.execute(async () => {
        await gate.promise;
        return "stale";
      });
      executor.resetCancellation();
      gate.resolve();

      await expect(stale).rejects.toBeInstanceOf(CancellationError);
      expect(logger.at("info").map((e) => e.message)).toEqual([
        "Operation was cancelled",
      ]);
      expect(logger.at("error")).toEqual([]);
      expect(executor.getState()).toEqual(idleOperationState);
    });

    it("should keep failing after cancelOperations() until reset", async () => {
      const { executor } = setup();
      executor.cancelOperations();

      await expect(
        executor.execute((ctx) => ctx.throwIfCancelled())
      ).rejects.toBeInstanceOf(CancellationError);

      executor.resetCancellation();
      await expect(executor.execute(() => "ok")).resolves.toBe("ok");
    });
  });

  describe("overlapping calls", () => {
    it("should produce one loading interval", async () => {
      const { executor, states } = setup();
      const first = deferred();
      const second = deferred();

      const a = executor.execute(() => first.promise, { statusMessage: "A" });
      const b = executor.execute(() => second.promise, { statusMessage: "B" });

      first.resolve();
      await a;
      expect(executor.getState().isLoading).toBe(true);

      second.resolve();
      await b;

      expect(states.map((s) => s.isLoading)).toEqual([true, true, false]);
      expect(states.map((s) => s.statusMessage)).toEqual(["A", "B", ""]);
      expect(executor.getState()).toEqual(idleOperationState);
    });
  });

  describe("shared progress", () => {
    it("should never lower progress when overlapping calls share a reporter", async () => {
      const { executor, states } = setup();
      const progress = progressReporter();
      const first = deferred();
      const second = deferred();

      const a = executor.execute(
        async () => {
          progress.report(60);
          await first.promise;
        },
        { progress }
      );
      const b = executor.execute(() => second.promise, { progress });

      first.resolve();
      await a;
      second.resolve();
      await b;

      expect(states.map((s) => s.progressPercentage)).toEqual([
        undefined,
        0,
        60,
        100,
        undefined,
      ]);
      expect(progress.percentage).toBe(100);
    });

    it("should keep the highest value across different reporters", async () => {
      const { executor, states } = setup();
      const loading = progressReporter();
      const saving = progressReporter();
      const gate = deferred();

      const a = executor.execute(
        async () => {
          loading.report(50);
          await gate.promise;
        },
        { progress: loading }
      );
      const b = executor.execute(() => saving.report(30), { progress: saving });

      await b;
      gate.resolve();
      await a;

      expect(states.map((s) => s.progressPercentage)).toEqual([
        undefined,
        0,
        50,
        100,
        undefined,
      ]);
    });
  });

  describe("dispose", () => {
    it("should cancel running work, still emit idle, and fail fast afterwards", async () => {
      const { executor, states } = setup();
      const gate = deferred();

      const running = executor.execute(async (ctx) => {
        await gate.promise;
        ctx.throwIfCancelled();
      });
      executor.dispose();
      gate.resolve();

      await expect(running).rejects.toBeInstanceOf(CancellationError);
      const operation = vi.fn();
      await expect(executor.execute(operation)).rejects.toBeInstanceOf(
        DisposedError
      );
      expect(operation).not.toHaveBeenCalled();
      expect(executor.disposed).toBe(true);
      expect(states).toEqual([
        { isLoading: true, statusMessage: "", progressPercentage: undefined },
        idleOperationState,
      ]);
      expect(executor.getState()).toEqual(idleOperationState);
    });
  });
});
