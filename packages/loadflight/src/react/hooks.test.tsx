/**
 * @vitest-environment jsdom
 */

import { describe, it, expect } from "vitest";
import { act, renderHook } from "@testing-library/react";
import { useListItems, useOperationState, useStepProgress } from "./hooks";
import { operationExecutor } from "../executor";
import { dispatchedList } from "../list";
import { immediateDispatcher } from "../dispatcher";
import { stepProgress } from "../progress/steps";
import { deferred, memoryLogger } from "../testing";

describe("useOperationState", () => {
  it("should re-render through the loading interval", async () => {
    const executor = operationExecutor({ logger: memoryLogger() });
    const gate = deferred();
    const { result } = renderHook(() => useOperationState(executor));

    expect(result.current.isLoading).toBe(false);

    let running: Promise<void> = Promise.resolve();
    act(() => {
      running = executor.execute(() => gate.promise, {
        statusMessage: "Loading accounts...",
      });
    });
    expect(result.current).toEqual({
      isLoading: true,
      statusMessage: "Loading accounts...",
      progressPercentage: undefined,
    });

    await act(async () => {
      gate.resolve();
      await running;
    });
    expect(result.current.isLoading).toBe(false);
    expect(result.current.statusMessage).toBe("");
  });
});

describe("useStepProgress", () => {
  it("should follow step updates", () => {
    const progress = stepProgress({ logger: memoryLogger() });
    const { result } = renderHook(() => useStepProgress(progress));

    act(() => {
      progress.start("Loading Enterprises", [
        { title: "Connecting" },
        { title: "Querying" },
      ]);
      progress.update(1, "Querying...");
    });

    expect(result.current.statusMessage).toBe("Querying...");
    expect(result.current.steps.map((step) => step.isInProgress)).toEqual([
      false,
      true,
    ]);
  });
});

describe("useListItems", () => {
  it("should return the current snapshot and keep it stable between changes", async () => {
    const list = dispatchedList<string>(immediateDispatcher(), {
      initial: ["Water"],
    });
    const { result, rerender } = renderHook(() => useListItems(list));
    const first = result.current;

    rerender();
    expect(result.current).toBe(first);

    await act(async () => {
      await list.add("Sewer");
    });
    expect(result.current).toEqual(["Water", "Sewer"]);
  });
});
