import { describe, it, expect, vi } from "vitest";
import { raceTimeout } from "./timeout";
import { CancellationError } from "./errors";
import { deferred } from "./testing";

describe("raceTimeout", () => {
  it("should resolve with the value when the work wins", async () => {
    await expect(raceTimeout(Promise.resolve(["a"]), 1000)).resolves.toEqual({
      status: "completed",
      value: ["a"],
    });
  });

  it("should report timedOut when the delay wins", async () => {
    vi.useFakeTimers();
    const work = deferred<string>();

    const race = raceTimeout(work.promise, 30_000);
    await vi.advanceTimersByTimeAsync(30_000);

    await expect(race).resolves.toEqual({ status: "timedOut", after: 30_000 });
  });

  it("should ignore a late result or failure after timing out", async () => {
    vi.useFakeTimers();
    const work = deferred<string>();

    const race = raceTimeout(work.promise, 100);
    await vi.advanceTimersByTimeAsync(100);
    work.reject(new Error("late"));

    await expect(race).resolves.toEqual({ status: "timedOut", after: 100 });
  });

  it("should reject with the work's error", async () => {
    await expect(
      raceTimeout(Promise.reject(new Error("connection refused")), 1000)
    ).rejects.toThrow("connection refused");
  });

  it("should reject with CancellationError when the signal aborts", async () => {
    const controller = new AbortController();
    const work = deferred<number>();

    const race = raceTimeout(work.promise, 10_000, controller.signal);
    controller.abort();

    await expect(race).rejects.toBeInstanceOf(CancellationError);
  });

  it("should clear the timer once settled", async () => {
    vi.useFakeTimers();

    await raceTimeout(Promise.resolve(1), 5000);

    expect(vi.getTimerCount()).toBe(0);
  });
});
