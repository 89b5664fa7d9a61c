import { describe, it, expect, vi } from "vitest";
import {
  consoleLogger,
  isLogLevel,
  noopLogger,
  withFields,
  type LogSink,
} from "./logger";
import { memoryLogger } from "./testing";

const fakeSink = () => {
  const sink = {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  } satisfies LogSink;
  return sink;
};

describe("consoleLogger", () => {
  it("should prefix the message and pass fields through", () => {
    const sink = fakeSink();
    const logger = consoleLogger({ prefix: "enterprises", level: "debug", sink });

    logger.warn("Attempt 1 failed, retrying in 500ms", { attempt: 1 });

    expect(sink.warn).toHaveBeenCalledWith(
      "[enterprises] Attempt 1 failed, retrying in 500ms",
      { attempt: 1 }
    );
  });

  it("should omit the fields argument when none are given", () => {
    const sink = fakeSink();
    const logger = consoleLogger({ level: "info", sink });

    logger.info("Ready");

    expect(sink.info).toHaveBeenCalledWith("[loadflight] Ready");
    expect(sink.info.mock.calls[0]).toHaveLength(1);
  });

  it("should drop entries below the threshold", () => {
    const sink = fakeSink();
    const logger = consoleLogger({ level: "warn", sink });

    logger.debug("Progress updated");
    logger.info("Operation was cancelled");
    logger.error("Error executing async operation");

    expect(sink.debug).not.toHaveBeenCalled();
    expect(sink.info).not.toHaveBeenCalled();
    expect(sink.error).toHaveBeenCalledTimes(1);
  });

  it("should default to warn in production", () => {
    vi.stubEnv("NODE_ENV", "production");
    const sink = fakeSink();
    const logger = consoleLogger({ sink });

    logger.info("hidden");
    logger.warn("shown");

    expect(sink.info).not.toHaveBeenCalled();
    expect(sink.warn).toHaveBeenCalledWith("[loadflight] shown");
    vi.unstubAllEnvs();
  });
});

describe("withFields", () => {
  it("should merge fixed fields under the entry's own", () => {
    const logger = memoryLogger();
    const log = withFields(logger, { loadId: "a1", executor: "outer" });

    log.info("Repository query completed", { count: 4, executor: "inner" });

    expect(logger.entries).toEqual([
      {
        level: "info",
        message: "Repository query completed",
        fields: { loadId: "a1", count: 4, executor: "inner" },
      },
    ]);
  });
});

describe("isLogLevel", () => {
  it("should accept only known levels", () => {
    expect(isLogLevel("warn")).toBe(true);
    expect(isLogLevel("trace")).toBe(false);
    expect(isLogLevel("toString")).toBe(false);
  });
});

describe("noopLogger", () => {
  it("should accept every level", () => {
    expect(() => noopLogger.error("ignored", { reason: "test" })).not.toThrow();
  });
});
