import { describe, it, expect, vi, afterEach } from "vitest";
import { isDev } from "./dev";

describe("isDev", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it("should be true outside production", () => {
    vi.stubEnv("NODE_ENV", "test");
    expect(isDev()).toBe(true);
  });

  it("should be false in production", () => {
    vi.stubEnv("NODE_ENV", "production");
    expect(isDev()).toBe(false);
  });
});
