/**
 * Configuration defaults shared by the executor, retry policy and loaders.
 */

import { ConfigError } from "./errors";

export interface LoadflightConfig {
  /** Retries after the first attempt (attempts = maxRetries + 1) */
  readonly maxRetries: number;
  /** First backoff delay in ms; doubled after every retry */
  readonly baseDelay: number;
  /** Upper bound for a single backoff delay in ms (undefined = no bound) */
  readonly maxDelay: number | undefined;
  /** Apply ±30% randomization to each backoff delay */
  readonly jitter: boolean;
  /** Time budget for a guarded load before it is reported as timed out, in ms */
  readonly timeout: number;
  /** Interval between timer-triggered refreshes, in ms */
  readonly refreshInterval: number;
}

export const defaultConfig: LoadflightConfig = Object.freeze({
  maxRetries: 3,
  baseDelay: 500,
  maxDelay: undefined,
  jitter: false,
  timeout: 30_000,
  refreshInterval: 5 * 60_000,
});

function assertCount(key: string, value: number) {
  if (!Number.isInteger(value) || value < 0) {
    throw new ConfigError(key, `expected a non-negative integer, got ${value}`);
  }
}

function assertPositive(key: string, value: number) {
  if (!Number.isFinite(value) || value <= 0) {
    throw new ConfigError(key, `expected a positive number, got ${value}`);
  }
}

/**
 * Merge overrides onto the defaults and validate the result.
 *
 * @example
 * ```ts
 * const config = resolveConfig({ maxRetries: 2, timeout: 10_000 });
 * config.baseDelay; // 500
 * ```
 */
export function resolveConfig(
  overrides: Partial<LoadflightConfig> = {}
): LoadflightConfig {
  const config: LoadflightConfig = { ...defaultConfig, ...overrides };

  assertCount("maxRetries", config.maxRetries);
  if (!Number.isFinite(config.baseDelay) || config.baseDelay < 0) {
    throw new ConfigError(
      "baseDelay",
      `expected a non-negative number, got ${config.baseDelay}`
    );
  }
  if (config.maxDelay !== undefined) {
    assertPositive("maxDelay", config.maxDelay);
  }
  assertPositive("timeout", config.timeout);
  assertPositive("refreshInterval", config.refreshInterval);

  return Object.freeze(config);
}
