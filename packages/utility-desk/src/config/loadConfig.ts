/**
 * Environment configuration for the utility desk.
 */

import {
  ConfigError,
  consoleLogger,
  isLogLevel,
  resolveConfig,
  type LoadflightConfig,
  type Logger,
  type LogLevel,
  type LogSink,
} from "loadflight";

export interface UtilityDeskConfig extends LoadflightConfig {
  readonly logLevel: LogLevel | undefined;
}

type Env = Readonly<Record<string, string | undefined>>;

export const envKeys = {
  maxRetries: "UTILITY_DESK_MAX_RETRIES",
  baseDelay: "UTILITY_DESK_RETRY_BASE_DELAY_MS",
  maxDelay: "UTILITY_DESK_RETRY_MAX_DELAY_MS",
  jitter: "UTILITY_DESK_RETRY_JITTER",
  timeout: "UTILITY_DESK_LOAD_TIMEOUT_MS",
  refreshInterval: "UTILITY_DESK_REFRESH_INTERVAL_MS",
  logLevel: "UTILITY_DESK_LOG_LEVEL",
} as const;

function readNumber(env: Env, key: string): number | undefined {
  const raw = env[key]?.trim();
  if (!raw) return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ConfigError(key, `expected a number, got "${raw}"`);
  }
  return value;
}

function readBoolean(env: Env, key: string): boolean | undefined {
  const raw = env[key]?.trim().toLowerCase();
  if (!raw) return undefined;
  if (raw === "true" || raw === "1") return true;
  if (raw === "false" || raw === "0") return false;
  throw new ConfigError(key, `expected true or false, got "${raw}"`);
}

/**
 * Read `UTILITY_DESK_*` variables over the library defaults.
 *
 * Unset or empty variables keep the default. A malformed value throws
 * `ConfigError` naming the variable.
 *
 * @example
 * ```ts
 * const config = loadConfig({ UTILITY_DESK_MAX_RETRIES: "2" });
 * config.maxRetries; // 2
 * config.timeout; // 30000
 * ```
 */
export function loadConfig(env: Env = process.env): UtilityDeskConfig {
  const overrides: { -readonly [K in keyof LoadflightConfig]?: LoadflightConfig[K] } = {};

  const numeric = [
    "maxRetries",
    "baseDelay",
    "maxDelay",
    "timeout",
    "refreshInterval",
  ] as const;
  for (const field of numeric) {
    const value = readNumber(env, envKeys[field]);
    if (value !== undefined) overrides[field] = value;
  }

  const jitter = readBoolean(env, envKeys.jitter);
  if (jitter !== undefined) overrides.jitter = jitter;

  let resolved: LoadflightConfig;
  try {
    resolved = resolveConfig(overrides);
  } catch (error) {
    // Report the variable rather than the config field
    if (error instanceof ConfigError) {
      const field = numeric.find((name) => name === error.key);
      if (field) {
        throw new ConfigError(envKeys[field], error.reason);
      }
    }
    throw error;
  }

  const rawLevel = env[envKeys.logLevel]?.trim().toLowerCase();
  if (rawLevel && !isLogLevel(rawLevel)) {
    throw new ConfigError(
      envKeys.logLevel,
      `expected one of debug, info, warn, error, got "${rawLevel}"`
    );
  }

  return Object.freeze({
    ...resolved,
    logLevel: rawLevel && isLogLevel(rawLevel) ? rawLevel : undefined,
  });
}

/** Console logger at the configured level, prefixed `[utility-desk]`. */
export function createDeskLogger(
  config: Pick<UtilityDeskConfig, "logLevel">,
  sink?: LogSink
): Logger {
  return consoleLogger({ prefix: "utility-desk", level: config.logLevel, sink });
}
