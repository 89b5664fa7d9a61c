/**
 * Development-mode detection.
 *
 * Uses `process.env.NODE_ENV`, which bundlers replace at build time and
 * Node reads at run time. Outside production the default logger is verbose;
 * in production it only reports warnings and errors.
 */

/**
 * Check if running in development mode.
 *
 * @returns `true` unless `NODE_ENV` is "production"
 */
export function isDev(): boolean {
  return process.env.NODE_ENV !== "production";
}
