/**
 * loadflight - async operation orchestration for UI-bound view-models
 *
 * @packageDocumentation
 */

// Core types
export * from "./types";

// Notifications
export { emitter, type Emitter } from "./emitter";

// Dispatcher bridge
export {
  immediateDispatcher,
  serialDispatcher,
  type Dispatcher,
  type SerialDispatcher,
  type SerialDispatcherOptions,
} from "./dispatcher";

// Retry and timeouts
export {
  executeWithRetry,
  retryPolicy,
  sleep,
  withJitter,
  type RetryOptions,
  type RetryAttemptInfo,
  type RetryOperation,
  type RetryPolicy,
  type SleepFn,
} from "./retry";
export { raceTimeout, type TimeoutRaceResult } from "./timeout";
export { linkSignals, type LinkedSignal } from "./signal";

// Progress
export * from "./progress";

// Single-flight
export {
  singleFlight,
  type SingleFlightGuard,
  type SingleFlightOptions,
  type SingleFlightResult,
} from "./guard";

// Dispatched list
export {
  dispatchedList,
  type DispatchedList,
  type DispatchedListOptions,
  type ListChange,
  type ListChangeEvent,
} from "./list";

// Executor
export {
  operationExecutor,
  idleOperationState,
  type ErrorReporter,
  type ExecuteOptions,
  type ExecutorOptions,
  type Operation,
  type OperationContext,
  type OperationExecutor,
} from "./executor";

// Logging
export {
  consoleLogger,
  noopLogger,
  withFields,
  getDefaultLogger,
  isLogLevel,
  logLevels,
  type ConsoleLoggerOptions,
  type LogFields,
  type Logger,
  type LogLevel,
  type LogSink,
} from "./logger";

// Configuration
export { defaultConfig, resolveConfig, type LoadflightConfig } from "./config";

// Equality utilities
export { strictEqual, shallowEqual, deepEqual, resolveEquality } from "./equality";

// Error classes
export {
  LoadflightError,
  CancellationError,
  RetryExhaustedError,
  DisposedError,
  GuardReleaseError,
  ConfigError,
  isCancellation,
  throwIfCancelled,
  toCancellationError,
} from "./errors";

export { isDev } from "./dev";
