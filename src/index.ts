/**
 * breakwater public API barrel.
 *
 * Re-exports the breaker engine, its building blocks, settings, errors and
 * logging adapters that make up the public surface of the package.
 * @module
 */

// Adapters
export { attachBreakerLogger, logBreakerMetrics } from "./adapters/breaker-logger.js";
export type { StructuredLoggerOptions } from "./adapters/structured-logger.js";
export { LogLevel, StructuredLogger } from "./adapters/structured-logger.js";
// Config
export {
  breakerSettingsSchema,
  MAX_TIMER_DELAY_MS,
  thresholdPolicySchema,
} from "./config/settings-schema.js";
// Core
export type { BreakerEngineDeps } from "./core/breaker-engine.js";
export { BreakerEngine, createCircuitBreaker } from "./core/breaker-engine.js";
export { ConsecutiveCounter } from "./core/consecutive-counter.js";
export { ExecutionLock } from "./core/execution-lock.js";
export type { WindowCounts } from "./core/rolling-window-counter.js";
export { DEFAULT_BUCKET_COUNT, RollingWindowCounter } from "./core/rolling-window-counter.js";
export type { TransitionHook } from "./core/state-machine.js";
export { StateMachine } from "./core/state-machine.js";
export type {
  ConsecutiveFailuresPolicy,
  FailureRatePolicy,
  ThresholdPolicy,
} from "./core/threshold-policy.js";
export {
  consecutiveFailures,
  describePolicy,
  failureRate,
  isRatePolicy,
  shouldTrip,
} from "./core/threshold-policy.js";
export { TypedEventEmitter } from "./core/typed-emitter.js";
// Errors
export {
  BreakwaterError,
  CircuitError,
  CircuitOpenError,
  isCircuitOpen,
  SettingsError,
} from "./errors.js";
// Interfaces
export type {
  BreakerMetrics,
  CircuitBreaker,
  Operation,
  SignalOperation,
} from "./interfaces/circuit-breaker.js";
export type { LogContext, Logger } from "./interfaces/logger.js";
// Types
export type { BreakerEventMap, BreakerEventType } from "./types/breaker-events.js";
export { BREAKER_EVENT_TYPES } from "./types/breaker-events.js";
export type { CircuitState } from "./types/circuit-state.js";
export { CIRCUIT_STATES, formatState, isValidTransition } from "./types/circuit-state.js";
export type { BreakerSettings, ResolvedSettings } from "./types/settings.js";
export { DEFAULT_SETTINGS, resolveSettings } from "./types/settings.js";
// Utils
export { NoopLogger, noopLogger } from "./utils/noop-logger.js";
