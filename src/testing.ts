/**
 * Public test utilities, exported from the `"breakwater/testing"` entry point.
 * Consumers can import these helpers to assert on breaker behaviour in their own tests.
 */
export type { RecordedBreakerEvent } from "./testing/breaker-event-recorder.js";
export { BreakerEventRecorder } from "./testing/breaker-event-recorder.js";
export type { Deferred } from "./testing/deferred.js";
export { createDeferred, flushAsync } from "./testing/deferred.js";
export type { LogEntry, LogLevelName } from "./testing/memory-logger.js";
export { MemoryLogger } from "./testing/memory-logger.js";
export { NoopLogger, noopLogger } from "./utils/noop-logger.js";
