import type { BreakerMetrics, CircuitBreaker } from "../interfaces/circuit-breaker.js";
import type { Logger } from "../interfaces/logger.js";
import type { BreakerEventMap } from "../types/breaker-events.js";

/**
 * Log every event of `breaker` through `logger`.
 *
 * State changes and resets are logged at info, trips at warn, per-call
 * outcomes at debug. Returns a function that unsubscribes again.
 */
export function attachBreakerLogger(breaker: CircuitBreaker, logger: Logger): () => void {
  const onStateChanged = ({ name, from, to }: BreakerEventMap["state:changed"]) => {
    logger.info("circuit breaker state changed", { circuit: name, from, to });
  };
  const onTripped = ({ name, error }: BreakerEventMap["circuit:tripped"]) => {
    logger.warn(
      "circuit breaker tripped",
      error === undefined ? { circuit: name } : { circuit: name, error },
    );
  };
  const onReset = ({ name }: BreakerEventMap["circuit:reset"]) => {
    logger.info("circuit breaker reset", { circuit: name });
  };
  const onSucceeded = ({ name }: BreakerEventMap["call:succeeded"]) => {
    logger.debug?.("circuit breaker request succeeded", { circuit: name });
  };
  const onFailed = ({ name, error }: BreakerEventMap["call:failed"]) => {
    logger.debug?.("circuit breaker request failed", { circuit: name, error });
  };
  const onRejected = ({ name }: BreakerEventMap["call:rejected"]) => {
    logger.debug?.("circuit breaker request rejected", { circuit: name });
  };

  breaker
    .on("state:changed", onStateChanged)
    .on("circuit:tripped", onTripped)
    .on("circuit:reset", onReset)
    .on("call:succeeded", onSucceeded)
    .on("call:failed", onFailed)
    .on("call:rejected", onRejected);

  return () => {
    breaker
      .off("state:changed", onStateChanged)
      .off("circuit:tripped", onTripped)
      .off("circuit:reset", onReset)
      .off("call:succeeded", onSucceeded)
      .off("call:failed", onFailed)
      .off("call:rejected", onRejected);
  };
}

export function logBreakerMetrics(logger: Logger, metrics: BreakerMetrics): void {
  logger.debug?.("circuit breaker metrics", {
    circuit: metrics.name,
    state: metrics.state,
    totalRequests: metrics.totalRequests,
    totalFailures: metrics.totalFailures,
    consecutiveFailures: metrics.consecutiveFailures,
    consecutiveSuccesses: metrics.consecutiveSuccesses,
    timeInStateMs: metrics.timeInStateMs,
  });
}
