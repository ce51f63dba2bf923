/**
 * Circuit breaker interface.
 * Fails fast while a dependency looks unhealthy and probes it for recovery.
 *
 * States: CLOSED (normal) → OPEN (failing) → HALF_OPEN (testing) → CLOSED
 * @module
 */

import type { BreakerEventMap } from "../types/breaker-events.js";
import type { CircuitState } from "../types/circuit-state.js";

/** Point-in-time view of a breaker, computed on demand. */
export interface BreakerMetrics {
  name: string;
  state: CircuitState;
  /** Requests inside the rolling window (rate policy) or since the last reset. */
  totalRequests: number;
  totalFailures: number;
  consecutiveFailures: number;
  consecutiveSuccesses: number;
  /** Epoch milliseconds of the last state change */
  lastStateChange: number;
  timeInStateMs: number;
}

export type Operation<T> = () => T | Promise<T>;
export type SignalOperation<T> = (signal: AbortSignal) => T | Promise<T>;

export interface CircuitBreaker {
  readonly name: string;
  readonly state: CircuitState;

  /**
   * Run `operation` unless the circuit is open.
   * Rejects with CircuitOpenError while open; otherwise settles exactly as
   * the operation does.
   */
  execute<T>(operation: Operation<T>): Promise<T>;

  /**
   * Like `execute`, but rejects with `signal.reason` without running anything
   * when the signal is already aborted. The operation receives the signal and
   * is expected to honour it.
   */
  executeWithSignal<T>(signal: AbortSignal, operation: SignalOperation<T>): Promise<T>;

  /** Hand any error, rejection included, to `fallback` and return its result. */
  executeWithFallback<T>(
    operation: Operation<T>,
    fallback: (error: unknown) => T | Promise<T>,
  ): Promise<T>;

  executeWithFallbackSignal<T>(
    signal: AbortSignal,
    operation: SignalOperation<T>,
    fallback: (signal: AbortSignal, error: unknown) => T | Promise<T>,
  ): Promise<T>;

  metrics(): BreakerMetrics;

  /** Cancel pending timers. Idempotent; `execute` keeps working afterwards. */
  shutdown(): void;

  on<K extends keyof BreakerEventMap>(
    event: K,
    listener: (payload: BreakerEventMap[K]) => void,
  ): this;
  off<K extends keyof BreakerEventMap>(
    event: K,
    listener: (payload: BreakerEventMap[K]) => void,
  ): this;
}
