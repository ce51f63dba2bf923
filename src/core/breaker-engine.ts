/**
 * BreakerEngine: the decision core of a circuit breaker.
 *
 * Gates calls by state, classifies outcomes, feeds the counters, asks the
 * threshold policy whether to trip and drives the two timers:
 *
 *   - open timer: `timeoutMs` after entering open, move to half_open.
 *   - decay timer: `resetTimeoutMs` after entering closed, clear the counters
 *     if the circuit is still closed (disabled when 0).
 *
 * Counter updates, transitions and event delivery run synchronously, so an
 * outcome is fully applied before any other call or timer callback can
 * observe the breaker. Half-open calls additionally hold an execution lock
 * across the awaited operation, so probes run one at a time (queued, not
 * rejected).
 *
 * @module
 */

import { CircuitOpenError } from "../errors.js";
import type {
  BreakerMetrics,
  CircuitBreaker,
  Operation,
  SignalOperation,
} from "../interfaces/circuit-breaker.js";
import type { Logger } from "../interfaces/logger.js";
import type { BreakerEventMap } from "../types/breaker-events.js";
import { type CircuitState, isValidTransition } from "../types/circuit-state.js";
import { type BreakerSettings, type ResolvedSettings, resolveSettings } from "../types/settings.js";
import { noopLogger } from "../utils/noop-logger.js";
import { ConsecutiveCounter } from "./consecutive-counter.js";
import { ExecutionLock } from "./execution-lock.js";
import { RollingWindowCounter, type WindowCounts } from "./rolling-window-counter.js";
import { StateMachine } from "./state-machine.js";
import { isRatePolicy, shouldTrip } from "./threshold-policy.js";
import { TypedEventEmitter } from "./typed-emitter.js";

export interface BreakerEngineDeps {
  logger?: Logger;
}

export class BreakerEngine extends TypedEventEmitter<BreakerEventMap> implements CircuitBreaker {
  readonly settings: ResolvedSettings;

  private readonly machine: StateMachine;
  private readonly consecutive = new ConsecutiveCounter();
  private readonly window: RollingWindowCounter | null;
  private readonly probeLock = new ExecutionLock();
  private readonly logger: Logger;

  private openTimer: ReturnType<typeof setTimeout> | null = null;
  private resetTimer: ReturnType<typeof setTimeout> | null = null;
  private stopped = false;

  constructor(settings: BreakerSettings = {}, deps: BreakerEngineDeps = {}) {
    super();
    this.settings = resolveSettings(settings);
    this.logger = deps.logger ?? noopLogger;
    this.window = isRatePolicy(this.settings.failureThreshold)
      ? new RollingWindowCounter(this.settings.rollingWindowMs, this.settings.rollingWindowBuckets)
      : null;
    this.machine = new StateMachine((from, to) => this.handleTransition(from, to));

    if (this.settings.resetTimeoutMs > 0) {
      this.armResetTimer();
    }
  }

  get name(): string {
    return this.settings.name;
  }

  get state(): CircuitState {
    return this.machine.currentState();
  }

  // ── Call gating ─────────────────────────────────────────────────────────

  execute<T>(operation: Operation<T>): Promise<T> {
    return this.admit(undefined, operation);
  }

  executeWithSignal<T>(signal: AbortSignal, operation: SignalOperation<T>): Promise<T> {
    return this.admit(signal, () => operation(signal));
  }

  async executeWithFallback<T>(
    operation: Operation<T>,
    fallback: (error: unknown) => T | Promise<T>,
  ): Promise<T> {
    try {
      return await this.execute(operation);
    } catch (error) {
      return fallback(error);
    }
  }

  async executeWithFallbackSignal<T>(
    signal: AbortSignal,
    operation: SignalOperation<T>,
    fallback: (signal: AbortSignal, error: unknown) => T | Promise<T>,
  ): Promise<T> {
    try {
      return await this.executeWithSignal(signal, operation);
    } catch (error) {
      return fallback(signal, error);
    }
  }

  private async admit<T>(signal: AbortSignal | undefined, operation: Operation<T>): Promise<T> {
    signal?.throwIfAborted();

    switch (this.machine.currentState()) {
      case "open":
        this.emit("call:rejected", { name: this.name });
        throw new CircuitOpenError(this.name);
      case "half_open":
        return this.probeLock.runExclusive(() => this.invoke(operation));
      case "closed":
        return this.invoke(operation);
    }
  }

  private async invoke<T>(operation: Operation<T>): Promise<T> {
    let result: T;
    try {
      result = await operation();
    } catch (error) {
      if (this.isFailure(error)) {
        this.recordFailure(error);
      }
      throw error;
    }
    this.recordSuccess();
    return result;
  }

  // ── Outcome bookkeeping ─────────────────────────────────────────────────

  private isFailure(error: unknown): boolean {
    if (this.settings.isFailure) {
      return this.settings.isFailure(error);
    }
    return !this.settings.ignoredErrors.has(error);
  }

  private recordSuccess(): void {
    this.emit("call:succeeded", { name: this.name });

    this.consecutive.recordSuccess();
    this.window?.recordSuccess();

    if (
      this.machine.isHalfOpen() &&
      this.consecutive.consecutiveSuccesses >= this.settings.successThreshold
    ) {
      // Entering closed re-arms the decay timer (see handleTransition)
      this.machine.transitionTo("closed");
      this.resetCounters();
    }
  }

  private recordFailure(error: unknown): void {
    this.emit("call:failed", { name: this.name, error });

    this.consecutive.recordFailure();
    this.window?.recordFailure();

    if (this.machine.isHalfOpen()) {
      this.machine.transitionTo("open");
      return;
    }

    if (this.machine.isClosed() && this.thresholdReached()) {
      this.machine.transitionTo("open");
      // Second trip notification, carrying the failure
      this.emit("circuit:tripped", { name: this.name, error });
    }
  }

  private thresholdReached(): boolean {
    const policy = this.settings.failureThreshold;

    if (!isRatePolicy(policy)) {
      const { successes, failures } = this.consecutive.totals();
      return shouldTrip(
        policy,
        this.consecutive.consecutiveFailures,
        this.consecutive.consecutiveSuccesses,
        successes + failures,
        this.settings.rollingWindowMs,
      );
    }

    if (!this.window) return false;
    const { requests, failures } = this.window.counts();
    if (requests < this.settings.minimumRequestVolume) return false;
    return shouldTrip(policy, failures, requests - failures, requests, this.settings.rollingWindowMs);
  }

  private resetCounters(): void {
    this.consecutive.reset();
    this.window?.reset();
  }

  // ── Transitions & timers ────────────────────────────────────────────────

  private handleTransition(from: CircuitState, to: CircuitState): void {
    // Timers are armed before any listener runs
    if (to === "open") {
      this.armOpenTimer();
    } else if (to === "closed" && this.settings.resetTimeoutMs > 0) {
      this.armResetTimer();
    }

    this.emit("state:changed", { name: this.name, from, to });

    if (from === "closed" && to === "open") {
      this.emit("circuit:tripped", { name: this.name });
    } else if (to === "closed") {
      this.emit("circuit:reset", { name: this.name });
    }
  }

  private armOpenTimer(): void {
    this.clearOpenTimer();
    if (this.stopped) return;

    this.openTimer = setTimeout(() => {
      this.openTimer = null;
      if (!isValidTransition(this.machine.currentState(), "half_open")) return;
      this.logger.debug?.("Open timeout elapsed, admitting probes", {
        circuit: this.name,
        timeoutMs: this.settings.timeoutMs,
      });
      this.machine.transitionTo("half_open");
    }, this.settings.timeoutMs);
    this.openTimer.unref();
  }

  private armResetTimer(): void {
    this.clearResetTimer();
    if (this.stopped) return;

    this.resetTimer = setTimeout(() => {
      this.resetTimer = null;
      if (!this.machine.isClosed()) return;
      this.logger.debug?.("Reset timeout elapsed, clearing failure counters", {
        circuit: this.name,
        resetTimeoutMs: this.settings.resetTimeoutMs,
      });
      this.resetCounters();
    }, this.settings.resetTimeoutMs);
    this.resetTimer.unref();
  }

  private clearOpenTimer(): void {
    if (this.openTimer) {
      clearTimeout(this.openTimer);
      this.openTimer = null;
    }
  }

  private clearResetTimer(): void {
    if (this.resetTimer) {
      clearTimeout(this.resetTimer);
      this.resetTimer = null;
    }
  }

  // ── Introspection & lifecycle ───────────────────────────────────────────

  metrics(): BreakerMetrics {
    const totals = this.window ? this.window.counts() : this.lifetimeCounts();

    return {
      name: this.name,
      state: this.machine.currentState(),
      totalRequests: totals.requests,
      totalFailures: totals.failures,
      consecutiveFailures: this.consecutive.consecutiveFailures,
      consecutiveSuccesses: this.consecutive.consecutiveSuccesses,
      lastStateChange: this.machine.lastStateChange(),
      timeInStateMs: this.machine.timeInState(),
    };
  }

  private lifetimeCounts(): WindowCounts {
    const { successes, failures } = this.consecutive.totals();
    return { requests: successes + failures, failures };
  }

  shutdown(): void {
    if (this.stopped) return;
    this.stopped = true;
    this.clearOpenTimer();
    this.clearResetTimer();
    this.logger.debug?.("Circuit breaker shut down", { circuit: this.name, state: this.state });
  }
}

/** Create a breaker; settings are validated and defaults applied. */
export function createCircuitBreaker(
  settings: BreakerSettings = {},
  deps: BreakerEngineDeps = {},
): BreakerEngine {
  return new BreakerEngine(settings, deps);
}
