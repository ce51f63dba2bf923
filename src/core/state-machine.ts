import type { CircuitState } from "../types/circuit-state.js";

/** Called synchronously after every applied transition, before `transitionTo` returns. */
export type TransitionHook = (from: CircuitState, to: CircuitState) => void;

/**
 * Holds the current circuit state and when it last changed.
 *
 * Legality of a transition is the owner's concern; the machine only refuses
 * no-op transitions (same state), which leave the timestamp alone and do not
 * reach the hook.
 */
export class StateMachine {
  private state: CircuitState = "closed";
  private changedAt: number;

  constructor(private readonly onTransition?: TransitionHook) {
    this.changedAt = Date.now();
  }

  currentState(): CircuitState {
    return this.state;
  }

  /** Epoch milliseconds of the last applied transition (or of construction). */
  lastStateChange(): number {
    return this.changedAt;
  }

  timeInState(): number {
    return Date.now() - this.changedAt;
  }

  /** Returns false when `target` is already the current state. */
  transitionTo(target: CircuitState): boolean {
    if (target === this.state) return false;

    const from = this.state;
    this.state = target;
    this.changedAt = Date.now();
    this.onTransition?.(from, target);
    return true;
  }

  isClosed(): boolean {
    return this.state === "closed";
  }

  isOpen(): boolean {
    return this.state === "open";
  }

  isHalfOpen(): boolean {
    return this.state === "half_open";
  }
}
