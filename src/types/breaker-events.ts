import type { CircuitState } from "./circuit-state.js";

/**
 * Events emitted by a circuit breaker, keyed by event name.
 * Listeners run synchronously, in registration order, inside the call or
 * timer callback that caused the event.
 */
export interface BreakerEventMap {
  "state:changed": { name: string; from: CircuitState; to: CircuitState };
  /**
   * closed → open, delivered twice per trip: first from the transition itself
   * without `error`, then with the failure that crossed the threshold.
   */
  "circuit:tripped": { name: string; error?: unknown };
  /** open or half_open → closed */
  "circuit:reset": { name: string };
  "call:succeeded": { name: string };
  /** Only failures that count toward the threshold; ignored errors emit nothing. */
  "call:failed": { name: string; error: unknown };
  "call:rejected": { name: string };
}

export type BreakerEventType = keyof BreakerEventMap;

export const BREAKER_EVENT_TYPES: readonly BreakerEventType[] = [
  "state:changed",
  "circuit:tripped",
  "circuit:reset",
  "call:succeeded",
  "call:failed",
  "call:rejected",
];
