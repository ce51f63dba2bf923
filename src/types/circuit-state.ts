/**
 * Circuit states and the transitions allowed between them.
 *
 *   closed ──trip──▶ open ──timeout──▶ half_open ──successes──▶ closed
 *                     ▲                    │
 *                     └──────failure───────┘
 *
 * @module
 */

export const CIRCUIT_STATES = ["closed", "open", "half_open"] as const;

export type CircuitState = (typeof CIRCUIT_STATES)[number];

const ALLOWED_TRANSITIONS: Record<CircuitState, ReadonlySet<CircuitState>> = {
  closed: new Set(["open"]),
  open: new Set(["half_open"]),
  half_open: new Set(["closed", "open"]),
};

export function isValidTransition(from: CircuitState, to: CircuitState): boolean {
  return ALLOWED_TRANSITIONS[from].has(to);
}

const STATE_LABELS: Record<CircuitState, string> = {
  closed: "Closed",
  open: "Open",
  half_open: "HalfOpen",
};

/** Human-readable label, e.g. for log lines and example output. */
export function formatState(state: CircuitState): string {
  return STATE_LABELS[state];
}
