export class BreakwaterError extends Error {
  readonly code: string;

  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "BreakwaterError";
    this.code = code;
  }
}

// ── Breaker errors ──

/** Error raised by a named circuit breaker; the underlying failure is kept as `cause`. */
export class CircuitError extends BreakwaterError {
  readonly breakerName: string;

  constructor(breakerName: string, message: string, options?: ErrorOptions, code = "CIRCUIT") {
    super(message, code, options);
    this.name = "CircuitError";
    this.breakerName = breakerName;
  }
}

/** Rejection raised while a breaker is open. The wrapped operation never ran. */
export class CircuitOpenError extends CircuitError {
  constructor(breakerName: string, options?: ErrorOptions) {
    super(breakerName, `circuit breaker '${breakerName}' is open`, options, "CIRCUIT_OPEN");
    this.name = "CircuitOpenError";
  }
}

export class SettingsError extends BreakwaterError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "SETTINGS", options);
    this.name = "SettingsError";
  }
}

// ── Utilities ──

/** True when `value` is a CircuitOpenError or carries one anywhere in its cause chain. */
export function isCircuitOpen(value: unknown): boolean {
  const seen = new Set<unknown>();
  let current: unknown = value;
  while (current instanceof Error && !seen.has(current)) {
    if (current instanceof CircuitOpenError) return true;
    seen.add(current);
    current = current.cause;
  }
  return false;
}
