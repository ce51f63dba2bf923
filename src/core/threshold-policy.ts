/**
 * Trip rules. A closed set of two variants, discriminated by `kind`:
 *
 * - `consecutive_failures`: trip once the failure streak reaches `threshold`.
 * - `failure_rate`: trip once at least `minSamples` requests were seen and
 *   the failure ratio reaches `rate`.
 *
 * @module
 */

export interface ConsecutiveFailuresPolicy {
  readonly kind: "consecutive_failures";
  readonly threshold: number;
}

export interface FailureRatePolicy {
  readonly kind: "failure_rate";
  readonly rate: number;
  readonly minSamples: number;
}

export type ThresholdPolicy = ConsecutiveFailuresPolicy | FailureRatePolicy;

export function consecutiveFailures(threshold: number): ConsecutiveFailuresPolicy {
  return { kind: "consecutive_failures", threshold };
}

export function failureRate(rate: number, minSamples: number): FailureRatePolicy {
  return { kind: "failure_rate", rate, minSamples };
}

/**
 * Decide whether the circuit should trip. For the consecutive policy
 * `failures` is the current streak; for the rate policy it is the failure
 * count inside the window and `total` the request count.
 */
export function shouldTrip(
  policy: ThresholdPolicy,
  failures: number,
  _successes: number,
  total: number,
  _windowMs: number,
): boolean {
  switch (policy.kind) {
    case "consecutive_failures":
      return failures >= policy.threshold;
    case "failure_rate":
      if (total < policy.minSamples) return false;
      return failures / total >= policy.rate;
  }
}

export function isRatePolicy(policy: ThresholdPolicy): policy is FailureRatePolicy {
  return policy.kind === "failure_rate";
}

export function describePolicy(policy: ThresholdPolicy): string {
  switch (policy.kind) {
    case "consecutive_failures":
      return "ConsecutiveFailures";
    case "failure_rate":
      return "FailureRate";
  }
}
