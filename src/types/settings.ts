import { breakerSettingsSchema } from "../config/settings-schema.js";
import { DEFAULT_BUCKET_COUNT } from "../core/rolling-window-counter.js";
import { consecutiveFailures, type ThresholdPolicy } from "../core/threshold-policy.js";
import { SettingsError } from "../errors.js";

/** Circuit breaker settings; every field is optional and falls back to DEFAULT_SETTINGS. */
export interface BreakerSettings {
  /** Identifies the breaker in events and errors. Blank → "default". */
  name?: string;

  /** When to trip from closed to open */
  failureThreshold?: ThresholdPolicy; // default: consecutiveFailures(5)
  /** Consecutive half-open successes needed to close again */
  successThreshold?: number; // default: 1

  // Timing
  timeoutMs?: number; // default: 60000 (open → half_open)
  rollingWindowMs?: number; // default: 10000
  rollingWindowBuckets?: number; // default: 10
  resetTimeoutMs?: number; // default: 0 (disabled)

  /** Requests needed inside the window before a rate policy is consulted */
  minimumRequestVolume?: number; // default: 3

  // Failure classification
  /** Takes precedence over `ignoredErrors` when set. */
  isFailure?: (error: unknown) => boolean;
  /** Compared by identity; matches are returned to the caller but not counted. */
  ignoredErrors?: readonly unknown[];
}

/** Fully resolved settings with defaults applied and values normalized. */
export type ResolvedSettings = Readonly<
  Required<Omit<BreakerSettings, "isFailure" | "ignoredErrors">> &
    Pick<BreakerSettings, "isFailure"> & {
      ignoredErrors: ReadonlySet<unknown>;
    }
>;

export const DEFAULT_SETTINGS: ResolvedSettings = {
  name: "default",
  failureThreshold: consecutiveFailures(5),
  successThreshold: 1,
  timeoutMs: 60_000,
  rollingWindowMs: 10_000,
  rollingWindowBuckets: DEFAULT_BUCKET_COUNT,
  resetTimeoutMs: 0,
  minimumRequestVolume: 3,
  isFailure: undefined,
  ignoredErrors: new Set(),
};

export function resolveSettings(settings: BreakerSettings = {}): ResolvedSettings {
  // Validate user-provided settings before merging
  const validation = breakerSettingsSchema.safeParse(settings);
  if (!validation.success) {
    throw new SettingsError(`Invalid circuit breaker settings: ${validation.error.message}`);
  }

  const name = settings.name?.trim() ? settings.name : DEFAULT_SETTINGS.name;
  const successThreshold = settings.successThreshold ?? DEFAULT_SETTINGS.successThreshold;
  const buckets = settings.rollingWindowBuckets ?? DEFAULT_SETTINGS.rollingWindowBuckets;

  return Object.freeze({
    name,
    failureThreshold: Object.freeze({
      ...(settings.failureThreshold ?? DEFAULT_SETTINGS.failureThreshold),
    }),
    successThreshold: Math.max(successThreshold, 1),
    timeoutMs: settings.timeoutMs ?? DEFAULT_SETTINGS.timeoutMs,
    rollingWindowMs: settings.rollingWindowMs ?? DEFAULT_SETTINGS.rollingWindowMs,
    rollingWindowBuckets: buckets > 0 ? buckets : DEFAULT_BUCKET_COUNT,
    resetTimeoutMs: settings.resetTimeoutMs ?? DEFAULT_SETTINGS.resetTimeoutMs,
    minimumRequestVolume: settings.minimumRequestVolume ?? DEFAULT_SETTINGS.minimumRequestVolume,
    isFailure: settings.isFailure,
    ignoredErrors: new Set(settings.ignoredErrors ?? []),
  });
}
