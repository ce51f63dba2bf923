import { z } from "zod";

/** Longest delay setTimeout honours; anything above fires after 1 ms. */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

const durationMs = z.number().finite().min(0);
const timerDelayMs = durationMs.max(MAX_TIMER_DELAY_MS);
const count = z.number().int().min(0);

export const thresholdPolicySchema = z.discriminatedUnion("kind", [
  z.object({
    kind: z.literal("consecutive_failures"),
    threshold: count,
  }),
  z.object({
    kind: z.literal("failure_rate"),
    rate: z.number().min(0).max(1),
    minSamples: count,
  }),
]);

export const breakerSettingsSchema = z.object({
  name: z.string().optional(),
  failureThreshold: thresholdPolicySchema.optional(),

  // Non-positive values are normalized to their minimum, not rejected
  successThreshold: z.number().int().optional(),
  rollingWindowBuckets: z.number().int().optional(),

  // Timing
  timeoutMs: timerDelayMs.optional(),
  rollingWindowMs: durationMs.optional(),
  resetTimeoutMs: timerDelayMs.optional(),

  minimumRequestVolume: count.optional(),

  // Failure classification
  isFailure: z
    .unknown()
    .refine((v) => v === undefined || typeof v === "function", "must be a function")
    .optional(),
  ignoredErrors: z.array(z.unknown()).optional(),
});
