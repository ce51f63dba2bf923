import { describe, expect, it } from "vitest";
import { consecutiveFailures, failureRate } from "../core/threshold-policy.js";
import { SettingsError } from "../errors.js";
import { DEFAULT_SETTINGS, resolveSettings } from "../types/settings.js";
import { MAX_TIMER_DELAY_MS } from "./settings-schema.js";

describe("settings validation", () => {
  it("applies defaults when nothing is given", () => {
    const settings = resolveSettings();
    expect(settings.name).toBe("default");
    expect(settings.failureThreshold).toEqual(consecutiveFailures(5));
    expect(settings.successThreshold).toBe(1);
    expect(settings.timeoutMs).toBe(60_000);
    expect(settings.rollingWindowMs).toBe(10_000);
    expect(settings.rollingWindowBuckets).toBe(10);
    expect(settings.minimumRequestVolume).toBe(3);
    expect(settings.resetTimeoutMs).toBe(0);
    expect(settings.isFailure).toBeUndefined();
    expect(settings.ignoredErrors.size).toBe(0);
  });

  it("keeps provided values", () => {
    const isFailure = (err: unknown) => err instanceof TypeError;
    const settings = resolveSettings({
      name: "payments",
      failureThreshold: failureRate(0.25, 20),
      successThreshold: 3,
      timeoutMs: 5000,
      rollingWindowMs: 30_000,
      minimumRequestVolume: 10,
      resetTimeoutMs: 120_000,
      isFailure,
    });
    expect(settings.name).toBe("payments");
    expect(settings.failureThreshold).toEqual({ kind: "failure_rate", rate: 0.25, minSamples: 20 });
    expect(settings.successThreshold).toBe(3);
    expect(settings.timeoutMs).toBe(5000);
    expect(settings.rollingWindowMs).toBe(30_000);
    expect(settings.minimumRequestVolume).toBe(10);
    expect(settings.resetTimeoutMs).toBe(120_000);
    expect(settings.isFailure).toBe(isFailure);
  });

  it("returns a frozen snapshot", () => {
    const settings = resolveSettings({ failureThreshold: consecutiveFailures(2) });
    expect(Object.isFrozen(settings)).toBe(true);
    expect(Object.isFrozen(settings.failureThreshold)).toBe(true);
  });

  it("copies ignored errors into an identity set", () => {
    const sentinel = new Error("not found");
    const input = [sentinel];
    const settings = resolveSettings({ ignoredErrors: input });
    input.length = 0;
    expect(settings.ignoredErrors.has(sentinel)).toBe(true);
    expect(settings.ignoredErrors.has(new Error("not found"))).toBe(false);
  });

  it("does not share the default ignored-errors set", () => {
    expect(resolveSettings().ignoredErrors).not.toBe(DEFAULT_SETTINGS.ignoredErrors);
  });

  describe("normalization", () => {
    it("defaults a blank name", () => {
      expect(resolveSettings({ name: "" }).name).toBe("default");
      expect(resolveSettings({ name: "   " }).name).toBe("default");
    });

    it("raises a non-positive success threshold to one", () => {
      expect(resolveSettings({ successThreshold: 0 }).successThreshold).toBe(1);
      expect(resolveSettings({ successThreshold: -4 }).successThreshold).toBe(1);
    });

    it("defaults a non-positive bucket count", () => {
      expect(resolveSettings({ rollingWindowBuckets: 0 }).rollingWindowBuckets).toBe(10);
      expect(resolveSettings({ rollingWindowBuckets: 4 }).rollingWindowBuckets).toBe(4);
    });
  });

  describe("rejection", () => {
    it("rejects negative timeouts", () => {
      expect(() => resolveSettings({ timeoutMs: -1 })).toThrow(SettingsError);
      expect(() => resolveSettings({ resetTimeoutMs: -1 })).toThrow(
        "Invalid circuit breaker settings",
      );
    });

    it("rejects timer delays setTimeout cannot hold", () => {
      expect(() => resolveSettings({ timeoutMs: 3_000_000_000 })).toThrow(SettingsError);
      expect(() => resolveSettings({ resetTimeoutMs: MAX_TIMER_DELAY_MS + 1 })).toThrow(
        SettingsError,
      );
      expect(resolveSettings({ timeoutMs: MAX_TIMER_DELAY_MS }).timeoutMs).toBe(MAX_TIMER_DELAY_MS);
    });

    it("leaves the rolling window uncapped", () => {
      expect(resolveSettings({ rollingWindowMs: 3_000_000_000 }).rollingWindowMs).toBe(
        3_000_000_000,
      );
    });

    it("rejects non-finite durations", () => {
      expect(() => resolveSettings({ rollingWindowMs: Number.POSITIVE_INFINITY })).toThrow(
        SettingsError,
      );
      expect(() => resolveSettings({ timeoutMs: Number.NaN })).toThrow(SettingsError);
    });

    it("rejects a failure rate outside [0, 1]", () => {
      expect(() => resolveSettings({ failureThreshold: failureRate(1.5, 10) })).toThrow(
        SettingsError,
      );
    });

    it("rejects a fractional consecutive threshold", () => {
      expect(() => resolveSettings({ failureThreshold: consecutiveFailures(2.5) })).toThrow(
        SettingsError,
      );
    });
  });
});
