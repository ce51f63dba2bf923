import { describe, expect, it } from "vitest";
import { ConsecutiveCounter } from "./consecutive-counter.js";

describe("ConsecutiveCounter", () => {
  it("starts at zero", () => {
    const counter = new ConsecutiveCounter();
    expect(counter.consecutiveSuccesses).toBe(0);
    expect(counter.consecutiveFailures).toBe(0);
    expect(counter.totals()).toEqual({ successes: 0, failures: 0 });
  });

  it("counts a run of successes", () => {
    const counter = new ConsecutiveCounter();
    counter.recordSuccess();
    counter.recordSuccess();
    counter.recordSuccess();
    expect(counter.consecutiveSuccesses).toBe(3);
    expect(counter.consecutiveFailures).toBe(0);
    expect(counter.totals()).toEqual({ successes: 3, failures: 0 });
  });

  it("a failure breaks the success streak but keeps totals", () => {
    const counter = new ConsecutiveCounter();
    counter.recordSuccess();
    counter.recordSuccess();
    counter.recordFailure();
    expect(counter.consecutiveSuccesses).toBe(0);
    expect(counter.consecutiveFailures).toBe(1);
    expect(counter.totals()).toEqual({ successes: 2, failures: 1 });
  });

  it("a success breaks the failure streak", () => {
    const counter = new ConsecutiveCounter();
    counter.recordFailure();
    counter.recordFailure();
    counter.recordSuccess();
    expect(counter.consecutiveFailures).toBe(0);
    expect(counter.consecutiveSuccesses).toBe(1);
    expect(counter.totals()).toEqual({ successes: 1, failures: 2 });
  });

  it("reset zeroes streaks and totals", () => {
    const counter = new ConsecutiveCounter();
    counter.recordFailure();
    counter.recordSuccess();
    counter.recordFailure();
    counter.reset();
    expect(counter.consecutiveSuccesses).toBe(0);
    expect(counter.consecutiveFailures).toBe(0);
    expect(counter.totals()).toEqual({ successes: 0, failures: 0 });
  });
});
