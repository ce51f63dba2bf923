import { describe, expect, it } from "vitest";
import { CIRCUIT_STATES, formatState, isValidTransition } from "./circuit-state.js";

describe("isValidTransition", () => {
  it("allows exactly the four breaker transitions", () => {
    const allowed: string[] = [];
    for (const from of CIRCUIT_STATES) {
      for (const to of CIRCUIT_STATES) {
        if (isValidTransition(from, to)) allowed.push(`${from}->${to}`);
      }
    }
    expect(allowed).toEqual(["closed->open", "open->half_open", "half_open->closed", "half_open->open"]);
  });

  it("never allows a self transition", () => {
    for (const state of CIRCUIT_STATES) {
      expect(isValidTransition(state, state)).toBe(false);
    }
  });

  it("forbids skipping half_open on the way back to closed", () => {
    expect(isValidTransition("open", "closed")).toBe(false);
    expect(isValidTransition("closed", "half_open")).toBe(false);
  });
});

describe("formatState", () => {
  it("labels each state", () => {
    expect(CIRCUIT_STATES.map(formatState)).toEqual(["Closed", "Open", "HalfOpen"]);
  });
});
