import { describe, it, expect } from "vitest";
import { computeTimeouts } from "./timeouts.js";

describe("computeTimeouts", () => {
  it("gives 80s to connect to a target three hops out", () => {
    expect(computeTimeouts(3).connectMs).toBe(80_000);
  });

  it("caps every budget", () => {
    expect(computeTimeouts(6)).toEqual({ connectMs: 120_000, commandMs: 60_000, operationMs: 480_000 });
    expect(computeTimeouts(20)).toEqual({ connectMs: 120_000, commandMs: 60_000, operationMs: 720_000 });
  });

  it("scales from the single-hop base", () => {
    expect(computeTimeouts(1)).toEqual({ connectMs: 40_000, commandMs: 15_000, operationMs: 180_000 });
    expect(computeTimeouts(0)).toEqual({ connectMs: 20_000, commandMs: 5_000, operationMs: 120_000 });
  });
});
