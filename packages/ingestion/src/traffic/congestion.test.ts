import { describe, it, expect } from "vitest";
import { congestionLevel } from "./congestion.js";

describe("congestionLevel", () => {
  it.each([
    [85, 100, 0.0],
    [84.999, 100, 0.3],
    [65, 100, 0.3],
    [64.999, 100, 0.6],
    [45, 100, 0.6],
    [44.9, 100, 1.0],
  ])("current %s / free-flow %s → %s", (current, freeFlow, expected) => {
    expect(congestionLevel(current, freeFlow)).toBe(expected);
  });

  it("maps 20 of 50 km/h (ratio 0.4) to heavy congestion", () => {
    expect(congestionLevel(20, 50)).toBe(1.0);
  });

  it("treats faster-than-free-flow as free flow", () => {
    expect(congestionLevel(70, 50)).toBe(0.0);
  });

  it("returns 0 when free-flow speed is zero or negative", () => {
    expect(congestionLevel(20, 0)).toBe(0);
    expect(congestionLevel(0, 0)).toBe(0);
    expect(congestionLevel(20, -10)).toBe(0);
  });

  it("returns 0 when free-flow speed is not a number", () => {
    expect(congestionLevel(20, Number.NaN)).toBe(0);
  });
});
