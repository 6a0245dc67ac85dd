import { describe, it, expect } from "vitest";
import {
  parseStarRating,
  premiumAdjustment,
  riskImpact,
  riskReduction,
  safetyScoreBoost,
} from "./ratings.js";

describe("premiumAdjustment", () => {
  it.each([
    [5, -0.15],
    [4, -0.08],
    [3, 0.0],
    [2, 0.05],
    [1, 0.1],
  ])("%s stars → %s", (rating, expected) => {
    expect(premiumAdjustment(rating)).toBe(expected);
  });

  it("is 0 for ratings outside 1-5 or unset", () => {
    expect(premiumAdjustment(6)).toBe(0);
    expect(premiumAdjustment(0)).toBe(0);
    expect(premiumAdjustment(4.5)).toBe(0);
    expect(premiumAdjustment(null)).toBe(0);
    expect(premiumAdjustment(undefined)).toBe(0);
  });
});

describe("safetyScoreBoost and riskReduction", () => {
  it("reward ratings above 3 stars only", () => {
    expect(safetyScoreBoost(5)).toBe(20);
    expect(safetyScoreBoost(4)).toBe(10);
    expect(safetyScoreBoost(2)).toBe(0);
    expect(riskReduction(5)).toBeCloseTo(0.1, 10);
    expect(riskReduction(4)).toBeCloseTo(0.05, 10);
    expect(riskReduction(1)).toBe(0);
  });

  it("are 0 for unset ratings", () => {
    expect(riskImpact(null)).toEqual({
      premiumAdjustment: 0,
      safetyScoreBoost: 0,
      riskReduction: 0,
    });
  });
});

describe("parseStarRating", () => {
  it("accepts integers 1-5 as numbers or strings", () => {
    expect(parseStarRating(5)).toBe(5);
    expect(parseStarRating("3")).toBe(3);
  });

  it("treats anything else as absent", () => {
    expect(parseStarRating("Not Rated")).toBeNull();
    expect(parseStarRating("")).toBeNull();
    expect(parseStarRating(6)).toBeNull();
    expect(parseStarRating("4.5")).toBeNull();
    expect(parseStarRating(null)).toBeNull();
    expect(parseStarRating(undefined)).toBeNull();
  });
});
