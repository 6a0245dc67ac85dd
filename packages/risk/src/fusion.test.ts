import { describe, it, expect } from "vitest";
import type { TrafficSample, VehicleSafetyRecord } from "@roadrisk/types";
import { RiskFusionEngine, clamp01 } from "./fusion.js";
import { DEFAULT_FUSION_POLICY, mergePolicy } from "./fusion-policy.js";

// ─── Helpers ────────────────────────────────────────────────────────────────

const AT = new Date("2026-03-01T08:00:00.000Z");

function traffic(overrides: Partial<TrafficSample> = {}): TrafficSample {
  return {
    id: "ts_test",
    coordinate: { lat: 37.7749, lng: -122.4194 },
    currentSpeed: 30,
    freeFlowSpeed: 50,
    congestionLevel: 0.6,
    roadClosed: false,
    confidence: 0.9,
    collectedAt: AT,
    source: "live",
    ...overrides,
  };
}

function vehicle(overrides: Partial<VehicleSafetyRecord> = {}): VehicleSafetyRecord {
  return {
    id: "vs_test",
    make: "Honda",
    model: "Civic",
    year: 2020,
    overallRating: 5,
    rolloverRating: null,
    frontalCrashRating: null,
    sideCrashRating: null,
    recallCount: 0,
    source: "live",
    collectedAt: AT,
    ...overrides,
  };
}

const engine = new RiskFusionEngine();

// ─── fuse ───────────────────────────────────────────────────────────────────

describe("RiskFusionEngine.fuse", () => {
  it("adds traffic risk and subtracts vehicle safety from the baseline", () => {
    // speeding 0.8 × weight 0.25 = baseline 0.20
    const score = engine.fuse({ speeding: 0.8 }, traffic(), vehicle(), {
      subjectId: "driver-1",
      now: AT,
    });

    expect(score.components.baseline).toBeCloseTo(0.2, 10);
    expect(score.components.traffic).toBeCloseTo(0.03, 10);
    expect(score.components.vehicle).toBeCloseTo(0.1, 10);
    expect(score.overall).toBeCloseTo(0.13, 10);
    expect(score.confidence).toBe(0.95);
    expect(score.subjectId).toBe("driver-1");
    expect(score.computedAt).toBe(AT);
    expect(score.signals).toEqual({ traffic: "live", vehicle: "live" });
    expect(score.inputsUsed).toEqual({ trafficSampleId: "ts_test", vehicleRecordId: "vs_test" });
  });

  it("reports the clamped factor scores in the breakdown", () => {
    const score = engine.fuse({ speeding: 0.8, weather: 1.5 }, traffic({ congestionLevel: 0.3 }));

    expect(score.factorBreakdown).toEqual({
      speeding: 0.8,
      hardBraking: 0,
      acceleration: 0,
      distraction: 0,
      timeOfDay: 0,
      weather: 1,
      traffic: 0.3,
    });
  });

  it("uses the baseline alone when no signals are available", () => {
    const score = engine.fuse({ speeding: 0.4, hardBraking: 0.5 });

    expect(score.overall).toBeCloseTo(0.2, 10);
    expect(score.components.traffic).toBe(0);
    expect(score.components.vehicle).toBe(0);
    expect(score.signals).toEqual({ traffic: "absent", vehicle: "absent" });
    expect(score.inputsUsed).toEqual({});
    expect(score.confidence).toBe(0.95);
  });

  it("clamps out-of-range inputs", () => {
    const high = engine.fuse(
      { speeding: 1e6, hardBraking: 1e6, acceleration: 1e6, distraction: 1e6, timeOfDay: 1e6, weather: 1e6 },
      traffic({ congestionLevel: 50 }),
    );
    const low = engine.fuse(
      { speeding: -5, hardBraking: -5, acceleration: -5, distraction: -5, timeOfDay: -5, weather: -5 },
      traffic({ congestionLevel: -3 }),
      vehicle(),
    );

    // 0.93 from the six behavioral weights + 0.05 from congestion clamped to 1
    expect(high.overall).toBeCloseTo(0.98, 10);
    expect(high.components.traffic).toBe(0.05);
    expect(low.overall).toBe(0);
    expect(low.components.baseline).toBe(0);
  });

  it("treats NaN factor scores as 0", () => {
    const score = engine.fuse({ speeding: Number.NaN, hardBraking: 0.5 });

    expect(score.factorBreakdown.speeding).toBe(0);
    expect(score.overall).toBeCloseTo(0.1, 10);
  });

  it("does not reduce risk for 3 stars or fewer", () => {
    expect(engine.fuse({ speeding: 0.8 }, undefined, vehicle({ overallRating: 3 })).components.vehicle).toBe(0);
    expect(engine.fuse({ speeding: 0.8 }, undefined, vehicle({ overallRating: 1 })).components.vehicle).toBe(0);
  });

  it("applies the default-tier rating and labels it", () => {
    const score = engine.fuse({ speeding: 0.8 }, undefined, vehicle({ source: "default", overallRating: 4 }));

    expect(score.components.vehicle).toBeCloseTo(0.05, 10);
    expect(score.signals.vehicle).toBe("default");
    expect(score.confidence).toBe(0.95);
  });

  it("labels a record without an overall rating as unrated", () => {
    const score = engine.fuse({}, undefined, vehicle({ overallRating: null }));

    expect(score.components.vehicle).toBe(0);
    expect(score.signals.vehicle).toBe("unrated");
  });

  it("reduces confidence by 0.08 for fallback traffic", () => {
    const score = engine.fuse({}, traffic({ source: "fallback", congestionLevel: 0.1 }));

    expect(score.confidence).toBeCloseTo(0.87, 10);
    expect(score.signals.traffic).toBe("fallback");
  });

  it("reduces confidence by 0.05 for an error-fallback vehicle record", () => {
    const live = engine.fuse({ speeding: 0.8 }, traffic(), vehicle({ overallRating: 3 }));
    const failed = engine.fuse(
      { speeding: 0.8 },
      traffic(),
      vehicle({ overallRating: 3, source: "error-fallback" }),
    );

    expect(live.confidence - failed.confidence).toBeCloseTo(0.05, 10);
    expect(failed.overall).toBe(live.overall);
  });

  it("combines both penalties", () => {
    const score = engine.fuse(
      {},
      traffic({ source: "fallback" }),
      vehicle({ source: "error-fallback", overallRating: 3 }),
    );

    expect(score.confidence).toBeCloseTo(0.82, 10);
  });

  it("clamps confidence to the policy floor", () => {
    const strict = new RiskFusionEngine(
      mergePolicy(DEFAULT_FUSION_POLICY, {
        confidence: { trafficFallbackPenalty: 0.3, vehicleErrorPenalty: 0.3 },
      }),
    );

    const score = strict.fuse(
      {},
      traffic({ source: "fallback" }),
      vehicle({ source: "error-fallback", overallRating: 3 }),
    );

    expect(score.confidence).toBe(0.5);
  });

  it("follows an overridden traffic scale", () => {
    const custom = new RiskFusionEngine(
      mergePolicy(DEFAULT_FUSION_POLICY, { trafficAdjustmentScale: 0.1 }),
    );

    expect(custom.fuse({}, traffic()).components.traffic).toBeCloseTo(0.06, 10);
  });

  it("rejects an invalid policy", () => {
    expect(
      () => new RiskFusionEngine(mergePolicy(DEFAULT_FUSION_POLICY, { weights: { speeding: 0.5 } })),
    ).toThrow('Fusion policy "weights" must sum to 1.0, got 1.2500');
  });

  it("never leaves [0, 1]", () => {
    const cases = [-1e9, -1, 0, 0.5, 1, 2, 1e9];
    for (const value of cases) {
      const score = engine.fuse(
        { speeding: value, hardBraking: value, acceleration: value, distraction: value, timeOfDay: value, weather: value },
        traffic({ congestionLevel: value }),
      );
      expect(score.overall).toBeGreaterThanOrEqual(0);
      expect(score.overall).toBeLessThanOrEqual(1);
    }
  });
});

describe("clamp01", () => {
  it.each([
    [-1, 0],
    [0.42, 0.42],
    [7, 1],
    [Number.POSITIVE_INFINITY, 1],
    [Number.NaN, 0],
  ])("%s → %s", (input, expected) => {
    expect(clamp01(input)).toBe(expected);
  });
});
