import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import {
  DEFAULT_FUSION_POLICY,
  RISK_FACTORS,
  loadFusionPolicy,
  parsePolicyOverrides,
  validatePolicy,
  mergePolicy,
} from "./fusion-policy.js";

// ─── Helpers ────────────────────────────────────────────────────────────────

let testDir: string;

function writePolicy(content: unknown): string {
  const filePath = join(testDir, "policy.json");
  writeFileSync(filePath, JSON.stringify(content), "utf-8");
  return filePath;
}

beforeEach(() => {
  testDir = mkdtempSync(join(tmpdir(), "roadrisk-policy-"));
  vi.spyOn(console, "log").mockImplementation(() => {});
});

afterEach(() => {
  rmSync(testDir, { recursive: true, force: true });
  vi.restoreAllMocks();
});

// ─── Defaults ───────────────────────────────────────────────────────────────

describe("DEFAULT_FUSION_POLICY", () => {
  it("has weights summing to 1", () => {
    const sum = RISK_FACTORS.reduce((acc, f) => acc + DEFAULT_FUSION_POLICY.weights[f], 0);
    expect(sum).toBeCloseTo(1, 10);
  });

  it("passes validation", () => {
    expect(() => validatePolicy(DEFAULT_FUSION_POLICY)).not.toThrow();
  });
});

// ─── loadFusionPolicy ───────────────────────────────────────────────────────

describe("loadFusionPolicy", () => {
  it("returns the defaults without a file", () => {
    expect(loadFusionPolicy()).toEqual(DEFAULT_FUSION_POLICY);
  });

  it("deep-merges a partial override file", () => {
    const policy = loadFusionPolicy(
      writePolicy({
        weights: { speeding: 0.2, weather: 0.13 },
        confidence: { floor: 0.4 },
      }),
    );

    expect(policy.weights.speeding).toBe(0.2);
    expect(policy.weights.weather).toBe(0.13);
    expect(policy.weights.hardBraking).toBe(0.2);
    expect(policy.confidence.floor).toBe(0.4);
    expect(policy.confidence.base).toBe(0.95);
    expect(policy.trafficAdjustmentScale).toBe(0.05);
  });

  it("does not mutate the defaults", () => {
    loadFusionPolicy(writePolicy({ weights: { speeding: 0.2, weather: 0.13 } }));

    expect(DEFAULT_FUSION_POLICY.weights.speeding).toBe(0.25);
  });

  it("rejects weights that do not sum to 1", () => {
    expect(() => loadFusionPolicy(writePolicy({ weights: { speeding: 0.3 } }))).toThrow(
      'Fusion policy "weights" must sum to 1.0, got 1.0500',
    );
  });

  it("throws for a missing file", () => {
    expect(() => loadFusionPolicy(join(testDir, "missing.json"))).toThrow();
  });
});

// ─── parsePolicyOverrides ───────────────────────────────────────────────────

describe("parsePolicyOverrides", () => {
  it("names an unknown key", () => {
    expect(() => parsePolicyOverrides({ weights: { braking: 0.1 } })).toThrow(
      'Unknown fusion policy key "weights.braking"',
    );
    expect(() => parsePolicyOverrides({ scale: 1 })).toThrow('Unknown fusion policy key "scale"');
  });

  it("names a non-numeric value", () => {
    expect(() => parsePolicyOverrides({ confidence: { base: "high" } })).toThrow(
      'Fusion policy "confidence.base" must be a number',
    );
  });

  it("rejects a non-object document", () => {
    expect(() => parsePolicyOverrides([1, 2])).toThrow("Fusion policy must be a JSON object");
  });
});

// ─── validatePolicy ─────────────────────────────────────────────────────────

describe("validatePolicy", () => {
  it("rejects a negative weight", () => {
    const policy = mergePolicy(DEFAULT_FUSION_POLICY, { weights: { speeding: -0.1, weather: 0.43 } });

    expect(() => validatePolicy(policy)).toThrow(
      'Fusion policy "weights.speeding" must be a number in [0, 1], got -0.1',
    );
  });

  it("rejects a floor above the ceiling", () => {
    const policy = mergePolicy(DEFAULT_FUSION_POLICY, { confidence: { floor: 0.96 } });

    expect(() => validatePolicy(policy)).toThrow(
      'Fusion policy "confidence.floor" exceeds "confidence.ceiling"',
    );
  });
});
