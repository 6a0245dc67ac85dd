/**
 * Fusion policy: weights and constants used by the risk fusion engine.
 *
 * Defaults live here; a JSON file may override any subset of them. The file
 * is deep-merged over the defaults, then the merged policy is validated.
 */

import { readFileSync } from "node:fs";
import { BEHAVIORAL_FACTORS, type RiskFactor } from "@roadrisk/types";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ConfidencePolicy {
  base: number;
  /** Subtracted when the traffic sample is a fallback */
  trafficFallbackPenalty: number;
  /** Subtracted when the vehicle record is an error fallback */
  vehicleErrorPenalty: number;
  floor: number;
  ceiling: number;
}

export interface FusionPolicy {
  /**
   * Factor weights, summing to 1. The `traffic` weight reserves the slot the
   * traffic adjustment fills; it does not scale the baseline.
   */
  weights: Record<RiskFactor, number>;
  /** Traffic adjustment = congestion level × this */
  trafficAdjustmentScale: number;
  /** Reduction per star above 3 */
  vehicleReductionPerStar: number;
  confidence: ConfidencePolicy;
}

export interface FusionPolicyOverrides {
  weights?: Partial<Record<RiskFactor, number>>;
  trafficAdjustmentScale?: number;
  vehicleReductionPerStar?: number;
  confidence?: Partial<ConfidencePolicy>;
}

export const RISK_FACTORS: readonly RiskFactor[] = [...BEHAVIORAL_FACTORS, "traffic"];

const CONFIDENCE_KEYS = [
  "base",
  "trafficFallbackPenalty",
  "vehicleErrorPenalty",
  "floor",
  "ceiling",
] as const satisfies readonly (keyof ConfidencePolicy)[];

export const DEFAULT_FUSION_POLICY: Readonly<FusionPolicy> = Object.freeze({
  weights: {
    speeding: 0.25,
    hardBraking: 0.2,
    acceleration: 0.15,
    distraction: 0.15,
    timeOfDay: 0.1,
    weather: 0.08,
    traffic: 0.07,
  },
  trafficAdjustmentScale: 0.05,
  vehicleReductionPerStar: 0.05,
  confidence: {
    base: 0.95,
    trafficFallbackPenalty: 0.08,
    vehicleErrorPenalty: 0.05,
    floor: 0.5,
    ceiling: 0.95,
  },
});

const WEIGHT_SUM_TOLERANCE = 1e-6;

// ---------------------------------------------------------------------------
// Merge + validate
// ---------------------------------------------------------------------------

/** Leaf-level merge: override values replace policy values. */
export function mergePolicy(policy: FusionPolicy, overrides: FusionPolicyOverrides): FusionPolicy {
  return {
    weights: { ...policy.weights, ...overrides.weights },
    trafficAdjustmentScale: overrides.trafficAdjustmentScale ?? policy.trafficAdjustmentScale,
    vehicleReductionPerStar: overrides.vehicleReductionPerStar ?? policy.vehicleReductionPerStar,
    confidence: { ...policy.confidence, ...overrides.confidence },
  };
}

/** Throws naming the first offending key. */
export function validatePolicy(policy: FusionPolicy): FusionPolicy {
  for (const factor of RISK_FACTORS) {
    assertUnit(policy.weights[factor], `weights.${factor}`);
  }
  const sum = RISK_FACTORS.reduce((acc, factor) => acc + policy.weights[factor], 0);
  if (Math.abs(sum - 1) > WEIGHT_SUM_TOLERANCE) {
    throw new Error(`Fusion policy "weights" must sum to 1.0, got ${sum.toFixed(4)}`);
  }
  assertUnit(policy.trafficAdjustmentScale, "trafficAdjustmentScale");
  assertUnit(policy.vehicleReductionPerStar, "vehicleReductionPerStar");
  for (const key of CONFIDENCE_KEYS) {
    assertUnit(policy.confidence[key], `confidence.${key}`);
  }
  if (policy.confidence.floor > policy.confidence.ceiling) {
    throw new Error(`Fusion policy "confidence.floor" exceeds "confidence.ceiling"`);
  }
  return policy;
}

function assertUnit(value: number, key: string): void {
  if (!Number.isFinite(value) || value < 0 || value > 1) {
    throw new Error(`Fusion policy "${key}" must be a number in [0, 1], got ${value}`);
  }
}

// ---------------------------------------------------------------------------
// Parse
// ---------------------------------------------------------------------------

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function numberAt(value: unknown, key: string): number {
  if (typeof value !== "number") {
    throw new Error(`Fusion policy "${key}" must be a number`);
  }
  return value;
}

function isRiskFactor(key: string): key is RiskFactor {
  return RISK_FACTORS.some((factor) => factor === key);
}

function isConfidenceKey(key: string): key is keyof ConfidencePolicy {
  return CONFIDENCE_KEYS.some((k) => k === key);
}

/** Read overrides out of parsed JSON, rejecting unknown keys. */
export function parsePolicyOverrides(raw: unknown): FusionPolicyOverrides {
  if (!isObject(raw)) {
    throw new Error("Fusion policy must be a JSON object");
  }
  const overrides: FusionPolicyOverrides = {};
  for (const [key, value] of Object.entries(raw)) {
    switch (key) {
      case "weights": {
        if (!isObject(value)) throw new Error(`Fusion policy "weights" must be an object`);
        const weights: Partial<Record<RiskFactor, number>> = {};
        for (const [factor, weight] of Object.entries(value)) {
          if (!isRiskFactor(factor)) throw new Error(`Unknown fusion policy key "weights.${factor}"`);
          weights[factor] = numberAt(weight, `weights.${factor}`);
        }
        overrides.weights = weights;
        break;
      }
      case "trafficAdjustmentScale":
      case "vehicleReductionPerStar":
        overrides[key] = numberAt(value, key);
        break;
      case "confidence": {
        if (!isObject(value)) throw new Error(`Fusion policy "confidence" must be an object`);
        const confidence: Partial<ConfidencePolicy> = {};
        for (const [name, n] of Object.entries(value)) {
          if (!isConfidenceKey(name)) throw new Error(`Unknown fusion policy key "confidence.${name}"`);
          confidence[name] = numberAt(n, `confidence.${name}`);
        }
        overrides.confidence = confidence;
        break;
      }
      default:
        throw new Error(`Unknown fusion policy key "${key}"`);
    }
  }
  return overrides;
}

// ---------------------------------------------------------------------------
// Load
// ---------------------------------------------------------------------------

/**
 * Defaults, or defaults merged with the overrides in `filePath`.
 * A missing or malformed file throws; there is no silent fallback.
 */
export function loadFusionPolicy(filePath?: string): FusionPolicy {
  const defaults = mergePolicy(DEFAULT_FUSION_POLICY, {});
  if (!filePath) return defaults;

  const raw: unknown = JSON.parse(readFileSync(filePath, "utf-8"));
  const policy = validatePolicy(mergePolicy(defaults, parsePolicyOverrides(raw)));
  console.log(`[config] Fusion policy loaded from ${filePath}`);
  return policy;
}
