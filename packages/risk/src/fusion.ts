/**
 * Risk fusion.
 *
 * Combines a behavioral baseline, a traffic adjustment and a vehicle-safety
 * reduction into one score in [0, 1]:
 *
 *   overall = clamp01(Σ weight·factor + congestion × scale − max(0, (stars − 3) × perStar))
 *
 * Inputs are clamped before use so out-of-range factor scores or congestion
 * levels cannot push the score outside [0, 1]. Confidence starts at the
 * policy base and is reduced for each fallback signal.
 */

import {
  BEHAVIORAL_FACTORS,
  isStarRating,
  type BehavioralFactor,
  type BehavioralFactors,
  type RiskFactor,
  type RiskScore,
  type TrafficSample,
  type TrafficSignal,
  type VehicleSafetyRecord,
  type VehicleSignal,
} from "@roadrisk/types";
import { DEFAULT_FUSION_POLICY, validatePolicy, type FusionPolicy } from "./fusion-policy.js";

/** Star rating at which the vehicle neither adds nor removes risk */
const NEUTRAL_RATING = 3;

export interface FuseOptions {
  subjectId?: string;
  now?: Date;
}

/** [0, 1], with NaN treated as 0 */
export function clamp01(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

function trafficSignal(traffic: TrafficSample | undefined): TrafficSignal {
  return traffic ? traffic.source : "absent";
}

function vehicleSignal(vehicle: VehicleSafetyRecord | undefined): VehicleSignal {
  if (!vehicle) return "absent";
  if (!isStarRating(vehicle.overallRating)) return "unrated";
  return vehicle.source;
}

export class RiskFusionEngine {
  readonly policy: FusionPolicy;

  constructor(policy: FusionPolicy = DEFAULT_FUSION_POLICY) {
    this.policy = validatePolicy(policy);
  }

  fuse(
    behavioral: BehavioralFactors,
    traffic?: TrafficSample,
    vehicle?: VehicleSafetyRecord,
    options: FuseOptions = {},
  ): RiskScore {
    const { weights, confidence: conf } = this.policy;

    const score = (factor: BehavioralFactor): number => clamp01(behavioral[factor] ?? 0);
    const factors: Record<RiskFactor, number> = {
      speeding: score("speeding"),
      hardBraking: score("hardBraking"),
      acceleration: score("acceleration"),
      distraction: score("distraction"),
      timeOfDay: score("timeOfDay"),
      weather: score("weather"),
      traffic: traffic ? clamp01(traffic.congestionLevel) : 0,
    };
    const baseline = BEHAVIORAL_FACTORS.reduce(
      (acc, factor) => acc + weights[factor] * factors[factor],
      0,
    );

    const congestion = factors.traffic;
    const trafficAdjustment = congestion * this.policy.trafficAdjustmentScale;

    const rating = vehicle?.overallRating;
    const vehicleReduction = isStarRating(rating)
      ? Math.max(0, (rating - NEUTRAL_RATING) * this.policy.vehicleReductionPerStar)
      : 0;

    let confidence = conf.base;
    if (traffic?.source === "fallback") confidence -= conf.trafficFallbackPenalty;
    if (vehicle?.source === "error-fallback") confidence -= conf.vehicleErrorPenalty;

    return {
      subjectId: options.subjectId ?? "anonymous",
      overall: clamp01(baseline + trafficAdjustment - vehicleReduction),
      factorBreakdown: factors,
      confidence: Math.min(conf.ceiling, Math.max(conf.floor, confidence)),
      components: { baseline, traffic: trafficAdjustment, vehicle: vehicleReduction },
      signals: { traffic: trafficSignal(traffic), vehicle: vehicleSignal(vehicle) },
      inputsUsed: {
        ...(traffic ? { trafficSampleId: traffic.id } : {}),
        ...(vehicle ? { vehicleRecordId: vehicle.id } : {}),
      },
      computedAt: options.now ?? new Date(),
    };
  }
}
