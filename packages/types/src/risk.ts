/**
 * Risk scoring inputs and outputs.
 */

/** Behavioral factors supplied by the analytics collaborator */
export const BEHAVIORAL_FACTORS = [
  "speeding",
  "hardBraking",
  "acceleration",
  "distraction",
  "timeOfDay",
  "weather",
] as const;

export type BehavioralFactor = (typeof BEHAVIORAL_FACTORS)[number];

/** Named factor scores in [0, 1]. Missing factors count as 0. */
export type BehavioralFactors = Partial<Record<BehavioralFactor, number>>;

/** Every slot of the fusion weight table */
export type RiskFactor = BehavioralFactor | "traffic";

export type TrafficSignal = "live" | "fallback" | "absent";

/** `unrated` = a record was supplied but carries no overall rating */
export type VehicleSignal = "live" | "default" | "error-fallback" | "unrated" | "absent";

/** Additive parts of the overall score, before clamping */
export interface RiskComponents {
  /** Weighted sum of behavioral factors */
  baseline: number;
  /** Added by congestion */
  traffic: number;
  /** Subtracted for vehicle crash safety */
  vehicle: number;
}

export interface RiskScore {
  readonly subjectId: string;
  /** Clamped to [0, 1] */
  readonly overall: number;
  readonly factorBreakdown: Readonly<Record<RiskFactor, number>>;
  /** Clamped to the policy floor/ceiling */
  readonly confidence: number;
  readonly components: Readonly<RiskComponents>;
  readonly signals: { readonly traffic: TrafficSignal; readonly vehicle: VehicleSignal };
  readonly inputsUsed: { readonly trafficSampleId?: string; readonly vehicleRecordId?: string };
  readonly computedAt: Date;
}
