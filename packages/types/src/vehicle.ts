/**
 * Vehicle crash-safety data.
 */

/** NHTSA five-star rating */
export type StarRating = 1 | 2 | 3 | 4 | 5;

/**
 * Provenance of a safety record:
 * - `live`: the upstream returned an explicit overall rating
 * - `default`: the lookup succeeded but carried no rating data
 * - `error-fallback`: the lookup itself failed
 */
export type VehicleSourceTag = "live" | "default" | "error-fallback";

export interface VehicleSafetyRecord {
  /** Stable identifier derived from the vehicle key, time and source */
  readonly id: string;
  readonly make: string;
  readonly model: string;
  readonly year: number;
  readonly vin?: string;
  /** `null` means the rating is absent, never a silent numeric default */
  readonly overallRating: StarRating | null;
  readonly rolloverRating: StarRating | null;
  readonly frontalCrashRating: StarRating | null;
  readonly sideCrashRating: StarRating | null;
  readonly recallCount: number;
  readonly source: VehicleSourceTag;
  /** Upstream vehicle id when the model-year search matched */
  readonly upstreamVehicleId?: number;
  readonly description?: string;
  /** Failure message for `error-fallback` records */
  readonly error?: string;
  readonly collectedAt: Date;
}

/** What a safety lookup is keyed by */
export interface VehicleDescriptor {
  year: number;
  make: string;
  model: string;
  vin?: string;
}

export function isStarRating(value: unknown): value is StarRating {
  return value === 1 || value === 2 || value === 3 || value === 4 || value === 5;
}
