import type {
  StarRating,
  VehicleDescriptor,
  VehicleSafetyRecord,
  VehicleSourceTag,
} from "@roadrisk/types";
import { recordId } from "../ids.js";
import { DEFAULT_RATING, ERROR_FALLBACK_RATING } from "./ratings.js";

/** Cache/lookup key: the VIN when known, else year|MAKE|MODEL */
export function vehicleKey(vehicle: VehicleDescriptor): string {
  if (vehicle.vin) return vehicle.vin.toUpperCase();
  return `${vehicle.year}|${vehicle.make.toUpperCase()}|${vehicle.model.toUpperCase()}`;
}

export interface RatingFields {
  overallRating: StarRating | null;
  rolloverRating: StarRating | null;
  frontalCrashRating: StarRating | null;
  sideCrashRating: StarRating | null;
  recallCount: number;
  upstreamVehicleId?: number;
  description?: string;
  error?: string;
}

const NO_RATINGS: RatingFields = {
  overallRating: null,
  rolloverRating: null,
  frontalCrashRating: null,
  sideCrashRating: null,
  recallCount: 0,
};

export function buildRecord(
  vehicle: VehicleDescriptor,
  source: VehicleSourceTag,
  fields: RatingFields,
  collectedAt: Date
): VehicleSafetyRecord {
  const record: VehicleSafetyRecord = {
    id: recordId("vs", vehicleKey(vehicle), collectedAt.toISOString(), source),
    make: vehicle.make,
    model: vehicle.model,
    year: vehicle.year,
    ...(vehicle.vin ? { vin: vehicle.vin.toUpperCase() } : {}),
    ...fields,
    source,
    collectedAt,
  };
  return Object.freeze(record);
}

/**
 * Lookup succeeded without rating data. Sub-ratings the upstream did report
 * are kept; the overall rating is the default assumption.
 */
export function defaultRecord(
  vehicle: VehicleDescriptor,
  collectedAt: Date,
  partial: Partial<RatingFields> = {}
): VehicleSafetyRecord {
  return buildRecord(
    vehicle,
    "default",
    { ...NO_RATINGS, ...partial, overallRating: DEFAULT_RATING },
    collectedAt
  );
}

/** The lookup call itself failed */
export function errorFallbackRecord(
  vehicle: VehicleDescriptor,
  collectedAt: Date,
  error: string
): VehicleSafetyRecord {
  return buildRecord(
    vehicle,
    "error-fallback",
    { ...NO_RATINGS, overallRating: ERROR_FALLBACK_RATING, error },
    collectedAt
  );
}
