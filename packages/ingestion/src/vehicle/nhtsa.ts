/**
 * NHTSA 5-Star Safety Ratings source.
 *
 * Two-step lookup: the model-year search resolves a VehicleId, then the
 * VehicleId endpoint returns the crash-test ratings. Provenance tiers:
 *
 * - explicit overall rating → `live`
 * - no match, or a match without an overall rating → `default` (4 stars)
 * - the request fails → `error-fallback` (3 stars)
 *
 * Recall counts come from the recalls endpoint; a failed recall lookup is
 * logged and counted as 0 without changing the tier.
 */

import type { VehicleDescriptor, VehicleSafetyRecord } from "@roadrisk/types";
import { errorMessage } from "../errors.js";
import { firstRecord, isRecord, numberField, stringField } from "../http/json.js";
import type { UpstreamClient } from "../http/upstream-client.js";
import type { VehicleSafetySource } from "./source.js";
import { parseStarRating } from "./ratings.js";
import { buildRecord, defaultRecord, errorFallbackRecord } from "./records.js";

export interface NhtsaSafetySourceOptions {
  /** Client for https://api.nhtsa.gov */
  client: UpstreamClient;
  now?: () => Date;
}

export class NhtsaSafetySource implements VehicleSafetySource {
  readonly name = "NHTSA Safety Ratings";

  private readonly client: UpstreamClient;
  private readonly now: () => Date;

  constructor(options: NhtsaSafetySourceOptions) {
    this.client = options.client;
    this.now = options.now ?? (() => new Date());
  }

  async rate(vehicle: VehicleDescriptor, signal?: AbortSignal): Promise<VehicleSafetyRecord> {
    const label = `${vehicle.year} ${vehicle.make} ${vehicle.model}`;
    try {
      const search = await this.client.get(
        `/SafetyRatings/modelyear/${vehicle.year}` +
          `/make/${encodeURIComponent(vehicle.make.toUpperCase())}` +
          `/model/${encodeURIComponent(vehicle.model.toUpperCase())}`,
        { format: "json" },
        signal,
      );
      const match = isRecord(search) ? firstRecord(search, "Results") : undefined;
      const vehicleId = match ? numberField(match, "VehicleId") : undefined;
      if (vehicleId === undefined) {
        console.warn(`[nhtsa] No results for ${label} — using default rating`);
        const recallCount = await this.recallCount(vehicle, signal);
        return defaultRecord(vehicle, this.now(), { recallCount });
      }

      const detail = await this.client.get(
        `/SafetyRatings/VehicleId/${vehicleId}`,
        { format: "json" },
        signal,
      );
      const ratings = isRecord(detail) ? firstRecord(detail, "Results") : undefined;
      const recallCount = await this.recallCount(vehicle, signal);
      if (!ratings) {
        console.warn(`[nhtsa] No rating data for vehicle ${vehicleId} — using default rating`);
        return defaultRecord(vehicle, this.now(), { recallCount, upstreamVehicleId: vehicleId });
      }

      const fields = {
        rolloverRating: parseStarRating(ratings["RolloverRating"]),
        frontalCrashRating: parseStarRating(ratings["OverallFrontCrashRating"]),
        sideCrashRating: parseStarRating(ratings["OverallSideCrashRating"]),
        recallCount,
        upstreamVehicleId: vehicleId,
        description: stringField(ratings, "VehicleDescription") ?? label,
      };
      const overallRating = parseStarRating(ratings["OverallRating"]);
      if (overallRating === null) {
        console.warn(`[nhtsa] ${label} is not rated overall — using default rating`);
        return defaultRecord(vehicle, this.now(), fields);
      }

      console.log(`[nhtsa] ${label}: ${overallRating} stars, ${recallCount} recall(s)`);
      return buildRecord(vehicle, "live", { ...fields, overallRating }, this.now());
    } catch (err) {
      const message = errorMessage(err);
      console.warn(`[nhtsa] Lookup failed for ${label}: ${message} — using error fallback`);
      return errorFallbackRecord(vehicle, this.now(), message);
    }
  }

  private async recallCount(vehicle: VehicleDescriptor, signal?: AbortSignal): Promise<number> {
    try {
      const data = await this.client.get(
        "/recalls/recallsByVehicle",
        { make: vehicle.make, model: vehicle.model, modelYear: vehicle.year },
        signal,
      );
      if (!isRecord(data)) return 0;
      const results = data["results"];
      return Array.isArray(results) ? results.length : (numberField(data, "Count") ?? 0);
    } catch (err) {
      console.warn(
        `[nhtsa] Recall lookup failed for ${vehicle.year} ${vehicle.make} ${vehicle.model}: ${errorMessage(err)}`,
      );
      return 0;
    }
  }
}
