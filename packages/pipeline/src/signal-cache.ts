/**
 * Latest traffic and vehicle signals, read by on-demand fusion.
 */

import type {
  Coordinate,
  TrafficSample,
  VehicleDescriptor,
  VehicleSafetyRecord,
} from "@roadrisk/types";
import { haversineKm, vehicleKey } from "@roadrisk/ingestion";

export const DEFAULT_MAX_DISTANCE_KM = 5;

function pointKey(coord: Coordinate): string {
  return `${coord.lat.toFixed(5)},${coord.lng.toFixed(5)}`;
}

export class SignalCache {
  private readonly traffic = new Map<string, TrafficSample>();
  private readonly vehicles = new Map<string, VehicleSafetyRecord>();

  constructor(private readonly maxDistanceKm = DEFAULT_MAX_DISTANCE_KM) {}

  /** Keep the newest sample per grid point */
  putTraffic(samples: readonly TrafficSample[]): void {
    for (const sample of samples) {
      const key = pointKey(sample.coordinate);
      const existing = this.traffic.get(key);
      if (!existing || existing.collectedAt <= sample.collectedAt) {
        this.traffic.set(key, sample);
      }
    }
  }

  /** Latest sample at the grid point nearest `coord`, if within range */
  nearestTraffic(coord: Coordinate): TrafficSample | undefined {
    let best: TrafficSample | undefined;
    let bestKm = this.maxDistanceKm;
    for (const sample of this.traffic.values()) {
      const km = haversineKm(coord, sample.coordinate);
      if (km <= bestKm) {
        best = sample;
        bestKm = km;
      }
    }
    return best;
  }

  /**
   * Index each record by its VIN (when known) and by year/make/model, so a
   * subject can be matched either way.
   */
  putVehicles(records: readonly VehicleSafetyRecord[]): void {
    for (const record of records) {
      this.vehicles.set(vehicleKey(record), record);
      if (record.vin) {
        this.vehicles.set(vehicleKey({ year: record.year, make: record.make, model: record.model }), record);
      }
    }
  }

  vehicle(descriptor: VehicleDescriptor): VehicleSafetyRecord | undefined {
    return this.vehicles.get(vehicleKey(descriptor));
  }

  get size(): { traffic: number; vehicles: number } {
    return { traffic: this.traffic.size, vehicles: this.vehicles.size };
  }
}
