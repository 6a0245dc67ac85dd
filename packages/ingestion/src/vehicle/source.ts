import type { VehicleDescriptor, VehicleSafetyRecord } from "@roadrisk/types";

/**
 * A provider of vehicle crash-safety ratings.
 *
 * `rate` always resolves with a record; its `source` tag tells a live rating
 * apart from a synthesized default or an error fallback.
 */
export interface VehicleSafetySource {
  readonly name: string;
  rate(vehicle: VehicleDescriptor, signal?: AbortSignal): Promise<VehicleSafetyRecord>;
}
