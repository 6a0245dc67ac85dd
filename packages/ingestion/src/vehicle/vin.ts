/**
 * VIN decoding via the NHTSA vPIC API.
 */

import type { VehicleDescriptor, VehicleSafetyRecord } from "@roadrisk/types";
import { firstRecord, isRecord, numberField, stringField } from "../http/json.js";
import type { UpstreamClient } from "../http/upstream-client.js";
import type { VehicleSafetySource } from "./source.js";

/** 17 characters, no I, O or Q */
const VIN_PATTERN = /^[A-HJ-NPR-Z0-9]{17}$/;

export function isValidVin(vin: string): boolean {
  return VIN_PATTERN.test(vin.toUpperCase());
}

export class VinDecoder {
  /** @param client - Client for https://vpic.nhtsa.dot.gov/api/vehicles */
  constructor(private readonly client: UpstreamClient) {}

  /**
   * Resolve a VIN to year/make/model.
   * Throws when the VIN is malformed or the decode yields no vehicle, so a
   * sweep records the VIN as failed and can retry it.
   */
  async decode(vin: string, signal?: AbortSignal): Promise<VehicleDescriptor> {
    const normalized = vin.trim().toUpperCase();
    if (!isValidVin(normalized)) {
      throw new Error(`Malformed VIN: ${vin}`);
    }

    const data = await this.client.get(
      `/DecodeVinValues/${normalized}`,
      { format: "json" },
      signal,
    );
    const result = isRecord(data) ? firstRecord(data, "Results") : undefined;
    const make = result && stringField(result, "Make");
    const model = result && stringField(result, "Model");
    const year = result && numberField(result, "ModelYear");
    if (!make || !model || year === undefined) {
      throw new Error(`VIN ${normalized} could not be decoded`);
    }

    return { vin: normalized, year, make, model };
  }
}

/** Decode a VIN, then rate the vehicle it names */
export async function rateVin(
  vin: string,
  decoder: VinDecoder,
  source: VehicleSafetySource,
  signal?: AbortSignal,
): Promise<VehicleSafetyRecord> {
  const vehicle = await decoder.decode(vin, signal);
  return source.rate(vehicle, signal);
}
