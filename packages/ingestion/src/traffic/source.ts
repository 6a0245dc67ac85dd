/**
 * Traffic data source capabilities.
 *
 * A flow source must always produce a sample: on any failure it returns a
 * fallback-tagged sample instead of rejecting. An incident source degrades
 * to "no known incidents".
 */

import type { Coordinate, Incident, TrafficSample } from "@roadrisk/types";

export interface TrafficFlowSource {
  /** Human-readable name */
  readonly name: string;
  /** Current flow at a coordinate. Never rejects. */
  fetch(coordinate: Coordinate, signal?: AbortSignal): Promise<TrafficSample>;
}

export interface IncidentSource {
  readonly name: string;
  /** Active incidents within `radiusKm`. Never rejects; failure yields []. */
  fetch(
    coordinate: Coordinate,
    radiusKm: number,
    signal?: AbortSignal
  ): Promise<Incident[]>;
}
