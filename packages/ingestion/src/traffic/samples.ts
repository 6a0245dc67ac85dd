import type { Coordinate, TrafficSample, TrafficSourceTag } from "@roadrisk/types";
import { recordId } from "../ids.js";
import { congestionLevel } from "./congestion.js";

/** Conservative defaults used whenever live flow data is unavailable */
export const FALLBACK_FLOW = {
  currentSpeed: 45,
  freeFlowSpeed: 50,
  congestionLevel: 0.1,
  confidence: 0.5,
} as const;

export interface FlowReading {
  coordinate: Coordinate;
  currentSpeed: number;
  freeFlowSpeed: number;
  roadClosed: boolean;
  confidence: number;
  collectedAt: Date;
}

/** Build a live sample, deriving congestion from the speed pair */
export function liveSample(reading: FlowReading): TrafficSample {
  const currentSpeed = Math.max(0, reading.currentSpeed);
  const freeFlowSpeed = Math.max(0, reading.freeFlowSpeed);
  return freeze({
    coordinate: reading.coordinate,
    currentSpeed,
    freeFlowSpeed,
    congestionLevel: congestionLevel(currentSpeed, freeFlowSpeed),
    roadClosed: reading.roadClosed,
    confidence: Math.min(1, Math.max(0, reading.confidence)),
    collectedAt: reading.collectedAt,
    source: "live",
  });
}

/**
 * Fallback sample with fixed defaults. Its congestion level is the fixed
 * 0.1, not derived from the default speeds.
 */
export function fallbackSample(coordinate: Coordinate, collectedAt: Date): TrafficSample {
  return freeze({
    coordinate,
    ...FALLBACK_FLOW,
    roadClosed: false,
    collectedAt,
    source: "fallback",
  });
}

function freeze(fields: Omit<TrafficSample, "id">): TrafficSample {
  const id = trafficSampleId(fields.coordinate, fields.collectedAt, fields.source);
  return Object.freeze({ id, ...fields, coordinate: Object.freeze({ ...fields.coordinate }) });
}

function trafficSampleId(
  coordinate: Coordinate,
  collectedAt: Date,
  source: TrafficSourceTag
): string {
  return recordId(
    "ts",
    coordinate.lat.toFixed(6),
    coordinate.lng.toFixed(6),
    collectedAt.toISOString(),
    source
  );
}
