/**
 * TomTom Traffic Flow source.
 *
 * Queries the flow-segment endpoint for the road segment nearest a point and
 * derives congestion from current vs. free-flow speed. Any transport or
 * parse failure yields a fallback-tagged sample.
 */

import type { Coordinate, TrafficSample } from "@roadrisk/types";
import { errorMessage } from "../errors.js";
import { isRecord, numberField } from "../http/json.js";
import type { UpstreamClient } from "../http/upstream-client.js";
import type { TrafficFlowSource } from "./source.js";
import { fallbackSample, liveSample } from "./samples.js";

export interface TomTomFlowSourceOptions {
  client: UpstreamClient;
  /** Map zoom level the segment is resolved at (default: 10) */
  zoom?: number;
  /** Injectable clock for testability */
  now?: () => Date;
}

/** Used when the segment omits a field */
const MISSING_FREE_FLOW_SPEED = 50;
const MISSING_CONFIDENCE = 0.8;

export class TomTomFlowSource implements TrafficFlowSource {
  readonly name = "TomTom Traffic Flow";

  private readonly client: UpstreamClient;
  private readonly zoom: number;
  private readonly now: () => Date;

  constructor(options: TomTomFlowSourceOptions) {
    this.client = options.client;
    this.zoom = options.zoom ?? 10;
    this.now = options.now ?? (() => new Date());
  }

  async fetch(coordinate: Coordinate, signal?: AbortSignal): Promise<TrafficSample> {
    const point = `${coordinate.lat},${coordinate.lng}`;
    try {
      const data = await this.client.get(
        `/traffic/services/4/flowSegmentData/absolute/${this.zoom}/json`,
        { point, unit: "KMPH" },
        signal,
      );
      const segment = isRecord(data) ? data["flowSegmentData"] : undefined;
      if (!isRecord(segment)) {
        console.warn(`[traffic] No flow segment at ${point} — using fallback`);
        return fallbackSample(coordinate, this.now());
      }

      return liveSample({
        coordinate,
        currentSpeed: numberField(segment, "currentSpeed") ?? 0,
        freeFlowSpeed: numberField(segment, "freeFlowSpeed") ?? MISSING_FREE_FLOW_SPEED,
        roadClosed: segment["roadClosure"] === true,
        confidence: numberField(segment, "confidence") ?? MISSING_CONFIDENCE,
        collectedAt: this.now(),
      });
    } catch (err) {
      console.warn(`[traffic] Flow lookup failed at ${point}: ${errorMessage(err)} — using fallback`);
      return fallbackSample(coordinate, this.now());
    }
  }
}
