/**
 * Traffic observations collected from live flow and incident feeds.
 */

import type { Coordinate } from "./geo.js";

/** Where a traffic sample came from */
export type TrafficSourceTag = "live" | "fallback";

/** Current vs. free-flow speed at one sampling point */
export interface TrafficSample {
  /** Stable identifier derived from coordinate, time and source */
  readonly id: string;
  readonly coordinate: Coordinate;
  /** km/h, >= 0 */
  readonly currentSpeed: number;
  /** km/h, >= 0 */
  readonly freeFlowSpeed: number;
  /** 0 = free flow, 1 = heavy congestion (four-bucket step function) */
  readonly congestionLevel: number;
  readonly roadClosed: boolean;
  /** Source-reported confidence (0-1) */
  readonly confidence: number;
  readonly collectedAt: Date;
  readonly source: TrafficSourceTag;
}

/** Incident categories, mapped from the upstream icon category codes */
export type IncidentCategory =
  | "unknown"
  | "accident"
  | "fog"
  | "dangerous-conditions"
  | "rain"
  | "ice"
  | "jam"
  | "lane-closed"
  | "road-closed"
  | "road-works"
  | "wind"
  | "flooding"
  | "broken-down-vehicle";

/** An active traffic incident near a sampling point */
export interface Incident {
  readonly id: string;
  readonly category: IncidentCategory;
  readonly description: string;
  /** Upstream magnitude of delay, >= 0 */
  readonly severity: number;
  readonly coordinate: Coordinate;
  readonly delaySeconds: number;
  /** First road number the incident affects, when reported */
  readonly road?: string;
  readonly collectedAt: Date;
}
