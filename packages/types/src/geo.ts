/**
 * Geographic utility types.
 */

/** A WGS84 point. Latitude in [-90, 90], longitude in [-180, 180]. */
export interface Coordinate {
  readonly lat: number;
  readonly lng: number;
}

/** Axis-aligned bounding box in WGS84 coordinates */
export interface BoundingBox {
  minLat: number;
  maxLat: number;
  minLng: number;
  maxLng: number;
}
