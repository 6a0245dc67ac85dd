/**
 * Deterministic sampling grid over a disc.
 *
 * Lays a (2·density+1)² axis-aligned grid around a center, spaced by
 * radiusKm/density. Kilometers are converted to degrees with the
 * equirectangular approximation: latitude steps are constant, longitude steps
 * are scaled by 1/cos(center latitude). A grid that would pass a pole is
 * moved toward the equator by whole rows instead.
 */

import type { BoundingBox, Coordinate } from "@roadrisk/types";

/** 1 degree of latitude ≈ 111 km */
export const KM_PER_DEGREE_LAT = 111;

/**
 * Floor for cos(latitude) when scaling longitude steps.
 * cos(89.4°) ≈ 0.0105, so the clamp only matters right at the poles.
 */
export const MIN_LONGITUDE_SCALE = 0.01;

/** Number of points `sampleGrid` returns for a density */
export function gridPointCount(density: number): number {
  const side = 2 * density + 1;
  return side * side;
}

/**
 * Sample a grid of coordinates covering the disc around `center`.
 *
 * Points are ordered row by row from the south-west corner: latitude
 * ascending, then longitude ascending. The center is always included, and
 * `density = 0` returns exactly `[center]`.
 *
 * @param center - Grid center
 * @param radiusKm - Half-width of the grid in kilometers (> 0)
 * @param density - Points on each side of the center per axis (integer >= 0)
 */
export function sampleGrid(
  center: Coordinate,
  radiusKm: number,
  density: number
): Coordinate[] {
  assertCoordinate(center);
  if (!Number.isFinite(radiusKm) || radiusKm <= 0) {
    throw new Error(`radiusKm must be a positive number, got ${radiusKm}`);
  }
  if (!Number.isInteger(density) || density < 0) {
    throw new Error(`density must be a non-negative integer, got ${density}`);
  }

  if (density === 0) return [{ lat: center.lat, lng: center.lng }];

  // Capped so the whole column of rows fits between the poles
  const latStep = Math.min(
    radiusKm / KM_PER_DEGREE_LAT / density,
    180 / (2 * density + 1)
  );
  const rowShift = poleShift(center.lat, latStep, density);
  const scale = Math.max(
    MIN_LONGITUDE_SCALE,
    Math.cos((center.lat * Math.PI) / 180)
  );
  // Keep every column distinct after wrapping at the antimeridian
  const lngStep = Math.min(latStep / scale, 360 / (2 * density + 1));

  const points: Coordinate[] = [];
  for (let i = -density; i <= density; i++) {
    for (let j = -density; j <= density; j++) {
      points.push({
        lat: clampLatitude(center.lat + (i + rowShift) * latStep),
        lng: wrapLongitude(center.lng + j * lngStep),
      });
    }
  }
  return points;
}

/** Throws if a coordinate is outside WGS84 bounds */
export function assertCoordinate(coord: Coordinate): void {
  if (
    !Number.isFinite(coord.lat) ||
    !Number.isFinite(coord.lng) ||
    coord.lat < -90 ||
    coord.lat > 90 ||
    coord.lng < -180 ||
    coord.lng > 180
  ) {
    throw new Error(`Invalid coordinate: ${coord.lat},${coord.lng}`);
  }
}

/**
 * Whole rows to move the grid toward the equator so no row passes a pole.
 * Moving by whole steps keeps the center on a row.
 */
function poleShift(lat: number, latStep: number, density: number): number {
  const north = lat + density * latStep - 90;
  if (north > 0) return -Math.min(density, Math.ceil(north / latStep));
  const south = -90 - (lat - density * latStep);
  if (south > 0) return Math.min(density, Math.ceil(south / latStep));
  return 0;
}

function clampLatitude(lat: number): number {
  return Math.min(90, Math.max(-90, lat));
}

function wrapLongitude(lng: number): number {
  if (lng >= -180 && lng <= 180) return lng;
  return ((((lng + 180) % 360) + 360) % 360) - 180;
}

/**
 * Compute a bounding box from a center coordinate and radius, using the same
 * degree conversion as the grid.
 */
export function bboxFromCenter(center: Coordinate, radiusKm: number): BoundingBox {
  const latDelta = radiusKm / KM_PER_DEGREE_LAT;
  const scale = Math.max(
    MIN_LONGITUDE_SCALE,
    Math.cos((center.lat * Math.PI) / 180)
  );
  const lngDelta = latDelta / scale;

  return {
    minLat: Math.max(-90, center.lat - latDelta),
    maxLat: Math.min(90, center.lat + latDelta),
    minLng: Math.max(-180, center.lng - lngDelta),
    maxLng: Math.min(180, center.lng + lngDelta),
  };
}

const EARTH_RADIUS_KM = 6371;

/**
 * Great-circle distance between two coordinates in kilometers.
 */
export function haversineKm(a: Coordinate, b: Coordinate): number {
  const toRad = Math.PI / 180;
  const dLat = (b.lat - a.lat) * toRad;
  const dLng = (b.lng - a.lng) * toRad;
  const sinHalfLat = Math.sin(dLat / 2);
  const sinHalfLng = Math.sin(dLng / 2);
  const h =
    sinHalfLat * sinHalfLat +
    Math.cos(a.lat * toRad) * Math.cos(b.lat * toRad) * sinHalfLng * sinHalfLng;
  return 2 * EARTH_RADIUS_KM * Math.asin(Math.sqrt(h));
}
