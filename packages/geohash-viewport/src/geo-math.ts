/**
 * Area and precision helpers for viewport classification.
 *
 * The area is a planar approximation (111 km per degree, longitude scaled by
 * the cosine of the mid latitude). It degrades towards the poles, which is
 * acceptable for picking a zoom bucket.
 */

import type { BoundingBox, LatLng } from "./types";

export const KM_PER_DEGREE = 111.0;
export const EARTH_RADIUS_KM = 6371;

const DEG_TO_RAD = Math.PI / 180;

/** Finest precision, used for boxes at or below the smallest threshold. */
export const FINEST_PRECISION = 8;

/**
 * Area thresholds (km², exclusive lower bounds) and the geohash precision
 * used above each one. Checked in order.
 */
export const PRECISION_THRESHOLDS: readonly (readonly [number, number])[] = [
  [1_000_000, 2],
  [100_000, 3],
  [10_000, 4],
  [1_000, 5],
  [100, 6],
  [10, 7],
];

/** Boxes at or below this area are always served as points. */
export const POINTS_ONLY_MAX_AREA_KM2 = 10;

/** Above this area an unforced viewport is aggregated. */
export const AUTO_AGGREGATE_MIN_AREA_KM2 = 1_000;

/** Approximate box area in km². Non-positive for inverted boxes. */
export function viewportArea({ minLat, maxLat, minLng, maxLng }: BoundingBox): number {
  const midLat = (minLat + maxLat) / 2;
  return (
    (maxLat - minLat) *
    KM_PER_DEGREE *
    (maxLng - minLng) *
    KM_PER_DEGREE *
    Math.cos(midLat * DEG_TO_RAD)
  );
}

/** Monotonically non-increasing step function of area, in [2, 8]. */
export function precisionForArea(areaKm2: number): number {
  for (const [threshold, precision] of PRECISION_THRESHOLDS) {
    if (areaKm2 > threshold) return precision;
  }
  return FINEST_PRECISION;
}

/** True when the box has no interior: zero-width, zero-height or inverted. */
export function isDegenerateBox({ minLat, maxLat, minLng, maxLng }: BoundingBox): boolean {
  return !(minLat < maxLat && minLng < maxLng);
}

export function containsPoint(box: BoundingBox, lat: number, lng: number): boolean {
  return (
    lat >= box.minLat && lat <= box.maxLat && lng >= box.minLng && lng <= box.maxLng
  );
}

/** Great-circle distance in kilometres. */
export function haversineKm(a: LatLng, b: LatLng): number {
  const dLat = (b.lat - a.lat) * DEG_TO_RAD;
  const dLng = (b.lng - a.lng) * DEG_TO_RAD;

  const h =
    Math.sin(dLat / 2) ** 2 +
    Math.cos(a.lat * DEG_TO_RAD) * Math.cos(b.lat * DEG_TO_RAD) * Math.sin(dLng / 2) ** 2;

  return EARTH_RADIUS_KM * 2 * Math.atan2(Math.sqrt(h), Math.sqrt(1 - h));
}

/**
 * Box enclosing a circle of `radiusKm` around `center`, clamped to valid
 * coordinates. Used as the index prefilter for nearby searches.
 */
export function radiusToBox(center: LatLng, radiusKm: number): BoundingBox {
  const dLat = radiusKm / KM_PER_DEGREE;
  const cosLat = Math.cos(center.lat * DEG_TO_RAD);
  // Near the poles every longitude is within reach.
  const dLng = cosLat > 1e-9 ? radiusKm / (KM_PER_DEGREE * cosLat) : 360;

  return {
    minLat: Math.max(-90, center.lat - dLat),
    maxLat: Math.min(90, center.lat + dLat),
    minLng: Math.max(-180, center.lng - dLng),
    maxLng: Math.min(180, center.lng + dLng),
  };
}
