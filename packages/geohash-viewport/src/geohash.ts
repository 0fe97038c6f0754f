import { InvalidInputError } from "./errors";
import type { BoundingBox, LatLng } from "./types";

const BASE32 = "0123456789bcdefghjkmnpqrstuvwxyz";
const BASE32_MAP: Record<string, number> = Object.fromEntries(
  [...BASE32].map((c, i) => [c, i]),
);

/** Precision the ingestion side stores hashes at. */
export const STORED_GEOHASH_PRECISION = 10;

/**
 * Encode a coordinate as a geohash. Bits alternate longitude/latitude,
 * starting with longitude, five bits per character.
 */
export function encodeGeohash(
  lat: number,
  lng: number,
  precision = STORED_GEOHASH_PRECISION,
): string {
  if (!Number.isInteger(precision) || precision < 1 || precision > 12) {
    throw new InvalidInputError(`Geohash precision must be 1..12, got ${precision}`);
  }
  if (!Number.isFinite(lat) || !Number.isFinite(lng) || Math.abs(lat) > 90 || Math.abs(lng) > 180) {
    throw new InvalidInputError(`Cannot encode coordinate (${lat}, ${lng})`);
  }

  let latMin = -90;
  let latMax = 90;
  let lngMin = -180;
  let lngMax = 180;
  let evenBit = true;
  let bit = 0;
  let idx = 0;
  let hash = "";

  while (hash.length < precision) {
    if (evenBit) {
      const mid = (lngMin + lngMax) / 2;
      if (lng >= mid) {
        idx = idx * 2 + 1;
        lngMin = mid;
      } else {
        idx = idx * 2;
        lngMax = mid;
      }
    } else {
      const mid = (latMin + latMax) / 2;
      if (lat >= mid) {
        idx = idx * 2 + 1;
        latMin = mid;
      } else {
        idx = idx * 2;
        latMax = mid;
      }
    }
    evenBit = !evenBit;

    if (++bit === 5) {
      hash += BASE32[idx];
      bit = 0;
      idx = 0;
    }
  }

  return hash;
}

/** Cell bounds of a geohash. */
export function decodeGeohashBounds(geohash: string): BoundingBox {
  let evenBit = true;
  let minLat = -90;
  let maxLat = 90;
  let minLng = -180;
  let maxLng = 180;

  for (const ch of geohash.toLowerCase()) {
    const bits = BASE32_MAP[ch];
    if (bits === undefined) {
      throw new InvalidInputError(`Invalid geohash character "${ch}" in "${geohash}"`);
    }
    for (let n = 4; n >= 0; n--) {
      const bitN = (bits >> n) & 1;
      if (evenBit) {
        const mid = (minLng + maxLng) / 2;
        if (bitN) minLng = mid;
        else maxLng = mid;
      } else {
        const mid = (minLat + maxLat) / 2;
        if (bitN) minLat = mid;
        else maxLat = mid;
      }
      evenBit = !evenBit;
    }
  }

  return { minLat, maxLat, minLng, maxLng };
}

/** Centre of the geohash cell. */
export function decodeGeohash(geohash: string): LatLng {
  const { minLat, maxLat, minLng, maxLng } = decodeGeohashBounds(geohash);
  return { lat: (minLat + maxLat) / 2, lng: (minLng + maxLng) / 2 };
}
