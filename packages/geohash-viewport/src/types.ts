/** Moderation state of a fountain. Only `active` is served by default. */
export type PointStatus = "active" | "inactive" | "removed";

export const DEFAULT_STATUS: PointStatus = "active";
export const DEFAULT_POINT_TYPE = "fountain";

/**
 * A single fountain as held by a point store.
 */
export interface Point {
  id: string;
  name: string | null;
  lat: number;
  lng: number;
  /** Base-32 geohash computed at ingestion (precision 10). Null rows never cluster. */
  geohash: string | null;
  /** Usually a {@link PointStatus}; stores may hold values the engine does not know. */
  status: string;
  waterQuality: string | null;
  accessibility: string | null;
  type: string | null;
  tags: string[];
}

/** Point shape returned to map clients in point mode. */
export interface PointRow {
  id: string;
  name: string | null;
  lat: number;
  lng: number;
  geohash: string | null;
  status: string;
  waterQuality: string | null;
  accessibility: string | null;
}

export interface NearbyPoint extends Point {
  distanceKm: number;
}

/** Inclusive bounding box in degrees. */
export interface BoundingBox {
  minLat: number;
  maxLat: number;
  minLng: number;
  maxLng: number;
}

export interface LatLng {
  lat: number;
  lng: number;
}

export type ViewportMode = "aggregate" | "points";

/**
 * Optional attribute allow-lists. An empty list is the same as no list,
 * except that a missing status list means "active only".
 */
export interface FilterSet {
  statuses?: readonly string[];
  waterQualities?: readonly string[];
  accessibilities?: readonly string[];
  types?: readonly string[];
}

export interface Viewport extends BoundingBox {
  mode?: ViewportMode;
  filters?: FilterSet;
}

export interface ViewportQuery extends Viewport {
  /** Point mode only. */
  limit?: number;
}

/** Density bucket for one geohash prefix. */
export interface ClusterRow {
  geohashPrefix: string;
  count: number;
  /** Arithmetic mean of member latitudes. */
  centerLat: number;
  /** Arithmetic mean of member longitudes. */
  centerLng: number;
}

export interface PointPage {
  rows: Point[];
  /** True when more points matched than the limit allowed. */
  truncated: boolean;
}

export type ViewportResult =
  | {
      kind: "aggregated";
      precision: number;
      areaKm2: number;
      rows: ClusterRow[];
    }
  | {
      kind: "pointwise";
      areaKm2: number;
      rows: PointRow[];
      truncated: boolean;
    };

export type HealthStatus =
  | { status: "healthy" }
  | { status: "unhealthy"; error: string };
