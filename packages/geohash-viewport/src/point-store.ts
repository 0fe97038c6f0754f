import type { FilterPredicate } from "./filter-predicate";
import type { BoundingBox, ClusterRow, LatLng, NearbyPoint, Point } from "./types";

export interface ClusterQuery {
  box: BoundingBox;
  precision: number;
  predicate: FilterPredicate;
}

export interface PointQuery {
  box: BoundingBox;
  predicate: FilterPredicate;
  /** Maximum rows to return. */
  limit: number;
}

export interface NearbyQuery {
  center: LatLng;
  radiusKm: number;
  predicate: FilterPredicate;
  limit: number;
}

export interface NameSearchQuery {
  term: string;
  predicate: FilterPredicate;
  limit: number;
}

export interface TagSearchQuery {
  tag: string;
  predicate: FilterPredicate;
  limit: number;
}

export interface GeohashPrefixQuery {
  /** Lowercase geohash characters. */
  prefix: string;
  predicate: FilterPredicate;
  limit: number;
}

/**
 * Read-only access to fountains. Implementations must be safe to call
 * concurrently and must report connectivity problems as
 * `StoreUnavailableError` instead of returning empty results.
 */
export interface PointStore {
  /**
   * Matching points with a geohash inside the box, grouped by the first
   * `precision` characters of their geohash.
   */
  clusters(query: ClusterQuery): Promise<ClusterRow[]>;
  /** Matching points inside the box, ordered by (lat, lng, id), at most `limit`. */
  points(query: PointQuery): Promise<Point[]>;
  pointById(id: string): Promise<Point | null>;
  /** Matching points within `radiusKm`, nearest first. */
  nearby(query: NearbyQuery): Promise<NearbyPoint[]>;
  /** Case-insensitive substring match on name, ordered by name. */
  searchByName(query: NameSearchQuery): Promise<Point[]>;
  /** Points with a tag containing `tag`, case-insensitively, ordered by name then id. */
  searchByTag(query: TagSearchQuery): Promise<Point[]>;
  /** Points whose geohash starts with `prefix`, ordered by name then id. */
  pointsByGeohashPrefix(query: GeohashPrefixQuery): Promise<Point[]>;
  /** Resolves when the store is reachable. */
  ping(): Promise<void>;
}
