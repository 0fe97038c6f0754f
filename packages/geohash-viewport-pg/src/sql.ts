import {
  DEFAULT_STATUS,
  radiusToBox,
  type BoundingBox,
  type ClusterQuery,
  type GeohashPrefixQuery,
  type NameSearchQuery,
  type NearbyQuery,
  type NormalizedFilterSet,
  type PointQuery,
  type TagSearchQuery,
} from "geohash-viewport";

export interface SqlStatement {
  text: string;
  values: unknown[];
}

/** Collects positional parameters while a statement is assembled. */
export class Params {
  readonly values: unknown[] = [];

  add(value: unknown): string {
    this.values.push(value);
    return `$${this.values.length}`;
  }
}

const POINT_COLUMNS = `
    f.id,
    f.name,
    f.latitude::float8 AS lat,
    f.longitude::float8 AS lng,
    f.geohash,
    f.status,
    f.water_quality,
    f.accessibility,
    f.type,
    COALESCE(
      (SELECT array_agg(t.tag ORDER BY t.tag) FROM fountain_tags t WHERE t.fountain_id = f.id),
      '{}'
    ) AS tags`;

/**
 * WHERE fragment for a filter set. A missing status list means active only;
 * other missing lists add no condition.
 */
export function filterClause(filters: NormalizedFilterSet, params: Params): string {
  const parts = [
    filters.statuses
      ? `f.status = ANY(${params.add(filters.statuses)}::text[])`
      : `f.status = ${params.add(DEFAULT_STATUS)}`,
  ];
  if (filters.waterQualities) {
    parts.push(`f.water_quality = ANY(${params.add(filters.waterQualities)}::text[])`);
  }
  if (filters.accessibilities) {
    parts.push(`f.accessibility = ANY(${params.add(filters.accessibilities)}::text[])`);
  }
  if (filters.types) {
    parts.push(`f.type = ANY(${params.add(filters.types)}::text[])`);
  }
  return parts.join("\n      AND ");
}

function boundsClause({ minLat, maxLat, minLng, maxLng }: BoundingBox, params: Params): string {
  return (
    `f.latitude BETWEEN ${params.add(minLat)} AND ${params.add(maxLat)}\n` +
    `      AND f.longitude BETWEEN ${params.add(minLng)} AND ${params.add(maxLng)}`
  );
}

export function clustersStatement({ box, precision, predicate }: ClusterQuery): SqlStatement {
  const params = new Params();
  const prefix = `LEFT(f.geohash, ${params.add(precision)})`;
  const text = `
    SELECT
      ${prefix} AS geohash_prefix,
      COUNT(*)::int AS count,
      AVG(f.latitude)::float8 AS center_lat,
      AVG(f.longitude)::float8 AS center_lng
    FROM fountains f
    WHERE ${boundsClause(box, params)}
      AND f.geohash IS NOT NULL
      AND ${filterClause(predicate.filters, params)}
    GROUP BY 1
    ORDER BY 1 COLLATE "C"`;
  return { text, values: params.values };
}

export function pointsStatement({ box, predicate, limit }: PointQuery): SqlStatement {
  const params = new Params();
  const text = `
    SELECT ${POINT_COLUMNS}
    FROM fountains f
    WHERE ${boundsClause(box, params)}
      AND ${filterClause(predicate.filters, params)}
    ORDER BY f.latitude, f.longitude, f.id COLLATE "C"
    LIMIT ${params.add(limit)}`;
  return { text, values: params.values };
}

export function pointByIdStatement(id: string): SqlStatement {
  const params = new Params();
  const text = `
    SELECT ${POINT_COLUMNS}
    FROM fountains f
    WHERE f.id = ${params.add(id)}`;
  return { text, values: params.values };
}

export function nearbyStatement({ center, radiusKm, predicate, limit }: NearbyQuery): SqlStatement {
  const params = new Params();
  const lat = params.add(center.lat);
  const lng = params.add(center.lng);
  const text = `
    SELECT * FROM (
      SELECT ${POINT_COLUMNS},
        (2 * 6371 * asin(sqrt(
          power(sin(radians(f.latitude::float8 - ${lat}::float8) / 2), 2) +
          cos(radians(${lat}::float8)) * cos(radians(f.latitude::float8)) *
          power(sin(radians(f.longitude::float8 - ${lng}::float8) / 2), 2)
        )))::float8 AS distance_km
      FROM fountains f
      WHERE ${boundsClause(radiusToBox(center, radiusKm), params)}
        AND ${filterClause(predicate.filters, params)}
    ) nearby
    WHERE nearby.distance_km <= ${params.add(radiusKm)}
    ORDER BY nearby.distance_km, nearby.id COLLATE "C"
    LIMIT ${params.add(limit)}`;
  return { text, values: params.values };
}

/** Escape LIKE wildcards so the term matches literally. */
export function escapeLike(term: string): string {
  return term.replace(/[\\%_]/g, (ch) => `\\${ch}`);
}

export function searchByNameStatement({ term, predicate, limit }: NameSearchQuery): SqlStatement {
  const params = new Params();
  const text = `
    SELECT ${POINT_COLUMNS}
    FROM fountains f
    WHERE f.name ILIKE '%' || ${params.add(escapeLike(term))} || '%'
      AND ${filterClause(predicate.filters, params)}
    ORDER BY f.name COLLATE "C", f.id
    LIMIT ${params.add(limit)}`;
  return { text, values: params.values };
}

export function searchByTagStatement({ tag, predicate, limit }: TagSearchQuery): SqlStatement {
  const params = new Params();
  const text = `
    SELECT ${POINT_COLUMNS}
    FROM fountains f
    WHERE EXISTS (
        SELECT 1 FROM fountain_tags t
        WHERE t.fountain_id = f.id
          AND t.tag ILIKE '%' || ${params.add(escapeLike(tag))} || '%'
      )
      AND ${filterClause(predicate.filters, params)}
    ORDER BY f.name COLLATE "C" NULLS LAST, f.id COLLATE "C"
    LIMIT ${params.add(limit)}`;
  return { text, values: params.values };
}

export function geohashPrefixStatement({ prefix, predicate, limit }: GeohashPrefixQuery): SqlStatement {
  const params = new Params();
  const text = `
    SELECT ${POINT_COLUMNS}
    FROM fountains f
    WHERE f.geohash LIKE ${params.add(prefix)} || '%'
      AND ${filterClause(predicate.filters, params)}
    ORDER BY f.name COLLATE "C" NULLS LAST, f.id COLLATE "C"
    LIMIT ${params.add(limit)}`;
  return { text, values: params.values };
}
