import { InvalidInputError } from "./errors";
import type { FilterPredicate } from "./filter-predicate";
import { isDegenerateBox } from "./geo-math";
import type { Logger } from "./logger";
import type { PointStore } from "./point-store";
import type { BoundingBox, ClusterRow, Point } from "./types";

export const MIN_CLUSTER_PRECISION = 1;
export const MAX_CLUSTER_PRECISION = 12;

export type ClusterablePoint = Pick<Point, "lat" | "lng" | "geohash">;

interface Bucket {
  count: number;
  sumLat: number;
  sumLng: number;
}

/**
 * Group points by the first `precision` characters of their geohash.
 *
 * Points without a geohash are skipped. Each row carries the member count and
 * the plain mean of member coordinates. Rows are sorted by prefix so repeated
 * queries over the same data are identical.
 */
export function groupByGeohashPrefix(
  points: Iterable<ClusterablePoint>,
  precision: number,
): ClusterRow[] {
  const buckets = new Map<string, Bucket>();

  for (const { lat, lng, geohash } of points) {
    if (geohash === null) continue;

    const prefix = geohash.slice(0, precision);
    const bucket = buckets.get(prefix);
    if (bucket) {
      bucket.count++;
      bucket.sumLat += lat;
      bucket.sumLng += lng;
    } else {
      buckets.set(prefix, { count: 1, sumLat: lat, sumLng: lng });
    }
  }

  const rows: ClusterRow[] = [];
  for (const [geohashPrefix, { count, sumLat, sumLng }] of buckets) {
    rows.push({
      geohashPrefix,
      count,
      centerLat: sumLat / count,
      centerLng: sumLng / count,
    });
  }

  return rows.sort((a, b) =>
    a.geohashPrefix < b.geohashPrefix ? -1 : a.geohashPrefix > b.geohashPrefix ? 1 : 0,
  );
}

export function assertClusterPrecision(precision: number): void {
  if (
    !Number.isInteger(precision) ||
    precision < MIN_CLUSTER_PRECISION ||
    precision > MAX_CLUSTER_PRECISION
  ) {
    throw new InvalidInputError(
      `Cluster precision must be an integer in [${MIN_CLUSTER_PRECISION}, ${MAX_CLUSTER_PRECISION}], got ${precision}`,
    );
  }
}

/**
 * Low-zoom path: density counts per geohash prefix. The prefix space at low
 * precision is small, so the result needs no cap.
 */
export class ClusterAggregator {
  constructor(
    private readonly store: PointStore,
    private readonly logger: Logger,
  ) {}

  async aggregate(
    box: BoundingBox,
    precision: number,
    predicate: FilterPredicate,
  ): Promise<ClusterRow[]> {
    assertClusterPrecision(precision);
    if (isDegenerateBox(box)) return [];

    const rows = await this.store.clusters({ box, precision, predicate });
    this.logger.debug("aggregated viewport", { precision, clusters: rows.length });
    return rows;
  }
}
