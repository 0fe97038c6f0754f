import { InvalidInputError } from "./errors";
import type { FilterPredicate } from "./filter-predicate";
import { isDegenerateBox } from "./geo-math";
import type { Logger } from "./logger";
import type { PointStore } from "./point-store";
import type { BoundingBox, Point, PointPage } from "./types";

type SortablePoint = Pick<Point, "id" | "lat" | "lng">;

/** (lat, lng) ascending, then id so equal coordinates keep a stable order. */
export function compareByLatLng(a: SortablePoint, b: SortablePoint): number {
  return a.lat - b.lat || a.lng - b.lng || (a.id < b.id ? -1 : a.id > b.id ? 1 : 0);
}

/**
 * In-memory form of the point query: keep matches, order them, cut at
 * `limit`.
 */
export function selectPoints<T extends Point>(
  points: Iterable<T>,
  predicate: FilterPredicate,
  limit: number,
): T[] {
  const matched: T[] = [];
  for (const point of points) {
    if (predicate.matches(point)) matched.push(point);
  }
  matched.sort(compareByLatLng);
  return matched.length > limit ? matched.slice(0, limit) : matched;
}

/**
 * High-zoom path: individual points, bounded and deterministically ordered.
 *
 * The store is asked for one row more than the limit so callers can tell a
 * full page from a truncated one.
 */
export class PointRetriever {
  constructor(
    private readonly store: PointStore,
    private readonly logger: Logger,
  ) {}

  async retrieve(
    box: BoundingBox,
    predicate: FilterPredicate,
    limit: number,
  ): Promise<PointPage> {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new InvalidInputError(`Point limit must be a positive integer, got ${limit}`);
    }
    if (isDegenerateBox(box)) return { rows: [], truncated: false };

    const rows = await this.store.points({ box, predicate, limit: limit + 1 });
    const truncated = rows.length > limit;
    if (truncated) {
      this.logger.debug("point query truncated", { limit });
    }

    return { rows: truncated ? rows.slice(0, limit) : rows, truncated };
  }
}
