import { DEFAULT_STATUS, type FilterSet, type Point } from "./types";

/**
 * Filter lists after boundary normalisation. `null` means "no list was
 * given"; an empty array never survives normalisation.
 */
export interface NormalizedFilterSet {
  statuses: readonly string[] | null;
  waterQualities: readonly string[] | null;
  accessibilities: readonly string[] | null;
  types: readonly string[] | null;
}

export type FilterablePoint = Pick<
  Point,
  "status" | "waterQuality" | "accessibility" | "type"
>;

/**
 * A filter condition built once per request. In-memory stores call
 * `matches`; SQL stores translate `filters` into a WHERE clause.
 */
export interface FilterPredicate {
  readonly filters: NormalizedFilterSet;
  matches(point: FilterablePoint): boolean;
}

function normalizeList(values: readonly string[] | undefined): readonly string[] | null {
  if (!values || values.length === 0) return null;
  return [...new Set(values)];
}

export function normalizeFilters(filters: FilterSet = {}): NormalizedFilterSet {
  return {
    statuses: normalizeList(filters.statuses),
    waterQualities: normalizeList(filters.waterQualities),
    accessibilities: normalizeList(filters.accessibilities),
    types: normalizeList(filters.types),
  };
}

function allows(list: readonly string[] | null, value: string | null): boolean {
  if (list === null) return true;
  return value !== null && list.includes(value);
}

/**
 * Build the predicate for a filter set.
 *
 * Without a status list only active points match; every other attribute is
 * unrestricted unless a list is given. Values nobody recognises simply never
 * match.
 */
export function buildFilterPredicate(filters?: FilterSet): FilterPredicate {
  const normalized = normalizeFilters(filters);
  const { statuses, waterQualities, accessibilities, types } = normalized;

  return {
    filters: normalized,
    matches(point) {
      const statusOk =
        statuses === null ? point.status === DEFAULT_STATUS : statuses.includes(point.status);
      return (
        statusOk &&
        allows(waterQualities, point.waterQuality) &&
        allows(accessibilities, point.accessibility) &&
        allows(types, point.type)
      );
    },
  };
}

/** Predicate that applies only the default status rule. */
export const DEFAULT_PREDICATE: FilterPredicate = buildFilterPredicate();
