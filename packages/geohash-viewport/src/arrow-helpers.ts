import {
  Field,
  List,
  Table,
  Utf8,
  Vector,
  makeVector,
  vectorFromArray,
} from "apache-arrow";
import { STORED_GEOHASH_PRECISION, encodeGeohash } from "./geohash";
import { DEFAULT_POINT_TYPE, DEFAULT_STATUS } from "./types";

/** Column names of a fountain table. */
export interface PointColumnNames {
  id: string;
  name: string;
  lat: string;
  lng: string;
  geohash: string;
  status: string;
  waterQuality: string;
  accessibility: string;
  type: string;
  tags: string;
}

export const DEFAULT_POINT_COLUMNS: PointColumnNames = {
  id: "id",
  name: "name",
  lat: "lat",
  lng: "lng",
  geohash: "geohash",
  status: "status",
  waterQuality: "water_quality",
  accessibility: "accessibility",
  type: "type",
  tags: "tags",
};

/**
 * Read a Float64 column into a flat buffer.
 *
 * Single-chunk columns without nulls return the internal buffer (zero copy).
 * Anything else is copied row by row; nulls become NaN.
 */
export function getFloat64Buffer({ col }: { col: Vector }): Float64Array {
  const chunks = col.data;

  if (chunks.length === 1) {
    const chunk = chunks[0];
    const values: unknown = chunk.values;
    if (values instanceof Float64Array && chunk.nullCount === 0) {
      const start = chunk.offset ?? 0;
      const end = start + chunk.length;
      if (start === 0 && end === values.length) return values;
      return values.subarray(start, end);
    }
  }

  const out = new Float64Array(col.length);
  for (let i = 0; i < col.length; i++) {
    const v: unknown = col.get(i);
    out[i] = typeof v === "number" ? v : NaN;
  }
  return out;
}

/** Read a string column; a missing column reads as all nulls. */
export function getStringValues(col: Vector | null, length: number): (string | null)[] {
  const out = new Array<string | null>(length).fill(null);
  if (!col) return out;
  for (let i = 0; i < length; i++) {
    const v: unknown = col.get(i);
    if (typeof v === "string") out[i] = v;
  }
  return out;
}

/** Read a List<Utf8> column; nulls and a missing column read as empty lists. */
export function getStringListValues(col: Vector | null, length: number): string[][] {
  const out: string[][] = [];
  for (let i = 0; i < length; i++) {
    const v: unknown = col ? col.get(i) : null;
    const items: string[] = [];
    if (v instanceof Vector) {
      for (const item of v) {
        if (typeof item === "string") items.push(item);
      }
    }
    out.push(items);
  }
  return out;
}

/** Raw fountain as produced by ingestion. */
export interface PointRecord {
  id: string;
  name?: string | null;
  lat: number;
  lng: number;
  /** Omitted: encoded from lat/lng. `null`: stored as null (not clusterable). */
  geohash?: string | null;
  status?: string;
  waterQuality?: string | null;
  accessibility?: string | null;
  type?: string | null;
  tags?: string[];
}

export interface CreatePointTableOptions {
  /** Precision used when a record carries no geohash. Default: 10 */
  geohashPrecision?: number;
}

/**
 * Build a fountain table with the default column layout
 * ({@link DEFAULT_POINT_COLUMNS}).
 */
export function createPointTable(
  records: readonly PointRecord[],
  { geohashPrecision = STORED_GEOHASH_PRECISION }: CreatePointTableOptions = {},
): Table {
  const utf8 = (values: (string | null)[]) => vectorFromArray(values, new Utf8());

  const lats = new Float64Array(records.length);
  const lngs = new Float64Array(records.length);
  records.forEach((r, i) => {
    lats[i] = r.lat;
    lngs[i] = r.lng;
  });

  const tagsType = new List(new Field("item", new Utf8(), true));

  return new Table({
    id: utf8(records.map((r) => r.id)),
    name: utf8(records.map((r) => r.name ?? null)),
    lat: makeVector(lats),
    lng: makeVector(lngs),
    geohash: utf8(
      records.map((r) =>
        r.geohash === undefined ? encodeGeohash(r.lat, r.lng, geohashPrecision) : r.geohash,
      ),
    ),
    status: utf8(records.map((r) => r.status ?? DEFAULT_STATUS)),
    water_quality: utf8(records.map((r) => r.waterQuality ?? null)),
    accessibility: utf8(records.map((r) => r.accessibility ?? null)),
    type: utf8(records.map((r) => (r.type === undefined ? DEFAULT_POINT_TYPE : r.type))),
    tags: vectorFromArray(
      records.map((r) => r.tags ?? []),
      tagsType,
    ),
  });
}
