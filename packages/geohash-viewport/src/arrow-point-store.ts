import KDBush from "kdbush";
import type { Table } from "apache-arrow";
import {
  DEFAULT_POINT_COLUMNS,
  createPointTable,
  getFloat64Buffer,
  getStringListValues,
  getStringValues,
  type CreatePointTableOptions,
  type PointColumnNames,
  type PointRecord,
} from "./arrow-helpers";
import { groupByGeohashPrefix } from "./cluster-aggregator";
import type { FilterPredicate } from "./filter-predicate";
import { haversineKm, radiusToBox } from "./geo-math";
import type {
  ClusterQuery,
  GeohashPrefixQuery,
  NameSearchQuery,
  NearbyQuery,
  PointQuery,
  PointStore,
  TagSearchQuery,
} from "./point-store";
import { selectPoints } from "./point-retriever";
import {
  DEFAULT_POINT_TYPE,
  DEFAULT_STATUS,
  type BoundingBox,
  type ClusterRow,
  type NearbyPoint,
  type Point,
} from "./types";

/**
 * Options for configuring the ArrowPointStore.
 */
export interface ArrowPointStoreOptions {
  /** Column name overrides. Default: {@link DEFAULT_POINT_COLUMNS} */
  columns?: Partial<PointColumnNames>;
  /** KDBush node size. Default: 64 */
  nodeSize?: number;
}

function* matching<T extends Point>(
  points: Iterable<T>,
  predicate: FilterPredicate,
): Generator<T> {
  for (const point of points) {
    if (predicate.matches(point)) yield point;
  }
}

function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

// Null names sort last.
function compareByName(a: Point, b: Point): number {
  if (a.name !== b.name) {
    if (a.name === null) return 1;
    if (b.name === null) return -1;
  }
  return compareText(a.name ?? "", b.name ?? "") || compareText(a.id, b.id);
}

/**
 * In-memory point store over an Apache Arrow table.
 *
 * Columns are read once at construction and a KDBush index is built over
 * (lng, lat). Rows whose coordinates are not finite stay reachable by id but
 * are left out of the index.
 */
export class ArrowPointStore implements PointStore {
  private readonly index: KDBush;
  // KDBush item id -> table row
  private readonly indexRows: Uint32Array;
  private readonly rowById = new Map<string, number>();

  private readonly ids: string[];
  private readonly names: (string | null)[];
  private readonly lats: Float64Array;
  private readonly lngs: Float64Array;
  private readonly geohashes: (string | null)[];
  private readonly statuses: (string | null)[];
  private readonly waterQualities: (string | null)[];
  private readonly accessibilities: (string | null)[];
  private readonly types: (string | null)[];
  private readonly tags: string[][];

  readonly numRows: number;

  static fromRecords(
    records: readonly PointRecord[],
    options: ArrowPointStoreOptions & CreatePointTableOptions = {},
  ): ArrowPointStore {
    return new ArrowPointStore(createPointTable(records, options), options);
  }

  constructor(table: Table, options: ArrowPointStoreOptions = {}) {
    const columns = { ...DEFAULT_POINT_COLUMNS, ...options.columns };
    const numRows = table.numRows;
    this.numRows = numRows;

    const required = (name: string) => {
      const col = table.getChild(name);
      if (!col) {
        throw new Error(`Column "${name}" not found in Arrow Table`);
      }
      return col;
    };

    const ids = getStringValues(required(columns.id), numRows);
    this.ids = ids.map((id, row) => {
      if (id === null) {
        throw new Error(`Row ${row} has a null "${columns.id}"`);
      }
      return id;
    });
    this.lats = getFloat64Buffer({ col: required(columns.lat) });
    this.lngs = getFloat64Buffer({ col: required(columns.lng) });

    this.names = getStringValues(table.getChild(columns.name), numRows);
    this.geohashes = getStringValues(table.getChild(columns.geohash), numRows);
    this.statuses = getStringValues(table.getChild(columns.status), numRows);
    this.waterQualities = getStringValues(table.getChild(columns.waterQuality), numRows);
    this.accessibilities = getStringValues(table.getChild(columns.accessibility), numRows);
    const typeCol = table.getChild(columns.type);
    this.types = typeCol
      ? getStringValues(typeCol, numRows)
      : new Array<string | null>(numRows).fill(DEFAULT_POINT_TYPE);
    this.tags = getStringListValues(table.getChild(columns.tags), numRows);

    const indexed: number[] = [];
    for (let row = 0; row < numRows; row++) {
      if (!this.rowById.has(this.ids[row])) this.rowById.set(this.ids[row], row);
      if (Number.isFinite(this.lats[row]) && Number.isFinite(this.lngs[row])) {
        indexed.push(row);
      }
    }

    this.indexRows = Uint32Array.from(indexed);
    this.index = new KDBush(indexed.length, options.nodeSize ?? 64, Float64Array);
    for (const row of indexed) {
      this.index.add(this.lngs[row], this.lats[row]);
    }
    this.index.finish();
  }

  /** Number of rows with usable coordinates. */
  get indexedPointCount(): number {
    return this.indexRows.length;
  }

  async clusters({ box, precision, predicate }: ClusterQuery): Promise<ClusterRow[]> {
    return groupByGeohashPrefix(matching(this.scan(box), predicate), precision);
  }

  async points({ box, predicate, limit }: PointQuery): Promise<Point[]> {
    return selectPoints(this.scan(box), predicate, limit);
  }

  async pointById(id: string): Promise<Point | null> {
    const row = this.rowById.get(id);
    return row === undefined ? null : this.rowAt(row);
  }

  async nearby({ center, radiusKm, predicate, limit }: NearbyQuery): Promise<NearbyPoint[]> {
    const results: NearbyPoint[] = [];
    for (const point of matching(this.scan(radiusToBox(center, radiusKm)), predicate)) {
      const distanceKm = haversineKm(center, point);
      if (distanceKm <= radiusKm) results.push({ ...point, distanceKm });
    }
    results.sort((a, b) => a.distanceKm - b.distanceKm || compareText(a.id, b.id));
    return results.slice(0, limit);
  }

  async searchByName({ term, predicate, limit }: NameSearchQuery): Promise<Point[]> {
    const needle = term.toLowerCase();
    return this.filterByName(
      (row) => this.names[row]?.toLowerCase().includes(needle) ?? false,
      predicate,
      limit,
    );
  }

  async searchByTag({ tag, predicate, limit }: TagSearchQuery): Promise<Point[]> {
    const needle = tag.toLowerCase();
    return this.filterByName(
      (row) => this.tags[row].some((t) => t.toLowerCase().includes(needle)),
      predicate,
      limit,
    );
  }

  async pointsByGeohashPrefix({ prefix, predicate, limit }: GeohashPrefixQuery): Promise<Point[]> {
    return this.filterByName(
      (row) => this.geohashes[row]?.startsWith(prefix) ?? false,
      predicate,
      limit,
    );
  }

  async ping(): Promise<void> {}

  /** Full scan of rows passing `test` and the predicate, ordered by name then id. */
  private filterByName(
    test: (row: number) => boolean,
    predicate: FilterPredicate,
    limit: number,
  ): Point[] {
    const results: Point[] = [];
    for (let row = 0; row < this.numRows; row++) {
      if (!test(row)) continue;
      const point = this.rowAt(row);
      if (predicate.matches(point)) results.push(point);
    }
    results.sort(compareByName);
    return results.slice(0, limit);
  }

  /** Points inside the box (edges inclusive), in index order. */
  private *scan({ minLat, maxLat, minLng, maxLng }: BoundingBox): Generator<Point> {
    for (const id of this.index.range(minLng, minLat, maxLng, maxLat)) {
      yield this.rowAt(this.indexRows[id]);
    }
  }

  private rowAt(row: number): Point {
    return {
      id: this.ids[row],
      name: this.names[row],
      lat: this.lats[row],
      lng: this.lngs[row],
      geohash: this.geohashes[row],
      status: this.statuses[row] ?? DEFAULT_STATUS,
      waterQuality: this.waterQualities[row],
      accessibility: this.accessibilities[row],
      type: this.types[row],
      tags: [...this.tags[row]],
    };
  }
}
