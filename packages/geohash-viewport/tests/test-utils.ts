import { Table } from "apache-arrow";
import { createPointTable, type PointRecord } from "../src/arrow-helpers";
import type { Logger } from "../src/logger";
import type { PointStore } from "../src/point-store";
import type { BoundingBox, Point } from "../src/types";

/** A fountain record with sensible defaults; override what the test cares about. */
export function record(id: string, lat: number, lng: number, extra: Partial<PointRecord> = {}): PointRecord {
  return { id, lat, lng, name: `Fountain ${id}`, ...extra };
}

export function point(id: string, lat: number, lng: number, extra: Partial<Point> = {}): Point {
  return {
    id,
    name: null,
    lat,
    lng,
    geohash: null,
    status: "active",
    waterQuality: null,
    accessibility: null,
    type: "fountain",
    tags: [],
    ...extra,
  };
}

/** Square box of side `deg` degrees centred on the equator at longitude 0..deg. */
export function equatorBox(deg: number): BoundingBox {
  return { minLat: -deg / 2, maxLat: deg / 2, minLng: 0, maxLng: deg };
}

export const WORLD: BoundingBox = { minLat: -90, maxLat: 90, minLng: -180, maxLng: 180 };

/**
 * Generate deterministic pseudo-random records spread across the globe.
 */
export function generateTestRecords(count: number): PointRecord[] {
  const records: PointRecord[] = [];
  let seed = 42;
  const rand = () => {
    seed = (seed * 16807) % 2147483647;
    return seed / 2147483647;
  };

  const qualities = ["potable", "non-potable", null];
  for (let i = 0; i < count; i++) {
    const lng = rand() * 360 - 180;
    const lat = rand() * 170 - 85;
    records.push({
      id: `p${String(i).padStart(5, "0")}`,
      name: `Fountain ${i}`,
      lat,
      lng,
      status: i % 10 === 0 ? "inactive" : "active",
      waterQuality: qualities[i % 3],
    });
  }
  return records;
}

/**
 * Build a multi-chunk fountain table by splitting records into `chunkCount`
 * record batches.
 */
export function buildMultiChunkPointTable(records: PointRecord[], chunkCount: number): Table {
  const chunkSize = Math.ceil(records.length / chunkCount);
  const tables: Table[] = [];

  for (let c = 0; c < chunkCount; c++) {
    const slice = records.slice(c * chunkSize, (c + 1) * chunkSize);
    if (slice.length === 0) continue;
    tables.push(createPointTable(slice));
  }

  return new Table(tables.flatMap((t) => t.batches));
}

export interface RecordedLog {
  level: "debug" | "info" | "warn" | "error";
  message: string;
  context?: Record<string, unknown>;
}

export function recordingLogger(): Logger & { entries: RecordedLog[] } {
  const entries: RecordedLog[] = [];
  const at =
    (level: RecordedLog["level"]) => (message: string, context?: Record<string, unknown>) => {
      entries.push({ level, message, context });
    };
  return {
    entries,
    debug: at("debug"),
    info: at("info"),
    warn: at("warn"),
    error: at("error"),
  };
}

export type StoreCall = keyof PointStore;

/**
 * Store that records which methods were called and delegates to `inner`.
 */
export function spyStore(inner: PointStore): PointStore & { calls: StoreCall[] } {
  const calls: StoreCall[] = [];
  return {
    calls,
    clusters(query) {
      calls.push("clusters");
      return inner.clusters(query);
    },
    points(query) {
      calls.push("points");
      return inner.points(query);
    },
    pointById(id) {
      calls.push("pointById");
      return inner.pointById(id);
    },
    nearby(query) {
      calls.push("nearby");
      return inner.nearby(query);
    },
    searchByName(query) {
      calls.push("searchByName");
      return inner.searchByName(query);
    },
    searchByTag(query) {
      calls.push("searchByTag");
      return inner.searchByTag(query);
    },
    pointsByGeohashPrefix(query) {
      calls.push("pointsByGeohashPrefix");
      return inner.pointsByGeohashPrefix(query);
    },
    ping() {
      calls.push("ping");
      return inner.ping();
    },
  };
}

/** Store whose every call rejects with `error`. */
export function failingStore(error: unknown): PointStore {
  const fail = () => Promise.reject(error);
  return {
    clusters: fail,
    points: fail,
    pointById: fail,
    nearby: fail,
    searchByName: fail,
    searchByTag: fail,
    pointsByGeohashPrefix: fail,
    ping: fail,
  };
}
