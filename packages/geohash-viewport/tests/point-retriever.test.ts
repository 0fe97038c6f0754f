import { describe, it, expect } from "vitest";
import { ArrowPointStore } from "../src/arrow-point-store";
import { InvalidInputError } from "../src/errors";
import { DEFAULT_PREDICATE } from "../src/filter-predicate";
import { silentLogger } from "../src/logger";
import { PointRetriever, compareByLatLng, selectPoints } from "../src/point-retriever";
import { point, record, spyStore } from "./test-utils";

const BOX = { minLat: 0, maxLat: 1, minLng: 0, maxLng: 1 };

const records = [
  record("d", 0.4, 0.1),
  record("b", 0.2, 0.9),
  record("a", 0.2, 0.3),
  record("c", 0.2, 0.3),
  record("x", 0.5, 0.5, { status: "removed" }),
];

describe("compareByLatLng", () => {
  it("orders by latitude, then longitude, then id", () => {
    const sorted = [
      point("z", 1, 1),
      point("b", 0, 5),
      point("a", 0, 5),
      point("c", 0, 2),
    ].sort(compareByLatLng);
    expect(sorted.map((p) => p.id)).toEqual(["c", "a", "b", "z"]);
  });
});

describe("selectPoints", () => {
  it("filters, orders and cuts at the limit", () => {
    const points = [
      point("late", 2, 0),
      point("early", 1, 0),
      point("gone", 0, 0, { status: "removed" }),
    ];
    expect(selectPoints(points, DEFAULT_PREDICATE, 1).map((p) => p.id)).toEqual(["early"]);
  });
});

describe("PointRetriever", () => {
  it("returns matching points ordered by (lat, lng)", async () => {
    const retriever = new PointRetriever(ArrowPointStore.fromRecords(records), silentLogger);
    const page = await retriever.retrieve(BOX, DEFAULT_PREDICATE, 10);
    expect(page.rows.map((p) => p.id)).toEqual(["a", "c", "b", "d"]);
    expect(page.truncated).toBe(false);
  });

  it("flags truncation when more points match than the limit", async () => {
    const retriever = new PointRetriever(ArrowPointStore.fromRecords(records), silentLogger);
    const page = await retriever.retrieve(BOX, DEFAULT_PREDICATE, 3);
    expect(page.rows.map((p) => p.id)).toEqual(["a", "c", "b"]);
    expect(page.truncated).toBe(true);
  });

  it("does not flag an exactly full page", async () => {
    const retriever = new PointRetriever(ArrowPointStore.fromRecords(records), silentLogger);
    const page = await retriever.retrieve(BOX, DEFAULT_PREDICATE, 4);
    expect(page.rows).toHaveLength(4);
    expect(page.truncated).toBe(false);
  });

  it("includes points on the box edges", async () => {
    const retriever = new PointRetriever(
      ArrowPointStore.fromRecords([record("corner", 1, 1), record("outside", 1.01, 1)]),
      silentLogger,
    );
    const page = await retriever.retrieve(BOX, DEFAULT_PREDICATE, 10);
    expect(page.rows.map((p) => p.id)).toEqual(["corner"]);
  });

  it.each([0, -1, 2.5])("rejects limit %d before touching the store", async (limit) => {
    const store = spyStore(ArrowPointStore.fromRecords(records));
    await expect(
      new PointRetriever(store, silentLogger).retrieve(BOX, DEFAULT_PREDICATE, limit),
    ).rejects.toThrow(InvalidInputError);
    expect(store.calls).toEqual([]);
  });

  it("returns an empty page for an inverted box", async () => {
    const store = spyStore(ArrowPointStore.fromRecords(records));
    const page = await new PointRetriever(store, silentLogger).retrieve(
      { minLat: 1, maxLat: 0, minLng: 0, maxLng: 1 },
      DEFAULT_PREDICATE,
      10,
    );
    expect(page).toEqual({ rows: [], truncated: false });
    expect(store.calls).toEqual([]);
  });
});
