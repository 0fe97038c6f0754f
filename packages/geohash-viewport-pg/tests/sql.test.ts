import { describe, it, expect } from "vitest";
import { DEFAULT_PREDICATE, buildFilterPredicate } from "geohash-viewport";
import {
  clustersStatement,
  escapeLike,
  geohashPrefixStatement,
  nearbyStatement,
  pointByIdStatement,
  pointsStatement,
  searchByNameStatement,
  searchByTagStatement,
} from "../src/sql";

const BOX = { minLat: 10, maxLat: 11, minLng: 20, maxLng: 21 };

describe("pointsStatement", () => {
  it("binds bounds, the default status and the limit", () => {
    const { text, values } = pointsStatement({ box: BOX, predicate: DEFAULT_PREDICATE, limit: 11 });

    expect(values).toEqual([10, 11, 20, 21, "active", 11]);
    expect(text).toContain("f.latitude BETWEEN $1 AND $2");
    expect(text).toContain("f.longitude BETWEEN $3 AND $4");
    expect(text).toContain("f.status = $5");
    expect(text).toContain('ORDER BY f.latitude, f.longitude, f.id COLLATE "C"');
    expect(text).toContain("LIMIT $6");
  });

  it("binds each given filter list as a text array", () => {
    const predicate = buildFilterPredicate({
      statuses: ["inactive"],
      waterQualities: ["potable"],
      types: ["bottle_filler"],
    });
    const { text, values } = pointsStatement({ box: BOX, predicate, limit: 5 });

    expect(values).toEqual([10, 11, 20, 21, ["inactive"], ["potable"], ["bottle_filler"], 5]);
    expect(text).toContain("f.status = ANY($5::text[])");
    expect(text).toContain("f.water_quality = ANY($6::text[])");
    expect(text).toContain("f.type = ANY($7::text[])");
    expect(text).not.toContain("f.accessibility = ANY");
    expect(text).toContain("LIMIT $8");
  });
});

describe("clustersStatement", () => {
  it("groups by a bound geohash prefix and skips null hashes", () => {
    const { text, values } = clustersStatement({
      box: BOX,
      precision: 4,
      predicate: buildFilterPredicate({ accessibilities: ["wheelchair"] }),
    });

    expect(values).toEqual([4, 10, 11, 20, 21, "active", ["wheelchair"]]);
    expect(text).toContain("LEFT(f.geohash, $1) AS geohash_prefix");
    expect(text).toContain("f.geohash IS NOT NULL");
    expect(text).toContain("f.accessibility = ANY($7::text[])");
    expect(text).toContain('ORDER BY 1 COLLATE "C"');
  });
});

describe("nearbyStatement", () => {
  it("prefilters with the enclosing box and binds radius and limit last", () => {
    const { text, values } = nearbyStatement({
      center: { lat: 0, lng: 0 },
      radiusKm: 111,
      predicate: DEFAULT_PREDICATE,
      limit: 50,
    });

    expect(values).toEqual([0, 0, -1, 1, -1, 1, "active", 111, 50]);
    expect(text).toContain("nearby.distance_km <= $8");
    expect(text).toContain("LIMIT $9");
  });
});

describe("pointByIdStatement", () => {
  it("binds the id", () => {
    const { text, values } = pointByIdStatement("f-1");
    expect(values).toEqual(["f-1"]);
    expect(text).toContain("WHERE f.id = $1");
  });
});

describe("searchByNameStatement", () => {
  it("matches the escaped term anywhere in the name", () => {
    const { text, values } = searchByNameStatement({
      term: "50%_off",
      predicate: DEFAULT_PREDICATE,
      limit: 50,
    });
    expect(values).toEqual(["50\\%\\_off", "active", 50]);
    expect(text).toContain("f.name ILIKE '%' || $1 || '%'");
  });
});

describe("searchByTagStatement", () => {
  it("matches the escaped tag inside fountain_tags", () => {
    const { text, values } = searchByTagStatement({
      tag: "dog_bowl",
      predicate: DEFAULT_PREDICATE,
      limit: 50,
    });

    expect(values).toEqual(["dog\\_bowl", "active", 50]);
    expect(text).toContain("WHERE t.fountain_id = f.id");
    expect(text).toContain("AND t.tag ILIKE '%' || $1 || '%'");
    expect(text).toContain("f.status = $2");
    expect(text).toContain('ORDER BY f.name COLLATE "C" NULLS LAST, f.id COLLATE "C"');
    expect(text).toContain("LIMIT $3");
  });
});

describe("geohashPrefixStatement", () => {
  it("anchors the prefix at the start of the geohash", () => {
    const { text, values } = geohashPrefixStatement({
      prefix: "u2ed",
      predicate: buildFilterPredicate({ waterQualities: ["potable"] }),
      limit: 10,
    });

    expect(values).toEqual(["u2ed", "active", ["potable"], 10]);
    expect(text).toContain("WHERE f.geohash LIKE $1 || '%'");
    expect(text).toContain("f.water_quality = ANY($3::text[])");
    expect(text).toContain("LIMIT $4");
  });
});

describe("escapeLike", () => {
  it("escapes wildcards and backslashes", () => {
    expect(escapeLike("a\\b%c_d")).toBe("a\\\\b\\%c\\_d");
  });

  it("leaves plain text alone", () => {
    expect(escapeLike("Trevi")).toBe("Trevi");
  });
});
