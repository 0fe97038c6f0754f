import { describe, it, expect } from "vitest";
import {
  DEFAULT_PREDICATE,
  buildFilterPredicate,
  normalizeFilters,
} from "../src/filter-predicate";
import { point } from "./test-utils";

describe("normalizeFilters", () => {
  it("turns missing and empty lists into null", () => {
    expect(normalizeFilters({ statuses: [], types: undefined })).toEqual({
      statuses: null,
      waterQualities: null,
      accessibilities: null,
      types: null,
    });
  });

  it("drops duplicate values", () => {
    expect(normalizeFilters({ waterQualities: ["potable", "potable", "unknown"] }).waterQualities)
      .toEqual(["potable", "unknown"]);
  });
});

describe("buildFilterPredicate", () => {
  const active = point("a", 0, 0, { waterQuality: "potable", accessibility: "wheelchair" });
  const inactive = point("b", 0, 0, { status: "inactive", waterQuality: "potable" });
  const unknownQuality = point("c", 0, 0);

  it("matches only active points by default", () => {
    expect(DEFAULT_PREDICATE.matches(active)).toBe(true);
    expect(DEFAULT_PREDICATE.matches(inactive)).toBe(false);
    expect(DEFAULT_PREDICATE.matches(unknownQuality)).toBe(true);
  });

  it("treats an empty status list as absent", () => {
    expect(buildFilterPredicate({ statuses: [] }).matches(inactive)).toBe(false);
  });

  it("replaces the default status rule when statuses are given", () => {
    const p = buildFilterPredicate({ statuses: ["inactive"] });
    expect(p.matches(inactive)).toBe(true);
    expect(p.matches(active)).toBe(false);
  });

  it("combines attribute lists with the default status rule", () => {
    const p = buildFilterPredicate({ waterQualities: ["potable"] });
    expect(p.matches(active)).toBe(true);
    expect(p.matches(inactive)).toBe(false);
    expect(p.matches(unknownQuality)).toBe(false);
  });

  it("requires every given list to match", () => {
    const p = buildFilterPredicate({
      waterQualities: ["potable"],
      accessibilities: ["stairs"],
    });
    expect(p.matches(active)).toBe(false);
  });

  it("matches nothing for unrecognised values", () => {
    const p = buildFilterPredicate({ statuses: ["bogus"] });
    expect([active, inactive, unknownQuality].some((pt) => p.matches(pt))).toBe(false);
  });

  it("filters on type", () => {
    const p = buildFilterPredicate({ types: ["bottle_filler"] });
    expect(p.matches(active)).toBe(false);
    expect(p.matches(point("d", 0, 0, { type: "bottle_filler" }))).toBe(true);
  });

  it("exposes the normalized filters for SQL stores", () => {
    expect(buildFilterPredicate({ types: ["fountain"] }).filters).toEqual({
      statuses: null,
      waterQualities: null,
      accessibilities: null,
      types: ["fountain"],
    });
  });
});
