import { z } from "zod";
import { InvalidInputError } from "./errors";
import type { BoundingBox, LatLng, ViewportQuery } from "./types";

/** Wire names accepted alongside the camelCase ones. */
const WIRE_NAMES = new Map<string, string>([
  ["min_lat", "minLat"],
  ["max_lat", "maxLat"],
  ["min_lng", "minLng"],
  ["max_lng", "maxLng"],
  ["mode_override", "mode"],
  ["water_qualities", "waterQualities"],
  ["max_results", "limit"],
  ["geohash_precision", "precision"],
]);

function normalizeKeys(input: unknown): unknown {
  if (input === null || typeof input !== "object" || Array.isArray(input)) return input;
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(input)) {
    out[WIRE_NAMES.get(key) ?? key] = value;
  }
  return out;
}

const latitude = z.number().finite().min(-90).max(90);
const longitude = z.number().finite().min(-180).max(180);
const stringList = z
  .array(z.string())
  .nullish()
  .transform((v) => v ?? undefined);

const GEOHASH_PREFIX = /^[0-9b-hjkmnp-z]{1,12}$/;

export const limitSchema = z.number().int().positive();
export const precisionSchema = z.number().int().min(1).max(12);
export const radiusSchema = z.number().finite().positive();
export const searchTermSchema = z.string().trim().min(1);

export const boundsSchema = z.object({
  minLat: latitude,
  maxLat: latitude,
  minLng: longitude,
  maxLng: longitude,
});

export const centerSchema = z.object({
  lat: latitude,
  lng: longitude,
});

export const geohashPrefixSchema = z
  .string()
  .trim()
  .toLowerCase()
  .regex(GEOHASH_PREFIX, "Expected 1 to 12 geohash characters");

const filterLists = {
  statuses: stringList,
  waterQualities: stringList,
  accessibilities: stringList,
  types: stringList,
};

const modeSchema = z
  .preprocess(
    (v) => (typeof v === "string" ? v.toLowerCase() : v),
    z.enum(["aggregate", "points"]).nullish(),
  )
  .transform((v) => v ?? undefined);

/**
 * Filters may arrive flat or nested under `filters`. A flat list wins over
 * its nested counterpart. Unknown keys are rejected at both levels.
 */
export const viewportQuerySchema = z.preprocess(
  normalizeKeys,
  boundsSchema
    .extend({
      mode: modeSchema,
      ...filterLists,
      filters: z.preprocess(normalizeKeys, z.object(filterLists).strict()).nullish(),
      limit: limitSchema.optional(),
    })
    .strict()
    .transform(
      ({ statuses, waterQualities, accessibilities, types, filters, ...rest }): ViewportQuery => ({
        ...rest,
        filters: {
          statuses: statuses ?? filters?.statuses,
          waterQualities: waterQualities ?? filters?.waterQualities,
          accessibilities: accessibilities ?? filters?.accessibilities,
          types: types ?? filters?.types,
        },
      }),
    ),
);

const clusterCountsRequestSchema = z.preprocess(
  normalizeKeys,
  boundsSchema.extend({ precision: precisionSchema.optional() }),
);

const pointsRequestSchema = z.preprocess(
  normalizeKeys,
  boundsSchema.extend({ limit: limitSchema.optional() }),
);

function parseWith<S extends z.ZodTypeAny>(schema: S, input: unknown, what: string): z.output<S> {
  const result = schema.safeParse(input);
  if (result.success) return result.data;

  const issues = result.error.issues.map((issue) => ({
    path: issue.path,
    message: issue.message,
  }));
  const summary = issues
    .map(({ path, message }) => (path.length ? `${path.join(".")}: ${message}` : message))
    .join("; ");
  throw new InvalidInputError(`Invalid ${what}: ${summary}`, issues);
}

/** Validate a raw viewport request. Throws `InvalidInputError`. */
export function parseViewportQuery(input: unknown): ViewportQuery {
  return parseWith(viewportQuerySchema, input, "viewport query");
}

export function parseBounds(input: unknown): BoundingBox {
  return parseWith(z.preprocess(normalizeKeys, boundsSchema), input, "bounds");
}

/** Bounds with an optional `precision` (wire name `geohash_precision`). */
export function parseClusterCountsRequest(input: unknown): BoundingBox & { precision?: number } {
  return parseWith(clusterCountsRequestSchema, input, "cluster counts request");
}

/** Bounds with an optional `limit` (wire name `max_results`). */
export function parsePointsRequest(input: unknown): BoundingBox & { limit?: number } {
  return parseWith(pointsRequestSchema, input, "points request");
}

export function parseCenter(input: unknown): LatLng {
  return parseWith(centerSchema, input, "center");
}

export function parseLimit(input: unknown, what = "limit"): number {
  return parseWith(limitSchema, input, what);
}

export function parseRadius(input: unknown): number {
  return parseWith(radiusSchema, input, "radius");
}

export function parseSearchTerm(input: unknown): string {
  return parseWith(searchTermSchema, input, "search term");
}

export function parseGeohashPrefix(input: unknown): string {
  return parseWith(geohashPrefixSchema, input, "geohash prefix");
}

export function parseTag(input: unknown): string {
  return parseWith(searchTermSchema, input, "tag");
}
