import { z } from "zod";
import {
  DEFAULT_STATUS,
  StoreDataError,
  type ClusterRow,
  type NearbyPoint,
  type Point,
} from "geohash-viewport";

export const clusterRowSchema = z
  .object({
    geohash_prefix: z.string(),
    count: z.number().int().nonnegative(),
    center_lat: z.number(),
    center_lng: z.number(),
  })
  .transform(
    (r): ClusterRow => ({
      geohashPrefix: r.geohash_prefix,
      count: r.count,
      centerLat: r.center_lat,
      centerLng: r.center_lng,
    }),
  );

const pointColumns = z.object({
  id: z.string(),
  name: z.string().nullable(),
  lat: z.number(),
  lng: z.number(),
  geohash: z.string().nullable(),
  status: z.string().nullable(),
  water_quality: z.string().nullable(),
  accessibility: z.string().nullable(),
  type: z.string().nullable(),
  tags: z.array(z.string()).nullable(),
});

function toPoint(r: z.infer<typeof pointColumns>): Point {
  return {
    id: r.id,
    name: r.name,
    lat: r.lat,
    lng: r.lng,
    geohash: r.geohash,
    status: r.status ?? DEFAULT_STATUS,
    waterQuality: r.water_quality,
    accessibility: r.accessibility,
    type: r.type,
    tags: r.tags ?? [],
  };
}

export const pointRowSchema = pointColumns.transform(toPoint);

export const nearbyRowSchema = pointColumns
  .extend({ distance_km: z.number() })
  .transform((r): NearbyPoint => ({ ...toPoint(r), distanceKm: r.distance_km }));

export function parseRows<S extends z.ZodTypeAny>(
  schema: S,
  rows: unknown[],
  what: string,
): z.output<S>[] {
  return rows.map((row, i) => {
    const result = schema.safeParse(row);
    if (!result.success) {
      const issues = result.error.issues.map(({ path, message }) => ({ path, message }));
      throw new StoreDataError(`Unexpected ${what} row at index ${i}`, issues);
    }
    return result.data;
  });
}
