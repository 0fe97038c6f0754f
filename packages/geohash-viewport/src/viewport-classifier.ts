import {
  AUTO_AGGREGATE_MIN_AREA_KM2,
  POINTS_ONLY_MAX_AREA_KM2,
  isDegenerateBox,
  precisionForArea,
  viewportArea,
} from "./geo-math";
import type { Viewport } from "./types";

export type Classification =
  | { mode: "aggregate"; precision: number; areaKm2: number }
  | { mode: "points"; areaKm2: number };

/**
 * Decide between aggregated clusters and individual points for a viewport.
 *
 * Small views (≤ 10 km²) are always points, even when aggregation was
 * requested. Otherwise an explicit mode wins; without one, views larger than
 * 1000 km² aggregate. Degenerate boxes classify with area 0.
 */
export function classifyViewport(viewport: Viewport): Classification {
  const areaKm2 = isDegenerateBox(viewport) ? 0 : viewportArea(viewport);

  if (areaKm2 <= POINTS_ONLY_MAX_AREA_KM2) {
    return { mode: "points", areaKm2 };
  }

  const mode = viewport.mode ?? (areaKm2 > AUTO_AGGREGATE_MIN_AREA_KM2 ? "aggregate" : "points");

  if (mode === "aggregate") {
    return { mode, precision: precisionForArea(areaKm2), areaKm2 };
  }
  return { mode, areaKm2 };
}
