import { ClusterAggregator } from "./cluster-aggregator";
import { resolveEngineOptions, type ViewportEngineOptions } from "./config";
import { NotFoundError, StoreUnavailableError } from "./errors";
import { buildFilterPredicate } from "./filter-predicate";
import type { Logger } from "./logger";
import type { PointStore } from "./point-store";
import { PointRetriever } from "./point-retriever";
import {
  parseBounds,
  parseCenter,
  parseClusterCountsRequest,
  parseGeohashPrefix,
  parseLimit,
  parsePointsRequest,
  parseRadius,
  parseSearchTerm,
  parseTag,
  parseViewportQuery,
} from "./query-schema";
import type {
  ClusterRow,
  FilterSet,
  HealthStatus,
  NearbyPoint,
  Point,
  PointRow,
  Viewport,
  ViewportResult,
} from "./types";
import { classifyViewport } from "./viewport-classifier";

export const DEFAULT_CLUSTER_PRECISION = 5;
export const DEFAULT_NEARBY_RADIUS_KM = 5;
export const DEFAULT_SEARCH_LIMIT = 50;

export function toPointRow({
  id,
  name,
  lat,
  lng,
  geohash,
  status,
  waterQuality,
  accessibility,
}: Point): PointRow {
  return { id, name, lat, lng, geohash, status, waterQuality, accessibility };
}

/**
 * Entry point for map clients: validates a viewport, decides between
 * clusters and points, and runs the matching query against a point store.
 *
 * Stateless apart from its store and options; calls may run concurrently.
 */
export class ViewportEngine {
  readonly defaultPointLimit: number;
  readonly legacyPointLimit: number;
  private readonly logger: Logger;
  private readonly aggregator: ClusterAggregator;
  private readonly retriever: PointRetriever;

  constructor(
    private readonly store: PointStore,
    options: ViewportEngineOptions = {},
  ) {
    const resolved = resolveEngineOptions(options);
    this.defaultPointLimit = resolved.defaultPointLimit;
    this.legacyPointLimit = resolved.legacyPointLimit;
    this.logger = resolved.logger;
    this.aggregator = new ClusterAggregator(store, this.logger);
    this.retriever = new PointRetriever(store, this.logger);
  }

  /**
   * Serve a viewport request. Input is validated before the store is
   * touched; store failures propagate unchanged.
   */
  async query(input: unknown): Promise<ViewportResult> {
    const query = parseViewportQuery(input);
    return this.run(query, query.limit ?? this.defaultPointLimit);
  }

  /** Unfiltered map view: default filtering, automatic mode, legacy cap. */
  async mapView(bounds: unknown): Promise<ViewportResult> {
    const box = parseBounds(bounds);
    return this.run(box, this.legacyPointLimit);
  }

  /**
   * Cluster counts at a caller-chosen precision, regardless of area. The
   * precision argument wins over one carried in the request.
   */
  async clusterCounts(
    request: unknown,
    precision?: number,
    filters?: FilterSet,
  ): Promise<ClusterRow[]> {
    const { precision: requested, ...box } = parseClusterCountsRequest(request);
    return this.aggregator.aggregate(
      box,
      precision ?? requested ?? DEFAULT_CLUSTER_PRECISION,
      buildFilterPredicate(filters),
    );
  }

  /** Individual points regardless of area. */
  async pointsInBounds(
    request: unknown,
    limit?: number,
    filters?: FilterSet,
  ): Promise<{ rows: PointRow[]; truncated: boolean }> {
    const { limit: requested, ...box } = parsePointsRequest(request);
    const page = await this.retriever.retrieve(
      box,
      buildFilterPredicate(filters),
      parseLimit(limit ?? requested ?? this.defaultPointLimit),
    );
    return { rows: page.rows.map(toPointRow), truncated: page.truncated };
  }

  async findPoint(id: string): Promise<Point> {
    const point = await this.store.pointById(id);
    if (!point) {
      this.logger.debug("point not found", { id });
      throw new NotFoundError(id);
    }
    return point;
  }

  async findNearby(
    center: unknown,
    radiusKm = DEFAULT_NEARBY_RADIUS_KM,
    limit = DEFAULT_SEARCH_LIMIT,
    filters?: FilterSet,
  ): Promise<NearbyPoint[]> {
    return this.store.nearby({
      center: parseCenter(center),
      radiusKm: parseRadius(radiusKm),
      predicate: buildFilterPredicate(filters),
      limit: parseLimit(limit),
    });
  }

  async searchByName(
    term: string,
    limit = DEFAULT_SEARCH_LIMIT,
    filters?: FilterSet,
  ): Promise<Point[]> {
    return this.store.searchByName({
      term: parseSearchTerm(term),
      predicate: buildFilterPredicate(filters),
      limit: parseLimit(limit),
    });
  }

  /** Points carrying a tag that contains `tag`, case-insensitively, ordered by name. */
  async searchByTag(
    tag: string,
    limit = DEFAULT_SEARCH_LIMIT,
    filters?: FilterSet,
  ): Promise<Point[]> {
    return this.store.searchByTag({
      tag: parseTag(tag),
      predicate: buildFilterPredicate(filters),
      limit: parseLimit(limit),
    });
  }

  /** Points whose stored geohash starts with `prefix`, ordered by name. */
  async findByGeohashPrefix(
    prefix: string,
    limit = DEFAULT_SEARCH_LIMIT,
    filters?: FilterSet,
  ): Promise<Point[]> {
    return this.store.pointsByGeohashPrefix({
      prefix: parseGeohashPrefix(prefix),
      predicate: buildFilterPredicate(filters),
      limit: parseLimit(limit),
    });
  }

  async checkHealth(): Promise<HealthStatus> {
    try {
      await this.store.ping();
      return { status: "healthy" };
    } catch (error) {
      this.logger.error("point store health check failed", { error });
      return {
        status: "unhealthy",
        error: error instanceof Error ? error.message : String(error),
      };
    }
  }

  private async run(viewport: Viewport, limit: number): Promise<ViewportResult> {
    const classification = classifyViewport(viewport);
    const predicate = buildFilterPredicate(viewport.filters);
    this.logger.debug("classified viewport", { ...classification });

    try {
      if (classification.mode === "aggregate") {
        const rows = await this.aggregator.aggregate(
          viewport,
          classification.precision,
          predicate,
        );
        return {
          kind: "aggregated",
          precision: classification.precision,
          areaKm2: classification.areaKm2,
          rows,
        };
      }

      const page = await this.retriever.retrieve(viewport, predicate, limit);
      return {
        kind: "pointwise",
        areaKm2: classification.areaKm2,
        rows: page.rows.map(toPointRow),
        truncated: page.truncated,
      };
    } catch (error) {
      if (error instanceof StoreUnavailableError) {
        this.logger.error("viewport query failed", { mode: classification.mode, error });
      }
      throw error;
    }
  }
}
