export { ViewportEngine, toPointRow } from "./viewport-engine";
export {
  DEFAULT_CLUSTER_PRECISION,
  DEFAULT_NEARBY_RADIUS_KM,
  DEFAULT_SEARCH_LIMIT,
} from "./viewport-engine";
export { classifyViewport } from "./viewport-classifier";
export type { Classification } from "./viewport-classifier";
export {
  ClusterAggregator,
  assertClusterPrecision,
  groupByGeohashPrefix,
} from "./cluster-aggregator";
export { PointRetriever, compareByLatLng, selectPoints } from "./point-retriever";
export {
  DEFAULT_PREDICATE,
  buildFilterPredicate,
  normalizeFilters,
} from "./filter-predicate";
export type {
  FilterPredicate,
  FilterablePoint,
  NormalizedFilterSet,
} from "./filter-predicate";
export {
  AUTO_AGGREGATE_MIN_AREA_KM2,
  POINTS_ONLY_MAX_AREA_KM2,
  containsPoint,
  haversineKm,
  isDegenerateBox,
  precisionForArea,
  radiusToBox,
  viewportArea,
} from "./geo-math";
export {
  STORED_GEOHASH_PRECISION,
  decodeGeohash,
  decodeGeohashBounds,
  encodeGeohash,
} from "./geohash";
export { ArrowPointStore } from "./arrow-point-store";
export type { ArrowPointStoreOptions } from "./arrow-point-store";
export { DEFAULT_POINT_COLUMNS, createPointTable } from "./arrow-helpers";
export type { PointColumnNames, PointRecord } from "./arrow-helpers";
export type {
  ClusterQuery,
  GeohashPrefixQuery,
  NameSearchQuery,
  NearbyQuery,
  PointQuery,
  PointStore,
  TagSearchQuery,
} from "./point-store";
export {
  DEFAULT_POINT_LIMIT,
  LEGACY_POINT_LIMIT,
  resolveEngineOptions,
} from "./config";
export type { ResolvedEngineOptions, ViewportEngineOptions } from "./config";
export {
  ConfigurationError,
  InvalidInputError,
  NotFoundError,
  StoreDataError,
  StoreUnavailableError,
  ViewportError,
  isViewportError,
} from "./errors";
export type { ValidationIssue, ViewportErrorCode } from "./errors";
export { createConsoleLogger, silentLogger } from "./logger";
export type { Logger } from "./logger";
export {
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
export { DEFAULT_POINT_TYPE, DEFAULT_STATUS } from "./types";
export type {
  BoundingBox,
  ClusterRow,
  FilterSet,
  HealthStatus,
  LatLng,
  NearbyPoint,
  Point,
  PointPage,
  PointRow,
  PointStatus,
  Viewport,
  ViewportMode,
  ViewportQuery,
  ViewportResult,
} from "./types";
