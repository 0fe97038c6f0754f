export { PgPointStore, createPool, poolClient } from "./pg-point-store";
export type { PgPointStoreOptions, SqlClient } from "./pg-point-store";
export { loadStoreConfig } from "./config";
export type { PgStoreConfig, StoreEnv } from "./config";
export {
  clustersStatement,
  escapeLike,
  geohashPrefixStatement,
  nearbyStatement,
  pointByIdStatement,
  pointsStatement,
  searchByNameStatement,
  searchByTagStatement,
} from "./sql";
export type { SqlStatement } from "./sql";
