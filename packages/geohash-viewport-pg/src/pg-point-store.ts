import { Pool } from "pg";
import {
  StoreUnavailableError,
  createConsoleLogger,
  type ClusterQuery,
  type ClusterRow,
  type GeohashPrefixQuery,
  type Logger,
  type NameSearchQuery,
  type NearbyPoint,
  type NearbyQuery,
  type Point,
  type PointQuery,
  type PointStore,
  type TagSearchQuery,
} from "geohash-viewport";
import type { PgStoreConfig } from "./config";
import { clusterRowSchema, nearbyRowSchema, parseRows, pointRowSchema } from "./rows";
import {
  clustersStatement,
  geohashPrefixStatement,
  nearbyStatement,
  pointByIdStatement,
  pointsStatement,
  searchByNameStatement,
  searchByTagStatement,
  type SqlStatement,
} from "./sql";

/**
 * The slice of a pg pool the store needs. Rows come back untyped and are
 * validated before use.
 */
export interface SqlClient {
  query(text: string, values: readonly unknown[]): Promise<unknown[]>;
  end(): Promise<void>;
}

export function poolClient(pool: Pool): SqlClient {
  return {
    async query(text, values) {
      const result = await pool.query(text, [...values]);
      return result.rows;
    },
    end: () => pool.end(),
  };
}

/**
 * Build a pool for the store. Errors raised by idle clients (a restarted
 * server, a dropped connection) go to `logger`; the pool replaces the client
 * on the next checkout.
 */
export function createPool(config: PgStoreConfig, logger: Logger = createConsoleLogger()): Pool {
  const pool = new Pool({
    host: config.host,
    port: config.port,
    database: config.database,
    user: config.credentials.user,
    password: config.credentials.password,
    max: config.poolSize,
    statement_timeout: config.statementTimeoutMs,
    connectionTimeoutMillis: config.connectionTimeoutMs ?? 10_000,
  });
  pool.on("error", (error) => {
    logger.error("idle database client failed", { error });
  });
  return pool;
}

export interface PgPointStoreOptions {
  /** Receives pool errors. Default: console logger */
  logger?: Logger;
}

/**
 * Point store backed by the `fountains` and `fountain_tags` tables.
 *
 * Every driver failure surfaces as `StoreUnavailableError` with the original
 * error as `cause`; an empty result always means nothing matched.
 */
export class PgPointStore implements PointStore {
  constructor(private readonly client: SqlClient) {}

  static connect(config: PgStoreConfig, { logger }: PgPointStoreOptions = {}): PgPointStore {
    return new PgPointStore(poolClient(createPool(config, logger)));
  }

  async clusters(query: ClusterQuery): Promise<ClusterRow[]> {
    const rows = await this.execute(clustersStatement(query), "clusters");
    return parseRows(clusterRowSchema, rows, "cluster");
  }

  async points(query: PointQuery): Promise<Point[]> {
    const rows = await this.execute(pointsStatement(query), "points");
    return parseRows(pointRowSchema, rows, "point");
  }

  async pointById(id: string): Promise<Point | null> {
    const rows = await this.execute(pointByIdStatement(id), "point by id");
    const [point] = parseRows(pointRowSchema, rows, "point");
    return point ?? null;
  }

  async nearby(query: NearbyQuery): Promise<NearbyPoint[]> {
    const rows = await this.execute(nearbyStatement(query), "nearby");
    return parseRows(nearbyRowSchema, rows, "nearby point");
  }

  async searchByName(query: NameSearchQuery): Promise<Point[]> {
    const rows = await this.execute(searchByNameStatement(query), "name search");
    return parseRows(pointRowSchema, rows, "point");
  }

  async searchByTag(query: TagSearchQuery): Promise<Point[]> {
    const rows = await this.execute(searchByTagStatement(query), "tag search");
    return parseRows(pointRowSchema, rows, "point");
  }

  async pointsByGeohashPrefix(query: GeohashPrefixQuery): Promise<Point[]> {
    const rows = await this.execute(geohashPrefixStatement(query), "geohash prefix");
    return parseRows(pointRowSchema, rows, "point");
  }

  async ping(): Promise<void> {
    await this.execute({ text: "SELECT 1", values: [] }, "ping");
  }

  async close(): Promise<void> {
    await this.client.end();
  }

  private async execute({ text, values }: SqlStatement, what: string): Promise<unknown[]> {
    try {
      return await this.client.query(text, values);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new StoreUnavailableError(`Point store ${what} query failed: ${reason}`, error);
    }
  }
}
