import { z } from "zod";
import { ConfigurationError } from "geohash-viewport";

/**
 * Connection settings for the fountain database. Owned by the caller and
 * passed in explicitly.
 */
export interface PgStoreConfig {
  host: string;
  port: number;
  database: string;
  credentials: {
    user: string;
    password: string;
  };
  /** Maximum pooled connections. */
  poolSize: number;
  /** Per-statement timeout; unset leaves the server default. */
  statementTimeoutMs?: number;
  /** How long to wait for a free connection before failing. Default: 10000 */
  connectionTimeoutMs?: number;
}

const envSchema = z.object({
  DB_HOST: z.string().min(1).default("localhost"),
  DB_PORT: z.coerce.number().int().positive().default(5432),
  DB_NAME: z.string().min(1).default("tapmap_db"),
  DB_USER: z.string().min(1).default("postgres"),
  DB_PASSWORD: z.string().default(""),
  DB_POOL_SIZE: z.coerce.number().int().positive().default(10),
  DB_STATEMENT_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
});

export type StoreEnv = Record<string, string | undefined>;

/**
 * Read connection settings from environment variables, falling back to a
 * local development database.
 */
export function loadStoreConfig(env: StoreEnv = process.env): PgStoreConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(({ path, message }) => ({ path, message }));
    throw new ConfigurationError(
      `Invalid database environment: ${issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ")}`,
      issues,
    );
  }

  const e = parsed.data;
  return {
    host: e.DB_HOST,
    port: e.DB_PORT,
    database: e.DB_NAME,
    credentials: { user: e.DB_USER, password: e.DB_PASSWORD },
    poolSize: e.DB_POOL_SIZE,
    statementTimeoutMs: e.DB_STATEMENT_TIMEOUT_MS,
  };
}
