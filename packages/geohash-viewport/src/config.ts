import { z } from "zod";
import { ConfigurationError } from "./errors";
import { createConsoleLogger, type Logger } from "./logger";

/** Safety cap for ad hoc point queries. */
export const DEFAULT_POINT_LIMIT = 1000;
/** Safety cap for the unfiltered map-view path. */
export const LEGACY_POINT_LIMIT = 5000;

/**
 * Options for configuring the ViewportEngine.
 */
export interface ViewportEngineOptions {
  /** Point-mode limit when the request gives none. Default: 1000 */
  defaultPointLimit?: number;
  /** Point-mode limit of the legacy map-view path. Default: 5000 */
  legacyPointLimit?: number;
  /** Default: console logger without debug output */
  logger?: Logger;
}

export interface ResolvedEngineOptions {
  defaultPointLimit: number;
  legacyPointLimit: number;
  logger: Logger;
}

const limitsSchema = z.object({
  defaultPointLimit: z.number().int().positive(),
  legacyPointLimit: z.number().int().positive(),
});

export function resolveEngineOptions(options: ViewportEngineOptions = {}): ResolvedEngineOptions {
  const limits = {
    defaultPointLimit: options.defaultPointLimit ?? DEFAULT_POINT_LIMIT,
    legacyPointLimit: options.legacyPointLimit ?? LEGACY_POINT_LIMIT,
  };

  const parsed = limitsSchema.safeParse(limits);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(({ path, message }) => ({ path, message }));
    throw new ConfigurationError(
      `Invalid engine options: ${issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ")}`,
      issues,
    );
  }

  return {
    ...parsed.data,
    logger: options.logger ?? createConsoleLogger(),
  };
}
