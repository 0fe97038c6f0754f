import { afterEach, describe, it, expect, vi } from "vitest";
import { DEFAULT_POINT_LIMIT, LEGACY_POINT_LIMIT, resolveEngineOptions } from "../src/config";
import {
  ConfigurationError,
  InvalidInputError,
  NotFoundError,
  StoreDataError,
  StoreUnavailableError,
  isViewportError,
} from "../src/errors";
import { createConsoleLogger, silentLogger } from "../src/logger";

describe("resolveEngineOptions", () => {
  it("fills in the default limits", () => {
    const resolved = resolveEngineOptions({ logger: silentLogger });
    expect(resolved).toEqual({
      defaultPointLimit: DEFAULT_POINT_LIMIT,
      legacyPointLimit: LEGACY_POINT_LIMIT,
      logger: silentLogger,
    });
  });

  it("reports every invalid limit", () => {
    let caught: unknown;
    try {
      resolveEngineOptions({ defaultPointLimit: 0, legacyPointLimit: 2.5 });
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(ConfigurationError);
    expect(caught instanceof ConfigurationError && caught.issues.map((i) => i.path)).toEqual([
      ["defaultPointLimit"],
      ["legacyPointLimit"],
    ]);
  });
});

describe("errors", () => {
  it("carry a code per kind", () => {
    expect(new InvalidInputError("bad").code).toBe("INVALID_INPUT");
    expect(new StoreUnavailableError("down").code).toBe("STORE_UNAVAILABLE");
    expect(new NotFoundError("x").code).toBe("NOT_FOUND");
    expect(new ConfigurationError("bad").code).toBe("INVALID_CONFIG");
    expect(new StoreDataError("odd row").code).toBe("STORE_DATA");
  });

  it("keep the underlying cause", () => {
    const cause = new Error("ECONNREFUSED");
    expect(new StoreUnavailableError("down", cause).cause).toBe(cause);
  });

  it("are recognised by isViewportError", () => {
    expect(isViewportError(new NotFoundError("x"))).toBe(true);
    expect(isViewportError(new StoreDataError("odd row"))).toBe(true);
    expect(isViewportError(new Error("x"))).toBe(false);
  });
});

describe("createConsoleLogger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("prefixes messages and passes context through", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    createConsoleLogger().warn("slow query", { ms: 1200 });
    expect(warn).toHaveBeenCalledWith("[geohash-viewport] slow query", { ms: 1200 });
  });

  it("drops debug output unless enabled", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => {});
    createConsoleLogger().debug("hidden");
    createConsoleLogger({ debug: true }).debug("shown");
    expect(debug).toHaveBeenCalledTimes(1);
    expect(debug).toHaveBeenCalledWith("[geohash-viewport] shown");
  });
});
