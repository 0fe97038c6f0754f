/**
 * Error taxonomy shared by the engine and every point store.
 */

export type ViewportErrorCode =
  | "INVALID_INPUT"
  | "INVALID_CONFIG"
  | "STORE_UNAVAILABLE"
  | "STORE_DATA"
  | "NOT_FOUND";

export interface ValidationIssue {
  path: (string | number)[];
  message: string;
}

export class ViewportError extends Error {
  constructor(
    message: string,
    public readonly code: ViewportErrorCode,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = "ViewportError";

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

/** Bad coordinates, limits or precision. Raised before any store access. */
export class InvalidInputError extends ViewportError {
  constructor(
    message: string,
    public readonly issues: ValidationIssue[] = [],
  ) {
    super(message, "INVALID_INPUT");
    this.name = "InvalidInputError";
  }
}

/** Engine options or store settings are unusable. Raised at construction. */
export class ConfigurationError extends ViewportError {
  constructor(
    message: string,
    public readonly issues: ValidationIssue[] = [],
  ) {
    super(message, "INVALID_CONFIG");
    this.name = "ConfigurationError";
  }
}

/**
 * The point store could not be reached or timed out. Transient; retrying is
 * up to the caller.
 */
export class StoreUnavailableError extends ViewportError {
  constructor(message: string, cause?: unknown) {
    super(message, "STORE_UNAVAILABLE", cause);
    this.name = "StoreUnavailableError";
  }
}

/** The store answered with rows of an unexpected shape. */
export class StoreDataError extends ViewportError {
  constructor(
    message: string,
    public readonly issues: ValidationIssue[] = [],
  ) {
    super(message, "STORE_DATA");
    this.name = "StoreDataError";
  }
}

export class NotFoundError extends ViewportError {
  constructor(public readonly id: string) {
    super(`Point "${id}" not found`, "NOT_FOUND");
    this.name = "NotFoundError";
  }
}

export function isViewportError(error: unknown): error is ViewportError {
  return error instanceof ViewportError;
}
