/**
 * packages/core/src/errors.ts — Error codes and error classes.
 *
 * Inside the engine failures travel as {@link LayoutFatal} values; the
 * throwing entry points wrap them in {@link LayoutError}.
 */

/**
 * Deterministic error codes for fatal layout conditions.
 */
export type LayoutErrorCode =
  | "LAYOUT_MEASUREMENT_ERROR"
  | "LAYOUT_INVALID_FACTOR"
  | "LAYOUT_INVALID_TREE"
  | "LAYOUT_INVALID_EXTENT"
  | "LAYOUT_INVALID_CONFIG"
  | "LAYOUT_DEPTH_EXCEEDED";

/** Structured fatal error. `path` names the offending node when known. */
export type LayoutFatal = Readonly<{ code: LayoutErrorCode; detail: string; path?: string }>;

/**
 * Error class for all fatal layout conditions.
 * The `code` property identifies the specific violation.
 */
export class LayoutError extends Error {
  override readonly name = "LayoutError";
  readonly code: LayoutErrorCode;
  readonly path: string | undefined;

  constructor(code: LayoutErrorCode, message?: string, path?: string) {
    super(message ?? code);
    this.code = code;
    this.path = path;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, LayoutError);
    }
  }

  static fromFatal(fatal: LayoutFatal): LayoutError {
    return new LayoutError(fatal.code, fatal.detail, fatal.path);
  }
}

/** Thrown by measurement collaborators that cannot size a leaf. */
export class MeasurementError extends Error {
  override readonly name = "MeasurementError";

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, MeasurementError);
    }
  }
}
