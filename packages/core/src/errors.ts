/**
 * packages/core/src/errors.ts: Error taxonomy for drawing and turtle APIs.
 *
 * Every failure raised by core is a programming error surfaced synchronously
 * to the caller. Backend (rasterizer) errors are never wrapped.
 */

/**
 * Deterministic error codes for all core violations.
 * These are surfaced as SketchError instances.
 */
export type SketchErrorCode =
  | "SKETCH_INVALID_COLOR"
  | "SKETCH_INVALID_SHAPE_NAME"
  | "SKETCH_INVALID_ARGUMENT"
  | "SKETCH_INVALID_STATE";

/**
 * Error class for all core violations.
 * The `code` property identifies the specific violation.
 */
export class SketchError extends Error {
  override readonly name: string = "SketchError";
  readonly code: SketchErrorCode;

  constructor(code: SketchErrorCode, message?: string) {
    super(message ?? code);
    this.code = code;

    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

/** Malformed color arguments or an unknown color name. */
export class InvalidColorError extends SketchError {
  override readonly name: string = "InvalidColorError";

  constructor(detail: string) {
    super("SKETCH_INVALID_COLOR", detail);
  }
}

/** Unknown turtle shape identifier. */
export class InvalidShapeNameError extends SketchError {
  override readonly name: string = "InvalidShapeNameError";
  readonly shapeName: string;

  constructor(shapeName: string) {
    super("SKETCH_INVALID_SHAPE_NAME", `There is no shape named ${shapeName}`);
    this.shapeName = shapeName;
  }
}

/** Out-of-range or ill-typed argument (stretch factors, fonts, delays, ...). */
export class InvalidArgumentError extends SketchError {
  override readonly name: string = "InvalidArgumentError";

  constructor(detail: string) {
    super("SKETCH_INVALID_ARGUMENT", detail);
  }
}

export function invalidArgument(detail: string): never {
  throw new InvalidArgumentError(detail);
}

export function invalidState(detail: string): never {
  throw new SketchError("SKETCH_INVALID_STATE", detail);
}
