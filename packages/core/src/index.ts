/**
 * @sketchpad/core
 *
 * Processing-style 2D drawing, a frame clock and turtle graphics over an
 * abstract drawing surface. This package uses no Node-specific APIs beyond
 * reading its bundled JSON tables.
 */

// =============================================================================
// Errors and diagnostics
// =============================================================================

export {
  InvalidArgumentError,
  InvalidColorError,
  InvalidShapeNameError,
  SketchError,
  type SketchErrorCode,
} from "./errors.js";

export {
  type LogSink,
  emitAudit,
  isAuditEnabled,
  setAuditEnabled,
  setLogSink,
  warnDev,
} from "./debug/log.js";

// =============================================================================
// Color
// =============================================================================

export {
  BLACK,
  TRANSPARENT,
  WHITE,
  type ColorArg,
  type ColorMode,
  type Rgba,
  colorToTuple,
  formatColor,
  isNamedColor,
  namedColorNames,
  normalizeColorMode,
  parseCssColor,
  resolveColor,
  sameColor,
} from "./color/index.js";

// =============================================================================
// Geometry and transforms
// =============================================================================

export {
  IDENTITY,
  type Matrix2D,
  type MatrixRows,
  type Point,
  applyToPoint,
  determinant,
  fromCoefficients,
  invert,
  isIdentity,
  meanScale,
  multiply,
  rotation,
  scaling,
  shearXMatrix,
  shearYMatrix,
  toRows,
  translation,
} from "./geometry/matrix.js";

export { type Vec2, add, length, rotateDeg, scale, sub, vec2 } from "./geometry/vec2.js";

export { TransformStack } from "./transform/transformStack.js";

// =============================================================================
// Shapes and curves
// =============================================================================

export {
  ARC_EPSILON,
  KAPPA,
  type ArcSegment,
  type BezierPath,
  type CubicSegment,
  acuteArcToBezier,
  arcPath,
  arcSegments,
  bezierPoint,
  bezierTangent,
  ellipsePath,
  flattenCubic,
} from "./shape/bezier.js";

export { ShapeRecorder } from "./shape/shapeRecorder.js";

// =============================================================================
// Surfaces
// =============================================================================

export type {
  BitmapSource,
  LineCap,
  SurfaceBackend,
  SurfaceFactory,
  TextAlign,
  TextBaseline,
  TextOverlay,
} from "./surface/types.js";

export {
  type PresentListener,
  RasterSurface,
  createRasterSurface,
} from "./surface/raster/rasterSurface.js";

// =============================================================================
// Sketch
// =============================================================================

export { Sketch, type SketchOptions } from "./sketch/sketch.js";
export {
  type ResolvedSketchConfig,
  type SketchConfig,
  resolveSketchConfig,
} from "./sketch/config.js";
export * from "./sketch/constants.js";

// =============================================================================
// Animation
// =============================================================================

export {
  AnimationClock,
  type ClockConfig,
  type ClockState,
  type FrameHooks,
  type ResolvedClockConfig,
  type RunOptions,
  resolveClockConfig,
} from "./animation/clock.js";
export { type NowFn, type SleepFn, nowMs, sleepMs } from "./animation/timing.js";

// =============================================================================
// Turtle graphics
// =============================================================================

export {
  type FontTuple,
  type ShapeOutline,
  type SpeedName,
  type TeleportOptions,
  Turtle,
  type TurtleMode,
  type WriteOptions,
} from "./turtle/turtle.js";
export {
  type ResolvedScreenConfig,
  Screen,
  type ScreenConfig,
  resolveScreenConfig,
} from "./turtle/screen.js";
export { DEFAULT_SCREEN, ScreenRegistry } from "./turtle/registry.js";
export { type ShapePolygon, builtinShapes } from "./turtle/shapes.js";
export { normalizeAngle, positiveMod, vectorHeading } from "./turtle/angles.js";
