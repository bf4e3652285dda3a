/**
 * packages/core/src/sketch/config.ts: Sketch construction options.
 */

import { createRasterSurface } from "../surface/raster/rasterSurface.js";
import type { SurfaceFactory } from "../surface/types.js";
import { requirePositiveInt } from "../validate.js";

export type SketchConfig = Readonly<{
  /** Logical width in sketch units. */
  width?: number;
  height?: number;
  /** Device pixels per sketch unit. */
  pixelDensity?: number;
  /** Backend factory; receives device pixel dimensions. */
  backend?: SurfaceFactory;
}>;

export type ResolvedSketchConfig = Readonly<{
  width: number;
  height: number;
  pixelDensity: number;
  backend: SurfaceFactory;
}>;

const DEFAULT_CONFIG: ResolvedSketchConfig = Object.freeze({
  width: 100,
  height: 100,
  pixelDensity: 2,
  backend: createRasterSurface,
});

/** Apply defaults to user-provided config, validating all values. */
export function resolveSketchConfig(config: SketchConfig | undefined): ResolvedSketchConfig {
  if (!config) return DEFAULT_CONFIG;
  const width =
    config.width === undefined ? DEFAULT_CONFIG.width : requirePositiveInt("width", config.width);
  const height =
    config.height === undefined
      ? DEFAULT_CONFIG.height
      : requirePositiveInt("height", config.height);
  const pixelDensity =
    config.pixelDensity === undefined
      ? DEFAULT_CONFIG.pixelDensity
      : requirePositiveInt("pixelDensity", config.pixelDensity);
  const backend = typeof config.backend === "function" ? config.backend : DEFAULT_CONFIG.backend;
  return Object.freeze({ width, height, pixelDensity, backend });
}
