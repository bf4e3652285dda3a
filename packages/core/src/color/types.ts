/**
 * packages/core/src/color/types.ts: Canonical color representation.
 */

/** Canonical color: integer channels in [0, 255]. */
export type Rgba = Readonly<{
  r: number;
  g: number;
  b: number;
  a: number;
}>;

/**
 * Numeric color-range convention for raw channel values.
 *   - 255: channels are taken as-is
 *   - 1:   channels (alpha included) are scaled by 255 and rounded
 */
export type ColorMode = 1 | 255;

/** One positional color argument as accepted at the API boundary. */
export type ColorArg = number | string | Rgba | readonly number[];

/** The frozen "unset" color: fully transparent black. */
export const TRANSPARENT: Rgba = Object.freeze({ r: 0, g: 0, b: 0, a: 0 });

export const BLACK: Rgba = Object.freeze({ r: 0, g: 0, b: 0, a: 255 });

export const WHITE: Rgba = Object.freeze({ r: 255, g: 255, b: 255, a: 255 });
