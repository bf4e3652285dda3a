/**
 * packages/core/src/color/index.ts: Public exports for color resolution.
 */

export type { ColorArg, ColorMode, Rgba } from "./types.js";
export { BLACK, TRANSPARENT, WHITE } from "./types.js";
export { isNamedColor, namedColorNames } from "./named.js";
export { parseCssColor } from "./parse.js";
export {
  colorToTuple,
  formatColor,
  normalizeColorMode,
  resolveColor,
  sameColor,
} from "./resolve.js";
