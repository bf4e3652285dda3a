/**
 * packages/core/src/sketch/constants.ts: Math and keyword constants for sketches.
 */

export const HALF_PI = Math.PI / 2;
export const PI = Math.PI;
export const QUARTER_PI = Math.PI / 4;
export const TAU = Math.PI * 2;
export const TWO_PI = Math.PI * 2;

export const NORMAL = "normal";
export const ITALIC = "italic";
export const BOLD = "bold";
export const BOLDITALIC = "bolditalic";

export const LEFT = "left";
export const CENTER = "center";
export const RIGHT = "right";

export const TOP = "top";
export const BOTTOM = "bottom";
export const BASELINE = "alphabetic";
export const MIDDLE = "middle";

export type TextStyle = typeof NORMAL | typeof ITALIC | typeof BOLD | typeof BOLDITALIC;
export type HorizontalAlign = typeof LEFT | typeof CENTER | typeof RIGHT;
/** `center` is accepted as an alias of `middle`. */
export type VerticalAlign = typeof TOP | typeof BOTTOM | typeof BASELINE | typeof MIDDLE | typeof CENTER;

export const TEXT_STYLES: readonly TextStyle[] = Object.freeze([NORMAL, ITALIC, BOLD, BOLDITALIC]);
export const HORIZONTAL_ALIGNS: readonly HorizontalAlign[] = Object.freeze([LEFT, CENTER, RIGHT]);
export const VERTICAL_ALIGNS: readonly VerticalAlign[] = Object.freeze([
  TOP,
  BOTTOM,
  BASELINE,
  MIDDLE,
  CENTER,
]);

export function isTextStyle(v: string): v is TextStyle {
  return TEXT_STYLES.some((s) => s === v);
}

export function isHorizontalAlign(v: string): v is HorizontalAlign {
  return HORIZONTAL_ALIGNS.some((s) => s === v);
}

export function isVerticalAlign(v: string): v is VerticalAlign {
  return VERTICAL_ALIGNS.some((s) => s === v);
}
