/**
 * packages/core/src/turtle/angles.ts: Angle arithmetic for turtle headings.
 */

import type { Vec2 } from "../geometry/vec2.js";

/** `a mod m` in [0, m). */
export function positiveMod(a: number, m: number): number {
  const r = ((a % m) + m) % m;
  return r >= m ? 0 : r;
}

/** Map `angle` into [-full/2, full/2). */
export function normalizeAngle(angle: number, full: number): number {
  return positiveMod(angle + full / 2, full) - full / 2;
}

function round10(v: number): number {
  return Math.round(v * 1e10) / 1e10;
}

/** Counter-clockwise angle of `v` from +x, in degrees within [0, 360). */
export function vectorHeading(v: Vec2): number {
  const degrees = round10((Math.atan2(v.y, v.x) * 180) / Math.PI);
  return positiveMod(degrees, 360);
}
