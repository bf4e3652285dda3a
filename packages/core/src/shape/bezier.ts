/**
 * packages/core/src/shape/bezier.ts: Cubic Bézier evaluation and arc decomposition.
 *
 * Arcs are split into sub-arcs of at most π/2, each approximated by one
 * cubic segment. Ellipses use the 4-segment kappa approximation.
 */

import type { Point } from "../geometry/matrix.js";

/** Smallest arc remainder still emitted as a segment. */
export const ARC_EPSILON = 1e-5;

/** Control-point offset for a quarter circle. */
export const KAPPA = 0.5522847498;

const HALF_PI = Math.PI / 2;

/** Unit-circle waypoints of one acute arc segment, rounded to 7 decimals. */
export type ArcSegment = Readonly<{
  ax: number;
  ay: number;
  bx: number;
  by: number;
  cx: number;
  cy: number;
  dx: number;
  dy: number;
}>;

export type CubicSegment = Readonly<{ c1: Point; c2: Point; end: Point }>;

/** Start point plus consecutive cubic segments. */
export type BezierPath = Readonly<{ start: Point; segments: readonly CubicSegment[] }>;

function round7(v: number): number {
  return Math.round(v * 1e7) / 1e7;
}

function pt(x: number, y: number): Point {
  return Object.freeze({ x, y });
}

/** Value of the cubic with anchors `a`, `d` and controls `b`, `c` at `t`. */
export function bezierPoint(a: number, b: number, c: number, d: number, t: number): number {
  const u = 1 - t;
  return u ** 3 * a + 3 * u ** 2 * t * b + 3 * u * t ** 2 * c + t ** 3 * d;
}

/** Unnormalized derivative of the cubic at `t`. */
export function bezierTangent(a: number, b: number, c: number, d: number, t: number): number {
  const u = 1 - t;
  return (
    3 * d * t ** 2 -
    3 * c * t ** 2 +
    6 * c * u * t -
    6 * b * u * t +
    3 * b * u ** 2 -
    3 * a * u ** 2
  );
}

/** One cubic approximating the unit-circle arc from `start` spanning `size` radians. */
export function acuteArcToBezier(start: number, size: number): ArcSegment {
  const alpha = size / 2;
  const cosAlpha = Math.cos(alpha);
  const sinAlpha = Math.sin(alpha);
  const cotAlpha = 1 / Math.tan(alpha);
  const phi = start + alpha;
  const cosPhi = Math.cos(phi);
  const sinPhi = Math.sin(phi);
  const lambda = (4 - cosAlpha) / 3;
  const mu = sinAlpha + (cosAlpha - lambda) * cotAlpha;
  return Object.freeze({
    ax: round7(Math.cos(start)),
    ay: round7(Math.sin(start)),
    bx: round7(lambda * cosPhi + mu * sinPhi),
    by: round7(lambda * sinPhi - mu * cosPhi),
    cx: round7(lambda * cosPhi - mu * sinPhi),
    cy: round7(lambda * sinPhi + mu * cosPhi),
    dx: round7(Math.cos(start + size)),
    dy: round7(Math.sin(start + size)),
  });
}

/** Sub-arcs of at most π/2 covering `start..stop`; empty when `stop - start < ARC_EPSILON`. */
export function arcSegments(start: number, stop: number): readonly ArcSegment[] {
  const out: ArcSegment[] = [];
  let at = start;
  while (stop - at >= ARC_EPSILON) {
    const size = Math.min(stop - at, HALF_PI);
    out.push(acuteArcToBezier(at, size));
    at += size;
  }
  return out;
}

/** Elliptical arc path centered at (x, y) with radii (rx, ry), or null when empty. */
export function arcPath(
  x: number,
  y: number,
  rx: number,
  ry: number,
  start: number,
  stop: number,
): BezierPath | null {
  const parts = arcSegments(start, stop);
  const first = parts[0];
  if (first === undefined) return null;
  return Object.freeze({
    start: pt(x + first.ax * rx, y + first.ay * ry),
    segments: Object.freeze(
      parts.map((s) =>
        Object.freeze({
          c1: pt(x + s.bx * rx, y + s.by * ry),
          c2: pt(x + s.cx * rx, y + s.cy * ry),
          end: pt(x + s.dx * rx, y + s.dy * ry),
        }),
      ),
    ),
  });
}

/** Closed 4-segment ellipse centered at (x, y) with full width `w` and height `h`. */
export function ellipsePath(x: number, y: number, w: number, h: number): BezierPath {
  const left = x - w / 2;
  const top = y - h / 2;
  const ox = (w / 2) * KAPPA;
  const oy = (h / 2) * KAPPA;
  const right = left + w;
  const bottom = top + h;
  const xm = left + w / 2;
  const ym = top + h / 2;
  const seg = (c1x: number, c1y: number, c2x: number, c2y: number, ex: number, ey: number) =>
    Object.freeze({ c1: pt(c1x, c1y), c2: pt(c2x, c2y), end: pt(ex, ey) });
  return Object.freeze({
    start: pt(left, ym),
    segments: Object.freeze([
      seg(left, ym - oy, xm - ox, top, xm, top),
      seg(xm + ox, top, right, ym - oy, right, ym),
      seg(right, ym + oy, xm + ox, bottom, xm, bottom),
      seg(xm - ox, bottom, left, ym + oy, left, ym),
    ]),
  });
}

/** Sample a cubic into `steps` line segments (steps + 1 points). */
export function flattenCubic(
  p0: Point,
  c1: Point,
  c2: Point,
  p3: Point,
  steps: number,
): readonly Point[] {
  const n = Math.max(1, Math.trunc(steps));
  const out: Point[] = [];
  for (let i = 0; i <= n; i++) {
    const t = i / n;
    out.push(pt(bezierPoint(p0.x, c1.x, c2.x, p3.x, t), bezierPoint(p0.y, c1.y, c2.y, p3.y, t)));
  }
  return out;
}
