/**
 * packages/core/src/geometry/matrix.ts: 2D affine matrices.
 *
 * A matrix is the 3×3 homogeneous transform
 *
 *   | a  b  0 |
 *   | c  d  0 |
 *   | e  f  1 |
 *
 * applied to row vectors: [x' y' 1] = [x y 1] · M, i.e.
 *   x' = a·x + c·y + e
 *   y' = b·x + d·y + f
 *
 * The six coefficients are the ones a 2D canvas `transform(a, b, c, d, e, f)`
 * call takes. Under this convention `multiply(op, current)` applies `op`
 * first, inside the space `current` already establishes.
 */

export type Matrix2D = Readonly<{
  a: number;
  b: number;
  c: number;
  d: number;
  e: number;
  f: number;
}>;

export type Point = Readonly<{ x: number; y: number }>;

export type MatrixRows = readonly [
  readonly [number, number, number],
  readonly [number, number, number],
  readonly [number, number, number],
];

export const IDENTITY: Matrix2D = Object.freeze({ a: 1, b: 0, c: 0, d: 1, e: 0, f: 0 });

export function fromCoefficients(
  a: number,
  b: number,
  c: number,
  d: number,
  e: number,
  f: number,
): Matrix2D {
  return Object.freeze({ a, b, c, d, e, f });
}

/** Row-vector product `left · right`. */
export function multiply(left: Matrix2D, right: Matrix2D): Matrix2D {
  return Object.freeze({
    a: left.a * right.a + left.b * right.c,
    b: left.a * right.b + left.b * right.d,
    c: left.c * right.a + left.d * right.c,
    d: left.c * right.b + left.d * right.d,
    e: left.e * right.a + left.f * right.c + right.e,
    f: left.e * right.b + left.f * right.d + right.f,
  });
}

export function translation(tx: number, ty: number): Matrix2D {
  return fromCoefficients(1, 0, 0, 1, tx, ty);
}

/** Rotation by `angle` radians (clockwise on a y-down surface). */
export function rotation(angle: number): Matrix2D {
  const cos = Math.cos(angle);
  const sin = Math.sin(angle);
  return fromCoefficients(cos, sin, -sin, cos, 0, 0);
}

export function scaling(sx: number, sy: number = sx): Matrix2D {
  return fromCoefficients(sx, 0, 0, sy, 0, 0);
}

/** x' = x + tan(angle)·y */
export function shearXMatrix(angle: number): Matrix2D {
  return fromCoefficients(1, 0, Math.tan(angle), 1, 0, 0);
}

/** y' = y + tan(angle)·x */
export function shearYMatrix(angle: number): Matrix2D {
  return fromCoefficients(1, Math.tan(angle), 0, 1, 0, 0);
}

export function applyToPoint(m: Matrix2D, x: number, y: number): Point {
  return Object.freeze({ x: m.a * x + m.c * y + m.e, y: m.b * x + m.d * y + m.f });
}

export function determinant(m: Matrix2D): number {
  return m.a * m.d - m.b * m.c;
}

/** Inverse matrix, or null when singular. */
export function invert(m: Matrix2D): Matrix2D | null {
  const det = determinant(m);
  if (det === 0 || !Number.isFinite(det)) return null;
  return Object.freeze({
    a: m.d / det,
    b: -m.b / det,
    c: -m.c / det,
    d: m.a / det,
    e: (m.c * m.f - m.d * m.e) / det,
    f: (m.b * m.e - m.a * m.f) / det,
  });
}

export function toRows(m: Matrix2D): MatrixRows {
  return [
    [m.a, m.b, 0],
    [m.c, m.d, 0],
    [m.e, m.f, 1],
  ];
}

export function isIdentity(m: Matrix2D): boolean {
  return m.a === 1 && m.b === 0 && m.c === 0 && m.d === 1 && m.e === 0 && m.f === 0;
}

/** Average linear scale factor; used to scale stroke widths into device space. */
export function meanScale(m: Matrix2D): number {
  return Math.sqrt(Math.abs(determinant(m)));
}
