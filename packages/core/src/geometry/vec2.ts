/**
 * packages/core/src/geometry/vec2.ts: Immutable 2D vectors.
 */

export type Vec2 = Readonly<{ x: number; y: number }>;

export function vec2(x: number, y: number): Vec2 {
  return Object.freeze({ x, y });
}

export function add(a: Vec2, b: Vec2): Vec2 {
  return vec2(a.x + b.x, a.y + b.y);
}

export function sub(a: Vec2, b: Vec2): Vec2 {
  return vec2(a.x - b.x, a.y - b.y);
}

export function scale(v: Vec2, k: number): Vec2 {
  return vec2(v.x * k, v.y * k);
}

export function dot(a: Vec2, b: Vec2): number {
  return a.x * b.x + a.y * b.y;
}

export function length(v: Vec2): number {
  return Math.hypot(v.x, v.y);
}

/** Counter-clockwise rotation by `degrees`. */
export function rotateDeg(v: Vec2, degrees: number): Vec2 {
  const rad = (degrees * Math.PI) / 180;
  const c = Math.cos(rad);
  const s = Math.sin(rad);
  return vec2(v.x * c - v.y * s, v.x * s + v.y * c);
}

export function equals(a: Vec2, b: Vec2): boolean {
  return a.x === b.x && a.y === b.y;
}

export function isVec2(value: unknown): value is Vec2 {
  return (
    typeof value === "object" &&
    value !== null &&
    "x" in value &&
    "y" in value &&
    typeof value.x === "number" &&
    typeof value.y === "number"
  );
}
