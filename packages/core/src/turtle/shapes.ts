/**
 * packages/core/src/turtle/shapes.ts: Built-in turtle shape polygons.
 *
 * Shapes are point lists in shape space: +y points along the turtle heading.
 * The table lives in shapes.json beside this module.
 */

import { readFileSync } from "node:fs";
import { invalidArgument } from "../errors.js";
import { type Vec2, vec2 } from "../geometry/vec2.js";

const SHAPES_URL = new URL("./shapes.json", import.meta.url);

export type ShapePolygon = readonly Vec2[];

let builtins: ReadonlyMap<string, ShapePolygon> | null = null;

function isPointList(value: unknown): value is readonly (readonly [number, number])[] {
  return (
    Array.isArray(value) &&
    value.every(
      (p: unknown) =>
        Array.isArray(p) && p.length === 2 && p.every((c: unknown) => typeof c === "number"),
    )
  );
}

/** Validated, frozen copy of a polygon. */
export function toShapePolygon(points: readonly Vec2[]): ShapePolygon {
  if (points.length < 3) invalidArgument("a shape polygon needs at least 3 points");
  for (const p of points) {
    if (!Number.isFinite(p.x) || !Number.isFinite(p.y)) {
      invalidArgument("shape polygon coordinates must be finite numbers");
    }
  }
  return Object.freeze(points.map((p) => vec2(p.x, p.y)));
}

export function builtinShapes(): ReadonlyMap<string, ShapePolygon> {
  if (builtins !== null) return builtins;
  const parsed: unknown = JSON.parse(readFileSync(SHAPES_URL, "utf8"));
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new TypeError("shapes.json must map shape names to point lists");
  }
  const table = new Map<string, ShapePolygon>();
  for (const [name, points] of Object.entries(parsed)) {
    if (!isPointList(points)) throw new TypeError(`shapes.json: bad point list for ${name}`);
    table.set(name, toShapePolygon(points.map(([x, y]) => vec2(x, y))));
  }
  builtins = table;
  return table;
}
