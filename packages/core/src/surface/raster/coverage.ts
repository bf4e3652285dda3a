/**
 * packages/core/src/surface/raster/coverage.ts: Device-space coverage masks.
 *
 * Shapes are first marked into a one-byte-per-pixel mask, then blended into
 * the RGBA buffer once, so overlapping pieces of one stroke never double up
 * their alpha.
 */

import type { Rgba } from "../../color/types.js";
import type { Point } from "../../geometry/matrix.js";

const TAU = Math.PI * 2;

function toPixel(v: number): number {
  if (!Number.isFinite(v)) return 0;
  return Math.floor(v);
}

function clampU8(v: number): number {
  if (!Number.isFinite(v)) return 0;
  if (v <= 0) return 0;
  if (v >= 255) return 255;
  return Math.round(v);
}

type Crossing = { x: number; dir: 1 | -1 };

export class Coverage {
  private readonly mask: Uint8Array;
  private minX: number;
  private minY: number;
  private maxX = -1;
  private maxY = -1;

  constructor(
    readonly widthPx: number,
    readonly heightPx: number,
  ) {
    this.mask = new Uint8Array(widthPx * heightPx);
    this.minX = widthPx;
    this.minY = heightPx;
  }

  get isEmpty(): boolean {
    return this.maxX < this.minX || this.maxY < this.minY;
  }

  has(x: number, y: number): boolean {
    if (x < 0 || y < 0 || x >= this.widthPx || y >= this.heightPx) return false;
    return this.mask[y * this.widthPx + x] === 1;
  }

  mark(x: number, y: number): void {
    if (x < 0 || y < 0 || x >= this.widthPx || y >= this.heightPx) return;
    this.mask[y * this.widthPx + x] = 1;
    if (x < this.minX) this.minX = x;
    if (x > this.maxX) this.maxX = x;
    if (y < this.minY) this.minY = y;
    if (y > this.maxY) this.maxY = y;
  }

  /** Bresenham line between pixel-snapped endpoints. */
  line(x0: number, y0: number, x1: number, y1: number): void {
    let x = toPixel(x0);
    let y = toPixel(y0);
    const xEnd = toPixel(x1);
    const yEnd = toPixel(y1);
    const dx = Math.abs(xEnd - x);
    const sx = x < xEnd ? 1 : -1;
    const dy = -Math.abs(yEnd - y);
    const sy = y < yEnd ? 1 : -1;
    let err = dx + dy;
    for (;;) {
      this.mark(x, y);
      if (x === xEnd && y === yEnd) break;
      const e2 = err * 2;
      if (e2 >= dy) {
        err += dy;
        x += sx;
      }
      if (e2 <= dx) {
        err += dx;
        y += sy;
      }
    }
  }

  /**
   * Nonzero-winding scanline fill of one or more closed rings. A pixel is
   * covered when its center lies inside.
   */
  fillRings(rings: readonly (readonly Point[])[]): void {
    let top = Number.POSITIVE_INFINITY;
    let bottom = Number.NEGATIVE_INFINITY;
    for (const ring of rings) {
      for (const p of ring) {
        if (p.y < top) top = p.y;
        if (p.y > bottom) bottom = p.y;
      }
    }
    if (!Number.isFinite(top) || !Number.isFinite(bottom)) return;
    const rowStart = Math.max(0, toPixel(top));
    const rowEnd = Math.min(this.heightPx - 1, toPixel(bottom));
    const crossings: Crossing[] = [];
    for (let row = rowStart; row <= rowEnd; row++) {
      const sy = row + 0.5;
      crossings.length = 0;
      for (const ring of rings) {
        const n = ring.length;
        if (n < 3) continue;
        for (let i = 0; i < n; i++) {
          const a = ring[i];
          const b = ring[(i + 1) % n];
          if (a === undefined || b === undefined) continue;
          if (a.y === b.y) continue;
          const down = a.y < b.y;
          const lo = down ? a : b;
          const hi = down ? b : a;
          if (sy < lo.y || sy >= hi.y) continue;
          const x = a.x + ((sy - a.y) * (b.x - a.x)) / (b.y - a.y);
          crossings.push({ x, dir: down ? 1 : -1 });
        }
      }
      if (crossings.length < 2) continue;
      crossings.sort((p, q) => p.x - q.x);
      let winding = 0;
      for (let i = 0; i < crossings.length - 1; i++) {
        const c = crossings[i];
        const next = crossings[i + 1];
        if (c === undefined || next === undefined) continue;
        winding += c.dir;
        if (winding === 0) continue;
        const colStart = Math.max(0, Math.ceil(c.x - 0.5));
        const colEnd = Math.min(this.widthPx - 1, Math.ceil(next.x - 0.5) - 1);
        for (let col = colStart; col <= colEnd; col++) this.mark(col, row);
      }
    }
  }

  /** Filled disc approximated by a regular polygon. */
  disc(cx: number, cy: number, r: number): void {
    if (!(r > 0)) {
      this.mark(toPixel(cx), toPixel(cy));
      return;
    }
    this.fillRings([circlePoints(cx, cy, r, r)]);
  }

  /** Thick polyline: one quad per segment plus round joins. */
  thickPolyline(
    points: readonly Point[],
    width: number,
    closed: boolean,
    cap: "butt" | "round" | "square",
  ): void {
    const hw = width / 2;
    const n = points.length;
    if (n === 0) return;
    const segCount = closed ? n : n - 1;
    for (let i = 0; i < segCount; i++) {
      const a = points[i];
      const b = points[(i + 1) % n];
      if (a === undefined || b === undefined) continue;
      let ax = a.x;
      let ay = a.y;
      let bx = b.x;
      let by = b.y;
      const len = Math.hypot(bx - ax, by - ay);
      if (len === 0) continue;
      const ux = (bx - ax) / len;
      const uy = (by - ay) / len;
      if (!closed && cap === "square") {
        if (i === 0) {
          ax -= ux * hw;
          ay -= uy * hw;
        }
        if (i === segCount - 1) {
          bx += ux * hw;
          by += uy * hw;
        }
      }
      const nx = -uy * hw;
      const ny = ux * hw;
      this.fillRings([
        [
          { x: ax + nx, y: ay + ny },
          { x: bx + nx, y: by + ny },
          { x: bx - nx, y: by - ny },
          { x: ax - nx, y: ay - ny },
        ],
      ]);
    }
    for (let i = 0; i < n; i++) {
      const p = points[i];
      if (p === undefined) continue;
      const isEnd = !closed && (i === 0 || i === n - 1);
      if (isEnd && cap !== "round") continue;
      this.disc(p.x, p.y, hw);
    }
  }

  /** Source-over blend `color` into every covered pixel. */
  blendInto(rgba: Uint8Array, color: Rgba): void {
    if (this.isEmpty || color.a === 0) return;
    for (let y = this.minY; y <= this.maxY; y++) {
      for (let x = this.minX; x <= this.maxX; x++) {
        if (this.mask[y * this.widthPx + x] !== 1) continue;
        blendPixel(rgba, (y * this.widthPx + x) * 4, color.r, color.g, color.b, color.a);
      }
    }
  }
}

/** Straight-alpha source-over of one pixel at byte offset `off`. */
export function blendPixel(
  rgba: Uint8Array,
  off: number,
  r: number,
  g: number,
  b: number,
  a: number,
): void {
  if (a === 0) return;
  if (a === 255) {
    rgba[off] = r;
    rgba[off + 1] = g;
    rgba[off + 2] = b;
    rgba[off + 3] = 255;
    return;
  }
  const sa = a / 255;
  const da = (rgba[off + 3] ?? 0) / 255;
  const keep = da * (1 - sa);
  const oa = sa + keep;
  if (oa === 0) return;
  rgba[off] = clampU8((r * sa + (rgba[off] ?? 0) * keep) / oa);
  rgba[off + 1] = clampU8((g * sa + (rgba[off + 1] ?? 0) * keep) / oa);
  rgba[off + 2] = clampU8((b * sa + (rgba[off + 2] ?? 0) * keep) / oa);
  rgba[off + 3] = clampU8(oa * 255);
}

/** Points of an axis-aligned ellipse outline; segment count grows with size. */
export function circlePoints(
  cx: number,
  cy: number,
  rx: number,
  ry: number,
  deviceRadius: number = Math.max(Math.abs(rx), Math.abs(ry)),
): Point[] {
  const r = deviceRadius;
  const steps = Math.min(256, Math.max(16, Math.ceil((TAU * r) / 2)));
  const out: Point[] = [];
  for (let i = 0; i < steps; i++) {
    const t = (TAU * i) / steps;
    out.push({ x: cx + Math.cos(t) * rx, y: cy + Math.sin(t) * ry });
  }
  return out;
}
