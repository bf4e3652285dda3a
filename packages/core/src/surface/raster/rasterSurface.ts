/**
 * packages/core/src/surface/raster/rasterSurface.ts: Software SurfaceBackend.
 *
 * Renders into an RGBA8 buffer. Every primitive becomes user-space geometry
 * mapped through the current transform, then coverage-filled in device
 * space. Text is not rasterized; it is recorded as overlays.
 */

import { BLACK, type Rgba, TRANSPARENT } from "../../color/types.js";
import {
  IDENTITY,
  type Matrix2D,
  type Point,
  applyToPoint,
  fromCoefficients,
  invert,
  meanScale,
  multiply,
  rotation,
  scaling,
  translation,
} from "../../geometry/matrix.js";
import { flattenCubic } from "../../shape/bezier.js";
import type {
  BitmapSource,
  LineCap,
  SurfaceBackend,
  TextAlign,
  TextBaseline,
  TextOverlay,
} from "../types.js";
import { Coverage, blendPixel, circlePoints } from "./coverage.js";

type DrawState = {
  matrix: Matrix2D;
  fill: Rgba;
  stroke: Rgba;
  lineWidth: number;
  lineCap: LineCap;
  font: string;
  align: TextAlign;
  baseline: TextBaseline;
};

type SubPath = { points: Point[]; closed: boolean };

export type PresentListener = (surface: RasterSurface) => void;

const CURVE_STEPS = 16;

function initialState(): DrawState {
  return {
    matrix: IDENTITY,
    fill: BLACK,
    stroke: BLACK,
    lineWidth: 1,
    lineCap: "butt",
    font: "10px sans-serif",
    align: "left",
    baseline: "alphabetic",
  };
}

export class RasterSurface implements SurfaceBackend {
  readonly width: number;
  readonly height: number;
  private readonly rgba: Uint8Array;
  private readonly textOverlays: TextOverlay[] = [];
  private state: DrawState = initialState();
  private readonly stack: DrawState[] = [];
  private path: SubPath[] = [];
  private batchDepth = 0;
  private presented = 0;
  private readonly listeners = new Set<PresentListener>();

  constructor(width: number, height: number) {
    this.width = Math.max(0, Math.trunc(width));
    this.height = Math.max(0, Math.trunc(height));
    this.rgba = new Uint8Array(this.width * this.height * 4);
  }

  /** Live view of the pixel buffer. */
  pixels(): Uint8Array {
    return this.rgba;
  }

  getPixel(x: number, y: number): Rgba {
    if (x < 0 || y < 0 || x >= this.width || y >= this.height) return TRANSPARENT;
    const off = (Math.trunc(y) * this.width + Math.trunc(x)) * 4;
    return Object.freeze({
      r: this.rgba[off] ?? 0,
      g: this.rgba[off + 1] ?? 0,
      b: this.rgba[off + 2] ?? 0,
      a: this.rgba[off + 3] ?? 0,
    });
  }

  get overlays(): readonly TextOverlay[] {
    return this.textOverlays;
  }

  get currentTransform(): Matrix2D {
    return this.state.matrix;
  }

  /** Number of completed outermost batches. */
  get presentCount(): number {
    return this.presented;
  }

  onPresent(listener: PresentListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  // --- style ---

  setFillStyle(color: Rgba): void {
    this.state.fill = color;
  }

  setStrokeStyle(color: Rgba): void {
    this.state.stroke = color;
  }

  setLineWidth(width: number): void {
    if (Number.isFinite(width) && width >= 0) this.state.lineWidth = width;
  }

  setLineCap(cap: LineCap): void {
    this.state.lineCap = cap;
  }

  setFont(spec: string): void {
    this.state.font = spec;
  }

  setTextAlign(align: TextAlign): void {
    this.state.align = align;
  }

  setTextBaseline(baseline: TextBaseline): void {
    this.state.baseline = baseline;
  }

  // --- primitives ---

  fillRect(x: number, y: number, w: number, h: number): void {
    this.fillRings([this.rectPoints(x, y, w, h)]);
  }

  strokeRect(x: number, y: number, w: number, h: number): void {
    this.strokeRuns([{ points: this.rectPoints(x, y, w, h), closed: true }]);
  }

  fillCircle(x: number, y: number, r: number): void {
    this.fillRings([this.circleRing(x, y, r)]);
  }

  strokeCircle(x: number, y: number, r: number): void {
    this.strokeRuns([{ points: this.circleRing(x, y, r), closed: true }]);
  }

  strokeLine(x1: number, y1: number, x2: number, y2: number): void {
    this.strokeRuns([{ points: [this.map(x1, y1), this.map(x2, y2)], closed: false }]);
  }

  fillPolygon(points: readonly Point[]): void {
    this.fillRings([points.map((p) => this.map(p.x, p.y))]);
  }

  strokePolygon(points: readonly Point[]): void {
    this.strokeRuns([{ points: points.map((p) => this.map(p.x, p.y)), closed: true }]);
  }

  // --- paths ---

  beginPath(): void {
    this.path = [];
  }

  moveTo(x: number, y: number): void {
    this.path.push({ points: [this.map(x, y)], closed: false });
  }

  lineTo(x: number, y: number): void {
    this.openSubPath(x, y).points.push(this.map(x, y));
  }

  bezierCurveTo(c1x: number, c1y: number, c2x: number, c2y: number, x: number, y: number): void {
    const sub = this.openSubPath(c1x, c1y);
    const from = sub.points[sub.points.length - 1] ?? this.map(c1x, c1y);
    const pts = flattenCubic(from, this.map(c1x, c1y), this.map(c2x, c2y), this.map(x, y), CURVE_STEPS);
    for (let i = 1; i < pts.length; i++) {
      const p = pts[i];
      if (p !== undefined) sub.points.push(p);
    }
  }

  closePath(): void {
    const last = this.path[this.path.length - 1];
    if (last === undefined || last.points.length === 0) return;
    last.closed = true;
    const first = last.points[0];
    if (first !== undefined) this.path.push({ points: [first], closed: false });
  }

  fill(): void {
    this.fillRings(this.path.map((s) => s.points));
  }

  stroke(): void {
    this.strokeRuns(this.path);
  }

  // --- transform ---

  translate(x: number, y: number): void {
    this.state.matrix = multiply(translation(x, y), this.state.matrix);
  }

  rotate(angle: number): void {
    this.state.matrix = multiply(rotation(angle), this.state.matrix);
  }

  scale(sx: number, sy: number): void {
    this.state.matrix = multiply(scaling(sx, sy), this.state.matrix);
  }

  transform(a: number, b: number, c: number, d: number, e: number, f: number): void {
    this.state.matrix = multiply(fromCoefficients(a, b, c, d, e, f), this.state.matrix);
  }

  resetTransform(): void {
    this.state.matrix = IDENTITY;
  }

  save(): void {
    this.stack.push({ ...this.state });
  }

  restore(): void {
    const prev = this.stack.pop();
    if (prev !== undefined) this.state = prev;
  }

  // --- text and images ---

  fillText(text: string, x: number, y: number): void {
    this.pushText(text, x, y, "fill", this.state.fill);
  }

  strokeText(text: string, x: number, y: number): void {
    this.pushText(text, x, y, "stroke", this.state.stroke);
  }

  /** Nearest-neighbor copy of `source` into the user-space rectangle (x, y, w, h). */
  drawImage(source: BitmapSource, x: number, y: number, w: number, h: number): void {
    if (!(w > 0) || !(h > 0) || source.width <= 0 || source.height <= 0) return;
    const inverse = invert(this.state.matrix);
    if (inverse === null) return;
    const corners = this.rectPoints(x, y, w, h);
    let minX = Number.POSITIVE_INFINITY;
    let minY = Number.POSITIVE_INFINITY;
    let maxX = Number.NEGATIVE_INFINITY;
    let maxY = Number.NEGATIVE_INFINITY;
    for (const p of corners) {
      minX = Math.min(minX, p.x);
      minY = Math.min(minY, p.y);
      maxX = Math.max(maxX, p.x);
      maxY = Math.max(maxY, p.y);
    }
    const src = source.pixels();
    const x0 = Math.max(0, Math.floor(minX));
    const y0 = Math.max(0, Math.floor(minY));
    const x1 = Math.min(this.width - 1, Math.ceil(maxX));
    const y1 = Math.min(this.height - 1, Math.ceil(maxY));
    for (let py = y0; py <= y1; py++) {
      for (let px = x0; px <= x1; px++) {
        const u = applyToPoint(inverse, px + 0.5, py + 0.5);
        if (u.x < x || u.y < y || u.x >= x + w || u.y >= y + h) continue;
        const sx = Math.min(source.width - 1, Math.floor(((u.x - x) / w) * source.width));
        const sy = Math.min(source.height - 1, Math.floor(((u.y - y) / h) * source.height));
        const so = (sy * source.width + sx) * 4;
        blendPixel(
          this.rgba,
          (py * this.width + px) * 4,
          src[so] ?? 0,
          src[so + 1] ?? 0,
          src[so + 2] ?? 0,
          src[so + 3] ?? 0,
        );
      }
    }
  }

  batchRedraw<T>(scope: () => T): T {
    this.batchDepth++;
    try {
      return scope();
    } finally {
      this.batchDepth--;
      if (this.batchDepth === 0) this.present();
    }
  }

  clear(): void {
    this.rgba.fill(0);
    this.textOverlays.length = 0;
  }

  // --- internals ---

  private present(): void {
    this.presented++;
    for (const listener of this.listeners) listener(this);
  }

  private map(x: number, y: number): Point {
    return applyToPoint(this.state.matrix, x, y);
  }

  private rectPoints(x: number, y: number, w: number, h: number): Point[] {
    return [this.map(x, y), this.map(x + w, y), this.map(x + w, y + h), this.map(x, y + h)];
  }

  private circleRing(x: number, y: number, r: number): Point[] {
    const deviceRadius = Math.abs(r) * meanScale(this.state.matrix);
    return circlePoints(x, y, r, r, deviceRadius).map((p) => this.map(p.x, p.y));
  }

  private openSubPath(x: number, y: number): SubPath {
    const last = this.path[this.path.length - 1];
    if (last !== undefined && !last.closed) return last;
    const sub: SubPath = { points: [this.map(x, y)], closed: false };
    this.path.push(sub);
    return sub;
  }

  private fillRings(rings: readonly (readonly Point[])[]): void {
    if (this.state.fill.a === 0) return;
    const coverage = new Coverage(this.width, this.height);
    coverage.fillRings(rings);
    coverage.blendInto(this.rgba, this.state.fill);
  }

  private strokeRuns(runs: readonly SubPath[]): void {
    if (this.state.stroke.a === 0 || this.state.lineWidth === 0) return;
    const width = this.state.lineWidth * meanScale(this.state.matrix);
    const coverage = new Coverage(this.width, this.height);
    for (const run of runs) {
      const pts = run.points;
      if (pts.length === 0) continue;
      if (width <= 1) {
        const n = pts.length;
        if (n === 1) {
          const p = pts[0];
          if (p !== undefined) coverage.line(p.x, p.y, p.x, p.y);
          continue;
        }
        const segCount = run.closed ? n : n - 1;
        for (let i = 0; i < segCount; i++) {
          const a = pts[i];
          const b = pts[(i + 1) % n];
          if (a !== undefined && b !== undefined) coverage.line(a.x, a.y, b.x, b.y);
        }
        continue;
      }
      if (pts.length === 1 && this.state.lineCap !== "round") continue;
      coverage.thickPolyline(pts, width, run.closed, this.state.lineCap);
    }
    coverage.blendInto(this.rgba, this.state.stroke);
  }

  private pushText(text: string, x: number, y: number, mode: "fill" | "stroke", color: Rgba): void {
    if (text.length === 0 || color.a === 0) return;
    const at = this.map(x, y);
    this.textOverlays.push(
      Object.freeze({
        text,
        x: at.x,
        y: at.y,
        font: this.state.font,
        align: this.state.align,
        baseline: this.state.baseline,
        color,
        mode,
      }),
    );
  }
}

/** Default SurfaceFactory. */
export function createRasterSurface(width: number, height: number): RasterSurface {
  return new RasterSurface(width, height);
}
