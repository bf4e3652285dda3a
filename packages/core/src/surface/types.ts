/**
 * packages/core/src/surface/types.ts: Rasterizing collaborator contract.
 *
 * Everything the drawing engines know about pixels goes through
 * SurfaceBackend. The backend owns its own current transform; callers mirror
 * every transform change onto it and never map coordinates themselves.
 */

import type { Rgba } from "../color/types.js";
import type { Point } from "../geometry/matrix.js";

export type TextAlign = "left" | "center" | "right";
export type TextBaseline = "top" | "middle" | "bottom" | "alphabetic";
export type LineCap = "butt" | "round" | "square";

/** A readable RGBA8 bitmap (row-major, 4 bytes per pixel, straight alpha). */
export interface BitmapSource {
  readonly width: number;
  readonly height: number;
  pixels(): Uint8Array;
}

/** Text drawn on a surface, kept as data since glyph rasterization is out of scope. */
export type TextOverlay = Readonly<{
  text: string;
  /** Device-space anchor after the transform in effect. */
  x: number;
  y: number;
  font: string;
  align: TextAlign;
  baseline: TextBaseline;
  color: Rgba;
  mode: "fill" | "stroke";
}>;

export interface SurfaceBackend extends BitmapSource {
  setFillStyle(color: Rgba): void;
  setStrokeStyle(color: Rgba): void;
  setLineWidth(width: number): void;
  setLineCap(cap: LineCap): void;
  setFont(spec: string): void;
  setTextAlign(align: TextAlign): void;
  setTextBaseline(baseline: TextBaseline): void;

  fillRect(x: number, y: number, w: number, h: number): void;
  strokeRect(x: number, y: number, w: number, h: number): void;
  fillCircle(x: number, y: number, r: number): void;
  strokeCircle(x: number, y: number, r: number): void;
  strokeLine(x1: number, y1: number, x2: number, y2: number): void;
  fillPolygon(points: readonly Point[]): void;
  strokePolygon(points: readonly Point[]): void;

  beginPath(): void;
  moveTo(x: number, y: number): void;
  lineTo(x: number, y: number): void;
  bezierCurveTo(c1x: number, c1y: number, c2x: number, c2y: number, x: number, y: number): void;
  closePath(): void;
  fill(): void;
  stroke(): void;

  translate(x: number, y: number): void;
  rotate(angle: number): void;
  scale(sx: number, sy: number): void;
  transform(a: number, b: number, c: number, d: number, e: number, f: number): void;
  resetTransform(): void;
  save(): void;
  restore(): void;

  fillText(text: string, x: number, y: number): void;
  strokeText(text: string, x: number, y: number): void;
  drawImage(source: BitmapSource, x: number, y: number, w: number, h: number): void;

  /** Coalesce every call made inside `scope` into one presentation. */
  batchRedraw<T>(scope: () => T): T;
  /** Wipe pixels and text to transparent without touching state. */
  clear(): void;
}

/** Creates the backend for a surface of `width`×`height` device pixels. */
export type SurfaceFactory = (width: number, height: number) => SurfaceBackend;
