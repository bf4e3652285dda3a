/**
 * packages/node/src/export.ts: Write sketches and turtle screens to PNG files.
 */

import { mkdirSync, writeFileSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { type BitmapSource, type Screen, type Sketch, emitAudit } from "@sketchpad/core";
import { encodeBitmap } from "./png.js";

/** Encode `source` and write it to `path`, creating parent directories. Returns the resolved path. */
export function savePng(source: BitmapSource, path: string): string {
  if (path.length === 0) throw new TypeError("savePng(path): path must be a non-empty string");
  const target = resolve(path);
  const bytes = encodeBitmap(source);
  mkdirSync(dirname(target), { recursive: true });
  writeFileSync(target, bytes);
  emitAudit("export", "png", { path: target, width: source.width, height: source.height });
  return target;
}

/** Save the sketch's backend bitmap (device pixels). */
export function saveSketch(sketch: Sketch, path: string): string {
  return savePng(sketch.surface, path);
}

/** Recompose the screen, then save its display. */
export function saveScreen(screen: Screen, path: string): string {
  screen.update();
  return saveSketch(screen.display, path);
}
