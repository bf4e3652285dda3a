/**
 * packages/core/src/shape/shapeRecorder.ts: Vertex buffer for custom shapes.
 */

import type { Point } from "../geometry/matrix.js";

export class ShapeRecorder {
  private vertices: Point[] = [];

  get size(): number {
    return this.vertices.length;
  }

  begin(): void {
    this.vertices = [];
  }

  vertex(x: number, y: number): void {
    this.vertices.push(Object.freeze({ x, y }));
  }

  /** Recorded vertices in insertion order; the buffer is left empty. */
  end(): readonly Point[] {
    const out = this.vertices;
    this.vertices = [];
    return Object.freeze(out);
  }

  clear(): void {
    this.vertices = [];
  }
}
