/**
 * packages/core/src/transform/transformStack.ts: Observable user transform.
 *
 * Holds the user matrix and mirrors every change 1:1 onto the backend. Each
 * operation pre-multiplies (`M = Op · M`), so it acts in the space already
 * established by earlier calls. A fixed base matrix (pixel density) sits
 * under the user matrix and is re-applied by reset().
 */

import { invalidState } from "../errors.js";
import {
  IDENTITY,
  type Matrix2D,
  fromCoefficients,
  multiply,
  rotation,
  scaling,
  shearXMatrix,
  shearYMatrix,
  translation,
} from "../geometry/matrix.js";
import type { SurfaceBackend } from "../surface/types.js";

export class TransformStack {
  private current: Matrix2D = IDENTITY;
  private readonly saved: Matrix2D[] = [];

  constructor(
    private readonly backend: SurfaceBackend,
    readonly base: Matrix2D = IDENTITY,
  ) {
    this.applyBase();
  }

  /** User matrix, excluding the base. */
  get matrix(): Matrix2D {
    return this.current;
  }

  /** User space → device pixels. */
  get deviceMatrix(): Matrix2D {
    return multiply(this.current, this.base);
  }

  get depth(): number {
    return this.saved.length;
  }

  translate(x: number, y: number): void {
    this.current = multiply(translation(x, y), this.current);
    this.backend.translate(x, y);
  }

  rotate(angle: number): void {
    this.current = multiply(rotation(angle), this.current);
    this.backend.rotate(angle);
  }

  scale(sx: number, sy: number = sx): void {
    this.current = multiply(scaling(sx, sy), this.current);
    this.backend.scale(sx, sy);
  }

  shearX(angle: number): void {
    this.compose(shearXMatrix(angle));
  }

  shearY(angle: number): void {
    this.compose(shearYMatrix(angle));
  }

  applyMatrix(a: number, b: number, c: number, d: number, e: number, f: number): void {
    this.compose(fromCoefficients(a, b, c, d, e, f));
  }

  reset(): void {
    this.current = IDENTITY;
    this.applyBase();
  }

  /** Replace the user matrix wholesale (used to restore a pre-frame state). */
  setMatrix(m: Matrix2D): void {
    this.current = m;
    this.applyBase();
    this.backend.transform(m.a, m.b, m.c, m.d, m.e, m.f);
  }

  push(): void {
    this.saved.push(this.current);
    this.backend.save();
  }

  pop(): void {
    const prev = this.saved.pop();
    if (prev === undefined) invalidState("pop() without a matching push()");
    this.current = prev;
    this.backend.restore();
  }

  private compose(op: Matrix2D): void {
    this.current = multiply(op, this.current);
    this.backend.transform(op.a, op.b, op.c, op.d, op.e, op.f);
  }

  private applyBase(): void {
    const b = this.base;
    this.backend.resetTransform();
    this.backend.transform(b.a, b.b, b.c, b.d, b.e, b.f);
  }
}
