/**
 * packages/core/src/sketch/sketch.ts: Processing-style drawing API.
 *
 * A Sketch owns one backend, one transform stack and one vertex buffer.
 * Coordinates are in sketch units; the backend works in device pixels and a
 * pixel-density scale sits under the user transform.
 *
 * Style changes are validated before any state is touched. Backend errors
 * propagate unchanged.
 */

import { AnimationClock, type ClockConfig } from "../animation/clock.js";
import { resolveColor } from "../color/resolve.js";
import { BLACK, type ColorArg, type Rgba, TRANSPARENT, WHITE } from "../color/types.js";
import { invalidArgument, invalidState } from "../errors.js";
import { type Matrix2D, scaling } from "../geometry/matrix.js";
import {
  type BezierPath,
  arcPath,
  bezierPoint as evalBezierPoint,
  bezierTangent as evalBezierTangent,
  ellipsePath,
} from "../shape/bezier.js";
import { ShapeRecorder } from "../shape/shapeRecorder.js";
import type { SurfaceBackend, TextAlign, TextBaseline } from "../surface/types.js";
import { TransformStack } from "../transform/transformStack.js";
import { requireFinite, requireNonNegative } from "../validate.js";
import { type SketchConfig, resolveSketchConfig } from "./config.js";
import {
  BOLD,
  BOLDITALIC,
  ITALIC,
  NORMAL,
  isHorizontalAlign,
  isTextStyle,
  isVerticalAlign,
} from "./constants.js";

export type SketchOptions = SketchConfig &
  Readonly<{
    clock?: ClockConfig;
  }>;

type StyleState = {
  fill: Rgba;
  stroke: Rgba;
  strokeWeight: number;
  isFillSet: boolean;
  isStrokeSet: boolean;
  isStrokeWeightSet: boolean;
  font: string;
  fontSize: number;
  fontStyle: typeof NORMAL | typeof ITALIC;
  fontWeight: typeof NORMAL | typeof BOLD;
  textAlign: TextAlign;
  textBaseline: TextBaseline;
};

const DEFAULT_TEXT_FILL = BLACK;
const DEFAULT_TEXT_WEIGHT = 0.3;

function defaultStyle(): StyleState {
  return {
    fill: WHITE,
    stroke: BLACK,
    strokeWeight: 1,
    isFillSet: false,
    isStrokeSet: false,
    isStrokeWeightSet: false,
    font: "Arial",
    fontSize: 12,
    fontStyle: NORMAL,
    fontWeight: NORMAL,
    textAlign: "left",
    textBaseline: "alphabetic",
  };
}

function fontSpec(s: StyleState): string {
  return `${s.fontStyle} ${s.fontWeight} ${s.fontSize}px ${s.font}`;
}

export class Sketch {
  readonly width: number;
  readonly height: number;
  readonly pixelDensity: number;
  /** The rasterizing backend, sized in device pixels. */
  readonly surface: SurfaceBackend;

  private readonly transforms: TransformStack;
  private readonly shapes = new ShapeRecorder();
  private readonly clock: AnimationClock;
  private style: StyleState = defaultStyle();
  private readonly styleStack: StyleState[] = [];
  private frameMatrix: Matrix2D | null = null;

  constructor(options: SketchOptions = {}) {
    const config = resolveSketchConfig(options);
    this.width = config.width;
    this.height = config.height;
    this.pixelDensity = config.pixelDensity;
    this.surface = config.backend(this.width * this.pixelDensity, this.height * this.pixelDensity);
    this.transforms = new TransformStack(this.surface, scaling(this.pixelDensity));
    this.applyStyle();
    this.clock = new AnimationClock(options.clock, {
      batch: (scope) => {
        this.frameMatrix = this.transforms.matrix;
        this.surface.batchRedraw(scope);
      },
      afterFrame: () => {
        this.shapes.clear();
        if (this.frameMatrix !== null) this.transforms.setMatrix(this.frameMatrix);
        this.frameMatrix = null;
      },
    });
  }

  // --- environment ---

  /** Frames started by the latest run(). */
  get frameCount(): number {
    return this.clock.frameCount;
  }

  get isLooping(): boolean {
    return this.clock.isRunning;
  }

  /** User transform, excluding the pixel-density base. */
  get matrix(): Matrix2D {
    return this.transforms.matrix;
  }

  get fillColor(): Rgba {
    return this.style.fill;
  }

  get strokeColor(): Rgba {
    return this.style.stroke;
  }

  get strokeWeightValue(): number {
    return this.style.strokeWeight;
  }

  get font(): string {
    return fontSpec(this.style);
  }

  get textAlignment(): Readonly<{ horizontal: TextAlign; vertical: TextBaseline }> {
    return Object.freeze({ horizontal: this.style.textAlign, vertical: this.style.textBaseline });
  }

  /** Number of vertices recorded since beginShape(). */
  get openVertexCount(): number {
    return this.shapes.size;
  }

  // --- color ---

  /** Paint the whole surface, ignoring the current transform and style. */
  background(...args: ColorArg[]): void {
    if (args.length === 0) return;
    const color = resolveColor(args, 255);
    const s = this.surface;
    s.save();
    s.resetTransform();
    const base = this.transforms.base;
    s.transform(base.a, base.b, base.c, base.d, base.e, base.f);
    s.setFillStyle(color);
    s.setStrokeStyle(color);
    s.setLineWidth(1);
    s.fillRect(0, 0, this.width, this.height);
    s.strokeRect(0, 0, this.width, this.height);
    s.setFillStyle(this.style.fill);
    s.setStrokeStyle(this.style.stroke);
    s.setLineWidth(this.style.strokeWeight);
    s.restore();
  }

  clear(): void {
    this.surface.clear();
  }

  fill(...args: ColorArg[]): void {
    if (args.length === 0) return;
    const color = resolveColor(args, 255);
    this.style.fill = color;
    this.style.isFillSet = true;
    this.surface.setFillStyle(color);
  }

  noFill(): void {
    this.style.fill = TRANSPARENT;
    this.style.isFillSet = true;
    this.surface.setFillStyle(TRANSPARENT);
  }

  stroke(...args: ColorArg[]): void {
    if (args.length === 0) return;
    const color = resolveColor(args, 255);
    this.style.stroke = color;
    this.style.isStrokeSet = true;
    this.surface.setStrokeStyle(color);
  }

  noStroke(): void {
    this.style.stroke = TRANSPARENT;
    this.style.isStrokeSet = true;
    this.surface.setStrokeStyle(TRANSPARENT);
  }

  strokeWeight(weight: number): void {
    requireNonNegative("strokeWeight", weight);
    this.style.strokeWeight = weight;
    this.style.isStrokeWeightSet = true;
    this.surface.setLineWidth(weight);
  }

  /** Clear pixels and restore default style and transform. */
  reset(): void {
    this.clear();
    this.shapes.clear();
    this.styleStack.length = 0;
    while (this.transforms.depth > 0) this.transforms.pop();
    this.style = defaultStyle();
    this.applyStyle();
    this.transforms.reset();
  }

  // --- 2D primitives ---

  /** Pie-slice arc, drawn clockwise from `start` to `stop` (radians). */
  arc(x: number, y: number, w: number, h: number, start: number, stop: number): void {
    requireFinite("start", start);
    requireFinite("stop", stop);
    const path = arcPath(x, y, w / 2, h / 2, start, stop);
    const s = this.surface;
    s.beginPath();
    if (path !== null) this.tracePath(path);
    s.lineTo(x, y);
    s.closePath();
    s.fill();
    s.stroke();
  }

  ellipse(x: number, y: number, w: number, h: number): void {
    this.surface.beginPath();
    this.tracePath(ellipsePath(x, y, w, h));
    this.surface.fill();
    this.surface.stroke();
  }

  circle(x: number, y: number, d: number): void {
    this.surface.fillCircle(x, y, d / 2);
    this.surface.strokeCircle(x, y, d / 2);
  }

  line(x1: number, y1: number, x2: number, y2: number): void {
    this.surface.strokeLine(x1, y1, x2, y2);
  }

  /** A dot of diameter strokeWeight in the stroke color. */
  point(x: number, y: number): void {
    const s = this.surface;
    s.setFillStyle(this.style.stroke);
    s.fillCircle(x, y, this.style.strokeWeight / 2);
    s.setFillStyle(this.style.fill);
  }

  quad(
    x1: number,
    y1: number,
    x2: number,
    y2: number,
    x3: number,
    y3: number,
    x4: number,
    y4: number,
  ): void {
    this.beginShape();
    this.vertex(x1, y1);
    this.vertex(x2, y2);
    this.vertex(x3, y3);
    this.vertex(x4, y4);
    this.endShape();
  }

  rect(x: number, y: number, w: number, h: number): void {
    this.surface.fillRect(x, y, w, h);
    this.surface.strokeRect(x, y, w, h);
  }

  square(x: number, y: number, size: number): void {
    this.rect(x, y, size, size);
  }

  triangle(x1: number, y1: number, x2: number, y2: number, x3: number, y3: number): void {
    this.beginShape();
    this.vertex(x1, y1);
    this.vertex(x2, y2);
    this.vertex(x3, y3);
    this.endShape();
  }

  /** Stroked cubic curve from (x1, y1) to (x4, y4). */
  bezier(
    x1: number,
    y1: number,
    x2: number,
    y2: number,
    x3: number,
    y3: number,
    x4: number,
    y4: number,
  ): void {
    const s = this.surface;
    s.beginPath();
    s.moveTo(x1, y1);
    s.bezierCurveTo(x2, y2, x3, y3, x4, y4);
    s.stroke();
  }

  bezierPoint(a: number, b: number, c: number, d: number, t: number): number {
    return evalBezierPoint(a, b, c, d, t);
  }

  bezierTangent(a: number, b: number, c: number, d: number, t: number): number {
    return evalBezierTangent(a, b, c, d, t);
  }

  // --- vertex ---

  beginShape(): void {
    this.shapes.begin();
  }

  vertex(x: number, y: number): void {
    this.shapes.vertex(x, y);
  }

  /**
   * Emit the recorded vertices: three or more are filled and stroked, two are
   * stroked only, fewer draw nothing. The buffer is always left empty.
   */
  endShape(): void {
    const points = this.shapes.end();
    if (points.length >= 3) {
      this.surface.fillPolygon(points);
      this.surface.strokePolygon(points);
    } else if (points.length === 2) {
      this.surface.strokePolygon(points);
    }
  }

  /** beginShape(), run `body`, then endShape() even if `body` throws. */
  shape<T>(body: () => T): T {
    this.beginShape();
    try {
      return body();
    } finally {
      this.endShape();
    }
  }

  // --- transform ---

  translate(x: number, y: number): void {
    this.transforms.translate(x, y);
  }

  rotate(angle: number): void {
    this.transforms.rotate(angle);
  }

  scale(sx: number, sy: number = sx): void {
    this.transforms.scale(sx, sy);
  }

  shearX(angle: number): void {
    this.transforms.shearX(angle);
  }

  shearY(angle: number): void {
    this.transforms.shearY(angle);
  }

  applyMatrix(a: number, b: number, c: number, d: number, e: number, f: number): void {
    this.transforms.applyMatrix(a, b, c, d, e, f);
  }

  resetMatrix(): void {
    this.transforms.reset();
  }

  /** Save transform and style. */
  push(): void {
    this.styleStack.push({ ...this.style });
    this.transforms.push();
  }

  /** Restore the state saved by the matching push(). */
  pop(): void {
    this.transforms.pop();
    const prev = this.styleStack.pop();
    if (prev !== undefined) this.style = prev;
  }

  // --- image ---

  image(src: Sketch, x: number, y: number, w: number = src.width, h: number = src.height): void {
    this.surface.drawImage(src.surface, x, y, w, h);
  }

  // --- typography ---

  /**
   * Draw `text` with its anchor at (x, y). Unset fill draws in black; a set
   * stroke with an unset weight outlines at 0.3.
   */
  text(text: string, x: number, y: number): void {
    const s = this.surface;
    if (this.style.isFillSet) {
      s.fillText(text, x, y);
    } else {
      s.setFillStyle(DEFAULT_TEXT_FILL);
      s.fillText(text, x, y);
      s.setFillStyle(this.style.fill);
    }
    if (!this.style.isStrokeSet) return;
    if (this.style.isStrokeWeightSet) {
      s.strokeText(text, x, y);
    } else {
      s.setLineWidth(DEFAULT_TEXT_WEIGHT);
      s.strokeText(text, x, y);
      s.setLineWidth(this.style.strokeWeight);
    }
  }

  textFont(name: string): void {
    const trimmed = name.trim();
    if (trimmed.length === 0) invalidArgument("textFont needs a font family name");
    this.style.font = trimmed;
    this.surface.setFont(fontSpec(this.style));
  }

  textSize(size: number): void {
    if (!Number.isFinite(size) || size <= 0) {
      invalidArgument(`textSize must be a positive number, got ${String(size)}`);
    }
    this.style.fontSize = size;
    this.surface.setFont(fontSpec(this.style));
  }

  /** Horizontal: left | center | right. Vertical: top | bottom | center | alphabetic. */
  textAlign(horizontal: string, vertical?: string): void {
    if (!isHorizontalAlign(horizontal)) invalidArgument(`bad horizontal text alignment: ${horizontal}`);
    let baseline: TextBaseline | undefined;
    if (vertical !== undefined) {
      if (!isVerticalAlign(vertical)) invalidArgument(`bad vertical text alignment: ${vertical}`);
      baseline = vertical === "center" ? "middle" : vertical;
    }
    this.style.textAlign = horizontal;
    this.surface.setTextAlign(horizontal);
    if (baseline === undefined) return;
    this.style.textBaseline = baseline;
    this.surface.setTextBaseline(baseline);
  }

  /** normal | italic | bold | bolditalic */
  textStyle(style: string): void {
    if (!isTextStyle(style)) invalidArgument(`bad text style: ${style}`);
    this.style.fontStyle = style === ITALIC || style === BOLDITALIC ? ITALIC : NORMAL;
    this.style.fontWeight = style === BOLD || style === BOLDITALIC ? BOLD : NORMAL;
    this.surface.setFont(fontSpec(this.style));
  }

  // --- animation ---

  /**
   * Call `draw` once per frame. Each frame is one batch; leftover vertices
   * are dropped and the transform is restored after every frame.
   *
   * Bad arguments and a call while already running throw synchronously.
   */
  run(draw: () => void, seconds?: number, delayMs?: number): Promise<void> {
    if (seconds !== undefined) requireNonNegative("seconds", seconds);
    if (delayMs !== undefined) requireNonNegative("delay", delayMs);
    if (this.clock.isRunning) invalidState("sketch is already running");
    return this.clock.run(draw, {
      ...(seconds === undefined ? {} : { durationSeconds: seconds }),
      ...(delayMs === undefined ? {} : { frameDelayMs: delayMs }),
    });
  }

  stop(): void {
    this.clock.stop();
  }

  /** Run `scope` as one presentation on the backend. */
  batch<T>(scope: () => T): T {
    return this.surface.batchRedraw(scope);
  }

  private tracePath(path: BezierPath): void {
    const s = this.surface;
    s.moveTo(path.start.x, path.start.y);
    for (const seg of path.segments) {
      s.bezierCurveTo(seg.c1.x, seg.c1.y, seg.c2.x, seg.c2.y, seg.end.x, seg.end.y);
    }
  }

  private applyStyle(): void {
    const s = this.surface;
    const st = this.style;
    s.setFillStyle(st.fill);
    s.setStrokeStyle(st.stroke);
    s.setLineWidth(st.strokeWeight);
    s.setLineCap("round");
    s.setFont(fontSpec(st));
    s.setTextAlign(st.textAlign);
    s.setTextBaseline(st.textBaseline);
  }
}
