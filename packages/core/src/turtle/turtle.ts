/**
 * packages/core/src/turtle/turtle.ts: Turtle graphics over a Screen.
 *
 * A turtle holds its own pen-layer Sketch; it never subclasses the drawing
 * engine. Heading is stored as a unit orientation vector. All positional
 * movement goes through moveTo(), which subdivides animated moves into hops.
 *
 * Motion and rotation methods are async: with tracing 1 and a nonzero speed
 * they suspend for the screen delay after every hop. Await each call.
 */

import { sameColor } from "../color/resolve.js";
import { BLACK, type ColorArg, type Rgba } from "../color/types.js";
import { invalidArgument } from "../errors.js";
import {
  type Vec2,
  add,
  isVec2,
  length,
  rotateDeg,
  scale,
  sub,
  vec2,
} from "../geometry/vec2.js";
import type { Sketch } from "../sketch/sketch.js";
import { isHorizontalAlign, isTextStyle } from "../sketch/constants.js";
import { requireFinite, requireNonNegative, requirePositive, requirePositiveInt } from "../validate.js";
import { normalizeAngle, positiveMod, vectorHeading } from "./angles.js";
import { ScreenRegistry } from "./registry.js";
import type { Screen } from "./screen.js";

export type TurtleMode = "standard" | "logo";

export type SpeedName = "fastest" | "fast" | "normal" | "slow" | "slowest";

export type FontTuple = readonly [family: string, size: number, style: string];

export type WriteOptions = Readonly<{
  align?: string;
  font?: FontTuple;
}>;

export type TeleportOptions = Readonly<{
  /** Keep an open fill path across the jump instead of closing it. */
  fillGap?: boolean;
}>;

/** A turtle's shape as drawn on the surface. */
export type ShapeOutline = Readonly<{
  points: readonly Vec2[];
  stroke: Rgba;
  fill: Rgba;
  width: number;
}>;

const SPEEDS: Readonly<Record<SpeedName, number>> = Object.freeze({
  fastest: 0,
  fast: 10,
  normal: 6,
  slow: 3,
  slowest: 1,
});

const START_ORIENTATION: Readonly<Record<TurtleMode, Vec2>> = Object.freeze({
  standard: vec2(1, 0),
  logo: vec2(0, 1),
});

const DEFAULT_FONT: FontTuple = ["Arial", 8, "normal"];

function isSpeedName(v: string): v is SpeedName {
  return v in SPEEDS;
}

function defaultDotSize(penSize: number): number {
  return penSize + Math.max(penSize, 4);
}

export class Turtle {
  private screenRef: Screen;
  private pen: Sketch;

  private pos: Vec2 = vec2(0, 0);
  private orient: Vec2 = START_ORIENTATION.standard;
  private drawing = true;
  private penColorValue: Rgba = BLACK;
  private fillColorValue: Rgba = BLACK;
  private penSizeValue = 1;
  private speedValue = 3;
  private shown = true;
  private fillPath: Vec2[] | null = null;
  private fillPathColor: Rgba = BLACK;
  private polyPoints: Vec2[] = [];
  private creatingPoly = false;
  private shapeName = "classic";
  private stretch: readonly [number, number] = [1, 1];
  private outlineWidth = 1;
  private shear = 0;
  /** Shape tilt, radians, clockwise-positive in turtle space. */
  private tiltRad = 0;
  private modeValue: TurtleMode = "standard";
  private fullCircle = 360;
  private degreesPerUnit = 1;
  private angleOffset = 0;
  private angleOrient: 1 | -1 = 1;

  /** Attach to `target`, or to the registry's current screen. */
  constructor(target: Screen | ScreenRegistry) {
    this.screenRef = target instanceof ScreenRegistry ? target.current() : target;
    this.pen = this.screenRef.createLayer();
    this.screenRef.attach(this);
    this.reset();
  }

  get screen(): Screen {
    return this.screenRef;
  }

  /** The pen layer this turtle draws on. */
  get layer(): Sketch {
    return this.pen;
  }

  // --- motion ---

  async forward(distance: number): Promise<void> {
    await this.go(requireFinite("distance", distance));
  }

  async backward(distance: number): Promise<void> {
    await this.go(-requireFinite("distance", distance));
  }

  async right(angle: number): Promise<void> {
    await this.rotate(-requireFinite("angle", angle));
  }

  async left(angle: number): Promise<void> {
    await this.rotate(requireFinite("angle", angle));
  }

  async goto(x: number | Vec2, y?: number): Promise<void> {
    await this.moveTo(this.toPoint(x, y));
  }

  async setX(x: number): Promise<void> {
    await this.moveTo(vec2(requireFinite("x", x), this.pos.y));
  }

  async setY(y: number): Promise<void> {
    await this.moveTo(vec2(this.pos.x, requireFinite("y", y)));
  }

  /** Turn by the shortest way to face `to` (in the current angle units). */
  async setHeading(to: number): Promise<void> {
    requireFinite("heading", to);
    const full = this.fullCircle;
    const delta = (to - this.heading()) * this.angleOrient;
    await this.rotate(normalizeAngle(delta, full));
  }

  async home(): Promise<void> {
    await this.goto(0, 0);
    await this.setHeading(0);
  }

  /**
   * Approximate an arc by `steps` chords. Positive radius turns left; the
   * heading changes by exactly `extent` (full circle by default).
   */
  async circle(radius: number, extent?: number, steps?: number): Promise<void> {
    requireFinite("radius", radius);
    const ext = extent === undefined ? this.fullCircle : requireFinite("extent", extent);
    const n =
      steps === undefined
        ? 1 +
          Math.floor((Math.min(11 + Math.abs(radius) / 6, 59) * Math.abs(ext)) / this.fullCircle)
        : requirePositiveInt("steps", steps);
    let w = ext / n;
    let w2 = w / 2;
    let l = 2 * radius * Math.sin(((w2 * Math.PI) / 180) * this.degreesPerUnit);
    if (radius < 0) {
      l = -l;
      w = -w;
      w2 = -w2;
    }
    const speed = this.speedValue;
    const screen = this.screenRef;
    const prevTracing = screen.tracer();
    const prevDelay = screen.delay();
    if (speed === 0) screen.tracer(0, 0);
    else this.speedValue = 0;
    try {
      await this.rotate(w2);
      for (let i = 0; i < n; i++) {
        this.speedValue = speed;
        await this.go(l);
        this.speedValue = 0;
        await this.rotate(w);
      }
      await this.rotate(-w2);
    } finally {
      if (speed === 0) screen.tracer(prevTracing, prevDelay);
      this.speedValue = speed;
    }
  }

  /** Jump without drawing. An open fill is closed and reopened unless `fillGap`. */
  teleport(x?: number, y?: number, options: TeleportOptions = {}): void {
    const wasDown = this.drawing;
    const wasFilling = this.filling();
    const closeFill = wasFilling && options.fillGap !== true;
    this.drawing = false;
    if (closeFill) this.endFill();
    this.pos = vec2(
      x === undefined ? this.pos.x : requireFinite("x", x),
      y === undefined ? this.pos.y : requireFinite("y", y),
    );
    this.drawing = wasDown;
    if (closeFill) this.beginFill();
    this.refresh();
  }

  /** Dot of diameter `size` (default pensize + max(pensize, 4)). */
  dot(size?: number | string | readonly number[], ...color: ColorArg[]): void {
    let diameter: number;
    let fill: Rgba;
    if (color.length === 0) {
      if (size === undefined || typeof size === "number") {
        fill = this.penColorValue;
        diameter = size === undefined || size === 0 ? defaultDotSize(this.penSizeValue) : size;
      } else {
        fill = this.screenRef.resolveColor([size]);
        diameter = defaultDotSize(this.penSizeValue);
      }
    } else {
      if (size !== undefined && typeof size !== "number") {
        invalidArgument("dot size must be a number when a color is given");
      }
      fill = this.screenRef.resolveColor(color);
      diameter = size === undefined ? defaultDotSize(this.penSizeValue) : size;
    }
    requireNonNegative("dot size", diameter);
    const at = this.screenRef.toSurface(this.pos);
    const pen = this.pen;
    pen.push();
    pen.noStroke();
    pen.fill(fill);
    pen.circle(at.x, at.y, diameter);
    pen.pop();
    this.refresh();
  }

  /** Draw the turtle shape onto the pen layer at the current position. */
  stamp(): void {
    const outline = this.shapeOutline();
    const pen = this.pen;
    pen.push();
    pen.stroke(outline.stroke);
    pen.strokeWeight(outline.width);
    pen.fill(outline.fill);
    pen.shape(() => {
      for (const p of outline.points) pen.vertex(p.x, p.y);
    });
    pen.pop();
    this.refresh();
  }

  speed(): number;
  speed(value: number | SpeedName): void;
  speed(value?: number | SpeedName): number | undefined {
    if (value === undefined) return this.speedValue;
    if (typeof value === "string") {
      this.speedValue = isSpeedName(value) ? SPEEDS[value] : 0;
    } else if (value > 0.5 && value < 10.5) {
      this.speedValue = Math.round(value);
    } else {
      this.speedValue = 0;
    }
    return undefined;
  }

  // --- state queries ---

  position(): Vec2 {
    return this.pos;
  }

  xcor(): number {
    return this.pos.x;
  }

  ycor(): number {
    return this.pos.y;
  }

  /** Current heading in [0, fullCircle). */
  heading(): number {
    return this.toUserAngle(vectorHeading(this.orient));
  }

  /** Heading from this turtle towards a point. */
  towards(x: number | Vec2, y?: number): number {
    return this.toUserAngle(vectorHeading(sub(this.toPoint(x, y), this.pos)));
  }

  distance(x: number | Vec2 | Turtle, y?: number): number {
    const target = x instanceof Turtle ? x.position() : this.toPoint(x, y);
    return length(sub(target, this.pos));
  }

  // --- units ---

  degrees(fullCircle = 360): void {
    requirePositive("fullCircle", fullCircle);
    this.fullCircle = fullCircle;
    this.degreesPerUnit = 360 / fullCircle;
    this.angleOffset = this.modeValue === "standard" ? 0 : fullCircle / 4;
  }

  radians(): void {
    this.degrees(2 * Math.PI);
  }

  /**
   * standard: 0 is east, angles counter-clockwise.
   * logo: 0 is north, angles clockwise.
   * Setting a mode resets the turtle.
   */
  mode(): TurtleMode;
  mode(mode: TurtleMode): void;
  mode(mode?: TurtleMode): TurtleMode | undefined {
    if (mode === undefined) return this.modeValue;
    if (mode !== "standard" && mode !== "logo") invalidArgument(`bad turtle mode: ${String(mode)}`);
    this.modeValue = mode;
    this.reset();
    return undefined;
  }

  // --- pen ---

  penDown(): void {
    this.drawing = true;
  }

  penUp(): void {
    this.drawing = false;
  }

  isDown(): boolean {
    return this.drawing;
  }

  penSize(): number;
  penSize(width: number): void;
  penSize(width?: number): number | undefined {
    if (width === undefined) return this.penSizeValue;
    this.penSizeValue = requireNonNegative("pensize", width);
    this.pen.strokeWeight(width);
    return undefined;
  }

  /**
   * One argument sets both colors; two set pen and fill; three numbers are
   * one RGB color for both.
   */
  color(): readonly [readonly [number, number, number], readonly [number, number, number]];
  color(...args: ColorArg[]): void;
  color(
    ...args: ColorArg[]
  ): readonly [readonly [number, number, number], readonly [number, number, number]] | undefined {
    const s = this.screenRef;
    if (args.length === 0) {
      return [s.colorTuple(this.penColorValue), s.colorTuple(this.fillColorValue)];
    }
    let penColor: Rgba;
    let fillColor: Rgba;
    if (args.length === 2) {
      const [p, f] = args;
      penColor = s.resolveColor(p === undefined ? [] : [p]);
      fillColor = s.resolveColor(f === undefined ? [] : [f]);
    } else {
      penColor = s.resolveColor(args);
      fillColor = penColor;
    }
    this.penColorValue = penColor;
    this.pen.stroke(penColor);
    this.fillColorValue = fillColor;
    this.refresh();
    return undefined;
  }

  penColor(): readonly [number, number, number];
  penColor(...args: ColorArg[]): void;
  penColor(...args: ColorArg[]): readonly [number, number, number] | undefined {
    if (args.length === 0) return this.screenRef.colorTuple(this.penColorValue);
    const color = this.screenRef.resolveColor(args);
    if (sameColor(color, this.penColorValue)) return undefined;
    this.penColorValue = color;
    this.pen.stroke(color);
    this.refresh();
    return undefined;
  }

  fillColor(): readonly [number, number, number];
  fillColor(...args: ColorArg[]): void;
  fillColor(...args: ColorArg[]): readonly [number, number, number] | undefined {
    if (args.length === 0) return this.screenRef.colorTuple(this.fillColorValue);
    const color = this.screenRef.resolveColor(args);
    if (sameColor(color, this.fillColorValue)) return undefined;
    this.fillColorValue = color;
    this.refresh();
    return undefined;
  }

  filling(): boolean {
    return this.fillPath !== null;
  }

  /** Start recording a fill path; the fill color is captured now. */
  beginFill(): void {
    this.fillPath = [this.pos];
    this.fillPathColor = this.fillColorValue;
  }

  /** Fill the recorded path if it has at least 3 points. */
  endFill(): void {
    const path = this.fillPath;
    if (path === null) return;
    this.fillPath = null;
    if (path.length > 2) {
      const screen = this.screenRef;
      const pen = this.pen;
      pen.push();
      if (!this.drawing) pen.noStroke();
      pen.fill(this.fillPathColor);
      pen.shape(() => {
        for (const v of path) {
          const p = screen.toSurface(v);
          pen.vertex(p.x, p.y);
        }
      });
      pen.pop();
    }
    this.refresh();
  }

  /** beginFill(), run `body`, then endFill() even if `body` throws. */
  async fill<T>(body: () => T | Promise<T>): Promise<T> {
    this.beginFill();
    try {
      return await body();
    } finally {
      this.endFill();
    }
  }

  beginPoly(): void {
    this.polyPoints = [this.pos];
    this.creatingPoly = true;
  }

  endPoly(): void {
    this.creatingPoly = false;
  }

  /** Vertices recorded by the last beginPoly()/endPoly() pair. */
  getPoly(): readonly Vec2[] {
    return Object.freeze([...this.polyPoints]);
  }

  async poly<T>(body: () => T | Promise<T>): Promise<T> {
    this.beginPoly();
    try {
      return await body();
    } finally {
      this.endPoly();
    }
  }

  /** Draw text at the turtle position in the pen color. */
  write(text: unknown, options: WriteOptions = {}): void {
    const align = (options.align ?? "left").toLowerCase();
    const [family, size, style] = options.font ?? DEFAULT_FONT;
    if (!isHorizontalAlign(align)) {
      invalidArgument('Invalid text alignment. Must be "left", "center", or "right".');
    }
    if (typeof size !== "number" || !Number.isFinite(size) || size <= 0) {
      invalidArgument("Font size must be a positive number.");
    }
    if (!isTextStyle(style)) {
      invalidArgument('Invalid font type. Must be "normal", "italic", "bold", or "bolditalic".');
    }
    const at = this.screenRef.toSurface(this.pos);
    const pen = this.pen;
    pen.push();
    pen.fill(this.penColorValue);
    pen.noStroke();
    pen.textAlign(align);
    pen.textFont(family);
    pen.textSize(size);
    pen.textStyle(style);
    pen.text(String(text), at.x, at.y);
    pen.pop();
    this.refresh();
  }

  /** Erase this turtle's drawings; state is kept. */
  clear(): void {
    this.pen.clear();
    this.refresh();
  }

  /** Erase drawings and restore every default, keeping the mode. */
  reset(): void {
    this.drawing = true;
    this.penColorValue = BLACK;
    this.penSizeValue = 1;
    this.pen.reset();
    this.pen.stroke(BLACK);
    this.pen.strokeWeight(1);
    this.pen.noFill();
    this.speedValue = 3;
    this.shown = true;
    this.fillColorValue = BLACK;
    this.fillPath = null;
    this.polyPoints = [];
    this.creatingPoly = false;
    this.shapeName = "classic";
    this.stretch = [1, 1];
    this.shear = 0;
    this.tiltRad = 0;
    this.outlineWidth = 1;
    this.angleOrient = this.modeValue === "standard" ? 1 : -1;
    this.degrees();
    this.pos = vec2(0, 0);
    this.orient = START_ORIENTATION[this.modeValue];
    this.refresh();
  }

  // --- turtle state ---

  showTurtle(): void {
    this.shown = true;
    this.refresh();
  }

  hideTurtle(): void {
    this.shown = false;
    this.refresh();
  }

  isVisible(): boolean {
    return this.shown;
  }

  shape(): string;
  shape(name: string): void;
  shape(name?: string): string | undefined {
    if (name === undefined) return this.shapeName;
    this.screenRef.getShape(name);
    this.shapeName = name;
    this.refresh();
    return undefined;
  }

  /** Stretch perpendicular to (wid) and along (len) the heading, plus outline width. */
  shapeSize(): readonly [number, number, number];
  shapeSize(wid?: number, len?: number, outline?: number): void;
  shapeSize(wid?: number, len?: number, outline?: number): readonly [number, number, number] | undefined {
    if (wid === undefined && len === undefined && outline === undefined) {
      return [this.stretch[0], this.stretch[1], this.outlineWidth];
    }
    if (wid === 0 || len === 0) invalidArgument("stretch_wid/stretch_len must not be zero");
    if (wid !== undefined) requireFinite("stretch_wid", wid);
    if (len !== undefined) requireFinite("stretch_len", len);
    if (outline !== undefined) requireNonNegative("outline", outline);
    if (wid !== undefined) this.stretch = [wid, len ?? wid];
    else if (len !== undefined) this.stretch = [this.stretch[0], len];
    if (outline !== undefined) this.outlineWidth = outline;
    this.refresh();
    return undefined;
  }

  shearFactor(): number;
  shearFactor(shear: number): void;
  shearFactor(shear?: number): number | undefined {
    if (shear === undefined) return this.shear;
    this.shear = requireFinite("shear", shear);
    this.refresh();
    return undefined;
  }

  /** Shape tilt relative to the heading, in the current angle units. */
  tiltAngle(): number;
  tiltAngle(angle: number): void;
  tiltAngle(angle?: number): number | undefined {
    if (angle === undefined) {
      const tilt = ((-this.tiltRad * 180) / Math.PI) * this.angleOrient;
      return positiveMod(tilt / this.degreesPerUnit, this.fullCircle);
    }
    requireFinite("tilt", angle);
    const degrees = -angle * this.degreesPerUnit * this.angleOrient;
    this.tiltRad = positiveMod((degrees * Math.PI) / 180, 2 * Math.PI);
    this.refresh();
    return undefined;
  }

  tilt(angle: number): void {
    this.tiltAngle(requireFinite("tilt", angle) + this.tiltAngle());
  }

  /** The turtle's shape polygon in turtle space: stretch, shear and tilt, then heading. */
  shapePolygon(): readonly Vec2[] {
    const base = this.screenRef.getShape(this.shapeName);
    const [scx, scy] = this.stretch;
    const sa = Math.sin(this.tiltRad);
    const ca = Math.cos(this.tiltRad);
    const t11 = scx * ca;
    const t12 = scy * (this.shear * ca + sa);
    const t21 = -scx * sa;
    const t22 = scy * (ca - this.shear * sa);
    const e = scale(this.orient, 1 / length(this.orient));
    return base.map((v) => {
      const x = t11 * v.x + t12 * v.y;
      const y = t21 * v.x + t22 * v.y;
      return vec2(this.pos.x + e.y * x + e.x * y, this.pos.y - e.x * x + e.y * y);
    });
  }

  /** Shape polygon in surface coordinates, with its colors. */
  shapeOutline(): ShapeOutline {
    const screen = this.screenRef;
    return Object.freeze({
      points: Object.freeze(this.shapePolygon().map((v) => screen.toSurface(v))),
      stroke: this.penColorValue,
      fill: this.fillColorValue,
      width: this.outlineWidth,
    });
  }

  /** @internal Move onto a replacement screen with a fresh pen layer. */
  rebind(screen: Screen): void {
    this.screenRef.detach(this);
    this.screenRef = screen;
    this.pen = screen.createLayer();
    screen.attach(this);
  }

  // --- internals ---

  private toPoint(x: number | Vec2, y?: number): Vec2 {
    if (isVec2(x)) return vec2(requireFinite("x", x.x), requireFinite("y", x.y));
    if (y === undefined) invalidArgument("a y coordinate is required with a numeric x");
    return vec2(requireFinite("x", x), requireFinite("y", y));
  }

  private toUserAngle(mathDegrees: number): number {
    const units = mathDegrees / this.degreesPerUnit;
    return positiveMod(this.angleOffset + this.angleOrient * units, this.fullCircle);
  }

  private async go(distance: number): Promise<void> {
    await this.moveTo(add(this.pos, scale(this.orient, distance)));
  }

  private async rotate(angle: number): Promise<void> {
    this.orient = rotateDeg(this.orient, angle * this.degreesPerUnit);
    await this.step();
  }

  /**
   * The single positional chokepoint. Animated moves are split into
   * 1 + floor(dist / (3 · 1.1^speed · speed)) hops; hop n draws from hop
   * n-1 to hop n.
   */
  private async moveTo(end: Vec2): Promise<void> {
    const start = this.pos;
    const screen = this.screenRef;
    const speed = this.speedValue;
    if (speed > 0 && screen.tracer() === 1) {
      const diff = sub(end, start);
      const dist = Math.sqrt((diff.x * screen.xscale) ** 2 + (diff.y * screen.yscale) ** 2);
      const hops = 1 + Math.floor(dist / (3 * 1.1 ** speed * speed));
      const delta = scale(diff, 1 / hops);
      let prev = start;
      for (let n = 1; n <= hops; n++) {
        const next = add(start, scale(delta, n));
        this.pos = next;
        if (this.drawing) this.drawSegment(prev, next);
        prev = next;
        await this.step();
      }
    } else if (this.drawing) {
      this.drawSegment(start, end);
    }
    if (this.fillPath !== null) this.fillPath.push(end);
    if (this.creatingPoly) this.polyPoints.push(end);
    this.pos = end;
    this.refresh();
  }

  private drawSegment(from: Vec2, to: Vec2): void {
    const a = this.screenRef.toSurface(from);
    const b = this.screenRef.toSurface(to);
    this.pen.line(a.x, a.y, b.x, b.y);
  }

  /** Redraw; with tracing 1 and a nonzero speed, also pause. */
  private async step(): Promise<void> {
    const drawn = this.screenRef.requestUpdate();
    if (drawn && this.speedValue > 0) await this.screenRef.pause();
  }

  private refresh(): void {
    this.screenRef.requestUpdate();
  }
}
