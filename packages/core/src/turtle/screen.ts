/**
 * packages/core/src/turtle/screen.ts: Turtle screen: display composition and pacing.
 *
 * A Screen owns a display Sketch plus one pen-layer Sketch per turtle. Turtle
 * drawings persist on their layer; update() recomposes the display as
 * background, then every layer, then every visible turtle's shape.
 *
 * Turtle space has its origin at the display center with y pointing up.
 *
 * Tracing n: 0 never recomposes on turtle activity, 1 recomposes on every
 * turtle update (and paces animated motion by `delay` ms), n > 1 recomposes
 * on every nth update.
 */

import { type SleepFn, sleepMs } from "../animation/timing.js";
import { normalizeColorMode, colorToTuple, resolveColor } from "../color/resolve.js";
import type { ColorArg, ColorMode, Rgba } from "../color/types.js";
import { emitAudit } from "../debug/log.js";
import { InvalidShapeNameError, invalidArgument } from "../errors.js";
import { type Vec2, vec2 } from "../geometry/vec2.js";
import { Sketch } from "../sketch/sketch.js";
import { createRasterSurface } from "../surface/raster/rasterSurface.js";
import type { SurfaceFactory } from "../surface/types.js";
import { requireNonNegative, requirePositiveInt } from "../validate.js";
import { type ShapePolygon, builtinShapes, toShapePolygon } from "./shapes.js";
import type { Turtle } from "./turtle.js";

export type ScreenConfig = Readonly<{
  width?: number;
  height?: number;
  pixelDensity?: number;
  backend?: SurfaceFactory;
  /** Pause after each animated turtle step, in ms. */
  delayMs?: number;
  tracing?: number;
  colorMode?: ColorMode;
  background?: ColorArg;
  sleep?: SleepFn;
}>;

export type ResolvedScreenConfig = Readonly<{
  width: number;
  height: number;
  pixelDensity: number;
  backend: SurfaceFactory;
  delayMs: number;
  tracing: number;
  colorMode: ColorMode;
  background: Rgba;
  sleep: SleepFn;
}>;

const DEFAULT_CONFIG: ResolvedScreenConfig = Object.freeze({
  width: 400,
  height: 400,
  pixelDensity: 1,
  backend: createRasterSurface,
  delayMs: 10,
  tracing: 1,
  colorMode: 1,
  background: Object.freeze({ r: 255, g: 255, b: 255, a: 255 }),
  sleep: sleepMs,
});

function requireTracing(v: number): number {
  if (!Number.isInteger(v) || v < 0) invalidArgument("tracing must be a non-negative integer");
  return v;
}

/** Apply defaults to user-provided config, validating all values. */
export function resolveScreenConfig(config: ScreenConfig | undefined): ResolvedScreenConfig {
  if (!config) return DEFAULT_CONFIG;
  const colorMode =
    config.colorMode === undefined
      ? DEFAULT_CONFIG.colorMode
      : normalizeColorMode(config.colorMode, DEFAULT_CONFIG.colorMode);
  return Object.freeze({
    width:
      config.width === undefined ? DEFAULT_CONFIG.width : requirePositiveInt("width", config.width),
    height:
      config.height === undefined
        ? DEFAULT_CONFIG.height
        : requirePositiveInt("height", config.height),
    pixelDensity:
      config.pixelDensity === undefined
        ? DEFAULT_CONFIG.pixelDensity
        : requirePositiveInt("pixelDensity", config.pixelDensity),
    backend: typeof config.backend === "function" ? config.backend : DEFAULT_CONFIG.backend,
    delayMs:
      config.delayMs === undefined
        ? DEFAULT_CONFIG.delayMs
        : requireNonNegative("delayMs", config.delayMs),
    tracing: config.tracing === undefined ? DEFAULT_CONFIG.tracing : requireTracing(config.tracing),
    colorMode,
    background:
      config.background === undefined
        ? DEFAULT_CONFIG.background
        : resolveColor([config.background], colorMode),
    sleep: typeof config.sleep === "function" ? config.sleep : DEFAULT_CONFIG.sleep,
  });
}

export class Screen {
  readonly width: number;
  readonly height: number;
  readonly pixelDensity: number;
  readonly xscale = 1;
  readonly yscale = 1;
  /** The composed image. */
  readonly display: Sketch;

  private readonly backend: SurfaceFactory;
  private readonly sleep: SleepFn;
  private readonly attached: Turtle[] = [];
  private readonly shapes: Map<string, ShapePolygon>;
  private readonly custom = new Map<string, ShapePolygon>();
  private tracing: number;
  private delayMs: number;
  private mode: ColorMode;
  private bg: Rgba;
  private updateCounter = 0;
  private updates = 0;

  constructor(config?: ScreenConfig) {
    const resolved = resolveScreenConfig(config);
    this.width = resolved.width;
    this.height = resolved.height;
    this.pixelDensity = resolved.pixelDensity;
    this.backend = resolved.backend;
    this.sleep = resolved.sleep;
    this.tracing = resolved.tracing;
    this.delayMs = resolved.delayMs;
    this.mode = resolved.colorMode;
    this.bg = resolved.background;
    this.shapes = new Map(builtinShapes());
    this.display = this.createLayer();
    this.display.background(this.bg);
  }

  /** Settings a replacement screen should inherit. */
  get settings(): ResolvedScreenConfig {
    return Object.freeze({
      width: this.width,
      height: this.height,
      pixelDensity: this.pixelDensity,
      backend: this.backend,
      delayMs: this.delayMs,
      tracing: this.tracing,
      colorMode: this.mode,
      background: this.bg,
      sleep: this.sleep,
    });
  }

  /** Completed display compositions. */
  get updateCount(): number {
    return this.updates;
  }

  get backgroundColor(): Rgba {
    return this.bg;
  }

  turtles(): readonly Turtle[] {
    return Object.freeze([...this.attached]);
  }

  // --- settings ---

  tracer(): number;
  tracer(n: number, delayMs?: number): void;
  tracer(n?: number, delayMs?: number): number | undefined {
    if (n === undefined) return this.tracing;
    const next = requireTracing(Math.trunc(n));
    if (delayMs !== undefined) requireNonNegative("delay", delayMs);
    this.tracing = next;
    this.updateCounter = 0;
    if (delayMs !== undefined) this.delayMs = delayMs;
    if (next === 1) this.update();
    return undefined;
  }

  delay(): number;
  delay(ms: number): void;
  delay(ms?: number): number | undefined {
    if (ms === undefined) return this.delayMs;
    this.delayMs = requireNonNegative("delay", ms);
    return undefined;
  }

  /** 1 or 255; any other value leaves the mode unchanged. */
  colormode(): ColorMode;
  colormode(mode: number): void;
  colormode(mode?: number): ColorMode | undefined {
    if (mode === undefined) return this.mode;
    this.mode = normalizeColorMode(mode, this.mode);
    return undefined;
  }

  /** Resolve turtle color arguments under the current color mode. */
  resolveColor(args: readonly ColorArg[]): Rgba {
    return resolveColor(args, this.mode);
  }

  /** RGB tuple of `color` in the current color mode. */
  colorTuple(color: Rgba): readonly [number, number, number] {
    return colorToTuple(color, this.mode);
  }

  bgcolor(): readonly [number, number, number];
  bgcolor(...args: ColorArg[]): void;
  bgcolor(...args: ColorArg[]): readonly [number, number, number] | undefined {
    if (args.length === 0) return this.colorTuple(this.bg);
    this.bg = this.resolveColor(args);
    this.requestUpdate();
    return undefined;
  }

  // --- shapes ---

  registerShape(name: string, points: readonly Vec2[]): void {
    const polygon = toShapePolygon(points);
    this.shapes.set(name, polygon);
    this.custom.set(name, polygon);
  }

  hasShape(name: string): boolean {
    return this.shapes.has(name);
  }

  getShape(name: string): ShapePolygon {
    const shape = this.shapes.get(name);
    if (shape === undefined) throw new InvalidShapeNameError(name);
    return shape;
  }

  shapeNames(): readonly string[] {
    return Object.freeze([...this.shapes.keys()].sort());
  }

  /** Shapes added with registerShape(). */
  customShapes(): ReadonlyMap<string, ShapePolygon> {
    return this.custom;
  }

  // --- whole-screen operations ---

  /** Clear every turtle's drawing and reset the background to white. */
  clearScreen(): void {
    this.bg = resolveColor(["white"]);
    for (const t of this.attached) t.clear();
    this.requestUpdate();
  }

  resetScreen(): void {
    for (const t of this.attached) t.reset();
  }

  /** Run `body` with tracing off, restoring the previous tracing afterwards. */
  async noAnimation<T>(body: () => T | Promise<T>): Promise<T> {
    const prev = this.tracing;
    this.tracer(0);
    try {
      return await body();
    } finally {
      this.tracer(prev);
    }
  }

  /** Recompose the display now, regardless of tracing. */
  update(): void {
    const d = this.display;
    d.batch(() => {
      d.background(this.bg);
      for (const t of this.attached) d.image(t.layer, 0, 0);
      for (const t of this.attached) {
        if (!t.isVisible()) continue;
        const outline = t.shapeOutline();
        d.push();
        d.stroke(outline.stroke);
        d.strokeWeight(outline.width);
        d.fill(outline.fill);
        d.shape(() => {
          for (const p of outline.points) d.vertex(p.x, p.y);
        });
        d.pop();
      }
    });
    this.updates++;
    emitAudit("screen", "update", { turtles: this.attached.length, updates: this.updates });
  }

  // --- turtle plumbing ---

  /** Surface coordinates of a turtle-space point. */
  toSurface(v: Vec2): Vec2 {
    return vec2(this.width / 2 + v.x * this.xscale, this.height / 2 - v.y * this.yscale);
  }

  /** A fresh transparent Sketch matching this screen's size. */
  createLayer(): Sketch {
    return new Sketch({
      width: this.width,
      height: this.height,
      pixelDensity: this.pixelDensity,
      backend: this.backend,
    });
  }

  /**
   * @internal Turtle activity hook. Recomposes according to tracing and
   * returns whether a composition happened.
   */
  requestUpdate(): boolean {
    if (this.tracing === 0) return false;
    this.updateCounter++;
    if (this.updateCounter < this.tracing) return false;
    this.updateCounter = 0;
    this.update();
    return true;
  }

  /** @internal Pause between animated steps. */
  async pause(): Promise<void> {
    if (this.tracing !== 1 || this.delayMs <= 0) return;
    await this.sleep(this.delayMs);
  }

  /** @internal */
  attach(turtle: Turtle): void {
    if (!this.attached.includes(turtle)) this.attached.push(turtle);
  }

  /** @internal */
  detach(turtle: Turtle): void {
    const i = this.attached.indexOf(turtle);
    if (i !== -1) this.attached.splice(i, 1);
  }
}
