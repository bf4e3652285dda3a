/**
 * packages/testkit/src/recordingSurface.ts: In-process SurfaceBackend that records calls.
 *
 * Every collaborator call is appended to `calls` as `{ op, args }`. Nothing is
 * rasterized; `pixels()` is an all-transparent buffer of the requested size.
 * batchRedraw records `batchStart`/`batchEnd` around its scope.
 */

import type {
  BitmapSource,
  LineCap,
  Point,
  Rgba,
  SurfaceBackend,
  SurfaceFactory,
  TextAlign,
  TextBaseline,
} from "@sketchpad/core";

export type SurfaceCall = Readonly<{
  op: string;
  args: readonly unknown[];
}>;

export class RecordingSurface implements SurfaceBackend {
  readonly width: number;
  readonly height: number;
  readonly calls: SurfaceCall[] = [];
  private readonly rgba: Uint8Array;

  constructor(width: number, height: number) {
    this.width = width;
    this.height = height;
    this.rgba = new Uint8Array(Math.max(0, width * height * 4));
  }

  /** Op names in call order. */
  ops(): readonly string[] {
    return this.calls.map((c) => c.op);
  }

  /** Calls named `op`, in order. */
  callsTo(op: string): readonly SurfaceCall[] {
    return this.calls.filter((c) => c.op === op);
  }

  reset(): void {
    this.calls.length = 0;
  }

  pixels(): Uint8Array {
    return this.rgba;
  }

  setFillStyle(color: Rgba): void {
    this.record("setFillStyle", color);
  }

  setStrokeStyle(color: Rgba): void {
    this.record("setStrokeStyle", color);
  }

  setLineWidth(width: number): void {
    this.record("setLineWidth", width);
  }

  setLineCap(cap: LineCap): void {
    this.record("setLineCap", cap);
  }

  setFont(spec: string): void {
    this.record("setFont", spec);
  }

  setTextAlign(align: TextAlign): void {
    this.record("setTextAlign", align);
  }

  setTextBaseline(baseline: TextBaseline): void {
    this.record("setTextBaseline", baseline);
  }

  fillRect(x: number, y: number, w: number, h: number): void {
    this.record("fillRect", x, y, w, h);
  }

  strokeRect(x: number, y: number, w: number, h: number): void {
    this.record("strokeRect", x, y, w, h);
  }

  fillCircle(x: number, y: number, r: number): void {
    this.record("fillCircle", x, y, r);
  }

  strokeCircle(x: number, y: number, r: number): void {
    this.record("strokeCircle", x, y, r);
  }

  strokeLine(x1: number, y1: number, x2: number, y2: number): void {
    this.record("strokeLine", x1, y1, x2, y2);
  }

  fillPolygon(points: readonly Point[]): void {
    this.record("fillPolygon", [...points]);
  }

  strokePolygon(points: readonly Point[]): void {
    this.record("strokePolygon", [...points]);
  }

  beginPath(): void {
    this.record("beginPath");
  }

  moveTo(x: number, y: number): void {
    this.record("moveTo", x, y);
  }

  lineTo(x: number, y: number): void {
    this.record("lineTo", x, y);
  }

  bezierCurveTo(c1x: number, c1y: number, c2x: number, c2y: number, x: number, y: number): void {
    this.record("bezierCurveTo", c1x, c1y, c2x, c2y, x, y);
  }

  closePath(): void {
    this.record("closePath");
  }

  fill(): void {
    this.record("fill");
  }

  stroke(): void {
    this.record("stroke");
  }

  translate(x: number, y: number): void {
    this.record("translate", x, y);
  }

  rotate(angle: number): void {
    this.record("rotate", angle);
  }

  scale(sx: number, sy: number): void {
    this.record("scale", sx, sy);
  }

  transform(a: number, b: number, c: number, d: number, e: number, f: number): void {
    this.record("transform", a, b, c, d, e, f);
  }

  resetTransform(): void {
    this.record("resetTransform");
  }

  save(): void {
    this.record("save");
  }

  restore(): void {
    this.record("restore");
  }

  fillText(text: string, x: number, y: number): void {
    this.record("fillText", text, x, y);
  }

  strokeText(text: string, x: number, y: number): void {
    this.record("strokeText", text, x, y);
  }

  drawImage(source: BitmapSource, x: number, y: number, w: number, h: number): void {
    this.record("drawImage", source, x, y, w, h);
  }

  batchRedraw<T>(scope: () => T): T {
    this.record("batchStart");
    try {
      return scope();
    } finally {
      this.record("batchEnd");
    }
  }

  clear(): void {
    this.record("clear");
  }

  private record(op: string, ...args: unknown[]): void {
    this.calls.push(Object.freeze({ op, args: Object.freeze(args) }));
  }
}

export function createRecordingSurface(width: number, height: number): RecordingSurface {
  return new RecordingSurface(width, height);
}

/** A backend factory that keeps every surface it creates, oldest first. */
export function recordingBackend(): Readonly<{
  backend: SurfaceFactory;
  surfaces: readonly RecordingSurface[];
}> {
  const surfaces: RecordingSurface[] = [];
  const backend = (width: number, height: number): RecordingSurface => {
    const surface = new RecordingSurface(width, height);
    surfaces.push(surface);
    return surface;
  };
  return Object.freeze({ backend, surfaces });
}
