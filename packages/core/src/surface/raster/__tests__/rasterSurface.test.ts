import { assert, describe, test } from "@sketchpad/testkit";
import { BLACK, TRANSPARENT, WHITE } from "../../../color/types.js";
import { RasterSurface, createRasterSurface } from "../rasterSurface.js";

const RED = Object.freeze({ r: 255, g: 0, b: 0, a: 255 });
const BLUE = Object.freeze({ r: 0, g: 0, b: 255, a: 255 });

function covered(s: RasterSurface): string[] {
  const out: string[] = [];
  for (let y = 0; y < s.height; y++) {
    for (let x = 0; x < s.width; x++) {
      if (s.getPixel(x, y).a !== 0) out.push(`${String(x)},${String(y)}`);
    }
  }
  return out;
}

describe("surface/RasterSurface", () => {
  test("starts fully transparent", () => {
    const s = createRasterSurface(3, 2);
    assert.equal(s.pixels().length, 24);
    assert.deepEqual(covered(s), []);
  });

  test("fillRect covers pixels whose centers lie inside", () => {
    const s = new RasterSurface(4, 4);
    s.setFillStyle(RED);
    s.fillRect(1, 1, 2, 2);
    assert.deepEqual(covered(s), ["1,1", "2,1", "1,2", "2,2"]);
    assert.deepEqual(s.getPixel(1, 1), RED);
  });

  test("fills honor the current transform", () => {
    const s = new RasterSurface(4, 4);
    s.translate(2, 2);
    s.fillRect(0, 0, 1, 1);
    assert.deepEqual(covered(s), ["2,2"]);
    assert.deepEqual(s.getPixel(2, 2), BLACK);
  });

  test("hairline strokes are Bresenham lines", () => {
    const s = new RasterSurface(4, 2);
    s.strokeLine(0, 0, 3, 0);
    assert.deepEqual(covered(s), ["0,0", "1,0", "2,0", "3,0"]);
  });

  test("thick butt-capped strokes cover the width around the line", () => {
    const s = new RasterSurface(10, 10);
    s.setLineWidth(3);
    s.strokeLine(1, 5, 9, 5);
    assert.deepEqual(s.getPixel(5, 3), BLACK);
    assert.deepEqual(s.getPixel(5, 5), BLACK);
    assert.deepEqual(s.getPixel(1, 4), BLACK);
    assert.deepEqual(s.getPixel(8, 4), BLACK);
    assert.deepEqual(s.getPixel(5, 2), TRANSPARENT);
    assert.deepEqual(s.getPixel(5, 6), TRANSPARENT);
    assert.deepEqual(s.getPixel(0, 4), TRANSPARENT);
    assert.deepEqual(s.getPixel(9, 4), TRANSPARENT);
  });

  test("zero width or transparent strokes draw nothing", () => {
    const s = new RasterSurface(4, 4);
    s.setLineWidth(0);
    s.strokeLine(0, 0, 3, 3);
    s.setLineWidth(1);
    s.setStrokeStyle(TRANSPARENT);
    s.strokeRect(0, 0, 3, 3);
    assert.deepEqual(covered(s), []);
  });

  test("fillCircle covers the center and not the corners", () => {
    const s = new RasterSurface(10, 10);
    s.fillCircle(5, 5, 3);
    assert.deepEqual(s.getPixel(5, 5), BLACK);
    assert.deepEqual(s.getPixel(0, 0), TRANSPARENT);
    assert.deepEqual(s.getPixel(9, 9), TRANSPARENT);
  });

  test("translucent fills blend source-over with straight alpha", () => {
    const s = new RasterSurface(2, 1);
    s.setFillStyle(WHITE);
    s.fillRect(0, 0, 1, 1);
    s.setFillStyle({ r: 255, g: 0, b: 0, a: 128 });
    s.fillRect(0, 0, 2, 1);
    assert.deepEqual(s.getPixel(0, 0), { r: 255, g: 127, b: 127, a: 255 });
    assert.deepEqual(s.getPixel(1, 0), { r: 255, g: 0, b: 0, a: 128 });
  });

  test("paths fill closed subpaths", () => {
    const s = new RasterSurface(4, 4);
    s.beginPath();
    s.moveTo(0, 0);
    s.lineTo(2, 0);
    s.lineTo(2, 2);
    s.lineTo(0, 2);
    s.closePath();
    s.fill();
    assert.deepEqual(covered(s), ["0,0", "1,0", "0,1", "1,1"]);
  });

  test("save/restore brackets style and transform", () => {
    const s = new RasterSurface(4, 4);
    s.setFillStyle(RED);
    s.save();
    s.setFillStyle(BLUE);
    s.translate(2, 0);
    s.restore();
    s.fillRect(0, 0, 1, 1);
    assert.deepEqual(covered(s), ["0,0"]);
    assert.deepEqual(s.getPixel(0, 0), RED);
  });

  test("restore without save is ignored", () => {
    const s = new RasterSurface(2, 2);
    s.translate(1, 1);
    s.restore();
    assert.deepEqual(s.currentTransform, { a: 1, b: 0, c: 0, d: 1, e: 1, f: 1 });
  });

  test("text is kept as device-space overlays", () => {
    const s = new RasterSurface(20, 20);
    s.translate(10, 0);
    s.fillText("hi", 1, 2);
    s.setFillStyle(TRANSPARENT);
    s.fillText("hidden", 0, 0);
    s.fillText("", 0, 0);
    assert.deepEqual(s.overlays, [
      {
        text: "hi",
        x: 11,
        y: 2,
        font: "10px sans-serif",
        align: "left",
        baseline: "alphabetic",
        color: BLACK,
        mode: "fill",
      },
    ]);
  });

  test("drawImage scales with nearest-neighbor sampling", () => {
    const src = new RasterSurface(2, 2);
    src.setFillStyle(RED);
    src.fillRect(0, 0, 1, 1);
    const dst = new RasterSurface(4, 4);
    dst.drawImage(src, 0, 0, 4, 4);
    assert.deepEqual(covered(dst), ["0,0", "1,0", "0,1", "1,1"]);
    assert.deepEqual(dst.getPixel(1, 1), RED);
  });

  test("batchRedraw presents once per outermost batch", () => {
    const s = new RasterSurface(2, 2);
    let presented = 0;
    const off = s.onPresent(() => {
      presented++;
    });
    const value = s.batchRedraw(() => s.batchRedraw(() => 7));
    assert.equal(value, 7);
    assert.equal(presented, 1);
    assert.equal(s.presentCount, 1);
    off();
    s.batchRedraw(() => undefined);
    assert.equal(presented, 1);
    assert.equal(s.presentCount, 2);
  });

  test("batchRedraw still presents when the scope throws", () => {
    const s = new RasterSurface(2, 2);
    assert.throws(() =>
      s.batchRedraw(() => {
        throw new Error("boom");
      }),
    );
    assert.equal(s.presentCount, 1);
  });

  test("clear wipes pixels and overlays", () => {
    const s = new RasterSurface(2, 2);
    s.fillRect(0, 0, 2, 2);
    s.fillText("x", 0, 0);
    s.clear();
    assert.deepEqual(covered(s), []);
    assert.equal(s.overlays.length, 0);
  });

  test("getPixel outside the surface is transparent", () => {
    const s = new RasterSurface(2, 2);
    s.fillRect(0, 0, 2, 2);
    assert.deepEqual(s.getPixel(-1, 0), TRANSPARENT);
    assert.deepEqual(s.getPixel(0, 2), TRANSPARENT);
  });
});
