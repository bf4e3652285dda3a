import { assert, assertClose, describe, test } from "@sketchpad/testkit";
import {
  KAPPA,
  acuteArcToBezier,
  arcPath,
  arcSegments,
  bezierPoint,
  bezierTangent,
  ellipsePath,
  flattenCubic,
} from "../bezier.js";

describe("shape/bezier", () => {
  test("bezierPoint hits the anchors and interpolates", () => {
    assert.equal(bezierPoint(0, 1, 2, 3, 0), 0);
    assert.equal(bezierPoint(0, 1, 2, 3, 1), 3);
    assert.equal(bezierPoint(0, 1, 2, 3, 0.5), 1.5);
    assert.equal(bezierPoint(85, 10, 90, 15, 0.5), 50);
  });

  test("bezierTangent of evenly spaced controls is constant", () => {
    assert.equal(bezierTangent(0, 1, 2, 3, 0), 3);
    assert.equal(bezierTangent(0, 1, 2, 3, 0.5), 3);
    assert.equal(bezierTangent(0, 1, 2, 3, 1), 3);
  });

  test("bezierTangent at the midpoint of an uneven curve", () => {
    assertClose(bezierTangent(95, 73, 73, 15, 0.5), -60);
  });

  test("a quarter arc uses the kappa control points", () => {
    const s = acuteArcToBezier(0, Math.PI / 2);
    assert.equal(s.ax, 1);
    assert.equal(s.ay, 0);
    assertClose(s.bx, 1, 1e-7);
    assertClose(s.by, KAPPA, 1e-7);
    assertClose(s.cx, KAPPA, 1e-7);
    assertClose(s.cy, 1, 1e-7);
    assert.equal(s.dx, 0);
    assert.equal(s.dy, 1);
  });

  test("arcs split into sub-arcs of at most a quarter turn", () => {
    assert.equal(arcSegments(0, Math.PI * 2).length, 4);
    assert.equal(arcSegments(0, Math.PI).length, 2);
    assert.equal(arcSegments(0, 1).length, 1);
    assert.equal(arcSegments(0, Math.PI / 2 + 0.1).length, 2);
  });

  test("arcs shorter than the epsilon are empty", () => {
    assert.equal(arcSegments(0, 1e-6).length, 0);
    assert.equal(arcSegments(1, 0).length, 0);
    assert.equal(arcPath(0, 0, 10, 10, 0, 1e-6), null);
  });

  test("arcPath scales unit waypoints by the radii about the center", () => {
    const path = arcPath(10, 20, 5, 3, 0, Math.PI / 2);
    assert.ok(path !== null);
    assert.deepEqual(path.start, { x: 15, y: 20 });
    assert.equal(path.segments.length, 1);
    const end = path.segments[0]?.end;
    assert.deepEqual(end, { x: 10, y: 23 });
  });

  test("ellipsePath starts at the left middle and closes there", () => {
    const path = ellipsePath(0, 0, 2, 4);
    assert.deepEqual(path.start, { x: -1, y: 0 });
    assert.equal(path.segments.length, 4);
    assert.deepEqual(path.segments[0]?.c1, { x: -1, y: -2 * KAPPA });
    assert.deepEqual(path.segments[0]?.end, { x: 0, y: -2 });
    assert.deepEqual(path.segments[3]?.end, { x: -1, y: 0 });
  });

  test("flattenCubic samples steps + 1 points", () => {
    const pts = flattenCubic({ x: 0, y: 0 }, { x: 1, y: 0 }, { x: 2, y: 0 }, { x: 3, y: 0 }, 2);
    assert.deepEqual(pts, [
      { x: 0, y: 0 },
      { x: 1.5, y: 0 },
      { x: 3, y: 0 },
    ]);
  });
});
