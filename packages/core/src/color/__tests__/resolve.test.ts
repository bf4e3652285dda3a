import { assert, describe, test } from "@sketchpad/testkit";
import { InvalidColorError } from "../../errors.js";
import {
  colorToTuple,
  formatColor,
  normalizeColorMode,
  resolveColor,
  sameColor,
} from "../resolve.js";

describe("color/resolve", () => {
  test("one number is an opaque gray", () => {
    assert.deepEqual(resolveColor([128]), { r: 128, g: 128, b: 128, a: 255 });
  });

  test("two numbers are gray plus alpha", () => {
    assert.deepEqual(resolveColor([10, 20]), { r: 10, g: 10, b: 10, a: 20 });
  });

  test("three and four numbers are RGB and RGBA", () => {
    assert.deepEqual(resolveColor([1, 2, 3]), { r: 1, g: 2, b: 3, a: 255 });
    assert.deepEqual(resolveColor([1, 2, 3, 4]), { r: 1, g: 2, b: 3, a: 4 });
  });

  test("a single tuple is unpacked positionally", () => {
    assert.deepEqual(resolveColor([[9, 8, 7]]), { r: 9, g: 8, b: 7, a: 255 });
  });

  test("a single Rgba record passes through", () => {
    assert.deepEqual(resolveColor([{ r: 5, g: 6, b: 7, a: 8 }]), { r: 5, g: 6, b: 7, a: 8 });
  });

  test("strings are parsed as CSS colors", () => {
    assert.deepEqual(resolveColor(["red"]), { r: 255, g: 0, b: 0, a: 255 });
  });

  test("mode 1 scales fractions to bytes", () => {
    assert.deepEqual(resolveColor([1, 0.5, 0], 1), { r: 255, g: 128, b: 0, a: 255 });
    assert.deepEqual(resolveColor([0.2], 1), { r: 51, g: 51, b: 51, a: 255 });
  });

  test("channel range boundaries", () => {
    assert.deepEqual(resolveColor([255, 0, 255]), { r: 255, g: 0, b: 255, a: 255 });
    assert.throws(() => resolveColor([256, 0, 0]), InvalidColorError);
    assert.throws(() => resolveColor([-1]), InvalidColorError);
    assert.throws(() => resolveColor([1.5], 1), InvalidColorError);
    assert.throws(() => resolveColor([Number.NaN, 0, 0]), InvalidColorError);
  });

  test("bad arity and types are rejected", () => {
    assert.throws(() => resolveColor([]), InvalidColorError);
    assert.throws(() => resolveColor([1, 2, 3, 4, 5]), InvalidColorError);
    assert.throws(() => resolveColor([1, "red"]), InvalidColorError);
    assert.throws(() => resolveColor(["nosuchcolor"]), InvalidColorError);
  });

  test("records with out-of-range channels are rejected", () => {
    assert.throws(() => resolveColor([{ r: 300, g: 0, b: 0, a: 255 }]), InvalidColorError);
  });

  test("normalizeColorMode keeps the current mode for anything but 1 or 255", () => {
    assert.equal(normalizeColorMode(1, 255), 1);
    assert.equal(normalizeColorMode(255, 1), 255);
    assert.equal(normalizeColorMode(100, 255), 255);
    assert.equal(normalizeColorMode(2, 1), 1);
  });

  test("colorToTuple reports channels in the requested mode", () => {
    const c = { r: 255, g: 51, b: 0, a: 255 };
    assert.deepEqual(colorToTuple(c, 255), [255, 51, 0]);
    assert.deepEqual(colorToTuple(c, 1), [1, 0.2, 0]);
  });

  test("formatColor and sameColor", () => {
    assert.equal(formatColor({ r: 255, g: 0, b: 16, a: 255 }), "#ff0010");
    assert.equal(formatColor({ r: 0, g: 0, b: 0, a: 128 }), "#00000080");
    assert.equal(sameColor({ r: 1, g: 2, b: 3, a: 4 }, { r: 1, g: 2, b: 3, a: 4 }), true);
    assert.equal(sameColor({ r: 1, g: 2, b: 3, a: 4 }, { r: 1, g: 2, b: 3, a: 5 }), false);
  });
});
