import { assert, describe, test } from "@sketchpad/testkit";
import { InvalidColorError } from "../../errors.js";
import { isNamedColor, namedColorNames } from "../named.js";
import { parseCssColor } from "../parse.js";

describe("color/parse", () => {
  test("named colors are case- and whitespace-insensitive", () => {
    assert.deepEqual(parseCssColor("  SkyBlue "), { r: 135, g: 206, b: 235, a: 255 });
    assert.equal(isNamedColor("Rebeccapurple"), true);
    assert.equal(isNamedColor("notacolor"), false);
    assert.ok(namedColorNames().includes("white"));
  });

  test("transparent is all zeros", () => {
    assert.deepEqual(parseCssColor("transparent"), { r: 0, g: 0, b: 0, a: 0 });
  });

  test("hex forms", () => {
    assert.deepEqual(parseCssColor("#f80"), { r: 255, g: 136, b: 0, a: 255 });
    assert.deepEqual(parseCssColor("#f808"), { r: 255, g: 136, b: 0, a: 136 });
    assert.deepEqual(parseCssColor("#102030"), { r: 16, g: 32, b: 48, a: 255 });
    assert.deepEqual(parseCssColor("#10203040"), { r: 16, g: 32, b: 48, a: 64 });
  });

  test("rgb() with commas, spaces, percentages and slash alpha", () => {
    assert.deepEqual(parseCssColor("rgb(1, 2, 3)"), { r: 1, g: 2, b: 3, a: 255 });
    assert.deepEqual(parseCssColor("rgba(1, 2, 3, 0.5)"), { r: 1, g: 2, b: 3, a: 128 });
    assert.deepEqual(parseCssColor("rgb(100% 0% 50%)"), { r: 255, g: 0, b: 128, a: 255 });
    assert.deepEqual(parseCssColor("rgb(10 20 30 / 25%)"), { r: 10, g: 20, b: 30, a: 64 });
  });

  test("hsl()", () => {
    assert.deepEqual(parseCssColor("hsl(0, 100%, 50%)"), { r: 255, g: 0, b: 0, a: 255 });
    assert.deepEqual(parseCssColor("hsl(120deg 100% 25%)"), { r: 0, g: 128, b: 0, a: 255 });
    assert.deepEqual(parseCssColor("hsla(240, 100%, 50%, 0)"), { r: 0, g: 0, b: 255, a: 0 });
  });

  test("malformed strings raise InvalidColorError", () => {
    for (const bad of ["", "#12", "#ggg", "rgb(1, 2)", "rgb(a, b, c)", "hsl(0, 50, 50)", "blurple"]) {
      assert.throws(() => parseCssColor(bad), InvalidColorError, bad);
    }
  });
});
