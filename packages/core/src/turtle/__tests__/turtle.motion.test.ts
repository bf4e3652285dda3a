import { assert, assertClose, assertPointClose, describe, test } from "@sketchpad/testkit";
import { InvalidArgumentError } from "../../errors.js";
import { vec2 } from "../../geometry/vec2.js";
import { positiveMod } from "../angles.js";
import { Turtle } from "../turtle.js";
import { turtleRig } from "./helpers.js";

function fastTurtle(): Turtle {
  const { turtle } = turtleRig();
  turtle.speed(0);
  return turtle;
}

describe("turtle motion", () => {
  test("starts at the origin facing east", () => {
    const t = fastTurtle();
    assert.deepEqual(t.position(), { x: 0, y: 0 });
    assert.equal(t.heading(), 0);
    assert.equal(t.mode(), "standard");
  });

  test("forward and backward move along the heading", async () => {
    const t = fastTurtle();
    await t.forward(100);
    assert.deepEqual(t.position(), { x: 100, y: 0 });
    await t.backward(30);
    assertPointClose(t.position(), { x: 70, y: 0 });
    assert.equal(t.xcor(), 70);
    assert.equal(t.ycor(), 0);
  });

  test("a negative forward walks backwards past the start", async () => {
    const t = fastTurtle();
    await t.forward(25);
    await t.forward(-75);
    assertPointClose(t.position(), { x: -50, y: 0 });
    assertClose(t.heading(), 0);
  });

  test("heading stays within one full circle over long turn sequences", async () => {
    const turns = [37, -123.4, 719, -0.5, 360, -1080.25, 89.999, -45, 271, -359.9];
    for (const unit of ["degrees", "radians"] as const) {
      const t = fastTurtle();
      let full = 360;
      if (unit === "radians") {
        t.radians();
        full = 2 * Math.PI;
      }
      for (let i = 0; i < 200; i++) {
        const turn = turns[i % turns.length] ?? 0;
        const amount = (turn * full) / 360;
        if (i % 3 === 0) await t.right(amount);
        else await t.left(amount);
        const h = t.heading();
        assert.ok(h >= 0 && h < full, `${unit} heading ${h} after turn ${i}`);
      }
    }
  });

  test("left turns counter-clockwise and right clockwise", async () => {
    const t = fastTurtle();
    await t.left(90);
    assertClose(t.heading(), 90);
    await t.forward(50);
    assertPointClose(t.position(), { x: 0, y: 50 });
    await t.right(180);
    assertClose(t.heading(), 270);
    await t.left(450);
    assertClose(t.heading(), 0);
  });

  test("setHeading turns the short way to an absolute heading", async () => {
    const t = fastTurtle();
    await t.setHeading(180);
    assertClose(t.heading(), 180);
    await t.setHeading(-90);
    assertClose(t.heading(), 270);
  });

  test("goto, distance and towards", async () => {
    const t = fastTurtle();
    await t.goto(30, 40);
    assert.deepEqual(t.position(), { x: 30, y: 40 });
    assert.equal(t.distance(0, 0), 50);
    assert.equal(t.distance(vec2(0, 0)), 50);
    assertClose(t.towards(0, 0), 233.13010235415598);
    await t.goto(vec2(1, 2));
    assert.deepEqual(t.position(), { x: 1, y: 2 });
  });

  test("towards reports the four compass points", () => {
    const t = fastTurtle();
    assert.equal(t.towards(10, 0), 0);
    assert.equal(t.towards(0, 10), 90);
    assert.equal(t.towards(-10, 0), 180);
    assert.equal(t.towards(0, -10), 270);
  });

  test("distance to another turtle", async () => {
    const { screen, turtle } = turtleRig();
    turtle.speed(0);
    const other = new Turtle(screen);
    other.speed(0);
    await other.goto(0, 12);
    assert.equal(turtle.distance(other), 12);
  });

  test("goto with a numeric x and no y is rejected", async () => {
    const t = fastTurtle();
    await assert.rejects(t.goto(5), InvalidArgumentError);
  });

  test("non-finite distances are rejected", async () => {
    const t = fastTurtle();
    await assert.rejects(t.forward(Number.NaN), InvalidArgumentError);
    await assert.rejects(t.left(Number.POSITIVE_INFINITY), InvalidArgumentError);
  });

  test("setX and setY change one coordinate", async () => {
    const t = fastTurtle();
    await t.setX(5);
    await t.setY(-5);
    assert.deepEqual(t.position(), { x: 5, y: -5 });
  });

  test("home returns to the origin facing east", async () => {
    const t = fastTurtle();
    await t.goto(10, 10);
    await t.left(45);
    await t.home();
    assert.deepEqual(t.position(), { x: 0, y: 0 });
    assertClose(t.heading(), 0);
  });

  test("teleport moves without drawing and keeps the pen state", () => {
    const { turtle, pen } = turtleRig();
    turtle.teleport(10, 20);
    assert.deepEqual(turtle.position(), { x: 10, y: 20 });
    assert.equal(turtle.isDown(), true);
    assert.deepEqual(pen.callsTo("strokeLine"), []);
    turtle.teleport(undefined, -3);
    assert.deepEqual(turtle.position(), { x: 10, y: -3 });
  });

  test("teleport closes an open fill and reopens it at the destination", async () => {
    const { turtle, pen } = turtleRig();
    turtle.speed(0);
    turtle.beginFill();
    await turtle.forward(10);
    await turtle.left(90);
    await turtle.forward(10);
    turtle.teleport(50, 50);
    assert.equal(pen.callsTo("fillPolygon").length, 1);
    assert.equal(turtle.filling(), true);
  });

  test("teleport with fillGap keeps the fill path open", async () => {
    const { turtle, pen } = turtleRig();
    turtle.speed(0);
    turtle.beginFill();
    await turtle.forward(10);
    await turtle.left(90);
    await turtle.forward(10);
    turtle.teleport(50, 50, { fillGap: true });
    assert.equal(pen.callsTo("fillPolygon").length, 0);
    assert.equal(turtle.filling(), true);
  });
});

describe("turtle angle units", () => {
  test("radians", async () => {
    const t = fastTurtle();
    t.radians();
    await t.left(Math.PI / 2);
    assertClose(t.heading(), Math.PI / 2);
  });

  test("a 400-unit circle measures in gradians", async () => {
    const t = fastTurtle();
    t.degrees(400);
    await t.left(100);
    assertClose(t.heading(), 100);
    t.degrees();
    assertClose(t.heading(), 90);
  });

  test("a zero full circle is rejected", () => {
    const t = fastTurtle();
    assert.throws(() => t.degrees(0), InvalidArgumentError);
  });
});

describe("turtle logo mode", () => {
  test("heading 0 is north and angles run clockwise", async () => {
    const t = fastTurtle();
    t.mode("logo");
    t.speed(0);
    assert.equal(t.mode(), "logo");
    assertClose(t.heading(), 0);
    await t.forward(10);
    assertPointClose(t.position(), { x: 0, y: 10 });
    await t.right(90);
    assertClose(t.heading(), 90);
    await t.forward(10);
    assertPointClose(t.position(), { x: 10, y: 10 });
  });

  test("setHeading uses compass bearings", async () => {
    const t = fastTurtle();
    t.mode("logo");
    t.speed(0);
    await t.setHeading(90);
    await t.forward(5);
    assertPointClose(t.position(), { x: 5, y: 0 });
    assertClose(t.towards(5, -5), 180);
  });

  test("switching mode resets the turtle", async () => {
    const t = fastTurtle();
    await t.forward(10);
    t.mode("logo");
    assert.deepEqual(t.position(), { x: 0, y: 0 });
    assert.equal(t.speed(), 3);
  });
});

describe("turtle circle", () => {
  test("a full circle returns to the start heading", async () => {
    const t = fastTurtle();
    await t.circle(50);
    assertPointClose(t.position(), { x: 0, y: 0 });
    assertClose(t.heading(), 0);
  });

  test("a half circle to the left ends one diameter north", async () => {
    const t = fastTurtle();
    await t.circle(50, 180);
    assertPointClose(t.position(), { x: 0, y: 100 });
    assertClose(t.heading(), 180);
  });

  test("a negative radius turns right", async () => {
    const t = fastTurtle();
    await t.circle(-50, 90);
    assertPointClose(t.position(), { x: 50, y: -50 });
    assertClose(t.heading(), 270);
  });

  test("an arc turns the heading by exactly its extent", async () => {
    for (const radius of [40, -40]) {
      for (const extent of [37, 123.4, -77, 719]) {
        const t = fastTurtle();
        await t.circle(radius, extent);
        const expected = positiveMod(Math.sign(radius) * extent, 360);
        const drift = positiveMod(t.heading() - expected + 180, 360) - 180;
        assertClose(drift, 0, 1e-6, `heading after circle(${radius}, ${extent})`);
      }
    }
  });

  test("explicit steps draw a regular polygon", async () => {
    const t = fastTurtle();
    await t.poly(() => t.circle(10, 360, 4));
    const poly = t.getPoly();
    assert.equal(poly.length, 5);
    const expected = [
      { x: 0, y: 0 },
      { x: 10, y: 10 },
      { x: 0, y: 20 },
      { x: -10, y: 10 },
      { x: 0, y: 0 },
    ];
    expected.forEach((p, i) => {
      const actual = poly[i];
      assert.ok(actual !== undefined);
      assertPointClose(actual, p);
    });
  });

  test("zero steps are rejected", async () => {
    const t = fastTurtle();
    await assert.rejects(t.circle(10, 360, 0), InvalidArgumentError);
  });

  test("circle at speed 0 restores tracing and delay", async () => {
    const { screen, turtle } = turtleRig({ delayMs: 15 });
    turtle.speed(0);
    await turtle.circle(20);
    assert.equal(screen.tracer(), 1);
    assert.equal(screen.delay(), 15);
    assert.equal(turtle.speed(), 0);
  });
});
