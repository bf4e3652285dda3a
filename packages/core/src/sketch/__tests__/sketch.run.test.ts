import { ManualClock, assert, describe, test } from "@sketchpad/testkit";
import { InvalidArgumentError, SketchError } from "../../errors.js";
import { IDENTITY } from "../../geometry/matrix.js";
import { Sketch } from "../sketch.js";
import { recordedSketch } from "./helpers.js";

function clocked(): { sketch: Sketch; clock: ManualClock } {
  const clock = new ManualClock();
  const sketch = new Sketch({ clock: { now: clock.now, sleep: clock.sleep } });
  return { sketch, clock };
}

describe("sketch run loop", () => {
  test("runs until the duration elapses", async () => {
    const { sketch, clock } = clocked();
    let draws = 0;
    await sketch.run(
      () => {
        draws++;
      },
      0.1,
      20,
    );
    assert.equal(draws, 6);
    assert.equal(sketch.frameCount, 7);
    assert.deepEqual(clock.sleepCalls, [20, 20, 20, 20, 20, 20]);
    assert.equal(sketch.isLooping, false);
  });

  test("stop() from inside draw ends the loop after that frame", async () => {
    const { sketch } = clocked();
    let draws = 0;
    await sketch.run(() => {
      draws++;
      assert.equal(sketch.isLooping, true);
      if (draws === 3) sketch.stop();
    });
    assert.equal(draws, 3);
    assert.equal(sketch.frameCount, 3);
    assert.equal(sketch.isLooping, false);
  });

  test("every frame starts from the pre-run matrix and an empty vertex buffer", async () => {
    const { sketch } = clocked();
    const seen: number[] = [];
    await sketch.run(() => {
      seen.push(sketch.matrix.e);
      sketch.translate(5, 0);
      sketch.beginShape();
      sketch.vertex(0, 0);
      if (seen.length === 3) sketch.stop();
    });
    assert.deepEqual(seen, [0, 0, 0]);
    assert.deepEqual(sketch.matrix, IDENTITY);
    assert.equal(sketch.openVertexCount, 0);
  });

  test("each frame is one backend batch", async () => {
    const clock = new ManualClock();
    const { sketch, surface } = recordedSketch({ clock: { now: clock.now, sleep: clock.sleep } });
    let draws = 0;
    await sketch.run(() => {
      draws++;
      sketch.line(0, 0, 1, 1);
      if (draws === 2) sketch.stop();
    });
    const frameOps = surface.ops().filter((op) => op !== "resetTransform" && op !== "transform");
    assert.deepEqual(frameOps, [
      "batchStart",
      "strokeLine",
      "batchEnd",
      "batchStart",
      "strokeLine",
      "batchEnd",
    ]);
  });

  test("a throwing draw halts the loop and rejects", async () => {
    const { sketch } = clocked();
    await assert.rejects(
      sketch.run(() => {
        throw new Error("draw failed");
      }),
      /draw failed/,
    );
    assert.equal(sketch.isLooping, false);
    assert.equal(sketch.frameCount, 1);
  });

  test("a throwing draw still restores the transform and drops open vertices", async () => {
    const { sketch } = clocked();
    await assert.rejects(
      sketch.run(() => {
        sketch.translate(10, 10);
        sketch.beginShape();
        sketch.vertex(1, 1);
        throw new Error("draw failed");
      }),
      /draw failed/,
    );
    assert.deepEqual(sketch.matrix, IDENTITY);
    assert.equal(sketch.openVertexCount, 0);
  });

  test("a very short duration still runs at least one frame", async () => {
    const { sketch } = clocked();
    let draws = 0;
    await sketch.run(() => {
      draws++;
    }, 0.001);
    assert.ok(sketch.frameCount > 0);
    assert.ok(draws > 0);
  });

  test("bad run arguments throw synchronously", () => {
    const { sketch } = clocked();
    assert.throws(() => sketch.run(() => undefined, undefined, -1), InvalidArgumentError);
    assert.throws(() => sketch.run(() => undefined, Number.NaN), InvalidArgumentError);
    assert.throws(() => sketch.run(() => undefined, -0.5), InvalidArgumentError);
    assert.equal(sketch.isLooping, false);
    assert.equal(sketch.frameCount, 0);
  });

  test("run while running throws an invalid-state error", async () => {
    const { sketch } = clocked();
    const outcome: { error: unknown } = { error: undefined };
    await sketch.run(() => {
      try {
        void sketch.run(() => undefined);
      } catch (err) {
        outcome.error = err;
      }
      sketch.stop();
    });
    assert.ok(outcome.error instanceof SketchError);
    assert.equal(outcome.error.code, "SKETCH_INVALID_STATE");
  });
});
