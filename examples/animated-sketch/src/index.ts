import { Sketch } from "@sketchpad/core";
import { saveSketch } from "@sketchpad/node";

const sketch = new Sketch({ width: 200, height: 200 });
const frames = Number(process.argv[3] ?? "60");

sketch.background(20);
await sketch.run(
  () => {
    const n = sketch.frameCount;
    sketch.fill(255, (n * 4) % 256, 80, 160);
    sketch.noStroke();
    sketch.translate(100, 100);
    sketch.rotate(n * 0.1);
    sketch.ellipse(40 + (n % 30), 0, 16, 16);
    if (n >= frames) sketch.stop();
  },
  undefined,
  16,
);

console.log(`wrote ${saveSketch(sketch, process.argv[2] ?? "animated-sketch.png")}`);
