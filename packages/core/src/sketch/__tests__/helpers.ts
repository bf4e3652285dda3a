import { type RecordingSurface, recordingBackend } from "@sketchpad/testkit";
import { Sketch, type SketchOptions } from "../sketch.js";

/** A Sketch over a RecordingSurface whose construction calls are already cleared. */
export function recordedSketch(options: SketchOptions = {}): {
  sketch: Sketch;
  surface: RecordingSurface;
} {
  const { backend, surfaces } = recordingBackend();
  const sketch = new Sketch({ ...options, backend });
  const surface = surfaces[0];
  if (surface === undefined) throw new Error("sketch did not create a surface");
  surface.reset();
  return { sketch, surface };
}
