import { ManualClock, type RecordingSurface, recordingBackend } from "@sketchpad/testkit";
import { Screen, type ScreenConfig } from "../screen.js";
import { Turtle } from "../turtle.js";

export type TurtleRig = {
  screen: Screen;
  turtle: Turtle;
  /** The screen's composed display. */
  display: RecordingSurface;
  /** The turtle's pen layer. */
  pen: RecordingSurface;
  clock: ManualClock;
};

/**
 * A 200x200 screen over recording surfaces with one turtle. Construction
 * calls are cleared and sleeps go to a ManualClock.
 */
export function turtleRig(config: ScreenConfig = {}): TurtleRig {
  const { backend, surfaces } = recordingBackend();
  const clock = new ManualClock();
  const screen = new Screen({ width: 200, height: 200, sleep: clock.sleep, ...config, backend });
  const turtle = new Turtle(screen);
  const [display, pen] = surfaces;
  if (display === undefined || pen === undefined) throw new Error("screen did not create surfaces");
  display.reset();
  pen.reset();
  return { screen, turtle, display, pen, clock };
}
