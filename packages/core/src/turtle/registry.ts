/**
 * packages/core/src/turtle/registry.ts: Named screens with one current screen.
 *
 * Replaces a process-wide singleton: callers hold a registry and turtles are
 * created against its current screen. setup() swaps a screen for a resized
 * one and rebinds its turtles.
 */

import { invalidArgument, invalidState } from "../errors.js";
import { emitAudit } from "../debug/log.js";
import { requirePositiveInt } from "../validate.js";
import { Screen, type ScreenConfig } from "./screen.js";

export const DEFAULT_SCREEN = "main";

export class ScreenRegistry {
  private readonly defaults: ScreenConfig;
  private readonly screens = new Map<string, Screen>();
  private currentName = DEFAULT_SCREEN;

  constructor(defaults: ScreenConfig = {}) {
    this.defaults = defaults;
  }

  /** The current screen, created on first use. */
  current(): Screen {
    return this.get(this.currentName);
  }

  currentScreenName(): string {
    return this.currentName;
  }

  /** Make `name` current, creating it with the registry defaults if needed. */
  use(name: string): Screen {
    if (name.length === 0) invalidArgument("screen name must not be empty");
    this.currentName = name;
    return this.get(name);
  }

  get(name: string): Screen {
    const existing = this.screens.get(name);
    if (existing !== undefined) return existing;
    const screen = new Screen(this.defaults);
    this.screens.set(name, screen);
    emitAudit("registry", "create", { name, width: screen.width, height: screen.height });
    return screen;
  }

  names(): readonly string[] {
    return Object.freeze([...this.screens.keys()]);
  }

  /**
   * Replace screen `name` with one of the given size. Settings and custom
   * shapes carry over; every turtle moves to the new screen and is reset.
   */
  setup(width: number, height: number, name: string = this.currentName): Screen {
    requirePositiveInt("width", width);
    requirePositiveInt("height", height);
    const old = this.get(name);
    const next = new Screen({ ...old.settings, width, height });
    for (const [shape, points] of old.customShapes()) next.registerShape(shape, points);
    this.screens.set(name, next);
    for (const turtle of old.turtles()) {
      turtle.rebind(next);
      turtle.reset();
    }
    emitAudit("registry", "setup", { name, width, height });
    return next;
  }

  /** Forget screen `name`. The current screen cannot be removed. */
  remove(name: string): void {
    if (name === this.currentName) invalidState(`cannot remove the current screen "${name}"`);
    this.screens.delete(name);
  }
}
