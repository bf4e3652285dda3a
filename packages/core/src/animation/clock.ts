/**
 * packages/core/src/animation/clock.ts: Cooperative frame loop.
 *
 * Two states, idle and running. Each iteration bumps the frame count, checks
 * the optional duration, runs the draw callback inside one batch, runs the
 * after-frame hook and then suspends for the frame delay. The loop never
 * preempts a frame: stop() is observed between frames only.
 *
 * Audit records (SKETCHPAD_AUDIT=1): clock.start, clock.stop, clock.error.
 */

import { emitAudit } from "../debug/log.js";
import { invalidState } from "../errors.js";
import { requireNonNegative } from "../validate.js";
import { type NowFn, type SleepFn, nowMs, sleepMs } from "./timing.js";

export type ClockState = "idle" | "running";

export type ClockConfig = Readonly<{
  now?: NowFn;
  sleep?: SleepFn;
  /** Default delay between frames. */
  frameDelayMs?: number;
}>;

export type ResolvedClockConfig = Readonly<{
  now: NowFn;
  sleep: SleepFn;
  frameDelayMs: number;
}>;

export type FrameHooks = Readonly<{
  /** Wraps each draw call; used to coalesce a frame into one presentation. */
  batch?: (scope: () => void) => void;
  afterFrame?: () => void;
}>;

export type RunOptions = Readonly<{
  /** Stop once this many seconds have elapsed; omitted means until stop(). */
  durationSeconds?: number;
  frameDelayMs?: number;
}>;

const DEFAULT_CONFIG: ResolvedClockConfig = Object.freeze({
  now: nowMs,
  sleep: sleepMs,
  frameDelayMs: 20,
});

/** Apply defaults to user-provided config, validating all values. */
export function resolveClockConfig(config: ClockConfig | undefined): ResolvedClockConfig {
  if (!config) return DEFAULT_CONFIG;
  return Object.freeze({
    now: typeof config.now === "function" ? config.now : DEFAULT_CONFIG.now,
    sleep: typeof config.sleep === "function" ? config.sleep : DEFAULT_CONFIG.sleep,
    frameDelayMs:
      config.frameDelayMs === undefined
        ? DEFAULT_CONFIG.frameDelayMs
        : requireNonNegative("frameDelayMs", config.frameDelayMs),
  });
}

function describeError(err: unknown): string {
  return err instanceof Error ? `${err.name}: ${err.message}` : String(err);
}

export class AnimationClock {
  private readonly config: ResolvedClockConfig;
  private readonly hooks: FrameHooks;
  private current: ClockState = "idle";
  private frames = 0;
  private generation = 0;

  constructor(config?: ClockConfig, hooks: FrameHooks = {}) {
    this.config = resolveClockConfig(config);
    this.hooks = hooks;
  }

  get state(): ClockState {
    return this.current;
  }

  get isRunning(): boolean {
    return this.current === "running";
  }

  /** Frames started by the latest run(), including the one that observed the deadline. */
  get frameCount(): number {
    return this.frames;
  }

  /**
   * Run `draw` once per frame until stopped, the duration elapses or `draw`
   * throws. The returned promise rejects with whatever `draw` threw.
   */
  async run(draw: () => void, options: RunOptions = {}): Promise<void> {
    const durationSeconds =
      options.durationSeconds === undefined
        ? undefined
        : requireNonNegative("durationSeconds", options.durationSeconds);
    const delay =
      options.frameDelayMs === undefined
        ? this.config.frameDelayMs
        : requireNonNegative("frameDelayMs", options.frameDelayMs);
    if (this.current === "running") invalidState("animation clock is already running");

    const gen = ++this.generation;
    this.current = "running";
    this.frames = 0;
    const { now, sleep } = this.config;
    const startedAt = now();
    const deadlineMs = durationSeconds === undefined ? undefined : durationSeconds * 1000;
    const batch = this.hooks.batch ?? ((scope: () => void) => scope());
    emitAudit("clock", "start", { durationSeconds: durationSeconds ?? null, frameDelayMs: delay });

    try {
      while (this.isLive(gen)) {
        this.frames++;
        if (deadlineMs !== undefined && now() - startedAt > deadlineMs) break;
        try {
          batch(draw);
        } finally {
          this.hooks.afterFrame?.();
        }
        if (!this.isLive(gen)) break;
        await sleep(delay);
      }
    } catch (err) {
      emitAudit("clock", "error", { frameCount: this.frames, error: describeError(err) });
      throw err;
    } finally {
      if (this.generation === gen) {
        this.current = "idle";
        emitAudit("clock", "stop", { frameCount: this.frames });
      }
    }
  }

  /** Request a stop; takes effect before the next frame. */
  stop(): void {
    this.current = "idle";
  }

  private isLive(gen: number): boolean {
    return this.current === "running" && this.generation === gen;
  }
}
