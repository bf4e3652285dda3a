/**
 * packages/testkit/src/manualClock.ts: Virtual time for frame loops and turtle pacing.
 *
 * `sleep(ms)` advances virtual time immediately and yields one microtask, so
 * loops that await it make progress without real timers.
 */

import type { NowFn, SleepFn } from "@sketchpad/core";

export class ManualClock {
  private t = 0;
  private readonly sleeps: number[] = [];

  constructor(start = 0) {
    this.t = start;
  }

  readonly now: NowFn = () => this.t;

  readonly sleep: SleepFn = async (ms) => {
    this.sleeps.push(ms);
    this.t += ms;
    await Promise.resolve();
  };

  /** Move virtual time forward without a sleep. */
  advance(ms: number): void {
    this.t += ms;
  }

  /** Every duration passed to sleep(), in call order. */
  get sleepCalls(): readonly number[] {
    return this.sleeps;
  }
}
