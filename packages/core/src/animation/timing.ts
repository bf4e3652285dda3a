/**
 * packages/core/src/animation/timing.ts: Clock and suspension primitives.
 */

/** Millisecond clock used for wall-time budgets. */
export type NowFn = () => number;

/** Cooperative suspension: resolves after roughly `ms` milliseconds. */
export type SleepFn = (ms: number) => Promise<void>;

/**
 * High-resolution timer.
 * Falls back to Date.now() if performance.now() is unavailable.
 */
export const nowMs: NowFn = (() => {
  if (typeof performance !== "undefined" && typeof performance.now === "function") {
    return () => performance.now();
  }
  return () => Date.now();
})();

export const sleepMs: SleepFn = (ms) =>
  new Promise<void>((resolve) => {
    setTimeout(resolve, Math.max(0, ms));
  });
