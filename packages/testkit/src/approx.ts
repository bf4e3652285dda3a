import { strict as assert } from "node:assert";

/** Default tolerance for float comparisons in drawing math. */
const EPSILON = 1e-9;

export function assertClose(actual: number, expected: number, epsilon = EPSILON, label = "value"): void {
  assert.ok(
    Math.abs(actual - expected) <= epsilon,
    `${label}: expected ${String(expected)} ± ${String(epsilon)}, got ${String(actual)}`,
  );
}

export function assertPointClose(
  actual: Readonly<{ x: number; y: number }>,
  expected: Readonly<{ x: number; y: number }>,
  epsilon = EPSILON,
): void {
  assertClose(actual.x, expected.x, epsilon, "x");
  assertClose(actual.y, expected.y, epsilon, "y");
}
