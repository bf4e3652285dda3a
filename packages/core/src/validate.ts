/**
 * packages/core/src/validate.ts: Argument validators shared by config resolvers and APIs.
 */

import { invalidArgument } from "./errors.js";

export function requirePositiveInt(name: string, v: number): number {
  if (!Number.isInteger(v) || v <= 0) invalidArgument(`${name} must be a positive integer`);
  return v;
}

export function requireNonNegative(name: string, v: number): number {
  if (!Number.isFinite(v) || v < 0) invalidArgument(`${name} must be a non-negative number`);
  return v;
}

export function requirePositive(name: string, v: number): number {
  if (!Number.isFinite(v) || v <= 0) invalidArgument(`${name} must be a positive number`);
  return v;
}

export function requireFinite(name: string, v: number): number {
  if (!Number.isFinite(v)) invalidArgument(`${name} must be a finite number`);
  return v;
}
