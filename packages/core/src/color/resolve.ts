/**
 * packages/core/src/color/resolve.ts: Heterogeneous color inputs → canonical RGBA.
 *
 * Arity rules:
 *   - 1 number:  grayscale, opaque
 *   - 1 string:  CSS color string
 *   - 1 tuple:   unpacked positionally
 *   - 1 record:  canonical Rgba, validated
 *   - 2 numbers: grayscale + alpha
 *   - 3 numbers: RGB
 *   - 4 numbers: RGBA
 */

import { warnDev } from "../debug/log.js";
import { InvalidColorError } from "../errors.js";
import { parseCssColor } from "./parse.js";
import type { ColorArg, ColorMode, Rgba } from "./types.js";

function describeArgs(args: readonly ColorArg[]): string {
  try {
    return JSON.stringify(args);
  } catch {
    return String(args);
  }
}

function isRgbaRecord(value: ColorArg): value is Rgba {
  return (
    typeof value === "object" &&
    !Array.isArray(value) &&
    "r" in value &&
    "g" in value &&
    "b" in value &&
    "a" in value
  );
}

function toChannel(value: number, mode: ColorMode, args: readonly ColorArg[]): number {
  if (!Number.isFinite(value) || value < 0 || value > mode) {
    throw new InvalidColorError(`bad color sequence: ${describeArgs(args)}`);
  }
  return mode === 1 ? Math.round(value * 255) : Math.round(value);
}

function resolveNumbers(values: readonly number[], mode: ColorMode, args: readonly ColorArg[]): Rgba {
  const ch = (v: number): number => toChannel(v, mode, args);
  switch (values.length) {
    case 1: {
      const v = ch(values[0] ?? Number.NaN);
      return Object.freeze({ r: v, g: v, b: v, a: 255 });
    }
    case 2: {
      const v = ch(values[0] ?? Number.NaN);
      return Object.freeze({ r: v, g: v, b: v, a: ch(values[1] ?? Number.NaN) });
    }
    case 3:
      return Object.freeze({
        r: ch(values[0] ?? Number.NaN),
        g: ch(values[1] ?? Number.NaN),
        b: ch(values[2] ?? Number.NaN),
        a: 255,
      });
    case 4:
      return Object.freeze({
        r: ch(values[0] ?? Number.NaN),
        g: ch(values[1] ?? Number.NaN),
        b: ch(values[2] ?? Number.NaN),
        a: ch(values[3] ?? Number.NaN),
      });
    default:
      throw new InvalidColorError(`bad color arguments: ${describeArgs(args)}`);
  }
}

function resolveRecord(value: Rgba, args: readonly ColorArg[]): Rgba {
  const channels = [value.r, value.g, value.b, value.a];
  for (const c of channels) {
    if (!Number.isInteger(c) || c < 0 || c > 255) {
      throw new InvalidColorError(`bad color record: ${describeArgs(args)}`);
    }
  }
  return Object.freeze({ r: value.r, g: value.g, b: value.b, a: value.a });
}

/**
 * Resolve positional color arguments into canonical RGBA.
 *
 * `mode` governs raw numeric values only; CSS strings and Rgba records are
 * already absolute.
 *
 * @throws InvalidColorError on malformed arity/type combinations, out-of-range
 * channels or unknown names
 */
export function resolveColor(args: readonly ColorArg[], mode: ColorMode = 255): Rgba {
  if (args.length === 1) {
    const only = args[0];
    if (typeof only === "number") return resolveNumbers([only], mode, args);
    if (typeof only === "string") return parseCssColor(only);
    if (only === undefined) throw new InvalidColorError("bad color arguments: []");
    if (Array.isArray(only)) return resolveColor(only, mode);
    if (isRgbaRecord(only)) return resolveRecord(only, args);
    throw new InvalidColorError(`bad color arguments: ${describeArgs(args)}`);
  }
  const numbers: number[] = [];
  for (const arg of args) {
    if (typeof arg !== "number") {
      throw new InvalidColorError(`bad color arguments: ${describeArgs(args)}`);
    }
    numbers.push(arg);
  }
  return resolveNumbers(numbers, mode, args);
}

/**
 * Validate a requested color mode. Only exactly 1 or 255 are accepted; any
 * other value leaves `current` unchanged (reported once in dev mode).
 */
export function normalizeColorMode(requested: number, current: ColorMode): ColorMode {
  if (requested === 1) return 1;
  if (requested === 255) return 255;
  warnDev(
    `colormode:${String(requested)}`,
    `colormode(${String(requested)}) ignored; expected 1.0 or 255`,
  );
  return current;
}

/** RGB channels scaled into `mode` (1 → fractions, 255 → bytes). */
export function colorToTuple(color: Rgba, mode: ColorMode): readonly [number, number, number] {
  if (mode === 255) return Object.freeze([color.r, color.g, color.b] as const);
  return Object.freeze([color.r / 255, color.g / 255, color.b / 255] as const);
}

function hexByte(v: number): string {
  return v.toString(16).padStart(2, "0");
}

/** `#rrggbb` for opaque colors, `#rrggbbaa` otherwise. */
export function formatColor(color: Rgba): string {
  const rgb = `#${hexByte(color.r)}${hexByte(color.g)}${hexByte(color.b)}`;
  return color.a === 255 ? rgb : `${rgb}${hexByte(color.a)}`;
}

export function sameColor(a: Rgba, b: Rgba): boolean {
  return a.r === b.r && a.g === b.g && a.b === b.b && a.a === b.a;
}
