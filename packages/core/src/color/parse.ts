/**
 * packages/core/src/color/parse.ts: CSS color string parsing.
 *
 * Accepts named colors, `transparent`, `#rgb`, `#rgba`, `#rrggbb`,
 * `#rrggbbaa`, and `rgb()`/`rgba()`/`hsl()`/`hsla()` in both comma and
 * space-separated forms (with an optional `/ alpha`).
 */

import { InvalidColorError } from "../errors.js";
import { lookupNamedColor } from "./named.js";
import { type Rgba, TRANSPARENT } from "./types.js";

const FUNCTIONAL_RE = /^(rgba?|hsla?)\((.*)\)$/;
const NUMBER_RE = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:e[+-]?\d+)?$/;

function clampByte(v: number): number {
  if (!Number.isFinite(v)) return 0;
  if (v <= 0) return 0;
  if (v >= 255) return 255;
  return Math.round(v);
}

function badColor(input: string): never {
  throw new InvalidColorError(`bad color string: ${input}`);
}

function parseHexColor(raw: string, input: string): Rgba {
  const hex = raw.slice(1);
  if (!/^[0-9a-f]+$/.test(hex)) badColor(input);
  if (hex.length === 3 || hex.length === 4) {
    const nibble = (i: number): number => {
      const v = Number.parseInt(hex[i] ?? "0", 16);
      return (v << 4) | v;
    };
    return Object.freeze({
      r: nibble(0),
      g: nibble(1),
      b: nibble(2),
      a: hex.length === 4 ? nibble(3) : 255,
    });
  }
  if (hex.length === 6 || hex.length === 8) {
    const byte = (i: number): number => Number.parseInt(hex.slice(i, i + 2), 16);
    return Object.freeze({
      r: byte(0),
      g: byte(2),
      b: byte(4),
      a: hex.length === 8 ? byte(6) : 255,
    });
  }
  return badColor(input);
}

function parseNumber(token: string, input: string): number {
  if (!NUMBER_RE.test(token)) badColor(input);
  return Number.parseFloat(token);
}

/** A channel given as a plain number (0..255) or a percentage. */
function parseRgbChannel(token: string, input: string): number {
  if (token.endsWith("%")) {
    return clampByte((parseNumber(token.slice(0, -1), input) * 255) / 100);
  }
  return clampByte(parseNumber(token, input));
}

/** Alpha given as a fraction (0..1) or a percentage. */
function parseAlpha(token: string | undefined, input: string): number {
  if (token === undefined) return 255;
  const fraction = token.endsWith("%")
    ? parseNumber(token.slice(0, -1), input) / 100
    : parseNumber(token, input);
  return clampByte(fraction * 255);
}

function parsePercent(token: string, input: string): number {
  if (!token.endsWith("%")) badColor(input);
  const v = parseNumber(token.slice(0, -1), input) / 100;
  return Math.min(1, Math.max(0, v));
}

function parseHue(token: string, input: string): number {
  let degrees: number;
  if (token.endsWith("deg")) degrees = parseNumber(token.slice(0, -3), input);
  else if (token.endsWith("turn")) degrees = parseNumber(token.slice(0, -4), input) * 360;
  else if (token.endsWith("rad")) degrees = (parseNumber(token.slice(0, -3), input) * 180) / Math.PI;
  else degrees = parseNumber(token, input);
  return ((degrees % 360) + 360) % 360;
}

function hslToRgb(h: number, s: number, l: number): [number, number, number] {
  const c = (1 - Math.abs(2 * l - 1)) * s;
  const hp = h / 60;
  const x = c * (1 - Math.abs((hp % 2) - 1));
  let rgb: [number, number, number];
  if (hp < 1) rgb = [c, x, 0];
  else if (hp < 2) rgb = [x, c, 0];
  else if (hp < 3) rgb = [0, c, x];
  else if (hp < 4) rgb = [0, x, c];
  else if (hp < 5) rgb = [x, 0, c];
  else rgb = [c, 0, x];
  const m = l - c / 2;
  return [clampByte((rgb[0] + m) * 255), clampByte((rgb[1] + m) * 255), clampByte((rgb[2] + m) * 255)];
}

function splitArguments(body: string): string[] {
  const normalized = body.replace("/", " / ").trim();
  if (normalized.includes(",")) {
    return normalized.split(",").map((part) => part.trim());
  }
  const parts = normalized.split(/\s+/).filter((part) => part.length > 0);
  const slash = parts.indexOf("/");
  if (slash === -1) return parts;
  if (slash !== parts.length - 2) return [];
  return [...parts.slice(0, slash), parts[slash + 1] ?? ""];
}

function parseFunctional(fn: string, body: string, input: string): Rgba {
  const args = splitArguments(body);
  if (args.length !== 3 && args.length !== 4) badColor(input);
  const [first = "", second = "", third = "", alpha] = args;
  const a = parseAlpha(alpha, input);
  if (fn === "rgb" || fn === "rgba") {
    return Object.freeze({
      r: parseRgbChannel(first, input),
      g: parseRgbChannel(second, input),
      b: parseRgbChannel(third, input),
      a,
    });
  }
  const [r, g, b] = hslToRgb(
    parseHue(first, input),
    parsePercent(second, input),
    parsePercent(third, input),
  );
  return Object.freeze({ r, g, b, a });
}

/**
 * Parse a CSS color string into canonical RGBA.
 * @throws InvalidColorError on unknown names and malformed syntax
 */
export function parseCssColor(input: string): Rgba {
  const raw = input.trim().toLowerCase();
  if (raw.length === 0) badColor(input);
  if (raw === "transparent") return TRANSPARENT;
  if (raw.startsWith("#")) return parseHexColor(raw, input);

  const named = lookupNamedColor(raw);
  if (named !== null) return parseHexColor(named, input);

  const match = FUNCTIONAL_RE.exec(raw);
  if (match === null) return badColor(input);
  return parseFunctional(match[1] ?? "", match[2] ?? "", input);
}
