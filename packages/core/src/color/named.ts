/**
 * packages/core/src/color/named.ts: CSS named-color table.
 *
 * The table lives in namedColors.json beside this module and is read lazily
 * on first lookup.
 */

import { readFileSync } from "node:fs";

const NAMED_COLORS_URL = new URL("./namedColors.json", import.meta.url);

let table: ReadonlyMap<string, string> | null = null;

function isStringRecord(value: unknown): value is Readonly<Record<string, string>> {
  if (typeof value !== "object" || value === null || Array.isArray(value)) return false;
  return Object.values(value).every((entry) => typeof entry === "string");
}

function loadNamedColors(): ReadonlyMap<string, string> {
  if (table !== null) return table;
  const parsed: unknown = JSON.parse(readFileSync(NAMED_COLORS_URL, "utf8"));
  if (!isStringRecord(parsed)) {
    throw new TypeError("namedColors.json must map color names to hex strings");
  }
  table = new Map(Object.entries(parsed));
  return table;
}

/** Hex string (`#rrggbb`) for a lower-case CSS color name, or null. */
export function lookupNamedColor(name: string): string | null {
  return loadNamedColors().get(name) ?? null;
}

export function isNamedColor(name: string): boolean {
  return loadNamedColors().has(name.trim().toLowerCase());
}

export function namedColorNames(): readonly string[] {
  return Object.freeze([...loadNamedColors().keys()]);
}
