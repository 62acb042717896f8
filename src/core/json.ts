/**
 * json.ts - Bounds- and kind-checked access into positional JSON arrays.
 *
 * The location-sharing payload is nested arrays addressed purely by index.
 * `readPath` walks a list of indices and returns `undefined` as soon as a
 * step leaves the array or lands on something that is not an array.  The
 * `as*` coercers then turn the leaf into a typed value or `null`.
 */

import type { JsonValue } from './types';

/** A route into nested arrays, e.g. `[1, 1, 2]` for `entry[1][1][2]`. */
export type JsonPath = readonly number[];

export function isJsonArray(value: JsonValue | undefined): value is JsonValue[] {
  return Array.isArray(value);
}

/** Element `index` of `value`, or `undefined` when it isn't there. */
export function at(value: JsonValue | undefined, index: number): JsonValue | undefined {
  if (!isJsonArray(value)) return undefined;
  if (!Number.isInteger(index) || index < 0 || index >= value.length) return undefined;
  return value[index];
}

export function readPath(value: JsonValue | undefined, path: JsonPath): JsonValue | undefined {
  let current = value;
  for (const index of path) {
    current = at(current, index);
    if (current === undefined) return undefined;
  }
  return current;
}

// ─── Coercers ──────────────────────────────────────────────

const INTEGER_STRING = /^\s*[+-]?\d+\s*$/;
const DECIMAL_STRING = /^\s*[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?\s*$/;
const BOOLEAN_STRING = /^\s*(true|false)\s*$/i;

export function asString(value: JsonValue | undefined): string | null {
  return typeof value === 'string' ? value : null;
}

/** A finite number, or a decimal (optionally exponent) string holding one. */
export function asNumber(value: JsonValue | undefined): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === 'string' && DECIMAL_STRING.test(value)) {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

/** A safe integer, or a string of decimal digits holding one. */
export function asInteger(value: JsonValue | undefined): number | null {
  if (typeof value === 'number') {
    return Number.isSafeInteger(value) ? value : null;
  }
  if (typeof value === 'string' && INTEGER_STRING.test(value)) {
    const parsed = Number(value);
    return Number.isSafeInteger(parsed) ? parsed : null;
  }
  return null;
}

/** `true`/`false`, or a string spelling one of them in any case. */
export function asBoolean(value: JsonValue | undefined): boolean | null {
  if (typeof value === 'boolean') return value;
  if (typeof value === 'string') {
    const match = BOOLEAN_STRING.exec(value);
    return match ? match[1].toLowerCase() === 'true' : null;
  }
  return null;
}
