/**
 * responseParser.ts - Raw response text → RawRoot.
 *
 * The endpoint prefixes its JSON with an anti-hijacking guard ending in a
 * single quote (`)]}'`).  Everything after the first `'` is the payload; when
 * no quote is present the whole text is decoded as-is.
 */

import { MalformedDataError } from '../core/errors';
import type { JsonValue, RawRoot } from '../core/types';

export function extractJsonPayload(raw: string): string {
  const quote = raw.indexOf("'");
  return quote >= 0 ? raw.slice(quote + 1) : raw;
}

/** @throws MalformedDataError when the payload isn't JSON or isn't an array. */
export function parseResponseBody(raw: string): RawRoot {
  const payload = extractJsonPayload(raw);

  let decoded: JsonValue;
  try {
    decoded = JSON.parse(payload);
  } catch (err) {
    throw new MalformedDataError('Response payload is not valid JSON', {
      body: raw,
      cause: err,
    });
  }

  if (!Array.isArray(decoded)) {
    throw new MalformedDataError('Unexpected JSON structure: top-level value is not an array', {
      body: raw,
    });
  }
  return decoded;
}
