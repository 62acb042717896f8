/**
 * personDecoder.ts - One positional RawRoot entry → Person.
 *
 * Every field is read through `readPath` with the offsets in PERSON_FIELDS,
 * so a shorter or reshaped entry only nulls the fields it affects.  When
 * the upstream layout drifts, this table is the one place to update.
 */

import { randomUUID } from 'crypto';
import { DateTime } from 'luxon';
import { asBoolean, asInteger, asNumber, asString, readPath, type JsonPath } from '../core/json';
import type { JsonValue, Person } from '../core/types';

type Coercer<T> = (value: JsonValue | undefined) => T | null;

interface FieldSpec<T> {
  path: JsonPath;
  coerce: Coercer<T>;
}

const PERSON_FIELDS = {
  id: { path: [6, 0], coerce: asString },
  pictureUrl: { path: [6, 1], coerce: asString },
  fullName: { path: [6, 2], coerce: asString },
  nickname: { path: [6, 3], coerce: asString },
  longitude: { path: [1, 1, 1], coerce: asNumber },
  latitude: { path: [1, 1, 2], coerce: asNumber },
  timestamp: { path: [1, 2], coerce: asInteger },
  accuracy: { path: [1, 3], coerce: asInteger },
  address: { path: [1, 4], coerce: asString },
  countryCode: { path: [1, 6], coerce: asString },
  charging: { path: [13, 0], coerce: asBoolean },
  batteryLevel: { path: [13, 1], coerce: asInteger },
} as const satisfies { [K in keyof Person]: FieldSpec<NonNullable<Person[K]>> };

function read<T>(entry: JsonValue, spec: FieldSpec<T>): T | null {
  return spec.coerce(readPath(entry, spec.path));
}

/**
 * Decode one entry.  Never throws; unreadable fields come back null.
 *
 * The id falls back to the full name and then to a random UUID, so an entry
 * without either gets a different id on every decode.
 */
export function decodePerson(entry: JsonValue): Person {
  const f = PERSON_FIELDS;
  const fullName = read(entry, f.fullName);

  return {
    id: read(entry, f.id) || fullName || randomUUID(),
    pictureUrl: read(entry, f.pictureUrl),
    fullName,
    nickname: read(entry, f.nickname),
    latitude: read(entry, f.latitude),
    longitude: read(entry, f.longitude),
    timestamp: read(entry, f.timestamp),
    accuracy: read(entry, f.accuracy),
    address: read(entry, f.address),
    countryCode: read(entry, f.countryCode),
    charging: read(entry, f.charging),
    batteryLevel: read(entry, f.batteryLevel),
  };
}

/** The person's last-seen time in UTC, or null without a timestamp. */
export function personDateTime(person: Person): DateTime | null {
  if (person.timestamp === null) return null;
  const dateTime = DateTime.fromMillis(person.timestamp, { zone: 'utc' });
  return dateTime.isValid ? dateTime : null;
}

// ─── Authenticated-account entry ───────────────────────────

/**
 * Build an entry in the shared-person layout for the signed-in account:
 * the account string as id, full name and nickname, and the avatar URL
 * (if any) in the picture slot.  Location slots stay empty.
 */
export function buildAuthenticatedEntry(account: string, avatarUrl: string | null): JsonValue[] {
  const entry: JsonValue[] = new Array<JsonValue>(14).fill(null);
  entry[0] = account;
  entry[1] = [null, [null, null, null, null], null, null, null, null, null];
  entry[6] = [account, avatarUrl, account, account];
  return entry;
}
