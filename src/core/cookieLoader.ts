/**
 * cookieLoader.ts - Netscape cookie-file parsing and session-cookie checks.
 *
 * Row layout (tab separated, 7 columns):
 *   domain  includeSubdomains  path  secure  expiry  name  value
 *
 * Lines starting with `#` are comments, except the `#HttpOnly_` domain
 * prefix written by curl and most browser exporters, which marks an
 * HttpOnly cookie row.  Rows that don't split into 7 fields on tabs are
 * retried on whitespace; rows that still fall short are skipped.
 */

import { readFile } from 'fs/promises';
import { existsSync } from 'fs';
import { InvalidCookieFileError, InvalidCookiesError } from './errors';
import { Logger } from './logger';
import type { CookieRecord } from './types';

/** At least one of these must be present for the endpoint to accept the session. */
export const SESSION_COOKIE_NAMES: readonly string[] = ['__Secure-1PSID', '__Secure-3PSID'];

const HTTP_ONLY_PREFIX = '#HttpOnly_';
const FIELD_COUNT = 7;

// ─── Parsing ───────────────────────────────────────────────

function splitFields(line: string): string[] {
  const tabbed = line.split('\t').filter((field) => field.length > 0);
  if (tabbed.length >= FIELD_COUNT) return tabbed;
  return line.split(/\s+/).filter((field) => field.length > 0);
}

/** Parse one line, or return null for blanks, comments and malformed rows. */
export function parseCookieLine(rawLine: string): CookieRecord | null {
  let line = rawLine.trim();
  if (line.length === 0) return null;

  let httpOnly = false;
  if (line.startsWith(HTTP_ONLY_PREFIX)) {
    httpOnly = true;
    line = line.slice(HTTP_ONLY_PREFIX.length);
  } else if (line.startsWith('#')) {
    return null;
  }

  const fields = splitFields(line);
  if (fields.length < FIELD_COUNT) return null;

  const [domain, flag, path, secure, expiry, name, value] = fields;
  const parsedExpiry = parseInt(expiry, 10);

  return {
    domain,
    includeSubdomains: flag === 'TRUE',
    path,
    secure: secure === 'TRUE',
    expiry: Number.isFinite(parsedExpiry) ? parsedExpiry : 0,
    name,
    value,
    httpOnly,
  };
}

export function parseCookieFile(content: string): CookieRecord[] {
  const cookies: CookieRecord[] = [];
  for (const line of content.split('\n')) {
    const cookie = parseCookieLine(line);
    if (cookie) cookies.push(cookie);
  }
  return cookies;
}

/**
 * Read and parse a cookie file.
 *
 * @throws InvalidCookieFileError if the file is missing or can't be read.
 */
export async function loadCookieFile(
  filePath: string,
  logger: Logger = new Logger('CookieLoader'),
): Promise<CookieRecord[]> {
  if (!existsSync(filePath)) {
    throw new InvalidCookieFileError(filePath);
  }

  let content: string;
  try {
    content = await readFile(filePath, 'utf-8');
  } catch (err) {
    throw new InvalidCookieFileError(filePath, { cause: err });
  }

  const cookies = parseCookieFile(content);
  logger.debug(`Parsed ${cookies.length} cookie(s) from ${filePath}`);
  return cookies;
}

/** @throws InvalidCookiesError when no session cookie is present. */
export function assertSessionCookies(cookies: readonly CookieRecord[]): void {
  const found = cookies.some((cookie) => SESSION_COOKIE_NAMES.includes(cookie.name));
  if (!found) {
    throw new InvalidCookiesError(
      `Missing required cookies: ${SESSION_COOKIE_NAMES.join(',')}`,
    );
  }
}

// ─── Cookie header ─────────────────────────────────────────

function domainMatches(cookieDomain: string, host: string): boolean {
  const domain = cookieDomain.replace(/^\./, '').toLowerCase();
  const target = host.toLowerCase();
  return target === domain || target.endsWith(`.${domain}`);
}

/**
 * Join `name=value` pairs for every cookie whose domain covers the URL's
 * host, in file order.
 */
export function buildCookieHeader(cookies: readonly CookieRecord[], url: string): string {
  const host = new URL(url).hostname;
  return cookies
    .filter((cookie) => domainMatches(cookie.domain, host))
    .map((cookie) => `${cookie.name}=${cookie.value}`)
    .join('; ');
}
