import { mkdtemp, rm, writeFile } from 'fs/promises';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  assertSessionCookies,
  buildCookieHeader,
  loadCookieFile,
  parseCookieFile,
  parseCookieLine,
} from './cookieLoader';
import { InvalidCookieFileError, InvalidCookiesError } from './errors';
import { Logger } from './logger';

const silent = new Logger('Test', 'silent');

describe('parseCookieLine', () => {
  it('parses a tab-separated row', () => {
    expect(parseCookieLine('.google.com\tTRUE\t/\tTRUE\t1893456000\t__Secure-1PSID\ttest-secret')).toEqual({
      domain: '.google.com',
      includeSubdomains: true,
      path: '/',
      secure: true,
      expiry: 1893456000,
      name: '__Secure-1PSID',
      value: 'test-secret',
      httpOnly: false,
    });
  });

  it('falls back to whitespace splitting', () => {
    const cookie = parseCookieLine('.google.com FALSE /maps FALSE 0 NID placeholder');
    expect(cookie).toMatchObject({
      includeSubdomains: false,
      path: '/maps',
      secure: false,
      expiry: 0,
      name: 'NID',
      value: 'placeholder',
    });
  });

  it('reads #HttpOnly_ rows as cookies', () => {
    const cookie = parseCookieLine('#HttpOnly_.google.com\tTRUE\t/\tTRUE\t0\t__Secure-3PSID\tabc');
    expect(cookie).toMatchObject({ domain: '.google.com', name: '__Secure-3PSID', httpOnly: true });
  });

  it('skips comments, blanks and short rows', () => {
    expect(parseCookieLine('# Netscape HTTP Cookie File')).toBeNull();
    expect(parseCookieLine('   ')).toBeNull();
    expect(parseCookieLine('.google.com\tTRUE\t/\tTRUE\t0\tNID')).toBeNull();
  });

  it('treats a non-numeric expiry as a session cookie', () => {
    expect(parseCookieLine('.google.com TRUE / TRUE never SID v')?.expiry).toBe(0);
  });
});

describe('parseCookieFile', () => {
  it('keeps valid rows in file order and handles CRLF', () => {
    const content = [
      '# Netscape HTTP Cookie File',
      '.google.com\tTRUE\t/\tTRUE\t0\tSID\tone\r',
      'garbage line',
      '',
      '.google.com\tTRUE\t/\tTRUE\t0\t__Secure-1PSID\ttwo\r',
    ].join('\n');
    const cookies = parseCookieFile(content);
    expect(cookies.map((c) => `${c.name}=${c.value}`)).toEqual(['SID=one', '__Secure-1PSID=two']);
  });
});

describe('loadCookieFile', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'locshare-cookies-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('reads cookies from disk', async () => {
    const file = path.join(dir, 'cookies.txt');
    await writeFile(file, '.google.com TRUE / TRUE 0 __Secure-1PSID value\n');
    const cookies = await loadCookieFile(file, silent);
    expect(cookies).toHaveLength(1);
    expect(cookies[0].name).toBe('__Secure-1PSID');
  });

  it('throws InvalidCookieFileError for a missing file', async () => {
    const file = path.join(dir, 'missing.txt');
    await expect(loadCookieFile(file, silent)).rejects.toBeInstanceOf(InvalidCookieFileError);
  });

  it('throws InvalidCookieFileError when the path is a directory', async () => {
    await expect(loadCookieFile(dir, silent)).rejects.toBeInstanceOf(InvalidCookieFileError);
  });
});

describe('assertSessionCookies', () => {
  it('accepts either session cookie name', () => {
    expect(() => assertSessionCookies(parseCookieFile('.google.com TRUE / TRUE 0 __Secure-3PSID v'))).not.toThrow();
  });

  it('rejects a file without session cookies', () => {
    expect(() => assertSessionCookies(parseCookieFile('.google.com TRUE / TRUE 0 NID v'))).toThrow(
      InvalidCookiesError,
    );
    expect(() => assertSessionCookies([])).toThrow('Missing required cookies: __Secure-1PSID,__Secure-3PSID');
  });
});

describe('buildCookieHeader', () => {
  it('includes cookies whose domain covers the host', () => {
    const cookies = parseCookieFile(
      [
        '.google.com TRUE / TRUE 0 __Secure-1PSID a',
        'www.google.com FALSE / TRUE 0 NID b',
        '.youtube.com TRUE / TRUE 0 YSC c',
        'maps.google.com FALSE / TRUE 0 OTHER d',
      ].join('\n'),
    );
    expect(buildCookieHeader(cookies, 'https://www.google.com/maps/rpc/locationsharing/read?x=1')).toBe(
      '__Secure-1PSID=a; NID=b',
    );
  });
});
