/**
 * locationSharingService.ts - Facade over the fetch → cache → decode pipeline.
 *
 *   1. COOKIES  → cookieLoader reads the Netscape file and builds the header
 *   2. FETCH    → RetryController drives the Transport (got-scraping by default)
 *   3. PARSE    → responseParser strips the guard prefix, decodes the array
 *   4. CACHE    → RootCache keeps the last RawRoot for `cacheTtlMs`
 *   5. DECODE   → personDecoder maps each entry to a Person
 *
 * Construction is two-phase: `connect()` builds the pipeline, then performs
 * one fetch to validate the session before handing the service out.
 */

import type { DateTime } from 'luxon';
import { assertSessionCookies, buildCookieHeader, loadCookieFile } from './core/cookieLoader';
import { InvalidCookiesError } from './core/errors';
import { at, asString, isJsonArray, readPath } from './core/json';
import { Logger } from './core/logger';
import {
  loadServiceConfig,
  type Coordinates,
  type Person,
  type RawRoot,
  type ServiceConfig,
  type Transport,
} from './core/types';
import { buildAuthenticatedEntry, decodePerson } from './decoders';
import { LightFetcher, RetryController, parseResponseBody } from './middleware';
import { RootCache } from './services/rootCache';

// ─── Endpoint ──────────────────────────────────────────────

export const LOCATION_SHARING_ENDPOINT = 'https://www.google.com/maps/rpc/locationsharing/read';

/**
 * Viewport / render parameters the endpoint expects.  The response layout
 * depends on them, so they are sent exactly as captured.
 */
export const LOCATION_SHARING_QUERY =
  'authuser=2&hl=en&gl=us&pb=!1m7!8m6!1m3!1i14!2i8413!3i5385!2i6!3x4095!2m3!1e0!2sm!3i407105169' +
  '!3m7!2sen!5e1105!12m4!1e68!2m2!1sset!2sRoadmap!4e1!5m4!1e4!8m2!1e0!1e1!6m9!1e12!2i2!26m1!4b1' +
  '!30m1!1f1.3953487873077393!39b1!44e1!50e0!23i4111425';

export const LOCATION_SHARING_URL = `${LOCATION_SHARING_ENDPOINT}?${LOCATION_SHARING_QUERY}`;

/** RawRoot[6] holds this when the endpoint treats the session as signed out. */
export const UNAUTHENTICATED_MARKER = 'GgA=';

export const DEFAULT_ACCOUNT = 'unknown@gmail.com';

// ─── Options ───────────────────────────────────────────────

export interface LocationSharingServiceOptions {
  /** Netscape-format cookie file holding `__Secure-1PSID` or `__Secure-3PSID`. */
  cookiesFilePath: string;
  /** Shown as id, full name and nickname of the signed-in account's own Person. */
  authenticatingAccount?: string;
  /** Replaces the got-scraping transport (tests, proxies). */
  transport?: Transport;
  /** Physical attempts per fetch; values below 1 are raised to 1. */
  maxRetries?: number;
  logger?: Logger;
  disableCache?: boolean;
  /** Overrides on top of `loadServiceConfig()`. */
  config?: Partial<ServiceConfig>;
  /** Cache clock, current time in UTC. */
  clock?: () => DateTime;
  /** Jitter source for backoff, uniform in [0, 1). */
  random?: () => number;
}

interface ServiceParts {
  account: string;
  cookieHeader: string;
  transport: Transport;
  retry: RetryController;
  cache: RootCache;
  logger: Logger;
}

function sameText(candidate: string | null, wanted: string): boolean {
  return candidate !== null && candidate.toLowerCase() === wanted.toLowerCase();
}

export class LocationSharingService {
  private readonly account: string;
  private readonly cookieHeader: string;
  private readonly transport: Transport;
  private readonly retry: RetryController;
  private readonly cache: RootCache;
  private readonly logger: Logger;

  private constructor(parts: ServiceParts) {
    this.account = parts.account;
    this.cookieHeader = parts.cookieHeader;
    this.transport = parts.transport;
    this.retry = parts.retry;
    this.cache = parts.cache;
    this.logger = parts.logger;
  }

  /**
   * Load cookies, build the pipeline and validate the session.
   *
   * @throws InvalidCookieFileError when the cookie file is missing or unreadable.
   * @throws InvalidCookiesError when no session cookie is present (no request is
   *   made) or the endpoint reports the session as signed out.
   * @throws MalformedDataError when the validation fetch fails.
   */
  static async connect(options: LocationSharingServiceOptions): Promise<LocationSharingService> {
    const logger = options.logger ?? new Logger('LocationSharing');
    const config: ServiceConfig = { ...loadServiceConfig(), ...options.config };
    const account = options.authenticatingAccount ?? DEFAULT_ACCOUNT;

    logger.info(`Service initialization starting for ${account}`);

    const cookies = await loadCookieFile(options.cookiesFilePath, logger.child('CookieLoader'));
    assertSessionCookies(cookies);

    const transport =
      options.transport ??
      new LightFetcher({ rateLimitMs: config.rateLimitMs, logger: logger.child('LightFetcher') });

    const service = new LocationSharingService({
      account,
      cookieHeader: buildCookieHeader(cookies, LOCATION_SHARING_URL),
      transport,
      retry: new RetryController(transport, {
        ...config,
        maxRetries: Math.max(1, options.maxRetries ?? config.maxRetries),
        logger: logger.child('Retry'),
        random: options.random,
      }),
      cache: new RootCache({
        ttlMs: config.cacheTtlMs,
        disabled: options.disableCache ?? false,
        clock: options.clock,
        logger: logger.child('Cache'),
      }),
      logger,
    });

    try {
      await service.validateSession();
    } catch (err) {
      await service.close();
      throw err;
    }

    logger.info(`Service initialization completed for ${account}`);
    return service;
  }

  // ── Lifecycle ────────────────────────────────────────────

  /** When the cached RawRoot was fetched, or null if nothing is cached. */
  get lastFetchedAt(): DateTime | null {
    return this.cache.fetchedAt;
  }

  clearCache(): void {
    this.cache.clear();
  }

  async close(): Promise<void> {
    await this.transport.close?.();
  }

  // ── People ───────────────────────────────────────────────

  /**
   * Everyone sharing their location with the account.
   *
   * @throws MalformedDataError, CancelledError
   */
  async getSharedPeople(signal?: AbortSignal): Promise<Person[]> {
    const root = await this.fetchRoot(signal);
    return this.sharedPeopleFrom(root);
  }

  /**
   * The signed-in account as a Person (no location).  Null when the fetch
   * fails or is cancelled.
   */
  async getAuthenticatedPerson(signal?: AbortSignal): Promise<Person | null> {
    let root: RawRoot;
    try {
      root = await this.fetchRoot(signal);
    } catch (err) {
      this.logger.warn(`Could not build authenticated person for ${this.account}`, err);
      return null;
    }
    return this.authenticatedPersonFrom(root);
  }

  /** Shared people followed by the authenticated person, from a single fetch. */
  async getAllPeople(signal?: AbortSignal): Promise<Person[]> {
    const root = await this.fetchRoot(signal);
    const people = this.sharedPeopleFrom(root);
    const self = this.authenticatedPersonFrom(root);
    return self ? [...people, self] : people;
  }

  // ── Lookup by nickname ───────────────────────────────────

  async getPersonByNickname(nickname: string, signal?: AbortSignal): Promise<Person | null> {
    const people = await this.getAllPeople(signal);
    return people.find((person) => sameText(person.nickname, nickname)) ?? null;
  }

  async getCoordinatesByNickname(nickname: string, signal?: AbortSignal): Promise<Coordinates> {
    return toCoordinates(await this.getPersonByNickname(nickname, signal));
  }

  async getLatitudeByNickname(nickname: string, signal?: AbortSignal): Promise<number | null> {
    return (await this.getPersonByNickname(nickname, signal))?.latitude ?? null;
  }

  async getLongitudeByNickname(nickname: string, signal?: AbortSignal): Promise<number | null> {
    return (await this.getPersonByNickname(nickname, signal))?.longitude ?? null;
  }

  async getTimestampByNickname(nickname: string, signal?: AbortSignal): Promise<number | null> {
    return (await this.getPersonByNickname(nickname, signal))?.timestamp ?? null;
  }

  // ── Lookup by full name ──────────────────────────────────

  async getPersonByFullName(fullName: string, signal?: AbortSignal): Promise<Person | null> {
    const people = await this.getAllPeople(signal);
    return people.find((person) => sameText(person.fullName, fullName)) ?? null;
  }

  async getCoordinatesByFullName(fullName: string, signal?: AbortSignal): Promise<Coordinates> {
    return toCoordinates(await this.getPersonByFullName(fullName, signal));
  }

  async getLatitudeByFullName(fullName: string, signal?: AbortSignal): Promise<number | null> {
    return (await this.getPersonByFullName(fullName, signal))?.latitude ?? null;
  }

  async getLongitudeByFullName(fullName: string, signal?: AbortSignal): Promise<number | null> {
    return (await this.getPersonByFullName(fullName, signal))?.longitude ?? null;
  }

  async getTimestampByFullName(fullName: string, signal?: AbortSignal): Promise<number | null> {
    return (await this.getPersonByFullName(fullName, signal))?.timestamp ?? null;
  }

  // ── Internals ────────────────────────────────────────────

  private async fetchRoot(signal?: AbortSignal): Promise<RawRoot> {
    return this.cache.getOrFetch(async () => {
      const body = await this.retry.execute(
        { url: LOCATION_SHARING_URL, cookieHeader: this.cookieHeader },
        signal,
      );
      const root = parseResponseBody(body);
      this.logger.debug(`Fetched location data with ${root.length} top-level slot(s)`);
      return root;
    });
  }

  /** Best-effort check of RawRoot[6]; only the known marker is rejected. */
  private async validateSession(): Promise<void> {
    const root = await this.fetchRoot();
    if (at(root, 6) === UNAUTHENTICATED_MARKER) {
      throw new InvalidCookiesError('Session not authenticated (auth heuristic matched).');
    }
  }

  private sharedPeopleFrom(root: RawRoot): Person[] {
    const entries = at(root, 0);
    if (!isJsonArray(entries)) return [];

    const people: Person[] = [];
    for (const entry of entries) {
      try {
        people.push(decodePerson(entry));
      } catch (err) {
        this.logger.debug(`Skipping invalid person entry: ${String(err)}`);
      }
    }
    this.logger.debug(`Decoded ${people.length} shared person(s)`);
    return people;
  }

  private authenticatedPersonFrom(root: RawRoot): Person | null {
    try {
      const avatarUrl = asString(readPath(root, [9, 1]));
      return decodePerson(buildAuthenticatedEntry(this.account, avatarUrl));
    } catch (err) {
      this.logger.warn(`Could not build authenticated person for ${this.account}`, err);
      return null;
    }
  }
}

function toCoordinates(person: Person | null): Coordinates {
  return {
    latitude: person?.latitude ?? null,
    longitude: person?.longitude ?? null,
  };
}
