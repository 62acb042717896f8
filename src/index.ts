/**
 * Public entry point.
 *
 *   const service = await LocationSharingService.connect({
 *     cookiesFilePath: 'cookies.txt',
 *     authenticatingAccount: 'me@example.com',
 *   });
 *   const people = await service.getAllPeople();
 */

export {
  DEFAULT_ACCOUNT,
  LOCATION_SHARING_URL,
  LocationSharingService,
  UNAUTHENTICATED_MARKER,
} from './locationSharingService';
export type { LocationSharingServiceOptions } from './locationSharingService';

export {
  CancelledError,
  InvalidCookieFileError,
  InvalidCookiesError,
  LocationSharingError,
  MalformedDataError,
  TransportError,
} from './core/errors';
export { Logger, resolveLogThreshold } from './core/logger';
export type { LogLevel, LogThreshold } from './core/logger';
export {
  SESSION_COOKIE_NAMES,
  assertSessionCookies,
  buildCookieHeader,
  loadCookieFile,
  parseCookieFile,
} from './core/cookieLoader';
export { DEFAULT_SERVICE_CONFIG, loadServiceConfig } from './core/types';
export type {
  Coordinates,
  CookieRecord,
  JsonValue,
  Person,
  RawRoot,
  ServiceConfig,
  Transport,
  TransportRequest,
  TransportResponse,
} from './core/types';
export { decodePerson, personDateTime } from './decoders';
export { LightFetcher, RetryController, parseResponseBody } from './middleware';
export { RootCache } from './services/rootCache';
