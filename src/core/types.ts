/**
 * types.ts - Shared type definitions for the location-sharing client.
 *
 * Cookie loader, transport, cache, decoder and service all agree on the
 * shapes declared here, and the service configuration is built here from
 * process.env.
 */

// ─── JSON ──────────────────────────────────────────────────

/** Any value JSON.parse can return. */
export type JsonValue =
  | null
  | boolean
  | number
  | string
  | JsonValue[]
  | { [key: string]: JsonValue };

/**
 * The decoded top-level array of one fetch.  Slot 0 holds the shared-person
 * entries, slot 6 the authentication marker, slot 9 the account's own avatar.
 */
export type RawRoot = JsonValue[];

// ─── Cookies ───────────────────────────────────────────────

/** One row of a Netscape-format cookie file. */
export interface CookieRecord {
  readonly domain: string;
  /** Second column: whether subdomains of `domain` also receive the cookie. */
  readonly includeSubdomains: boolean;
  readonly path: string;
  readonly secure: boolean;
  /** Unix seconds.  0 marks a session cookie. */
  readonly expiry: number;
  readonly name: string;
  readonly value: string;
  /** Row carried the `#HttpOnly_` domain prefix. */
  readonly httpOnly: boolean;
}

// ─── Person ────────────────────────────────────────────────

/** One shared (or self) account's location and device status. */
export interface Person {
  /** Never empty: upstream id, else full name, else a generated UUID. */
  readonly id: string;
  readonly pictureUrl: string | null;
  readonly fullName: string | null;
  readonly nickname: string | null;
  readonly latitude: number | null;
  readonly longitude: number | null;
  /** Milliseconds since the Unix epoch. */
  readonly timestamp: number | null;
  /** Accuracy radius in metres. */
  readonly accuracy: number | null;
  readonly address: string | null;
  readonly countryCode: string | null;
  readonly charging: boolean | null;
  /** 0–100. */
  readonly batteryLevel: number | null;
}

export interface Coordinates {
  latitude: number | null;
  longitude: number | null;
}

// ─── Transport ─────────────────────────────────────────────

export interface TransportRequest {
  url: string;
  /** Value for the `cookie` header. */
  cookieHeader?: string;
  /** Per-attempt timeout in milliseconds. */
  timeoutMs: number;
}

export interface TransportResponse {
  statusCode: number;
  body: string;
}

/**
 * Issues one physical GET per call.  Implementations throw `TransportError`
 * for network-level failures and should stop work when `signal` aborts.
 */
export interface Transport {
  get(request: TransportRequest, signal?: AbortSignal): Promise<TransportResponse>;
  /** Release pooled resources (limiters, sockets). */
  close?(): Promise<void>;
}

// ─── Service configuration ─────────────────────────────────

export interface ServiceConfig {
  /** Physical attempts per logical fetch (≥ 1). */
  maxRetries: number;
  cacheTtlMs: number;
  requestTimeoutMs: number;
  backoffBaseMs: number;
  backoffMaxMs: number;
  backoffJitterMs: number;
  /** Minimum spacing between requests issued by the default transport. */
  rateLimitMs: number;
}

export const DEFAULT_SERVICE_CONFIG: Readonly<ServiceConfig> = {
  maxRetries: 3,
  cacheTtlMs: 30_000,
  requestTimeoutMs: 30_000,
  backoffBaseMs: 500,
  backoffMaxMs: 10_000,
  backoffJitterMs: 250,
  rateLimitMs: 250,
};

function readInt(raw: string | undefined, fallback: number, min: number): number {
  if (raw === undefined || raw.trim() === '') return fallback;
  const parsed = parseInt(raw, 10);
  return Number.isFinite(parsed) && parsed >= min ? parsed : fallback;
}

/** Build a ServiceConfig from environment variables with defaults. */
export function loadServiceConfig(
  env: NodeJS.ProcessEnv = process.env,
): ServiceConfig {
  const d = DEFAULT_SERVICE_CONFIG;
  return {
    maxRetries: readInt(env.LOCSHARE_MAX_RETRIES, d.maxRetries, 1),
    cacheTtlMs: readInt(env.LOCSHARE_CACHE_TTL_MS, d.cacheTtlMs, 0),
    requestTimeoutMs: readInt(env.LOCSHARE_REQUEST_TIMEOUT_MS, d.requestTimeoutMs, 1),
    backoffBaseMs: readInt(env.LOCSHARE_BACKOFF_BASE_MS, d.backoffBaseMs, 0),
    backoffMaxMs: readInt(env.LOCSHARE_BACKOFF_MAX_MS, d.backoffMaxMs, 0),
    backoffJitterMs: readInt(env.LOCSHARE_BACKOFF_JITTER_MS, d.backoffJitterMs, 0),
    rateLimitMs: readInt(env.RATE_LIMIT_MS, d.rateLimitMs, 0),
  };
}
