/**
 * middleware/index.ts - Barrel export for the request layer.
 */

// ── Transport ───────────────────────────────────────────────
export { LightFetcher } from './lightFetcher';
export type { LightFetcherOptions } from './lightFetcher';

// ── Retry / backoff ─────────────────────────────────────────
export {
  RetryController,
  TRANSIENT_STATUSES,
  computeBackoffDelay,
  isTransientStatus,
} from './retryController';
export type { BackoffOptions, RetryControllerOptions } from './retryController';

// ── Response parsing ────────────────────────────────────────
export { extractJsonPayload, parseResponseBody } from './responseParser';
