/**
 * retryController.ts - Attempt loop around a Transport.
 *
 * One logical fetch makes up to `maxRetries` physical attempts.  An attempt
 * is retried when it returns a transient status, when the transport throws
 * a TransportError, or when it outlives `requestTimeoutMs`.  Everything else
 * ends the loop:
 *
 *   2xx                      → body returned
 *   other status / exhausted → MalformedDataError (body cut to 500 chars)
 *   caller's signal aborts   → CancelledError, even with attempts left
 *
 * Between attempts n and n+1 the loop waits
 *   min(backoffMaxMs, backoffBaseMs × 2^(n-1) + random(0, backoffJitterMs)).
 */

import { setTimeout as delay } from 'timers/promises';
import { CancelledError, MalformedDataError, TransportError, truncateBody } from '../core/errors';
import { Logger } from '../core/logger';
import type { Transport, TransportRequest, TransportResponse } from '../core/types';

/** Statuses worth another attempt: 408, 500, 502, 503, 504. */
export const TRANSIENT_STATUSES: ReadonlySet<number> = new Set([408, 500, 502, 503, 504]);

export interface BackoffOptions {
  backoffBaseMs: number;
  backoffMaxMs: number;
  backoffJitterMs: number;
}

export interface RetryControllerOptions extends BackoffOptions {
  maxRetries: number;
  requestTimeoutMs: number;
  logger?: Logger;
  /** Uniform [0, 1) source for jitter. */
  random?: () => number;
}

export function isTransientStatus(statusCode: number): boolean {
  return TRANSIENT_STATUSES.has(statusCode);
}

/** Wait before the attempt after `attempt` (1-indexed). */
export function computeBackoffDelay(
  attempt: number,
  options: BackoffOptions,
  random: () => number = Math.random,
): number {
  const exponential = options.backoffBaseMs * Math.pow(2, attempt - 1);
  const jitter = Math.floor(random() * options.backoffJitterMs);
  return Math.min(options.backoffMaxMs, exponential + jitter);
}

function isSuccess(statusCode: number): boolean {
  return statusCode >= 200 && statusCode < 300;
}

/** Thrown inside an attempt whose own timer fired. */
class AttemptTimeout extends Error {}

export class RetryController {
  private readonly transport: Transport;
  private readonly maxRetries: number;
  private readonly requestTimeoutMs: number;
  private readonly backoff: BackoffOptions;
  private readonly random: () => number;
  private readonly logger: Logger;

  constructor(transport: Transport, options: RetryControllerOptions) {
    this.transport = transport;
    this.maxRetries = Math.max(1, Math.floor(options.maxRetries));
    this.requestTimeoutMs = options.requestTimeoutMs;
    this.backoff = {
      backoffBaseMs: options.backoffBaseMs,
      backoffMaxMs: options.backoffMaxMs,
      backoffJitterMs: options.backoffJitterMs,
    };
    this.random = options.random ?? Math.random;
    this.logger = options.logger ?? new Logger('RetryController');
  }

  get attemptLimit(): number {
    return this.maxRetries;
  }

  /**
   * Run the attempt loop and return the body of the first 2xx response.
   *
   * @throws CancelledError when `signal` aborts before or during any attempt or wait.
   * @throws MalformedDataError for non-transient statuses and exhausted attempts.
   */
  async execute(
    request: Omit<TransportRequest, 'timeoutMs'>,
    signal?: AbortSignal,
  ): Promise<string> {
    for (let attempt = 1; ; attempt++) {
      this.throwIfCancelled(signal);
      this.logger.debug(`Fetching location data, attempt ${attempt}/${this.maxRetries}`);

      let response: TransportResponse;
      try {
        response = await this.attempt({ ...request, timeoutMs: this.requestTimeoutMs }, signal);
      } catch (err) {
        if (signal?.aborted) {
          throw new CancelledError(undefined, { cause: err });
        }
        if (!(err instanceof TransportError) && !(err instanceof AttemptTimeout)) {
          throw err;
        }
        if (attempt >= this.maxRetries) {
          this.logger.error(`Giving up after ${attempt} attempt(s): ${err.message}`);
          throw new MalformedDataError(
            `Request failed after ${attempt} attempt(s): ${err.message}`,
            { cause: err },
          );
        }
        this.logger.warn(`${err.message} on attempt ${attempt}, will retry`);
        await this.wait(attempt, signal);
        continue;
      }

      if (isSuccess(response.statusCode)) {
        return response.body;
      }

      if (isTransientStatus(response.statusCode) && attempt < this.maxRetries) {
        this.logger.warn(`Transient HTTP ${response.statusCode} on attempt ${attempt}, will retry`);
        await this.wait(attempt, signal);
        continue;
      }

      this.logger.error(
        `Non-success HTTP ${response.statusCode}: ${truncateBody(response.body)}`,
      );
      throw new MalformedDataError(`Server returned ${response.statusCode}`, {
        body: response.body,
        statusCode: response.statusCode,
      });
    }
  }

  // ── Internals ──────────────────────────────────────────

  private throwIfCancelled(signal?: AbortSignal): void {
    if (signal?.aborted) {
      throw new CancelledError(undefined, { cause: signal.reason });
    }
  }

  /**
   * One transport call bounded by the caller's signal and the attempt timer.
   * The race keeps a transport that ignores its signal from holding the loop.
   */
  private async attempt(
    request: TransportRequest,
    signal?: AbortSignal,
  ): Promise<TransportResponse> {
    const controller = new AbortController();
    let settle: ((reason: Error) => void) | undefined;
    const stopped = new Promise<never>((_, reject) => {
      settle = reject;
    });

    const onCallerAbort = (): void => {
      const reason = new CancelledError();
      controller.abort(reason);
      settle?.(reason);
    };
    signal?.addEventListener('abort', onCallerAbort, { once: true });

    const timer = setTimeout(() => {
      const reason = new AttemptTimeout(`Attempt timed out after ${request.timeoutMs} ms`);
      controller.abort(reason);
      settle?.(reason);
    }, request.timeoutMs);

    try {
      return await Promise.race([this.transport.get(request, controller.signal), stopped]);
    } catch (err) {
      // An aborted attempt is classified by its signal's reason, not by what the transport threw.
      const reason: unknown = controller.signal.aborted ? controller.signal.reason : undefined;
      throw reason instanceof Error ? reason : err;
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onCallerAbort);
    }
  }

  private async wait(attempt: number, signal?: AbortSignal): Promise<void> {
    this.throwIfCancelled(signal);
    const ms = computeBackoffDelay(attempt, this.backoff, this.random);
    this.logger.debug(`Backing off ${ms} ms before attempt ${attempt + 1}`);
    try {
      await delay(ms, undefined, { signal });
    } catch (err) {
      throw new CancelledError(undefined, { cause: err });
    }
  }
}
