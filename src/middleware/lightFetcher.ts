/**
 * lightFetcher.ts - got-scraping transport for the location-sharing endpoint.
 *
 * got-scraping sends a Chrome-like TLS handshake and a matching header set,
 * which the Maps endpoint expects from a cookie-authenticated browser
 * session.  got's own retry is switched off (the RetryController owns
 * retries) and HTTP errors come back as responses rather than exceptions.
 *
 * got-scraping v4 is ESM-only, so it is loaded with a dynamic `import()`
 * on first use.
 */

import Bottleneck from 'bottleneck';
import { Logger } from '../core/logger';
import { TransportError } from '../core/errors';
import type { Transport, TransportRequest, TransportResponse } from '../core/types';

type GotScrapingModule = typeof import('got-scraping');

let gotScrapingModule: GotScrapingModule | null = null;

async function getGotScraping(): Promise<GotScrapingModule> {
  if (!gotScrapingModule) {
    gotScrapingModule = await import('got-scraping');
  }
  return gotScrapingModule;
}

function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

export interface LightFetcherOptions {
  /** Minimum spacing between requests sent by this transport. */
  rateLimitMs?: number;
  logger?: Logger;
}

/**
 * Default `Transport`: one got-scraping GET per call, paced by a Bottleneck
 * limiter private to this instance.
 */
export class LightFetcher implements Transport {
  private readonly limiter: Bottleneck;
  private readonly logger: Logger;

  constructor(options: LightFetcherOptions = {}) {
    this.limiter = new Bottleneck({
      maxConcurrent: 1,
      minTime: options.rateLimitMs ?? 0,
    });
    this.logger = options.logger ?? new Logger('LightFetcher');
  }

  async get(request: TransportRequest, signal?: AbortSignal): Promise<TransportResponse> {
    return this.limiter.schedule(() => this.send(request, signal));
  }

  /** Stop the limiter; pending requests are dropped. */
  async close(): Promise<void> {
    await this.limiter.stop({ dropWaitingJobs: true });
  }

  private async send(
    request: TransportRequest,
    signal?: AbortSignal,
  ): Promise<TransportResponse> {
    // The caller may have given up while this job sat in the queue.
    signal?.throwIfAborted();

    const { gotScraping } = await getGotScraping();
    const host = new URL(request.url).host;
    this.logger.debug(`GET ${host} (timeout ${request.timeoutMs} ms)`);

    const headers: Record<string, string> = {};
    if (request.cookieHeader) {
      headers['cookie'] = request.cookieHeader;
    }

    try {
      const response = await gotScraping({
        url: request.url,
        method: 'GET',
        headers,
        signal,
        timeout: { request: request.timeoutMs },
        retry: { limit: 0 },
        throwHttpErrors: false,
        headerGeneratorOptions: {
          browsers: [{ name: 'chrome', minVersion: 120 }],
          devices: ['desktop'],
          operatingSystems: ['macos', 'windows'],
        },
      });

      const statusCode = response.statusCode;
      this.logger.debug(`HTTP ${statusCode} from ${host}`);
      return {
        statusCode,
        body: typeof response.body === 'string' ? response.body : String(response.body),
      };
    } catch (err) {
      if (signal?.aborted) throw err;
      const message = err instanceof Error ? err.message : String(err);
      throw new TransportError(`Request to ${host} failed: ${message}`, {
        code: errorCode(err),
        cause: err,
      });
    }
  }
}
