import { afterEach, describe, expect, it, vi } from 'vitest';
import { TransportError } from '../core/errors';
import { Logger } from '../core/logger';
import { LightFetcher } from './lightFetcher';

const { gotScraping } = vi.hoisted(() => ({ gotScraping: vi.fn() }));

vi.mock('got-scraping', () => ({ gotScraping }));

const ENDPOINT = 'https://www.google.com/maps/rpc/locationsharing/read?hl=en';

function fetcher(): LightFetcher {
  return new LightFetcher({ rateLimitMs: 0, logger: new Logger('Test', 'silent') });
}

describe('LightFetcher', () => {
  afterEach(() => {
    gotScraping.mockReset();
  });

  it('sends a GET with the cookie header and got retries disabled', async () => {
    gotScraping.mockResolvedValue({ statusCode: 200, body: ")]}'\n[]" });
    const transport = fetcher();

    const response = await transport.get({ url: ENDPOINT, cookieHeader: 'SID=a', timeoutMs: 1_000 });

    expect(response).toEqual({ statusCode: 200, body: ")]}'\n[]" });
    expect(gotScraping).toHaveBeenCalledTimes(1);
    expect(gotScraping.mock.calls[0][0]).toMatchObject({
      url: ENDPOINT,
      method: 'GET',
      headers: { cookie: 'SID=a' },
      timeout: { request: 1_000 },
      retry: { limit: 0 },
      throwHttpErrors: false,
    });
    await transport.close();
  });

  it('returns error statuses instead of throwing', async () => {
    gotScraping.mockResolvedValue({ statusCode: 503, body: 'busy' });

    await expect(fetcher().get({ url: ENDPOINT, timeoutMs: 1_000 })).resolves.toEqual({
      statusCode: 503,
      body: 'busy',
    });
  });

  it('wraps network failures in TransportError', async () => {
    const failure = Object.assign(new Error('connect ECONNREFUSED'), { code: 'ECONNREFUSED' });
    gotScraping.mockRejectedValue(failure);

    const err = await fetcher()
      .get({ url: ENDPOINT, timeoutMs: 1_000 })
      .catch((e: unknown) => e);

    expect(err).toBeInstanceOf(TransportError);
    expect(err).toMatchObject({
      code: 'ECONNREFUSED',
      message: 'Request to www.google.com failed: connect ECONNREFUSED',
    });
  });

  it('does not send when the signal is already aborted', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(fetcher().get({ url: ENDPOINT, timeoutMs: 1_000 }, controller.signal)).rejects.toBeDefined();
    expect(gotScraping).not.toHaveBeenCalled();
  });
});
