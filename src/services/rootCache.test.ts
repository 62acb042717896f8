import { DateTime } from 'luxon';
import { describe, expect, it, vi } from 'vitest';
import { Logger } from '../core/logger';
import type { RawRoot } from '../core/types';
import { RootCache } from './rootCache';

const silent = new Logger('Test', 'silent');
const start = DateTime.fromISO('2026-01-01T12:00:00.000Z', { zone: 'utc' });

function manualClock(): { now: () => DateTime; advance: (ms: number) => void } {
  let current = start;
  return {
    now: () => current,
    advance: (ms) => {
      current = current.plus({ milliseconds: ms });
    },
  };
}

describe('RootCache', () => {
  it('serves the cached root within the TTL', async () => {
    const clock = manualClock();
    const cache = new RootCache({ ttlMs: 30_000, clock: clock.now, logger: silent });
    const fetcher = vi.fn(async (): Promise<RawRoot> => [[], 'first']);

    await cache.getOrFetch(fetcher);
    clock.advance(29_999);
    const second = await cache.getOrFetch(fetcher);

    expect(fetcher).toHaveBeenCalledTimes(1);
    expect(second).toEqual([[], 'first']);
    expect(cache.fetchedAt?.toISO()).toBe('2026-01-01T12:00:00.000Z');
  });

  it('refetches once the TTL has elapsed', async () => {
    const clock = manualClock();
    const cache = new RootCache({ ttlMs: 30_000, clock: clock.now, logger: silent });
    const fetcher = vi.fn(async (): Promise<RawRoot> => ['new']).mockResolvedValueOnce(['old']);

    await cache.getOrFetch(fetcher);
    clock.advance(30_000);

    expect(await cache.getOrFetch(fetcher)).toEqual(['new']);
    expect(fetcher).toHaveBeenCalledTimes(2);
    expect(cache.fetchedAt?.toISO()).toBe('2026-01-01T12:00:30.000Z');
  });

  it('fetches on every call when disabled', async () => {
    const cache = new RootCache({ ttlMs: 30_000, disabled: true, logger: silent });
    const fetcher = vi.fn(async (): Promise<RawRoot> => []);

    await cache.getOrFetch(fetcher);
    await cache.getOrFetch(fetcher);

    expect(fetcher).toHaveBeenCalledTimes(2);
    expect(cache.peek()).toBeNull();
  });

  it('keeps the previous slot when a fetch fails', async () => {
    const clock = manualClock();
    const cache = new RootCache({ ttlMs: 1_000, clock: clock.now, logger: silent });

    await cache.getOrFetch(async () => ['kept']);
    clock.advance(5_000);
    await expect(
      cache.getOrFetch(async () => {
        throw new Error('boom');
      }),
    ).rejects.toThrow('boom');

    expect(cache.fetchedAt?.toISO()).toBe('2026-01-01T12:00:00.000Z');
  });

  it('misses after clear()', async () => {
    const cache = new RootCache({ ttlMs: 30_000, logger: silent });
    const fetcher = vi.fn(async (): Promise<RawRoot> => []);

    await cache.getOrFetch(fetcher);
    cache.clear();
    await cache.getOrFetch(fetcher);

    expect(fetcher).toHaveBeenCalledTimes(2);
  });
});
