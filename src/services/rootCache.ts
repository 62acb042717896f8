/**
 * rootCache.ts - Single-slot cache for the last successfully parsed RawRoot.
 *
 * A hit needs all three: caching enabled, a populated slot, and
 * `now - fetchedAt < ttl`.  Misses run the supplied fetcher; only a
 * successful fetch replaces the slot.  Concurrent misses are not merged, so
 * each may fetch and the last one to finish wins.
 */

import { DateTime } from 'luxon';
import { Logger } from '../core/logger';
import type { RawRoot } from '../core/types';

interface CacheSlot {
  root: RawRoot;
  fetchedAt: DateTime;
}

export interface RootCacheOptions {
  ttlMs: number;
  disabled?: boolean;
  /** Current time in UTC. */
  clock?: () => DateTime;
  logger?: Logger;
}

export class RootCache {
  private slot: CacheSlot | null = null;
  private readonly ttlMs: number;
  private readonly disabled: boolean;
  private readonly clock: () => DateTime;
  private readonly logger: Logger;

  constructor(options: RootCacheOptions) {
    this.ttlMs = options.ttlMs;
    this.disabled = options.disabled ?? false;
    this.clock = options.clock ?? (() => DateTime.utc());
    this.logger = options.logger ?? new Logger('RootCache');
  }

  /** When the slot was last filled, or null if it never was. */
  get fetchedAt(): DateTime | null {
    return this.slot?.fetchedAt ?? null;
  }

  /** Slot contents if they would count as a hit right now. */
  peek(): RawRoot | null {
    if (this.disabled || !this.slot) return null;
    const age = this.clock().diff(this.slot.fetchedAt).as('milliseconds');
    return age < this.ttlMs ? this.slot.root : null;
  }

  async getOrFetch(fetcher: () => Promise<RawRoot>): Promise<RawRoot> {
    const cached = this.peek();
    if (cached) {
      this.logger.debug('Using cached location data');
      return cached;
    }

    const root = await fetcher();
    this.slot = { root, fetchedAt: this.clock() };
    return root;
  }

  clear(): void {
    this.slot = null;
  }
}
