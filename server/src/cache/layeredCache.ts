// Two-tier lookup: per-request client snapshot first, then the server TTL store.
import { logger } from '../utils/logger.js';
import { EMPTY_CLIENT_TIER, type ClientTier } from './clientContext.js';

export type CacheSource = 'client' | 'server-cache';

/** Milliseconds, or 'forever' for reference data that never changes within a process. 0 = always revalidate. */
export type Ttl = number | 'forever';

export interface CacheEntry {
  key: string;
  value: unknown;
  createdAt: number;
  ttl: Ttl;
}

export type LookupResult =
  | { hit: true; value: unknown; source: CacheSource }
  | { hit: false };

export interface CacheStats {
  entries: number;
  hits: Record<CacheSource, number>;
  misses: number;
  stores: number;
  expired: number;
  /** Callers that shared another caller's in-flight load. */
  joined: number;
  inflight: number;
}

export interface LayeredCacheOptions {
  now?: () => number;
  /** Interval of the background expiry sweep; 0 disables it. */
  sweepMs?: number;
}

export function cacheKey(kind: string, ticker: string, ...extras: Array<string | number>): string {
  return [kind, ticker.toUpperCase(), ...extras.map(String)].join(':');
}

export class LayeredCache {
  private entries = new Map<string, CacheEntry>();
  private inflight = new Map<string, Promise<unknown>>();
  private now: () => number;
  private timer: NodeJS.Timeout | null = null;
  private counters: CacheStats = { entries: 0, hits: { client: 0, 'server-cache': 0 }, misses: 0, stores: 0, expired: 0, joined: 0, inflight: 0 };

  constructor(opts: LayeredCacheOptions = {}) {
    this.now = opts.now ?? Date.now;
    const sweepMs = opts.sweepMs ?? 0;
    if (sweepMs > 0) {
      this.timer = setInterval(() => this.sweep(), sweepMs);
      this.timer.unref();
    }
  }

  lookup(key: string, client: ClientTier = EMPTY_CLIENT_TIER): LookupResult {
    const fromClient = client.resolve(key);
    if (fromClient !== undefined) {
      this.counters.hits.client++;
      return { hit: true, value: fromClient, source: 'client' };
    }
    const entry = this.entries.get(key);
    if (entry) {
      if (!this.isExpired(entry)) {
        this.counters.hits['server-cache']++;
        return { hit: true, value: entry.value, source: 'server-cache' };
      }
      this.entries.delete(key);
      this.counters.expired++;
    }
    this.counters.misses++;
    return { hit: false };
  }

  /**
   * Lookup, else run `load` once per key no matter how many callers miss at the
   * same time, and store its value. Failed loads are not cached.
   */
  async getOrLoad(
    key: string,
    ttl: Ttl,
    load: () => Promise<unknown>,
    client: ClientTier = EMPTY_CLIENT_TIER
  ): Promise<{ value: unknown; source: CacheSource | 'live' }> {
    const found = this.lookup(key, client);
    if (found.hit) return { value: found.value, source: found.source };
    let pending = this.inflight.get(key);
    if (!pending) {
      pending = load()
        .then((value) => {
          this.store(key, value, ttl);
          return value;
        })
        .finally(() => this.inflight.delete(key));
      this.inflight.set(key, pending);
    } else {
      this.counters.joined++;
    }
    return { value: await pending, source: 'live' };
  }

  store(key: string, value: unknown, ttl: Ttl): void {
    this.entries.set(key, { key, value, createdAt: this.now(), ttl });
    this.counters.stores++;
  }

  delete(key: string): boolean {
    return this.entries.delete(key);
  }

  /** Removes every expired entry; returns how many were dropped. */
  sweep(): number {
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (this.isExpired(entry)) {
        this.entries.delete(key);
        removed++;
      }
    }
    if (removed) {
      this.counters.expired += removed;
      logger.debug({ removed, remaining: this.entries.size }, 'cache_sweep');
    }
    return removed;
  }

  stats(): CacheStats {
    return { ...this.counters, hits: { ...this.counters.hits }, entries: this.entries.size, inflight: this.inflight.size };
  }

  dispose(): void {
    if (this.timer) clearInterval(this.timer);
    this.timer = null;
    this.entries.clear();
  }

  private isExpired(entry: CacheEntry): boolean {
    if (entry.ttl === 'forever') return false;
    return this.now() - entry.createdAt >= entry.ttl;
  }
}
