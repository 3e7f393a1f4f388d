export const DEFAULT_CACHE_TTL_MS = 24 * 60 * 60 * 1000;

export type CacheParams = Record<string, string | number | boolean | null>;

interface CacheEntry<T> {
  value: T;
  expiresAt: number;
}

export interface QueryCacheOptions {
  ttlMs?: number;
  now?: () => number;
}

export type CacheLookup = 'hit' | 'miss';

function canonicalParams(params: CacheParams | undefined): string {
  if (!params) {
    return '';
  }
  const entries = Object.entries(params).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  return JSON.stringify(entries);
}

/**
 * Results keyed by query text and parameters, each kept until its time to live
 * runs out or it is invalidated.
 */
export class QueryCache<T> {
  private readonly entries = new Map<string, CacheEntry<T>>();
  private readonly inflight = new Map<string, Promise<T>>();
  private readonly ttlMs: number;
  private readonly now: () => number;

  constructor(options: QueryCacheOptions = {}) {
    this.ttlMs = options.ttlMs ?? DEFAULT_CACHE_TTL_MS;
    this.now = options.now ?? Date.now;
    if (!Number.isFinite(this.ttlMs) || this.ttlMs <= 0) {
      throw new RangeError(`Cache TTL must be a positive number of milliseconds, received ${this.ttlMs}`);
    }
  }

  get size(): number {
    this.evictExpired();
    return this.entries.size;
  }

  get(query: string, params?: CacheParams): T | undefined {
    const key = this.key(query, params);
    const entry = this.entries.get(key);
    if (!entry) {
      return undefined;
    }
    if (entry.expiresAt <= this.now()) {
      this.entries.delete(key);
      return undefined;
    }
    return entry.value;
  }

  set(query: string, value: T, params?: CacheParams): void {
    this.entries.set(this.key(query, params), { value, expiresAt: this.now() + this.ttlMs });
  }

  /**
   * Returns the cached value or runs `load` once for all concurrent callers of
   * the same key. Rejected loads are not cached, and neither are loads that were
   * invalidated or cleared while in flight.
   */
  async getOrLoad(
    query: string,
    load: () => Promise<T>,
    params?: CacheParams,
    onLookup?: (lookup: CacheLookup) => void
  ): Promise<T> {
    const cached = this.get(query, params);
    if (cached !== undefined) {
      onLookup?.('hit');
      return cached;
    }
    onLookup?.('miss');

    const key = this.key(query, params);
    const pending = this.inflight.get(key);
    if (pending) {
      return pending;
    }

    const loading: Promise<T> = load()
      .then((value) => {
        if (this.inflight.get(key) === loading) {
          this.entries.set(key, { value, expiresAt: this.now() + this.ttlMs });
        }
        return value;
      })
      .finally(() => {
        if (this.inflight.get(key) === loading) {
          this.inflight.delete(key);
        }
      });
    this.inflight.set(key, loading);
    return loading;
  }

  /** Drops the entry for `query`; without `params`, every parameter set of that query. */
  invalidate(query: string, params?: CacheParams): number {
    if (params) {
      const key = this.key(query, params);
      this.inflight.delete(key);
      return this.entries.delete(key) ? 1 : 0;
    }
    const prefix = `${query}\u0000`;
    for (const key of [...this.inflight.keys()]) {
      if (key.startsWith(prefix)) {
        this.inflight.delete(key);
      }
    }
    let removed = 0;
    for (const key of [...this.entries.keys()]) {
      if (key.startsWith(prefix)) {
        this.entries.delete(key);
        removed += 1;
      }
    }
    return removed;
  }

  clear(): void {
    this.entries.clear();
    this.inflight.clear();
  }

  private key(query: string, params: CacheParams | undefined): string {
    return `${query}\u0000${canonicalParams(params)}`;
  }

  private evictExpired(): void {
    const now = this.now();
    for (const [key, entry] of this.entries) {
      if (entry.expiresAt <= now) {
        this.entries.delete(key);
      }
    }
  }
}
