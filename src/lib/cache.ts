type CacheEntry<V> = {
  ts: number;
  ttlMs: number;
  value: V;
};

export type CacheStats = {
  size: number;
  hits: number;
  misses: number;
};

/**
 * In-process key/value store with per-entry TTL. Expired entries are dropped on read.
 * Shared by every fetcher; keys are expected to be fully qualified
 * (e.g. `indicator:RSI:ETHUSD:2h:28`), so concurrent writers of the same key
 * hold equivalent values and last writer wins.
 */
export class TtlCache<V> {
  private readonly entries = new Map<string, CacheEntry<V>>();
  private hits = 0;
  private misses = 0;

  constructor(
    private readonly defaultTtlMs: number,
    private readonly now: () => number = Date.now,
    private readonly maxEntries = 5_000
  ) {}

  get(key: string): V | undefined {
    const entry = this.entries.get(key);
    if (!entry) {
      this.misses += 1;
      return undefined;
    }
    if (this.now() - entry.ts >= entry.ttlMs) {
      this.entries.delete(key);
      this.misses += 1;
      return undefined;
    }
    this.hits += 1;
    return entry.value;
  }

  set(key: string, value: V, ttlMs: number = this.defaultTtlMs): void {
    this.entries.delete(key);
    this.entries.set(key, { ts: this.now(), ttlMs, value });
    if (this.entries.size > this.maxEntries) {
      // Map keeps insertion order, so the first key is the oldest write.
      const oldest = this.entries.keys().next();
      if (!oldest.done) this.entries.delete(oldest.value);
    }
  }

  delete(key: string): boolean {
    return this.entries.delete(key);
  }

  clear(): void {
    this.entries.clear();
    this.hits = 0;
    this.misses = 0;
  }

  stats(): CacheStats {
    return { size: this.entries.size, hits: this.hits, misses: this.misses };
  }
}
