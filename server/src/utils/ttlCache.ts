/**
 * @module ttlCache
 * Bounded in-memory cache with per-entry max age.
 *
 * - Entries older than `ttlMs` are dropped on read
 * - Inserting past `maxEntries` evicts the oldest insertion
 * - The clock is injectable for tests
 *
 * Usage:
 * - `const cache = new TtlCache<string, RemoteOrder[]>({ maxEntries: 16, ttlMs: 60_000 })`
 * - `cache.get(key)` returns undefined for missing or stale entries
 */

export interface TtlCacheOptions {
    maxEntries: number;
    ttlMs: number;
    now?: () => number;
}

interface CacheEntry<V> {
    value: V;
    cachedAt: number;
}

export class TtlCache<K, V> {
    private cache: Map<K, CacheEntry<V>>;
    private readonly maxEntries: number;
    private readonly ttlMs: number;
    private readonly now: () => number;

    constructor(options: TtlCacheOptions) {
        if (options.maxEntries < 1) {
            throw new RangeError('maxEntries must be >= 1');
        }
        this.cache = new Map();
        this.maxEntries = options.maxEntries;
        this.ttlMs = options.ttlMs;
        this.now = options.now ?? Date.now;
    }

    get(key: K): V | undefined {
        const entry = this.cache.get(key);
        if (!entry) return undefined;
        if (this.now() - entry.cachedAt >= this.ttlMs) {
            // Stale
            this.cache.delete(key);
            return undefined;
        }
        return entry.value;
    }

    set(key: K, value: V): void {
        // Re-inserting moves the key to the back of the eviction order
        this.cache.delete(key);
        this.cache.set(key, { value, cachedAt: this.now() });

        while (this.cache.size > this.maxEntries) {
            const oldest = this.cache.keys().next();
            if (oldest.done) break;
            this.cache.delete(oldest.value);
        }
    }

    delete(key: K): boolean {
        return this.cache.delete(key);
    }
}
