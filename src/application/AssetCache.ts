/**
 * Asset Cache
 *
 * Bounded, reference-counted LRU cache with single-flight fetching.
 * Used for downloaded asset bytes and for transcription results.
 */

import crypto from 'crypto';

interface CacheEntry<T> {
    key: string;
    payload: T;
    size: number;
    lastAccessedAt: number;
    refCount: number;
}

interface PendingFetch<T> {
    promise: Promise<CacheEntry<T>>;
    /** Callers waiting on this fetch, including the one that started it */
    waiters: number;
}

/**
 * A caller's hold on a cached payload. The entry cannot be evicted
 * until every lease on it is released.
 */
export interface CacheLease<T> {
    readonly key: string;
    readonly payload: T;
    release(): void;
}

export interface AssetCacheOptions<T> {
    /** Upper bound on the sum of entry sizes */
    maxSize: number;
    /** Size of one payload; defaults to 1 (the bound is then an item count) */
    sizeOf?: (payload: T) => number;
    /** Name used in log lines */
    name?: string;
    now?: () => number;
}

export interface AssetCacheStats {
    entries: number;
    totalSize: number;
    inFlight: number;
    pinned: number;
}

/**
 * Stable content fingerprint of a source locator plus the parameters applied to it.
 */
export function cacheKey(source: string, params: Record<string, string | number | boolean> = {}): string {
    const canonical = Object.keys(params)
        .sort()
        .map((name) => `${name}=${String(params[name])}`)
        .join('&');
    return crypto.createHash('sha256').update(`${source}\n${canonical}`).digest('hex');
}

// All mutations of `entries`, `pending` and `totalSize` happen synchronously
// between awaits, so no two callers interleave inside an insert or eviction.
export class AssetCache<T> {
    // Map iteration order is the recency order: oldest access first.
    private readonly entries: Map<string, CacheEntry<T>> = new Map();
    private readonly pending: Map<string, PendingFetch<T>> = new Map();
    private readonly maxSize: number;
    private readonly sizeOf: (payload: T) => number;
    private readonly name: string;
    private readonly now: () => number;
    private totalSize = 0;

    constructor(options: AssetCacheOptions<T>) {
        if (!(options.maxSize > 0)) {
            throw new Error('AssetCache maxSize must be positive');
        }
        this.maxSize = options.maxSize;
        this.sizeOf = options.sizeOf ?? (() => 1);
        this.name = options.name ?? 'AssetCache';
        this.now = options.now ?? Date.now;
    }

    /**
     * Returns a lease on the cached payload for `key`, fetching it on a miss.
     * Concurrent misses on the same key share a single call to `fetchFn`.
     * A failed fetch stores nothing and rejects every waiting caller.
     */
    async getOrFetch(key: string, fetchFn: () => Promise<T>): Promise<CacheLease<T>> {
        const cached = this.entries.get(key);
        if (cached) {
            this.touch(cached);
            cached.refCount++;
            return this.lease(cached);
        }

        const inFlight = this.pending.get(key);
        if (inFlight) {
            inFlight.waiters++;
            const entry = await inFlight.promise;
            return this.lease(entry);
        }

        const pendingFetch: PendingFetch<T> = {
            waiters: 1,
            promise: Promise.resolve()
                .then(fetchFn)
                .then(
                    (payload) => {
                        this.pending.delete(key);
                        return this.insert(key, payload, pendingFetch.waiters);
                    },
                    (error: unknown) => {
                        this.pending.delete(key);
                        throw error;
                    }
                ),
        };
        this.pending.set(key, pendingFetch);

        const entry = await pendingFetch.promise;
        return this.lease(entry);
    }

    has(key: string): boolean {
        return this.entries.has(key);
    }

    stats(): AssetCacheStats {
        let pinned = 0;
        for (const entry of this.entries.values()) {
            if (entry.refCount > 0) pinned++;
        }
        return {
            entries: this.entries.size,
            totalSize: this.totalSize,
            inFlight: this.pending.size,
            pinned,
        };
    }

    /**
     * Keys from least to most recently used.
     */
    keys(): string[] {
        return Array.from(this.entries.keys());
    }

    private insert(key: string, payload: T, refCount: number): CacheEntry<T> {
        const entry: CacheEntry<T> = {
            key,
            payload,
            size: this.sizeOf(payload),
            lastAccessedAt: this.now(),
            refCount,
        };
        this.entries.set(key, entry);
        this.totalSize += entry.size;
        this.evictIfNeeded();
        return entry;
    }

    private touch(entry: CacheEntry<T>): void {
        entry.lastAccessedAt = this.now();
        this.entries.delete(entry.key);
        this.entries.set(entry.key, entry);
    }

    private lease(entry: CacheEntry<T>): CacheLease<T> {
        let released = false;
        return {
            key: entry.key,
            payload: entry.payload,
            release: () => {
                if (released) return;
                released = true;
                entry.refCount = Math.max(0, entry.refCount - 1);
                if (entry.refCount === 0) {
                    this.evictIfNeeded();
                }
            },
        };
    }

    /**
     * Evicts least-recently-used unreferenced entries, one at a time, until
     * the cache fits. When only referenced entries remain the cache stays over
     * budget until a release frees one.
     */
    private evictIfNeeded(): void {
        while (this.totalSize > this.maxSize) {
            const victim = this.findEvictable();
            if (!victim) {
                console.warn(`[${this.name}] Over budget (${this.totalSize}/${this.maxSize}) with every entry in use`);
                return;
            }
            this.entries.delete(victim.key);
            this.totalSize -= victim.size;
        }
    }

    private findEvictable(): CacheEntry<T> | undefined {
        for (const entry of this.entries.values()) {
            if (entry.refCount === 0) {
                return entry;
            }
        }
        return undefined;
    }
}
