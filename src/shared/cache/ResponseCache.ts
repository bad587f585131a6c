import * as crypto from 'crypto';

export interface ResponseCacheOptions {
    /** Maximum number of entries (default: 100) */
    capacity?: number;
    /** Entries older than this read as absent (default: no expiry) */
    ttlMs?: number;
    /** Clock, injectable for tests */
    now?: () => number;
}

interface CacheSlot<V> {
    value: V;
    storedAt: number;
}

/**
 * Bounded key→value store with insertion-order eviction.
 *
 * Reads do not refresh an entry's position: when full, the entry that was
 * inserted first is evicted. Every mutation is synchronous, so concurrent
 * async callers never observe more than `capacity` entries.
 */
export class ResponseCache<V> {
    readonly capacity: number;
    private readonly ttlMs?: number;
    private readonly now: () => number;
    // Map iteration order is insertion order
    private entries = new Map<string, CacheSlot<V>>();
    private pending = new Map<string, Promise<V>>();

    constructor(options: ResponseCacheOptions = {}) {
        this.capacity = Math.max(1, Math.floor(options.capacity ?? 100));
        this.ttlMs = options.ttlMs;
        this.now = options.now ?? Date.now;
    }

    get(key: string): V | undefined {
        const slot = this.entries.get(key);
        if (!slot) return undefined;
        if (this.isExpired(slot)) {
            this.entries.delete(key);
            return undefined;
        }
        return slot.value;
    }

    has(key: string): boolean {
        return this.get(key) !== undefined;
    }

    set(key: string, value: V): void {
        if (this.entries.has(key)) {
            // Overwrite keeps the original insertion slot
            this.entries.set(key, { value, storedAt: this.now() });
            return;
        }
        while (this.entries.size >= this.capacity) {
            const oldest = this.entries.keys().next();
            if (oldest.done) break;
            this.entries.delete(oldest.value);
        }
        this.entries.set(key, { value, storedAt: this.now() });
    }

    delete(key: string): boolean {
        this.pending.delete(key);
        return this.entries.delete(key);
    }

    clear(): void {
        this.entries.clear();
        this.pending.clear();
    }

    get size(): number {
        return this.entries.size;
    }

    keys(): string[] {
        return Array.from(this.entries.keys());
    }

    /**
     * Return the cached value, or run `producer` once and cache its result.
     * Concurrent callers for the same key share the same in-flight producer.
     * A rejected producer caches nothing.
     */
    async getOrCompute(key: string, producer: () => Promise<V>): Promise<V> {
        const cached = this.get(key);
        if (cached !== undefined) return cached;

        const inFlight = this.pending.get(key);
        if (inFlight) return inFlight;

        // A clear() or delete() while the producer runs unregisters the task;
        // its result then goes to its callers but not into the cache
        const task: Promise<V> = producer()
            .then(value => {
                if (this.pending.get(key) === task) this.set(key, value);
                return value;
            })
            .finally(() => {
                if (this.pending.get(key) === task) this.pending.delete(key);
            });
        this.pending.set(key, task);
        return task;
    }

    private isExpired(slot: CacheSlot<V>): boolean {
        return this.ttlMs !== undefined && this.now() - slot.storedAt > this.ttlMs;
    }
}

/** Content fingerprint used as a cache key */
export function hashContent(content: string): string {
    return crypto.createHash('md5').update(content).digest('hex');
}
