import {
    CacheStore,
    CacheStoreStats,
    TTL_ABSENT,
    TTL_NO_EXPIRY,
} from "./types";

interface MemoryEntry {
    value: string;
    expiresAt: number | null;
}

export interface MemoryCacheStoreOptions {
    maxSize?: number;
    now?: () => number;
}

/**
 * In-process store with per-entry expiry and least-recently-used eviction.
 * Expired entries are dropped when touched; there is no sweeper timer.
 */
export class MemoryCacheStore implements CacheStore {
    readonly backend = "memory" as const;
    private readonly entries = new Map<string, MemoryEntry>();
    private readonly maxSize: number;
    private readonly now: () => number;

    constructor(options: MemoryCacheStoreOptions = {}) {
        this.maxSize = Math.max(1, options.maxSize ?? 1000);
        this.now = options.now ?? Date.now;
    }

    private live(key: string): MemoryEntry | undefined {
        const entry = this.entries.get(key);
        if (!entry) {
            return undefined;
        }
        if (entry.expiresAt !== null && entry.expiresAt <= this.now()) {
            this.entries.delete(key);
            return undefined;
        }
        return entry;
    }

    async get(key: string): Promise<string | null> {
        const entry = this.live(key);
        if (!entry) {
            return null;
        }
        // Re-insert to mark as most recently used
        this.entries.delete(key);
        this.entries.set(key, entry);
        return entry.value;
    }

    async set(key: string, value: string, ttlSeconds: number): Promise<void> {
        this.entries.delete(key);
        this.entries.set(key, {
            value,
            expiresAt: ttlSeconds > 0 ? this.now() + ttlSeconds * 1000 : null,
        });

        while (this.entries.size > this.maxSize) {
            const oldest = this.entries.keys().next();
            if (oldest.done) {
                break;
            }
            this.entries.delete(oldest.value);
        }
    }

    async exists(key: string): Promise<boolean> {
        return this.live(key) !== undefined;
    }

    async ttl(key: string): Promise<number> {
        const entry = this.live(key);
        if (!entry) {
            return TTL_ABSENT;
        }
        if (entry.expiresAt === null) {
            return TTL_NO_EXPIRY;
        }
        return Math.ceil((entry.expiresAt - this.now()) / 1000);
    }

    async delete(...keys: string[]): Promise<number> {
        let removed = 0;
        for (const key of keys) {
            if (this.live(key) !== undefined) {
                removed += 1;
            }
            this.entries.delete(key);
        }
        return removed;
    }

    async stats(): Promise<CacheStoreStats> {
        return {
            backend: this.backend,
            keys: this.entries.size,
            maxSize: this.maxSize,
        };
    }

    async close(): Promise<void> {
        this.entries.clear();
    }
}
