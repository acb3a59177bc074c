import type { CacheUnavailableError } from "../utils/errors";

export type CacheBackendName = "memory" | "redis";

export interface CacheStoreStats {
    backend: CacheBackendName;
    keys: number;
    maxSize?: number;
}

/**
 * TTL-capable key/value store. `ttl` follows Redis semantics: seconds left,
 * -1 for a key without expiry, -2 for an absent key.
 */
export interface CacheStore {
    readonly backend: CacheBackendName;
    get(key: string): Promise<string | null>;
    set(key: string, value: string, ttlSeconds: number): Promise<void>;
    exists(key: string): Promise<boolean>;
    ttl(key: string): Promise<number>;
    delete(...keys: string[]): Promise<number>;
    stats(): Promise<CacheStoreStats>;
    close(): Promise<void>;
}

export type CacheResult<T> =
    | { ok: true; value: T | null }
    | { ok: false; error: CacheUnavailableError };

export const TTL_ABSENT = -2;
export const TTL_NO_EXPIRY = -1;
