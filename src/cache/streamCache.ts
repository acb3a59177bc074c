import { z } from "zod";
import { logger } from "../utils/logger";
import { CacheUnavailableError } from "../utils/errors";
import type { CacheResult, CacheStore, CacheStoreStats } from "./types";

export type CacheNamespace = "metadata" | "stream_url";

const cachedMetadataSchema = z.object({
    title: z.string().nullable(),
    artist: z.string().nullable(),
    duration: z.number().nullable(),
    thumbnail: z.string().nullable(),
});

export type CachedMetadata = z.infer<typeof cachedMetadataSchema>;

export interface StreamCacheOptions {
    enabled?: boolean;
    metadataTtlSeconds: number;
    streamUrlTtlSeconds: number;
    /** Milliseconds since epoch. */
    now?: () => number;
}

export interface StreamCacheStats extends CacheStoreStats {
    enabled: boolean;
    metadataTtlSeconds: number;
    streamUrlTtlSeconds: number;
}

export function cacheKey(namespace: CacheNamespace, videoId: string): string {
    return `${namespace}:${videoId}`;
}

export function timestampKey(key: string): string {
    return `${key}:timestamp`;
}

/**
 * Two-tier cache for resolved streams. Metadata and stream URLs live under
 * separate namespaces with independent TTLs, each with a parallel
 * `{key}:timestamp` entry holding the epoch write time in seconds.
 *
 * Every operation is best-effort: store failures come back as
 * `{ ok: false }` and are logged, never thrown.
 */
export class StreamCache {
    private readonly enabled: boolean;
    private readonly ttls: Record<CacheNamespace, number>;
    private readonly now: () => number;
    private readonly log = logger.child("StreamCache");

    constructor(
        private readonly store: CacheStore,
        options: StreamCacheOptions
    ) {
        this.enabled = options.enabled ?? true;
        this.ttls = {
            metadata: options.metadataTtlSeconds,
            stream_url: options.streamUrlTtlSeconds,
        };
        this.now = options.now ?? Date.now;
    }

    get backend() {
        return this.store.backend;
    }

    ttlFor(namespace: CacheNamespace): number {
        return this.ttls[namespace];
    }

    async getMetadata(videoId: string): Promise<CacheResult<CachedMetadata>> {
        const raw = await this.read("metadata", videoId);
        if (!raw.ok) {
            return raw;
        }
        if (raw.value === null) {
            return { ok: true, value: null };
        }

        const parsed = parseJson(raw.value);
        const result = cachedMetadataSchema.safeParse(parsed);
        if (!result.success) {
            this.log.warn(`Discarding malformed metadata entry for ${videoId}`);
            return { ok: true, value: null };
        }
        return { ok: true, value: result.data };
    }

    async setMetadata(
        videoId: string,
        metadata: CachedMetadata
    ): Promise<CacheResult<true>> {
        return this.write("metadata", videoId, JSON.stringify(metadata));
    }

    async getStreamUrl(videoId: string): Promise<CacheResult<string>> {
        return this.read("stream_url", videoId);
    }

    async setStreamUrl(videoId: string, url: string): Promise<CacheResult<true>> {
        return this.write("stream_url", videoId, url);
    }

    /** True when a fresh stream URL is cached for the identifier. */
    async isCached(videoId: string): Promise<boolean> {
        if (!this.enabled) {
            return false;
        }
        const key = cacheKey("stream_url", videoId);
        const result = await this.attempt("exists", key, async () => {
            if (!(await this.store.exists(key))) {
                return false;
            }
            const age = await this.ageSeconds(key);
            return age !== null && age < this.ttls.stream_url;
        });
        return result.ok && result.value === true;
    }

    /** Seconds until the cached stream URL goes stale; 0 when nothing is cached. */
    async getRemainingTtl(videoId: string): Promise<number> {
        if (!this.enabled) {
            return 0;
        }
        const key = cacheKey("stream_url", videoId);
        const result = await this.attempt("ttl", key, async () => {
            const age = await this.ageSeconds(key);
            if (age !== null) {
                return Math.max(0, Math.floor(this.ttls.stream_url - age));
            }
            return Math.max(0, await this.store.ttl(key));
        });
        return result.ok && result.value !== null ? result.value : 0;
    }

    async invalidate(videoId: string): Promise<CacheResult<number>> {
        const keys = (["metadata", "stream_url"] as const).flatMap((namespace) => {
            const key = cacheKey(namespace, videoId);
            return [key, timestampKey(key)];
        });
        return this.attempt("delete", keys[0], () => this.store.delete(...keys));
    }

    async stats(): Promise<StreamCacheStats> {
        const base: StreamCacheStats = {
            backend: this.store.backend,
            keys: 0,
            enabled: this.enabled,
            metadataTtlSeconds: this.ttls.metadata,
            streamUrlTtlSeconds: this.ttls.stream_url,
        };
        const result = await this.attempt("stats", "*", () => this.store.stats());
        if (!result.ok || result.value === null) {
            return base;
        }
        return { ...base, ...result.value };
    }

    async close(): Promise<void> {
        await this.store.close();
    }

    private async read(
        namespace: CacheNamespace,
        videoId: string
    ): Promise<CacheResult<string>> {
        if (!this.enabled) {
            return { ok: true, value: null };
        }
        const key = cacheKey(namespace, videoId);
        return this.attempt("get", key, async () => {
            const value = await this.store.get(key);
            if (value === null) {
                return null;
            }
            // The store may still hold an entry the timestamp says is stale,
            // or one whose timestamp was lost. Both count as a miss.
            const age = await this.ageSeconds(key);
            if (age === null || age >= this.ttls[namespace]) {
                return null;
            }
            return value;
        });
    }

    private async write(
        namespace: CacheNamespace,
        videoId: string,
        value: string
    ): Promise<CacheResult<true>> {
        if (!this.enabled) {
            return { ok: true, value: null };
        }
        const key = cacheKey(namespace, videoId);
        const ttl = this.ttls[namespace];
        return this.attempt("set", key, async () => {
            await this.store.set(key, value, ttl);
            await this.store.set(timestampKey(key), String(this.now() / 1000), ttl);
            return true as const;
        });
    }

    private async ageSeconds(key: string): Promise<number | null> {
        const stamp = await this.store.get(timestampKey(key));
        if (stamp === null) {
            return null;
        }
        const writtenAt = Number(stamp);
        if (!Number.isFinite(writtenAt)) {
            return null;
        }
        return this.now() / 1000 - writtenAt;
    }

    private async attempt<T>(
        operation: string,
        key: string,
        run: () => Promise<T | null>
    ): Promise<CacheResult<T>> {
        try {
            return { ok: true, value: await run() };
        } catch (err) {
            const error = new CacheUnavailableError(operation, key, err);
            this.log.warn(error.message, { error: err });
            return { ok: false, error };
        }
    }
}

function parseJson(raw: string): unknown {
    try {
        return JSON.parse(raw);
    } catch {
        return undefined;
    }
}
