import { config } from "../config";
import { createIORedisClient } from "../utils/ioredis";
import { MemoryCacheStore } from "./memoryStore";
import { RedisCacheStore } from "./redisStore";
import { StreamCache } from "./streamCache";
import type { CacheStore } from "./types";

export function createCacheStore(): CacheStore {
    if (config.cache.backend === "redis") {
        return new RedisCacheStore(createIORedisClient("stream-cache"));
    }
    return new MemoryCacheStore({ maxSize: config.cache.maxSize });
}

export const streamCache = new StreamCache(createCacheStore(), {
    enabled: config.cache.enabled,
    metadataTtlSeconds: config.cache.metadataTtlSeconds,
    streamUrlTtlSeconds: config.cache.streamUrlTtlSeconds,
});

export { StreamCache } from "./streamCache";
export type { CachedMetadata } from "./streamCache";
export type { CacheStore, CacheResult } from "./types";
