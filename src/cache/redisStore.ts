import type Redis from "ioredis";
import { CacheStore, CacheStoreStats } from "./types";

/**
 * CacheStore backed by a shared Redis instance. Errors from the client are
 * propagated; StreamCache decides how to degrade.
 */
export class RedisCacheStore implements CacheStore {
    readonly backend = "redis" as const;

    constructor(private readonly client: Redis) {}

    async get(key: string): Promise<string | null> {
        return this.client.get(key);
    }

    async set(key: string, value: string, ttlSeconds: number): Promise<void> {
        if (ttlSeconds > 0) {
            await this.client.set(key, value, "EX", ttlSeconds);
            return;
        }
        await this.client.set(key, value);
    }

    async exists(key: string): Promise<boolean> {
        return (await this.client.exists(key)) > 0;
    }

    async ttl(key: string): Promise<number> {
        return this.client.ttl(key);
    }

    async delete(...keys: string[]): Promise<number> {
        if (keys.length === 0) {
            return 0;
        }
        return this.client.del(...keys);
    }

    async stats(): Promise<CacheStoreStats> {
        return {
            backend: this.backend,
            keys: await this.client.dbsize(),
        };
    }

    async close(): Promise<void> {
        await this.client.quit();
    }
}
