jest.mock("../../utils/logger", () => {
    const scoped = {
        debug: jest.fn(),
        info: jest.fn(),
        warn: jest.fn(),
        error: jest.fn(),
    };
    return {
        logger: { ...scoped, child: jest.fn(() => scoped) },
    };
});

import { MemoryCacheStore } from "../memoryStore";
import { StreamCache, cacheKey, timestampKey } from "../streamCache";
import type { CacheStore, CacheStoreStats } from "../types";
import { CacheUnavailableError } from "../../utils/errors";

const METADATA = {
    title: "Song",
    artist: "Artist",
    duration: 200,
    thumbnail: "https://img.example/t.jpg",
};

class FailingStore implements CacheStore {
    readonly backend = "redis" as const;
    private fail(): never {
        throw new Error("connect ECONNREFUSED 127.0.0.1:6379");
    }
    async get(): Promise<string | null> {
        return this.fail();
    }
    async set(): Promise<void> {
        this.fail();
    }
    async exists(): Promise<boolean> {
        return this.fail();
    }
    async ttl(): Promise<number> {
        return this.fail();
    }
    async delete(): Promise<number> {
        return this.fail();
    }
    async stats(): Promise<CacheStoreStats> {
        return this.fail();
    }
    async close(): Promise<void> {}
}

describe("StreamCache", () => {
    let now: number;
    let store: MemoryCacheStore;
    let cache: StreamCache;

    beforeEach(() => {
        now = 1_700_000_000_000;
        store = new MemoryCacheStore({ now: () => now });
        cache = new StreamCache(store, {
            metadataTtlSeconds: 86_400,
            streamUrlTtlSeconds: 7_200,
            now: () => now,
        });
    });

    it("writes values under namespaced keys with a timestamp entry", async () => {
        await cache.setMetadata("dQw4w9WgXcQ", METADATA);
        await cache.setStreamUrl("dQw4w9WgXcQ", "https://x/audio.m4a");

        expect(await store.get("metadata:dQw4w9WgXcQ")).toBe(JSON.stringify(METADATA));
        expect(await store.get("stream_url:dQw4w9WgXcQ")).toBe("https://x/audio.m4a");
        expect(await store.get("stream_url:dQw4w9WgXcQ:timestamp")).toBe("1700000000");
        expect(await store.ttl("metadata:dQw4w9WgXcQ:timestamp")).toBe(86_400);
        expect(await store.ttl("stream_url:dQw4w9WgXcQ")).toBe(7_200);
    });

    it("expires stream URLs independently of metadata", async () => {
        await cache.setMetadata("vid", METADATA);
        await cache.setStreamUrl("vid", "https://x/audio.m4a");

        now += 7_200 * 1000;

        expect(await cache.getStreamUrl("vid")).toEqual({ ok: true, value: null });
        expect(await cache.getMetadata("vid")).toEqual({ ok: true, value: METADATA });

        now += (86_400 - 7_200) * 1000;
        expect(await cache.getMetadata("vid")).toEqual({ ok: true, value: null });
    });

    it("reports metadata that was never written as a miss", async () => {
        expect(await cache.getMetadata("never-written")).toEqual({ ok: true, value: null });
    });

    it("treats a value whose timestamp went missing as a miss", async () => {
        await cache.setStreamUrl("vid", "https://x/audio.m4a");
        await store.delete(timestampKey(cacheKey("stream_url", "vid")));

        expect(await cache.getStreamUrl("vid")).toEqual({ ok: true, value: null });
        expect(await cache.isCached("vid")).toBe(false);
    });

    it("treats a value older than its TTL as a miss even if the store still has it", async () => {
        await store.set("stream_url:vid", "https://x/old.m4a", 0);
        await store.set("stream_url:vid:timestamp", String(now / 1000 - 8_000), 0);

        expect(await cache.getStreamUrl("vid")).toEqual({ ok: true, value: null });
    });

    it("discards malformed metadata", async () => {
        await store.set("metadata:vid", "{not json", 60);
        await store.set("metadata:vid:timestamp", String(now / 1000), 60);

        expect(await cache.getMetadata("vid")).toEqual({ ok: true, value: null });
    });

    it("reports freshness and remaining TTL for stream URLs", async () => {
        expect(await cache.isCached("vid")).toBe(false);
        expect(await cache.getRemainingTtl("vid")).toBe(0);

        await cache.setStreamUrl("vid", "https://x/audio.m4a");
        now += 1_000 * 1000;

        expect(await cache.isCached("vid")).toBe(true);
        expect(await cache.getRemainingTtl("vid")).toBe(6_200);
    });

    it("invalidates both namespaces", async () => {
        await cache.setMetadata("vid", METADATA);
        await cache.setStreamUrl("vid", "https://x/audio.m4a");

        expect(await cache.invalidate("vid")).toEqual({ ok: true, value: 4 });
        expect(await cache.getMetadata("vid")).toEqual({ ok: true, value: null });
        expect(await cache.isCached("vid")).toBe(false);
    });

    it("reads as a miss and writes as a no-op when disabled", async () => {
        const disabled = new StreamCache(store, {
            enabled: false,
            metadataTtlSeconds: 86_400,
            streamUrlTtlSeconds: 7_200,
            now: () => now,
        });

        await disabled.setStreamUrl("vid", "https://x/audio.m4a");

        expect(await store.exists("stream_url:vid")).toBe(false);
        expect(await disabled.getStreamUrl("vid")).toEqual({ ok: true, value: null });
        expect(await disabled.stats()).toMatchObject({ enabled: false, backend: "memory" });
    });

    it("returns failures as results instead of throwing when the store is down", async () => {
        const down = new StreamCache(new FailingStore(), {
            metadataTtlSeconds: 86_400,
            streamUrlTtlSeconds: 7_200,
        });

        const read = await down.getMetadata("vid");
        expect(read.ok).toBe(false);
        if (!read.ok) {
            expect(read.error).toBeInstanceOf(CacheUnavailableError);
            expect(read.error.message).toBe("Cache get failed for metadata:vid");
        }

        await expect(down.setStreamUrl("vid", "https://x")).resolves.toMatchObject({ ok: false });
        await expect(down.isCached("vid")).resolves.toBe(false);
        await expect(down.getRemainingTtl("vid")).resolves.toBe(0);
        await expect(down.stats()).resolves.toEqual({
            backend: "redis",
            keys: 0,
            enabled: true,
            metadataTtlSeconds: 86_400,
            streamUrlTtlSeconds: 7_200,
        });
    });
});
