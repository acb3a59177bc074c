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

import { StreamResolver, selectAudioUrl } from "../streamResolver";
import { CircuitBreaker, CircuitState } from "../circuitBreaker";
import { StreamCache } from "../../cache/streamCache";
import { MemoryCacheStore } from "../../cache/memoryStore";
import type { CacheStore, CacheStoreStats } from "../../cache/types";
import {
    CircuitOpenError,
    ErrorCode,
    ExtractionFailedError,
    RateLimitedError,
} from "../../utils/errors";
import { audioFormat, createFakeExtractor, makeInfo } from "./helpers/extractorFixtures";

const VIDEO_ID = "dQw4w9WgXcQ";

class DownStore implements CacheStore {
    readonly backend = "redis" as const;
    async get(): Promise<string | null> {
        throw new Error("ECONNREFUSED");
    }
    async set(): Promise<void> {
        throw new Error("ECONNREFUSED");
    }
    async exists(): Promise<boolean> {
        throw new Error("ECONNREFUSED");
    }
    async ttl(): Promise<number> {
        throw new Error("ECONNREFUSED");
    }
    async delete(): Promise<number> {
        throw new Error("ECONNREFUSED");
    }
    async stats(): Promise<CacheStoreStats> {
        throw new Error("ECONNREFUSED");
    }
    async close(): Promise<void> {}
}

describe("StreamResolver", () => {
    let now: number;
    let store: MemoryCacheStore;
    let cache: StreamCache;
    let breaker: CircuitBreaker;

    const scenarioInfo = makeInfo({
        title: "T",
        artist: "A",
        duration: 180,
        adaptiveFormats: [audioFormat("https://x/audio.m4a")],
    });

    beforeEach(() => {
        now = 1_700_000_000_000;
        store = new MemoryCacheStore({ now: () => now });
        cache = new StreamCache(store, {
            metadataTtlSeconds: 86_400,
            streamUrlTtlSeconds: 7_200,
            now: () => now,
        });
        breaker = new CircuitBreaker("test", {
            failureThreshold: 2,
            timeoutSeconds: 600,
            halfOpenTimeoutSeconds: 60,
            now: () => now,
        });
    });

    it("extracts on a cold cache and serves the repeat request from cache", async () => {
        const extractor = createFakeExtractor(async () => scenarioInfo);
        const resolver = new StreamResolver({ cache, breaker, extractor });

        const first = await resolver.resolve(VIDEO_ID);
        expect(first).toMatchObject({
            url: "https://x/audio.m4a",
            title: "T",
            artist: "A",
            duration: 180,
            fromCache: false,
        });
        expect(extractor.extract).toHaveBeenCalledWith(
            "https://www.youtube.com/watch?v=dQw4w9WgXcQ"
        );

        const second = await resolver.resolve(VIDEO_ID);
        expect(second).toEqual({ ...first, fromCache: true });
        expect(extractor.extract).toHaveBeenCalledTimes(1);
    });

    it("re-extracts once the stream URL expires while metadata is still fresh", async () => {
        const extractor = createFakeExtractor(async () => scenarioInfo);
        const resolver = new StreamResolver({ cache, breaker, extractor });

        await resolver.resolve(VIDEO_ID);
        now += 7_200 * 1000;

        expect((await cache.getMetadata(VIDEO_ID)).ok).toBe(true);
        const refreshed = await resolver.resolve(VIDEO_ID);

        expect(refreshed.fromCache).toBe(false);
        expect(extractor.extract).toHaveBeenCalledTimes(2);
    });

    it("returns a cached URL alone when metadata is missing", async () => {
        await cache.setStreamUrl(VIDEO_ID, "https://x/cached.m4a");
        const extractor = createFakeExtractor(async () => scenarioInfo);
        const resolver = new StreamResolver({ cache, breaker, extractor });

        await expect(resolver.resolve(VIDEO_ID)).resolves.toEqual({
            videoId: VIDEO_ID,
            url: "https://x/cached.m4a",
            title: null,
            artist: null,
            duration: null,
            thumbnail: null,
            fromCache: true,
        });
        expect(extractor.extract).not.toHaveBeenCalled();
    });

    it("skips the cache when asked to bypass it", async () => {
        const extractor = createFakeExtractor(async () => scenarioInfo);
        const resolver = new StreamResolver({ cache, breaker, extractor });

        await resolver.resolve(VIDEO_ID);
        const bypassed = await resolver.resolve(VIDEO_ID, { bypassCache: true });

        expect(bypassed.fromCache).toBe(false);
        expect(extractor.extract).toHaveBeenCalledTimes(2);
    });

    it("prefers an audio-only adaptive format over a muxed primary format", async () => {
        const extractor = createFakeExtractor(async () =>
            makeInfo({
                formats: [
                    { url: "https://x/video.mp4", acodec: "mp4a.40.2", vcodec: "avc1", abr: null, ext: "mp4" },
                ],
                adaptiveFormats: [audioFormat("https://x/adaptive-audio.webm", { acodec: "opus" })],
                url: "https://x/direct",
            })
        );
        const resolver = new StreamResolver({ cache, breaker, extractor });

        const stream = await resolver.resolve(VIDEO_ID);

        expect(stream.url).toBe("https://x/adaptive-audio.webm");
    });

    it("falls back to uploader and derived thumbnail when fields are missing", async () => {
        const extractor = createFakeExtractor(async () =>
            makeInfo({ title: "T", uploader: "Uploader", url: "https://x/direct" })
        );
        const resolver = new StreamResolver({ cache, breaker, extractor });

        await expect(resolver.resolve(VIDEO_ID)).resolves.toEqual({
            videoId: VIDEO_ID,
            url: "https://x/direct",
            title: "T",
            artist: "Uploader",
            duration: null,
            thumbnail: "https://img.youtube.com/vi/dQw4w9WgXcQ/mqdefault.jpg",
            fromCache: false,
        });
    });

    it("prefers the extractor's chosen thumbnail over its unsized candidate list", async () => {
        const extractor = createFakeExtractor(async () =>
            makeInfo({
                url: "https://x/direct",
                thumbnail: "https://i.ytimg.com/vi/dQw4w9WgXcQ/maxresdefault.jpg",
                thumbnails: [
                    { url: "https://i.ytimg.com/vi/dQw4w9WgXcQ/default.jpg", width: 120, height: 90 },
                    { url: "https://i.ytimg.com/vi/dQw4w9WgXcQ/maxresdefault.jpg" },
                ],
            })
        );
        const resolver = new StreamResolver({ cache, breaker, extractor });

        const resolved = await resolver.resolve(VIDEO_ID);

        expect(resolved.thumbnail).toBe("https://i.ytimg.com/vi/dQw4w9WgXcQ/maxresdefault.jpg");
    });

    it("fails without tripping the breaker when no audio stream exists", async () => {
        const extractor = createFakeExtractor(async () =>
            makeInfo({ formats: [audioFormat("https://x/v.mp4", { vcodec: "vp9" })] })
        );
        const resolver = new StreamResolver({ cache, breaker, extractor });

        const error = await resolver.resolve(VIDEO_ID).catch((err: unknown) => err);

        expect(error).toBeInstanceOf(ExtractionFailedError);
        expect(error).toMatchObject({ code: ErrorCode.EXTRACTION_FAILED, statusCode: 502 });
        expect(breaker.getStatus().failureCount).toBe(0);
    });

    it("opens the circuit on a rate-limit failure", async () => {
        const extractor = createFakeExtractor(async () => {
            throw new Error("429 rate limited");
        });
        const resolver = new StreamResolver({ cache, breaker, extractor });

        const error = await resolver.resolve(VIDEO_ID).catch((err: unknown) => err);

        expect(error).toBeInstanceOf(RateLimitedError);
        expect(error).toMatchObject({ statusCode: 429, retryAfterSeconds: 600 });
        expect(breaker.getStatus().state).toBe(CircuitState.OPEN);
    });

    it("rejects immediately while the circuit is open", async () => {
        const extractor = createFakeExtractor(async () => scenarioInfo);
        const resolver = new StreamResolver({ cache, breaker, extractor });
        breaker.recordFailure("Too Many Requests");
        now += 100 * 1000;

        const error = await resolver.resolve(VIDEO_ID).catch((err: unknown) => err);

        expect(error).toBeInstanceOf(CircuitOpenError);
        expect(error).toMatchObject({ statusCode: 503, retryAfterSeconds: 500 });
        expect(extractor.extract).not.toHaveBeenCalled();
    });

    it("does not count ordinary extractor errors against the breaker", async () => {
        const extractor = createFakeExtractor(async () => {
            throw new Error("ERROR: [youtube] dQw4w9WgXcQ: Unable to extract player response");
        });
        const resolver = new StreamResolver({ cache, breaker, extractor });

        await expect(resolver.resolve(VIDEO_ID)).rejects.toMatchObject({
            code: ErrorCode.EXTRACTION_FAILED,
            reason: "extractor_error",
        });
        await expect(resolver.resolve(VIDEO_ID)).rejects.toBeInstanceOf(ExtractionFailedError);
        expect(breaker.getStatus()).toMatchObject({ state: CircuitState.CLOSED, failureCount: 0 });
    });

    it("maps unavailable videos to a not-found failure", async () => {
        const extractor = createFakeExtractor(async () => {
            throw new Error("ERROR: [youtube] dQw4w9WgXcQ: Private video. Sign in if you've been granted access");
        });
        const resolver = new StreamResolver({ cache, breaker, extractor });

        await expect(resolver.resolve(VIDEO_ID)).rejects.toMatchObject({
            code: ErrorCode.VIDEO_UNAVAILABLE,
            statusCode: 404,
        });
    });

    it("closes a half-open circuit after a successful trial", async () => {
        const extractor = createFakeExtractor(async () => scenarioInfo);
        const resolver = new StreamResolver({ cache, breaker, extractor });
        breaker.recordFailure("rate limit");
        now += 600 * 1000;

        await resolver.resolve(VIDEO_ID);

        expect(breaker.getStatus().state).toBe(CircuitState.CLOSED);
    });

    it("behaves as if the cache were empty when the store is down", async () => {
        const extractor = createFakeExtractor(async () => scenarioInfo);
        const resolver = new StreamResolver({
            cache: new StreamCache(new DownStore(), {
                metadataTtlSeconds: 86_400,
                streamUrlTtlSeconds: 7_200,
            }),
            breaker,
            extractor,
        });

        const first = await resolver.resolve(VIDEO_ID);
        const second = await resolver.resolve(VIDEO_ID);

        expect(first.fromCache).toBe(false);
        expect(second.fromCache).toBe(false);
        expect(extractor.extract).toHaveBeenCalledTimes(2);
    });

    it("reports cache state and invalidates entries", async () => {
        const extractor = createFakeExtractor(async () => scenarioInfo);
        const resolver = new StreamResolver({ cache, breaker, extractor });

        await resolver.resolve(VIDEO_ID);
        now += 200 * 1000;

        expect(await resolver.isCached(VIDEO_ID)).toBe(true);
        expect(await resolver.getCacheTtl(VIDEO_ID)).toBe(7_000);

        expect(await resolver.invalidate(VIDEO_ID)).toEqual({ ok: true, value: 4 });
        expect(await resolver.isCached(VIDEO_ID)).toBe(false);
    });
});

describe("selectAudioUrl", () => {
    it("takes the first audio-only primary format", () => {
        expect(
            selectAudioUrl(
                makeInfo({
                    formats: [
                        audioFormat("https://x/muxed", { vcodec: "avc1" }),
                        audioFormat("https://x/a1"),
                        audioFormat("https://x/a2"),
                    ],
                    adaptiveFormats: [audioFormat("https://x/adaptive")],
                })
            )
        ).toBe("https://x/a1");
    });

    it("treats a missing video codec as audio-only but rejects silent formats", () => {
        expect(
            selectAudioUrl(
                makeInfo({
                    formats: [
                        audioFormat("https://x/silent", { acodec: "none", vcodec: "none" }),
                        audioFormat("https://x/opus", { acodec: "opus", vcodec: null }),
                    ],
                })
            )
        ).toBe("https://x/opus");
    });

    it("falls back to the top-level url, then to nothing", () => {
        expect(selectAudioUrl(makeInfo({ url: "https://x/direct" }))).toBe("https://x/direct");
        expect(selectAudioUrl(makeInfo())).toBeNull();
    });
});
