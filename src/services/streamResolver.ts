import { logger, type Logger } from "../utils/logger";
import {
    AppError,
    CircuitOpenError,
    ExtractionFailedError,
    RateLimitedError,
    describeError,
} from "../utils/errors";
import {
    streamCache,
    type CacheResult,
    type CachedMetadata,
    type StreamCache,
} from "../cache";
import {
    CircuitBreaker,
    isRateLimitMessage,
    youtubeStreamBreaker,
} from "./circuitBreaker";
import {
    watchUrlFor,
    ytDlpExtractor,
    type Extractor,
    type ExtractorFormat,
    type ExtractorInfo,
    type ExtractorQueueStats,
} from "./extractor";
import { getBestThumbnail } from "./thumbnails";

export interface ResolvedStream {
    videoId: string;
    url: string;
    title: string | null;
    artist: string | null;
    duration: number | null;
    thumbnail: string | null;
    fromCache: boolean;
}

export interface ResolveOptions {
    bypassCache?: boolean;
}

export interface StreamResolverDeps {
    cache: StreamCache;
    breaker: CircuitBreaker;
    extractor: Extractor;
    logger?: Logger;
}

const UNAVAILABLE_SIGNATURES = [
    "video unavailable",
    "private video",
    "this video has been removed",
    "this video is not available",
    "http error 404",
];

function isUnavailableMessage(message: string): boolean {
    const normalized = message.toLowerCase();
    return UNAVAILABLE_SIGNATURES.some((signature) => normalized.includes(signature));
}

function isAudioOnly(format: ExtractorFormat): boolean {
    return (
        format.url !== null &&
        format.acodec !== null &&
        format.acodec !== "none" &&
        (format.vcodec === null || format.vcodec === "none")
    );
}

/**
 * Audio-only entry from the primary list, then from the adaptive list, then
 * the top-level URL.
 */
export function selectAudioUrl(info: ExtractorInfo): string | null {
    const primary = info.formats.find(isAudioOnly);
    if (primary?.url) {
        return primary.url;
    }
    const adaptive = info.adaptiveFormats.find(isAudioOnly);
    if (adaptive?.url) {
        return adaptive.url;
    }
    return info.url;
}

export function toCachedMetadata(videoId: string, info: ExtractorInfo): CachedMetadata {
    return {
        title: info.title,
        artist: info.artist ?? info.uploader ?? info.channel,
        duration: info.duration,
        // yt-dlp's own pick; its thumbnail list often omits sizes on the largest entries
        thumbnail:
            info.thumbnail ??
            getBestThumbnail({ thumbnails: info.thumbnails, thumbnail: null, videoId }),
    };
}

export class StreamResolver {
    private readonly log: Logger;

    constructor(private readonly deps: StreamResolverDeps) {
        this.log = deps.logger ?? logger.child("StreamResolver");
    }

    get breaker(): CircuitBreaker {
        return this.deps.breaker;
    }

    get cache(): StreamCache {
        return this.deps.cache;
    }

    extractorQueue(): ExtractorQueueStats {
        return this.deps.extractor.queueStats();
    }

    /**
     * Turns a video identifier into a playable audio URL.
     *
     * @throws CircuitOpenError when the extractor is being shielded
     * @throws RateLimitedError when the upstream rate limits the extraction
     * @throws ExtractionFailedError when no audio stream could be produced
     */
    async resolve(videoId: string, options: ResolveOptions = {}): Promise<ResolvedStream> {
        const { breaker, cache, extractor } = this.deps;

        if (breaker.isOpen()) {
            const { remainingTimeSeconds } = breaker.getStatus();
            this.log.warn(`Circuit open, rejecting ${videoId} (${remainingTimeSeconds}s left)`);
            throw new CircuitOpenError(remainingTimeSeconds);
        }

        if (!options.bypassCache) {
            const cached = await this.fromCache(videoId);
            if (cached) {
                return cached;
            }
        }

        let info: ExtractorInfo;
        try {
            info = await extractor.extract(watchUrlFor(videoId));
        } catch (err) {
            throw this.classifyFailure(videoId, err);
        }

        const url = selectAudioUrl(info);
        if (!url) {
            this.log.warn(`No audio stream found for ${videoId}`);
            throw new ExtractionFailedError(
                videoId,
                "no_audio_stream",
                `No audio stream found for ${videoId}`
            );
        }

        breaker.recordSuccess();

        const metadata = toCachedMetadata(videoId, info);
        await cache.setMetadata(videoId, metadata);
        await cache.setStreamUrl(videoId, url);

        return { videoId, url, ...metadata, fromCache: false };
    }

    async isCached(videoId: string): Promise<boolean> {
        return this.deps.cache.isCached(videoId);
    }

    async getCacheTtl(videoId: string): Promise<number> {
        return this.deps.cache.getRemainingTtl(videoId);
    }

    async invalidate(videoId: string): Promise<CacheResult<number>> {
        const result = await this.deps.cache.invalidate(videoId);
        if (result.ok) {
            this.log.info(`Invalidated cached stream for ${videoId}`);
        }
        return result;
    }

    private async fromCache(videoId: string): Promise<ResolvedStream | null> {
        const { cache } = this.deps;
        const [metadata, streamUrl] = await Promise.all([
            cache.getMetadata(videoId),
            cache.getStreamUrl(videoId),
        ]);

        const url = streamUrl.ok ? streamUrl.value : null;
        if (!url) {
            return null;
        }

        if (metadata.ok && metadata.value) {
            this.log.debug(`Cache hit for ${videoId}`);
            return { videoId, url, ...metadata.value, fromCache: true };
        }

        this.log.debug(`Stream URL cached without metadata for ${videoId}`);
        return {
            videoId,
            url,
            title: null,
            artist: null,
            duration: null,
            thumbnail: null,
            fromCache: true,
        };
    }

    private classifyFailure(videoId: string, err: unknown): AppError {
        if (err instanceof AppError) {
            return err;
        }

        const message = describeError(err);
        if (isRateLimitMessage(message)) {
            this.deps.breaker.recordFailure(message);
            const { remainingTimeSeconds } = this.deps.breaker.getStatus();
            this.log.warn(`Rate limited while extracting ${videoId}: ${message}`);
            return new RateLimitedError(remainingTimeSeconds, message);
        }

        this.log.error(`Extraction failed for ${videoId}: ${message}`);
        return new ExtractionFailedError(
            videoId,
            isUnavailableMessage(message) ? "unavailable" : "extractor_error",
            `Failed to extract stream for ${videoId}: ${message}`
        );
    }
}

export const streamResolver = new StreamResolver({
    cache: streamCache,
    breaker: youtubeStreamBreaker,
    extractor: ytDlpExtractor,
});
