/**
 * Batch enrichment
 *
 * Decorates listing items (songs, search hits, playlist tracks) with their
 * best thumbnail and, optionally, a resolved stream URL. Resolution failures
 * are absorbed per item; the output always has the input's length and order.
 */

import pLimit from "p-limit";
import { config } from "../config";
import { logger } from "../utils/logger";
import { AppError, ErrorCode, describeError } from "../utils/errors";
import { isRecord, readString, type UnknownRecord } from "../utils/guards";
import { defaultThumbnailUrl, getBestThumbnail } from "./thumbnails";
import { streamResolver, type ResolvedStream, type StreamResolver } from "./streamResolver";

export type EnrichmentItem = UnknownRecord;

export type EnrichedItem = EnrichmentItem & {
    thumbnail: string | null;
    stream_url?: string;
};

interface EnrichmentTarget {
    videoId: string | null;
    item: EnrichmentItem;
}

export interface BatchStreamSuccess {
    videoId: string;
    title: string | null;
    artist: string | null;
    duration: number | null;
    thumbnail: string | null;
    url: string;
    cached: boolean;
}

export interface BatchStreamFailure {
    videoId: string;
    error: string;
    code: string;
}

export type BatchStreamResult = BatchStreamSuccess | BatchStreamFailure;

export interface BatchSummary {
    total: number;
    cached: number;
    failed: number;
}

export type StreamResolution = Pick<StreamResolver, "resolve">;

/** Listing payloads use either `videoId` or `video_id`. */
export function extractVideoId(item: EnrichmentItem): string | null {
    return readString(item, "videoId") ?? readString(item, "video_id");
}

function toTarget(item: EnrichmentItem): EnrichmentTarget {
    return { videoId: extractVideoId(item), item };
}

export function isBatchFailure(result: BatchStreamResult): result is BatchStreamFailure {
    return "error" in result;
}

export class EnrichmentPipeline {
    private readonly limit: ReturnType<typeof pLimit>;
    private readonly log = logger.child("Enrichment");

    constructor(
        private readonly resolver: StreamResolution,
        concurrency: number
    ) {
        this.limit = pLimit(Math.max(1, concurrency));
    }

    get activeCount(): number {
        return this.limit.activeCount;
    }

    get pendingCount(): number {
        return this.limit.pendingCount;
    }

    async enrich(items: EnrichmentItem[], includeStreams: boolean): Promise<EnrichedItem[]> {
        const targets = items.map(toTarget);
        const decorated: EnrichedItem[] = targets.map(({ videoId, item }) => ({
            ...item,
            thumbnail: getBestThumbnail({
                thumbnails: item.thumbnails,
                thumbnail: item.thumbnail,
                videoId,
            }),
        }));

        if (!includeStreams) {
            return decorated;
        }

        const videoIds = [
            ...new Set(
                targets
                    .map((target) => target.videoId)
                    .filter((videoId): videoId is string => videoId !== null)
            ),
        ];
        if (videoIds.length === 0) {
            return decorated;
        }

        const resolved = await this.resolveAll(videoIds);

        return decorated.map((item, index) => {
            const videoId = targets[index].videoId;
            const stream = videoId === null ? undefined : resolved.get(videoId);
            if (!stream || videoId === null) {
                return item;
            }
            const thumbnail =
                stream.thumbnail && stream.thumbnail !== defaultThumbnailUrl(videoId)
                    ? stream.thumbnail
                    : item.thumbnail;
            return { ...item, thumbnail, stream_url: stream.url };
        });
    }

    /**
     * Enriches the list stored under `field` (e.g. an album's `tracks`),
     * leaving the rest of the payload untouched.
     */
    async enrichCollection(
        payload: UnknownRecord,
        field: string,
        includeStreams: boolean
    ): Promise<UnknownRecord> {
        const list = payload[field];
        if (!Array.isArray(list)) {
            return payload;
        }
        const enriched = await this.enrich(list.filter(isRecord), includeStreams);
        let next = 0;
        return {
            ...payload,
            [field]: list.map((entry: unknown) => (isRecord(entry) ? enriched[next++] : entry)),
        };
    }

    /** Shelf-shaped payloads (home, related) carry one list per section. */
    async enrichSections(
        sections: UnknownRecord[],
        field: string,
        includeStreams: boolean
    ): Promise<UnknownRecord[]> {
        return Promise.all(
            sections.map((section) => this.enrichCollection(section, field, includeStreams))
        );
    }

    /**
     * Resolves each identifier and reports per-item outcomes in request order.
     */
    async resolveBatch(
        videoIds: string[]
    ): Promise<{ results: BatchStreamResult[]; summary: BatchSummary }> {
        const settled = await Promise.allSettled(
            videoIds.map((videoId) => this.limit(() => this.resolver.resolve(videoId)))
        );

        const results = settled.map((outcome, index): BatchStreamResult => {
            const videoId = videoIds[index];
            if (outcome.status === "fulfilled") {
                const stream = outcome.value;
                return {
                    videoId,
                    title: stream.title,
                    artist: stream.artist,
                    duration: stream.duration,
                    thumbnail: stream.thumbnail,
                    url: stream.url,
                    cached: stream.fromCache,
                };
            }
            const reason: unknown = outcome.reason;
            return {
                videoId,
                error: describeError(reason),
                code: reason instanceof AppError ? reason.code : ErrorCode.EXTRACTION_FAILED,
            };
        });

        const summary: BatchSummary = {
            total: results.length,
            cached: results.filter((result) => !isBatchFailure(result) && result.cached)
                .length,
            failed: results.filter(isBatchFailure).length,
        };

        return { results, summary };
    }

    private async resolveAll(videoIds: string[]): Promise<Map<string, ResolvedStream>> {
        const settled = await Promise.allSettled(
            videoIds.map((videoId) => this.limit(() => this.resolver.resolve(videoId)))
        );

        const resolved = new Map<string, ResolvedStream>();
        let failed = 0;
        settled.forEach((outcome, index) => {
            if (outcome.status === "fulfilled") {
                resolved.set(videoIds[index], outcome.value);
                return;
            }
            failed += 1;
            this.log.debug(`Skipping stream for ${videoIds[index]}: ${describeError(outcome.reason)}`);
        });

        if (failed > 0) {
            this.log.warn(`Resolved ${resolved.size}/${videoIds.length} streams (${failed} failed)`);
        }
        return resolved;
    }
}

export const enrichmentPipeline = new EnrichmentPipeline(
    streamResolver,
    config.enrichment.concurrency
);
