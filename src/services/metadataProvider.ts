/**
 * Metadata provider client
 *
 * Talks to the ytmusicapi sidecar over HTTP for everything except stream
 * resolution: search, browse, explore, watch radio and podcasts.
 * Transient failures (429, 5xx, dropped connections) are retried with
 * exponential backoff; everything else surfaces as MetadataProviderError.
 */

import axios, { AxiosInstance } from "axios";
import http from "node:http";
import https from "node:https";
import { config } from "../config";
import { logger } from "../utils/logger";
import { MetadataProviderError, describeError } from "../utils/errors";
import { isRecord, type UnknownRecord } from "../utils/guards";
import type { SearchFilter } from "../utils/validators";

const AGENT_OPTIONS = {
    keepAlive: true,
    maxSockets: 64,
    maxFreeSockets: 16,
};
const AVAILABILITY_TIMEOUT_MS = 5000;
// Explore pages are assembled from several upstream calls by the sidecar
const EXPLORE_TIMEOUT_MS = 15_000;

export interface WatchPlaylistParams {
    videoId?: string;
    playlistId?: string;
    limit: number;
    radio: boolean;
    shuffle: boolean;
}

export interface MetadataProviderOptions {
    baseUrl: string;
    timeoutMs: number;
    maxRetries?: number;
    baseDelayMs?: number;
}

interface UpstreamFailure {
    status: number | undefined;
    code: string | undefined;
    retryAfter: string | undefined;
}

function inspectFailure(err: unknown): UpstreamFailure {
    if (!isRecord(err)) {
        return { status: undefined, code: undefined, retryAfter: undefined };
    }
    const response = isRecord(err.response) ? err.response : undefined;
    const status = response?.status;
    const retryAfter = response && isRecord(response.headers)
        ? response.headers["retry-after"]
        : undefined;
    return {
        status: typeof status === "number" ? status : undefined,
        code: typeof err.code === "string" ? err.code : undefined,
        retryAfter: typeof retryAfter === "string" ? retryAfter : undefined,
    };
}

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Retry a function with exponential backoff for transient errors.
 * Retries on HTTP 429 (rate limited) and 5xx (server errors).
 */
export async function retryWithBackoff<T>(
    fn: () => Promise<T>,
    label: string,
    maxRetries = 3,
    baseDelayMs = 1000
): Promise<T> {
    for (let attempt = 0; ; attempt++) {
        try {
            return await fn();
        } catch (err) {
            const { status, code, retryAfter } = inspectFailure(err);
            const isRetryable =
                status === 429 ||
                (status !== undefined && status >= 500 && status < 600) ||
                code === "ECONNRESET" ||
                code === "ETIMEDOUT";

            if (!isRetryable || attempt >= maxRetries) {
                throw err;
            }

            let delayMs: number;
            if (retryAfter) {
                delayMs = Number.parseInt(retryAfter, 10) * 1000 || baseDelayMs;
            } else {
                // base * 2^attempt ± 25%
                delayMs = baseDelayMs * Math.pow(2, attempt);
                delayMs += delayMs * (Math.random() * 0.5 - 0.25);
            }

            logger.warn(
                `[MetadataProvider] ${label} failed (status=${status}, attempt=${attempt + 1}/${maxRetries}), ` +
                    `retrying in ${Math.round(delayMs)}ms`
            );
            await sleep(delayMs);
        }
    }
}

function asRecord(data: unknown, operation: string): UnknownRecord {
    if (!isRecord(data)) {
        throw new MetadataProviderError(
            operation,
            undefined,
            `Metadata provider returned an unexpected ${operation} payload`
        );
    }
    return data;
}

function asStrings(data: unknown, key: string): string[] {
    const list = Array.isArray(data) ? data : isRecord(data) ? data[key] : undefined;
    return Array.isArray(list)
        ? list.filter((entry): entry is string => typeof entry === "string")
        : [];
}

function asList(data: unknown, key: string): UnknownRecord[] {
    const list = Array.isArray(data) ? data : isRecord(data) ? data[key] : undefined;
    return Array.isArray(list) ? list.filter(isRecord) : [];
}

export class MetadataProviderClient {
    private readonly client: AxiosInstance;
    private readonly maxRetries: number;
    private readonly baseDelayMs: number;

    constructor(options: MetadataProviderOptions) {
        this.client = axios.create({
            baseURL: options.baseUrl,
            timeout: options.timeoutMs,
            httpAgent: new http.Agent(AGENT_OPTIONS),
            httpsAgent: new https.Agent(AGENT_OPTIONS),
        });
        this.maxRetries = options.maxRetries ?? 3;
        this.baseDelayMs = options.baseDelayMs ?? 1000;
    }

    // ── Health ─────────────────────────────────────────────────────

    async isAvailable(): Promise<boolean> {
        try {
            await this.client.get("/health", { timeout: AVAILABILITY_TIMEOUT_MS });
            return true;
        } catch (err) {
            logger.debug(`[MetadataProvider] Health check failed: ${describeError(err)}`);
            return false;
        }
    }

    // ── Search ─────────────────────────────────────────────────────

    async search(
        query: string,
        filter: SearchFilter | undefined,
        limit: number
    ): Promise<UnknownRecord[]> {
        const data = await this.request("search", () =>
            this.client.get("/search", { params: { q: query, filter, limit } })
        );
        return asList(data, "results");
    }

    async getSearchSuggestions(query: string): Promise<string[]> {
        const data = await this.request("search suggestions", () =>
            this.client.get("/search/suggestions", { params: { q: query } })
        );
        return asStrings(data, "suggestions");
    }

    async removeSearchSuggestions(query: string): Promise<boolean> {
        const data = await this.request("remove search suggestions", () =>
            this.client.delete("/search/suggestions", { params: { q: query } })
        );
        return isRecord(data) && data.success === true;
    }

    // ── Browse ─────────────────────────────────────────────────────

    async getHome(limit: number): Promise<UnknownRecord[]> {
        const data = await this.request("home", () =>
            this.client.get("/home", { params: { limit }, timeout: EXPLORE_TIMEOUT_MS })
        );
        return asList(data, "sections");
    }

    async getArtist(channelId: string): Promise<UnknownRecord> {
        const data = await this.request("artist", () =>
            this.client.get(`/artists/${encodeURIComponent(channelId)}`)
        );
        return asRecord(data, "artist");
    }

    async getArtistAlbums(channelId: string, params?: string): Promise<UnknownRecord[]> {
        const data = await this.request("artist albums", () =>
            this.client.get(`/artists/${encodeURIComponent(channelId)}/albums`, {
                params: { params },
            })
        );
        return asList(data, "albums");
    }

    /** Maps an album's audio playlist id (OLAK5uy_...) to its browse id. */
    async getAlbumBrowseId(audioPlaylistId: string): Promise<string | null> {
        const data = await this.request("album browse id", () =>
            this.client.get(`/albums/${encodeURIComponent(audioPlaylistId)}/browse-id`)
        );
        return isRecord(data) && typeof data.browseId === "string" ? data.browseId : null;
    }

    async getSongRelated(videoId: string): Promise<UnknownRecord[]> {
        const data = await this.request("related songs", () =>
            this.client.get(`/songs/${encodeURIComponent(videoId)}/related`)
        );
        return asList(data, "sections");
    }

    async getLyrics(browseId: string): Promise<UnknownRecord> {
        const data = await this.request("lyrics", () =>
            this.client.get(`/lyrics/${encodeURIComponent(browseId)}`)
        );
        return asRecord(data, "lyrics");
    }

    // ── Explore ────────────────────────────────────────────────────

    async getMoodCategories(): Promise<UnknownRecord> {
        const data = await this.request("mood categories", () =>
            this.client.get("/moods-and-genres", { timeout: EXPLORE_TIMEOUT_MS })
        );
        return asRecord(data, "mood categories");
    }

    async getMoodPlaylists(params: string): Promise<UnknownRecord[]> {
        const data = await this.request("mood playlists", () =>
            this.client.get("/mood-playlists", {
                params: { params },
                timeout: EXPLORE_TIMEOUT_MS,
            })
        );
        return asList(data, "playlists");
    }

    async getCharts(country?: string): Promise<UnknownRecord> {
        const data = await this.request("charts", () =>
            this.client.get("/charts", { params: { country }, timeout: EXPLORE_TIMEOUT_MS })
        );
        return asRecord(data, "charts");
    }

    // ── Catalog ────────────────────────────────────────────────────

    async getSong(videoId: string): Promise<UnknownRecord> {
        const data = await this.request("song", () =>
            this.client.get(`/songs/${encodeURIComponent(videoId)}`)
        );
        return asRecord(data, "song");
    }

    async getAlbum(browseId: string): Promise<UnknownRecord> {
        const data = await this.request("album", () =>
            this.client.get(`/albums/${encodeURIComponent(browseId)}`)
        );
        return asRecord(data, "album");
    }

    async getPlaylist(playlistId: string, limit: number): Promise<UnknownRecord> {
        const data = await this.request("playlist", () =>
            this.client.get(`/playlists/${encodeURIComponent(playlistId)}`, {
                params: { limit },
            })
        );
        return asRecord(data, "playlist");
    }

    async getWatchPlaylist(params: WatchPlaylistParams): Promise<UnknownRecord> {
        const data = await this.request("watch", () =>
            this.client.get("/watch", {
                params: {
                    videoId: params.videoId,
                    playlistId: params.playlistId,
                    limit: params.limit,
                    radio: params.radio,
                    shuffle: params.shuffle,
                },
            })
        );
        return asRecord(data, "watch");
    }

    // ── Podcasts ───────────────────────────────────────────────────

    async getPodcast(browseId: string, limit: number): Promise<UnknownRecord> {
        const data = await this.request("podcast", () =>
            this.client.get(`/podcasts/${encodeURIComponent(browseId)}`, {
                params: { limit },
            })
        );
        return asRecord(data, "podcast");
    }

    async getEpisode(browseId: string): Promise<UnknownRecord> {
        const data = await this.request("episode", () =>
            this.client.get(`/episodes/${encodeURIComponent(browseId)}`)
        );
        return asRecord(data, "episode");
    }

    async getChannelEpisodes(channelId: string, limit: number): Promise<UnknownRecord[]> {
        const data = await this.request("channel episodes", () =>
            this.client.get(`/channels/${encodeURIComponent(channelId)}/episodes`, {
                params: { limit },
            })
        );
        return asList(data, "episodes");
    }

    async getChannel(channelId: string, limit: number): Promise<UnknownRecord> {
        const data = await this.request("channel", () =>
            this.client.get(`/channels/${encodeURIComponent(channelId)}`, {
                params: { limit },
            })
        );
        return asRecord(data, "channel");
    }

    async getEpisodesPlaylist(browseId: string, limit: number): Promise<UnknownRecord> {
        const data = await this.request("episodes playlist", () =>
            this.client.get(`/episodes/${encodeURIComponent(browseId)}/playlist`, {
                params: { limit },
            })
        );
        return asRecord(data, "episodes playlist");
    }

    private async request(
        operation: string,
        call: () => Promise<{ data: unknown }>
    ): Promise<unknown> {
        try {
            const response = await retryWithBackoff(
                call,
                operation,
                this.maxRetries,
                this.baseDelayMs
            );
            return response.data;
        } catch (err) {
            const { status } = inspectFailure(err);
            logger.error(`[MetadataProvider] ${operation} failed:`, describeError(err));
            throw new MetadataProviderError(
                operation,
                status,
                status === 404
                    ? `Not found (${operation})`
                    : `Metadata provider ${operation} request failed`
            );
        }
    }
}

export const metadataProvider = new MetadataProviderClient({
    baseUrl: config.metadataProvider.baseUrl,
    timeoutMs: config.metadataProvider.timeoutMs,
});
