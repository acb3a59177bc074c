import { isRecord, readNumber, readString, type UnknownRecord } from "../utils/guards";

export interface ThumbnailSource {
    thumbnails?: unknown;
    thumbnail?: unknown;
    videoId?: string | null;
}

export function defaultThumbnailUrl(videoId: string): string {
    return `https://img.youtube.com/vi/${videoId}/mqdefault.jpg`;
}

function area(candidate: UnknownRecord): number {
    return (readNumber(candidate, "width") ?? 0) * (readNumber(candidate, "height") ?? 0);
}

/**
 * Picks the largest candidate by width*height, then a bare `thumbnail`
 * string, then the identifier-derived default. Returns null only when none
 * of the three is available.
 */
export function getBestThumbnail(source: ThumbnailSource): string | null {
    const candidates = Array.isArray(source.thumbnails)
        ? source.thumbnails.filter(
              (entry): entry is UnknownRecord =>
                  isRecord(entry) && readString(entry, "url") !== null
          )
        : [];

    let best: UnknownRecord | null = null;
    for (const candidate of candidates) {
        if (best === null || area(candidate) > area(best)) {
            best = candidate;
        }
    }
    if (best !== null) {
        return readString(best, "url");
    }

    if (typeof source.thumbnail === "string" && source.thumbnail.length > 0) {
        return source.thumbnail;
    }

    return source.videoId ? defaultThumbnailUrl(source.videoId) : null;
}
