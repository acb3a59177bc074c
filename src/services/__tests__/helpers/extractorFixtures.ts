import type { Extractor, ExtractorFormat, ExtractorInfo } from "../../extractor";

export function audioFormat(url: string, overrides: Partial<ExtractorFormat> = {}): ExtractorFormat {
    return { url, acodec: "mp4a.40.2", vcodec: "none", abr: 129, ext: "m4a", ...overrides };
}

export function makeInfo(overrides: Partial<ExtractorInfo> = {}): ExtractorInfo {
    return {
        id: null,
        title: null,
        artist: null,
        uploader: null,
        channel: null,
        duration: null,
        thumbnail: null,
        thumbnails: [],
        formats: [],
        adaptiveFormats: [],
        url: null,
        ...overrides,
    };
}

export function createFakeExtractor(
    extract: (watchUrl: string) => Promise<ExtractorInfo>
): Extractor & { extract: jest.Mock<Promise<ExtractorInfo>, [string]> } {
    return {
        extract: jest.fn(extract),
        queueStats: () => ({ pending: 0, size: 0 }),
        drain: async () => {},
    };
}
