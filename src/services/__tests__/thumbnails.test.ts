import { defaultThumbnailUrl, getBestThumbnail } from "../thumbnails";

describe("getBestThumbnail", () => {
    it("picks the candidate with the largest area", () => {
        expect(
            getBestThumbnail({
                videoId: "abcdefghijk",
                thumbnails: [
                    { url: "https://img/small.jpg", width: 60, height: 60 },
                    { url: "https://img/wide.jpg", width: 400, height: 100 },
                    { url: "https://img/large.jpg", width: 226, height: 226 },
                ],
                thumbnail: "https://img/bare.jpg",
            })
        ).toBe("https://img/large.jpg");
    });

    it("falls back to the first candidate when sizes are missing", () => {
        expect(
            getBestThumbnail({
                thumbnails: [{ url: "https://img/first.jpg" }, { url: "https://img/second.jpg" }],
            })
        ).toBe("https://img/first.jpg");
    });

    it("uses a bare thumbnail string when there is no list", () => {
        expect(
            getBestThumbnail({ videoId: "abcdefghijk", thumbnail: "https://img/bare.jpg" })
        ).toBe("https://img/bare.jpg");
        expect(
            getBestThumbnail({ thumbnails: [], thumbnail: "https://img/bare.jpg" })
        ).toBe("https://img/bare.jpg");
    });

    it("derives a default from the identifier as a last resort", () => {
        expect(getBestThumbnail({ videoId: "dQw4w9WgXcQ" })).toBe(
            "https://img.youtube.com/vi/dQw4w9WgXcQ/mqdefault.jpg"
        );
        expect(defaultThumbnailUrl("dQw4w9WgXcQ")).toBe(
            "https://img.youtube.com/vi/dQw4w9WgXcQ/mqdefault.jpg"
        );
    });

    it("ignores malformed candidates", () => {
        expect(
            getBestThumbnail({
                videoId: "abcdefghijk",
                thumbnails: [null, "https://img/x.jpg", { width: 1000, height: 1000 }],
            })
        ).toBe("https://img.youtube.com/vi/abcdefghijk/mqdefault.jpg");
    });

    it("returns null with nothing to go on", () => {
        expect(getBestThumbnail({})).toBeNull();
    });
});
