import request from "supertest";
import { youtubeStreamBreaker } from "../../services/circuitBreaker";
import router from "../stats";
import { createRouteTestApp } from "./helpers/createRouteTestApp";

describe("GET /api/v1/stats", () => {
    const app = createRouteTestApp("/api/v1/stats", router);

    afterEach(() => {
        youtubeStreamBreaker.reset();
    });

    it("reports configuration, cache and breaker state", async () => {
        const res = await request(app).get("/api/v1/stats");

        expect(res.status).toBe(200);
        expect(res.body.service).toBe("ytmusic-gateway");
        expect(res.body.rateLimiting).toEqual({
            perMinute: 60,
            streamPerMinute: 20,
            searchPerMinute: 30,
        });
        expect(res.body.caching).toEqual({
            backend: "memory",
            keys: 0,
            maxSize: 1000,
            enabled: true,
            metadataTtlSeconds: 86400,
            streamUrlTtlSeconds: 7200,
        });
        expect(res.body.circuitBreaker.youtubeStream).toEqual({
            state: "CLOSED",
            failureCount: 0,
            remainingTimeSeconds: 0,
            isBlocked: false,
        });
        expect(res.body.performance).toEqual({
            compression: true,
            maxWorkers: 10,
            enrichmentConcurrency: 8,
            enrichmentActive: 0,
            enrichmentPending: 0,
            extractorQueue: { pending: 0, size: 0 },
        });
    });

    it("shows an open circuit after an upstream rate limit", async () => {
        youtubeStreamBreaker.recordFailure("HTTP Error 429: Too Many Requests");

        const res = await request(app).get("/api/v1/stats");
        const status = res.body.circuitBreaker.youtubeStream;

        expect(status.state).toBe("OPEN");
        expect(status.isBlocked).toBe(true);
        expect(status.remainingTimeSeconds).toBeGreaterThan(590);
        expect(status.remainingTimeSeconds).toBeLessThanOrEqual(600);
    });
});
