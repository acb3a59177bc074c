import { Router, Request, Response, NextFunction } from "express";
import { config } from "../config";
import { streamResolver } from "../services/streamResolver";
import { enrichmentPipeline } from "../services/enrichment";

const router = Router();

/**
 * @openapi
 * /api/v1/stats:
 *   get:
 *     summary: Operator statistics for caching, rate limiting and the stream circuit breaker
 *     tags: [Operations]
 *     responses:
 *       200:
 *         description: Service statistics
 */
router.get("/", async (_req: Request, res: Response, next: NextFunction) => {
    try {
        const caching = await streamResolver.cache.stats();
        res.json({
            service: config.serviceName,
            version: config.version,
            rateLimiting: {
                perMinute: config.rateLimit.perMinute,
                streamPerMinute: config.rateLimit.streamPerMinute,
                searchPerMinute: config.rateLimit.searchPerMinute,
            },
            caching,
            circuitBreaker: {
                youtubeStream: streamResolver.breaker.getStatus(),
            },
            performance: {
                compression: true,
                maxWorkers: config.extractor.maxWorkers,
                enrichmentConcurrency: config.enrichment.concurrency,
                enrichmentActive: enrichmentPipeline.activeCount,
                enrichmentPending: enrichmentPipeline.pendingCount,
                extractorQueue: streamResolver.extractorQueue(),
            },
        });
    } catch (err) {
        next(err);
    }
});

export default router;
