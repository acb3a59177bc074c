/**
 * Stream Routes
 *
 * Resolve video identifiers to playable audio URLs. The gateway returns
 * URLs only; audio bytes never pass through it.
 */

import { Router, Request, Response, NextFunction } from "express";
import { streamResolver } from "../services/streamResolver";
import { enrichmentPipeline } from "../services/enrichment";
import { streamLimiter } from "../middleware/rateLimiter";
import { batchRequestSchema, parseQueryFlag, videoIdSchema } from "../utils/validators";
import { sendValidationError } from "./routeErrorResponse";

const router = Router();

/**
 * @openapi
 * /api/v1/stream/batch:
 *   post:
 *     summary: Resolve stream URLs for up to 50 videos
 *     tags: [Stream]
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             properties:
 *               videoIds:
 *                 type: array
 *                 items: { type: string }
 *     responses:
 *       200:
 *         description: Per-video results in request order plus a summary of cached and failed entries
 *       400:
 *         description: Invalid request body
 */
router.post(
    "/batch",
    streamLimiter,
    async (req: Request, res: Response, next: NextFunction) => {
        const parsed = batchRequestSchema.safeParse(req.body);
        if (!parsed.success) {
            return sendValidationError(res, parsed.error);
        }

        try {
            const { results, summary } = await enrichmentPipeline.resolveBatch(
                parsed.data.videoIds
            );
            res.json({ results, summary });
        } catch (err) {
            next(err);
        }
    }
);

/**
 * @openapi
 * /api/v1/stream/{videoId}:
 *   get:
 *     summary: Resolve the best audio stream URL for a video
 *     tags: [Stream]
 *     parameters:
 *       - in: path
 *         name: videoId
 *         required: true
 *         schema: { type: string }
 *       - in: query
 *         name: bypass_cache
 *         schema: { type: boolean }
 *     responses:
 *       200:
 *         description: Stream URL with title, artist, duration and thumbnail
 *       400:
 *         description: Invalid video ID
 *       404:
 *         description: Video unavailable
 *       429:
 *         description: Upstream rate limited; see Retry-After
 *       502:
 *         description: No audio stream could be extracted
 *       503:
 *         description: Stream resolution paused by the circuit breaker; see Retry-After
 */
router.get(
    "/:videoId",
    streamLimiter,
    async (req: Request, res: Response, next: NextFunction) => {
        const parsed = videoIdSchema.safeParse(req.params.videoId);
        if (!parsed.success) {
            return sendValidationError(res, parsed.error);
        }
        const bypassCache = parseQueryFlag(req.query.bypass_cache);

        try {
            const stream = await streamResolver.resolve(parsed.data, { bypassCache });
            res.json({
                videoId: stream.videoId,
                url: stream.url,
                title: stream.title,
                artist: stream.artist,
                duration: stream.duration,
                thumbnail: stream.thumbnail,
                cached: stream.fromCache,
            });
        } catch (err) {
            next(err);
        }
    }
);

/**
 * @openapi
 * /api/v1/stream/{videoId}/cache:
 *   get:
 *     summary: Report whether a fresh stream URL is cached and for how long
 *     tags: [Stream]
 *     responses:
 *       200:
 *         description: Cache status and remaining seconds
 *   delete:
 *     summary: Drop cached metadata and stream URL for a video
 *     tags: [Stream]
 *     responses:
 *       204:
 *         description: Cache entries removed
 */
router.get(
    "/:videoId/cache",
    async (req: Request, res: Response, next: NextFunction) => {
        const parsed = videoIdSchema.safeParse(req.params.videoId);
        if (!parsed.success) {
            return sendValidationError(res, parsed.error);
        }

        try {
            const [cached, ttlSeconds] = await Promise.all([
                streamResolver.isCached(parsed.data),
                streamResolver.getCacheTtl(parsed.data),
            ]);
            res.json({ videoId: parsed.data, cached, ttlSeconds });
        } catch (err) {
            next(err);
        }
    }
);

router.delete(
    "/:videoId/cache",
    async (req: Request, res: Response, next: NextFunction) => {
        const parsed = videoIdSchema.safeParse(req.params.videoId);
        if (!parsed.success) {
            return sendValidationError(res, parsed.error);
        }

        try {
            const result = await streamResolver.invalidate(parsed.data);
            if (!result.ok) {
                return next(result.error);
            }
            res.status(204).end();
        } catch (err) {
            next(err);
        }
    }
);

export default router;
