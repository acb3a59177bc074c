import { Router, Request, Response, NextFunction } from "express";
import { z } from "zod";
import { metadataProvider } from "../services/metadataProvider";
import { enrichmentPipeline } from "../services/enrichment";
import { searchLimiter } from "../middleware/rateLimiter";
import {
    SEARCH_FILTERS,
    limitSchema,
    parseQueryFlag,
    searchQuerySchema,
} from "../utils/validators";
import { sendValidationError } from "./routeErrorResponse";

const router = Router();

const searchParamsSchema = z.object({
    q: searchQuerySchema,
    filter: z.enum(SEARCH_FILTERS).optional(),
    limit: limitSchema,
});

/**
 * @openapi
 * /api/v1/search:
 *   get:
 *     summary: Search YouTube Music
 *     tags: [Search]
 *     parameters:
 *       - in: query
 *         name: q
 *         required: true
 *         schema: { type: string }
 *       - in: query
 *         name: filter
 *         schema: { type: string, enum: [songs, videos, albums, artists, playlists, community_playlists, featured_playlists, uploads, podcasts, episodes, profiles] }
 *       - in: query
 *         name: limit
 *         schema: { type: integer, minimum: 1, maximum: 100, default: 25 }
 *       - in: query
 *         name: include_stream_urls
 *         schema: { type: boolean, default: false }
 *     responses:
 *       200:
 *         description: Search results with thumbnails and optional stream URLs
 *       400:
 *         description: Invalid query parameters
 *       502:
 *         description: Metadata provider failed
 */
router.get(
    "/",
    searchLimiter,
    async (req: Request, res: Response, next: NextFunction) => {
        const parsed = searchParamsSchema.safeParse(req.query);
        if (!parsed.success) {
            return sendValidationError(res, parsed.error);
        }
        const { q, filter, limit } = parsed.data;

        try {
            const results = await metadataProvider.search(q, filter, limit);
            const enriched = await enrichmentPipeline.enrich(
                results,
                parseQueryFlag(req.query.include_stream_urls)
            );
            res.json({ query: q, filter: filter ?? null, results: enriched });
        } catch (err) {
            next(err);
        }
    }
);

const suggestionQuerySchema = z.object({ q: searchQuerySchema });

/**
 * @openapi
 * /api/v1/search/suggestions:
 *   get:
 *     summary: Search suggestions for a partial query
 *     tags: [Search]
 *     parameters:
 *       - in: query
 *         name: q
 *         required: true
 *         schema: { type: string }
 *     responses:
 *       200:
 *         description: Suggested queries
 *   delete:
 *     summary: Remove a query from the suggestion history
 *     tags: [Search]
 *     parameters:
 *       - in: query
 *         name: q
 *         required: true
 *         schema: { type: string }
 *     responses:
 *       200:
 *         description: Whether the provider removed anything
 */
router.get(
    "/suggestions",
    searchLimiter,
    async (req: Request, res: Response, next: NextFunction) => {
        const parsed = suggestionQuerySchema.safeParse(req.query);
        if (!parsed.success) {
            return sendValidationError(res, parsed.error);
        }

        try {
            const suggestions = await metadataProvider.getSearchSuggestions(parsed.data.q);
            res.json({ query: parsed.data.q, suggestions });
        } catch (err) {
            next(err);
        }
    }
);

router.delete(
    "/suggestions",
    searchLimiter,
    async (req: Request, res: Response, next: NextFunction) => {
        const parsed = suggestionQuerySchema.safeParse(req.query);
        if (!parsed.success) {
            return sendValidationError(res, parsed.error);
        }

        try {
            const removed = await metadataProvider.removeSearchSuggestions(parsed.data.q);
            res.json({ query: parsed.data.q, removed });
        } catch (err) {
            next(err);
        }
    }
);

export default router;
