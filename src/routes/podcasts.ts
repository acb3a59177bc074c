import { Router, Request, Response, NextFunction } from "express";
import { metadataProvider } from "../services/metadataProvider";
import { enrichmentPipeline } from "../services/enrichment";
import {
    browseIdSchema,
    channelIdSchema,
    limitSchema,
    parseQueryFlag,
} from "../utils/validators";
import { sendValidationError } from "./routeErrorResponse";

const router = Router();

/**
 * @openapi
 * /api/v1/podcasts/episodes/{browseId}:
 *   get:
 *     summary: Get a single podcast episode
 *     tags: [Podcasts]
 *     responses:
 *       200:
 *         description: Episode details with best thumbnail
 */
router.get(
    "/episodes/:browseId",
    async (req: Request, res: Response, next: NextFunction) => {
        const parsed = browseIdSchema.safeParse(req.params.browseId);
        if (!parsed.success) {
            return sendValidationError(res, parsed.error);
        }

        try {
            const episode = await metadataProvider.getEpisode(parsed.data);
            const [enriched] = await enrichmentPipeline.enrich(
                [episode],
                parseQueryFlag(req.query.include_stream_urls)
            );
            res.json(enriched);
        } catch (err) {
            next(err);
        }
    }
);

/**
 * @openapi
 * /api/v1/podcasts/channels/{channelId}/episodes:
 *   get:
 *     summary: List episodes published by a podcast channel
 *     tags: [Podcasts]
 *     responses:
 *       200:
 *         description: Enriched episode list
 */
router.get(
    "/channels/:channelId/episodes",
    async (req: Request, res: Response, next: NextFunction) => {
        const id = channelIdSchema.safeParse(req.params.channelId);
        if (!id.success) {
            return sendValidationError(res, id.error);
        }
        const limit = limitSchema.safeParse(req.query.limit);
        if (!limit.success) {
            return sendValidationError(res, limit.error);
        }

        try {
            const episodes = await metadataProvider.getChannelEpisodes(id.data, limit.data);
            res.json({
                channelId: id.data,
                episodes: await enrichmentPipeline.enrich(
                    episodes,
                    parseQueryFlag(req.query.include_stream_urls)
                ),
            });
        } catch (err) {
            next(err);
        }
    }
);

/**
 * @openapi
 * /api/v1/podcasts/channels/{channelId}:
 *   get:
 *     summary: Get a podcast channel page
 *     tags: [Podcasts]
 *     responses:
 *       200:
 *         description: Channel with enriched episodes
 */
router.get(
    "/channels/:channelId",
    async (req: Request, res: Response, next: NextFunction) => {
        const id = channelIdSchema.safeParse(req.params.channelId);
        if (!id.success) {
            return sendValidationError(res, id.error);
        }
        const limit = limitSchema.safeParse(req.query.limit);
        if (!limit.success) {
            return sendValidationError(res, limit.error);
        }

        try {
            const channel = await metadataProvider.getChannel(id.data, limit.data);
            res.json(
                await enrichmentPipeline.enrichCollection(
                    channel,
                    "episodes",
                    parseQueryFlag(req.query.include_stream_urls)
                )
            );
        } catch (err) {
            next(err);
        }
    }
);

/**
 * @openapi
 * /api/v1/podcasts/episodes/{browseId}/playlist:
 *   get:
 *     summary: Get an episodes playlist, such as "New Episodes"
 *     tags: [Podcasts]
 *     responses:
 *       200:
 *         description: Playlist with enriched episodes
 */
router.get(
    "/episodes/:browseId/playlist",
    async (req: Request, res: Response, next: NextFunction) => {
        const id = browseIdSchema.safeParse(req.params.browseId);
        if (!id.success) {
            return sendValidationError(res, id.error);
        }
        const limit = limitSchema.safeParse(req.query.limit);
        if (!limit.success) {
            return sendValidationError(res, limit.error);
        }

        try {
            const playlist = await metadataProvider.getEpisodesPlaylist(id.data, limit.data);
            res.json(
                await enrichmentPipeline.enrichCollection(
                    playlist,
                    "episodes",
                    parseQueryFlag(req.query.include_stream_urls)
                )
            );
        } catch (err) {
            next(err);
        }
    }
);

/**
 * @openapi
 * /api/v1/podcasts/{browseId}:
 *   get:
 *     summary: Get a podcast and its episodes
 *     tags: [Podcasts]
 *     responses:
 *       200:
 *         description: Podcast with enriched episodes
 */
router.get("/:browseId", async (req: Request, res: Response, next: NextFunction) => {
    const id = browseIdSchema.safeParse(req.params.browseId);
    if (!id.success) {
        return sendValidationError(res, id.error);
    }
    const limit = limitSchema.safeParse(req.query.limit);
    if (!limit.success) {
        return sendValidationError(res, limit.error);
    }

    try {
        const podcast = await metadataProvider.getPodcast(id.data, limit.data);
        res.json(
            await enrichmentPipeline.enrichCollection(
                podcast,
                "episodes",
                parseQueryFlag(req.query.include_stream_urls)
            )
        );
    } catch (err) {
        next(err);
    }
});

export default router;
