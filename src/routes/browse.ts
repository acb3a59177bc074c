/**
 * Browse Routes
 *
 * Home feed, artists, songs, albums, playlists, lyrics and watch radio from
 * the metadata provider.
 * Track lists go through the enrichment pipeline; pass
 * `include_stream_urls=true` to resolve stream URLs as well.
 */

import { Router, Request, Response, NextFunction } from "express";
import { z } from "zod";
import { metadataProvider } from "../services/metadataProvider";
import { enrichmentPipeline } from "../services/enrichment";
import { isRecord } from "../utils/guards";
import {
    browseIdSchema,
    channelIdSchema,
    limitSchema,
    parseQueryFlag,
    playlistIdSchema,
    providerParamsSchema,
    queryFlagSchema,
    videoIdSchema,
} from "../utils/validators";
import { sendRouteError, sendValidationError } from "./routeErrorResponse";

const router = Router();

const HOME_DEFAULT_LIMIT = 3;

const watchParamsSchema = z.object({
    video_id: videoIdSchema.optional(),
    playlist_id: playlistIdSchema.optional(),
    limit: limitSchema,
    radio: queryFlagSchema,
    shuffle: queryFlagSchema,
});

/**
 * @openapi
 * /api/v1/songs/{videoId}:
 *   get:
 *     summary: Get song details
 *     tags: [Browse]
 *     responses:
 *       200:
 *         description: Song details with best thumbnail and optional stream URL
 *       404:
 *         description: Song not found
 */
router.get("/songs/:videoId", async (req: Request, res: Response, next: NextFunction) => {
    const parsed = videoIdSchema.safeParse(req.params.videoId);
    if (!parsed.success) {
        return sendValidationError(res, parsed.error);
    }

    try {
        const song = await metadataProvider.getSong(parsed.data);
        const [enriched] = await enrichmentPipeline.enrich(
            [{ videoId: parsed.data, ...song }],
            parseQueryFlag(req.query.include_stream_urls)
        );
        res.json(enriched);
    } catch (err) {
        next(err);
    }
});

/**
 * @openapi
 * /api/v1/albums/{browseId}:
 *   get:
 *     summary: Get an album and its tracks
 *     tags: [Browse]
 *     responses:
 *       200:
 *         description: Album with enriched tracks
 */
router.get("/albums/:browseId", async (req: Request, res: Response, next: NextFunction) => {
    const parsed = browseIdSchema.safeParse(req.params.browseId);
    if (!parsed.success) {
        return sendValidationError(res, parsed.error);
    }

    try {
        const album = await metadataProvider.getAlbum(parsed.data);
        res.json(
            await enrichmentPipeline.enrichCollection(
                album,
                "tracks",
                parseQueryFlag(req.query.include_stream_urls)
            )
        );
    } catch (err) {
        next(err);
    }
});

/**
 * @openapi
 * /api/v1/playlists/{playlistId}:
 *   get:
 *     summary: Get a playlist and its tracks
 *     tags: [Browse]
 *     parameters:
 *       - in: query
 *         name: limit
 *         schema: { type: integer, minimum: 1, maximum: 100, default: 25 }
 *     responses:
 *       200:
 *         description: Playlist with enriched tracks
 */
router.get(
    "/playlists/:playlistId",
    async (req: Request, res: Response, next: NextFunction) => {
        const id = playlistIdSchema.safeParse(req.params.playlistId);
        if (!id.success) {
            return sendValidationError(res, id.error);
        }
        const limit = limitSchema.safeParse(req.query.limit);
        if (!limit.success) {
            return sendValidationError(res, limit.error);
        }

        try {
            const playlist = await metadataProvider.getPlaylist(id.data, limit.data);
            res.json(
                await enrichmentPipeline.enrichCollection(
                    playlist,
                    "tracks",
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
 * /api/v1/watch:
 *   get:
 *     summary: Get the watch playlist (up next / radio) for a video or playlist
 *     tags: [Browse]
 *     parameters:
 *       - in: query
 *         name: video_id
 *         schema: { type: string }
 *       - in: query
 *         name: playlist_id
 *         schema: { type: string }
 *     responses:
 *       200:
 *         description: Watch playlist with enriched tracks
 *       400:
 *         description: Neither video_id nor playlist_id given
 */
router.get("/watch", async (req: Request, res: Response, next: NextFunction) => {
    const parsed = watchParamsSchema.safeParse(req.query);
    if (!parsed.success) {
        return sendValidationError(res, parsed.error);
    }
    const { video_id, playlist_id, limit, radio, shuffle } = parsed.data;
    if (!video_id && !playlist_id) {
        return sendRouteError(res, 400, "Either video_id or playlist_id is required");
    }

    try {
        const watch = await metadataProvider.getWatchPlaylist({
            videoId: video_id,
            playlistId: playlist_id,
            limit,
            radio,
            shuffle,
        });
        res.json(
            await enrichmentPipeline.enrichCollection(
                watch,
                "tracks",
                parseQueryFlag(req.query.include_stream_urls)
            )
        );
    } catch (err) {
        next(err);
    }
});

/**
 * @openapi
 * /api/v1/home:
 *   get:
 *     summary: Home feed shelves
 *     tags: [Browse]
 *     parameters:
 *       - in: query
 *         name: limit
 *         description: Number of shelves
 *         schema: { type: integer, minimum: 1, maximum: 100, default: 3 }
 *     responses:
 *       200:
 *         description: Shelves whose contents carry thumbnails and optional stream URLs
 */
router.get("/home", async (req: Request, res: Response, next: NextFunction) => {
    const limit = limitSchema.default(HOME_DEFAULT_LIMIT).safeParse(req.query.limit);
    if (!limit.success) {
        return sendValidationError(res, limit.error);
    }

    try {
        const sections = await metadataProvider.getHome(limit.data);
        res.json({
            sections: await enrichmentPipeline.enrichSections(
                sections,
                "contents",
                parseQueryFlag(req.query.include_stream_urls)
            ),
        });
    } catch (err) {
        next(err);
    }
});

/**
 * @openapi
 * /api/v1/artists/{channelId}:
 *   get:
 *     summary: Get an artist page
 *     tags: [Browse]
 *     responses:
 *       200:
 *         description: Artist with enriched top songs
 */
router.get("/artists/:channelId", async (req: Request, res: Response, next: NextFunction) => {
    const parsed = channelIdSchema.safeParse(req.params.channelId);
    if (!parsed.success) {
        return sendValidationError(res, parsed.error);
    }

    try {
        const artist = await metadataProvider.getArtist(parsed.data);
        const songs = artist.songs;
        if (!isRecord(songs)) {
            return res.json(artist);
        }
        res.json({
            ...artist,
            songs: await enrichmentPipeline.enrichCollection(
                songs,
                "results",
                parseQueryFlag(req.query.include_stream_urls)
            ),
        });
    } catch (err) {
        next(err);
    }
});

/**
 * @openapi
 * /api/v1/artists/{channelId}/albums:
 *   get:
 *     summary: Full album or single list of an artist
 *     tags: [Browse]
 *     parameters:
 *       - in: query
 *         name: params
 *         description: Token from the artist page's albums or singles shelf
 *         schema: { type: string }
 *     responses:
 *       200:
 *         description: Albums with thumbnails
 */
router.get(
    "/artists/:channelId/albums",
    async (req: Request, res: Response, next: NextFunction) => {
        const id = channelIdSchema.safeParse(req.params.channelId);
        if (!id.success) {
            return sendValidationError(res, id.error);
        }
        const params = providerParamsSchema.optional().safeParse(req.query.params);
        if (!params.success) {
            return sendValidationError(res, params.error);
        }

        try {
            const albums = await metadataProvider.getArtistAlbums(id.data, params.data);
            res.json({
                channelId: id.data,
                albums: await enrichmentPipeline.enrich(albums, false),
            });
        } catch (err) {
            next(err);
        }
    }
);

/**
 * @openapi
 * /api/v1/albums/{audioPlaylistId}/browse-id:
 *   get:
 *     summary: Resolve an album's audio playlist id (OLAK5uy_...) to its browse id
 *     tags: [Browse]
 *     responses:
 *       200:
 *         description: The album browse id
 *       404:
 *         description: Album not found
 */
router.get(
    "/albums/:audioPlaylistId/browse-id",
    async (req: Request, res: Response, next: NextFunction) => {
        const parsed = browseIdSchema.safeParse(req.params.audioPlaylistId);
        if (!parsed.success) {
            return sendValidationError(res, parsed.error);
        }

        try {
            const browseId = await metadataProvider.getAlbumBrowseId(parsed.data);
            if (!browseId) {
                return sendRouteError(res, 404, "Album not found");
            }
            res.json({ audioPlaylistId: parsed.data, browseId });
        } catch (err) {
            next(err);
        }
    }
);

/**
 * @openapi
 * /api/v1/songs/{videoId}/related:
 *   get:
 *     summary: Related content shelves for a song
 *     tags: [Browse]
 *     responses:
 *       200:
 *         description: Shelves with enriched contents
 */
router.get(
    "/songs/:videoId/related",
    async (req: Request, res: Response, next: NextFunction) => {
        const parsed = videoIdSchema.safeParse(req.params.videoId);
        if (!parsed.success) {
            return sendValidationError(res, parsed.error);
        }

        try {
            const sections = await metadataProvider.getSongRelated(parsed.data);
            res.json({
                videoId: parsed.data,
                sections: await enrichmentPipeline.enrichSections(
                    sections,
                    "contents",
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
 * /api/v1/lyrics/{browseId}:
 *   get:
 *     summary: Lyrics for a song
 *     description: The browse id comes from the song's watch playlist (`lyrics` field).
 *     tags: [Browse]
 *     responses:
 *       200:
 *         description: Lyrics text and source
 */
router.get("/lyrics/:browseId", async (req: Request, res: Response, next: NextFunction) => {
    const parsed = browseIdSchema.safeParse(req.params.browseId);
    if (!parsed.success) {
        return sendValidationError(res, parsed.error);
    }

    try {
        res.json(await metadataProvider.getLyrics(parsed.data));
    } catch (err) {
        next(err);
    }
});

export default router;
