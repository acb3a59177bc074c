/**
 * Explore Routes
 *
 * Public discovery content: charts, moods and genres, and the home feed.
 * Chart songs go through the enrichment pipeline like any other track list.
 */

import { Router, Request, Response, NextFunction } from "express";
import { z } from "zod";
import { metadataProvider } from "../services/metadataProvider";
import { enrichmentPipeline, type EnrichedItem } from "../services/enrichment";
import { readRecords, type UnknownRecord } from "../utils/guards";
import {
    countrySchema,
    parseQueryFlag,
    providerParamsSchema,
    queryFlagSchema,
    searchQuerySchema,
} from "../utils/validators";
import { sendRouteError, sendValidationError } from "./routeErrorResponse";

const router = Router();

const EXPLORE_HOME_LIMIT = 6;
const MOOD_SEARCH_LIMIT = 25;

const moodQuerySchema = z.object({
    genre_name: searchQuerySchema.optional(),
    use_search: queryFlagSchema,
});

interface ChartLists {
    topSongs: EnrichedItem[];
    trending: EnrichedItem[];
}

/**
 * Splits a charts payload into top songs and trending. Older provider
 * responses only carry `videos`; without a trending list the top songs
 * stand in for it.
 */
async function enrichCharts(charts: UnknownRecord, includeStreams: boolean): Promise<ChartLists> {
    const topSongs = readRecords(charts, "top_songs");
    const songs = topSongs.length > 0 ? topSongs : readRecords(charts, "videos");
    const listedTrending = readRecords(charts, "trending");
    const trending = listedTrending.length > 0 ? listedTrending : songs;

    // one pass so an id in both lists is resolved once
    const enriched = await enrichmentPipeline.enrich([...songs, ...trending], includeStreams);
    return {
        topSongs: enriched.slice(0, songs.length),
        trending: enriched.slice(songs.length),
    };
}

/**
 * @openapi
 * /api/v1/explore:
 *   get:
 *     summary: Moods, home shelves and charts in one response
 *     tags: [Explore]
 *     parameters:
 *       - in: query
 *         name: include_stream_urls
 *         schema: { type: boolean, default: false }
 *     responses:
 *       200:
 *         description: Mood categories, home sections and chart songs
 */
router.get("/", async (req: Request, res: Response, next: NextFunction) => {
    const includeStreams = parseQueryFlag(req.query.include_stream_urls);

    try {
        const [categories, home, charts] = await Promise.all([
            metadataProvider.getMoodCategories(),
            metadataProvider.getHome(EXPLORE_HOME_LIMIT),
            metadataProvider.getCharts(),
        ]);
        res.json({
            moods: categories,
            home: await enrichmentPipeline.enrichSections(home, "contents", false),
            charts: await enrichCharts(charts, includeStreams),
        });
    } catch (err) {
        next(err);
    }
});

/**
 * @openapi
 * /api/v1/explore/moods:
 *   get:
 *     summary: Mood and genre categories, each with the params for its playlists
 *     tags: [Explore]
 *     responses:
 *       200:
 *         description: Categories grouped by section
 */
router.get("/moods", async (_req: Request, res: Response, next: NextFunction) => {
    try {
        res.json({ categories: await metadataProvider.getMoodCategories() });
    } catch (err) {
        next(err);
    }
});

const moodPlaylists = async (req: Request, res: Response, next: NextFunction) => {
    const params = providerParamsSchema.safeParse(req.params.params);
    if (!params.success) {
        return sendValidationError(res, params.error);
    }
    const query = moodQuerySchema.safeParse(req.query);
    if (!query.success) {
        return sendValidationError(res, query.error);
    }
    const { genre_name: genreName, use_search: useSearch } = query.data;
    if (useSearch && !genreName) {
        return sendRouteError(res, 400, "genre_name is required when use_search is set");
    }

    try {
        if (!useSearch) {
            const playlists = await metadataProvider.getMoodPlaylists(params.data);
            if (playlists.length > 0 || !genreName) {
                return res.json({
                    params: params.data,
                    method: "direct",
                    playlists: await enrichmentPipeline.enrich(playlists, false),
                });
            }
        }

        // genreName is set on every path that reaches here
        const results = await metadataProvider.search(
            genreName ?? "",
            "playlists",
            MOOD_SEARCH_LIMIT
        );
        res.json({
            params: params.data,
            method: "search",
            genreName,
            playlists: await enrichmentPipeline.enrich(results, false),
        });
    } catch (err) {
        next(err);
    }
};

/**
 * @openapi
 * /api/v1/explore/moods/{params}:
 *   get:
 *     summary: Playlists for a mood or genre
 *     description: >
 *       Falls back to a playlist search for `genre_name` when the category
 *       comes back empty, or straight away with `use_search=true`.
 *     tags: [Explore]
 *     parameters:
 *       - in: path
 *         name: params
 *         required: true
 *         schema: { type: string }
 *       - in: query
 *         name: genre_name
 *         schema: { type: string }
 *       - in: query
 *         name: use_search
 *         schema: { type: boolean, default: false }
 *     responses:
 *       200:
 *         description: Playlists and the method used to find them
 *       400:
 *         description: Invalid params, or use_search without genre_name
 * /api/v1/explore/category/{params}:
 *   get:
 *     summary: Alias of /api/v1/explore/moods/{params}
 *     tags: [Explore]
 *     responses:
 *       200:
 *         description: Playlists and the method used to find them
 */
router.get("/moods/:params", moodPlaylists);
router.get("/category/:params", moodPlaylists);

/**
 * @openapi
 * /api/v1/explore/charts:
 *   get:
 *     summary: Top songs and trending for a country, or globally
 *     tags: [Explore]
 *     parameters:
 *       - in: query
 *         name: country
 *         schema: { type: string, example: US }
 *       - in: query
 *         name: include_stream_urls
 *         schema: { type: boolean, default: false }
 *     responses:
 *       200:
 *         description: Chart songs with thumbnails and optional stream URLs
 */
router.get("/charts", async (req: Request, res: Response, next: NextFunction) => {
    const country = countrySchema.optional().safeParse(req.query.country);
    if (!country.success) {
        return sendValidationError(res, country.error);
    }

    try {
        const charts = await metadataProvider.getCharts(country.data);
        const { topSongs, trending } = await enrichCharts(
            charts,
            parseQueryFlag(req.query.include_stream_urls)
        );
        res.json({ country: country.data ?? "global", topSongs, trending });
    } catch (err) {
        next(err);
    }
});

export default router;
