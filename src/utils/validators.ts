import { z } from "zod";

const ID_CHARSET = /^[A-Za-z0-9_-]+$/;
const CONTROL_CHARS = /[\u0000-\u001f\u007f-\u009f]/g;

export const SEARCH_FILTERS = [
    "songs",
    "videos",
    "albums",
    "artists",
    "playlists",
    "community_playlists",
    "featured_playlists",
    "uploads",
    "podcasts",
    "episodes",
    "profiles",
] as const;

export type SearchFilter = (typeof SEARCH_FILTERS)[number];

export const videoIdSchema = z
    .string()
    .length(11, "Video ID must be exactly 11 characters")
    .regex(ID_CHARSET, "Video ID may only contain letters, digits, '-' and '_'");

export const playlistIdSchema = z
    .string()
    .min(2, "Playlist ID must be at least 2 characters")
    .regex(ID_CHARSET, "Playlist ID may only contain letters, digits, '-' and '_'")
    .transform((value) => (value.startsWith("VL") ? value.slice(2) : value));

export const browseIdSchema = z
    .string()
    .min(2, "Browse ID must be at least 2 characters")
    .regex(ID_CHARSET, "Browse ID may only contain letters, digits, '-' and '_'");

export const channelIdSchema = z
    .string()
    .length(24, "Channel ID must be exactly 24 characters")
    .startsWith("UC", "Channel ID must start with 'UC'")
    .regex(ID_CHARSET, "Channel ID may only contain letters, digits, '-' and '_'");

/** Opaque continuation/category tokens handed out by the provider. */
export const providerParamsSchema = z
    .string()
    .min(1, "params must not be empty")
    .max(512, "params must be at most 512 characters")
    .regex(/^[A-Za-z0-9_=%-]+$/, "params contains unexpected characters");

export const countrySchema = z
    .string()
    .regex(/^[A-Za-z]{2}$/, "Country must be a two-letter ISO 3166-1 code")
    .transform((value) => value.toUpperCase());

export function sanitizeString(value: string, maxLength = 1000): string {
    return value.replace(CONTROL_CHARS, "").trim().slice(0, maxLength);
}

export const searchQuerySchema = z
    .string()
    .transform((value) => sanitizeString(value))
    .pipe(
        z
            .string()
            .min(1, "Search query must not be empty")
            .max(200, "Search query must be at most 200 characters")
    );

export const limitSchema = z.coerce.number().int().min(1).max(100).default(25);

/** Query-string boolean: "true"/"1" → true, anything else → false. */
export const queryFlagSchema = z
    .union([z.string(), z.boolean()])
    .optional()
    .transform((value) => value === true || value === "true" || value === "1");

export const batchRequestSchema = z.object({
    videoIds: z
        .array(videoIdSchema)
        .min(1, "At least one video ID is required")
        .max(50, "At most 50 video IDs per batch"),
});

export function parseQueryFlag(value: unknown): boolean {
    const result = queryFlagSchema.safeParse(value);
    return result.success && result.data;
}
