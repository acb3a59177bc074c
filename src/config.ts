import dotenv from "dotenv";
import { z } from "zod";
import { logger } from "./utils/logger";
import {
    isEnvFlagEnabled,
    parseEnvCsv,
    parseEnvInt,
} from "./utils/envParsers";

dotenv.config();

const SERVICE_NAME = "ytmusic-gateway";
const SERVICE_VERSION = "1.0.0";

const positiveIntString = (name: string) =>
    z
        .string()
        .regex(/^\d+$/, `${name} must be a positive integer`)
        .optional();

// Validate environment variables on startup
const envSchema = z
    .object({
        PORT: positiveIntString("PORT"),
        NODE_ENV: z.enum(["development", "production", "test"]).optional(),
        CACHE_BACKEND: z.enum(["memory", "redis"]).optional(),
        REDIS_URL: z.string().optional(),
        CACHE_MAX_SIZE: positiveIntString("CACHE_MAX_SIZE"),
        METADATA_TTL_SECONDS: positiveIntString("METADATA_TTL_SECONDS"),
        STREAM_URL_TTL_SECONDS: positiveIntString("STREAM_URL_TTL_SECONDS").refine(
            (value) =>
                value === undefined ||
                (Number(value) >= 7200 && Number(value) <= 14400),
            "STREAM_URL_TTL_SECONDS must be between 7200 and 14400"
        ),
        CIRCUIT_FAILURE_THRESHOLD: positiveIntString("CIRCUIT_FAILURE_THRESHOLD"),
        CIRCUIT_TIMEOUT_SECONDS: positiveIntString("CIRCUIT_TIMEOUT_SECONDS"),
        CIRCUIT_HALF_OPEN_TIMEOUT_SECONDS: positiveIntString(
            "CIRCUIT_HALF_OPEN_TIMEOUT_SECONDS"
        ),
        MAX_WORKERS: positiveIntString("MAX_WORKERS"),
        ENRICHMENT_CONCURRENCY: positiveIntString("ENRICHMENT_CONCURRENCY"),
        METADATA_PROVIDER_URL: z.string().url().optional(),
    })
    .superRefine((env, ctx) => {
        if (env.CACHE_BACKEND === "redis" && !env.REDIS_URL) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: ["REDIS_URL"],
                message: "REDIS_URL is required when CACHE_BACKEND=redis",
            });
        }
    });

try {
    envSchema.parse(process.env);
    logger.debug("Environment variables validated");
} catch (error) {
    if (error instanceof z.ZodError) {
        logger.error(" Environment validation failed:");
        error.errors.forEach((err) => {
            logger.error(`   - ${err.path.join(".")}: ${err.message}`);
        });
        logger.error(
            "\n Please check your .env file and ensure all required variables are set."
        );
        process.exit(1);
    }
    throw error;
}

export type CacheBackend = "memory" | "redis";

const cacheBackend: CacheBackend =
    process.env.CACHE_BACKEND === "redis" ? "redis" : "memory";

/** Centralized runtime configuration for the gateway. */
export const config = {
    serviceName: SERVICE_NAME,
    version: SERVICE_VERSION,
    port: parseEnvInt(process.env.PORT, 8000),
    nodeEnv: process.env.NODE_ENV || "development",
    allowedOrigins: parseEnvCsv(process.env.CORS_ORIGINS) ?? ["*"],

    cache: {
        enabled: isEnvFlagEnabled(process.env.CACHE_ENABLED, true),
        backend: cacheBackend,
        maxSize: parseEnvInt(process.env.CACHE_MAX_SIZE, 1000),
        redisUrl: process.env.REDIS_URL || "redis://127.0.0.1:6379/0",
        // Titles and artists do not change; signed stream URLs expire upstream.
        metadataTtlSeconds: parseEnvInt(process.env.METADATA_TTL_SECONDS, 86_400),
        streamUrlTtlSeconds: parseEnvInt(process.env.STREAM_URL_TTL_SECONDS, 7_200),
    },

    circuitBreaker: {
        failureThreshold: parseEnvInt(process.env.CIRCUIT_FAILURE_THRESHOLD, 2),
        timeoutSeconds: parseEnvInt(process.env.CIRCUIT_TIMEOUT_SECONDS, 600),
        halfOpenTimeoutSeconds: parseEnvInt(
            process.env.CIRCUIT_HALF_OPEN_TIMEOUT_SECONDS,
            60
        ),
    },

    extractor: {
        binaryPath: process.env.YTDLP_PATH || "yt-dlp",
        socketTimeoutSeconds: parseEnvInt(
            process.env.EXTRACTOR_SOCKET_TIMEOUT_SECONDS,
            30
        ),
        retries: parseEnvInt(process.env.EXTRACTOR_RETRIES, 3),
        timeoutMs: parseEnvInt(process.env.EXTRACTOR_TIMEOUT_MS, 90_000),
        maxWorkers: parseEnvInt(process.env.MAX_WORKERS, 10),
    },

    enrichment: {
        concurrency: parseEnvInt(process.env.ENRICHMENT_CONCURRENCY, 8),
    },

    metadataProvider: {
        baseUrl: process.env.METADATA_PROVIDER_URL || "http://127.0.0.1:8586",
        timeoutMs: parseEnvInt(process.env.METADATA_PROVIDER_TIMEOUT_MS, 30_000),
    },

    rateLimit: {
        perMinute: parseEnvInt(process.env.RATE_LIMIT_PER_MINUTE, 60),
        streamPerMinute: parseEnvInt(process.env.STREAM_RATE_LIMIT_PER_MINUTE, 20),
        searchPerMinute: parseEnvInt(process.env.SEARCH_RATE_LIMIT_PER_MINUTE, 30),
    },
};

export type AppConfig = typeof config;
