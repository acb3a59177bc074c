/**
 * Shared ioredis connection factory
 *
 * Every Redis connection in the gateway goes through here so reconnect
 * backoff, timeouts and lifecycle logging behave the same way.
 *
 * Usage:
 *   import { createIORedisClient } from "../utils/ioredis";
 *   const redis = createIORedisClient("stream-cache");
 */

import Redis, { RedisOptions } from "ioredis";
import { logger } from "./logger";
import { config } from "../config";

const MAX_RETRY_DELAY_MS = 30_000;
const BASE_RETRY_DELAY_MS = 250;

/** Exponential backoff: 250ms → 500ms → 1s → 2s → … capped at 30s */
export function reconnectDelayMs(times: number): number {
    return Math.min(
        BASE_RETRY_DELAY_MS * Math.pow(2, times - 1),
        MAX_RETRY_DELAY_MS,
    );
}

/**
 * Create an ioredis client with built-in retry logic.
 *
 * @param label - Human-readable label used in log messages (e.g. "stream-cache")
 * @param overrides - Any per-instance ioredis option overrides
 */
export function createIORedisClient(
    label: string,
    overrides: Partial<RedisOptions> = {},
    url: string = config.cache.redisUrl,
): Redis {
    const client = new Redis(url, {
        retryStrategy(times: number) {
            const delay = reconnectDelayMs(times);
            logger.debug(
                `[ioredis:${label}] Reconnect attempt ${times} – retrying in ${delay}ms`,
            );
            return delay;
        },

        maxRetriesPerRequest: 3,
        connectTimeout: 10_000,
        enableReadyCheck: true,
        // Cache reads must fail fast while disconnected so they degrade to a miss.
        enableOfflineQueue: false,
        lazyConnect: false,

        ...overrides,
    });

    client.on("error", (err: Error) => {
        logger.error(`[ioredis:${label}] Error: ${err.message}`);
    });

    client.on("close", () => {
        logger.debug(`[ioredis:${label}] Connection closed`);
    });

    client.on("reconnecting", (ms: number) => {
        logger.debug(`[ioredis:${label}] Reconnecting in ${ms}ms...`);
    });

    client.on("ready", () => {
        logger.info(`[ioredis:${label}] Ready`);
    });

    return client;
}
