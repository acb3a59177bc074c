import type { Server } from "http";
import { config } from "./config";
import { logger } from "./utils/logger";
import { createApp } from "./app";
import { streamCache } from "./cache";
import { ytDlpExtractor } from "./services/extractor";

const HTTP_SERVER_CLOSE_TIMEOUT_MS = 10_000;
const EXTRACTOR_DRAIN_TIMEOUT_MS = 15_000;

const app = createApp();
let isShuttingDown = false;

const server: Server = app.listen(config.port, () => {
    logger.info(
        `[Startup] ${config.serviceName} v${config.version} listening on :${config.port} ` +
            `(cache=${config.cache.enabled ? config.cache.backend : "disabled"}, workers=${config.extractor.maxWorkers})`
    );
});

function withTimeout(task: Promise<void>, timeoutMs: number, label: string): Promise<void> {
    return new Promise<void>((resolve, reject) => {
        const timer = setTimeout(() => {
            logger.warn(`[Shutdown] ${label} timed out after ${timeoutMs}ms`);
            resolve();
        }, timeoutMs);
        task.then(
            () => {
                clearTimeout(timer);
                resolve();
            },
            (error: unknown) => {
                clearTimeout(timer);
                reject(error);
            }
        );
    });
}

function closeHttpServer(): Promise<void> {
    return new Promise<void>((resolve, reject) => {
        server.close((error) => (error ? reject(error) : resolve()));
        server.closeIdleConnections();
    });
}

async function gracefulShutdown(signal: string) {
    if (isShuttingDown) {
        logger.debug("Shutdown already in progress...");
        return;
    }

    isShuttingDown = true;
    logger.info(`Received ${signal}. Starting graceful shutdown...`);

    try {
        await withTimeout(closeHttpServer(), HTTP_SERVER_CLOSE_TIMEOUT_MS, "HTTP server close");
        await withTimeout(ytDlpExtractor.drain(), EXTRACTOR_DRAIN_TIMEOUT_MS, "Extractor drain");

        logger.debug("Closing cache store...");
        await streamCache.close();

        logger.info("Graceful shutdown complete");
        process.exit(0);
    } catch (error) {
        logger.error("Error during shutdown:", error);
        process.exit(1);
    }
}

process.on("SIGTERM", () => {
    void gracefulShutdown("SIGTERM");
});
process.on("SIGINT", () => {
    void gracefulShutdown("SIGINT");
});

process.on("unhandledRejection", (reason) => {
    logger.error("Unhandled Promise Rejection:", {
        reason: reason instanceof Error ? reason.message : String(reason),
        stack: reason instanceof Error ? reason.stack : undefined,
    });
});

process.on("uncaughtException", (error) => {
    logger.error("Uncaught Exception - initiating graceful shutdown:", {
        message: error.message,
        stack: error.stack,
    });
    gracefulShutdown("uncaughtException").catch(() => {
        process.exit(1);
    });
});
