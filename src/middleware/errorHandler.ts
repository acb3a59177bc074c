import { Request, Response, NextFunction } from "express";
import { logger } from "../utils/logger";
import { AppError, ErrorCategory } from "../utils/errors";
import { config } from "../config";

export function errorHandler(
    err: Error,
    req: Request,
    res: Response,
    next: NextFunction
) {
    if (res.headersSent) {
        return next(err);
    }

    if (err instanceof AppError) {
        const retryAfter = err.retryAfterSeconds;
        if (retryAfter !== undefined) {
            res.setHeader("Retry-After", String(retryAfter));
        }

        if (err.category === ErrorCategory.FATAL || err.statusCode >= 500) {
            logger.error(`[AppError] ${err.code}: ${err.message}`, err.details);
        } else {
            logger.warn(`[AppError] ${err.code}: ${err.message}`, err.details);
        }

        return res.status(err.statusCode).json({
            error: err.message,
            code: err.code,
            category: err.category,
            ...(retryAfter !== undefined && { retryAfter }),
            ...(config.nodeEnv === "development" && { details: err.details }),
        });
    }

    logger.error(`Unhandled error on ${req.method} ${req.originalUrl}:`, err.stack);

    // In production, hide stack traces and internal details
    if (config.nodeEnv === "production") {
        return res.status(500).json({ error: "Internal server error" });
    }

    res.status(500).json({
        error: err.message || "Internal server error",
        stack: err.stack,
    });
}
