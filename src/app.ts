import express, { Express } from "express";
import helmet from "helmet";
import cors from "cors";
import compression from "compression";
import swaggerUi from "swagger-ui-express";
import { config } from "./config";
import { logger } from "./utils/logger";
import { apiLimiter } from "./middleware/rateLimiter";
import { errorHandler } from "./middleware/errorHandler";
import { swaggerSpec } from "./config/swagger";
import healthRoutes from "./routes/health";
import streamRoutes from "./routes/stream";
import searchRoutes from "./routes/search";
import browseRoutes from "./routes/browse";
import podcastRoutes from "./routes/podcasts";
import exploreRoutes from "./routes/explore";
import statsRoutes from "./routes/stats";

function isOriginAllowed(origin: string): boolean {
    return config.allowedOrigins.includes("*") || config.allowedOrigins.includes(origin);
}

export function createApp(): Express {
    const app = express();

    app.use(
        helmet({
            crossOriginResourcePolicy: { policy: "cross-origin" },
        })
    );
    app.use(
        cors({
            origin: (origin, callback) => {
                // Requests without an Origin header (curl, server-to-server) pass
                if (!origin || isOriginAllowed(origin)) {
                    callback(null, true);
                    return;
                }
                logger.debug(`[CORS] Rejected origin ${origin}`);
                callback(null, false);
            },
        })
    );
    app.use(compression({ threshold: 1024 }));
    app.use(express.json({ limit: "100kb" }));

    app.use("/health", healthRoutes);

    app.use("/api/v1/stream", apiLimiter, streamRoutes);
    app.use("/api/v1/search", apiLimiter, searchRoutes);
    app.use("/api/v1/podcasts", apiLimiter, podcastRoutes);
    app.use("/api/v1/explore", apiLimiter, exploreRoutes);
    app.use("/api/v1/stats", apiLimiter, statsRoutes);
    app.use("/api/v1", apiLimiter, browseRoutes);

    app.use(
        "/api/docs",
        swaggerUi.serve,
        swaggerUi.setup(swaggerSpec, {
            customCss: ".swagger-ui .topbar { display: none }",
            customSiteTitle: "YouTube Music Gateway API",
        })
    );
    app.get("/api/docs.json", (_req, res) => {
        res.json(swaggerSpec);
    });

    app.use((_req, res) => {
        res.status(404).json({ error: "Not found" });
    });

    app.use(errorHandler);

    return app;
}
