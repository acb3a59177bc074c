import path from "path";
import swaggerJsdoc from "swagger-jsdoc";
import { config } from "../config";

const options: swaggerJsdoc.Options = {
    definition: {
        openapi: "3.0.0",
        info: {
            title: "YouTube Music Gateway API",
            version: config.version,
            description:
                "Search, browse and podcast listings from YouTube Music with cached audio stream resolution.",
        },
        servers: [
            {
                url: `http://localhost:${config.port}`,
                description: "Development server",
            },
        ],
        components: {
            schemas: {
                StreamResponse: {
                    type: "object",
                    properties: {
                        videoId: { type: "string" },
                        url: { type: "string" },
                        title: { type: "string", nullable: true },
                        artist: { type: "string", nullable: true },
                        duration: { type: "integer", nullable: true },
                        thumbnail: { type: "string", nullable: true },
                        cached: { type: "boolean" },
                    },
                },
                CircuitBreakerStatus: {
                    type: "object",
                    properties: {
                        state: { type: "string", enum: ["CLOSED", "OPEN", "HALF_OPEN"] },
                        failureCount: { type: "integer" },
                        remainingTimeSeconds: { type: "integer" },
                        isBlocked: { type: "boolean" },
                    },
                },
                Error: {
                    type: "object",
                    properties: {
                        error: { type: "string" },
                        code: { type: "string" },
                        retryAfter: { type: "integer" },
                    },
                },
            },
        },
    },
    apis: [path.join(__dirname, "../routes/*.{ts,js}")],
};

export const swaggerSpec = swaggerJsdoc(options);
