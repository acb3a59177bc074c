import rateLimit from "express-rate-limit";
import { config } from "../config";

// Proxy validation is off; deployments set "trust proxy" themselves when
// they sit behind a reverse proxy.
const trustProxyValidation = { validate: { trustProxy: false } };

// General API rate limiter, per IP
export const apiLimiter = rateLimit({
    windowMs: 1 * 60 * 1000,
    max: config.rateLimit.perMinute,
    message: { error: "Too many requests from this IP, please try again later." },
    standardHeaders: true, // Return rate limit info in the `RateLimit-*` headers
    legacyHeaders: false, // Disable the `X-RateLimit-*` headers
    skip: (req) => req.path === "/health" || req.path === "/health/ready",
    ...trustProxyValidation,
});

// Stream resolution spawns the extractor, so it gets a tighter budget
export const streamLimiter = rateLimit({
    windowMs: 1 * 60 * 1000,
    max: config.rateLimit.streamPerMinute,
    message: { error: "Too many stream requests, please slow down." },
    standardHeaders: true,
    legacyHeaders: false,
    ...trustProxyValidation,
});

export const searchLimiter = rateLimit({
    windowMs: 1 * 60 * 1000,
    max: config.rateLimit.searchPerMinute,
    message: { error: "Too many search requests, please slow down." },
    standardHeaders: true,
    legacyHeaders: false,
    ...trustProxyValidation,
});
