import { Router, Request, Response } from "express";
import { config } from "../config";
import { metadataProvider } from "../services/metadataProvider";

const router = Router();

/**
 * @openapi
 * /health:
 *   get:
 *     summary: Liveness check
 *     tags: [Operations]
 *     responses:
 *       200:
 *         description: Service is running
 */
router.get("/", (_req: Request, res: Response) => {
    res.json({ status: "ok", service: config.serviceName, version: config.version });
});

/**
 * @openapi
 * /health/ready:
 *   get:
 *     summary: Readiness check, including metadata provider reachability
 *     tags: [Operations]
 *     responses:
 *       200:
 *         description: Ready
 *       503:
 *         description: Metadata provider unreachable
 */
router.get("/ready", async (_req: Request, res: Response) => {
    const metadataProviderUp = await metadataProvider.isAvailable();
    res.status(metadataProviderUp ? 200 : 503).json({
        status: metadataProviderUp ? "ok" : "degraded",
        checks: { metadataProvider: metadataProviderUp },
    });
});

export default router;
