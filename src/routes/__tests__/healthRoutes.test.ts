import request from "supertest";

jest.mock("../../services/metadataProvider", () => ({
    metadataProvider: {
        isAvailable: jest.fn(),
    },
}));

import { metadataProvider } from "../../services/metadataProvider";
import router from "../health";
import { createRouteTestApp } from "./helpers/createRouteTestApp";

describe("health routes", () => {
    const app = createRouteTestApp("/health", router);
    const mockIsAvailable = jest.mocked(metadataProvider.isAvailable);

    it("answers liveness without touching dependencies", async () => {
        const res = await request(app).get("/health");

        expect(res.status).toBe(200);
        expect(res.body).toEqual({ status: "ok", service: "ytmusic-gateway", version: "1.0.0" });
        expect(mockIsAvailable).not.toHaveBeenCalled();
    });

    it("reports readiness from the metadata provider", async () => {
        mockIsAvailable.mockResolvedValueOnce(true).mockResolvedValueOnce(false);

        const ready = await request(app).get("/health/ready");
        const degraded = await request(app).get("/health/ready");

        expect(ready.status).toBe(200);
        expect(ready.body).toEqual({ status: "ok", checks: { metadataProvider: true } });
        expect(degraded.status).toBe(503);
        expect(degraded.body).toEqual({ status: "degraded", checks: { metadataProvider: false } });
    });
});
