import { describe, it, expect } from "vitest";
import { registerHealthRoutes } from "../routes/health.js";
import { createRouteHarness } from "../../tests/helpers/server.js";
import { createResponseCapture } from "../../tests/helpers/response.js";

describe("health routes", () => {
  it("GET /health returns ok status and version", async () => {
    const harness = createRouteHarness();
    registerHealthRoutes(harness.server, { version: "1.2.3" });
    const rc = createResponseCapture();

    await harness.handler("GET", "/health")({}, rc.res);

    expect(rc.status).toBe(200);
    expect(rc.body).toEqual({ status: "ok", version: "1.2.3" });
  });

  it("GET /health/live responds 200", async () => {
    const harness = createRouteHarness();
    registerHealthRoutes(harness.server, { version: "1.2.3" });
    const rc = createResponseCapture();

    await harness.handler("GET", "/health/live")({}, rc.res);

    expect(rc.status).toBe(200);
    expect(rc.body).toEqual({ status: "alive" });
  });

  it("GET /health/ready responds 200 when the database check passes", async () => {
    const harness = createRouteHarness();
    registerHealthRoutes(harness.server, { version: "1.2.3", checkDb: () => {} });
    const rc = createResponseCapture();

    await harness.handler("GET", "/health/ready")({}, rc.res);

    expect(rc.status).toBe(200);
    expect(rc.body).toEqual({ status: "ready", components: { db: "ok" } });
  });

  it("GET /health/ready responds 503 when the database check fails", async () => {
    const harness = createRouteHarness();
    registerHealthRoutes(harness.server, {
      version: "1.2.3",
      checkDb: async () => {
        throw new Error("database is locked");
      },
    });
    const rc = createResponseCapture();

    await harness.handler("GET", "/health/ready")({}, rc.res);

    expect(rc.status).toBe(503);
    expect(rc.body).toEqual({
      status: "error",
      code: "NOT_READY",
      message: "One or more dependencies are not ready",
      components: { db: "error" },
      details: { errors: ["database is locked"] },
    });
  });
});
