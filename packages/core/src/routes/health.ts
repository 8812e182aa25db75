import type { HttpServer } from "../http/http-server.js";
import { errorMessage } from "../internal/errors.js";

export function registerHealthRoutes(
  server: HttpServer,
  ctx: {
    version: string;
    checkDb?: () => Promise<void> | void;
  },
) {
  // GET /health
  server.get("/health", (_req, res) => {
    res.status(200).json({ status: "ok", version: ctx.version });
  });

  // GET /health/live
  server.get("/health/live", (_req, res) => {
    res.status(200).json({ status: "alive" });
  });

  // GET /health/ready
  server.get("/health/ready", async (_req, res) => {
    const results: Record<string, "ok" | "error"> = { db: "ok" };
    const checks: Array<[key: string, fn: (() => Promise<void> | void) | undefined]> = [
      ["db", ctx.checkDb],
    ];
    const errors: string[] = [];
    for (const [key, fn] of checks) {
      if (!fn) continue;
      try {
        await fn();
      } catch (e) {
        results[key] = "error";
        errors.push(errorMessage(e));
      }
    }
    const allOk = Object.values(results).every((v) => v === "ok");
    if (allOk) {
      res.status(200).json({ status: "ready", components: results });
    } else {
      res.status(503).json({
        status: "error",
        code: "NOT_READY",
        message: "One or more dependencies are not ready",
        components: results,
        details: { errors },
      });
    }
  });
}
