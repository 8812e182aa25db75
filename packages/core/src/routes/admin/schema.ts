import { migrate, type Db } from "@lenslink/db";
import type { HttpServer } from "../../http/http-server.js";
import { createDatabaseLogger } from "../../observability/logger.js";

export function registerSchemaRoutes(server: HttpServer, deps: { db: Db }) {
  const log = createDatabaseLogger();

  const apply = () => {
    const report = migrate(deps.db);
    if (report.applied.length > 0) {
      log.info({ applied: report.applied, version: report.version }, "Applied migrations");
    }
    return { status: "ok", applied: report.applied, version: report.version };
  };

  // Both paths are idempotent and share one ledger
  server.get("/init_db", (_req, res) => {
    res.status(200).json(apply());
  });

  server.get("/migrate_db", (_req, res) => {
    res.status(200).json(apply());
  });
}
