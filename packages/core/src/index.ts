import { pathToFileURL } from "node:url";
import { getDb, migrate, type Db } from "@lenslink/db";
import { loadConfig, type AppConfig } from "./config/config.js";
import { logger, configureLogger, createDatabaseLogger } from "./observability/logger.js";
import { createExpressServer } from "./http/express-server.js";
import type { HttpServer } from "./http/http-server.js";
import { resolveCredentialEncryption } from "./crypto/credential-encryption.js";
import { SqliteProviderConfigRegistry } from "./providers/provider-config-registry.js";
import { SqliteLinkRegistry } from "./links/link-registry.js";
import { SqliteCaptureStore } from "./captures/capture-store.js";
import { CaptureIngestion } from "./captures/ingestion.js";
import { createStorageAdapters } from "./storage/dispatch.js";
import type { StorageAdapters } from "./storage/types.js";
import { registerHealthRoutes } from "./routes/health.js";
import { registerCaptureRoutes } from "./routes/capture.js";
import { registerProviderConfigRoutes } from "./routes/admin/provider-configs.js";
import { registerLinkRoutes } from "./routes/admin/links.js";
import { registerCaptureAdminRoutes } from "./routes/admin/captures.js";
import { registerSchemaRoutes } from "./routes/admin/schema.js";

export const VERSION = "0.1.0";

export interface AppDeps {
  db: Db;
  config: AppConfig;
  /** Defaults to the real provider adapters. */
  adapters?: StorageAdapters;
}

/** Builds the registries and pipeline and mounts every route on `server`. */
export function registerApp(server: HttpServer, deps: AppDeps) {
  const { db, config } = deps;
  const configs = new SqliteProviderConfigRegistry(db, {
    encryption: resolveCredentialEncryption(config),
  });
  const links = new SqliteLinkRegistry(db, { configs });
  const captures = new SqliteCaptureStore(db);
  const adapters = deps.adapters ?? createStorageAdapters({ timeoutMs: config.PROVIDER_TIMEOUT_MS });
  const pipeline = new CaptureIngestion({ links, configs, captures, adapters });

  registerHealthRoutes(server, {
    version: VERSION,
    checkDb: () => {
      db.prepare("SELECT 1").get();
    },
  });
  registerCaptureRoutes(server, {
    links,
    pipeline,
    secretKey: config.SECRET_KEY,
    ticketTtlSeconds: config.CAPTURE_TICKET_TTL_SEC,
  });
  registerProviderConfigRoutes(server, { configs });
  registerLinkRoutes(server, { links, pipeline, publicBaseUrl: config.PUBLIC_BASE_URL });
  registerCaptureAdminRoutes(server, { captures, pipeline });
  registerSchemaRoutes(server, { db });
  return { configs, links, captures, pipeline };
}

export async function main() {
  const config = loadConfig();
  configureLogger({ level: config.LOG_LEVEL, pretty: config.LOG_PRETTY });

  const db = getDb(config.DATABASE_URL);
  const report = migrate(db);
  createDatabaseLogger().info(
    { applied: report.applied.map((m) => `${m.version}_${m.name}`), version: report.version },
    "Database schema ready",
  );

  const server = createExpressServer({ maxUploadBytes: config.UPLOAD_MAX_BYTES });
  registerApp(server, { db, config });
  await server.listen(config.PORT);
  logger.info({ port: config.PORT }, "HTTP server listening");
}

// Only run when executed directly
const entry = process.argv[1];
if (entry && import.meta.url === pathToFileURL(entry).href) {
  main().catch((err: unknown) => {
    logger.error({ err }, "Failed to start");
    process.exit(1);
  });
}
