import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import type { Db } from "./connection.js";

export interface Migration {
  version: number;
  name: string;
  sql: string;
}

export interface MigrationReport {
  applied: Array<{ version: number; name: string }>;
  version: number;
}

export const MIGRATIONS_DIR = fileURLToPath(new URL("../migrations/", import.meta.url));

const FILE_PATTERN = /^(\d{4})_([a-z0-9_]+)\.sql$/;

export function loadMigrations(dir: string = MIGRATIONS_DIR): Migration[] {
  const seen = new Set<number>();
  const migrations: Migration[] = [];
  for (const file of fs.readdirSync(dir).sort()) {
    const match = FILE_PATTERN.exec(file);
    if (!match) continue;
    const version = Number(match[1]);
    if (seen.has(version)) {
      throw new Error(`Duplicate migration version ${version} (${file})`);
    }
    seen.add(version);
    migrations.push({
      version,
      name: match[2],
      sql: fs.readFileSync(path.join(dir, file), "utf8"),
    });
  }
  return migrations;
}

function ensureLedger(db: Db) {
  db.exec(
    `CREATE TABLE IF NOT EXISTS schema_migrations (
       version INTEGER PRIMARY KEY,
       name TEXT NOT NULL,
       applied_at TEXT NOT NULL
     )`,
  );
}

export function currentVersion(db: Db): number {
  ensureLedger(db);
  const row = db
    .prepare<[], { version: number | null }>("SELECT MAX(version) AS version FROM schema_migrations")
    .get();
  return row?.version ?? 0;
}

/**
 * Applies every migration whose version is not yet in the ledger, in version
 * order, each inside its own transaction. Running it again is a no-op.
 */
export function migrate(db: Db, migrations: Migration[] = loadMigrations()): MigrationReport {
  ensureLedger(db);
  const done = new Set(
    db
      .prepare<[], { version: number }>("SELECT version FROM schema_migrations")
      .all()
      .map((r) => r.version),
  );
  const record = db.prepare<[number, string, string]>(
    "INSERT INTO schema_migrations (version, name, applied_at) VALUES (?, ?, ?)",
  );
  const applied: MigrationReport["applied"] = [];
  const pending = [...migrations]
    .sort((a, b) => a.version - b.version)
    .filter((m) => !done.has(m.version));
  for (const m of pending) {
    db.transaction(() => {
      db.exec(m.sql);
      record.run(m.version, m.name, new Date().toISOString());
    })();
    applied.push({ version: m.version, name: m.name });
  }
  return { applied, version: currentVersion(db) };
}
