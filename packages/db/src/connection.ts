import Database from "better-sqlite3";
import { fileURLToPath } from "node:url";

export type Db = Database.Database;

type GlobalWithDb = typeof globalThis & {
  lenslinkDb?: { url: string; db: Db };
};

/**
 * Maps a DATABASE_URL onto a SQLite file path.
 *
 * Accepted forms: `:memory:`, `sqlite::memory:`, `sqlite:///relative.db`,
 * `sqlite:////absolute.db`, `sqlite:./x.db`, `file:./x.db`, `file:///abs/x.db`
 * and bare paths. Network schemes are rejected.
 */
export function resolveDatabasePath(url: string): string {
  const value = url.trim();
  if (!value) throw new Error("DATABASE_URL is empty");
  if (value === ":memory:" || value === "sqlite::memory:" || value === "file::memory:") {
    return ":memory:";
  }
  if (value.startsWith("sqlite:///")) return value.slice("sqlite:///".length);
  if (value.startsWith("file://")) return fileURLToPath(value);
  if (value.startsWith("sqlite:")) return value.slice("sqlite:".length);
  if (value.startsWith("file:")) return value.slice("file:".length);
  if (/^[a-z][a-z0-9+.-]*:\/\//i.test(value)) {
    throw new Error(`Unsupported DATABASE_URL scheme: ${value.slice(0, value.indexOf(":"))}`);
  }
  return value;
}

export function openDatabase(url: string): Db {
  const file = resolveDatabasePath(url);
  const db = new Database(file);
  if (file !== ":memory:") db.pragma("journal_mode = WAL");
  db.pragma("foreign_keys = ON");
  return db;
}

// Shared process-wide handle, reopened only when the URL changes.
export function getDb(url: string): Db {
  const g = globalThis as GlobalWithDb;
  if (g.lenslinkDb && g.lenslinkDb.url === url && g.lenslinkDb.db.open) {
    return g.lenslinkDb.db;
  }
  const db = openDatabase(url);
  g.lenslinkDb = { url, db };
  return db;
}
