import { openDatabase, migrate, type Db } from "@lenslink/db";

/** Fresh in-memory database with every migration applied. */
export function createTestDb(): Db {
  const db = openDatabase(":memory:");
  migrate(db);
  return db;
}
