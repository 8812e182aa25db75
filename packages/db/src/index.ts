export { openDatabase, getDb, resolveDatabasePath, type Db } from "./connection.js";
export {
  migrate,
  loadMigrations,
  currentVersion,
  MIGRATIONS_DIR,
  type Migration,
  type MigrationReport,
} from "./migrate.js";
