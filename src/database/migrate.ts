import type Database from 'better-sqlite3';
import { getSchemaVersion, runMigrations, LATEST_VERSION } from './migrations';

/**
 * Migrate the database to the latest schema version.
 *
 * - New database (user_version = 0): migration v1 creates the full schema.
 * - Already up-to-date (user_version = LATEST_VERSION): no-op.
 */
export function migrateDatabase(db: Database.Database): void {
  db.pragma('foreign_keys = ON');

  const currentVersion = getSchemaVersion(db);
  if (currentVersion >= LATEST_VERSION) {
    return;
  }

  runMigrations(db, currentVersion);
}
