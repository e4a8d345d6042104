import type Database from 'better-sqlite3';
import type { Migration } from './schema';
import { logger } from '../utils/logger';

export function getSchemaVersion(db: Database.Database): number {
  const version = db.pragma('user_version', { simple: true });
  return typeof version === 'number' ? version : 0;
}

/**
 * Apply every migration newer than the database's user_version.
 * Returns the versions that were applied.
 */
export function runMigrations(db: Database.Database, migrations: Migration[]): number[] {
  const applied: number[] = [];
  let current = getSchemaVersion(db);

  const pending = [...migrations]
    .sort((a, b) => a.version - b.version)
    .filter(m => m.version > current);

  for (const migration of pending) {
    migration.up(db);
    db.pragma(`user_version = ${migration.version}`);
    current = migration.version;
    applied.push(migration.version);
    logger.dim(`Migration ${migration.version} applied: ${migration.description}`);
  }

  return applied;
}
