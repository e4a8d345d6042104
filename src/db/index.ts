import Database from 'better-sqlite3';
import { AppPaths } from '../utils/paths';
import { logger } from '../utils/logger';
import { getErrorMessage, StoreError } from '../utils/errors';

export { CategoryStore } from './categories';
export { CatalogStore } from './catalog';

/**
 * Open (or create) the SQLite file shared by the category and catalog
 * stores. Pass ':memory:' for a throwaway database.
 */
export function openDatabase(dbPath: string): Database.Database {
  try {
    if (dbPath !== ':memory:') {
      AppPaths.ensureParentDir(dbPath);
    }
    const db = new Database(dbPath);
    db.pragma('journal_mode = WAL');
    db.pragma('foreign_keys = ON');
    return db;
  } catch (error: unknown) {
    logger.error(`Failed to open database: ${getErrorMessage(error)}`);
    throw new StoreError(`Could not open database at ${dbPath}`, { cause: error });
  }
}
