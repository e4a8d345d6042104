import type Database from 'better-sqlite3';

export interface Migration {
  version: number;
  description: string;
  up: (db: Database.Database) => void;
}

function columnExists(db: Database.Database, table: string, column: string): boolean {
  const columns = db.prepare(`PRAGMA table_info(${table})`).all() as { name: string }[];
  return columns.some(c => c.name === column);
}

/**
 * Category store migrations, applied in order against PRAGMA user_version.
 * Databases created before versioning existed report version 0 and may
 * already contain some of these tables and columns.
 */
export const CATEGORY_MIGRATIONS: Migration[] = [
  {
    version: 1,
    description: 'Create categories and folders tables',
    up: db => {
      db.exec(`
        CREATE TABLE IF NOT EXISTS categories (
          id INTEGER PRIMARY KEY,
          name TEXT NOT NULL UNIQUE
        );

        CREATE TABLE IF NOT EXISTS folders (
          id INTEGER PRIMARY KEY,
          path TEXT NOT NULL UNIQUE,
          category_id INTEGER,
          FOREIGN KEY (category_id) REFERENCES categories (id)
        );

        CREATE INDEX IF NOT EXISTS idx_folders_category_id ON folders(category_id);
      `);
    },
  },
  {
    version: 2,
    description: 'Add owning user to folders',
    up: db => {
      if (!columnExists(db, 'folders', 'user_name')) {
        db.exec('ALTER TABLE folders ADD COLUMN user_name TEXT');
      }
    },
  },
];

export const CATALOG_SCHEMA = `
-- Flattened snapshot of the media server catalog
CREATE TABLE IF NOT EXISTS catalog_items (
  id INTEGER PRIMARY KEY,
  item_id TEXT NOT NULL UNIQUE,
  title TEXT NOT NULL,
  path TEXT,
  type TEXT NOT NULL,
  parent_id TEXT,
  scan_date TIMESTAMP DEFAULT CURRENT_TIMESTAMP
);

CREATE INDEX IF NOT EXISTS idx_catalog_items_parent_id ON catalog_items(parent_id);
CREATE INDEX IF NOT EXISTS idx_catalog_items_type ON catalog_items(type);
`;
