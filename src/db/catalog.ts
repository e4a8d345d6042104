import type Database from 'better-sqlite3';
import { CATALOG_SCHEMA } from './schema';
import { guardStore } from './guard';
import type { CatalogItem, CatalogItemInput, TypeCount } from '../types';

const ITEM_COLUMNS = 'item_id, title, path, type, parent_id, scan_date';

/**
 * Local mirror of the media server's catalog. Parent links are plain
 * strings: a child may point at a parent that was never stored.
 */
export class CatalogStore {
  constructor(private readonly db: Database.Database) {
    guardStore('initialize catalog table', () => this.db.exec(CATALOG_SCHEMA));
  }

  clear(): number {
    return guardStore('clear catalog', () => this.db.prepare('DELETE FROM catalog_items').run().changes);
  }

  upsertItem(item: CatalogItemInput): void {
    guardStore('store catalog item', () => {
      this.db
        .prepare(
          `
          INSERT OR REPLACE INTO catalog_items (item_id, title, path, type, parent_id, scan_date)
          VALUES (?, ?, ?, ?, ?, CURRENT_TIMESTAMP)
        `
        )
        .run(item.item_id, item.title, item.path, item.type, item.parent_id);
    });
  }

  getItem(itemId: string): CatalogItem | null {
    return guardStore('read catalog item', () => {
      const row = this.db
        .prepare(`SELECT ${ITEM_COLUMNS} FROM catalog_items WHERE item_id = ?`)
        .get(itemId);
      return (row as CatalogItem | undefined) ?? null;
    });
  }

  count(): number {
    return guardStore('count catalog items', () => {
      const result = this.db.prepare('SELECT COUNT(*) as count FROM catalog_items').get() as {
        count: number;
      };
      return result.count;
    });
  }

  countByType(): TypeCount[] {
    return guardStore('count catalog items', () => {
      return this.db
        .prepare(
          `
          SELECT type, COUNT(*) as count
          FROM catalog_items
          GROUP BY type
          ORDER BY count DESC, type
        `
        )
        .all() as TypeCount[];
    });
  }

  listTypes(): string[] {
    return guardStore('list catalog types', () => {
      const rows = this.db
        .prepare('SELECT DISTINCT type FROM catalog_items ORDER BY type')
        .all() as { type: string }[];
      return rows.map(r => r.type);
    });
  }

  childrenOf(parentId: string): CatalogItem[] {
    return guardStore('list catalog items', () => {
      return this.db
        .prepare(`SELECT ${ITEM_COLUMNS} FROM catalog_items WHERE parent_id = ? ORDER BY title`)
        .all(parentId) as CatalogItem[];
    });
  }

  rootItems(): CatalogItem[] {
    return guardStore('list catalog items', () => {
      return this.db
        .prepare(
          `
          SELECT ${ITEM_COLUMNS} FROM catalog_items
          WHERE parent_id IS NULL OR parent_id = ''
          ORDER BY title
        `
        )
        .all() as CatalogItem[];
    });
  }

  itemsByType(type: string): CatalogItem[] {
    return guardStore('list catalog items', () => {
      return this.db
        .prepare(`SELECT ${ITEM_COLUMNS} FROM catalog_items WHERE type = ? ORDER BY title`)
        .all(type) as CatalogItem[];
    });
  }

  searchByTitle(text: string): CatalogItem[] {
    const pattern = `%${text.replace(/[\\%_]/g, m => `\\${m}`)}%`;
    return guardStore('search catalog', () => {
      return this.db
        .prepare(
          `
          SELECT ${ITEM_COLUMNS} FROM catalog_items
          WHERE title LIKE ? ESCAPE '\\'
          ORDER BY title
        `
        )
        .all(pattern) as CatalogItem[];
    });
  }
}
