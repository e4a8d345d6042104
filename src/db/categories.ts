import * as fs from 'fs';
import type Database from 'better-sqlite3';
import { parse } from 'csv-parse/sync';
import { CATEGORY_MIGRATIONS } from './schema';
import { runMigrations } from './migrations';
import { logger } from '../utils/logger';
import { guardStore } from './guard';
import {
  DuplicateNameError,
  UserInputError,
  getErrorMessage,
  isUniqueViolation,
} from '../utils/errors';
import type {
  Category,
  CategoryWithCount,
  CategorizedFolder,
  FolderAssignment,
  ImportResult,
  PruneDecision,
  PruneResult,
} from '../types';

export interface StaleFolder extends FolderAssignment {
  category_name: string | null;
}

export type PruneDecider = (folder: StaleFolder) => Promise<PruneDecision>;

/**
 * Categories and folder → category assignments.
 *
 * Every statement commits on its own; nothing here spans a transaction,
 * so a workflow that fails half way keeps the writes it already made.
 */
export class CategoryStore {
  constructor(private readonly db: Database.Database) {
    guardStore('initialize category tables', () => runMigrations(this.db, CATEGORY_MIGRATIONS));
  }

  // ========== CATEGORY OPERATIONS ==========

  /**
   * Ids are max(id) + 1 rather than AUTOINCREMENT so that gaps left by
   * earlier deletions in existing databases are never reused out of order.
   */
  createCategory(name: string): Category {
    const trimmed = name.trim();
    if (!trimmed) {
      throw new UserInputError('Category name cannot be empty');
    }

    return guardStore('create category', () => {
      const { max_id } = this.db.prepare('SELECT MAX(id) as max_id FROM categories').get() as {
        max_id: number | null;
      };
      const id = max_id === null ? 0 : max_id + 1;

      try {
        this.db.prepare('INSERT INTO categories (id, name) VALUES (?, ?)').run(id, trimmed);
      } catch (error: unknown) {
        if (isUniqueViolation(error)) {
          throw new DuplicateNameError(trimmed);
        }
        throw error;
      }

      return { id, name: trimmed };
    });
  }

  getCategory(id: number): Category | null {
    return guardStore('read category', () => {
      const row = this.db.prepare('SELECT id, name FROM categories WHERE id = ?').get(id);
      return (row as Category | undefined) ?? null;
    });
  }

  listCategories(): Category[] {
    return guardStore('list categories', () => {
      return this.db.prepare('SELECT id, name FROM categories ORDER BY name').all() as Category[];
    });
  }

  listCategoriesWithCounts(): CategoryWithCount[] {
    return guardStore('list categories', () => {
      return this.db
        .prepare(
          `
          SELECT c.id, c.name, COUNT(f.id) as folder_count
          FROM categories c
          LEFT JOIN folders f ON f.category_id = c.id
          GROUP BY c.id
          ORDER BY c.id
        `
        )
        .all() as CategoryWithCount[];
    });
  }

  countFoldersInCategory(id: number): number {
    return guardStore('count folders', () => {
      const result = this.db
        .prepare('SELECT COUNT(*) as count FROM folders WHERE category_id = ?')
        .get(id) as { count: number };
      return result.count;
    });
  }

  /**
   * Removes the category and clears it from every folder that used it.
   * Returns how many folders became uncategorized.
   */
  deleteCategory(id: number): number {
    if (!this.getCategory(id)) {
      throw new UserInputError(`Category ID ${id} does not exist`);
    }

    return guardStore('delete category', () => {
      const cleared = this.db
        .prepare('UPDATE folders SET category_id = NULL WHERE category_id = ?')
        .run(id);
      this.db.prepare('DELETE FROM categories WHERE id = ?').run(id);
      return cleared.changes;
    });
  }

  // ========== FOLDER OPERATIONS ==========

  /**
   * Insert or update the assignment for a folder. An undefined userTag
   * keeps whatever tag the folder already has; null clears it.
   */
  upsertFolderAssignment(
    folderPath: string,
    categoryId: number | null,
    userTag?: string | null
  ): void {
    guardStore('store folder category', () => {
      if (userTag === undefined) {
        this.db
          .prepare(
            `
            INSERT INTO folders (path, category_id) VALUES (?, ?)
            ON CONFLICT(path) DO UPDATE SET category_id = excluded.category_id
          `
          )
          .run(folderPath, categoryId);
      } else {
        this.db
          .prepare(
            `
            INSERT INTO folders (path, category_id, user_name) VALUES (?, ?, ?)
            ON CONFLICT(path) DO UPDATE SET
              category_id = excluded.category_id,
              user_name = excluded.user_name
          `
          )
          .run(folderPath, categoryId, userTag);
      }
    });
  }

  getFolderAssignment(folderPath: string): FolderAssignment | null {
    return guardStore('read folder', () => {
      const row = this.db
        .prepare('SELECT path, category_id, user_name FROM folders WHERE path = ?')
        .get(folderPath);
      return (row as FolderAssignment | undefined) ?? null;
    });
  }

  listAllFolders(): FolderAssignment[] {
    return guardStore('list folders', () => {
      return this.db
        .prepare('SELECT path, category_id, user_name FROM folders ORDER BY path')
        .all() as FolderAssignment[];
    });
  }

  /**
   * Folders whose category resolves. Rows with a null or dangling
   * category_id are left out by the inner join.
   */
  listFoldersWithCategories(): CategorizedFolder[] {
    return guardStore('list folders', () => {
      return this.db
        .prepare(
          `
          SELECT f.path, f.category_id, c.name as category_name, f.user_name
          FROM folders f
          JOIN categories c ON f.category_id = c.id
          ORDER BY f.path
        `
        )
        .all() as CategorizedFolder[];
    });
  }

  deleteFolder(folderPath: string): boolean {
    return guardStore('delete folder', () => {
      return this.db.prepare('DELETE FROM folders WHERE path = ?').run(folderPath).changes > 0;
    });
  }

  setUserTagForAll(userTag: string | null): number {
    return guardStore('update folder owners', () => {
      return this.db.prepare('UPDATE folders SET user_name = ?').run(userTag).changes;
    });
  }

  countFolders(): number {
    return guardStore('count folders', () => {
      const result = this.db.prepare('SELECT COUNT(*) as count FROM folders').get() as {
        count: number;
      };
      return result.count;
    });
  }

  // ========== MAINTENANCE ==========

  /**
   * Walk every stored folder that no longer exists on disk and let the
   * caller decide what to do with it. Removals commit immediately, so an
   * abort keeps everything decided before it.
   */
  async pruneInvalid(
    decide: PruneDecider,
    exists: (folderPath: string) => boolean = fs.existsSync
  ): Promise<PruneResult> {
    const result: PruneResult = { invalid: 0, removed: 0, aborted: false };

    for (const folder of this.listAllFolders()) {
      if (exists(folder.path)) continue;

      result.invalid++;
      const category = folder.category_id === null ? null : this.getCategory(folder.category_id);
      const decision = await decide({ ...folder, category_name: category?.name ?? null });

      if (decision === 'abort') {
        result.aborted = true;
        break;
      }

      if (decision === 'remove' && this.deleteFolder(folder.path)) {
        result.removed++;
      }
    }

    return result;
  }

  /**
   * Import `path,categoryId` rows. Bad rows are reported and skipped;
   * the rows around them still import. A `|` inside a field is literal.
   */
  importCsv(text: string, userTag?: string | null): ImportResult {
    const result: ImportResult = { imported: 0, skipped: 0 };

    let rows: string[][];
    try {
      rows = parse(text, {
        delimiter: ',',
        quote: '|',
        relax_column_count: true,
        relax_quotes: true,
        skip_empty_lines: true,
        skip_records_with_error: true,
        on_skip: error => {
          logger.warn(`Unreadable row, skipping: ${error?.message ?? 'unknown error'}`);
          result.skipped++;
        },
      });
    } catch (error: unknown) {
      throw new UserInputError(`Could not read CSV: ${getErrorMessage(error)}`);
    }

    const knownIds = new Set(this.listCategories().map(c => c.id));

    rows.forEach((row, index) => {
      const line = index + 1;
      const [folderPath, rawId] = row;

      if (row.length < 2 || !folderPath || rawId === undefined) {
        logger.warn(`Row ${line}: needs a path and a category id, skipping`);
        result.skipped++;
        return;
      }

      if (!/^-?\d+$/.test(rawId.trim())) {
        logger.warn(`Row ${line}: "${rawId}" is not a category id, skipping`);
        result.skipped++;
        return;
      }

      const categoryId = Number(rawId.trim());
      if (!knownIds.has(categoryId)) {
        logger.warn(`Row ${line}: category ID ${categoryId} does not exist, skipping`);
        result.skipped++;
        return;
      }

      this.upsertFolderAssignment(folderPath, categoryId, userTag);
      result.imported++;
    });

    return result;
  }
}
