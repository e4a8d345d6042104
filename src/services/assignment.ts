import type { CategoryStore } from '../db';
import type { FolderScanner } from './scanner';
import { UserInputError } from '../utils/errors';
import { compareCodePoints } from '../utils/sort';
import type { Category } from '../types';

export type AssignmentMode = 'assign-new' | 'reassign';

/** A folder waiting for the user's decision. */
export interface FolderPrompt {
  folder: string;
  position: number;
  total: number;
  audioFiles: string[];
  categories: Category[];
  /** Pre-selected option; only set in reassign mode. */
  currentCategoryId: number | null;
  canGoBack: boolean;
}

export type AssignmentAnswer =
  | { kind: 'category'; categoryId: number }
  | { kind: 'skip' }
  | { kind: 'back' }
  | { kind: 'cancel' };

export type Chooser = (prompt: FolderPrompt) => Promise<AssignmentAnswer>;

export interface AssignmentSummary {
  assigned: number;
  skipped: number;
  alreadyCategorized: number;
  cancelled: boolean;
}

export interface AssignmentOptions {
  mode: AssignmentMode;
  /** Owner tag stored with new assignments. Undefined keeps existing tags. */
  userTag?: string | null;
}

/**
 * Walks the sorted folder list one decision at a time. Each chosen
 * category is written straight to the store, so quitting mid-walk only
 * loses the folder on screen.
 *
 *   assign-new: folders that already have a category are passed over.
 *   reassign:   every folder is shown with its category pre-selected, and
 *               `back` returns to the previously shown folder.
 */
export class AssignmentSession {
  private readonly folders: string[];
  private readonly categorized: Set<string>;
  private readonly history: number[] = [];
  private cursor = 0;
  private state: 'active' | 'done' | 'cancelled' = 'active';
  private assigned = 0;
  private skipped = 0;
  private alreadyCategorized = 0;

  constructor(
    private readonly store: CategoryStore,
    private readonly scanner: FolderScanner,
    folders: string[],
    private readonly options: AssignmentOptions
  ) {
    if (store.listCategories().length === 0) {
      throw new UserInputError('No categories found. Create a category first.');
    }

    this.folders = [...new Set(folders)].sort(compareCodePoints);
    this.categorized = new Set(store.listFoldersWithCategories().map(f => f.path));
    this.settle();
  }

  get mode(): AssignmentMode {
    return this.options.mode;
  }

  get isFinished(): boolean {
    return this.state !== 'active';
  }

  current(): FolderPrompt | null {
    if (this.state !== 'active') return null;

    const folder = this.folderAt(this.cursor);
    const categories = this.store.listCategories();

    let currentCategoryId: number | null = null;
    if (this.options.mode === 'reassign') {
      const existing = this.store.getFolderAssignment(folder)?.category_id ?? null;
      currentCategoryId = categories.some(c => c.id === existing) ? existing : null;
    }

    return {
      folder,
      position: this.cursor,
      total: this.folders.length,
      audioFiles: this.scanner.listAudioFiles(folder),
      categories,
      currentCategoryId,
      canGoBack: this.options.mode === 'reassign' && this.history.length > 0,
    };
  }

  /**
   * Apply the user's answer for the current folder. Returns the category
   * that was stored, or null when nothing was written.
   */
  answer(answer: AssignmentAnswer): Category | null {
    if (this.state !== 'active') {
      throw new Error('Assignment session has already finished');
    }

    const folder = this.folderAt(this.cursor);

    switch (answer.kind) {
      case 'category': {
        const category = this.store.getCategory(answer.categoryId);
        if (!category) {
          throw new UserInputError(`Category ID ${answer.categoryId} does not exist`);
        }

        const userTag = this.options.mode === 'assign-new' ? this.options.userTag : undefined;
        this.store.upsertFolderAssignment(folder, category.id, userTag);
        this.categorized.add(folder);
        this.assigned++;
        this.advance();
        return category;
      }

      case 'skip':
        this.skipped++;
        this.advance();
        return null;

      case 'back': {
        const previous = this.history.pop();
        if (this.options.mode !== 'reassign' || previous === undefined) {
          throw new UserInputError('There is no previous folder to go back to');
        }
        this.cursor = previous;
        return null;
      }

      case 'cancel':
        this.state = 'cancelled';
        return null;
    }
  }

  summary(): AssignmentSummary {
    return {
      assigned: this.assigned,
      skipped: this.skipped,
      alreadyCategorized: this.alreadyCategorized,
      cancelled: this.state === 'cancelled',
    };
  }

  private folderAt(index: number): string {
    const folder = this.folders[index];
    if (folder === undefined) {
      throw new Error(`No folder at position ${index}`);
    }
    return folder;
  }

  private advance(): void {
    if (this.options.mode === 'reassign') {
      this.history.push(this.cursor);
    }
    this.cursor++;
    this.settle();
  }

  /** Move the cursor past folders that need no decision. */
  private settle(): void {
    if (this.options.mode === 'assign-new') {
      while (this.cursor < this.folders.length && this.categorized.has(this.folderAt(this.cursor))) {
        this.alreadyCategorized++;
        this.cursor++;
      }
    }

    if (this.cursor >= this.folders.length) {
      this.state = 'done';
    }
  }
}

export interface AssignmentHooks {
  onAssigned?: (folder: string, category: Category) => void;
}

/** Drive a session to the end with any chooser. */
export async function runAssignment(
  session: AssignmentSession,
  chooser: Chooser,
  hooks: AssignmentHooks = {}
): Promise<AssignmentSummary> {
  let prompt = session.current();

  while (prompt) {
    const answer = await chooser(prompt);
    const category = session.answer(answer);
    if (category) {
      hooks.onAssigned?.(prompt.folder, category);
    }
    prompt = session.current();
  }

  return session.summary();
}
