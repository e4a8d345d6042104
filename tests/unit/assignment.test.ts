import type Database from 'better-sqlite3';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { CategoryStore, openDatabase } from '../../src/db';
import { FolderScanner } from '../../src/services/scanner';
import {
  AssignmentSession,
  runAssignment,
  type AssignmentAnswer,
  type FolderPrompt,
} from '../../src/services/assignment';
import { UserInputError } from '../../src/utils/errors';

describe('AssignmentSession', () => {
  let db: Database.Database;
  let store: CategoryStore;
  let scanner: FolderScanner;
  const folders = ['/m/c', '/m/a', '/m/b', '/m/a'];

  beforeEach(() => {
    vi.spyOn(console, 'info').mockImplementation(() => undefined);
    db = openDatabase(':memory:');
    store = new CategoryStore(db);
    store.createCategory('Rock');
    store.createCategory('Jazz');
    scanner = new FolderScanner(['mp3']);
    vi.spyOn(scanner, 'listAudioFiles').mockReturnValue(['01.mp3', '02.mp3']);
  });

  afterEach(() => {
    db.close();
    vi.restoreAllMocks();
  });

  it('refuses to start without categories', () => {
    const empty = new CategoryStore(openDatabase(':memory:'));
    expect(() => new AssignmentSession(empty, scanner, folders, { mode: 'assign-new' })).toThrow(
      UserInputError
    );
  });

  describe('assign-new', () => {
    it('passes over folders that already have a category', () => {
      store.upsertFolderAssignment('/m/b', 1);
      const session = new AssignmentSession(store, scanner, folders, {
        mode: 'assign-new',
        userTag: 'alice',
      });

      expect(session.current()).toEqual({
        folder: '/m/a',
        position: 0,
        total: 3,
        audioFiles: ['01.mp3', '02.mp3'],
        categories: [
          { id: 1, name: 'Jazz' },
          { id: 0, name: 'Rock' },
        ],
        currentCategoryId: null,
        canGoBack: false,
      });

      expect(session.answer({ kind: 'category', categoryId: 0 })).toEqual({ id: 0, name: 'Rock' });
      expect(session.current()?.folder).toBe('/m/c');

      session.answer({ kind: 'skip' });

      expect(session.current()).toBeNull();
      expect(session.summary()).toEqual({
        assigned: 1,
        skipped: 1,
        alreadyCategorized: 1,
        cancelled: false,
      });
      expect(store.getFolderAssignment('/m/a')).toEqual({
        path: '/m/a',
        category_id: 0,
        user_name: 'alice',
      });
      expect(store.getFolderAssignment('/m/c')).toBeNull();
    });

    it('does not offer back', () => {
      const session = new AssignmentSession(store, scanner, folders, { mode: 'assign-new' });
      session.answer({ kind: 'skip' });

      expect(session.current()?.canGoBack).toBe(false);
      expect(() => session.answer({ kind: 'back' })).toThrow(UserInputError);
    });

    it('stops on cancel and keeps what was stored', () => {
      const session = new AssignmentSession(store, scanner, folders, { mode: 'assign-new' });
      session.answer({ kind: 'category', categoryId: 1 });
      session.answer({ kind: 'cancel' });

      expect(session.isFinished).toBe(true);
      expect(session.current()).toBeNull();
      expect(session.summary().cancelled).toBe(true);
      expect(store.getFolderAssignment('/m/a')?.category_id).toBe(1);
      expect(() => session.answer({ kind: 'skip' })).toThrow('already finished');
    });

    it('rejects an unknown category and stays on the folder', () => {
      const session = new AssignmentSession(store, scanner, folders, { mode: 'assign-new' });

      expect(() => session.answer({ kind: 'category', categoryId: 9 })).toThrow(UserInputError);
      expect(session.current()?.folder).toBe('/m/a');
    });
  });

  describe('reassign', () => {
    beforeEach(() => {
      store.upsertFolderAssignment('/m/a', 0, 'alice');
      store.upsertFolderAssignment('/m/b', 1);
    });

    it('preselects the current category and goes back', () => {
      const session = new AssignmentSession(store, scanner, folders, {
        mode: 'reassign',
        userTag: 'bob',
      });

      expect(session.current()).toMatchObject({ folder: '/m/a', currentCategoryId: 0, canGoBack: false });

      session.answer({ kind: 'category', categoryId: 1 });
      expect(session.current()).toMatchObject({ folder: '/m/b', currentCategoryId: 1, canGoBack: true });

      session.answer({ kind: 'back' });
      expect(session.current()).toMatchObject({ folder: '/m/a', currentCategoryId: 1, canGoBack: false });
      expect(store.getFolderAssignment('/m/a')?.user_name).toBe('alice');
    });

    it('shows uncategorized folders without a default', () => {
      const session = new AssignmentSession(store, scanner, folders, { mode: 'reassign' });
      session.answer({ kind: 'skip' });
      session.answer({ kind: 'skip' });

      expect(session.current()).toMatchObject({ folder: '/m/c', currentCategoryId: null });
    });
  });

  it('runs a session to the end with a chooser', async () => {
    const answers: AssignmentAnswer[] = [
      { kind: 'category', categoryId: 0 },
      { kind: 'skip' },
      { kind: 'category', categoryId: 1 },
    ];
    const chooser = vi.fn(async (_prompt: FolderPrompt) => answers.shift() ?? { kind: 'cancel' as const });
    const onAssigned = vi.fn();
    const session = new AssignmentSession(store, scanner, folders, { mode: 'assign-new' });

    const summary = await runAssignment(session, chooser, { onAssigned });

    expect(chooser).toHaveBeenCalledTimes(3);
    expect(onAssigned).toHaveBeenNthCalledWith(1, '/m/a', { id: 0, name: 'Rock' });
    expect(onAssigned).toHaveBeenNthCalledWith(2, '/m/c', { id: 1, name: 'Jazz' });
    expect(summary).toEqual({ assigned: 2, skipped: 1, alreadyCategorized: 0, cancelled: false });
  });
});
