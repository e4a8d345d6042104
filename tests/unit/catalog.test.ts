import type Database from 'better-sqlite3';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { CatalogStore, openDatabase } from '../../src/db';
import { StoreError } from '../../src/utils/errors';
import type { CatalogItemInput } from '../../src/types';

const ITEMS: CatalogItemInput[] = [
  { item_id: 'lib', title: 'Library', path: null, type: 'CollectionFolder', parent_id: null },
  { item_id: 'album1', title: 'Blue', path: '/m/blue', type: 'MusicAlbum', parent_id: 'lib' },
  { item_id: 'album2', title: 'Abbey', path: '/m/abbey', type: 'MusicAlbum', parent_id: '' },
  { item_id: 't1', title: 'Song_1', path: '/m/blue/1.mp3', type: 'Audio', parent_id: 'album1' },
  { item_id: 't2', title: 'Song 2', path: '/m/blue/2.mp3', type: 'Audio', parent_id: 'album1' },
];

describe('CatalogStore', () => {
  let db: Database.Database;
  let catalog: CatalogStore;

  beforeEach(() => {
    db = openDatabase(':memory:');
    catalog = new CatalogStore(db);
    ITEMS.forEach(item => catalog.upsertItem(item));
  });

  afterEach(() => {
    db.close();
  });

  it('treats null and empty parents as roots', () => {
    expect(catalog.rootItems().map(i => i.item_id)).toEqual(['album2', 'lib']);
  });

  it('lists the children of an item by title', () => {
    expect(catalog.childrenOf('album1').map(i => i.title)).toEqual(['Song 2', 'Song_1']);
    expect(catalog.childrenOf('nothing')).toEqual([]);
  });

  it('counts items by type, largest first', () => {
    expect(catalog.countByType()).toEqual([
      { type: 'Audio', count: 2 },
      { type: 'MusicAlbum', count: 2 },
      { type: 'CollectionFolder', count: 1 },
    ]);
    expect(catalog.listTypes()).toEqual(['Audio', 'CollectionFolder', 'MusicAlbum']);
    expect(catalog.itemsByType('MusicAlbum').map(i => i.title)).toEqual(['Abbey', 'Blue']);
  });

  it('matches wildcard characters in a search literally', () => {
    expect(catalog.searchByTitle('_').map(i => i.item_id)).toEqual(['t1']);
    expect(catalog.searchByTitle('song').map(i => i.item_id)).toEqual(['t2', 't1']);
    expect(catalog.searchByTitle('%')).toEqual([]);
  });

  it('replaces an item with the same id', () => {
    catalog.upsertItem({
      item_id: 'lib',
      title: 'Music',
      path: null,
      type: 'CollectionFolder',
      parent_id: null,
    });

    expect(catalog.count()).toBe(5);
    expect(catalog.getItem('lib')?.title).toBe('Music');
    expect(catalog.getItem('lib')?.scan_date).toEqual(expect.any(String));
  });

  it('clears every item', () => {
    expect(catalog.clear()).toBe(5);
    expect(catalog.count()).toBe(0);
    expect(catalog.getItem('lib')).toBeNull();
  });

  it('reports database failures as store errors', () => {
    const closed = openDatabase(':memory:');
    const store = new CatalogStore(closed);
    closed.close();

    expect(() => store.count()).toThrow(StoreError);
    expect(() =>
      store.upsertItem({ item_id: 'x', title: 'X', path: null, type: 'Audio', parent_id: null })
    ).toThrow('Failed to store catalog item');
  });
});
