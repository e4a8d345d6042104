import type { JellyfinClient, JellyfinItem } from '../api/jellyfin';
import type { CatalogStore } from '../db';
import { logger } from '../utils/logger';
import { getErrorMessage } from '../utils/errors';
import type { CatalogItemInput } from '../types';

export interface CatalogSyncResult {
  albums: number;
  tracks: number;
  stored: number;
  failedAlbums: number;
}

/**
 * Copies the server's music albums and their tracks into the catalog
 * mirror. Each item is written as soon as it arrives.
 */
export class CatalogSync {
  constructor(
    private readonly client: JellyfinClient,
    private readonly catalog: CatalogStore
  ) {}

  async sync(options: { clearFirst?: boolean } = {}): Promise<CatalogSyncResult> {
    if (options.clearFirst) {
      const removed = this.catalog.clear();
      logger.dim(`Cleared ${removed} stored items`);
    }

    const albums = await this.client.listAlbums();
    logger.info(`Found ${albums.length} music albums`);

    const result: CatalogSyncResult = { albums: albums.length, tracks: 0, stored: 0, failedAlbums: 0 };

    for (const [index, album] of albums.entries()) {
      this.catalog.upsertItem(this.toCatalogItem(album, album.ParentId ?? null, 'MusicAlbum'));
      result.stored++;

      try {
        const tracks = await this.client.listTracks(album.Id);
        for (const track of tracks) {
          this.catalog.upsertItem(this.toCatalogItem(track, album.Id, 'Audio'));
          result.stored++;
        }
        result.tracks += tracks.length;
      } catch (error: unknown) {
        result.failedAlbums++;
        logger.warn(`Could not fetch tracks for "${album.Name ?? album.Id}": ${getErrorMessage(error)}`);
      }

      if (index > 0 && index % 20 === 0) {
        logger.dim(`Processed ${index} of ${albums.length} albums...`);
      }
    }

    return result;
  }

  private toCatalogItem(
    item: JellyfinItem,
    parentId: string | null,
    fallbackType: string
  ): CatalogItemInput {
    return {
      item_id: item.Id,
      title: item.Name || 'Unnamed',
      path: item.Path || null,
      type: item.Type || fallbackType,
      parent_id: parentId,
    };
  }
}
