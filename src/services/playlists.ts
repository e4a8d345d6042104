import * as fs from 'fs';
import * as path from 'path';
import type { CategoryStore } from '../db';
import type { FolderScanner } from './scanner';
import type { MetadataProber } from './prober';
import { formatAddedTimestamp, renderPlaylistXml } from './playlistXml';
import { PATHS } from '../utils/constants';
import { logger } from '../utils/logger';
import type { PlaylistDraft, WrittenPlaylist } from '../types';

export interface PlaylistBuilderOptions {
  playlistDir: string;
  ownerUserId: string;
  now?: () => Date;
}

export function playlistFolderName(category: string): string {
  return category.replace(/\//g, '_');
}

/**
 * Turns the folder → category mapping into one playlist.xml per category.
 * Folders are re-listed on every run; nothing from an earlier scan is reused.
 */
export class PlaylistBuilder {
  private readonly now: () => Date;

  constructor(
    private readonly categories: CategoryStore,
    private readonly scanner: FolderScanner,
    private readonly prober: MetadataProber,
    private readonly options: PlaylistBuilderOptions
  ) {
    this.now = options.now ?? (() => new Date());
  }

  async buildDrafts(): Promise<Map<string, PlaylistDraft>> {
    const drafts = new Map<string, PlaylistDraft>();

    for (const folder of this.categories.listFoldersWithCategories()) {
      logger.dim(`Processing ${folder.path} -> ${folder.category_name}`);

      let draft = drafts.get(folder.category_name);
      if (!draft) {
        draft = { files: [], genres: [] };
        drafts.set(folder.category_name, draft);
      }

      for (const fileName of this.scanner.listAudioFiles(folder.path)) {
        const filePath = path.join(folder.path, fileName);
        draft.files.push(filePath);

        for (const genre of await this.prober.getGenres(filePath)) {
          if (!draft.genres.includes(genre)) {
            draft.genres.push(genre);
          }
        }
      }
    }

    return drafts;
  }

  async write(): Promise<WrittenPlaylist[]> {
    const drafts = await this.buildDrafts();
    const added = formatAddedTimestamp(this.now());
    const written: WrittenPlaylist[] = [];
    const ownerByDir = new Map<string, string>();

    for (const [category, draft] of drafts) {
      if (draft.files.length === 0) {
        logger.dim(`No audio files for "${category}", skipping`);
        continue;
      }

      const dir = path.join(this.options.playlistDir, playlistFolderName(category));
      const earlier = ownerByDir.get(dir);
      if (earlier !== undefined) {
        logger.warn(`"${category}" and "${earlier}" share ${dir}; "${category}" overwrites it`);
      }
      ownerByDir.set(dir, category);
      const file = path.join(dir, PATHS.PLAYLIST_FILE);
      fs.mkdirSync(dir, { recursive: true });

      const xml = renderPlaylistXml({
        added,
        title: category,
        genres: draft.genres,
        ownerUserId: this.options.ownerUserId,
        paths: draft.files,
      });
      fs.writeFileSync(file, xml, 'utf-8');

      written.push({ category, file, trackCount: draft.files.length });
    }

    return written;
  }
}
