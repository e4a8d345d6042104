import * as fs from 'fs';
import * as path from 'path';
import { logger } from '../utils/logger';
import { getErrorMessage } from '../utils/errors';
import { compareCodePoints } from '../utils/sort';

/** Lists one directory; throws when it cannot be read. */
export type DirectoryReader = (dir: string) => fs.Dirent[];

const readDirectory: DirectoryReader = dir => fs.readdirSync(dir, { withFileTypes: true });

/**
 * Finds the directories of a music collection that hold audio files.
 */
export class FolderScanner {
  private readonly extensions: Set<string>;

  constructor(
    extensions: readonly string[],
    private readonly read: DirectoryReader = readDirectory
  ) {
    this.extensions = new Set(extensions.map(ext => `.${ext.replace(/^\./, '').toLowerCase()}`));
  }

  isAudioFile(fileName: string): boolean {
    return this.extensions.has(path.extname(fileName).toLowerCase());
  }

  /**
   * Every directory under root (root included) with at least one audio
   * file directly inside it, sorted by absolute path. Symbolic links to
   * directories are not followed; unreadable directories are skipped.
   */
  scan(root: string): string[] {
    const found = new Set<string>();
    this.walk(path.resolve(root), found);
    return [...found].sort(compareCodePoints);
  }

  /** Audio file names directly inside a folder, sorted. */
  listAudioFiles(folder: string): string[] {
    const entries = this.readDir(folder);
    if (!entries) return [];

    return entries
      .filter(entry => !entry.isDirectory() && this.isAudioFile(entry.name))
      .map(entry => entry.name)
      .sort(compareCodePoints);
  }

  private walk(dir: string, found: Set<string>): void {
    const entries = this.readDir(dir);
    if (!entries) return;

    for (const entry of entries) {
      if (entry.isDirectory()) {
        this.walk(path.join(dir, entry.name), found);
      } else if (this.isAudioFile(entry.name)) {
        found.add(dir);
      }
    }
  }

  private readDir(dir: string): fs.Dirent[] | null {
    try {
      return this.read(dir);
    } catch (error: unknown) {
      logger.warn(`Skipping unreadable folder ${dir}: ${getErrorMessage(error)}`);
      return null;
    }
  }
}
