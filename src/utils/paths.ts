import * as fs from 'fs';
import * as path from 'path';
import { PATHS } from './constants';

export class AppPaths {
  static getDataDir(): string {
    return path.join(process.cwd(), PATHS.DATA_DIR);
  }

  static getDefaultDbPath(): string {
    return path.join(this.getDataDir(), PATHS.DB_FILE);
  }

  static getDefaultPlaylistDir(): string {
    return path.join(process.cwd(), PATHS.PLAYLIST_DIR);
  }

  static ensureParentDir(filePath: string): void {
    const dir = path.dirname(filePath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
  }

  static toDisplayPath(root: string, folder: string): string {
    const relative = path.relative(root, folder);
    return relative && !relative.startsWith('..') ? relative : folder;
  }
}
