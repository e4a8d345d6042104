import type { CatalogStore, CategoryStore } from '../db';
import type { FolderScanner } from '../services/scanner';
import type { MetadataProber } from '../services/prober';
import type { AppConfig } from '../utils/config';

/** Everything a command handler needs, built once at startup. */
export interface AppContext {
  config: AppConfig;
  categories: CategoryStore;
  catalog: CatalogStore;
  scanner: FolderScanner;
  prober: MetadataProber;
  /** Jellyfin user picked with `users`; tags new folder assignments. */
  currentUser: string | null;
}
