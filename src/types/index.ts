// Database types
export interface Category {
  id: number;
  name: string;
}

export interface CategoryWithCount extends Category {
  folder_count: number;
}

export interface FolderAssignment {
  path: string;
  category_id: number | null;
  user_name: string | null;
}

export interface CategorizedFolder {
  path: string;
  category_id: number;
  category_name: string;
  user_name: string | null;
}

export interface CatalogItem {
  item_id: string;
  title: string;
  path: string | null;
  type: string;
  parent_id: string | null;
  scan_date: string;
}

export type CatalogItemInput = Omit<CatalogItem, 'scan_date'>;

export interface TypeCount {
  type: string;
  count: number;
}

// Prune types
export type PruneDecision = 'remove' | 'keep' | 'skip' | 'abort';

export interface PruneResult {
  invalid: number;
  removed: number;
  aborted: boolean;
}

export interface ImportResult {
  imported: number;
  skipped: number;
}

// Playlist types
export interface PlaylistDraft {
  files: string[];
  genres: string[];
}

export interface PlaylistDocument {
  added: string;
  title: string;
  genres: string[];
  ownerUserId: string;
  paths: string[];
}

export interface WrittenPlaylist {
  category: string;
  file: string;
  trackCount: number;
}
