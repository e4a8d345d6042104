export const PATHS = {
  DATA_DIR: 'data',
  DB_FILE: 'crate.db',
  PLAYLIST_DIR: 'playlists',
  PLAYLIST_FILE: 'playlist.xml',
} as const;

export const DEFAULT_AUDIO_EXTENSIONS = ['mp3', 'ogg', 'flac', 'm4a', 'wma', 'ape'] as const;

export const DEFAULT_OWNER_USER_ID = '00000000000000000000000000000000';

export const JELLYFIN = {
  DEFAULT_URL: 'http://localhost:8096',
  ALBUM_LIMIT: 2000,
  TRACK_LIMIT: 1000,
} as const;

export const PREVIEW_FILE_COUNT = 5;
