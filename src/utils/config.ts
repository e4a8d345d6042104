import * as path from 'path';
import { z } from 'zod';
import { AppPaths } from './paths';
import { DEFAULT_AUDIO_EXTENSIONS, DEFAULT_OWNER_USER_ID, JELLYFIN } from './constants';

const optionalString = z
  .string()
  .optional()
  .transform(value => (value?.trim() ? value.trim() : undefined));

const EnvSchema = z.object({
  CRATE_MUSIC_DIR: z
    .string({ required_error: 'is required' })
    .trim()
    .min(1, 'is required'),
  CRATE_FFPROBE_PATH: optionalString,
  CRATE_PLAYLIST_DIR: optionalString,
  CRATE_DB_PATH: optionalString,
  CRATE_AUDIO_EXTENSIONS: optionalString,
  CRATE_PLAYLIST_OWNER_ID: optionalString,
  JELLYFIN_URL: optionalString.pipe(z.string().url('must be a URL').optional()),
  JELLYFIN_API_KEY: optionalString,
});

export interface AppConfig {
  musicDir: string;
  ffprobePath: string;
  playlistDir: string;
  dbPath: string;
  audioExtensions: string[];
  playlistOwnerId: string;
  jellyfin: {
    serverUrl: string;
    apiKey: string | null;
  };
}

export class ConfigError extends Error {
  constructor(readonly problems: string[]) {
    super(`Invalid configuration:\n${problems.map(p => `  ${p}`).join('\n')}`);
    this.name = 'ConfigError';
  }
}

export function parseExtensions(list: string): string[] {
  const extensions = list
    .split(',')
    .map(ext => ext.trim().replace(/^\./, '').toLowerCase())
    .filter(ext => ext.length > 0);
  return [...new Set(extensions)];
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);

  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map(issue => `${issue.path.join('.')} ${issue.message}`)
    );
  }

  const vars = parsed.data;
  const extensions = vars.CRATE_AUDIO_EXTENSIONS
    ? parseExtensions(vars.CRATE_AUDIO_EXTENSIONS)
    : [...DEFAULT_AUDIO_EXTENSIONS];

  if (extensions.length === 0) {
    throw new ConfigError(['CRATE_AUDIO_EXTENSIONS must list at least one extension']);
  }

  return {
    musicDir: path.resolve(vars.CRATE_MUSIC_DIR),
    ffprobePath: vars.CRATE_FFPROBE_PATH ?? 'ffprobe',
    playlistDir: vars.CRATE_PLAYLIST_DIR
      ? path.resolve(vars.CRATE_PLAYLIST_DIR)
      : AppPaths.getDefaultPlaylistDir(),
    dbPath: vars.CRATE_DB_PATH ? path.resolve(vars.CRATE_DB_PATH) : AppPaths.getDefaultDbPath(),
    audioExtensions: extensions,
    playlistOwnerId: vars.CRATE_PLAYLIST_OWNER_ID ?? DEFAULT_OWNER_USER_ID,
    jellyfin: {
      serverUrl: (vars.JELLYFIN_URL ?? JELLYFIN.DEFAULT_URL).replace(/\/+$/, ''),
      apiKey: vars.JELLYFIN_API_KEY ?? null,
    },
  };
}
