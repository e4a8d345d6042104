import * as path from 'path';
import { describe, expect, it } from 'vitest';
import { ConfigError, loadConfig, parseExtensions } from '../../src/utils/config';

function problemsOf(env: NodeJS.ProcessEnv): string[] {
  try {
    loadConfig(env);
  } catch (error: unknown) {
    if (error instanceof ConfigError) return error.problems;
    throw error;
  }
  throw new Error('expected a ConfigError');
}

describe('parseExtensions', () => {
  it('normalizes and dedupes the list', () => {
    expect(parseExtensions(' .MP3, flac,,mp3')).toEqual(['mp3', 'flac']);
  });
});

describe('loadConfig', () => {
  it('fills in defaults', () => {
    expect(loadConfig({ CRATE_MUSIC_DIR: '/music' })).toEqual({
      musicDir: path.resolve('/music'),
      ffprobePath: 'ffprobe',
      playlistDir: path.join(process.cwd(), 'playlists'),
      dbPath: path.join(process.cwd(), 'data', 'crate.db'),
      audioExtensions: ['mp3', 'ogg', 'flac', 'm4a', 'wma', 'ape'],
      playlistOwnerId: '00000000000000000000000000000000',
      jellyfin: { serverUrl: 'http://localhost:8096', apiKey: null },
    });
  });

  it('reads every variable', () => {
    const config = loadConfig({
      CRATE_MUSIC_DIR: '/music',
      CRATE_FFPROBE_PATH: '/usr/local/bin/ffprobe',
      CRATE_PLAYLIST_DIR: '/srv/playlists',
      CRATE_DB_PATH: '/srv/crate.db',
      CRATE_AUDIO_EXTENSIONS: 'mp3,opus',
      CRATE_PLAYLIST_OWNER_ID: 'owner-placeholder',
      JELLYFIN_URL: 'http://jellyfin.local:8096/',
      JELLYFIN_API_KEY: 'test-secret',
    });

    expect(config).toMatchObject({
      ffprobePath: '/usr/local/bin/ffprobe',
      playlistDir: path.resolve('/srv/playlists'),
      dbPath: path.resolve('/srv/crate.db'),
      audioExtensions: ['mp3', 'opus'],
      playlistOwnerId: 'owner-placeholder',
      jellyfin: { serverUrl: 'http://jellyfin.local:8096', apiKey: 'test-secret' },
    });
  });

  it('treats blank optional variables as unset', () => {
    const config = loadConfig({ CRATE_MUSIC_DIR: '/music', JELLYFIN_API_KEY: '  ', CRATE_FFPROBE_PATH: '' });

    expect(config.jellyfin.apiKey).toBeNull();
    expect(config.ffprobePath).toBe('ffprobe');
  });

  it('reports each invalid variable', () => {
    expect(problemsOf({})).toEqual(['CRATE_MUSIC_DIR is required']);
    expect(problemsOf({ CRATE_MUSIC_DIR: '   ', JELLYFIN_URL: 'not a url' })).toEqual([
      'CRATE_MUSIC_DIR is required',
      'JELLYFIN_URL must be a URL',
    ]);
  });

  it('rejects an empty extension list', () => {
    expect(problemsOf({ CRATE_MUSIC_DIR: '/music', CRATE_AUDIO_EXTENSIONS: ' , ' })).toEqual([
      'CRATE_AUDIO_EXTENSIONS must list at least one extension',
    ]);
  });
});
