import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { FolderScanner, type DirectoryReader } from '../../src/services/scanner';

function touch(root: string, relative: string): void {
  const file = path.join(root, relative);
  fs.mkdirSync(path.dirname(file), { recursive: true });
  fs.writeFileSync(file, '');
}

describe('FolderScanner', () => {
  let root: string;
  const scanner = new FolderScanner(['mp3', 'flac', 'ogg']);

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), 'crate-scan-'));
    touch(root, 'B/sub/c.ogg');
    touch(root, 'B/notes.txt');
    touch(root, 'A/b.FLAC');
    touch(root, 'A/a.mp3');
    touch(root, 'C/cover.jpg');
    fs.mkdirSync(path.join(root, 'A', 'x.mp3'));
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it('matches extensions case-insensitively', () => {
    expect(scanner.isAudioFile('song.MP3')).toBe(true);
    expect(scanner.isAudioFile('song.Flac')).toBe(true);
    expect(scanner.isAudioFile('cover.jpg')).toBe(false);
    expect(scanner.isAudioFile('mp3')).toBe(false);
  });

  it('returns only folders that directly hold audio, sorted', () => {
    expect(scanner.scan(root)).toEqual([path.join(root, 'A'), path.join(root, 'B', 'sub')]);
  });

  it('includes the root when it holds audio itself', () => {
    touch(root, 'loose.mp3');
    expect(scanner.scan(root)).toEqual([
      root,
      path.join(root, 'A'),
      path.join(root, 'B', 'sub'),
    ]);
  });

  it('does not follow symbolic links to directories', () => {
    fs.symlinkSync(path.join(root, 'A'), path.join(root, 'linked'), 'dir');
    expect(scanner.scan(root)).toEqual([path.join(root, 'A'), path.join(root, 'B', 'sub')]);
  });

  it('lists audio files of one folder without directories', () => {
    expect(scanner.listAudioFiles(path.join(root, 'A'))).toEqual(['a.mp3', 'b.FLAC']);
    expect(scanner.listAudioFiles(path.join(root, 'C'))).toEqual([]);
  });

  it('warns and returns nothing for a missing folder', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    expect(scanner.listAudioFiles(path.join(root, 'missing'))).toEqual([]);
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('skips an unreadable folder during a scan and keeps its siblings', () => {
    touch(root, 'Locked/d.mp3');
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const locked = path.join(root, 'Locked');
    const reader: DirectoryReader = dir => {
      if (dir === locked) {
        throw new Error('EACCES: permission denied');
      }
      return fs.readdirSync(dir, { withFileTypes: true });
    };

    const result = new FolderScanner(['mp3', 'flac', 'ogg'], reader).scan(root);

    expect(result).toEqual([path.join(root, 'A'), path.join(root, 'B', 'sub')]);
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('orders names by code point', () => {
    touch(root, 'D/\u{1F3B5}.mp3');
    touch(root, 'D/\uFF5E.mp3');

    expect(scanner.listAudioFiles(path.join(root, 'D'))).toEqual(['\uFF5E.mp3', '\u{1F3B5}.mp3']);
  });
});
