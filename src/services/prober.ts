import { execFile } from 'child_process';

export interface ProbeOutput {
  exitCode: number;
  stdout: string;
}

/** Runs the probing tool; resolves even when the tool fails. */
export type ProbeRunner = (command: string, args: string[]) => Promise<ProbeOutput>;

export interface ProbeResult {
  format?: {
    tags?: Record<string, unknown>;
    [key: string]: unknown;
  };
  streams?: unknown[];
}

const GENRE_KEYS = ['GENRE', 'genre'] as const;

export const execFileRunner: ProbeRunner = (command, args) =>
  new Promise(resolve => {
    execFile(command, args, { maxBuffer: 16 * 1024 * 1024 }, (error, stdout) => {
      if (error) {
        const code = typeof error.code === 'number' ? error.code : 1;
        resolve({ exitCode: code === 0 ? 1 : code, stdout: '' });
        return;
      }
      resolve({ exitCode: 0, stdout });
    });
  });

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Genres from a probe result. GENRE wins over genre; one value may hold
 * several genres separated by semicolons.
 */
export function extractGenres(result: ProbeResult): string[] {
  const tags = result.format?.tags;
  if (!tags) return [];

  const key = GENRE_KEYS.find(k => k in tags);
  if (!key) return [];

  const value = tags[key];
  if (typeof value !== 'string') return [];

  return value
    .split(';')
    .map(genre => genre.trim())
    .filter(genre => genre.length > 0);
}

/**
 * ffprobe wrapper. A failed or unparseable probe is indistinguishable
 * from a file without tags: both give an empty result.
 */
export class MetadataProber {
  constructor(
    private readonly ffprobePath: string,
    private readonly runner: ProbeRunner = execFileRunner
  ) {}

  async probe(filePath: string): Promise<ProbeResult> {
    const args = [
      '-v',
      'quiet',
      '-print_format',
      'json',
      '-show_format',
      '-show_streams',
      filePath,
    ];

    try {
      const { exitCode, stdout } = await this.runner(this.ffprobePath, args);
      if (exitCode !== 0) return {};

      const parsed: unknown = JSON.parse(stdout);
      if (!isRecord(parsed)) return {};

      const result: ProbeResult = {};
      if (isRecord(parsed.format)) {
        const tags = isRecord(parsed.format.tags) ? parsed.format.tags : undefined;
        result.format = { ...parsed.format, tags };
      }
      if (Array.isArray(parsed.streams)) {
        result.streams = parsed.streams;
      }
      return result;
    } catch {
      return {};
    }
  }

  async getGenres(filePath: string): Promise<string[]> {
    return extractGenres(await this.probe(filePath));
  }
}
