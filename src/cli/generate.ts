import { PlaylistBuilder } from '../services/playlists';
import { logger } from '../utils/logger';
import { getErrorMessage } from '../utils/errors';
import type { AppContext } from './context';

export async function handleGenerateCommand(ctx: AppContext): Promise<void> {
  const builder = new PlaylistBuilder(ctx.categories, ctx.scanner, ctx.prober, {
    playlistDir: ctx.config.playlistDir,
    ownerUserId: ctx.config.playlistOwnerId,
  });

  logger.log('');
  logger.info('Generating playlists...');

  try {
    const written = await builder.write();

    if (written.length === 0) {
      logger.warn('No categorized folders with audio files');
      logger.dim('Run "assign" to put folders into categories');
      logger.log('');
      return;
    }

    logger.log('');
    for (const playlist of written) {
      logger.success(`✓ ${playlist.category} (${playlist.trackCount} tracks)`);
      logger.dim(`  ${playlist.file}`);
    }
    logger.log('');
    logger.info(`Generated ${written.length} playlists in ${ctx.config.playlistDir}`);
  } catch (error: unknown) {
    logger.error(`Failed to generate playlists: ${getErrorMessage(error)}`);
  }
  logger.log('');
}
