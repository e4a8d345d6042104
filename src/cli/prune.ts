import { logger } from '../utils/logger';
import { getErrorMessage } from '../utils/errors';
import { choosePruneDecision } from './prompts';
import type { AppContext } from './context';

export async function handlePruneCommand(ctx: AppContext): Promise<void> {
  if (ctx.categories.countFolders() === 0) {
    logger.log('');
    logger.dim('No folders found in database.');
    logger.log('');
    return;
  }

  logger.log('');
  logger.info('Checking for invalid paths in database...');

  try {
    const result = await ctx.categories.pruneInvalid(choosePruneDecision);

    logger.log('');
    if (result.aborted) {
      logger.warn('Prune cancelled');
    }
    logger.info(`Found ${result.invalid} invalid paths, removed ${result.removed} entries`);
  } catch (error: unknown) {
    logger.error(getErrorMessage(error));
  }
  logger.log('');
}
