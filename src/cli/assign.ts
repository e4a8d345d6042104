import { AssignmentSession, runAssignment, type AssignmentMode } from '../services/assignment';
import { AppPaths } from '../utils/paths';
import { logger } from '../utils/logger';
import { getErrorMessage } from '../utils/errors';
import { askText, createFolderChooser, formatFolderLine } from './prompts';
import type { AppContext } from './context';

export async function handleAssignCommand(ctx: AppContext, mode: AssignmentMode): Promise<void> {
  const { config } = ctx;

  logger.log('');
  logger.info(`Scanning ${config.musicDir}...`);
  const folders = ctx.scanner.scan(config.musicDir);

  if (folders.length === 0) {
    logger.warn(`No music folders found in ${config.musicDir}`);
    logger.log('');
    return;
  }
  logger.dim(`Found ${folders.length} music folders`);

  let userTag: string | null | undefined;
  if (mode === 'assign-new') {
    userTag = ctx.currentUser ?? (await askText('Username for these folders (Enter to skip):'));
  }

  try {
    const session = new AssignmentSession(ctx.categories, ctx.scanner, folders, { mode, userTag });
    const summary = await runAssignment(session, createFolderChooser(config.musicDir), {
      onAssigned: (folder, category) => {
        const relative = AppPaths.toDisplayPath(config.musicDir, folder);
        const owner = userTag ? ` (User: ${userTag})` : '';
        logger.success(`✓ ${relative} -> ${category.name}${owner}`);
      },
    });

    logger.log('');
    if (summary.alreadyCategorized > 0) {
      logger.dim(`${summary.alreadyCategorized} folders were already categorized`);
    }
    if (summary.cancelled) {
      logger.info('Returned to main menu');
    } else if (summary.assigned === 0 && summary.skipped === 0) {
      logger.info('No remaining folders to process');
    }
    logger.info(`Assigned: ${summary.assigned}, Skipped: ${summary.skipped}`);
  } catch (error: unknown) {
    logger.error(getErrorMessage(error));
  }
  logger.log('');
}

/** Every music folder on disk next to its category. */
export function handleFoldersCommand(ctx: AppContext): void {
  const { musicDir } = ctx.config;
  const folders = ctx.scanner.scan(musicDir);

  logger.log('');
  if (folders.length === 0) {
    logger.warn(`No music folders found in ${musicDir}`);
    logger.log('');
    return;
  }

  const categoryByPath = new Map(
    ctx.categories.listFoldersWithCategories().map(f => [f.path, f.category_name])
  );

  logger.heading(`Music folders (${folders.length}):`);
  for (const folder of folders) {
    const relative = AppPaths.toDisplayPath(musicDir, folder);
    logger.log(`  ${formatFolderLine(relative, categoryByPath.get(folder) ?? null)}`);
  }
  logger.log('');
}
