import * as fs from 'fs';
import * as path from 'path';
import { logger } from '../utils/logger';
import { getErrorMessage } from '../utils/errors';
import { askText } from './prompts';
import type { AppContext } from './context';

export async function handleImportCommand(ctx: AppContext, args: string[]): Promise<void> {
  const input = args.join(' ').trim();

  if (!input) {
    logger.error('Usage: import <csv-file>');
    logger.dim('Each row is: /path/to/album,<category id>');
    logger.log('');
    return;
  }

  const csvPath = path.resolve(input);
  if (!fs.existsSync(csvPath)) {
    logger.error(`File '${csvPath}' not found`);
    logger.log('');
    return;
  }

  const userTag = ctx.currentUser ?? (await askText('Username for these folders (Enter to skip):'));

  try {
    const text = fs.readFileSync(csvPath, 'utf-8');
    const result = ctx.categories.importCsv(text, userTag ?? undefined);

    logger.log('');
    logger.success(`✓ Imported ${result.imported} entries`);
    if (result.skipped > 0) {
      logger.warn(`Skipped ${result.skipped} rows`);
    }
    if (userTag) {
      logger.dim(`Entries associated with user: '${userTag}'`);
    }
  } catch (error: unknown) {
    logger.error(`Error importing CSV: ${getErrorMessage(error)}`);
  }
  logger.log('');
}
