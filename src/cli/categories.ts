import chalk from 'chalk';
import { logger } from '../utils/logger';
import { DuplicateNameError, UserInputError, getErrorMessage } from '../utils/errors';
import { chooseOne, confirm } from './prompts';
import type { AppContext } from './context';

export async function handleCategoriesCommand(ctx: AppContext, args: string[]): Promise<void> {
  const [subcommand, ...rest] = args;

  if (!subcommand || subcommand === 'list') {
    listCategories(ctx);
    return;
  }

  if (subcommand === 'create') {
    createCategory(ctx, rest.join(' '));
    return;
  }

  if (subcommand === 'delete') {
    await deleteCategory(ctx);
    return;
  }

  logger.error(`Unknown subcommand: ${subcommand}`);
  logger.dim('Available: categories, categories create <name>, categories delete');
  logger.log('');
}

function listCategories(ctx: AppContext): void {
  const categories = ctx.categories.listCategoriesWithCounts();

  if (categories.length === 0) {
    logger.log('');
    logger.dim('No categories yet.');
    logger.dim('Create one with: categories create <name>');
    logger.log('');
    return;
  }

  logger.log('');
  logger.heading(`Categories (${categories.length}):`);
  for (const category of categories) {
    logger.log(
      `  ${chalk.yellow(`[${category.id}]`)} ${category.name} ${chalk.dim(`(${category.folder_count} folders)`)}`
    );
  }
  logger.log('');
}

function createCategory(ctx: AppContext, name: string): void {
  if (!name.trim()) {
    logger.error('Usage: categories create <name>');
    logger.log('');
    return;
  }

  try {
    const category = ctx.categories.createCategory(name);
    logger.success(`✓ Category "${category.name}" created [${category.id}]`);
  } catch (error: unknown) {
    if (error instanceof DuplicateNameError) {
      logger.error(`A category named "${error.categoryName}" already exists`);
    } else if (error instanceof UserInputError) {
      logger.error(error.message);
    } else {
      logger.error(`Database error: ${getErrorMessage(error)}`);
    }
  }
  logger.log('');
}

async function deleteCategory(ctx: AppContext): Promise<void> {
  const categories = ctx.categories.listCategoriesWithCounts();

  if (categories.length === 0) {
    logger.log('');
    logger.dim('No categories found.');
    logger.log('');
    return;
  }

  logger.log('');
  const selected = await chooseOne(
    'Select a category to delete:',
    categories.map(c => ({ name: `ID${c.id} ${c.name}`, value: c }))
  );

  if (!selected) {
    logger.info('Cancelled');
    logger.log('');
    return;
  }

  const folderCount = ctx.categories.countFoldersInCategory(selected.id);
  if (folderCount > 0) {
    const confirmed = await confirm(
      `${folderCount} folders are assigned to "${selected.name}". Delete anyway?`
    );
    if (!confirmed) {
      logger.info('Deletion cancelled');
      logger.log('');
      return;
    }
  }

  try {
    const cleared = ctx.categories.deleteCategory(selected.id);
    logger.success(`✓ Category "${selected.name}" deleted`);
    if (cleared > 0) {
      logger.dim(`${cleared} folders are now uncategorized`);
    }
  } catch (error: unknown) {
    logger.error(getErrorMessage(error));
  }
  logger.log('');
}
