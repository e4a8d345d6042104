import chalk from 'chalk';
import { JellyfinClient } from '../api/jellyfin';
import { logger } from '../utils/logger';
import { getErrorMessage } from '../utils/errors';
import { chooseOne, confirm } from './prompts';
import type { AppContext } from './context';

export function formatLastLogin(value: string | null | undefined): string {
  if (!value) return 'Never';
  const date = new Date(value);
  if (Number.isNaN(date.getTime())) return value;
  return date.toISOString().slice(0, 16).replace('T', ' ');
}

/** Pick the Jellyfin user whose name tags new folder assignments. */
export async function handleUsersCommand(ctx: AppContext): Promise<void> {
  const { serverUrl, apiKey } = ctx.config.jellyfin;

  logger.log('');
  logger.info(`Connecting to Jellyfin server at ${serverUrl}...`);

  try {
    const client = new JellyfinClient(serverUrl, apiKey);
    const users = await client.listUsers();

    if (users.length === 0) {
      logger.warn('No users found');
      logger.log('');
      return;
    }

    const selected = await chooseOne(
      'Select a user:',
      users.map(u => ({
        name: `${u.Name} ${chalk.dim(`(Last login: ${formatLastLogin(u.LastLoginDate)})`)}`,
        value: u,
      }))
    );

    if (selected) {
      ctx.currentUser = selected.Name;
      logger.success(`✓ Current user: ${selected.Name}`);
    }
  } catch (error: unknown) {
    logger.error(`Error connecting to Jellyfin: ${getErrorMessage(error)}`);
  }
  logger.log('');
}

/** Stamp every stored folder with one owner. */
export async function handleOwnerCommand(ctx: AppContext, args: string[]): Promise<void> {
  const owner = args.join(' ').trim() || ctx.currentUser;

  if (!owner) {
    logger.error('Usage: owner <name>  (or pick a user with "users" first)');
    logger.log('');
    return;
  }

  const count = ctx.categories.countFolders();
  const confirmed = await confirm(`Set the owner of all ${count} folders to '${owner}'?`);
  if (!confirmed) {
    logger.info('Cancelled');
    logger.log('');
    return;
  }

  try {
    const updated = ctx.categories.setUserTagForAll(owner);
    logger.success(`✓ Updated ${updated} folder entries to user '${owner}'`);
  } catch (error: unknown) {
    logger.error(getErrorMessage(error));
  }
  logger.log('');
}
