import chalk from 'chalk';
import { JellyfinClient } from '../api/jellyfin';
import { CatalogSync } from '../services/catalogSync';
import { logger } from '../utils/logger';
import { getErrorMessage } from '../utils/errors';
import { confirm } from './prompts';
import type { AppContext } from './context';
import type { CatalogItem } from '../types';

export async function handleScanCommand(ctx: AppContext): Promise<void> {
  const { serverUrl, apiKey } = ctx.config.jellyfin;

  logger.log('');
  logger.info(`Scanning Jellyfin music albums at ${serverUrl}...`);

  try {
    const client = new JellyfinClient(serverUrl, apiKey);
    const clearFirst = await confirm('Clear existing item data before scanning?');
    const result = await new CatalogSync(client, ctx.catalog).sync({ clearFirst });

    logger.log('');
    logger.success('✓ Scan complete');
    logger.info(`Albums: ${result.albums}, Tracks: ${result.tracks}, Stored: ${result.stored}`);
    if (result.failedAlbums > 0) {
      logger.warn(`Could not read tracks for ${result.failedAlbums} albums`);
    }
    showTypeCounts(ctx);
  } catch (error: unknown) {
    logger.error(`Scan failed: ${getErrorMessage(error)}`);
  }
  logger.log('');
}

export function handleCatalogCommand(ctx: AppContext, args: string[]): void {
  const [subcommand, ...rest] = args;
  const value = rest.join(' ').trim();

  if (ctx.catalog.count() === 0) {
    logger.log('');
    logger.dim('The catalog is empty. Run "scan" first.');
    logger.log('');
    return;
  }

  switch (subcommand) {
    case undefined:
    case 'types':
      logger.log('');
      showTypeCounts(ctx);
      break;

    case 'roots':
      showItems('Root items', ctx.catalog.rootItems());
      break;

    case 'children':
      if (!value) {
        logger.error('Usage: catalog children <item id>');
        break;
      }
      showItems(`Children of ${value}`, ctx.catalog.childrenOf(value));
      break;

    case 'search':
      if (!value) {
        logger.error('Usage: catalog search <text>');
        break;
      }
      showItems(`Matching "${value}"`, ctx.catalog.searchByTitle(value));
      break;

    case 'type':
      if (!value) {
        logger.error(`Usage: catalog type <${ctx.catalog.listTypes().join('|')}>`);
        break;
      }
      showItems(`${value} items`, ctx.catalog.itemsByType(value));
      break;

    default:
      logger.error(`Unknown subcommand: ${subcommand}`);
      logger.dim('Available: catalog types, roots, children <id>, search <text>, type <type>');
  }
  logger.log('');
}

function showTypeCounts(ctx: AppContext): void {
  logger.heading(`Items in catalog (${ctx.catalog.count()}):`);
  for (const { type, count } of ctx.catalog.countByType()) {
    logger.log(`  ${type.padEnd(16)} ${chalk.white(count)}`);
  }
}

function showItems(title: string, items: CatalogItem[]): void {
  logger.log('');
  if (items.length === 0) {
    logger.dim(`${title}: none`);
    return;
  }

  logger.heading(`${title} (${items.length}):`);
  for (const item of items) {
    logger.log(`  ${chalk.yellow(item.item_id)} ${item.title} ${chalk.dim(`[${item.type}]`)}`);
    if (item.path) {
      logger.dim(`    ${item.path}`);
    }
  }
}
