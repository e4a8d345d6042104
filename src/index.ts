#!/usr/bin/env tsx
import * as readline from 'readline';
import chalk from 'chalk';
import dotenv from 'dotenv';
import { checkRuntime } from './utils/check-runtime';
import { ConfigError, loadConfig } from './utils/config';
import { logger } from './utils/logger';
import { getErrorMessage } from './utils/errors';
import { CatalogStore, CategoryStore, openDatabase } from './db';
import { FolderScanner } from './services/scanner';
import { MetadataProber } from './services/prober';
import { handleCategoriesCommand } from './cli/categories';
import { handleAssignCommand, handleFoldersCommand } from './cli/assign';
import { handleImportCommand } from './cli/import';
import { handleGenerateCommand } from './cli/generate';
import { handlePruneCommand } from './cli/prune';
import { handleOwnerCommand, handleUsersCommand } from './cli/users';
import { handleCatalogCommand, handleScanCommand } from './cli/catalog';
import type { AppContext } from './cli/context';

checkRuntime();
dotenv.config();

const commands = {
  categories: 'Manage categories (list, create <name>, delete)',
  assign: 'Assign new music folders to categories',
  reassign: 'Walk all folders and change their categories',
  folders: 'List music folders with their categories',
  import: 'Import folder categories from CSV (import <file>)',
  generate: 'Write playlist.xml files for every category',
  prune: 'Remove folders that no longer exist on disk',
  users: 'Pick the Jellyfin user that owns new assignments',
  owner: 'Set the owner of all folders (owner <name>)',
  scan: 'Mirror Jellyfin music albums and tracks',
  catalog: 'Browse the mirror (types, roots, children <id>, search <text>, type <type>)',
  status: 'Show library stats',
  info: 'Show configuration',
  clear: 'Clear screen',
  exit: 'Exit crate',
} as const;

const ASCII_ART = `
 ██████╗██████╗  █████╗ ████████╗███████╗
██╔════╝██╔══██╗██╔══██╗╚══██╔══╝██╔════╝
██║     ██████╔╝███████║   ██║   █████╗
██║     ██╔══██╗██╔══██║   ██║   ██╔══╝
╚██████╗██║  ██║██║  ██║   ██║   ███████╗
 ╚═════╝╚═╝  ╚═╝╚═╝  ╚═╝   ╚═╝   ╚══════╝
`;

const FAREWELL = 'Crates sorted. Until next time...';

// Raw keypress input has to be released while inquirer owns the terminal
let keypressEnabled = true;

async function withPrompts(work: () => Promise<void>): Promise<void> {
  keypressEnabled = false;
  if (process.stdin.isTTY) {
    process.stdin.setRawMode(false);
  }

  try {
    await work();
  } finally {
    process.stdin.resume();
    if (process.stdin.isTTY) {
      process.stdin.setRawMode(true);
    }
    keypressEnabled = true;
  }
}

function showWelcome(ctx: AppContext): void {
  logger.log('');
  logger.log(chalk.magenta(ASCII_ART));
  logger.log(chalk.dim('Music folder categories and Jellyfin playlists'));

  if (ctx.currentUser) {
    logger.log('');
    logger.log(chalk.gray('Current user: ') + chalk.cyan(ctx.currentUser));
  }

  logger.log('');
  logger.heading('Commands:');
  Object.entries(commands).forEach(([cmd, desc]) => {
    logger.log(`  ${chalk.yellow(cmd.padEnd(12))} ${chalk.dim(desc)}`);
  });
  logger.log('');
}

function showStatus(ctx: AppContext): void {
  const categorized = new Set(ctx.categories.listFoldersWithCategories().map(f => f.path));
  const onDisk = ctx.scanner.scan(ctx.config.musicDir);
  const uncategorized = onDisk.filter(folder => !categorized.has(folder)).length;

  logger.log('');
  logger.log(chalk.bold.magenta('crate Status'));
  logger.log('');
  logger.log(chalk.gray('Categories:       ') + chalk.white(ctx.categories.listCategories().length));
  logger.log(chalk.gray('Stored folders:   ') + chalk.white(ctx.categories.countFolders()));
  logger.log(chalk.gray('Categorized:      ') + chalk.white(categorized.size));
  logger.log(chalk.gray('Music folders:    ') + chalk.white(onDisk.length));
  logger.log(chalk.gray('Uncategorized:    ') + chalk.white(uncategorized));
  logger.log(chalk.gray('Catalog items:    ') + chalk.white(ctx.catalog.count()));
  logger.log('');
}

function showInfo(ctx: AppContext): void {
  const { config } = ctx;
  logger.log('');
  logger.log(chalk.bold.magenta('crate'));
  logger.log(chalk.gray('Music:     ') + chalk.white(config.musicDir));
  logger.log(chalk.gray('Playlists: ') + chalk.white(config.playlistDir));
  logger.log(chalk.gray('Database:  ') + chalk.white(config.dbPath));
  logger.log(chalk.gray('ffprobe:   ') + chalk.white(config.ffprobePath));
  logger.log(chalk.gray('Formats:   ') + chalk.white(config.audioExtensions.join(', ')));
  logger.log(chalk.gray('Jellyfin:  ') + chalk.white(config.jellyfin.serverUrl));
  logger.log('');
}

async function handleCommand(ctx: AppContext, input: string): Promise<boolean> {
  // Only the command word is case-insensitive; arguments keep their case
  const parts = input.trim().replace(/^\//, '').split(/\s+/);
  const cmd = (parts[0] ?? '').toLowerCase();
  const args = parts.slice(1);

  switch (cmd) {
    case 'categories':
      await withPrompts(() => handleCategoriesCommand(ctx, args));
      break;

    case 'assign':
      await withPrompts(() => handleAssignCommand(ctx, 'assign-new'));
      break;

    case 'reassign':
      await withPrompts(() => handleAssignCommand(ctx, 'reassign'));
      break;

    case 'folders':
      handleFoldersCommand(ctx);
      break;

    case 'import':
      await withPrompts(() => handleImportCommand(ctx, args));
      break;

    case 'generate':
      await handleGenerateCommand(ctx);
      break;

    case 'prune':
      await withPrompts(() => handlePruneCommand(ctx));
      break;

    case 'users':
      await withPrompts(() => handleUsersCommand(ctx));
      break;

    case 'owner':
      await withPrompts(() => handleOwnerCommand(ctx, args));
      break;

    case 'scan':
      await withPrompts(() => handleScanCommand(ctx));
      break;

    case 'catalog':
      handleCatalogCommand(ctx, args);
      break;

    case 'status':
      showStatus(ctx);
      break;

    case 'info':
      showInfo(ctx);
      break;

    case 'clear':
      console.clear();
      showWelcome(ctx);
      break;

    case 'exit':
      logger.log('');
      logger.log(chalk.magenta(FAREWELL));
      logger.log('');
      return true;

    case '':
      break;

    default:
      logger.log('');
      logger.error(`Unknown command: ${input}`);
      logger.dim('Type clear to see available commands');
      logger.log('');
      break;
  }

  return false;
}

function createContext(): AppContext {
  const config = loadConfig();
  const db = openDatabase(config.dbPath);

  return {
    config,
    categories: new CategoryStore(db),
    catalog: new CatalogStore(db),
    scanner: new FolderScanner(config.audioExtensions),
    prober: new MetadataProber(config.ffprobePath),
    currentUser: null,
  };
}

function startRepl(ctx: AppContext): void {
  let inputBuffer = '';
  const commandHistory: string[] = [];
  let historyIndex = -1;
  let busy = false;

  const redraw = () => {
    process.stdout.write('\r\x1b[K' + chalk.cyan('> ') + inputBuffer);
  };

  const handleInput = async (char: string | undefined, key: readline.Key): Promise<void> => {
    if (!keypressEnabled || busy) return;

    if (key.name === 'return') {
      const command = inputBuffer.trim();

      process.stdout.write('\r\x1b[K');
      if (command) {
        logger.log(chalk.dim('> ' + command));
        if (commandHistory[commandHistory.length - 1] !== command) {
          commandHistory.push(command);
        }
        historyIndex = -1;
      } else {
        process.stdout.write('\n');
      }

      inputBuffer = '';

      busy = true;
      try {
        if (await handleCommand(ctx, command)) {
          process.exit(0);
        }
      } finally {
        busy = false;
      }

      process.stdout.write(chalk.cyan('> '));
    } else if (key.name === 'up') {
      if (commandHistory.length > 0) {
        if (historyIndex === -1) {
          historyIndex = commandHistory.length - 1;
        } else if (historyIndex > 0) {
          historyIndex--;
        }
        inputBuffer = commandHistory[historyIndex] ?? '';
        redraw();
      }
    } else if (key.name === 'down') {
      if (historyIndex !== -1) {
        if (historyIndex < commandHistory.length - 1) {
          historyIndex++;
          inputBuffer = commandHistory[historyIndex] ?? '';
        } else {
          historyIndex = -1;
          inputBuffer = '';
        }
        redraw();
      }
    } else if (key.name === 'backspace') {
      if (inputBuffer.length > 0) {
        inputBuffer = inputBuffer.slice(0, -1);
        process.stdout.write('\b \b');
      }
    } else if (key.ctrl && key.name === 'c') {
      process.stdout.write('\n');
      logger.log('');
      logger.log(chalk.magenta(FAREWELL));
      logger.log('');
      process.exit(0);
    } else if (char && !key.ctrl && !key.meta && char.length === 1 && char.charCodeAt(0) >= 32) {
      inputBuffer += char;
      process.stdout.write(char);
    }
  };

  process.stdin.resume();
  process.stdin.setEncoding('utf8');
  if (process.stdin.isTTY) {
    process.stdin.setRawMode(true);
  }
  readline.emitKeypressEvents(process.stdin);

  process.stdout.write(chalk.cyan('> '));

  process.stdin.on('keypress', (char: string | undefined, key: readline.Key) => {
    handleInput(char, key).catch((error: unknown) => {
      logger.error(`Command failed: ${getErrorMessage(error)}`);
      process.stdout.write(chalk.cyan('> '));
    });
  });
}

function main(): void {
  let ctx: AppContext;
  try {
    ctx = createContext();
  } catch (error: unknown) {
    if (error instanceof ConfigError) {
      logger.error(error.message);
      logger.dim('Set the variables in your environment or a .env file (see .env.example)');
    } else {
      logger.error(`Startup failed: ${getErrorMessage(error)}`);
    }
    process.exit(1);
  }

  console.clear();
  showWelcome(ctx);
  startRepl(ctx);
}

main();
