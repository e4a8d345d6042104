import chalk from 'chalk';
import inquirer from 'inquirer';
import type { AssignmentAnswer, FolderPrompt } from '../services/assignment';
import type { StaleFolder } from '../db/categories';
import { PREVIEW_FILE_COUNT } from '../utils/constants';
import { AppPaths } from '../utils/paths';
import { logger } from '../utils/logger';
import type { PruneDecision } from '../types';

const PATH_WIDTH = 60;
const CATEGORY_WIDTH = 30;

export function truncate(text: string, width: number): string {
  return text.length > width ? `${text.slice(0, width - 3)}...` : text;
}

export function formatFolderLine(relativePath: string, categoryName: string | null): string {
  const folder = truncate(relativePath, PATH_WIDTH).padEnd(PATH_WIDTH);
  const category = categoryName ? truncate(categoryName, CATEGORY_WIDTH) : chalk.red('Uncategorized');
  return `${folder} ${category}`;
}

function showFolderPreview(prompt: FolderPrompt, musicDir: string): void {
  const relative = AppPaths.toDisplayPath(musicDir, prompt.folder);
  logger.log('');
  logger.log(
    `${chalk.dim(`[${prompt.position + 1}/${prompt.total}]`)} Folder: ${chalk.red(relative)}`
  );
  logger.dim(`Contains ${prompt.audioFiles.length} audio files:`);
  prompt.audioFiles.slice(0, PREVIEW_FILE_COUNT).forEach((file, i) => {
    logger.log(`  ${i + 1}. ${file}`);
  });
  if (prompt.audioFiles.length > PREVIEW_FILE_COUNT) {
    logger.dim(`  ... and ${prompt.audioFiles.length - PREVIEW_FILE_COUNT} more files`);
  }
}

/** Asks which category a folder belongs to. */
export function createFolderChooser(musicDir: string) {
  return async (prompt: FolderPrompt): Promise<AssignmentAnswer> => {
    showFolderPreview(prompt, musicDir);

    const choices = [
      ...prompt.categories.map(c => ({
        name: `ID${c.id} ${c.name}`,
        value: { kind: 'category', categoryId: c.id } satisfies AssignmentAnswer,
      })),
      new inquirer.Separator(),
      { name: 'Skip', value: { kind: 'skip' } satisfies AssignmentAnswer },
      ...(prompt.canGoBack
        ? [{ name: 'Back to previous folder', value: { kind: 'back' } satisfies AssignmentAnswer }]
        : []),
      { name: 'Back to main menu', value: { kind: 'cancel' } satisfies AssignmentAnswer },
    ];

    const defaultIndex = prompt.categories.findIndex(c => c.id === prompt.currentCategoryId);

    try {
      const { answer } = await inquirer.prompt<{ answer: AssignmentAnswer }>([
        {
          type: 'list',
          name: 'answer',
          message: 'Select a category for this folder:',
          choices,
          default: defaultIndex >= 0 ? defaultIndex : 0,
          pageSize: 15,
        },
      ]);
      return answer;
    } catch {
      return { kind: 'cancel' };
    }
  };
}

export async function choosePruneDecision(folder: StaleFolder): Promise<PruneDecision> {
  logger.log('');
  logger.warn(`Invalid path: '${folder.path}' (Category: ${folder.category_name ?? 'Unknown'})`);

  try {
    const { decision } = await inquirer.prompt<{ decision: PruneDecision }>([
      {
        type: 'list',
        name: 'decision',
        message: 'Remove this entry from the database?',
        choices: [
          { name: 'Yes', value: 'remove' },
          { name: 'No', value: 'keep' },
          { name: 'Skip', value: 'skip' },
          { name: 'Cancel', value: 'abort' },
        ],
      },
    ]);
    return decision;
  } catch {
    return 'abort';
  }
}

export async function confirm(message: string): Promise<boolean> {
  try {
    const { confirmed } = await inquirer.prompt<{ confirmed: boolean }>([
      { type: 'confirm', name: 'confirmed', message, default: false },
    ]);
    return confirmed;
  } catch {
    return false;
  }
}

export async function askText(message: string): Promise<string | null> {
  try {
    const { value } = await inquirer.prompt<{ value: string }>([
      { type: 'input', name: 'value', message, prefix: '>' },
    ]);
    return value.trim() || null;
  } catch {
    return null;
  }
}

export async function chooseOne<T>(
  message: string,
  options: { name: string; value: T }[]
): Promise<T | null> {
  try {
    const { choice } = await inquirer.prompt<{ choice: T | null }>([
      {
        type: 'list',
        name: 'choice',
        message,
        choices: [...options, new inquirer.Separator(), { name: 'Back', value: null }],
        pageSize: 15,
      },
    ]);
    return choice;
  } catch {
    return null;
  }
}
