/**
 * Error taxonomy for crate.
 *
 * UserInputError and DuplicateNameError are reported and skipped by the
 * command that raised them; StoreError wraps every other SQLite failure.
 * Probe failures and stale folder paths never become errors.
 */

export class UserInputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UserInputError';
  }
}

export class DuplicateNameError extends Error {
  constructor(readonly categoryName: string) {
    super(`A category named "${categoryName}" already exists`);
    this.name = 'DuplicateNameError';
  }
}

export class StoreError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StoreError';
  }
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Error code for Node.js system errors and SQLite errors (ENOENT,
 * SQLITE_CONSTRAINT_UNIQUE, ...)
 */
export function getErrorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export function isUniqueViolation(error: unknown): boolean {
  return getErrorCode(error) === 'SQLITE_CONSTRAINT_UNIQUE';
}
