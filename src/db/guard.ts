import { DuplicateNameError, StoreError, UserInputError, getErrorMessage } from '../utils/errors';

/**
 * Run a store operation, turning any failure that is not already part of
 * the error taxonomy into a StoreError.
 */
export function guardStore<T>(action: string, work: () => T): T {
  try {
    return work();
  } catch (error: unknown) {
    if (
      error instanceof DuplicateNameError ||
      error instanceof UserInputError ||
      error instanceof StoreError
    ) {
      throw error;
    }
    throw new StoreError(`Failed to ${action}: ${getErrorMessage(error)}`, { cause: error });
  }
}
