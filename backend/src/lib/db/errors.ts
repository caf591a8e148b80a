import { ApiError, ConflictError, StorageUnavailableError } from '../http/errors.js';

function sqliteCode(err: unknown): string | null {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return null;
}

/**
 * Runs a statement and maps driver failures onto the API error taxonomy.
 * Uniqueness violations become conflicts, everything else is a storage outage.
 */
export function runStatement<T>(operation: string, fn: () => T): T {
  try {
    return fn();
  } catch (err) {
    if (err instanceof ApiError) throw err;
    const code = sqliteCode(err);
    if (code === 'SQLITE_CONSTRAINT_PRIMARYKEY' || code === 'SQLITE_CONSTRAINT_UNIQUE') {
      throw new ConflictError(`Duplicate key during ${operation}`);
    }
    throw new StorageUnavailableError(operation, err);
  }
}
