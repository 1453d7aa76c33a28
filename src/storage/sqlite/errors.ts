import type { StorageResource } from '../../errors/storage-error.js';
import { StorageError } from '../../errors/storage-error.js';

const CONFLICT_CODES = new Set(['SQLITE_CONSTRAINT_PRIMARYKEY', 'SQLITE_CONSTRAINT_UNIQUE']);
const UNAVAILABLE_PREFIXES = ['SQLITE_BUSY', 'SQLITE_LOCKED', 'SQLITE_CANTOPEN', 'SQLITE_IOERR', 'SQLITE_FULL'];

function sqliteCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

/**
 * Map a better-sqlite3 failure onto the storage taxonomy
 * Errors that have no storage meaning are returned unchanged
 */
export function translateSqliteError(err: unknown, resource: StorageResource, key: string): unknown {
  if (err instanceof StorageError) {
    return err;
  }

  const code = sqliteCode(err);
  if (code !== undefined && CONFLICT_CODES.has(code)) {
    return StorageError.conflict(resource, key, err);
  }
  if (code !== undefined && UNAVAILABLE_PREFIXES.some((prefix) => code.startsWith(prefix))) {
    return StorageError.unavailable(`Database unavailable (${code})`, err);
  }

  // better-sqlite3 raises a TypeError once the connection is closed
  if (err instanceof TypeError && err.message.includes('database connection is not open')) {
    return StorageError.unavailable('Database connection is closed', err);
  }

  return err;
}
