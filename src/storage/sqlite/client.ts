import Database from 'better-sqlite3';
import type { Logger } from 'pino';
import { StorageError } from '../../errors/storage-error.js';
import { schemaStatements } from './schema.js';

/**
 * Open (or create) a SQLite database and ensure the schema exists
 */
export function openDatabase(path: string, logger: Logger): Database.Database {
  let db: Database.Database;
  try {
    db = new Database(path);
  } catch (err) {
    throw StorageError.unavailable(`Could not open database at ${path}`, err);
  }

  try {
    db.pragma('journal_mode = WAL');
    db.pragma('foreign_keys = ON');
    db.exec(schemaStatements());
  } catch (err) {
    db.close();
    throw StorageError.unavailable(`Could not initialize database at ${path}`, err);
  }

  logger.info({ path }, 'SQLite storage initialized');
  return db;
}

/**
 * Close the database connection
 */
export function closeDatabase(db: Database.Database): void {
  if (db.open) {
    db.close();
  }
}
