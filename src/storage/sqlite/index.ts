import type { IStorage, StorageOptions } from '../interfaces/index.js';
import { logger as rootLogger } from '../../observability/logger.js';
import { openDatabase, closeDatabase } from './client.js';
import { SqliteClientStorage } from './repositories/client-repository.js';
import { SqliteArtifactStorage } from './repositories/artifact-repository.js';

export { SqliteClientStorage } from './repositories/client-repository.js';
export { SqliteArtifactStorage } from './repositories/artifact-repository.js';
export { openDatabase, closeDatabase } from './client.js';

export interface SqliteStorageOptions extends StorageOptions {
  /**
   * Database file, or `:memory:`
   */
  path: string;
}

/**
 * Create a complete SQLite storage implementation
 */
export function createSqliteStorage(options: SqliteStorageOptions): IStorage {
  const logger = options.logger ?? rootLogger;
  const db = openDatabase(options.path, logger);

  return {
    clients: new SqliteClientStorage(db, { scryptCost: options.scryptCost, logger }),
    artifacts: new SqliteArtifactStorage(db, { now: options.now, logger }),
    async close() {
      closeDatabase(db);
    },
  };
}
