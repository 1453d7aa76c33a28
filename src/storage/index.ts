import type { Config } from '../config/index.js';
import type { IStorage, StorageOptions } from './interfaces/index.js';
import { createMemoryStorage } from './memory/index.js';
import { createSqliteStorage } from './sqlite/index.js';

export * from './interfaces/index.js';
export { createMemoryStorage, MemoryClientStorage, MemoryArtifactStorage } from './memory/index.js';
export { createSqliteStorage, SqliteClientStorage, SqliteArtifactStorage } from './sqlite/index.js';
export type { SqliteStorageOptions } from './sqlite/index.js';

/**
 * Create the storage backend selected by configuration
 */
export function createStorage(config: Config, options: Omit<StorageOptions, 'scryptCost'> = {}): IStorage {
  const storageOptions: StorageOptions = { ...options, scryptCost: config.security.scryptCost };

  switch (config.storage.driver) {
    case 'sqlite':
      return createSqliteStorage({ ...storageOptions, path: config.storage.databasePath });
    case 'memory':
      return createMemoryStorage(storageOptions);
  }
}
