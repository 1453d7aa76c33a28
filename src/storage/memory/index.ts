import type { IStorage, StorageOptions } from '../interfaces/index.js';
import { MemoryClientStorage } from './client-storage.js';
import { MemoryArtifactStorage } from './artifact-storage.js';

export { MemoryClientStorage } from './client-storage.js';
export { MemoryArtifactStorage } from './artifact-storage.js';

/**
 * Create a complete in-memory storage implementation
 */
export function createMemoryStorage(options: StorageOptions = {}): IStorage {
  return {
    clients: new MemoryClientStorage({ scryptCost: options.scryptCost, logger: options.logger }),
    artifacts: new MemoryArtifactStorage({ now: options.now, logger: options.logger }),
    async close() {},
  };
}
