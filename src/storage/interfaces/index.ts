export * from './client-storage.js';
export * from './artifact-storage.js';

import type { Logger } from 'pino';
import type { IClientStorage } from './client-storage.js';
import type { IArtifactStorage } from './artifact-storage.js';

/**
 * Complete storage interface
 */
export interface IStorage {
  clients: IClientStorage;
  artifacts: IArtifactStorage;

  /**
   * Release the backend's resources
   */
  close(): Promise<void>;
}

/**
 * Storage factory options
 */
export interface StorageOptions {
  /**
   * scrypt cost (N) for client secrets
   */
  scryptCost?: number;

  logger?: Logger;

  /**
   * Clock used for expiry checks
   */
  now?: () => Date;
}
