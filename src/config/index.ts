import { readFileSync, existsSync } from 'node:fs';
import * as constants from './constants.js';
import { logger } from '../observability/logger.js';

export type StorageDriver = 'memory' | 'sqlite';

/**
 * Read a value from file (Docker secrets) or environment variable
 * Supports both `VAR_FILE` (path to file) and `VAR` (direct value) patterns
 */
function readSecret(envVar: string): string | undefined {
  const fileEnvVar = `${envVar}_FILE`;
  const filePath = process.env[fileEnvVar];

  if (filePath && existsSync(filePath)) {
    try {
      return readFileSync(filePath, 'utf-8').trim();
    } catch (err) {
      logger.warn({ err, path: filePath }, `Could not read ${fileEnvVar}, falling back to ${envVar}`);
    }
  }

  return process.env[envVar];
}

function parseDriver(value: string | undefined): StorageDriver {
  const driver = (value ?? 'memory').toLowerCase();
  if (driver === 'memory' || driver === 'sqlite') {
    return driver;
  }
  throw new Error(`Unsupported STORAGE_DRIVER: ${value}`);
}

function parseBoolean(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value === '') {
    return fallback;
  }
  return ['1', 'true', 'yes', 'on'].includes(value.toLowerCase());
}

/**
 * Storage configuration loaded from environment
 */
export interface Config {
  nodeEnv: string;
  storage: {
    driver: StorageDriver;
    databasePath: string;
    idempotentDeletes: boolean;
  };
  security: {
    scryptCost: number;
  };
  logging: {
    level: string;
  };
}

/**
 * Load configuration from environment variables
 */
export function loadConfig(): Config {
  const scryptCost = parseInt(
    process.env['SCRYPT_COST'] ?? String(constants.DEFAULT_SCRYPT_COST),
    10
  );

  // scrypt requires N to be a power of two greater than 1
  if (!Number.isInteger(scryptCost) || scryptCost < 2 || (scryptCost & (scryptCost - 1)) !== 0) {
    throw new Error(`SCRYPT_COST must be a power of two, got ${process.env['SCRYPT_COST']}`);
  }

  return {
    nodeEnv: process.env['NODE_ENV'] ?? 'development',
    storage: {
      driver: parseDriver(process.env['STORAGE_DRIVER']),
      databasePath: readSecret('DATABASE_PATH') ?? constants.DEFAULT_DATABASE_PATH,
      idempotentDeletes: parseBoolean(process.env['IDEMPOTENT_DELETES'], false),
    },
    security: {
      scryptCost,
    },
    logging: {
      level: process.env['LOG_LEVEL'] ?? 'info',
    },
  };
}

// Singleton config instance
let config: Config | null = null;

/**
 * Get the current configuration (loads if not already loaded)
 */
export function getConfig(): Config {
  if (!config) {
    config = loadConfig();
  }
  return config;
}

/**
 * Reset configuration (useful for testing)
 */
export function resetConfig(): void {
  config = null;
}

export { constants };
