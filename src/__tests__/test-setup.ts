import { createMemoryStorage } from '../storage/memory/index.js';
import { createSqliteStorage } from '../storage/sqlite/index.js';
import type { IStorage, StorageOptions } from '../storage/interfaces/index.js';
import type { Requester } from '../types/artifact.js';
import { DefaultSession } from '../session/default-session.js';

/**
 * Test fixtures and helpers
 */

// Cheap scrypt cost so hashing stays fast in tests
export const TEST_SCRYPT_COST = 1024;

// Fixed clock shared by storage and fixtures
export const NOW = new Date('2030-01-01T12:00:00.000Z');

export function minutesFromNow(minutes: number): Date {
  return new Date(NOW.getTime() + minutes * 60_000);
}

export interface Backend {
  name: string;
  create(options?: StorageOptions): IStorage;
}

// Every storage backend, for describe.each
export const backends: Backend[] = [
  {
    name: 'memory',
    create: (options = {}) => createMemoryStorage({ scryptCost: TEST_SCRYPT_COST, now: () => NOW, ...options }),
  },
  {
    name: 'sqlite',
    create: (options = {}) =>
      createSqliteStorage({ path: ':memory:', scryptCost: TEST_SCRYPT_COST, now: () => NOW, ...options }),
  },
];

// Build a request whose session expires every token type an hour from NOW
export function createRequest(overrides: Partial<Requester<DefaultSession>> = {}): Requester<DefaultSession> {
  const expiresAt = minutesFromNow(60);

  return {
    id: 'req1',
    requestedAt: new Date('2030-01-01T11:59:00.000Z'),
    clientId: 'c1',
    requestedScopes: ['openid', 'offline_access'],
    grantedScopes: ['openid', 'offline_access'],
    requestedAudience: [],
    grantedAudience: ['https://api.example.com'],
    form: { redirect_uri: ['https://app.example.com/callback'] },
    session: new DefaultSession({
      subject: 'user-1',
      username: 'alice',
      expiresAt: {
        access_token: expiresAt,
        refresh_token: expiresAt,
        authorize_code: expiresAt,
      },
    }),
    ...overrides,
  };
}
