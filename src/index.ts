// Configuration
export { loadConfig, getConfig, resetConfig, constants } from './config/index.js';
export type { Config, StorageDriver } from './config/index.js';

// Logging
export { createLogger, logger, maskSignature } from './observability/logger.js';
export type { Logger } from './observability/logger.js';

// Errors
export { StorageError, RevocationError, isStorageError } from './errors/storage-error.js';
export type { StorageResource, RevocationFailure } from './errors/storage-error.js';
export { OAuthError, toOAuthError } from './errors/oauth-error.js';
export type { OAuthErrorResponse } from './errors/oauth-error.js';
export type { OAuthErrorCode, StorageErrorCode } from './errors/error-codes.js';

// Types
export type * from './types/index.js';

// Models
export { Client } from './models/client.js';
export { OrderedSet } from './models/ordered-set.js';

// Crypto
export { hashClientSecret, verifyClientSecret, isHashedSecret } from './crypto/hash.js';
export { generateClientSecret } from './crypto/random.js';

// Sessions
export { DefaultSession, OpenIdConnectSession } from './session/default-session.js';
export type { DefaultSessionInit, OpenIdConnectSessionInit } from './session/default-session.js';
export { encodeSession, decodeSession, encodePayload, decodePayload } from './session/codec.js';

// Storage
export * from './storage/index.js';

// Services
export { RevocationService } from './services/revocation-service.js';
export type { RevocationReport } from './services/revocation-service.js';
export { OAuth2Store, createOAuth2Store } from './services/oauth2-store.js';
export type { OAuth2StoreOptions } from './services/oauth2-store.js';
