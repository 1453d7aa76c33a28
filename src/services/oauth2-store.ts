import type { Logger } from 'pino';
import type { ArtifactKind, OperationOptions, Requester } from '../types/artifact.js';
import type { Session } from '../types/session.js';
import type { IStorage } from '../storage/interfaces/index.js';
import type { Config } from '../config/index.js';
import type { Client } from '../models/client.js';
import { StorageError, isStorageError } from '../errors/storage-error.js';
import { logger as rootLogger, maskSignature } from '../observability/logger.js';
import {
  ARTIFACT_ACCESS_TOKEN,
  ARTIFACT_REFRESH_TOKEN,
  ARTIFACT_AUTHORIZE_CODE,
  ARTIFACT_PKCE,
  ARTIFACT_OIDC_SESSION,
  ARTIFACT_KINDS,
} from '../config/constants.js';
import { createStorage } from '../storage/index.js';
import { RevocationService, type RevocationReport } from './revocation-service.js';

export interface OAuth2StoreOptions {
  /**
   * Treat deleting an absent artifact as success
   */
  idempotentDeletes?: boolean;
  logger?: Logger;
}

/**
 * Storage facade for an OAuth 2.0 / OpenID Connect protocol engine
 *
 * Exposes the per-kind session methods the engine calls, delegating each to
 * the generic artifact store, and refuses to issue or read artifacts for
 * disabled clients.
 */
export class OAuth2Store {
  private readonly revocation: RevocationService;
  private readonly idempotentDeletes: boolean;
  private readonly logger: Logger;

  constructor(
    private readonly storage: IStorage,
    options: OAuth2StoreOptions = {}
  ) {
    this.idempotentDeletes = options.idempotentDeletes ?? false;
    this.logger = (options.logger ?? rootLogger).child({ component: 'oauth2-store' });
    this.revocation = new RevocationService(storage.artifacts, { logger: options.logger });
  }

  /**
   * Fetch a client the engine may act for
   */
  async getClient(id: string, options?: OperationOptions): Promise<Client> {
    const client = await this.storage.clients.get(id, options);
    if (client.isDisabled()) {
      throw StorageError.accessDenied('client', `Client is disabled: ${id}`);
    }
    return client;
  }

  async authenticateClient(id: string, secret: string, options?: OperationOptions): Promise<Client> {
    return this.storage.clients.authenticate(id, secret, options);
  }

  // Access tokens

  createAccessTokenSession(signature: string, request: Requester, options?: OperationOptions): Promise<void> {
    return this.createSession(ARTIFACT_ACCESS_TOKEN, signature, request, options);
  }

  getAccessTokenSession<S extends Session>(
    signature: string,
    session: S,
    options?: OperationOptions
  ): Promise<Requester<S>> {
    return this.getSession(ARTIFACT_ACCESS_TOKEN, signature, session, options);
  }

  deleteAccessTokenSession(signature: string, options?: OperationOptions): Promise<void> {
    return this.deleteSession(ARTIFACT_ACCESS_TOKEN, signature, options);
  }

  // Refresh tokens

  createRefreshTokenSession(signature: string, request: Requester, options?: OperationOptions): Promise<void> {
    return this.createSession(ARTIFACT_REFRESH_TOKEN, signature, request, options);
  }

  getRefreshTokenSession<S extends Session>(
    signature: string,
    session: S,
    options?: OperationOptions
  ): Promise<Requester<S>> {
    return this.getSession(ARTIFACT_REFRESH_TOKEN, signature, session, options);
  }

  deleteRefreshTokenSession(signature: string, options?: OperationOptions): Promise<void> {
    return this.deleteSession(ARTIFACT_REFRESH_TOKEN, signature, options);
  }

  // Authorization codes

  createAuthorizeCodeSession(signature: string, request: Requester, options?: OperationOptions): Promise<void> {
    return this.createSession(ARTIFACT_AUTHORIZE_CODE, signature, request, options);
  }

  getAuthorizeCodeSession<S extends Session>(
    signature: string,
    session: S,
    options?: OperationOptions
  ): Promise<Requester<S>> {
    return this.getSession(ARTIFACT_AUTHORIZE_CODE, signature, session, options);
  }

  deleteAuthorizeCodeSession(signature: string, options?: OperationOptions): Promise<void> {
    return this.deleteSession(ARTIFACT_AUTHORIZE_CODE, signature, options);
  }

  // PKCE requests

  createPKCERequestSession(signature: string, request: Requester, options?: OperationOptions): Promise<void> {
    return this.createSession(ARTIFACT_PKCE, signature, request, options);
  }

  getPKCERequestSession<S extends Session>(
    signature: string,
    session: S,
    options?: OperationOptions
  ): Promise<Requester<S>> {
    return this.getSession(ARTIFACT_PKCE, signature, session, options);
  }

  deletePKCERequestSession(signature: string, options?: OperationOptions): Promise<void> {
    return this.deleteSession(ARTIFACT_PKCE, signature, options);
  }

  // OpenID Connect sessions, keyed by authorization code

  createOpenIDConnectSession(signature: string, request: Requester, options?: OperationOptions): Promise<void> {
    return this.createSession(ARTIFACT_OIDC_SESSION, signature, request, options);
  }

  getOpenIDConnectSession<S extends Session>(
    signature: string,
    session: S,
    options?: OperationOptions
  ): Promise<Requester<S>> {
    return this.getSession(ARTIFACT_OIDC_SESSION, signature, session, options);
  }

  deleteOpenIDConnectSession(signature: string, options?: OperationOptions): Promise<void> {
    return this.deleteSession(ARTIFACT_OIDC_SESSION, signature, options);
  }

  // Revocation

  revokeRefreshToken(requestId: string, options?: OperationOptions): Promise<RevocationReport> {
    return this.revocation.revokeRefreshToken(requestId, options);
  }

  revokeAccessToken(requestId: string, options?: OperationOptions): Promise<RevocationReport> {
    return this.revocation.revokeAccessToken(requestId, options);
  }

  revokeRequest(requestId: string, options?: OperationOptions): Promise<RevocationReport> {
    return this.revocation.revokeRequest(requestId, options);
  }

  /**
   * Remove expired artifacts of every kind
   * Intended for an external janitor; lookups already reject expired records.
   */
  async deleteExpired(options?: OperationOptions): Promise<Record<ArtifactKind, number>> {
    const deleted: Record<ArtifactKind, number> = {
      access_token: 0,
      refresh_token: 0,
      authorize_code: 0,
      pkce: 0,
      oidc_session: 0,
    };
    for (const kind of ARTIFACT_KINDS) {
      deleted[kind] = await this.storage.artifacts.deleteExpired(kind, options);
    }
    this.logger.info({ deleted }, 'Expired artifacts cleaned up');
    return deleted;
  }

  /**
   * Release the underlying storage
   */
  async close(): Promise<void> {
    await this.storage.close();
  }

  async createSession(
    kind: ArtifactKind,
    signature: string,
    request: Requester,
    options?: OperationOptions
  ): Promise<void> {
    await this.getClient(request.clientId, options);
    await this.storage.artifacts.create(kind, signature, request, options);
  }

  async getSession<S extends Session>(
    kind: ArtifactKind,
    signature: string,
    session: S,
    options?: OperationOptions
  ): Promise<Requester<S>> {
    const request = await this.storage.artifacts.get(kind, signature, session, options);
    await this.getClient(request.clientId, options);
    return request;
  }

  async deleteSession(kind: ArtifactKind, signature: string, options?: OperationOptions): Promise<void> {
    try {
      await this.storage.artifacts.delete(kind, signature, options);
    } catch (err) {
      if (this.idempotentDeletes && isStorageError(err, 'not_found')) {
        this.logger.debug({ kind, signature: maskSignature(signature) }, 'Artifact already absent');
        return;
      }
      throw err;
    }
  }
}

/**
 * Create a store over the configured backend
 */
export function createOAuth2Store(config: Config, options: { logger?: Logger } = {}): OAuth2Store {
  const storage = createStorage(config, { logger: options.logger });
  return new OAuth2Store(storage, { idempotentDeletes: config.storage.idempotentDeletes, logger: options.logger });
}
