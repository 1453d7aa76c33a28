import type { Logger } from 'pino';
import type { ArtifactKind, ArtifactRecord, OperationOptions, Requester } from '../../types/artifact.js';
import type { Session, TokenType } from '../../types/session.js';
import { StorageError, isStorageError } from '../../errors/storage-error.js';
import { encodeSession, decodeSession } from '../../session/codec.js';
import { maskSignature } from '../../observability/logger.js';

/**
 * Token type whose expiry governs each artifact kind.
 * PKCE and OIDC session records live as long as the authorization code.
 */
export const ARTIFACT_TOKEN_TYPES: Record<ArtifactKind, TokenType> = {
  access_token: 'access_token',
  refresh_token: 'refresh_token',
  authorize_code: 'authorize_code',
  pkce: 'authorize_code',
  oidc_session: 'authorize_code',
};

/**
 * Fail fast when the caller has already given up
 */
export function throwIfAborted(options?: OperationOptions): void {
  options?.signal?.throwIfAborted();
}

export function assertSignature(kind: ArtifactKind, signature: string): void {
  if (signature.length === 0) {
    throw StorageError.invalidInput('Signature must not be empty', kind);
  }
}

/**
 * Build the persisted form of a request
 */
export function toArtifactRecord(kind: ArtifactKind, signature: string, request: Requester): ArtifactRecord {
  if (request.id.length === 0) {
    throw StorageError.invalidInput('Request ID must not be empty', kind);
  }

  return {
    signature,
    requestId: request.id,
    requestedAt: new Date(request.requestedAt.getTime()),
    clientId: request.clientId,
    requestedScopes: [...request.requestedScopes],
    grantedScopes: [...request.grantedScopes],
    requestedAudience: [...request.requestedAudience],
    grantedAudience: [...request.grantedAudience],
    form: Object.fromEntries(Object.entries(request.form).map(([key, values]) => [key, [...values]])),
    session: encodeSession(request.session),
    expiresAt: request.session.getExpiresAt(ARTIFACT_TOKEN_TYPES[kind]) ?? null,
  };
}

export function isExpired(record: ArtifactRecord, now: Date): boolean {
  return record.expiresAt !== null && record.expiresAt.getTime() <= now.getTime();
}

/**
 * Turn a stored record back into a request, restoring its session into
 * the caller's target. Expired records and undecodable sessions fail.
 */
export function toRequester<S extends Session>(
  kind: ArtifactKind,
  record: ArtifactRecord,
  session: S,
  now: Date,
  logger: Logger
): Requester<S> {
  if (isExpired(record, now)) {
    throw StorageError.expired(kind, maskSignature(record.signature));
  }

  try {
    decodeSession(record.session, session);
  } catch (err) {
    if (isStorageError(err, 'malformed')) {
      logger.error(
        { kind, signature: maskSignature(record.signature), requestId: record.requestId, err },
        'Stored session payload could not be decoded'
      );
    }
    throw err;
  }

  return {
    id: record.requestId,
    requestedAt: record.requestedAt,
    clientId: record.clientId,
    requestedScopes: record.requestedScopes,
    grantedScopes: record.grantedScopes,
    requestedAudience: record.requestedAudience,
    grantedAudience: record.grantedAudience,
    form: record.form,
    session,
  };
}
