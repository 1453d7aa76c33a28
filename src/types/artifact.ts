import type { ARTIFACT_KINDS } from '../config/constants.js';
import type { Session } from './session.js';

/**
 * Kinds of artifact produced during grant flows
 */
export type ArtifactKind = (typeof ARTIFACT_KINDS)[number];

/**
 * An authorization request as seen by the storage layer.
 * Every artifact issued from one grant shares the same `id`.
 */
export interface Requester<S extends Session = Session> {
  id: string; // Request ID, shared across a grant
  requestedAt: Date;
  clientId: string;
  requestedScopes: string[];
  grantedScopes: string[];
  requestedAudience: string[];
  grantedAudience: string[];
  form: Record<string, string[]>; // Sanitized request form values
  session: S;
}

/**
 * Artifact as persisted by a storage backend
 */
export interface ArtifactRecord {
  signature: string; // Digest of the token or code, never the raw value
  requestId: string;
  requestedAt: Date;
  clientId: string;
  requestedScopes: string[];
  grantedScopes: string[];
  requestedAudience: string[];
  grantedAudience: string[];
  form: Record<string, string[]>;
  session: Uint8Array; // Encoded session payload
  expiresAt: Date | null;
}

/**
 * Per-call options accepted by every storage operation
 */
export interface OperationOptions {
  /**
   * Aborting before the operation runs leaves storage untouched
   */
  signal?: AbortSignal;
}
