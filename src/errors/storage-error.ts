import type { ArtifactKind } from '../types/artifact.js';
import {
  type StorageErrorCode,
  STORAGE_NOT_FOUND,
  STORAGE_CONFLICT,
  STORAGE_EXPIRED,
  STORAGE_MALFORMED,
  STORAGE_UNAVAILABLE,
  STORAGE_INVALID_INPUT,
  STORAGE_ACCESS_DENIED,
  STORAGE_REVOCATION_INCOMPLETE,
} from './error-codes.js';

/**
 * The record type an error refers to
 */
export type StorageResource = 'client' | ArtifactKind;

/**
 * Storage error
 * Carries a code callers can branch on (e.g. not_found -> invalid_grant)
 */
export class StorageError extends Error {
  public readonly code: StorageErrorCode;
  public readonly resource?: StorageResource;

  constructor(
    code: StorageErrorCode,
    message: string,
    options?: {
      resource?: StorageResource;
      cause?: unknown;
    }
  ) {
    super(message);
    this.name = 'StorageError';
    this.code = code;

    if (options?.resource) {
      this.resource = options.resource;
    }
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }

    Error.captureStackTrace(this, this.constructor);
  }

  static notFound(resource: StorageResource, key: string): StorageError {
    return new StorageError(STORAGE_NOT_FOUND, `${resource} not found: ${key}`, { resource });
  }

  static conflict(resource: StorageResource, key: string, cause?: unknown): StorageError {
    return new StorageError(STORAGE_CONFLICT, `${resource} already exists: ${key}`, {
      resource,
      cause,
    });
  }

  static expired(resource: StorageResource, key: string): StorageError {
    return new StorageError(STORAGE_EXPIRED, `${resource} has expired: ${key}`, { resource });
  }

  static malformed(description: string, options?: { resource?: StorageResource; cause?: unknown }): StorageError {
    return new StorageError(STORAGE_MALFORMED, description, options);
  }

  static unavailable(description: string, cause?: unknown): StorageError {
    return new StorageError(STORAGE_UNAVAILABLE, description, { cause });
  }

  static invalidInput(description: string, resource?: StorageResource, cause?: unknown): StorageError {
    return new StorageError(STORAGE_INVALID_INPUT, description, { resource, cause });
  }

  static accessDenied(resource: StorageResource, description: string): StorageError {
    return new StorageError(STORAGE_ACCESS_DENIED, description, { resource });
  }
}

/**
 * A failed deletion within a cascading revocation
 */
export interface RevocationFailure {
  kind: ArtifactKind;
  error: unknown;
}

/**
 * Raised when a cascading revocation could not delete every artifact.
 * The grant must be treated as not guaranteed revoked.
 */
export class RevocationError extends StorageError {
  public readonly requestId: string;
  public readonly failures: RevocationFailure[];
  public readonly deleted: Partial<Record<ArtifactKind, number>>;

  constructor(
    requestId: string,
    failures: RevocationFailure[],
    deleted: Partial<Record<ArtifactKind, number>>
  ) {
    const kinds = failures.map((failure) => failure.kind).join(', ');
    super(
      STORAGE_REVOCATION_INCOMPLETE,
      `Revocation of request ${requestId} is incomplete, failed to delete: ${kinds}`,
      { cause: failures[0]?.error }
    );
    this.name = 'RevocationError';
    this.requestId = requestId;
    this.failures = failures;
    this.deleted = deleted;
  }
}

/**
 * Type guard for storage errors, optionally narrowed to one code
 */
export function isStorageError(error: unknown, code?: StorageErrorCode): error is StorageError {
  return error instanceof StorageError && (code === undefined || error.code === code);
}
