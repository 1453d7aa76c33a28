import {
  type OAuthErrorCode,
  ERROR_STATUS_CODES,
  ERROR_DESCRIPTIONS,
  ERROR_INVALID_REQUEST,
  ERROR_INVALID_CLIENT,
  ERROR_INVALID_GRANT,
  ERROR_UNAUTHORIZED_CLIENT,
  ERROR_SERVER_ERROR,
  ERROR_TEMPORARILY_UNAVAILABLE,
} from './error-codes.js';
import { StorageError } from './storage-error.js';

/**
 * OAuth 2.0 Error Response
 * RFC 6749 Section 5.2
 */
export interface OAuthErrorResponse {
  error: OAuthErrorCode;
  error_description?: string;
}

/**
 * OAuth 2.0 Error class
 * Represents RFC-compliant OAuth errors
 */
export class OAuthError extends Error {
  public readonly code: OAuthErrorCode;
  public readonly statusCode: number;
  public readonly description: string;

  constructor(code: OAuthErrorCode, description?: string, options?: { cause?: unknown }) {
    const desc = description ?? ERROR_DESCRIPTIONS[code];
    super(desc);
    this.name = 'OAuthError';
    this.code = code;
    this.statusCode = ERROR_STATUS_CODES[code];
    this.description = desc;

    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }

    // Maintains proper stack trace in V8
    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert to JSON response body
   */
  toJSON(): OAuthErrorResponse {
    const response: OAuthErrorResponse = {
      error: this.code,
    };

    if (this.description) {
      response.error_description = this.description;
    }

    return response;
  }

  static invalidRequest(description?: string, cause?: unknown): OAuthError {
    return new OAuthError(ERROR_INVALID_REQUEST, description, { cause });
  }

  static invalidClient(description?: string, cause?: unknown): OAuthError {
    return new OAuthError(ERROR_INVALID_CLIENT, description, { cause });
  }

  static invalidGrant(description?: string, cause?: unknown): OAuthError {
    return new OAuthError(ERROR_INVALID_GRANT, description, { cause });
  }

  static unauthorizedClient(description?: string, cause?: unknown): OAuthError {
    return new OAuthError(ERROR_UNAUTHORIZED_CLIENT, description, { cause });
  }

  static serverError(description?: string, cause?: unknown): OAuthError {
    return new OAuthError(ERROR_SERVER_ERROR, description, { cause });
  }

  static temporarilyUnavailable(description?: string, cause?: unknown): OAuthError {
    return new OAuthError(ERROR_TEMPORARILY_UNAVAILABLE, description, { cause });
  }
}

/**
 * Translate a storage failure into the OAuth error a protocol endpoint
 * should answer with. Unknown errors become server_error.
 */
export function toOAuthError(error: unknown): OAuthError {
  if (error instanceof OAuthError) {
    return error;
  }

  if (!(error instanceof StorageError)) {
    return OAuthError.serverError(undefined, error);
  }

  switch (error.code) {
    case 'not_found':
    case 'expired':
      return error.resource === 'client'
        ? OAuthError.invalidClient(undefined, error)
        : OAuthError.invalidGrant(undefined, error);
    case 'access_denied':
      return OAuthError.unauthorizedClient(error.message, error);
    case 'invalid_input':
      return OAuthError.invalidRequest(error.message, error);
    case 'unavailable':
      return OAuthError.temporarilyUnavailable(undefined, error);
    case 'conflict':
    case 'malformed':
    case 'revocation_incomplete':
      return OAuthError.serverError(undefined, error);
  }
}
