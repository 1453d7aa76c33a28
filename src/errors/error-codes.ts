/**
 * OAuth 2.0 Error Codes
 * RFC 6749 Section 4.1.2.1, 5.2
 */

// Authorization endpoint errors (RFC 6749 Section 4.1.2.1)
export const ERROR_INVALID_REQUEST = 'invalid_request' as const;
export const ERROR_UNAUTHORIZED_CLIENT = 'unauthorized_client' as const;
export const ERROR_ACCESS_DENIED = 'access_denied' as const;
export const ERROR_SERVER_ERROR = 'server_error' as const;
export const ERROR_TEMPORARILY_UNAVAILABLE = 'temporarily_unavailable' as const;

// Token endpoint errors (RFC 6749 Section 5.2)
export const ERROR_INVALID_CLIENT = 'invalid_client' as const;
export const ERROR_INVALID_GRANT = 'invalid_grant' as const;

/**
 * OAuth error codes the storage layer can map to
 */
export type OAuthErrorCode =
  | typeof ERROR_INVALID_REQUEST
  | typeof ERROR_UNAUTHORIZED_CLIENT
  | typeof ERROR_ACCESS_DENIED
  | typeof ERROR_SERVER_ERROR
  | typeof ERROR_TEMPORARILY_UNAVAILABLE
  | typeof ERROR_INVALID_CLIENT
  | typeof ERROR_INVALID_GRANT;

/**
 * HTTP status codes for OAuth errors
 */
export const ERROR_STATUS_CODES: Record<OAuthErrorCode, number> = {
  [ERROR_INVALID_REQUEST]: 400,
  [ERROR_UNAUTHORIZED_CLIENT]: 401,
  [ERROR_ACCESS_DENIED]: 403,
  [ERROR_SERVER_ERROR]: 500,
  [ERROR_TEMPORARILY_UNAVAILABLE]: 503,
  [ERROR_INVALID_CLIENT]: 401,
  [ERROR_INVALID_GRANT]: 400,
};

/**
 * Default error descriptions
 */
export const ERROR_DESCRIPTIONS: Record<OAuthErrorCode, string> = {
  [ERROR_INVALID_REQUEST]:
    'The request is missing a required parameter, includes an invalid parameter value, includes a parameter more than once, or is otherwise malformed.',
  [ERROR_UNAUTHORIZED_CLIENT]:
    'The client is not authorized to request an authorization code using this method.',
  [ERROR_ACCESS_DENIED]: 'The resource owner or authorization server denied the request.',
  [ERROR_SERVER_ERROR]:
    'The authorization server encountered an unexpected condition that prevented it from fulfilling the request.',
  [ERROR_TEMPORARILY_UNAVAILABLE]:
    'The authorization server is currently unable to handle the request due to a temporary overloading or maintenance.',
  [ERROR_INVALID_CLIENT]: 'Client authentication failed.',
  [ERROR_INVALID_GRANT]:
    'The provided authorization grant or refresh token is invalid, expired, revoked, or was issued to another client.',
};

/**
 * Storage error codes
 */
export const STORAGE_NOT_FOUND = 'not_found' as const;
export const STORAGE_CONFLICT = 'conflict' as const;
export const STORAGE_EXPIRED = 'expired' as const;
export const STORAGE_MALFORMED = 'malformed' as const;
export const STORAGE_UNAVAILABLE = 'unavailable' as const;
export const STORAGE_INVALID_INPUT = 'invalid_input' as const;
export const STORAGE_ACCESS_DENIED = 'access_denied' as const;
export const STORAGE_REVOCATION_INCOMPLETE = 'revocation_incomplete' as const;

export type StorageErrorCode =
  | typeof STORAGE_NOT_FOUND
  | typeof STORAGE_CONFLICT
  | typeof STORAGE_EXPIRED
  | typeof STORAGE_MALFORMED
  | typeof STORAGE_UNAVAILABLE
  | typeof STORAGE_INVALID_INPUT
  | typeof STORAGE_ACCESS_DENIED
  | typeof STORAGE_REVOCATION_INCOMPLETE;
