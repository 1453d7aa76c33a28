/**
 * OAuth 2.0 storage constants
 */

// Grant types
export const GRANT_TYPE_AUTHORIZATION_CODE = 'authorization_code' as const;
export const GRANT_TYPE_CLIENT_CREDENTIALS = 'client_credentials' as const;

// Response types
export const RESPONSE_TYPE_CODE = 'code' as const;

// OpenID Connect Dynamic Client Registration 1.0, Section 2:
// omitted grant_types / response_types default to these
export const DEFAULT_GRANT_TYPES = [GRANT_TYPE_AUTHORIZATION_CODE] as const;
export const DEFAULT_RESPONSE_TYPES = [RESPONSE_TYPE_CODE] as const;

// Artifact kinds
export const ARTIFACT_ACCESS_TOKEN = 'access_token' as const;
export const ARTIFACT_REFRESH_TOKEN = 'refresh_token' as const;
export const ARTIFACT_AUTHORIZE_CODE = 'authorize_code' as const;
export const ARTIFACT_PKCE = 'pkce' as const;
export const ARTIFACT_OIDC_SESSION = 'oidc_session' as const;

export const ARTIFACT_KINDS = [
  ARTIFACT_ACCESS_TOKEN,
  ARTIFACT_REFRESH_TOKEN,
  ARTIFACT_AUTHORIZE_CODE,
  ARTIFACT_PKCE,
  ARTIFACT_OIDC_SESSION,
] as const;

// Token types used to look up a session's expiry
export const TOKEN_TYPE_ACCESS_TOKEN = 'access_token' as const;
export const TOKEN_TYPE_REFRESH_TOKEN = 'refresh_token' as const;
export const TOKEN_TYPE_AUTHORIZE_CODE = 'authorize_code' as const;
export const TOKEN_TYPE_ID_TOKEN = 'id_token' as const;

export const TOKEN_TYPES = [
  TOKEN_TYPE_ACCESS_TOKEN,
  TOKEN_TYPE_REFRESH_TOKEN,
  TOKEN_TYPE_AUTHORIZE_CODE,
  TOKEN_TYPE_ID_TOKEN,
] as const;

// Session codec
export const SESSION_CODEC_VERSION = 2;

// Client secret hashing (scrypt)
export const DEFAULT_SCRYPT_COST = 16384; // N
export const SCRYPT_BLOCK_SIZE = 8; // r
export const SCRYPT_PARALLELIZATION = 1; // p
export const SCRYPT_KEY_LENGTH = 64; // bytes
export const SCRYPT_SALT_LENGTH = 16; // bytes
export const CLIENT_SECRET_LENGTH = 32; // bytes

// Storage
export const DEFAULT_DATABASE_PATH = ':memory:';
export const DEFAULT_LIST_LIMIT = 100;

// Number of signature characters kept in log lines
export const LOGGED_SIGNATURE_LENGTH = 8;
