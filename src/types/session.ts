import type { TOKEN_TYPES } from '../config/constants.js';

/**
 * Token types a session can carry an expiry for
 */
export type TokenType = (typeof TOKEN_TYPES)[number];

/**
 * Values a session payload may hold
 */
export type SessionValue =
  | string
  | number
  | boolean
  | null
  | Date
  | Uint8Array
  | SessionValue[]
  | { [key: string]: SessionValue };

/**
 * Structured snapshot of a session, as handed to the codec
 */
export interface SessionPayload {
  [key: string]: SessionValue;
}

/**
 * Session attached to every stored artifact
 *
 * The store never looks inside the payload. It asks the session for the
 * expiry of the token type an artifact kind maps to, persists the encoded
 * snapshot, and on lookup restores the snapshot into a session the caller
 * supplies.
 */
export interface Session {
  /**
   * Expiry for the given token type, if the session sets one
   */
  getExpiresAt(tokenType: TokenType): Date | undefined;

  /**
   * Snapshot of the session's state
   */
  toPayload(): SessionPayload;

  /**
   * Populate this session from a decoded snapshot
   * Implementations throw a malformed StorageError on unexpected shapes
   */
  restore(payload: SessionPayload): void;
}
