import { z } from 'zod';
import type { Session, SessionPayload, TokenType } from '../types/session.js';
import { StorageError } from '../errors/storage-error.js';
import { TOKEN_TYPES } from '../config/constants.js';
import { sessionPayloadSchema } from './schema.js';

const defaultSessionSchema = z.object({
  subject: z.string().default(''),
  username: z.string().default(''),
  // Unversioned payloads stored dates as ISO strings
  expiresAt: z.record(z.enum(TOKEN_TYPES), z.coerce.date()).default({}),
  extra: sessionPayloadSchema.default({}),
});

const openIdConnectSessionSchema = z.object({
  idTokenClaims: sessionPayloadSchema.default({}),
  idTokenHeaders: sessionPayloadSchema.default({}),
});

function parsePayload<T extends z.ZodTypeAny>(schema: T, payload: SessionPayload): z.output<T> {
  const result = schema.safeParse(payload);
  if (!result.success) {
    throw StorageError.malformed(`Session payload does not match schema: ${result.error.message}`, {
      cause: result.error,
    });
  }
  return result.data;
}

export interface DefaultSessionInit {
  subject?: string;
  username?: string;
  expiresAt?: Partial<Record<TokenType, Date>>;
  extra?: SessionPayload;
}

/**
 * General purpose session: subject, username, per token type expiry and
 * free-form extra data
 */
export class DefaultSession implements Session {
  subject: string;
  username: string;
  expiresAt: Partial<Record<TokenType, Date>>;
  extra: SessionPayload;

  constructor(init: DefaultSessionInit = {}) {
    this.subject = init.subject ?? '';
    this.username = init.username ?? '';
    this.expiresAt = { ...init.expiresAt };
    this.extra = { ...init.extra };
  }

  getExpiresAt(tokenType: TokenType): Date | undefined {
    return this.expiresAt[tokenType];
  }

  setExpiresAt(tokenType: TokenType, expiresAt: Date): void {
    this.expiresAt[tokenType] = expiresAt;
  }

  toPayload(): SessionPayload {
    const expiresAt: SessionPayload = {};
    for (const [tokenType, date] of Object.entries(this.expiresAt)) {
      if (date) {
        expiresAt[tokenType] = date;
      }
    }

    return {
      subject: this.subject,
      username: this.username,
      expiresAt,
      extra: this.extra,
    };
  }

  restore(payload: SessionPayload): void {
    const parsed = parsePayload(defaultSessionSchema, payload);
    this.subject = parsed.subject;
    this.username = parsed.username;
    this.expiresAt = parsed.expiresAt;
    this.extra = parsed.extra;
  }
}

export interface OpenIdConnectSessionInit extends DefaultSessionInit {
  idTokenClaims?: SessionPayload;
  idTokenHeaders?: SessionPayload;
}

/**
 * Session for OpenID Connect flows, carrying the ID token claims and headers
 * the protocol layer signs once the code is exchanged
 */
export class OpenIdConnectSession extends DefaultSession {
  idTokenClaims: SessionPayload;
  idTokenHeaders: SessionPayload;

  constructor(init: OpenIdConnectSessionInit = {}) {
    super(init);
    this.idTokenClaims = { ...init.idTokenClaims };
    this.idTokenHeaders = { ...init.idTokenHeaders };
  }

  override toPayload(): SessionPayload {
    return {
      ...super.toPayload(),
      idTokenClaims: this.idTokenClaims,
      idTokenHeaders: this.idTokenHeaders,
    };
  }

  override restore(payload: SessionPayload): void {
    super.restore(payload);
    const parsed = parsePayload(openIdConnectSessionSchema, payload);
    this.idTokenClaims = parsed.idTokenClaims;
    this.idTokenHeaders = parsed.idTokenHeaders;
  }
}
