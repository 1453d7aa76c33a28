import { pino, type Logger } from 'pino';
import { LOGGED_SIGNATURE_LENGTH } from '../config/constants.js';

export type { Logger };

/**
 * Create a structured logger
 *
 * Level falls back to LOG_LEVEL, then `info`. Client secrets are redacted
 * wherever they appear in a logged object.
 */
export function createLogger(options: { level?: string; name?: string } = {}): Logger {
  return pino({
    name: options.name ?? 'oauth2-artifact-store',
    level: options.level ?? process.env['LOG_LEVEL'] ?? 'info',
    redact: {
      paths: ['secret', '*.secret', 'clientSecret', '*.clientSecret'],
      censor: '[REDACTED]',
    },
  });
}

export const logger = createLogger();

/**
 * Shorten a signature for log output
 */
export function maskSignature(signature: string): string {
  if (signature.length <= LOGGED_SIGNATURE_LENGTH) {
    return signature;
  }
  return `${signature.slice(0, LOGGED_SIGNATURE_LENGTH)}…`;
}
