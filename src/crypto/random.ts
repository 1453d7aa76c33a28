import { randomBytes } from 'node:crypto';
import { CLIENT_SECRET_LENGTH } from '../config/constants.js';

/**
 * Generate cryptographically secure random bytes as base64url string
 */
export function generateRandomBase64Url(length: number): string {
  return randomBytes(length)
    .toString('base64')
    .replace(/\+/g, '-')
    .replace(/\//g, '_')
    .replace(/=/g, '');
}

/**
 * Generate a secure random client secret
 */
export function generateClientSecret(length: number = CLIENT_SECRET_LENGTH): string {
  return generateRandomBase64Url(length);
}
