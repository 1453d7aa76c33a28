import { timingSafeEqual, randomBytes, scrypt as scryptCallback } from 'node:crypto';
import {
  DEFAULT_SCRYPT_COST,
  SCRYPT_BLOCK_SIZE,
  SCRYPT_PARALLELIZATION,
  SCRYPT_KEY_LENGTH,
  SCRYPT_SALT_LENGTH,
} from '../config/constants.js';

/**
 * Promisified scrypt function
 */
function scryptAsync(
  password: string,
  salt: Buffer,
  keyLength: number,
  options: { N: number; r: number; p: number }
): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const maxmem = 256 * options.N * options.r;
    scryptCallback(password, salt, keyLength, { ...options, maxmem }, (err, derivedKey) => {
      if (err) reject(err);
      else resolve(derivedKey);
    });
  });
}

/**
 * Hash a client secret using scrypt
 * Returns format: $scrypt$N$r$p$salt$hash
 */
export async function hashClientSecret(secret: string, cost: number = DEFAULT_SCRYPT_COST): Promise<string> {
  const salt = randomBytes(SCRYPT_SALT_LENGTH);
  const N = cost;
  const r = SCRYPT_BLOCK_SIZE;
  const p = SCRYPT_PARALLELIZATION;

  const hash = await scryptAsync(secret, salt, SCRYPT_KEY_LENGTH, { N, r, p });

  return `$scrypt$${N}$${r}$${p}$${salt.toString('base64')}$${hash.toString('base64')}`;
}

/**
 * Whether a stored value looks like a hash produced by hashClientSecret
 */
export function isHashedSecret(value: string): boolean {
  return parseHash(value) !== null;
}

function parseHash(
  hash: string
): { N: number; r: number; p: number; salt: Buffer; storedHash: Buffer } | null {
  // Expected format: $scrypt$N$r$p$salt$hash
  const [empty, algorithm, n, r, p, salt, storedHash, ...rest] = hash.split('$');
  if (
    empty !== '' ||
    algorithm !== 'scrypt' ||
    n === undefined ||
    r === undefined ||
    p === undefined ||
    !salt ||
    !storedHash ||
    rest.length > 0
  ) {
    return null;
  }

  const params = { N: parseInt(n, 10), r: parseInt(r, 10), p: parseInt(p, 10) };
  if (![params.N, params.r, params.p].every((value) => Number.isInteger(value) && value > 0)) {
    return null;
  }

  return { ...params, salt: Buffer.from(salt, 'base64'), storedHash: Buffer.from(storedHash, 'base64') };
}

/**
 * Verify a client secret against its hash
 */
export async function verifyClientSecret(secret: string, hash: string): Promise<boolean> {
  const parsed = parseHash(hash);
  if (!parsed || parsed.storedHash.length === 0) {
    return false;
  }

  const { N, r, p, salt, storedHash } = parsed;
  const derivedHash = await scryptAsync(secret, salt, storedHash.length, { N, r, p });

  return timingSafeEqual(storedHash, derivedHash);
}
