import type { Session, SessionPayload, SessionValue } from '../types/session.js';
import { StorageError } from '../errors/storage-error.js';
import { SESSION_CODEC_VERSION } from '../config/constants.js';
import { sessionEnvelopeSchema } from './schema.js';

type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

const DATE_TAG = '$date';
const BYTES_TAG = '$bytes';
const VERSION_KEY = '$v';

const textEncoder = new TextEncoder();
const textDecoder = new TextDecoder('utf-8', { fatal: true });

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// Keys starting with `$` are reserved for tags, so user keys get one more `$`
function escapeKey(key: string): string {
  return key.startsWith('$') ? `$${key}` : key;
}

function unescapeKey(key: string): string {
  if (key.startsWith('$$')) {
    return key.slice(1);
  }
  if (key.startsWith('$')) {
    throw StorageError.malformed(`Unexpected reserved key in session payload: ${key}`);
  }
  return key;
}

function toJson(value: SessionValue): JsonValue {
  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) {
      throw StorageError.malformed('Cannot encode an invalid Date in a session payload');
    }
    return { [DATE_TAG]: value.toISOString() };
  }

  if (value instanceof Uint8Array) {
    return { [BYTES_TAG]: Buffer.from(value.buffer, value.byteOffset, value.byteLength).toString('base64') };
  }

  if (Array.isArray(value)) {
    return value.map(toJson);
  }

  if (value !== null && typeof value === 'object') {
    const result: { [key: string]: JsonValue } = {};
    for (const [key, entry] of Object.entries(value)) {
      result[escapeKey(key)] = toJson(entry);
    }
    return result;
  }

  if (typeof value === 'number') {
    if (!Number.isFinite(value)) {
      throw StorageError.malformed(`Cannot encode a non-finite number in a session payload: ${value}`);
    }
    if (Object.is(value, -0)) {
      throw StorageError.malformed('Cannot encode negative zero in a session payload');
    }
  }

  return value;
}

function fromJson(value: unknown): SessionValue {
  if (value === null || typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }

  if (Array.isArray(value)) {
    return value.map(fromJson);
  }

  if (!isPlainObject(value)) {
    throw StorageError.malformed(`Unsupported value in session payload: ${typeof value}`);
  }

  const keys = Object.keys(value);
  const tag = keys.length === 1 ? keys[0] : undefined;
  if (tag === DATE_TAG || tag === BYTES_TAG) {
    const tagged = value[tag];
    if (typeof tagged !== 'string') {
      throw StorageError.malformed(`Tagged session value ${tag} must be a string`);
    }
    return tag === DATE_TAG ? decodeDate(tagged) : new Uint8Array(Buffer.from(tagged, 'base64'));
  }

  const result: { [key: string]: SessionValue } = {};
  for (const [key, entry] of Object.entries(value)) {
    result[unescapeKey(key)] = fromJson(entry);
  }
  return result;
}

function decodeDate(iso: string): Date {
  const date = new Date(iso);
  if (Number.isNaN(date.getTime())) {
    throw StorageError.malformed(`Invalid date in session payload: ${iso}`);
  }
  return date;
}

/**
 * Payloads written before the codec was versioned are bare JSON objects:
 * no envelope, no tags, dates as ISO strings. Sessions coerce those fields
 * themselves when restoring.
 */
function fromLegacyJson(value: Record<string, unknown>): SessionPayload {
  const result: SessionPayload = {};
  for (const [key, entry] of Object.entries(value)) {
    result[key] = fromLegacyValue(entry);
  }
  return result;
}

function fromLegacyValue(value: unknown): SessionValue {
  if (value === null || typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  if (Array.isArray(value)) {
    return value.map(fromLegacyValue);
  }
  if (isPlainObject(value)) {
    return fromLegacyJson(value);
  }
  throw StorageError.malformed(`Unsupported value in legacy session payload: ${typeof value}`);
}

/**
 * Encode a session payload to bytes
 */
export function encodePayload(payload: SessionPayload): Uint8Array {
  const data = toJson(payload);
  return textEncoder.encode(JSON.stringify({ [VERSION_KEY]: SESSION_CODEC_VERSION, data }));
}

/**
 * Decode bytes produced by encodePayload, or by the unversioned format
 */
export function decodePayload(bytes: Uint8Array): SessionPayload {
  let parsed: unknown;
  try {
    parsed = JSON.parse(textDecoder.decode(bytes));
  } catch (err) {
    throw StorageError.malformed('Session payload is not valid UTF-8 JSON', { cause: err });
  }

  if (!isPlainObject(parsed)) {
    throw StorageError.malformed('Session payload must be a JSON object');
  }

  if (!(VERSION_KEY in parsed)) {
    return fromLegacyJson(parsed);
  }

  const envelope = sessionEnvelopeSchema.safeParse(parsed);
  if (!envelope.success) {
    throw StorageError.malformed('Session payload envelope is invalid', { cause: envelope.error });
  }

  if (envelope.data.$v > SESSION_CODEC_VERSION) {
    throw StorageError.malformed(
      `Session payload version ${envelope.data.$v} is newer than supported version ${SESSION_CODEC_VERSION}`
    );
  }

  const payload: SessionPayload = {};
  for (const [key, entry] of Object.entries(envelope.data.data)) {
    payload[unescapeKey(key)] = fromJson(entry);
  }
  return payload;
}

/**
 * Encode a session's snapshot
 */
export function encodeSession(session: Session): Uint8Array {
  return encodePayload(session.toPayload());
}

/**
 * Decode bytes into the target session
 */
export function decodeSession(bytes: Uint8Array, target: Session): void {
  target.restore(decodePayload(bytes));
}
