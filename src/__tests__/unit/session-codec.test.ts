import { describe, it, expect } from 'vitest';
import { encodePayload, decodePayload, encodeSession, decodeSession } from '../../session/codec.js';
import { DefaultSession, OpenIdConnectSession } from '../../session/default-session.js';
import { StorageError } from '../../errors/storage-error.js';

const encoder = new TextEncoder();

function bytes(json: string): Uint8Array {
  return encoder.encode(json);
}

function decodeError(input: Uint8Array): unknown {
  try {
    decodePayload(input);
  } catch (err) {
    return err;
  }
  return undefined;
}

describe('Session codec', () => {
  describe('encodePayload', () => {
    it('should write a versioned envelope with tagged values', () => {
      const encoded = encodePayload({
        subject: 'user-1',
        issuedAt: new Date('2030-01-01T00:00:00.000Z'),
        nonce: new Uint8Array([1, 2, 3]),
        $price: 5,
      });

      expect(new TextDecoder().decode(encoded)).toBe(
        '{"$v":2,"data":{"subject":"user-1","issuedAt":{"$date":"2030-01-01T00:00:00.000Z"},' +
          '"nonce":{"$bytes":"AQID"},"$$price":5}}'
      );
    });

    it('should reject an invalid date', () => {
      expect(() => encodePayload({ at: new Date('not a date') })).toThrow(StorageError);
    });

    it.each([
      [NaN, 'Cannot encode a non-finite number in a session payload: NaN'],
      [Infinity, 'Cannot encode a non-finite number in a session payload: Infinity'],
      [-Infinity, 'Cannot encode a non-finite number in a session payload: -Infinity'],
      [-0, 'Cannot encode negative zero in a session payload'],
    ])('should reject %s, which JSON cannot carry', (value, message) => {
      expect(() => encodePayload({ claims: { score: [1, value] } })).toThrow(message);
    });

    it('should keep zero and other finite numbers', () => {
      const decoded = decodePayload(encodePayload({ zero: 0, small: -1.5e-7, large: Number.MAX_SAFE_INTEGER }));

      expect(decoded).toEqual({ zero: 0, small: -1.5e-7, large: Number.MAX_SAFE_INTEGER });
      expect(Object.is(decoded['zero'], 0)).toBe(true);
    });
  });

  describe('decodePayload', () => {
    it('should restore dates, bytes and escaped keys', () => {
      const payload = {
        subject: 'user-1',
        issuedAt: new Date('2030-01-01T00:00:00.000Z'),
        nonce: new Uint8Array([1, 2, 3]),
        nested: { $ref: 'x', list: [1, 'two', null, true] },
      };

      expect(decodePayload(encodePayload(payload))).toEqual(payload);
    });

    it('should accept unversioned payloads as plain JSON', () => {
      const payload = decodePayload(
        bytes('{"subject":"user-1","expiresAt":{"access_token":"2030-01-01T00:00:00.000Z"}}')
      );

      expect(payload).toEqual({
        subject: 'user-1',
        expiresAt: { access_token: '2030-01-01T00:00:00.000Z' },
      });
    });

    it('should reject a newer payload version', () => {
      const err = decodeError(bytes('{"$v":3,"data":{}}'));

      expect(err).toBeInstanceOf(StorageError);
      expect(err).toMatchObject({
        code: 'malformed',
        message: 'Session payload version 3 is newer than supported version 2',
      });
    });

    it.each([
      ['invalid UTF-8', new Uint8Array([0xff, 0xfe, 0xfd])],
      ['invalid JSON', bytes('{"subject":')],
      ['a JSON array', bytes('[1,2,3]')],
      ['a JSON string', bytes('"session"')],
      ['a broken envelope', bytes('{"$v":"2","data":{}}')],
      ['an envelope without data object', bytes('{"$v":2,"data":[]}')],
      ['an unknown tag', bytes('{"$v":2,"data":{"$when":1}}')],
      ['a non-string date tag', bytes('{"$v":2,"data":{"at":{"$date":5}}}')],
      ['an invalid date tag', bytes('{"$v":2,"data":{"at":{"$date":"yesterday"}}}')],
    ])('should fail as malformed on %s', (_label, input) => {
      expect(decodeError(input)).toMatchObject({ code: 'malformed' });
    });
  });

  describe('sessions', () => {
    it('should round-trip a DefaultSession', () => {
      const original = new DefaultSession({
        subject: 'user-1',
        username: 'alice',
        expiresAt: { access_token: new Date('2030-01-01T01:00:00.000Z') },
        extra: { tenant: 'tenant-a', amr: ['pwd', 'otp'] },
      });

      const restored = new DefaultSession();
      decodeSession(encodeSession(original), restored);

      expect(restored.toPayload()).toEqual(original.toPayload());
      expect(restored.getExpiresAt('access_token')).toEqual(new Date('2030-01-01T01:00:00.000Z'));
      expect(restored.getExpiresAt('refresh_token')).toBeUndefined();
    });

    it('should round-trip an OpenIdConnectSession', () => {
      const original = new OpenIdConnectSession({
        subject: 'user-1',
        idTokenClaims: { nonce: 'n-0S6', auth_time: new Date('2030-01-01T00:00:00.000Z') },
        idTokenHeaders: { kid: 'key-1' },
      });

      const restored = new OpenIdConnectSession();
      decodeSession(encodeSession(original), restored);

      expect(restored.subject).toBe('user-1');
      expect(restored.idTokenClaims).toEqual({ nonce: 'n-0S6', auth_time: new Date('2030-01-01T00:00:00.000Z') });
      expect(restored.idTokenHeaders).toEqual({ kid: 'key-1' });
    });

    it('should restore an unversioned session with ISO date strings', () => {
      const restored = new DefaultSession();
      decodeSession(
        bytes('{"subject":"user-1","username":"alice","expiresAt":{"authorize_code":"2030-01-01T00:10:00.000Z"}}'),
        restored
      );

      expect(restored.subject).toBe('user-1');
      expect(restored.username).toBe('alice');
      expect(restored.getExpiresAt('authorize_code')).toEqual(new Date('2030-01-01T00:10:00.000Z'));
      expect(restored.extra).toEqual({});
    });

    it('should fail as malformed when the payload does not fit the session', () => {
      const restored = new DefaultSession();
      let error: unknown;
      try {
        decodeSession(bytes('{"$v":2,"data":{"subject":42}}'), restored);
      } catch (err) {
        error = err;
      }
      expect(error).toMatchObject({ code: 'malformed' });
    });
  });
});
