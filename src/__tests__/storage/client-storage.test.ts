import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { IStorage } from '../../storage/interfaces/index.js';
import { isHashedSecret, verifyClientSecret } from '../../crypto/hash.js';
import { backends } from '../test-setup.js';

describe.each(backends)('$name client storage', (backend) => {
  let storage: IStorage;

  beforeEach(() => {
    storage = backend.create();
  });

  afterEach(async () => {
    await storage.close();
  });

  describe('create', () => {
    it('should hash the secret before storing it', async () => {
      const client = await storage.clients.create({ id: 'c1', secret: 's3cr3t' });

      expect(client.secret).not.toBe('s3cr3t');
      expect(isHashedSecret(client.secret)).toBe(true);
      expect(await verifyClientSecret('s3cr3t', client.secret)).toBe(true);

      const stored = await storage.clients.get('c1');
      expect(stored.secret).toBe(client.secret);
    });

    it('should store every field', async () => {
      await storage.clients.create({
        id: 'c1',
        name: 'Example App',
        redirectUris: ['https://app.example.com/callback'],
        grantTypes: ['authorization_code', 'refresh_token'],
        responseTypes: ['code'],
        scopes: ['openid', 'profile', 'openid'],
        owner: 'owner-1',
        contacts: ['admin@example.com'],
        allowedTenantAccess: ['tenant-a'],
        disabled: true,
      });

      const client = await storage.clients.get('c1');
      expect(client.toRecord()).toEqual({
        id: 'c1',
        name: 'Example App',
        secret: '',
        redirectUris: ['https://app.example.com/callback'],
        grantTypes: ['authorization_code', 'refresh_token'],
        responseTypes: ['code'],
        scopes: ['openid', 'profile'],
        owner: 'owner-1',
        policyUri: '',
        termsOfServiceUri: '',
        clientUri: '',
        logoUri: '',
        contacts: ['admin@example.com'],
        public: false,
        disabled: true,
        allowedTenantAccess: ['tenant-a'],
      });
    });

    it('should fail with conflict on a duplicate id and keep the first client', async () => {
      await storage.clients.create({ id: 'c1', name: 'First' });

      await expect(storage.clients.create({ id: 'c1', name: 'Second' })).rejects.toMatchObject({
        code: 'conflict',
        message: 'client already exists: c1',
      });
      expect((await storage.clients.get('c1')).name).toBe('First');
    });

    it('should reject a public client with a secret', async () => {
      await expect(storage.clients.create({ id: 'c1', public: true, secret: 'x' })).rejects.toMatchObject({
        code: 'invalid_input',
        message: 'Public clients must not have a secret',
      });
    });

    it('should reject a public client using client_credentials', async () => {
      await expect(
        storage.clients.create({ id: 'c1', public: true, grantTypes: ['client_credentials'] })
      ).rejects.toMatchObject({
        code: 'invalid_input',
        message: 'Public clients cannot use the client_credentials grant',
      });
    });

    it('should reject an empty id', async () => {
      await expect(storage.clients.create({ id: '' })).rejects.toMatchObject({
        code: 'invalid_input',
        message: 'Client ID is required',
      });
    });

    it('should not touch storage when the signal is already aborted', async () => {
      const controller = new AbortController();
      controller.abort();

      await expect(storage.clients.create({ id: 'c1' }, { signal: controller.signal })).rejects.toThrow();
      await expect(storage.clients.get('c1')).rejects.toMatchObject({ code: 'not_found' });
    });
  });

  describe('get', () => {
    it('should fail with not_found for an unknown id', async () => {
      await expect(storage.clients.get('missing')).rejects.toMatchObject({
        code: 'not_found',
        resource: 'client',
        message: 'client not found: missing',
      });
    });
  });

  describe('update', () => {
    it('should keep the stored hash when the secret is empty', async () => {
      const created = await storage.clients.create({ id: 'c1', secret: 's3cr3t' });

      const updated = await storage.clients.update('c1', { ...created.toRecord(), secret: '', name: 'Renamed' });

      expect(updated.secret).toBe(created.secret);
      expect(updated.name).toBe('Renamed');
    });

    it('should keep the stored hash when the secret is the stored hash', async () => {
      const created = await storage.clients.create({ id: 'c1', secret: 's3cr3t' });

      const updated = await storage.clients.update('c1', created.toRecord());

      expect(updated.secret).toBe(created.secret);
    });

    it('should hash a new secret', async () => {
      const created = await storage.clients.create({ id: 'c1', secret: 's3cr3t' });

      const updated = await storage.clients.update('c1', { ...created.toRecord(), secret: 'n3w' });

      expect(updated.secret).not.toBe(created.secret);
      expect(await verifyClientSecret('n3w', updated.secret)).toBe(true);
      await expect(storage.clients.authenticate('c1', 'n3w')).resolves.toMatchObject({ id: 'c1' });
    });

    it('should rename a client', async () => {
      const created = await storage.clients.create({ id: 'c1', name: 'App' });

      await storage.clients.update('c1', { ...created.toRecord(), id: 'c2' });

      await expect(storage.clients.get('c1')).rejects.toMatchObject({ code: 'not_found' });
      expect((await storage.clients.get('c2')).name).toBe('App');
    });

    it('should fail with conflict when renaming onto an existing id', async () => {
      const first = await storage.clients.create({ id: 'c1', name: 'One' });
      await storage.clients.create({ id: 'c2', name: 'Two' });

      await expect(storage.clients.update('c1', { ...first.toRecord(), id: 'c2' })).rejects.toMatchObject({
        code: 'conflict',
      });
      expect((await storage.clients.get('c1')).name).toBe('One');
      expect((await storage.clients.get('c2')).name).toBe('Two');
    });

    it('should let the last of two concurrent updates win', async () => {
      const created = await storage.clients.create({ id: 'c1', secret: 's3cr3t', name: 'a' });

      const results = await Promise.allSettled([
        storage.clients.update('c1', { ...created.toRecord(), secret: 'first', name: 'b' }),
        storage.clients.update('c1', { ...created.toRecord(), secret: 'second', name: 'c' }),
      ]);

      expect(results.map((result) => result.status)).toEqual(['fulfilled', 'fulfilled']);
      const stored = await storage.clients.get('c1');
      expect(['b', 'c']).toContain(stored.name);
      expect(await verifyClientSecret(stored.name === 'b' ? 'first' : 'second', stored.secret)).toBe(true);
    });

    it('should fail with not_found for an unknown client', async () => {
      const record = (await storage.clients.create({ id: 'c1' })).toRecord();

      await expect(storage.clients.update('missing', record)).rejects.toMatchObject({ code: 'not_found' });
    });
  });

  describe('regenerateSecret', () => {
    it('should issue a secret that authenticates', async () => {
      await storage.clients.create({ id: 'c1', secret: 's3cr3t' });

      const secret = await storage.clients.regenerateSecret('c1');

      await expect(storage.clients.authenticate('c1', secret)).resolves.toMatchObject({ id: 'c1' });
      await expect(storage.clients.authenticate('c1', 's3cr3t')).rejects.toMatchObject({ code: 'access_denied' });
    });

    it('should refuse public clients', async () => {
      await storage.clients.create({ id: 'spa', public: true });

      await expect(storage.clients.regenerateSecret('spa')).rejects.toMatchObject({
        code: 'invalid_input',
        message: 'Cannot generate secret for public client',
      });
    });
  });

  describe('delete', () => {
    it('should remove the client', async () => {
      await storage.clients.create({ id: 'c1' });

      await storage.clients.delete('c1');

      await expect(storage.clients.get('c1')).rejects.toMatchObject({ code: 'not_found' });
    });

    it('should fail with not_found for an unknown client', async () => {
      await expect(storage.clients.delete('missing')).rejects.toMatchObject({ code: 'not_found' });
    });
  });

  describe('list', () => {
    beforeEach(async () => {
      await storage.clients.create({
        id: 'c3',
        owner: 'owner-1',
        scopes: ['openid', 'profile'],
        grantTypes: ['client_credentials'],
        contacts: ['ops@example.com'],
      });
      await storage.clients.create({
        id: 'c1',
        owner: 'owner-1',
        scopes: ['openid'],
        allowedTenantAccess: ['tenant-a'],
      });
      await storage.clients.create({
        id: 'c2',
        owner: 'owner-2',
        public: true,
        redirectUris: ['https://spa.example.com/cb'],
        disabled: true,
      });
    });

    it('should return every client ordered by id', async () => {
      const clients = await storage.clients.list();
      expect(clients.map((client) => client.id)).toEqual(['c1', 'c2', 'c3']);
    });

    it.each([
      ['owner', { owner: 'owner-1' }, ['c1', 'c3']],
      ['public', { public: true }, ['c2']],
      ['disabled', { disabled: false }, ['c1', 'c3']],
      ['tenant', { allowedTenantAccess: 'tenant-a' }, ['c1']],
      ['redirect URI', { redirectUri: 'https://spa.example.com/cb' }, ['c2']],
      ['defaulted grant type', { grantType: 'authorization_code' }, ['c1', 'c2']],
      ['response type', { responseType: 'code' }, ['c1', 'c2', 'c3']],
      ['scopes', { scopes: ['profile', 'openid'] }, ['c3']],
      ['contact', { contact: 'ops@example.com' }, ['c3']],
      ['combined criteria', { owner: 'owner-1', scopes: ['openid'] }, ['c1', 'c3']],
      ['limit and offset', { limit: 1, offset: 1 }, ['c2']],
    ])('should filter by %s', async (_label, filter, expected) => {
      const clients = await storage.clients.list(filter);
      expect(clients.map((client) => client.id)).toEqual(expected);
    });
  });

  describe('authenticate', () => {
    it('should accept the right secret', async () => {
      await storage.clients.create({ id: 'c1', secret: 's3cr3t' });

      const client = await storage.clients.authenticate('c1', 's3cr3t');
      expect(client.id).toBe('c1');
    });

    it('should reject a wrong secret', async () => {
      await storage.clients.create({ id: 'c1', secret: 's3cr3t' });

      await expect(storage.clients.authenticate('c1', 'wrong')).rejects.toMatchObject({
        code: 'access_denied',
        message: 'Invalid client credentials: c1',
      });
    });

    it('should reject a confidential client without a stored secret', async () => {
      await storage.clients.create({ id: 'c1' });

      await expect(storage.clients.authenticate('c1', '')).rejects.toMatchObject({ code: 'access_denied' });
    });

    it('should accept a public client without a secret', async () => {
      await storage.clients.create({ id: 'spa', public: true });

      await expect(storage.clients.authenticate('spa', '')).resolves.toMatchObject({ id: 'spa' });
    });

    it('should reject a disabled client', async () => {
      await storage.clients.create({ id: 'c1', secret: 's3cr3t', disabled: true });

      await expect(storage.clients.authenticate('c1', 's3cr3t')).rejects.toMatchObject({
        code: 'access_denied',
        message: 'Client is disabled: c1',
      });
    });

    it('should fail with not_found for an unknown client', async () => {
      await expect(storage.clients.authenticate('missing', 'x')).rejects.toMatchObject({ code: 'not_found' });
    });
  });
});
