import type { Logger } from 'pino';
import type { ClientRecord, CreateClientInput, ClientFilter } from '../../types/client.js';
import type { OperationOptions } from '../../types/artifact.js';
import type { IClientStorage } from '../interfaces/client-storage.js';
import { Client } from '../../models/client.js';
import { StorageError } from '../../errors/storage-error.js';
import { generateClientSecret } from '../../crypto/random.js';
import { hashClientSecret } from '../../crypto/hash.js';
import { DEFAULT_SCRYPT_COST } from '../../config/constants.js';
import { logger as rootLogger } from '../../observability/logger.js';
import { throwIfAborted } from '../common/artifacts.js';
import {
  prepareNewClient,
  prepareUpdatedClient,
  matchesClientFilter,
  paginate,
  verifyClientCredentials,
} from '../common/clients.js';

/**
 * In-memory OAuth client storage implementation
 *
 * Secret hashing is awaited before the existence check, so the
 * check-and-write that follows runs without yielding.
 */
export class MemoryClientStorage implements IClientStorage {
  private clients = new Map<string, ClientRecord>();
  private readonly scryptCost: number;
  private readonly logger: Logger;

  constructor(options: { scryptCost?: number; logger?: Logger } = {}) {
    this.scryptCost = options.scryptCost ?? DEFAULT_SCRYPT_COST;
    this.logger = (options.logger ?? rootLogger).child({ component: 'memory-client-storage' });
  }

  async create(input: CreateClientInput, options?: OperationOptions): Promise<Client> {
    throwIfAborted(options);
    const record = await prepareNewClient(input, this.scryptCost);

    throwIfAborted(options);
    if (this.clients.has(record.id)) {
      this.logger.debug({ clientId: record.id }, 'Client already exists');
      throw StorageError.conflict('client', record.id);
    }

    this.clients.set(record.id, record);
    this.logger.info({ clientId: record.id }, 'Client created');
    return Client.fromRecord(record);
  }

  async get(id: string, options?: OperationOptions): Promise<Client> {
    throwIfAborted(options);
    const record = this.clients.get(id);
    if (!record) {
      throw StorageError.notFound('client', id);
    }
    return Client.fromRecord(record);
  }

  async update(id: string, client: ClientRecord, options?: OperationOptions): Promise<Client> {
    throwIfAborted(options);
    const existing = this.clients.get(id);
    if (!existing) {
      throw StorageError.notFound('client', id);
    }

    const record = await prepareUpdatedClient(existing, client, this.scryptCost);

    throwIfAborted(options);
    // Re-check after hashing: the client may have been removed or renamed meanwhile.
    // A concurrent write to the same client is overwritten (last writer wins).
    if (!this.clients.has(id)) {
      throw StorageError.notFound('client', id);
    }
    if (record.id !== id && this.clients.has(record.id)) {
      this.logger.debug({ clientId: record.id }, 'Client already exists');
      throw StorageError.conflict('client', record.id);
    }

    this.clients.delete(id);
    this.clients.set(record.id, record);
    this.logger.info({ clientId: record.id, previousId: id === record.id ? undefined : id }, 'Client updated');
    return Client.fromRecord(record);
  }

  async regenerateSecret(id: string, options?: OperationOptions): Promise<string> {
    throwIfAborted(options);
    const existing = this.clients.get(id);
    if (!existing) {
      throw StorageError.notFound('client', id);
    }

    if (existing.public) {
      throw StorageError.invalidInput('Cannot generate secret for public client', 'client');
    }

    const newSecret = generateClientSecret();
    const newHash = await hashClientSecret(newSecret, this.scryptCost);

    throwIfAborted(options);
    const current = this.clients.get(id);
    if (!current) {
      throw StorageError.notFound('client', id);
    }

    this.clients.set(id, { ...current, secret: newHash });
    this.logger.info({ clientId: id }, 'Client secret regenerated');
    return newSecret;
  }

  async delete(id: string, options?: OperationOptions): Promise<void> {
    throwIfAborted(options);
    if (!this.clients.delete(id)) {
      throw StorageError.notFound('client', id);
    }
    this.logger.info({ clientId: id }, 'Client deleted');
  }

  async list(filter: ClientFilter = {}, options?: OperationOptions): Promise<Client[]> {
    throwIfAborted(options);
    const clients = Array.from(this.clients.values())
      .map((record) => Client.fromRecord(record))
      .filter((client) => matchesClientFilter(client, filter))
      .sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
    return paginate(clients, filter);
  }

  async authenticate(id: string, secret: string, options?: OperationOptions): Promise<Client> {
    const client = await this.get(id, options);
    return verifyClientCredentials(client, secret);
  }
}
