import type { ClientRecord, CreateClientInput, ClientFilter } from '../../types/client.js';
import type { OperationOptions } from '../../types/artifact.js';
import type { Client } from '../../models/client.js';

/**
 * Storage interface for OAuth client management
 */
export interface IClientStorage {
  /**
   * Register a new client
   * A non-empty secret is hashed before it is stored; the returned client
   * only carries the hash. Fails with `conflict` on a duplicate id.
   */
  create(input: CreateClientInput, options?: OperationOptions): Promise<Client>;

  /**
   * Fetch a client, failing with `not_found`
   */
  get(id: string, options?: OperationOptions): Promise<Client>;

  /**
   * Replace the client stored under `id`
   *
   * An empty secret, or one equal to the stored hash, keeps the stored hash;
   * any other value is hashed as a new cleartext secret. When `client.id`
   * differs from `id` the client is renamed, failing with `conflict` if the
   * new id is taken.
   */
  update(id: string, client: ClientRecord, options?: OperationOptions): Promise<Client>;

  /**
   * Issue a new secret for a confidential client
   * Returns the cleartext secret (only time it's available)
   */
  regenerateSecret(id: string, options?: OperationOptions): Promise<string>;

  /**
   * Remove a client, failing with `not_found`
   */
  delete(id: string, options?: OperationOptions): Promise<void>;

  /**
   * List clients ordered by id
   */
  list(filter?: ClientFilter, options?: OperationOptions): Promise<Client[]>;

  /**
   * Verify client credentials
   * Public clients authenticate without a secret. Fails with `not_found`
   * for unknown clients and `access_denied` for a wrong secret or a
   * disabled client.
   */
  authenticate(id: string, secret: string, options?: OperationOptions): Promise<Client>;
}
