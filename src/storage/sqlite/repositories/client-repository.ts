import type Database from 'better-sqlite3';
import type { Logger } from 'pino';
import type { ClientRecord, CreateClientInput, ClientFilter } from '../../../types/client.js';
import type { OperationOptions } from '../../../types/artifact.js';
import type { IClientStorage } from '../../interfaces/client-storage.js';
import { Client } from '../../../models/client.js';
import { StorageError, isStorageError } from '../../../errors/storage-error.js';
import { generateClientSecret } from '../../../crypto/random.js';
import { hashClientSecret } from '../../../crypto/hash.js';
import { DEFAULT_SCRYPT_COST } from '../../../config/constants.js';
import { logger as rootLogger } from '../../../observability/logger.js';
import { throwIfAborted } from '../../common/artifacts.js';
import {
  prepareNewClient,
  prepareUpdatedClient,
  matchesClientFilter,
  paginate,
  verifyClientCredentials,
} from '../../common/clients.js';
import { CLIENTS_TABLE } from '../schema.js';
import { parseJsonColumn, stringListColumn } from '../columns.js';
import { translateSqliteError } from '../errors.js';

interface ClientRow {
  id: string;
  name: string;
  secret: string;
  redirect_uris: string;
  grant_types: string;
  response_types: string;
  scopes: string;
  owner: string;
  policy_uri: string;
  terms_of_service_uri: string;
  client_uri: string;
  logo_uri: string;
  contacts: string;
  public: number;
  disabled: number;
  allowed_tenant_access: string;
}

function rowToClient(row: ClientRow): Client {
  const list = (value: string, column: string) => parseJsonColumn(stringListColumn, value, column, 'client');

  return Client.fromRecord({
    id: row.id,
    name: row.name,
    secret: row.secret,
    redirectUris: list(row.redirect_uris, 'redirect_uris'),
    grantTypes: list(row.grant_types, 'grant_types'),
    responseTypes: list(row.response_types, 'response_types'),
    scopes: list(row.scopes, 'scopes'),
    owner: row.owner,
    policyUri: row.policy_uri,
    termsOfServiceUri: row.terms_of_service_uri,
    clientUri: row.client_uri,
    logoUri: row.logo_uri,
    contacts: list(row.contacts, 'contacts'),
    public: row.public === 1,
    disabled: row.disabled === 1,
    allowedTenantAccess: list(row.allowed_tenant_access, 'allowed_tenant_access'),
  });
}

function clientToRow(record: ClientRecord): ClientRow {
  return {
    id: record.id,
    name: record.name,
    secret: record.secret,
    redirect_uris: JSON.stringify(record.redirectUris),
    grant_types: JSON.stringify(record.grantTypes),
    response_types: JSON.stringify(record.responseTypes),
    scopes: JSON.stringify(record.scopes),
    owner: record.owner,
    policy_uri: record.policyUri,
    terms_of_service_uri: record.termsOfServiceUri,
    client_uri: record.clientUri,
    logo_uri: record.logoUri,
    contacts: JSON.stringify(record.contacts),
    public: record.public ? 1 : 0,
    disabled: record.disabled ? 1 : 0,
    allowed_tenant_access: JSON.stringify(record.allowedTenantAccess),
  };
}

const COLUMNS = [
  'id',
  'name',
  'secret',
  'redirect_uris',
  'grant_types',
  'response_types',
  'scopes',
  'owner',
  'policy_uri',
  'terms_of_service_uri',
  'client_uri',
  'logo_uri',
  'contacts',
  'public',
  'disabled',
  'allowed_tenant_access',
] as const;

/**
 * SQLite OAuth client storage implementation
 */
export class SqliteClientStorage implements IClientStorage {
  private readonly scryptCost: number;
  private readonly logger: Logger;

  constructor(
    private readonly db: Database.Database,
    options: { scryptCost?: number; logger?: Logger } = {}
  ) {
    this.scryptCost = options.scryptCost ?? DEFAULT_SCRYPT_COST;
    this.logger = (options.logger ?? rootLogger).child({ component: 'sqlite-client-storage' });
  }

  async create(input: CreateClientInput, options?: OperationOptions): Promise<Client> {
    throwIfAborted(options);
    const record = await prepareNewClient(input, this.scryptCost);

    throwIfAborted(options);
    this.execute(record.id, () => {
      this.db
        .prepare<[ClientRow]>(
          `INSERT INTO ${CLIENTS_TABLE} (${COLUMNS.join(', ')})
           VALUES (${COLUMNS.map((column) => `@${column}`).join(', ')})`
        )
        .run(clientToRow(record));
    });

    this.logger.info({ clientId: record.id }, 'Client created');
    return Client.fromRecord(record);
  }

  async get(id: string, options?: OperationOptions): Promise<Client> {
    throwIfAborted(options);
    const row = this.findRow(id);
    if (!row) {
      throw StorageError.notFound('client', id);
    }
    return rowToClient(row);
  }

  async update(id: string, client: ClientRecord, options?: OperationOptions): Promise<Client> {
    throwIfAborted(options);
    const existing = await this.get(id, options);
    const record = await prepareUpdatedClient(existing.toRecord(), client, this.scryptCost);

    throwIfAborted(options);
    const changes = this.execute(record.id, () => {
      const assignments = COLUMNS.map((column) => `${column} = @${column}`).join(', ');
      return this.db
        .prepare<[ClientRow & { previous_id: string }]>(
          `UPDATE ${CLIENTS_TABLE} SET ${assignments} WHERE id = @previous_id`
        )
        .run({ ...clientToRow(record), previous_id: id }).changes;
    });

    if (changes === 0) {
      throw StorageError.notFound('client', id);
    }

    this.logger.info({ clientId: record.id, previousId: id === record.id ? undefined : id }, 'Client updated');
    return Client.fromRecord(record);
  }

  async regenerateSecret(id: string, options?: OperationOptions): Promise<string> {
    const existing = await this.get(id, options);
    if (existing.public) {
      throw StorageError.invalidInput('Cannot generate secret for public client', 'client');
    }

    const newSecret = generateClientSecret();
    const newHash = await hashClientSecret(newSecret, this.scryptCost);

    throwIfAborted(options);
    const changes = this.execute(id, () =>
      this.db.prepare<[string, string]>(`UPDATE ${CLIENTS_TABLE} SET secret = ? WHERE id = ?`).run(newHash, id)
        .changes
    );
    if (changes === 0) {
      throw StorageError.notFound('client', id);
    }

    this.logger.info({ clientId: id }, 'Client secret regenerated');
    return newSecret;
  }

  async delete(id: string, options?: OperationOptions): Promise<void> {
    throwIfAborted(options);
    const changes = this.execute(id, () =>
      this.db.prepare<[string]>(`DELETE FROM ${CLIENTS_TABLE} WHERE id = ?`).run(id).changes
    );
    if (changes === 0) {
      throw StorageError.notFound('client', id);
    }
    this.logger.info({ clientId: id }, 'Client deleted');
  }

  async list(filter: ClientFilter = {}, options?: OperationOptions): Promise<Client[]> {
    throwIfAborted(options);

    // Scalar criteria narrow the query; array criteria are matched on the decoded clients
    const conditions: string[] = [];
    const params: Record<string, string | number> = {};
    if (filter.owner !== undefined) {
      conditions.push('owner = @owner');
      params['owner'] = filter.owner;
    }
    if (filter.public !== undefined) {
      conditions.push('public = @public');
      params['public'] = filter.public ? 1 : 0;
    }
    if (filter.disabled !== undefined) {
      conditions.push('disabled = @disabled');
      params['disabled'] = filter.disabled ? 1 : 0;
    }

    const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
    const bindings: Array<Record<string, string | number>> = conditions.length > 0 ? [params] : [];
    const rows = this.execute('*', () =>
      this.db
        .prepare<Array<Record<string, string | number>>, ClientRow>(
          `SELECT * FROM ${CLIENTS_TABLE} ${where} ORDER BY id`
        )
        .all(...bindings)
    );

    const clients = rows.map(rowToClient).filter((client) => matchesClientFilter(client, filter));
    return paginate(clients, filter);
  }

  async authenticate(id: string, secret: string, options?: OperationOptions): Promise<Client> {
    const client = await this.get(id, options);
    return verifyClientCredentials(client, secret);
  }

  private findRow(id: string): ClientRow | undefined {
    return this.execute(id, () =>
      this.db.prepare<[string], ClientRow>(`SELECT * FROM ${CLIENTS_TABLE} WHERE id = ?`).get(id)
    );
  }

  private execute<T>(key: string, operation: () => T): T {
    try {
      return operation();
    } catch (err) {
      const translated = translateSqliteError(err, 'client', key);
      if (isStorageError(translated, 'conflict')) {
        this.logger.debug({ clientId: key }, 'Client already exists');
      }
      throw translated;
    }
  }
}
