import { z } from 'zod';
import type { ClientRecord, ClientFilter, CreateClientInput } from '../../types/client.js';
import type { Client } from '../../models/client.js';
import { OrderedSet } from '../../models/ordered-set.js';
import { StorageError } from '../../errors/storage-error.js';
import { hashClientSecret, verifyClientSecret } from '../../crypto/hash.js';
import { GRANT_TYPE_CLIENT_CREDENTIALS, DEFAULT_LIST_LIMIT } from '../../config/constants.js';

const stringList = z.array(z.string().min(1)).default([]);

/**
 * Client metadata validation
 * Scope and tenant lists are de-duplicated, keeping first occurrence order
 */
export const clientSchema = z
  .object({
    id: z.string().min(1, 'Client ID is required'),
    name: z.string().default(''),
    secret: z.string().default(''),
    redirectUris: z.array(z.string().url('Redirect URIs must be absolute URLs')).default([]),
    grantTypes: stringList,
    responseTypes: stringList,
    scopes: stringList.transform((scopes) => OrderedSet.from(scopes).toArray()),
    owner: z.string().default(''),
    policyUri: z.string().default(''),
    termsOfServiceUri: z.string().default(''),
    clientUri: z.string().default(''),
    logoUri: z.string().default(''),
    contacts: stringList,
    public: z.boolean().default(false),
    disabled: z.boolean().default(false),
    allowedTenantAccess: stringList.transform((tenants) => OrderedSet.from(tenants).toArray()),
  })
  .superRefine((client, ctx) => {
    if (!client.public) {
      return;
    }
    if (client.secret !== '') {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['secret'],
        message: 'Public clients must not have a secret',
      });
    }
    if (client.grantTypes.includes(GRANT_TYPE_CLIENT_CREDENTIALS)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['grantTypes'],
        message: 'Public clients cannot use the client_credentials grant',
      });
    }
  });

export function parseClient(input: CreateClientInput | ClientRecord): ClientRecord {
  const result = clientSchema.safeParse(input);
  if (!result.success) {
    const messages = result.error.errors.map((issue) => issue.message).join(', ');
    throw StorageError.invalidInput(messages, 'client', result.error);
  }
  return result.data;
}

/**
 * Validate a create request and hash its secret
 */
export async function prepareNewClient(input: CreateClientInput, scryptCost: number): Promise<ClientRecord> {
  const record = parseClient(input);
  if (record.secret !== '') {
    record.secret = await hashClientSecret(record.secret, scryptCost);
  }
  return record;
}

/**
 * Validate an update and resolve its secret against the stored one
 *
 * Empty fields in an update are omitted rather than clobbering stored
 * values; for the secret that means an empty string keeps the stored hash.
 */
export async function prepareUpdatedClient(
  existing: ClientRecord,
  update: ClientRecord,
  scryptCost: number
): Promise<ClientRecord> {
  const keepsStoredSecret = update.secret === '' || update.secret === existing.secret;
  const record = parseClient({ ...update, secret: keepsStoredSecret ? '' : update.secret });

  if (record.secret !== '') {
    record.secret = await hashClientSecret(record.secret, scryptCost);
  } else if (!record.public) {
    record.secret = existing.secret;
  }
  // A client switching to public drops its stored hash
  return record;
}

/**
 * Whether a client satisfies every criterion of a filter
 */
export function matchesClientFilter(client: Client, filter: ClientFilter): boolean {
  if (filter.owner !== undefined && client.owner !== filter.owner) return false;
  if (filter.public !== undefined && client.public !== filter.public) return false;
  if (filter.disabled !== undefined && client.disabled !== filter.disabled) return false;
  if (filter.allowedTenantAccess !== undefined && !client.allowedTenantAccess.includes(filter.allowedTenantAccess)) {
    return false;
  }
  if (filter.redirectUri !== undefined && !client.redirectUris.includes(filter.redirectUri)) return false;
  if (filter.grantType !== undefined && !client.getGrantTypes().includes(filter.grantType)) return false;
  if (filter.responseType !== undefined && !client.getResponseTypes().includes(filter.responseType)) {
    return false;
  }
  if (filter.contact !== undefined && !client.contacts.includes(filter.contact)) return false;
  if (filter.scopes !== undefined && !OrderedSet.from(client.scopes).hasAll(filter.scopes)) return false;
  return true;
}

/**
 * Apply a filter's offset and limit
 */
export function paginate<T>(items: T[], filter: ClientFilter): T[] {
  const offset = filter.offset ?? 0;
  const limit = filter.limit ?? DEFAULT_LIST_LIMIT;
  return items.slice(offset, offset + limit);
}

/**
 * Verify a cleartext secret against a stored client
 */
export async function verifyClientCredentials(client: Client, secret: string): Promise<Client> {
  if (client.disabled) {
    throw StorageError.accessDenied('client', `Client is disabled: ${client.id}`);
  }

  if (client.public) {
    return client;
  }

  if (client.secret === '' || !(await verifyClientSecret(secret, client.secret))) {
    throw StorageError.accessDenied('client', `Invalid client credentials: ${client.id}`);
  }

  return client;
}
