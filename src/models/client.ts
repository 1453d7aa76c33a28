import type { ClientRecord, OAuthClientCapabilities } from '../types/client.js';
import { DEFAULT_GRANT_TYPES, DEFAULT_RESPONSE_TYPES } from '../config/constants.js';
import { OrderedSet } from './ordered-set.js';

function emptyRecord(): ClientRecord {
  return {
    id: '',
    name: '',
    secret: '',
    redirectUris: [],
    grantTypes: [],
    responseTypes: [],
    scopes: [],
    owner: '',
    policyUri: '',
    termsOfServiceUri: '',
    clientUri: '',
    logoUri: '',
    contacts: [],
    public: false,
    disabled: false,
    allowedTenantAccess: [],
  };
}

function arraysEqual(a: readonly string[], b: readonly string[]): boolean {
  if (a.length !== b.length) {
    return false;
  }
  return a.every((value, i) => value === b[i]);
}

/**
 * OAuth 2.0 Client
 *
 * Wraps a persisted record with the accessors the protocol engine reads and
 * the set edits the admin surface performs. Arrays are copied in and out, so
 * a Client never shares state with the record it was built from.
 */
export class Client implements ClientRecord, OAuthClientCapabilities {
  id: string;
  name: string;
  secret: string;
  redirectUris: string[];
  grantTypes: string[];
  responseTypes: string[];
  scopes: string[];
  owner: string;
  policyUri: string;
  termsOfServiceUri: string;
  clientUri: string;
  logoUri: string;
  contacts: string[];
  public: boolean;
  disabled: boolean;
  allowedTenantAccess: string[];

  constructor(record: Partial<ClientRecord> = {}) {
    const full = { ...emptyRecord(), ...record };
    this.id = full.id;
    this.name = full.name;
    this.secret = full.secret;
    this.redirectUris = [...full.redirectUris];
    this.grantTypes = [...full.grantTypes];
    this.responseTypes = [...full.responseTypes];
    this.scopes = [...full.scopes];
    this.owner = full.owner;
    this.policyUri = full.policyUri;
    this.termsOfServiceUri = full.termsOfServiceUri;
    this.clientUri = full.clientUri;
    this.logoUri = full.logoUri;
    this.contacts = [...full.contacts];
    this.public = full.public;
    this.disabled = full.disabled;
    this.allowedTenantAccess = [...full.allowedTenantAccess];
  }

  static fromRecord(record: ClientRecord): Client {
    return new Client(record);
  }

  static empty(): Client {
    return new Client();
  }

  getId(): string {
    return this.id;
  }

  getRedirectUris(): string[] {
    return [...this.redirectUris];
  }

  getHashedSecret(): string {
    return this.secret;
  }

  getScopes(): string[] {
    return [...this.scopes];
  }

  /**
   * Grant types, defaulting to authorization_code when none are stored
   */
  getGrantTypes(): string[] {
    return this.grantTypes.length === 0 ? [...DEFAULT_GRANT_TYPES] : [...this.grantTypes];
  }

  /**
   * Response types, defaulting to code when none are stored
   */
  getResponseTypes(): string[] {
    return this.responseTypes.length === 0 ? [...DEFAULT_RESPONSE_TYPES] : [...this.responseTypes];
  }

  getOwner(): string {
    return this.owner;
  }

  getAllowedTenantAccess(): string[] {
    return [...this.allowedTenantAccess];
  }

  isPublic(): boolean {
    return this.public;
  }

  isDisabled(): boolean {
    return this.disabled;
  }

  enableScopeAccess(...scopes: string[]): void {
    this.scopes = OrderedSet.from(this.scopes).add(...scopes).toArray();
  }

  disableScopeAccess(...scopes: string[]): void {
    this.scopes = OrderedSet.from(this.scopes).remove(...scopes).toArray();
  }

  enableTenantAccess(...tenantIds: string[]): void {
    this.allowedTenantAccess = OrderedSet.from(this.allowedTenantAccess).add(...tenantIds).toArray();
  }

  disableTenantAccess(...tenantIds: string[]): void {
    this.allowedTenantAccess = OrderedSet.from(this.allowedTenantAccess)
      .remove(...tenantIds)
      .toArray();
  }

  /**
   * Field-by-field equality, including the hashed secret.
   * Arrays compare by length and position.
   */
  equals(other: ClientRecord): boolean {
    return (
      this.id === other.id &&
      arraysEqual(this.allowedTenantAccess, other.allowedTenantAccess) &&
      this.name === other.name &&
      this.secret === other.secret &&
      arraysEqual(this.redirectUris, other.redirectUris) &&
      arraysEqual(this.grantTypes, other.grantTypes) &&
      arraysEqual(this.responseTypes, other.responseTypes) &&
      arraysEqual(this.scopes, other.scopes) &&
      this.owner === other.owner &&
      this.policyUri === other.policyUri &&
      this.termsOfServiceUri === other.termsOfServiceUri &&
      this.clientUri === other.clientUri &&
      this.logoUri === other.logoUri &&
      arraysEqual(this.contacts, other.contacts) &&
      this.public === other.public &&
      this.disabled === other.disabled
    );
  }

  isEmpty(): boolean {
    return this.equals(emptyRecord());
  }

  toRecord(): ClientRecord {
    return {
      id: this.id,
      name: this.name,
      secret: this.secret,
      redirectUris: [...this.redirectUris],
      grantTypes: [...this.grantTypes],
      responseTypes: [...this.responseTypes],
      scopes: [...this.scopes],
      owner: this.owner,
      policyUri: this.policyUri,
      termsOfServiceUri: this.termsOfServiceUri,
      clientUri: this.clientUri,
      logoUri: this.logoUri,
      contacts: [...this.contacts],
      public: this.public,
      disabled: this.disabled,
      allowedTenantAccess: [...this.allowedTenantAccess],
    };
  }
}
