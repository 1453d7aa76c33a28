/**
 * OAuth 2.0 Client as persisted
 *
 * `secret` holds the scrypt hash of the client secret (empty for public
 * clients). The cleartext is only ever seen in the create request.
 */
export interface ClientRecord {
  id: string;
  name: string;
  secret: string;
  redirectUris: string[];
  grantTypes: string[]; // Empty means the authorization_code default
  responseTypes: string[]; // Empty means the code default
  scopes: string[];
  owner: string;
  policyUri: string;
  termsOfServiceUri: string;
  clientUri: string;
  logoUri: string;
  contacts: string[]; // Typically email addresses
  public: boolean; // No secret, client_credentials disallowed
  disabled: boolean;
  allowedTenantAccess: string[]; // Tenant IDs the client may access
}

/**
 * What the protocol engine reads from a client
 */
export interface OAuthClientCapabilities {
  getId(): string;
  getRedirectUris(): string[];
  getHashedSecret(): string;
  getScopes(): string[];
  getGrantTypes(): string[];
  getResponseTypes(): string[];
  getOwner(): string;
  isPublic(): boolean;
  isDisabled(): boolean;
}

/**
 * Client creation input
 * `secret` is the cleartext secret, hashed before it is stored
 */
export type CreateClientInput = Pick<ClientRecord, 'id'> & Partial<Omit<ClientRecord, 'id'>>;

/**
 * Client list filter
 * Array criteria match when the client holds every given value
 */
export interface ClientFilter {
  owner?: string;
  allowedTenantAccess?: string;
  redirectUri?: string;
  grantType?: string;
  responseType?: string;
  scopes?: string[];
  contact?: string;
  public?: boolean;
  disabled?: boolean;
  limit?: number;
  offset?: number;
}
