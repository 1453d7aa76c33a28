import type { ArtifactKind } from '../../types/artifact.js';

export const CLIENTS_TABLE = 'oauth2_clients';

/**
 * Backing table for each artifact kind
 */
export const ARTIFACT_TABLES: Record<ArtifactKind, string> = {
  access_token: 'oauth2_access_tokens',
  refresh_token: 'oauth2_refresh_tokens',
  authorize_code: 'oauth2_authorize_codes',
  pkce: 'oauth2_pkce_requests',
  oidc_session: 'oauth2_oidc_sessions',
};

const clientsSchema = `
  CREATE TABLE IF NOT EXISTS ${CLIENTS_TABLE} (
    id TEXT PRIMARY KEY,
    name TEXT NOT NULL DEFAULT '',
    secret TEXT NOT NULL DEFAULT '',
    redirect_uris TEXT NOT NULL DEFAULT '[]',
    grant_types TEXT NOT NULL DEFAULT '[]',
    response_types TEXT NOT NULL DEFAULT '[]',
    scopes TEXT NOT NULL DEFAULT '[]',
    owner TEXT NOT NULL DEFAULT '',
    policy_uri TEXT NOT NULL DEFAULT '',
    terms_of_service_uri TEXT NOT NULL DEFAULT '',
    client_uri TEXT NOT NULL DEFAULT '',
    logo_uri TEXT NOT NULL DEFAULT '',
    contacts TEXT NOT NULL DEFAULT '[]',
    public INTEGER NOT NULL DEFAULT 0,
    disabled INTEGER NOT NULL DEFAULT 0,
    allowed_tenant_access TEXT NOT NULL DEFAULT '[]'
  );

  CREATE INDEX IF NOT EXISTS idx_${CLIENTS_TABLE}_owner ON ${CLIENTS_TABLE} (owner);
`;

function artifactSchema(table: string): string {
  return `
    CREATE TABLE IF NOT EXISTS ${table} (
      signature TEXT PRIMARY KEY,
      request_id TEXT NOT NULL,
      requested_at INTEGER NOT NULL,
      client_id TEXT NOT NULL,
      requested_scopes TEXT NOT NULL,
      granted_scopes TEXT NOT NULL,
      requested_audience TEXT NOT NULL,
      granted_audience TEXT NOT NULL,
      form TEXT NOT NULL,
      session BLOB NOT NULL,
      expires_at INTEGER
    );

    CREATE INDEX IF NOT EXISTS idx_${table}_request_id ON ${table} (request_id);
    CREATE INDEX IF NOT EXISTS idx_${table}_expires_at ON ${table} (expires_at);
  `;
}

/**
 * DDL for every table, safe to run on an existing database
 */
export function schemaStatements(): string {
  return [clientsSchema, ...Object.values(ARTIFACT_TABLES).map(artifactSchema)].join('\n');
}
