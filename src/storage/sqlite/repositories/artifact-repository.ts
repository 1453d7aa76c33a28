import type Database from 'better-sqlite3';
import type { Logger } from 'pino';
import type { ArtifactKind, ArtifactRecord, OperationOptions, Requester } from '../../../types/artifact.js';
import type { Session } from '../../../types/session.js';
import type { IArtifactStorage } from '../../interfaces/artifact-storage.js';
import { StorageError, isStorageError } from '../../../errors/storage-error.js';
import { logger as rootLogger, maskSignature } from '../../../observability/logger.js';
import { assertSignature, throwIfAborted, toArtifactRecord, toRequester } from '../../common/artifacts.js';
import { ARTIFACT_TABLES } from '../schema.js';
import { formColumn, parseJsonColumn, stringListColumn } from '../columns.js';
import { translateSqliteError } from '../errors.js';

interface ArtifactRow {
  signature: string;
  request_id: string;
  requested_at: number;
  client_id: string;
  requested_scopes: string;
  granted_scopes: string;
  requested_audience: string;
  granted_audience: string;
  form: string;
  session: Buffer;
  expires_at: number | null;
}

function recordToRow(record: ArtifactRecord): ArtifactRow {
  return {
    signature: record.signature,
    request_id: record.requestId,
    requested_at: record.requestedAt.getTime(),
    client_id: record.clientId,
    requested_scopes: JSON.stringify(record.requestedScopes),
    granted_scopes: JSON.stringify(record.grantedScopes),
    requested_audience: JSON.stringify(record.requestedAudience),
    granted_audience: JSON.stringify(record.grantedAudience),
    form: JSON.stringify(record.form),
    session: Buffer.from(record.session),
    expires_at: record.expiresAt ? record.expiresAt.getTime() : null,
  };
}

function rowToRecord(kind: ArtifactKind, row: ArtifactRow): ArtifactRecord {
  const list = (value: string, column: string) => parseJsonColumn(stringListColumn, value, column, kind);

  return {
    signature: row.signature,
    requestId: row.request_id,
    requestedAt: new Date(row.requested_at),
    clientId: row.client_id,
    requestedScopes: list(row.requested_scopes, 'requested_scopes'),
    grantedScopes: list(row.granted_scopes, 'granted_scopes'),
    requestedAudience: list(row.requested_audience, 'requested_audience'),
    grantedAudience: list(row.granted_audience, 'granted_audience'),
    form: parseJsonColumn(formColumn, row.form, 'form', kind),
    session: new Uint8Array(row.session),
    expiresAt: row.expires_at === null ? null : new Date(row.expires_at),
  };
}

/**
 * SQLite artifact storage implementation, one table per artifact kind
 */
export class SqliteArtifactStorage implements IArtifactStorage {
  private readonly now: () => Date;
  private readonly logger: Logger;

  constructor(
    private readonly db: Database.Database,
    options: { now?: () => Date; logger?: Logger } = {}
  ) {
    this.now = options.now ?? (() => new Date());
    this.logger = (options.logger ?? rootLogger).child({ component: 'sqlite-artifact-storage' });
  }

  async create(kind: ArtifactKind, signature: string, request: Requester, options?: OperationOptions): Promise<void> {
    throwIfAborted(options);
    assertSignature(kind, signature);
    const row = recordToRow(toArtifactRecord(kind, signature, request));

    this.execute(kind, signature, () => {
      this.db
        .prepare<[ArtifactRow]>(
          `INSERT INTO ${ARTIFACT_TABLES[kind]} (
             signature, request_id, requested_at, client_id,
             requested_scopes, granted_scopes, requested_audience, granted_audience,
             form, session, expires_at
           ) VALUES (
             @signature, @request_id, @requested_at, @client_id,
             @requested_scopes, @granted_scopes, @requested_audience, @granted_audience,
             @form, @session, @expires_at
           )`
        )
        .run(row);
    });
  }

  async get<S extends Session>(
    kind: ArtifactKind,
    signature: string,
    session: S,
    options?: OperationOptions
  ): Promise<Requester<S>> {
    throwIfAborted(options);
    const row = this.execute(kind, signature, () =>
      this.db
        .prepare<[string], ArtifactRow>(`SELECT * FROM ${ARTIFACT_TABLES[kind]} WHERE signature = ?`)
        .get(signature)
    );
    if (!row) {
      throw StorageError.notFound(kind, maskSignature(signature));
    }
    return toRequester(kind, rowToRecord(kind, row), session, this.now(), this.logger);
  }

  async delete(kind: ArtifactKind, signature: string, options?: OperationOptions): Promise<void> {
    throwIfAborted(options);
    const changes = this.execute(kind, signature, () =>
      this.db.prepare<[string]>(`DELETE FROM ${ARTIFACT_TABLES[kind]} WHERE signature = ?`).run(signature).changes
    );
    if (changes === 0) {
      throw StorageError.notFound(kind, maskSignature(signature));
    }
  }

  async deleteByRequestId(kind: ArtifactKind, requestId: string, options?: OperationOptions): Promise<number> {
    throwIfAborted(options);
    return this.execute(kind, requestId, () =>
      this.db.prepare<[string]>(`DELETE FROM ${ARTIFACT_TABLES[kind]} WHERE request_id = ?`).run(requestId).changes
    );
  }

  async deleteExpired(kind: ArtifactKind, options?: OperationOptions): Promise<number> {
    throwIfAborted(options);
    const now = this.now().getTime();
    const deleted = this.execute(kind, '*', () =>
      this.db
        .prepare<[number]>(
          `DELETE FROM ${ARTIFACT_TABLES[kind]} WHERE expires_at IS NOT NULL AND expires_at <= ?`
        )
        .run(now).changes
    );
    if (deleted > 0) {
      this.logger.debug({ kind, deleted }, 'Expired artifacts removed');
    }
    return deleted;
  }

  private execute<T>(kind: ArtifactKind, key: string, operation: () => T): T {
    try {
      return operation();
    } catch (err) {
      const translated = translateSqliteError(err, kind, key === '*' ? key : maskSignature(key));
      if (isStorageError(translated, 'conflict')) {
        this.logger.debug({ kind, signature: maskSignature(key) }, 'Artifact signature already exists');
      }
      throw translated;
    }
  }
}
