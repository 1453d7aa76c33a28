import type { Logger } from 'pino';
import type { ArtifactKind, ArtifactRecord, OperationOptions, Requester } from '../../types/artifact.js';
import type { Session } from '../../types/session.js';
import type { IArtifactStorage } from '../interfaces/artifact-storage.js';
import { StorageError } from '../../errors/storage-error.js';
import { logger as rootLogger, maskSignature } from '../../observability/logger.js';
import { assertSignature, isExpired, throwIfAborted, toArtifactRecord, toRequester } from '../common/artifacts.js';

/**
 * Records and request index for one artifact kind
 */
interface KindCollection {
  records: Map<string, ArtifactRecord>; // signature -> record
  requestIndex: Map<string, Set<string>>; // requestId -> signatures
}

function cloneRecord(record: ArtifactRecord): ArtifactRecord {
  return {
    ...record,
    requestedAt: new Date(record.requestedAt.getTime()),
    requestedScopes: [...record.requestedScopes],
    grantedScopes: [...record.grantedScopes],
    requestedAudience: [...record.requestedAudience],
    grantedAudience: [...record.grantedAudience],
    form: Object.fromEntries(Object.entries(record.form).map(([key, values]) => [key, [...values]])),
    session: record.session.slice(),
    expiresAt: record.expiresAt ? new Date(record.expiresAt.getTime()) : null,
  };
}

/**
 * In-memory artifact storage implementation
 *
 * Each operation reads and writes its kind's maps without awaiting, so a
 * create cannot interleave with another create or delete of the same
 * signature.
 */
export class MemoryArtifactStorage implements IArtifactStorage {
  private readonly collections: Record<ArtifactKind, KindCollection>;
  private readonly now: () => Date;
  private readonly logger: Logger;

  constructor(options: { now?: () => Date; logger?: Logger } = {}) {
    this.now = options.now ?? (() => new Date());
    this.logger = (options.logger ?? rootLogger).child({ component: 'memory-artifact-storage' });

    this.collections = {
      access_token: { records: new Map(), requestIndex: new Map() },
      refresh_token: { records: new Map(), requestIndex: new Map() },
      authorize_code: { records: new Map(), requestIndex: new Map() },
      pkce: { records: new Map(), requestIndex: new Map() },
      oidc_session: { records: new Map(), requestIndex: new Map() },
    };
  }

  async create(kind: ArtifactKind, signature: string, request: Requester, options?: OperationOptions): Promise<void> {
    throwIfAborted(options);
    assertSignature(kind, signature);
    const record = toArtifactRecord(kind, signature, request);
    const collection = this.collections[kind];

    if (collection.records.has(signature)) {
      this.logger.debug({ kind, signature: maskSignature(signature) }, 'Artifact signature already exists');
      throw StorageError.conflict(kind, maskSignature(signature));
    }

    collection.records.set(signature, record);
    const signatures = collection.requestIndex.get(record.requestId) ?? new Set<string>();
    signatures.add(signature);
    collection.requestIndex.set(record.requestId, signatures);
  }

  async get<S extends Session>(
    kind: ArtifactKind,
    signature: string,
    session: S,
    options?: OperationOptions
  ): Promise<Requester<S>> {
    throwIfAborted(options);
    const record = this.collections[kind].records.get(signature);
    if (!record) {
      throw StorageError.notFound(kind, maskSignature(signature));
    }
    return toRequester(kind, cloneRecord(record), session, this.now(), this.logger);
  }

  async delete(kind: ArtifactKind, signature: string, options?: OperationOptions): Promise<void> {
    throwIfAborted(options);
    if (!this.remove(kind, signature)) {
      throw StorageError.notFound(kind, maskSignature(signature));
    }
  }

  async deleteByRequestId(kind: ArtifactKind, requestId: string, options?: OperationOptions): Promise<number> {
    throwIfAborted(options);
    const signatures = this.collections[kind].requestIndex.get(requestId);
    if (!signatures) {
      return 0;
    }

    let count = 0;
    for (const signature of Array.from(signatures)) {
      if (this.remove(kind, signature)) {
        count++;
      }
    }
    return count;
  }

  async deleteExpired(kind: ArtifactKind, options?: OperationOptions): Promise<number> {
    throwIfAborted(options);
    const now = this.now();
    let count = 0;
    for (const [signature, record] of Array.from(this.collections[kind].records)) {
      if (isExpired(record, now) && this.remove(kind, signature)) {
        count++;
      }
    }
    return count;
  }

  private remove(kind: ArtifactKind, signature: string): boolean {
    const collection = this.collections[kind];
    const record = collection.records.get(signature);
    if (!record) {
      return false;
    }

    collection.records.delete(signature);
    const signatures = collection.requestIndex.get(record.requestId);
    signatures?.delete(signature);
    if (signatures && signatures.size === 0) {
      collection.requestIndex.delete(record.requestId);
    }
    return true;
  }
}
