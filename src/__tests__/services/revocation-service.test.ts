import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { IStorage, IArtifactStorage } from '../../storage/interfaces/index.js';
import type { ArtifactKind, OperationOptions } from '../../types/artifact.js';
import { RevocationService } from '../../services/revocation-service.js';
import { MemoryArtifactStorage } from '../../storage/memory/index.js';
import { DefaultSession } from '../../session/default-session.js';
import { RevocationError, StorageError } from '../../errors/storage-error.js';
import { ARTIFACT_KINDS } from '../../config/constants.js';
import { backends, createRequest, NOW } from '../test-setup.js';

// Artifact storage whose request-id deletes fail for the given kinds
class FailingArtifactStorage extends MemoryArtifactStorage {
  constructor(private readonly failingKinds: ArtifactKind[]) {
    super({ now: () => NOW });
  }

  override async deleteByRequestId(kind: ArtifactKind, requestId: string, options?: OperationOptions): Promise<number> {
    if (this.failingKinds.includes(kind)) {
      throw StorageError.unavailable('Database unavailable (SQLITE_BUSY)');
    }
    return super.deleteByRequestId(kind, requestId, options);
  }
}

async function issueEveryKind(artifacts: IArtifactStorage, requestId: string, prefix: string): Promise<void> {
  for (const kind of ARTIFACT_KINDS) {
    await artifacts.create(kind, `${prefix}-${kind}`, createRequest({ id: requestId }));
  }
}

async function exists(artifacts: IArtifactStorage, kind: ArtifactKind, signature: string): Promise<boolean> {
  try {
    await artifacts.get(kind, signature, new DefaultSession());
    return true;
  } catch (err) {
    if (err instanceof StorageError && err.code === 'not_found') {
      return false;
    }
    throw err;
  }
}

function rejectionOf(promise: Promise<unknown>): Promise<unknown> {
  return promise.then(
    () => undefined,
    (err: unknown) => err
  );
}

describe.each(backends)('RevocationService on $name storage', (backend) => {
  let storage: IStorage;
  let service: RevocationService;

  beforeEach(async () => {
    storage = backend.create();
    service = new RevocationService(storage.artifacts);
    await issueEveryKind(storage.artifacts, 'req1', 'a');
    await issueEveryKind(storage.artifacts, 'req2', 'b');
  });

  afterEach(async () => {
    await storage.close();
  });

  it('should revoke every artifact of the request when revoking a refresh token', async () => {
    await storage.artifacts.create('refresh_token', 'a-rotated', createRequest({ id: 'req1' }));

    const report = await service.revokeRefreshToken('req1');

    expect(report).toEqual({
      requestId: 'req1',
      deleted: { refresh_token: 2, access_token: 1, authorize_code: 1, pkce: 1, oidc_session: 1 },
    });
    for (const kind of ARTIFACT_KINDS) {
      expect(await exists(storage.artifacts, kind, `a-${kind}`)).toBe(false);
      expect(await exists(storage.artifacts, kind, `b-${kind}`)).toBe(true);
    }
  });

  it('should revoke only access tokens when revoking an access token', async () => {
    const report = await service.revokeAccessToken('req1');

    expect(report).toEqual({ requestId: 'req1', deleted: { access_token: 1 } });
    expect(await exists(storage.artifacts, 'access_token', 'a-access_token')).toBe(false);
    expect(await exists(storage.artifacts, 'refresh_token', 'a-refresh_token')).toBe(true);
  });

  it('should revoke every kind for a request', async () => {
    const report = await service.revokeRequest('req2');

    expect(report.deleted).toEqual({
      access_token: 1,
      refresh_token: 1,
      authorize_code: 1,
      pkce: 1,
      oidc_session: 1,
    });
    expect(await exists(storage.artifacts, 'oidc_session', 'b-oidc_session')).toBe(false);
    expect(await exists(storage.artifacts, 'oidc_session', 'a-oidc_session')).toBe(true);
  });

  it('should succeed with zero counts for an unknown request', async () => {
    const report = await service.revokeAccessToken('missing');
    expect(report).toEqual({ requestId: 'missing', deleted: { access_token: 0 } });
  });
});

describe('RevocationService partial failure', () => {
  let artifacts: FailingArtifactStorage;

  beforeEach(async () => {
    artifacts = new FailingArtifactStorage(['access_token']);
    await issueEveryKind(artifacts, 'req1', 'a');
  });

  it('should delete the target and remaining kinds before reporting the failure', async () => {
    const service = new RevocationService(artifacts);

    const error = await rejectionOf(service.revokeRefreshToken('req1'));

    expect(error).toBeInstanceOf(RevocationError);
    expect(error).toMatchObject({
      code: 'revocation_incomplete',
      requestId: 'req1',
      message: 'Revocation of request req1 is incomplete, failed to delete: access_token',
      deleted: { refresh_token: 1, authorize_code: 1, pkce: 1, oidc_session: 1 },
    });

    expect(await exists(artifacts, 'refresh_token', 'a-refresh_token')).toBe(false);
    expect(await exists(artifacts, 'pkce', 'a-pkce')).toBe(false);
    expect(await exists(artifacts, 'access_token', 'a-access_token')).toBe(true);
  });

  it('should report a failure of the target kind itself', async () => {
    const service = new RevocationService(new FailingArtifactStorage(['refresh_token', 'pkce']));

    await expect(service.revokeRefreshToken('req1')).rejects.toMatchObject({
      code: 'revocation_incomplete',
      message: 'Revocation of request req1 is incomplete, failed to delete: refresh_token, pkce',
    });
  });

  it('should carry the underlying errors', async () => {
    const service = new RevocationService(artifacts);

    const error = await rejectionOf(service.revokeAccessToken('req1'));

    expect(error).toBeInstanceOf(RevocationError);
    if (!(error instanceof RevocationError)) return;
    expect(error.failures.map((failure) => failure.kind)).toEqual(['access_token']);
    expect(error.failures[0]?.error).toMatchObject({
      code: 'unavailable',
      message: 'Database unavailable (SQLITE_BUSY)',
    });
    expect(error.cause).toBe(error.failures[0]?.error);
  });
});
