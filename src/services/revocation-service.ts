import type { Logger } from 'pino';
import type { ArtifactKind, OperationOptions } from '../types/artifact.js';
import type { IArtifactStorage } from '../storage/interfaces/artifact-storage.js';
import { RevocationError, type RevocationFailure } from '../errors/storage-error.js';
import { logger as rootLogger } from '../observability/logger.js';
import {
  ARTIFACT_ACCESS_TOKEN,
  ARTIFACT_REFRESH_TOKEN,
  ARTIFACT_AUTHORIZE_CODE,
  ARTIFACT_PKCE,
  ARTIFACT_OIDC_SESSION,
  ARTIFACT_KINDS,
} from '../config/constants.js';

/**
 * Outcome of a completed revocation
 */
export interface RevocationReport {
  requestId: string;
  deleted: Partial<Record<ArtifactKind, number>>;
}

/**
 * Kinds deleted for each revocation, target kind first
 */
const REFRESH_TOKEN_CASCADE: readonly ArtifactKind[] = [
  ARTIFACT_REFRESH_TOKEN,
  ARTIFACT_ACCESS_TOKEN,
  ARTIFACT_AUTHORIZE_CODE,
  ARTIFACT_PKCE,
  ARTIFACT_OIDC_SESSION,
];

const ACCESS_TOKEN_CASCADE: readonly ArtifactKind[] = [ARTIFACT_ACCESS_TOKEN];

/**
 * Service for revoking every artifact issued from one grant
 *
 * Deletions run kind by kind. A failure does not stop the remaining kinds,
 * but the call then throws a RevocationError so the caller knows the grant
 * is not guaranteed revoked.
 */
export class RevocationService {
  private readonly logger: Logger;

  constructor(
    private readonly artifacts: IArtifactStorage,
    options: { logger?: Logger } = {}
  ) {
    this.logger = (options.logger ?? rootLogger).child({ component: 'revocation-service' });
  }

  /**
   * Revoke a refresh token and everything issued alongside it
   */
  async revokeRefreshToken(requestId: string, options?: OperationOptions): Promise<RevocationReport> {
    return this.revoke(requestId, REFRESH_TOKEN_CASCADE, options);
  }

  /**
   * Revoke the access tokens of a request
   */
  async revokeAccessToken(requestId: string, options?: OperationOptions): Promise<RevocationReport> {
    return this.revoke(requestId, ACCESS_TOKEN_CASCADE, options);
  }

  /**
   * Revoke every artifact of a request (logout)
   */
  async revokeRequest(requestId: string, options?: OperationOptions): Promise<RevocationReport> {
    return this.revoke(requestId, ARTIFACT_KINDS, options);
  }

  private async revoke(
    requestId: string,
    kinds: readonly ArtifactKind[],
    options?: OperationOptions
  ): Promise<RevocationReport> {
    options?.signal?.throwIfAborted();

    const deleted: Partial<Record<ArtifactKind, number>> = {};
    const failures: RevocationFailure[] = [];

    for (const kind of kinds) {
      try {
        deleted[kind] = await this.artifacts.deleteByRequestId(kind, requestId);
      } catch (error) {
        failures.push({ kind, error });
      }
    }

    if (failures.length > 0) {
      const revocationError = new RevocationError(requestId, failures, deleted);
      this.logger.error(
        { requestId, failedKinds: failures.map((failure) => failure.kind), deleted, err: revocationError },
        'Revocation incomplete'
      );
      throw revocationError;
    }

    this.logger.debug({ requestId, deleted }, 'Request revoked');
    return { requestId, deleted };
  }
}
