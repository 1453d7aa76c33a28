import type { ArtifactKind, Requester, OperationOptions } from '../../types/artifact.js';
import type { Session } from '../../types/session.js';

/**
 * Signature-keyed storage for grant artifacts
 *
 * Every operation is scoped to one artifact kind; the same signature may
 * exist under different kinds.
 */
export interface IArtifactStorage {
  /**
   * Persist a new artifact, failing with `conflict` if the signature exists
   */
  create(kind: ArtifactKind, signature: string, request: Requester, options?: OperationOptions): Promise<void>;

  /**
   * Look up an artifact by exact signature and restore its session into
   * `session`. Fails with `not_found`, `expired` or `malformed`.
   */
  get<S extends Session>(
    kind: ArtifactKind,
    signature: string,
    session: S,
    options?: OperationOptions
  ): Promise<Requester<S>>;

  /**
   * Delete one artifact, failing with `not_found`
   */
  delete(kind: ArtifactKind, signature: string, options?: OperationOptions): Promise<void>;

  /**
   * Delete every artifact of a kind issued from one request
   * Returns the number deleted
   */
  deleteByRequestId(kind: ArtifactKind, requestId: string, options?: OperationOptions): Promise<number>;

  /**
   * Delete artifacts past their expiry (cleanup)
   */
  deleteExpired(kind: ArtifactKind, options?: OperationOptions): Promise<number>;
}
