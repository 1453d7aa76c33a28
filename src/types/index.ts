// Client types
export type {
  ClientRecord,
  OAuthClientCapabilities,
  CreateClientInput,
  ClientFilter,
} from './client.js';

// Artifact types
export type { ArtifactKind, Requester, ArtifactRecord, OperationOptions } from './artifact.js';

// Session types
export type { Session, SessionPayload, SessionValue, TokenType } from './session.js';
