/**
 * profile-sync - Versioned player-profile synchronization engine.
 *
 * Reconciles concurrent pushes of a player's opaque mod configuration against
 * a replicated document store using optimistic concurrency.
 *
 * @example
 * ```typescript
 * import { SyncCoordinator, SignedTokenAuthenticator, InMemoryVersionStore } from '@profile-sync/core';
 *
 * const authenticator = new SignedTokenAuthenticator({ secret: 'change-me' });
 * const coordinator = new SyncCoordinator({ store: new InMemoryVersionStore(), authenticator });
 * const { token } = authenticator.issue('P1');
 * const result = await coordinator.sync({ playerId: 'P1', token, baseVersion: 0, payload });
 * ```
 */

// Model
export {
  type PlayerProfile,
  type ProfileSnapshot,
  type SyncRequest,
  type SyncResult,
  type SyncOutcome,
  type FetchResult,
  emptySnapshot,
} from './model/types.js';

// Errors
export {
  type ProfileSyncErrorCode,
  ProfileSyncError,
  UnauthorizedError,
  VersionConflictError,
  InvalidVersionError,
  StoreUnavailableError,
  PayloadTooLargeError,
  InvalidRequestError,
  toError,
} from './common/errors.js';

// Authentication
export {
  type AuthResult,
  type IssuedToken,
  type TokenAuthenticator,
  type SignedTokenAuthenticatorOptions,
  SignedTokenAuthenticator,
} from './auth/token-authenticator.js';

// Storage
export {
  type VersionStore,
  type WriteOptions,
  type WriteResult,
  type InMemoryVersionStoreOptions,
  type ProfileDocument,
  type ProfileUpdate,
  type ProfileCollection,
  type MongoVersionStoreOptions,
  type MongoConnectOptions,
  InMemoryVersionStore,
  MongoVersionStore,
  isDuplicateKeyError,
  translateMongoError,
} from './store/index.js';

// Conflict resolution
export { type Decision, ConflictResolver } from './resolver/conflict-resolver.js';

// Coordination
export {
  type SyncState,
  type SyncCoordinatorHooks,
  type SyncCoordinatorOptions,
  SyncCoordinator,
  DEFAULT_MAX_COMMIT_ATTEMPTS,
  DEFAULT_STORE_TIMEOUT_MS,
  DEFAULT_MAX_PAYLOAD_BYTES,
} from './coordinator/sync-coordinator.js';

// Common utilities
export { createLogger } from './common/logger.js';
export { withStoreTimeout } from './common/timeout.js';
