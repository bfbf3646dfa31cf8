/**
 * profile-sync-server - HTTP backend for versioned player-profile sync.
 *
 * @example
 * ```typescript
 * import { createProfileSyncServer, loadConfig } from '@profile-sync/server';
 *
 * const config = loadConfig({ overrides: { port: 8080 } });
 * const server = await createProfileSyncServer({ config });
 * await server.start();
 * ```
 */

// Configuration
export {
  type ServerConfig,
  type PartialServerConfig,
  type CorsConfig,
  type AuthConfig,
  type StoreConfig,
  type StoreBackend,
  type SyncSettings,
  type BulkQueryConfig,
  type LoggingConfig,
  type LogLevel,
  DEFAULT_CONFIG,
  DEFAULT_CONFIG_FILE,
  loadConfig,
  loadConfigFile,
  loadEnvConfig,
  mergeConfig,
  validateConfig,
} from './config/index.js';

// Session-server authentication
export {
  type SessionVerifier,
  type SessionServerVerifierOptions,
  type FetchFunction,
  SessionServerVerifier,
  SessionAuthError,
  InvalidAuthenticationError,
  AuthServerError,
  canonicalPlayerId,
} from './auth/session-verifier.js';

// Service layer
export {
  type ProfileSyncServiceOptions,
  type PushCredentials,
  type PushInput,
  type PushResponse,
  type SyncStats,
  type ServiceStatus,
  type BulkQueryResult,
  ProfileSyncService,
  openVersionStore,
} from './service/index.js';

// Server
export {
  type ProfileSyncServerOptions,
  type ProfileSyncServer,
  type WireSnapshot,
  createProfileSyncServer,
  registerRoutes,
  encodePayload,
  decodePayload,
  toWireSnapshot,
  formatExpiry,
} from './server/index.js';

// Metrics
export {
  type SyncMetrics,
  MetricsRegistry,
  defaultRegistry,
  createSyncMetrics,
} from './metrics/index.js';

// Logging
export { createLogger } from './common/logger.js';
