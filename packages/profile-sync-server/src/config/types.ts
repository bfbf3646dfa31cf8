/**
 * Configuration types for profile-sync-server.
 */

/**
 * CORS configuration.
 */
export interface CorsConfig {
  /** Allowed origins. true = all, false = none, string/array = specific origins */
  origin: boolean | string | string[];
  credentials: boolean;
}

/**
 * Token issuance and session-server verification.
 */
export interface AuthConfig {
  /**
   * HMAC secret for sync tokens. Every instance behind a load balancer must
   * share it. When empty a random per-process secret is generated.
   */
  tokenSecret: string;
  /** Lifetime of issued tokens in seconds */
  tokenTtlSeconds: number;
  /** Session server `hasJoined` endpoint */
  sessionServerUrl: string;
  sessionServerTimeoutMs: number;
}

export type StoreBackend = 'memory' | 'mongodb';

/**
 * Version store selection.
 */
export interface StoreConfig {
  backend: StoreBackend;
  /** Connection string; a replica set is expected in production */
  mongoUrl: string;
  database: string;
  collection: string;
  /** Per-call timeout for reads and writes */
  timeoutMs: number;
}

/**
 * Settings passed to the SyncCoordinator.
 */
export interface SyncSettings {
  maxPayloadBytes: number;
  /** Read-decide-commit attempts before a lost race surfaces as a conflict */
  maxCommitAttempts: number;
}

/**
 * Bounds on the number of unique player IDs per bulk query.
 */
export interface BulkQueryConfig {
  minIds: number;
  maxIds: number;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LoggingConfig {
  level: LogLevel;
  /** Debug namespace filter (e.g., 'profile-sync*') */
  namespaces?: string;
}

/**
 * Full server configuration.
 */
export interface ServerConfig {
  host: string;
  port: number;
  /** Base path for all routes */
  basePath: string;

  cors: CorsConfig;
  auth: AuthConfig;
  store: StoreConfig;
  sync: SyncSettings;
  bulkQuery: BulkQueryConfig;
  logging: LoggingConfig;
}

export const DEFAULT_CONFIG: ServerConfig = {
  host: '0.0.0.0',
  port: 8000,
  basePath: '/sync',
  cors: {
    origin: true,
    credentials: false,
  },
  auth: {
    tokenSecret: '',
    tokenTtlSeconds: 60 * 60,
    sessionServerUrl: 'https://sessionserver.mojang.com/session/minecraft/hasJoined',
    sessionServerTimeoutMs: 4000,
  },
  store: {
    backend: 'memory',
    mongoUrl: 'mongodb://localhost:27017/?replicaSet=rs0',
    database: 'profile_sync',
    collection: 'profiles',
    timeoutMs: 5000,
  },
  sync: {
    maxPayloadBytes: 64 * 1024,
    maxCommitAttempts: 3,
  },
  bulkQuery: {
    minIds: 2,
    maxIds: 20,
  },
  logging: {
    level: 'info',
  },
};

/**
 * Partial configuration for merging.
 */
export type PartialServerConfig = {
  host?: string;
  port?: number;
  basePath?: string;
  cors?: Partial<CorsConfig>;
  auth?: Partial<AuthConfig>;
  store?: Partial<StoreConfig>;
  sync?: Partial<SyncSettings>;
  bulkQuery?: Partial<BulkQueryConfig>;
  logging?: Partial<LoggingConfig>;
};
