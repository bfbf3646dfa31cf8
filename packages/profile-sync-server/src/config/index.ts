/**
 * Configuration module exports.
 */

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
} from './types.js';

export {
  loadConfig,
  loadConfigFile,
  loadEnvConfig,
  mergeConfig,
  validateConfig,
  parseCorsOrigin,
  parseStoreBackend,
  parseLogLevel,
  DEFAULT_CONFIG_FILE,
} from './loader.js';
