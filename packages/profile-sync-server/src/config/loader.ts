/**
 * Configuration loading from multiple sources.
 *
 * Priority (highest to lowest):
 * 1. Programmatic options
 * 2. CLI arguments
 * 3. Environment variables
 * 4. Config file
 * 5. Defaults
 */

import { readFileSync, existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { configLog } from '../common/logger.js';
import {
  type ServerConfig,
  type PartialServerConfig,
  type StoreBackend,
  type LogLevel,
  DEFAULT_CONFIG,
} from './types.js';

export const DEFAULT_CONFIG_FILE = 'profile-sync.json';

const STORE_BACKENDS: readonly StoreBackend[] = ['memory', 'mongodb'];
const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

function isStoreBackend(value: string): value is StoreBackend {
  return STORE_BACKENDS.some(backend => backend === value);
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

export function parseStoreBackend(value: string): StoreBackend {
  if (!isStoreBackend(value)) {
    throw new Error(`Unknown store backend "${value}" (expected ${STORE_BACKENDS.join(' or ')})`);
  }
  return value;
}

export function parseLogLevel(value: string): LogLevel {
  if (!isLogLevel(value)) {
    throw new Error(`Unknown log level "${value}" (expected one of ${LOG_LEVELS.join(', ')})`);
  }
  return value;
}

function parseInteger(name: string, value: string): number {
  const parsed = Number(value);
  if (!Number.isSafeInteger(parsed)) {
    throw new Error(`${name} must be an integer, got "${value}"`);
  }
  return parsed;
}

/**
 * Parse a CORS origin list: "true", "false" or comma-separated origins.
 */
export function parseCorsOrigin(value: string): boolean | string[] {
  if (value === 'true') return true;
  if (value === 'false') return false;
  return value.split(',').map(o => o.trim()).filter(o => o.length > 0);
}

/**
 * Load configuration from a JSON file.
 */
export function loadConfigFile(configPath: string): PartialServerConfig {
  const resolved = resolve(configPath);
  if (!existsSync(resolved)) {
    configLog('Config file not found: %s', resolved);
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(resolved, 'utf-8'));
  } catch (err) {
    configLog('Failed to parse config file %s: %O', resolved, err);
    throw new Error(`Failed to parse config file: ${resolved}`);
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new Error(`Config file must contain a JSON object: ${resolved}`);
  }
  configLog('Loaded config from %s', resolved);
  // Field values are checked by validateConfig once all sources are merged
  return parsed as PartialServerConfig;
}

/**
 * Load configuration from environment variables.
 *
 * `MONGO_HOST` is accepted as an alias of `SYNC_MONGO_URL` for existing
 * deployments.
 */
export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): PartialServerConfig {
  const config: PartialServerConfig = {};

  if (env.SYNC_HOST) config.host = env.SYNC_HOST;
  if (env.SYNC_PORT) config.port = parseInteger('SYNC_PORT', env.SYNC_PORT);
  if (env.SYNC_BASE_PATH) config.basePath = env.SYNC_BASE_PATH;

  // CORS
  if (env.SYNC_CORS_ORIGIN) {
    config.cors = { origin: parseCorsOrigin(env.SYNC_CORS_ORIGIN) };
  }
  if (env.SYNC_CORS_CREDENTIALS) {
    config.cors = { ...config.cors, credentials: env.SYNC_CORS_CREDENTIALS === 'true' };
  }

  // Auth
  const auth: NonNullable<PartialServerConfig['auth']> = {};
  if (env.SYNC_TOKEN_SECRET) auth.tokenSecret = env.SYNC_TOKEN_SECRET;
  if (env.SYNC_TOKEN_TTL) auth.tokenTtlSeconds = parseInteger('SYNC_TOKEN_TTL', env.SYNC_TOKEN_TTL);
  if (env.SYNC_SESSION_SERVER_URL) auth.sessionServerUrl = env.SYNC_SESSION_SERVER_URL;
  if (env.SYNC_SESSION_SERVER_TIMEOUT) {
    auth.sessionServerTimeoutMs = parseInteger('SYNC_SESSION_SERVER_TIMEOUT', env.SYNC_SESSION_SERVER_TIMEOUT);
  }
  if (Object.keys(auth).length > 0) config.auth = auth;

  // Store
  const store: NonNullable<PartialServerConfig['store']> = {};
  if (env.SYNC_STORE) store.backend = parseStoreBackend(env.SYNC_STORE);
  const mongoUrl = env.SYNC_MONGO_URL || env.MONGO_HOST;
  if (mongoUrl) store.mongoUrl = mongoUrl;
  if (env.SYNC_MONGO_DATABASE) store.database = env.SYNC_MONGO_DATABASE;
  if (env.SYNC_MONGO_COLLECTION) store.collection = env.SYNC_MONGO_COLLECTION;
  if (env.SYNC_STORE_TIMEOUT) store.timeoutMs = parseInteger('SYNC_STORE_TIMEOUT', env.SYNC_STORE_TIMEOUT);
  if (Object.keys(store).length > 0) config.store = store;

  // Sync settings
  if (env.SYNC_MAX_PAYLOAD_BYTES) {
    config.sync = { maxPayloadBytes: parseInteger('SYNC_MAX_PAYLOAD_BYTES', env.SYNC_MAX_PAYLOAD_BYTES) };
  }
  if (env.SYNC_MAX_COMMIT_ATTEMPTS) {
    config.sync = {
      ...config.sync,
      maxCommitAttempts: parseInteger('SYNC_MAX_COMMIT_ATTEMPTS', env.SYNC_MAX_COMMIT_ATTEMPTS),
    };
  }

  // Logging
  if (env.SYNC_LOG_LEVEL) {
    config.logging = { level: parseLogLevel(env.SYNC_LOG_LEVEL) };
  }

  return config;
}

/**
 * Deep merge configuration objects.
 */
export function mergeConfig(base: ServerConfig, ...overrides: PartialServerConfig[]): ServerConfig {
  const result = { ...base };

  for (const override of overrides) {
    if (override.host !== undefined) result.host = override.host;
    if (override.port !== undefined) result.port = override.port;
    if (override.basePath !== undefined) result.basePath = override.basePath;

    if (override.cors) result.cors = { ...result.cors, ...override.cors };
    if (override.auth) result.auth = { ...result.auth, ...override.auth };
    if (override.store) result.store = { ...result.store, ...override.store };
    if (override.sync) result.sync = { ...result.sync, ...override.sync };
    if (override.bulkQuery) result.bulkQuery = { ...result.bulkQuery, ...override.bulkQuery };
    if (override.logging) result.logging = { ...result.logging, ...override.logging };
  }

  return result;
}

function requirePositiveInteger(name: string, value: number): void {
  if (!Number.isSafeInteger(value) || value < 1) {
    throw new Error(`${name} must be a positive integer, got ${value}`);
  }
}

/**
 * Check a merged configuration. Throws on the first invalid setting.
 */
export function validateConfig(config: ServerConfig): ServerConfig {
  if (!Number.isSafeInteger(config.port) || config.port < 0 || config.port > 65535) {
    throw new Error(`port must be between 0 and 65535, got ${config.port}`);
  }
  if (!config.basePath.startsWith('/') || (config.basePath.length > 1 && config.basePath.endsWith('/'))) {
    throw new Error(`basePath must start with "/" and not end with one, got "${config.basePath}"`);
  }
  parseStoreBackend(config.store.backend);
  parseLogLevel(config.logging.level);

  requirePositiveInteger('auth.tokenTtlSeconds', config.auth.tokenTtlSeconds);
  requirePositiveInteger('auth.sessionServerTimeoutMs', config.auth.sessionServerTimeoutMs);
  requirePositiveInteger('store.timeoutMs', config.store.timeoutMs);
  requirePositiveInteger('sync.maxPayloadBytes', config.sync.maxPayloadBytes);
  requirePositiveInteger('sync.maxCommitAttempts', config.sync.maxCommitAttempts);
  requirePositiveInteger('bulkQuery.minIds', config.bulkQuery.minIds);
  requirePositiveInteger('bulkQuery.maxIds', config.bulkQuery.maxIds);
  if (config.bulkQuery.minIds > config.bulkQuery.maxIds) {
    throw new Error(
      `bulkQuery.minIds (${config.bulkQuery.minIds}) exceeds bulkQuery.maxIds (${config.bulkQuery.maxIds})`
    );
  }

  return config;
}

/**
 * Load full configuration from all sources.
 */
export function loadConfig(options: {
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: PartialServerConfig;
} = {}): ServerConfig {
  const sources: PartialServerConfig[] = [];

  const configPath = options.configPath || DEFAULT_CONFIG_FILE;
  if (options.configPath || existsSync(configPath)) {
    sources.push(loadConfigFile(configPath));
  }

  sources.push(loadEnvConfig(options.env));

  if (options.overrides) {
    sources.push(options.overrides);
  }

  const config = validateConfig(mergeConfig(DEFAULT_CONFIG, ...sources));
  configLog('Final config: %O', { ...config, auth: { ...config.auth, tokenSecret: '<redacted>' } });

  return config;
}
