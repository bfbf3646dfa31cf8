/**
 * ProfileSyncService - wires the sync engine to configuration, session-server
 * verification and metrics.
 */

import { randomBytes } from 'node:crypto';
import {
  InvalidRequestError,
  SignedTokenAuthenticator,
  SyncCoordinator,
  withStoreTimeout,
  type FetchResult,
  type IssuedToken,
  type ProfileSnapshot,
  type VersionStore,
} from '@profile-sync/core';
import { serviceLog } from '../common/logger.js';
import type { ServerConfig } from '../config/types.js';
import { createSyncMetrics, type SyncMetrics } from '../metrics/index.js';
import {
  InvalidAuthenticationError,
  SessionAuthError,
  SessionServerVerifier,
  canonicalPlayerId,
  type SessionVerifier,
} from '../auth/session-verifier.js';
import { openVersionStore } from './store-factory.js';
import type {
  BulkQueryResult,
  PushCredentials,
  PushInput,
  PushResponse,
  ServiceStatus,
  SyncStats,
} from './types.js';

export interface ProfileSyncServiceOptions {
  config: ServerConfig;
  /** Store to use instead of opening the configured backend; not closed on shutdown */
  store?: VersionStore;
  sessionVerifier?: SessionVerifier;
  /** Custom metrics (a fresh registry is used if not provided) */
  metrics?: SyncMetrics;
  /** Clock override for tests */
  now?: () => Date;
}

interface ServiceState {
  store: VersionStore;
  ownsStore: boolean;
  coordinator: SyncCoordinator;
}

export class ProfileSyncService {
  private readonly config: ServerConfig;
  private readonly metrics: SyncMetrics;
  private readonly verifier: SessionVerifier;
  private readonly authenticator: SignedTokenAuthenticator;
  private readonly injectedStore?: VersionStore;
  private readonly now: () => Date;
  private state?: ServiceState;

  constructor(options: ProfileSyncServiceOptions) {
    this.config = options.config;
    this.metrics = options.metrics ?? createSyncMetrics();
    this.injectedStore = options.store;
    this.now = options.now ?? (() => new Date());
    this.verifier = options.sessionVerifier ?? new SessionServerVerifier({
      url: this.config.auth.sessionServerUrl,
      timeoutMs: this.config.auth.sessionServerTimeoutMs,
    });

    let secret = this.config.auth.tokenSecret;
    if (!secret) {
      serviceLog('No token secret configured; tokens will not survive a restart or be shared across instances');
      secret = randomBytes(32).toString('base64url');
    }
    this.authenticator = new SignedTokenAuthenticator({
      secret,
      ttlSeconds: this.config.auth.tokenTtlSeconds,
      now: this.now,
    });
  }

  /**
   * Open the store and create the coordinator.
   */
  async initialize(): Promise<void> {
    if (this.state) return;

    serviceLog('Initializing ProfileSyncService with %s store', this.config.store.backend);
    const store = this.injectedStore ?? await openVersionStore(this.config.store);

    const coordinator = new SyncCoordinator({
      store,
      authenticator: this.authenticator,
      maxCommitAttempts: this.config.sync.maxCommitAttempts,
      maxPayloadBytes: this.config.sync.maxPayloadBytes,
      storeTimeoutMs: this.config.store.timeoutMs,
      hooks: {
        onCommitRetry: (playerId, attempt) => {
          serviceLog('Retrying commit for %s after attempt %d', playerId, attempt);
          this.metrics.registry.incCounter(this.metrics.commitRetriesTotal);
        },
      },
    });

    this.state = { store, ownsStore: !this.injectedStore, coordinator };
  }

  async shutdown(): Promise<void> {
    if (!this.state) return;

    serviceLog('Shutting down ProfileSyncService');
    const { store, ownsStore } = this.state;
    this.state = undefined;
    if (ownsStore) {
      await store.close();
    }
  }

  // ============================================================================
  // Authentication
  // ============================================================================

  /**
   * Verify a session-server join and issue a sync token for the player.
   */
  async authenticateSession(username: string, serverId: string): Promise<IssuedToken> {
    this.metrics.registry.incCounter(this.metrics.authAttemptsTotal);

    let playerId: string;
    try {
      playerId = await this.verifier.verify(username, serverId);
    } catch (err) {
      const reason = err instanceof InvalidAuthenticationError ? 'invalid' : 'unavailable';
      this.metrics.registry.incCounter(this.metrics.authFailuresTotal, { reason });
      throw err;
    }

    const issued = this.authenticator.issue(playerId);
    this.metrics.registry.incCounter(this.metrics.tokensIssuedTotal);
    return issued;
  }

  private async resolveToken(
    playerId: string,
    credentials: PushCredentials
  ): Promise<{ token: string | undefined; issued?: IssuedToken; presented?: IssuedToken }> {
    const { token } = credentials;
    if (token) {
      const auth = await this.authenticator.authenticate(playerId, token);
      return auth.ok ? { token, presented: { token, playerId: auth.playerId, expiresAt: auth.expiresAt } } : { token };
    }
    if (!credentials.username || !credentials.serverId) {
      return { token: undefined };
    }

    const issued = await this.authenticateSession(credentials.username, credentials.serverId);
    if (issued.playerId !== playerId) {
      this.metrics.registry.incCounter(this.metrics.authFailuresTotal, { reason: 'mismatch' });
      throw new InvalidAuthenticationError('The provided authentication is not valid for the requested player');
    }
    return { token: issued.token, issued };
  }

  // ============================================================================
  // Sync Operations
  // ============================================================================

  /**
   * Push a profile. Session-server failures throw a SessionAuthError; every
   * engine outcome is returned in the result.
   */
  async push(input: PushInput): Promise<PushResponse> {
    const { coordinator } = this.requireState();
    const endTimer = this.metrics.registry.startTimer(this.metrics.pushDuration);

    try {
      const { token, issued, presented } = await this.resolveToken(input.playerId, input.credentials);
      this.metrics.registry.observeHistogram(this.metrics.pushPayloadBytes, input.payload.byteLength);

      const result = await coordinator.sync({
        playerId: input.playerId,
        token,
        baseVersion: input.baseVersion,
        payload: input.payload,
        deviceHint: input.deviceHint,
      });

      this.metrics.registry.incCounter(this.metrics.pushOutcomesTotal, { outcome: result.outcome });
      serviceLog('Push for %s: %s', input.playerId, result.outcome);
      return { result, issued, presented };
    } catch (err) {
      const outcome = err instanceof SessionAuthError ? 'session_error' : 'error';
      this.metrics.registry.incCounter(this.metrics.pushOutcomesTotal, { outcome });
      throw err;
    } finally {
      endTimer();
    }
  }

  /**
   * Account for a push whose body was refused before parsing and return the
   * current snapshot when the request's token is valid for the player.
   */
  async rejectOversizedPush(playerId: string, token: string | undefined): Promise<ProfileSnapshot | undefined> {
    const { coordinator } = this.requireState();
    this.metrics.registry.incCounter(this.metrics.pushOutcomesTotal, { outcome: 'payload_too_large' });
    const result = await coordinator.fetch(playerId, token);
    serviceLog('Oversized push for %s, snapshot %s', playerId, result.outcome);
    return result.outcome === 'ok' ? result.snapshot : undefined;
  }

  async fetch(playerId: string, token: string | undefined): Promise<FetchResult> {
    const { coordinator } = this.requireState();
    const result = await coordinator.fetch(playerId, token);
    this.metrics.registry.incCounter(this.metrics.fetchOutcomesTotal, { outcome: result.outcome });
    return result;
  }

  /**
   * Read several players' profiles at once, without authentication.
   * Only players that have synced appear in the result.
   */
  async bulkQuery(playerIds: readonly string[]): Promise<BulkQueryResult> {
    const { store } = this.requireState();
    const unique = [...new Set(playerIds.map(canonicalPlayerId))];
    const { minIds, maxIds } = this.config.bulkQuery;

    if (unique.length < minIds || unique.length > maxIds) {
      throw new InvalidRequestError(`This route requires between ${minIds}-${maxIds} unique player IDs`);
    }

    this.metrics.registry.incCounter(this.metrics.bulkQueriesTotal);
    return withStoreTimeout(store.readMany(unique), this.config.store.timeoutMs, 'bulk query');
  }

  async getStats(): Promise<SyncStats> {
    const { store } = this.requireState();
    const syncedUsers = await withStoreTimeout(store.count(), this.config.store.timeoutMs, 'count');
    return { syncedUsers, timestamp: this.now() };
  }

  getStatus(): ServiceStatus {
    return {
      storeBackend: this.injectedStore ? 'custom' : this.config.store.backend,
      uptime: process.uptime(),
    };
  }

  getMetrics(): SyncMetrics {
    return this.metrics;
  }

  private requireState(): ServiceState {
    if (!this.state) {
      throw new Error('ProfileSyncService is not initialized');
    }
    return this.state;
  }
}
