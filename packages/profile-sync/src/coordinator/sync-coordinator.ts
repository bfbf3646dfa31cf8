/**
 * SyncCoordinator - orchestrates one profile push from authentication to commit.
 *
 * Per request:
 *   authenticating -> (unauthorized)
 *   authenticating -> reading -> deciding -> (rejected | invalid)
 *   ... deciding -> committing -> (accepted)
 *   ... committing -> reading (bounded retry on a read/write race) -> deciding -> ...
 *
 * Nothing is cached between requests and no locks are taken; the store's
 * compare-and-swap decides which of several concurrent writers wins.
 */

import {
  InvalidRequestError,
  InvalidVersionError,
  PayloadTooLargeError,
  StoreUnavailableError,
  UnauthorizedError,
  VersionConflictError,
} from '../common/errors.js';
import { coordinatorLog } from '../common/logger.js';
import { withStoreTimeout } from '../common/timeout.js';
import type { TokenAuthenticator } from '../auth/token-authenticator.js';
import type { ProfileSnapshot, SyncRequest, SyncResult, FetchResult } from '../model/types.js';
import { ConflictResolver } from '../resolver/conflict-resolver.js';
import type { VersionStore } from '../store/version-store.js';

export type SyncState =
  | 'authenticating'
  | 'reading'
  | 'deciding'
  | 'committing'
  | 'accepted'
  | 'rejected'
  | 'invalid'
  | 'unauthorized'
  | 'too_large'
  | 'unavailable';

/**
 * Observation hooks. All optional; none can alter the outcome.
 */
export interface SyncCoordinatorHooks {
  /** Called on every state machine transition */
  onTransition?(playerId: string, state: SyncState): void;
  /** Called when a compare-and-swap loses a race and the sequence is retried */
  onCommitRetry?(playerId: string, attempt: number, conflict: VersionConflictError): void;
}

export interface SyncCoordinatorOptions {
  store: VersionStore;
  authenticator: TokenAuthenticator;
  resolver?: ConflictResolver;
  /** Read-decide-commit attempts before a race surfaces as a conflict. @default 3 */
  maxCommitAttempts?: number;
  /** Per-call timeout for store reads and writes. @default 5000 */
  storeTimeoutMs?: number;
  /** @default 65536 */
  maxPayloadBytes?: number;
  hooks?: SyncCoordinatorHooks;
}

export const DEFAULT_MAX_COMMIT_ATTEMPTS = 3;
export const DEFAULT_STORE_TIMEOUT_MS = 5000;
export const DEFAULT_MAX_PAYLOAD_BYTES = 64 * 1024;

export class SyncCoordinator {
  private readonly store: VersionStore;
  private readonly authenticator: TokenAuthenticator;
  private readonly resolver: ConflictResolver;
  private readonly maxCommitAttempts: number;
  private readonly storeTimeoutMs: number;
  private readonly maxPayloadBytes: number;
  private readonly hooks: SyncCoordinatorHooks;

  constructor(options: SyncCoordinatorOptions) {
    this.store = options.store;
    this.authenticator = options.authenticator;
    this.resolver = options.resolver ?? new ConflictResolver();
    this.maxCommitAttempts = Math.max(1, options.maxCommitAttempts ?? DEFAULT_MAX_COMMIT_ATTEMPTS);
    this.storeTimeoutMs = options.storeTimeoutMs ?? DEFAULT_STORE_TIMEOUT_MS;
    this.maxPayloadBytes = options.maxPayloadBytes ?? DEFAULT_MAX_PAYLOAD_BYTES;
    this.hooks = options.hooks ?? {};
  }

  /**
   * Push a new payload for a player.
   */
  async sync(request: SyncRequest): Promise<SyncResult> {
    const { playerId } = request;
    coordinatorLog('sync %s from base %d (%d bytes)', playerId, request.baseVersion, request.payload.byteLength);

    this.transition(playerId, 'authenticating');
    try {
      await this.requireAuthenticated(playerId, request.token);

      const size = request.payload.byteLength;
      if (size > this.maxPayloadBytes) {
        throw new PayloadTooLargeError(size, this.maxPayloadBytes, await this.readIfAvailable(playerId));
      }
      return await this.commitLoop(request);
    } catch (err) {
      return this.resultForError(playerId, err);
    }
  }

  /**
   * Authenticated read of the current profile.
   */
  async fetch(playerId: string, token: string | undefined): Promise<FetchResult> {
    try {
      await this.requireAuthenticated(playerId, token);
      return { outcome: 'ok', snapshot: await this.read(playerId) };
    } catch (err) {
      if (err instanceof UnauthorizedError) {
        return { outcome: 'unauthorized', reason: err.message };
      }
      if (err instanceof StoreUnavailableError) {
        return { outcome: 'unavailable', reason: err.message };
      }
      throw err;
    }
  }

  private async commitLoop(request: SyncRequest): Promise<SyncResult> {
    const { playerId } = request;
    let lastConflict: VersionConflictError | undefined;

    for (let attempt = 1; attempt <= this.maxCommitAttempts; attempt++) {
      this.transition(playerId, 'reading');
      const current = await this.read(playerId);

      this.transition(playerId, 'deciding');
      const decision = this.resolver.decide(
        request.baseVersion,
        current.version,
        request.payload,
        current.payload
      );

      if (decision.kind === 'reject') {
        this.transition(playerId, 'rejected');
        return { outcome: 'conflict', snapshot: current, attempts: attempt, reason: decision.reason };
      }
      if (decision.kind === 'invalid') {
        throw new InvalidVersionError(request.baseVersion, decision.reason, current);
      }

      this.transition(playerId, 'committing');
      try {
        const written = await withStoreTimeout(
          this.store.conditionalWrite(playerId, current.version, decision.payload, { deviceHint: request.deviceHint }),
          this.storeTimeoutMs,
          `conditionalWrite ${playerId}`
        );

        this.transition(playerId, 'accepted');
        const snapshot: ProfileSnapshot = {
          version: written.newVersion,
          payload: decision.payload,
          lastModified: written.lastModified,
        };
        if (request.deviceHint !== undefined) {
          snapshot.ownerDeviceHint = request.deviceHint;
        }
        return { outcome: 'accepted', snapshot, attempts: attempt };
      } catch (err) {
        if (!(err instanceof VersionConflictError)) throw err;
        lastConflict = err;
        coordinatorLog('Lost commit race for %s on attempt %d: %s', playerId, attempt, err.message);
        this.hooks.onCommitRetry?.(playerId, attempt, err);
      }
    }

    // Every attempt lost a race; report the freshest state we can see.
    this.transition(playerId, 'reading');
    const latest = await this.read(playerId);
    this.transition(playerId, 'rejected');
    return {
      outcome: 'conflict',
      snapshot: latest,
      attempts: this.maxCommitAttempts,
      reason: lastConflict?.message ?? 'Concurrent update',
    };
  }

  private async requireAuthenticated(playerId: string, token: string | undefined): Promise<void> {
    const auth = await this.authenticator.authenticate(playerId, token);
    if (!auth.ok) {
      throw new UnauthorizedError(auth.reason);
    }
  }

  /**
   * Map an engine error to its result. Version conflicts never get here: the
   * commit loop turns them into retries or a `conflict` result.
   */
  private resultForError(playerId: string, err: unknown): SyncResult {
    if (err instanceof UnauthorizedError) {
      this.transition(playerId, 'unauthorized');
      return { outcome: 'unauthorized', reason: err.message };
    }

    coordinatorLog('sync %s failed: %s', playerId, err instanceof Error ? err.message : String(err));
    if (err instanceof PayloadTooLargeError) {
      this.transition(playerId, 'too_large');
      return err.current
        ? { outcome: 'payload_too_large', snapshot: err.current, reason: err.message }
        : { outcome: 'payload_too_large', reason: err.message };
    }
    if (err instanceof InvalidVersionError) {
      this.transition(playerId, 'invalid');
      return err.current
        ? { outcome: 'invalid', snapshot: err.current, reason: err.message }
        : { outcome: 'invalid', reason: err.message };
    }
    if (err instanceof InvalidRequestError) {
      this.transition(playerId, 'invalid');
      return { outcome: 'invalid', reason: err.message };
    }
    if (err instanceof StoreUnavailableError) {
      this.transition(playerId, 'unavailable');
      return { outcome: 'unavailable', reason: err.message };
    }
    throw err;
  }

  /** Current state for a rejection, or undefined while the store is down. */
  private async readIfAvailable(playerId: string): Promise<ProfileSnapshot | undefined> {
    try {
      return await this.read(playerId);
    } catch (err) {
      if (err instanceof StoreUnavailableError) {
        coordinatorLog('No snapshot for rejected push of %s: %s', playerId, err.message);
        return undefined;
      }
      throw err;
    }
  }

  private read(playerId: string): Promise<ProfileSnapshot> {
    return withStoreTimeout(this.store.read(playerId), this.storeTimeoutMs, `read ${playerId}`);
  }

  private transition(playerId: string, state: SyncState): void {
    coordinatorLog('%s -> %s', playerId, state);
    this.hooks.onTransition?.(playerId, state);
  }
}
