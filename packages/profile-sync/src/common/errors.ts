/**
 * Error taxonomy for profile synchronization.
 *
 * Every failure the engine knows how to handle carries a stable `code` and a
 * `retryable` flag so callers can decide between "retry with backoff",
 * "re-fetch then retry" and "give up".
 */

import type { ProfileSnapshot } from '../model/types.js';

export type ProfileSyncErrorCode =
  | 'UNAUTHORIZED'
  | 'VERSION_CONFLICT'
  | 'INVALID_VERSION'
  | 'STORE_UNAVAILABLE'
  | 'PAYLOAD_TOO_LARGE'
  | 'INVALID_REQUEST';

/**
 * Base class for profile-sync errors.
 */
export class ProfileSyncError extends Error {
  public readonly code: ProfileSyncErrorCode;
  public readonly retryable: boolean;
  public override readonly cause?: Error;

  constructor(message: string, code: ProfileSyncErrorCode, retryable = false, cause?: Error) {
    super(message);
    this.name = 'ProfileSyncError';
    this.code = code;
    this.retryable = retryable;
    this.cause = cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ProfileSyncError);
    }
  }
}

/**
 * Credential missing, malformed, expired, or bound to another player.
 * The client must re-authenticate rather than retry.
 */
export class UnauthorizedError extends ProfileSyncError {
  constructor(message = 'Authentication is invalid or has expired') {
    super(message, 'UNAUTHORIZED');
    this.name = 'UnauthorizedError';
    Object.setPrototypeOf(this, UnauthorizedError.prototype);
  }
}

/**
 * The stored version differed from the expected version at write time.
 */
export class VersionConflictError extends ProfileSyncError {
  public readonly playerId: string;
  public readonly expectedVersion: number;
  public readonly currentVersion: number;

  constructor(playerId: string, expectedVersion: number, currentVersion: number) {
    super(
      `Version conflict for ${playerId}: expected ${expectedVersion}, store is at ${currentVersion}`,
      'VERSION_CONFLICT'
    );
    this.name = 'VersionConflictError';
    this.playerId = playerId;
    this.expectedVersion = expectedVersion;
    this.currentVersion = currentVersion;
    Object.setPrototypeOf(this, VersionConflictError.prototype);
  }
}

/**
 * The client claimed a base version the store has never had, or one that is
 * not a version at all. `current` is the stored state the claim was checked against.
 */
export class InvalidVersionError extends ProfileSyncError {
  public readonly claimedVersion: number;
  public readonly current?: ProfileSnapshot;

  constructor(claimedVersion: number, message = `Invalid base version: ${claimedVersion}`, current?: ProfileSnapshot) {
    super(message, 'INVALID_VERSION');
    this.name = 'InvalidVersionError';
    this.claimedVersion = claimedVersion;
    this.current = current;
    Object.setPrototypeOf(this, InvalidVersionError.prototype);
  }
}

/**
 * Transient store failure (network, server selection, timeout).
 */
export class StoreUnavailableError extends ProfileSyncError {
  constructor(message: string, cause?: Error) {
    super(message, 'STORE_UNAVAILABLE', true, cause);
    this.name = 'StoreUnavailableError';
    Object.setPrototypeOf(this, StoreUnavailableError.prototype);
  }
}

/**
 * `current` is absent when the store could not be read.
 */
export class PayloadTooLargeError extends ProfileSyncError {
  public readonly size: number;
  public readonly limit: number;
  public readonly current?: ProfileSnapshot;

  constructor(size: number, limit: number, current?: ProfileSnapshot) {
    super(`Payload of ${size} bytes exceeds the limit of ${limit} bytes`, 'PAYLOAD_TOO_LARGE');
    this.name = 'PayloadTooLargeError';
    this.size = size;
    this.limit = limit;
    this.current = current;
    Object.setPrototypeOf(this, PayloadTooLargeError.prototype);
  }
}

/**
 * Malformed input at the engine boundary (bad player ID, non-integer version).
 */
export class InvalidRequestError extends ProfileSyncError {
  constructor(message: string) {
    super(message, 'INVALID_REQUEST');
    this.name = 'InvalidRequestError';
    Object.setPrototypeOf(this, InvalidRequestError.prototype);
  }
}

/**
 * Normalize an unknown thrown value to an Error.
 */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
