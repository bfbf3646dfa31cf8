/**
 * Abstract versioned profile store.
 * Implemented by InMemoryVersionStore (single process) and MongoVersionStore.
 */

import type { ProfileSnapshot } from '../model/types.js';

/**
 * Options for a conditional write.
 */
export interface WriteOptions {
  /** Device that produced the payload; stored for diagnostics */
  deviceHint?: string;
}

/**
 * A successful conditional write. Mismatches are thrown as
 * VersionConflictError, so an accepted result is the only return shape.
 */
export interface WriteResult {
  accepted: true;
  newVersion: number;
  lastModified: Date;
}

/**
 * One versioned blob per player, with compare-and-swap writes.
 *
 * The store's compare-and-swap is the only serialization point for a player;
 * callers hold no locks of their own.
 */
export interface VersionStore {
  /**
   * Read the current snapshot.
   * @returns A zero-version empty snapshot if the player has never synced.
   */
  read(playerId: string): Promise<ProfileSnapshot>;

  /**
   * Atomically store `payload` if the current version equals `expectedVersion`,
   * incrementing the version by exactly 1.
   * @throws VersionConflictError with the store's actual version on mismatch.
   * @throws StoreUnavailableError on transient I/O failure.
   */
  conditionalWrite(
    playerId: string,
    expectedVersion: number,
    payload: Uint8Array,
    options?: WriteOptions
  ): Promise<WriteResult>;

  /**
   * Read several players at once. Players with no stored profile are omitted.
   */
  readMany(playerIds: readonly string[]): Promise<Map<string, ProfileSnapshot>>;

  /**
   * Number of players with a stored profile.
   */
  count(): Promise<number>;

  /**
   * Close the store and release resources.
   */
  close(): Promise<void>;
}
