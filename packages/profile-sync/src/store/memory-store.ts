/**
 * In-memory VersionStore implementation.
 *
 * Useful for:
 * - Testing without a database
 * - Single-instance development servers
 *
 * The compare-and-swap runs without yielding to the event loop, so it is
 * atomic with respect to every other caller in the process.
 */

import { VersionConflictError } from '../common/errors.js';
import { storeLog } from '../common/logger.js';
import { emptySnapshot, type PlayerProfile, type ProfileSnapshot } from '../model/types.js';
import type { VersionStore, WriteOptions, WriteResult } from './version-store.js';

export interface InMemoryVersionStoreOptions {
  /** Clock override for tests */
  now?: () => Date;
}

function toSnapshot(profile: PlayerProfile): ProfileSnapshot {
  const snapshot: ProfileSnapshot = {
    version: profile.version,
    payload: new Uint8Array(profile.payload),
    lastModified: new Date(profile.lastModified),
  };
  if (profile.ownerDeviceHint !== undefined) {
    snapshot.ownerDeviceHint = profile.ownerDeviceHint;
  }
  return snapshot;
}

export class InMemoryVersionStore implements VersionStore {
  private profiles = new Map<string, PlayerProfile>();
  private closed = false;
  private readonly now: () => Date;

  constructor(options: InMemoryVersionStoreOptions = {}) {
    this.now = options.now ?? (() => new Date());
  }

  async read(playerId: string): Promise<ProfileSnapshot> {
    this.checkOpen();
    const profile = this.profiles.get(playerId);
    return profile ? toSnapshot(profile) : emptySnapshot();
  }

  async conditionalWrite(
    playerId: string,
    expectedVersion: number,
    payload: Uint8Array,
    options: WriteOptions = {}
  ): Promise<WriteResult> {
    this.checkOpen();
    const currentVersion = this.profiles.get(playerId)?.version ?? 0;
    if (currentVersion !== expectedVersion) {
      storeLog('CAS miss for %s: expected %d, at %d', playerId, expectedVersion, currentVersion);
      throw new VersionConflictError(playerId, expectedVersion, currentVersion);
    }

    const lastModified = this.now();
    // Store a copy to prevent external mutation
    this.profiles.set(playerId, {
      playerId,
      payload: new Uint8Array(payload),
      version: currentVersion + 1,
      lastModified,
      ownerDeviceHint: options.deviceHint,
    });
    storeLog('Stored %s at version %d', playerId, currentVersion + 1);

    return { accepted: true, newVersion: currentVersion + 1, lastModified: new Date(lastModified) };
  }

  async readMany(playerIds: readonly string[]): Promise<Map<string, ProfileSnapshot>> {
    this.checkOpen();
    const result = new Map<string, ProfileSnapshot>();
    for (const playerId of playerIds) {
      const profile = this.profiles.get(playerId);
      if (profile) {
        result.set(playerId, toSnapshot(profile));
      }
    }
    return result;
  }

  async count(): Promise<number> {
    this.checkOpen();
    return this.profiles.size;
  }

  async close(): Promise<void> {
    this.closed = true;
    this.profiles.clear();
  }

  private checkOpen(): void {
    if (this.closed) {
      throw new Error('InMemoryVersionStore is closed');
    }
  }
}
