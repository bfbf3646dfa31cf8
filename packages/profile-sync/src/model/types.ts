/**
 * Profile and request/result types shared by the engine components.
 */

// ============================================================================
// Stored State
// ============================================================================

/**
 * The stored mod configuration for one player.
 * The payload is opaque to this engine and never interpreted.
 */
export interface PlayerProfile {
  playerId: string;
  payload: Uint8Array;
  /** Starts at 0 (never synced) and increases by exactly 1 per accepted write */
  version: number;
  lastModified: Date;
  /** Device that made the last accepted write; diagnostics only */
  ownerDeviceHint?: string;
}

/**
 * Point-in-time view of a profile as returned by the store.
 */
export interface ProfileSnapshot {
  version: number;
  payload: Uint8Array;
  /** Absent for a never-synced player */
  lastModified?: Date;
  ownerDeviceHint?: string;
}

/**
 * Snapshot for a player the store has never seen.
 */
export function emptySnapshot(): ProfileSnapshot {
  return { version: 0, payload: new Uint8Array(0) };
}

// ============================================================================
// Per-request Types
// ============================================================================

/**
 * One client push. Constructed per call, discarded after the response.
 */
export interface SyncRequest {
  playerId: string;
  token: string | undefined;
  /** Version the client last observed before editing locally */
  baseVersion: number;
  payload: Uint8Array;
  deviceHint?: string;
}

export type SyncOutcome =
  | 'accepted'
  | 'conflict'
  | 'unauthorized'
  | 'invalid'
  | 'payload_too_large'
  | 'unavailable';

/**
 * Result of a push.
 *
 * `snapshot` is the authoritative stored state whenever the engine could read
 * it: the committed state on `accepted`, the state that beat the client on
 * `conflict`. It is never populated for `unauthorized`.
 */
export type SyncResult =
  | { outcome: 'accepted'; snapshot: ProfileSnapshot; attempts: number }
  | { outcome: 'conflict'; snapshot: ProfileSnapshot; attempts: number; reason: string }
  | { outcome: 'invalid'; snapshot?: ProfileSnapshot; reason: string }
  | { outcome: 'payload_too_large'; snapshot?: ProfileSnapshot; reason: string }
  | { outcome: 'unauthorized'; reason: string }
  | { outcome: 'unavailable'; reason: string };

export type FetchResult =
  | { outcome: 'ok'; snapshot: ProfileSnapshot }
  | { outcome: 'unauthorized'; reason: string }
  | { outcome: 'unavailable'; reason: string };
