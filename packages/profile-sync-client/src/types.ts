/**
 * Types for the profile sync HTTP client.
 */

// ============================================================================
// Profiles & Outcomes
// ============================================================================

/**
 * Authoritative server copy of a profile.
 */
export interface RemoteProfile {
  version: number;
  payload: Uint8Array;
}

/**
 * A locally edited profile and the server version it was based on.
 */
export interface LocalProfile {
  baseVersion: number;
  payload: Uint8Array;
}

/**
 * Result of one push, keyed by what the server decided.
 */
export type PushOutcome =
  | { status: 'accepted'; profile: RemoteProfile }
  | { status: 'conflict'; profile: RemoteProfile; message: string }
  | { status: 'invalid'; profile?: RemoteProfile; message: string }
  | { status: 'too_large'; profile?: RemoteProfile; message: string }
  | { status: 'unauthorized'; message: string }
  | { status: 'forbidden'; message: string }
  | { status: 'unavailable'; message: string };

/**
 * Re-apply a local edit on top of the newer server copy.
 */
export type RebaseFunction = (remote: RemoteProfile, local: Uint8Array) => Uint8Array | Promise<Uint8Array>;

export interface SessionToken {
  token: string;
  playerId: string;
  expiresAt: Date;
}

// ============================================================================
// Events
// ============================================================================

export type SyncEventType = 'conflict' | 'retry' | 'accepted' | 'gave-up';

/**
 * Progress notification emitted by `sync` (for logging/UI display).
 */
export interface SyncEvent {
  type: SyncEventType;
  playerId: string;
  attempt: number;
  message: string;
}

// ============================================================================
// Client Options
// ============================================================================

export type FetchFunction = (input: string | URL, init?: RequestInit) => Promise<Response>;

export interface ProfileSyncClientOptions {
  /** Server URL including the base path, e.g. `https://sync.example.com/sync` */
  baseUrl: string;

  /** Sync token; replaced by `authenticate` */
  token?: string;

  /** Sent with every push for diagnostics */
  deviceHint?: string;

  /**
   * Push attempts per `sync` call, counting conflicts and outages.
   * @default 5
   */
  maxAttempts?: number;

  /**
   * Initial delay before retrying after a 503 (milliseconds).
   * @default 500
   */
  retryDelayMs?: number;

  /**
   * Maximum delay between retries (milliseconds).
   * @default 8000
   */
  maxRetryDelayMs?: number;

  /** Callback when a sync event occurs */
  onSyncEvent?: (event: SyncEvent) => void;

  fetch?: FetchFunction;
  /** Replaces the backoff timer in tests */
  sleep?: (ms: number) => Promise<void>;
}
