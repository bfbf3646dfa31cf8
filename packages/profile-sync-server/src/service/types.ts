/**
 * Service-layer request and response types.
 */

import type { IssuedToken, ProfileSnapshot, SyncResult } from '@profile-sync/core';

/**
 * Credentials presented with a push. A bearer token wins when present;
 * otherwise both session-server fields are needed.
 */
export interface PushCredentials {
  token?: string;
  username?: string;
  serverId?: string;
}

export interface PushInput {
  playerId: string;
  credentials: PushCredentials;
  baseVersion: number;
  payload: Uint8Array;
  deviceHint?: string;
}

export interface PushResponse {
  result: SyncResult;
  /** Set when the push was authenticated through the session server */
  issued?: IssuedToken;
  /** The bearer token the push presented, when it is valid for the player */
  presented?: IssuedToken;
}

export interface SyncStats {
  syncedUsers: number;
  timestamp: Date;
}

export interface ServiceStatus {
  storeBackend: string;
  uptime: number;
}

export type BulkQueryResult = Map<string, ProfileSnapshot>;
