/**
 * @profile-sync/client - HTTP client for profile sync.
 *
 * @example
 * ```typescript
 * import { ProfileSyncClient } from '@profile-sync/client';
 *
 * const client = new ProfileSyncClient({ baseUrl: 'http://localhost:8000/sync' });
 * await client.authenticate(username, serverId);
 *
 * const remote = await client.fetchProfile(playerId);
 * const outcome = await client.sync(
 *   playerId,
 *   { baseVersion: remote.version, payload: edited },
 *   (latest, local) => mergeSettings(latest.payload, local)
 * );
 * ```
 *
 * @packageDocumentation
 */

export { ProfileSyncClient, ProfileSyncClientError } from './profile-sync-client.js';
export type {
  RemoteProfile,
  LocalProfile,
  PushOutcome,
  RebaseFunction,
  SessionToken,
  SyncEvent,
  SyncEventType,
  FetchFunction,
  ProfileSyncClientOptions,
} from './types.js';
