/**
 * Optimistic-concurrency decision for a single push.
 *
 * The client echoes back the version it last observed. Only a push based on
 * the current version may proceed; a push based on an older version is
 * rejected with the authoritative state so the client can re-base. Payloads
 * are opaque here, so there is no merge.
 */

import type { ProfileSnapshot } from '../model/types.js';

export type Decision =
  | { kind: 'proceed'; payload: Uint8Array }
  | { kind: 'reject'; current: ProfileSnapshot; reason: string }
  | { kind: 'invalid'; current: ProfileSnapshot; reason: string };

export class ConflictResolver {
  decide(
    claimedBaseVersion: number,
    storeVersion: number,
    clientPayload: Uint8Array,
    storePayload: Uint8Array
  ): Decision {
    const current: ProfileSnapshot = { version: storeVersion, payload: storePayload };

    if (!Number.isSafeInteger(claimedBaseVersion) || claimedBaseVersion < 0) {
      return {
        kind: 'invalid',
        current,
        reason: `Base version must be a non-negative integer, got ${claimedBaseVersion}`,
      };
    }

    if (claimedBaseVersion === storeVersion) {
      return { kind: 'proceed', payload: clientPayload };
    }

    if (claimedBaseVersion < storeVersion) {
      return {
        kind: 'reject',
        current,
        reason: `Base version ${claimedBaseVersion} is behind the current version ${storeVersion}`,
      };
    }

    return {
      kind: 'invalid',
      current,
      reason: `Base version ${claimedBaseVersion} is ahead of the current version ${storeVersion}`,
    };
  }
}
