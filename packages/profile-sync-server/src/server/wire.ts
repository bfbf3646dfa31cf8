/**
 * JSON wire encoding for profiles: payload bytes travel as base64 strings.
 */

import { InvalidRequestError, type ProfileSnapshot, type SyncOutcome } from '@profile-sync/core';
import { canonicalPlayerId } from '../auth/session-verifier.js';

export interface WireSnapshot {
  version: number;
  payload: string;
}

export interface PushBody {
  baseVersion: number;
  payload: Uint8Array;
  deviceHint?: string;
}

const BASE64 = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;
const PLAYER_ID = /^[A-Za-z0-9_-]{1,64}$/;
const MAX_DEVICE_HINT_LENGTH = 128;

/** Path segments taken by the operational routes under the base path */
const RESERVED_PLAYER_IDS = new Set(['auth', 'bulk-query', 'metrics', 'stats', 'status']);

export function encodePayload(payload: Uint8Array): string {
  return Buffer.from(payload).toString('base64');
}

export function decodePayload(encoded: string): Uint8Array {
  if (!BASE64.test(encoded)) {
    throw new InvalidRequestError('payload must be a base64 string');
  }
  return new Uint8Array(Buffer.from(encoded, 'base64'));
}

export function toWireSnapshot(snapshot: ProfileSnapshot): WireSnapshot {
  return { version: snapshot.version, payload: encodePayload(snapshot.payload) };
}

/**
 * Validate a path player ID and return its canonical form. Names of the
 * operational routes are refused so every accepted ID can be read back.
 */
export function parsePlayerId(raw: string): string {
  if (!PLAYER_ID.test(raw)) {
    throw new InvalidRequestError(`Invalid player ID: ${raw.slice(0, 64)}`);
  }
  if (RESERVED_PLAYER_IDS.has(raw.toLowerCase())) {
    throw new InvalidRequestError(`Reserved player ID: ${raw}`);
  }
  return canonicalPlayerId(raw);
}

/**
 * Parse a push body. Range checks on `baseVersion` are left to the engine,
 * which answers them with the current snapshot.
 */
export function parsePushBody(body: unknown): PushBody {
  if (typeof body !== 'object' || body === null || Array.isArray(body)) {
    throw new InvalidRequestError('Request body must be a JSON object');
  }
  if (!('baseVersion' in body) || typeof body.baseVersion !== 'number') {
    throw new InvalidRequestError('baseVersion must be a number');
  }
  if (!('payload' in body) || typeof body.payload !== 'string') {
    throw new InvalidRequestError('payload must be a base64 string');
  }

  const parsed: PushBody = {
    baseVersion: body.baseVersion,
    payload: decodePayload(body.payload),
  };

  if ('deviceHint' in body && body.deviceHint !== undefined && body.deviceHint !== null) {
    if (typeof body.deviceHint !== 'string' || body.deviceHint.length > MAX_DEVICE_HINT_LENGTH) {
      throw new InvalidRequestError(`deviceHint must be a string of at most ${MAX_DEVICE_HINT_LENGTH} characters`);
    }
    parsed.deviceHint = body.deviceHint;
  }

  return parsed;
}

/**
 * Format an expiry as `YYYY-MM-DDTHH:MM:SSZ`.
 */
export function formatExpiry(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

export function statusForOutcome(outcome: SyncOutcome): number {
  switch (outcome) {
    case 'accepted': return 200;
    case 'conflict': return 409;
    case 'invalid': return 422;
    case 'payload_too_large': return 413;
    case 'unauthorized': return 401;
    case 'unavailable': return 503;
  }
}

export function codeForOutcome(outcome: Exclude<SyncOutcome, 'accepted'>): string {
  switch (outcome) {
    case 'conflict': return 'VERSION_CONFLICT';
    case 'invalid': return 'INVALID_VERSION';
    case 'payload_too_large': return 'PAYLOAD_TOO_LARGE';
    case 'unauthorized': return 'UNAUTHORIZED';
    case 'unavailable': return 'STORE_UNAVAILABLE';
  }
}
