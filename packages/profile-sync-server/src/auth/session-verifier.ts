/**
 * Session-server verification.
 *
 * A game client proves who it is by joining a server through the game's
 * session server, then handing us the username and server ID it used. Asking
 * the session server's `hasJoined` endpoint for that pair returns the
 * player's profile, whose `id` becomes the player ID we issue a token for.
 */

import { toError } from '@profile-sync/core';
import { sessionLog } from '../common/logger.js';

/**
 * Base for session verification failures, carrying the HTTP status to send.
 */
export class SessionAuthError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number,
    public override readonly cause?: Error
  ) {
    super(message);
    this.name = 'SessionAuthError';
  }
}

/**
 * The session server did not vouch for the username/server pair.
 */
export class InvalidAuthenticationError extends SessionAuthError {
  constructor(message = "Couldn't authenticate with Mojang") {
    super(message, 403);
    this.name = 'InvalidAuthenticationError';
    Object.setPrototypeOf(this, InvalidAuthenticationError.prototype);
  }
}

/**
 * The session server could not be reached or answered with an error status.
 */
export class AuthServerError extends SessionAuthError {
  constructor(message: string, cause?: Error) {
    super(message, 503, cause);
    this.name = 'AuthServerError';
    Object.setPrototypeOf(this, AuthServerError.prototype);
  }
}

export interface SessionVerifier {
  /**
   * Resolve the verified player ID for a username/server pair.
   * Throws InvalidAuthenticationError or AuthServerError.
   */
  verify(username: string, serverId: string): Promise<string>;
}

export type FetchFunction = (input: string | URL, init?: RequestInit) => Promise<Response>;

export interface SessionServerVerifierOptions {
  url: string;
  timeoutMs: number;
  /** Injected for tests; defaults to the global fetch */
  fetch?: FetchFunction;
}

const UNDASHED_UUID = /^[0-9a-f]{32}$/i;
const DASHED_UUID = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

/**
 * Canonical form of a player ID: UUIDs (dashed or not) become lowercase and
 * dashed; anything else is returned unchanged.
 */
export function canonicalPlayerId(id: string): string {
  if (UNDASHED_UUID.test(id)) {
    const hex = id.toLowerCase();
    return `${hex.slice(0, 8)}-${hex.slice(8, 12)}-${hex.slice(12, 16)}-${hex.slice(16, 20)}-${hex.slice(20)}`;
  }
  if (DASHED_UUID.test(id)) {
    return id.toLowerCase();
  }
  return id;
}

function profileId(body: unknown): string | undefined {
  if (typeof body !== 'object' || body === null || !('id' in body)) return undefined;
  return typeof body.id === 'string' && body.id.length > 0 ? body.id : undefined;
}

export class SessionServerVerifier implements SessionVerifier {
  private readonly url: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchFunction;

  constructor(options: SessionServerVerifierOptions) {
    this.url = options.url;
    this.timeoutMs = options.timeoutMs;
    this.fetchImpl = options.fetch ?? fetch;
  }

  async verify(username: string, serverId: string): Promise<string> {
    const url = new URL(this.url);
    url.searchParams.set('username', username);
    url.searchParams.set('serverId', serverId);

    let response: Response;
    try {
      response = await this.fetchImpl(url, { signal: AbortSignal.timeout(this.timeoutMs) });
    } catch (err) {
      sessionLog('Session server request failed: %O', err);
      throw new AuthServerError("Couldn't reach authentication servers", toError(err));
    }

    if (response.status >= 400) {
      throw new AuthServerError(`Session servers returned an unexpected response status ${response.status}`);
    }

    // hasJoined answers 204 with an empty body for an unknown join
    let text: string;
    try {
      text = await response.text();
    } catch (err) {
      sessionLog('Session server response could not be read: %O', err);
      throw new AuthServerError("Couldn't read the authentication server response", toError(err));
    }

    let body: unknown;
    try {
      body = text ? JSON.parse(text) : undefined;
    } catch {
      body = undefined;
    }

    const id = profileId(body);
    if (!id) {
      sessionLog('Session server did not confirm %s', username);
      throw new InvalidAuthenticationError();
    }

    const playerId = canonicalPlayerId(id);
    sessionLog('Verified %s as %s', username, playerId);
    return playerId;
  }
}
