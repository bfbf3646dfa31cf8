/**
 * Stateless sync-token authentication.
 *
 * Tokens are `<claims>.<signature>`, both base64url. Claims are JSON
 * `{ sub, iat, exp }` with times in epoch seconds, and the signature is an
 * HMAC-SHA256 of the encoded claims. Nothing is persisted; validity is a pure
 * function of the token, the secret and the clock.
 */

import { createHmac, timingSafeEqual } from 'node:crypto';
import { authLog } from '../common/logger.js';

export type AuthResult =
  | { ok: true; playerId: string; expiresAt: Date }
  | { ok: false; reason: string };

export interface IssuedToken {
  token: string;
  playerId: string;
  expiresAt: Date;
}

/**
 * Validates a presented credential against a claimed player identity.
 */
export interface TokenAuthenticator {
  authenticate(playerId: string, token: string | undefined): Promise<AuthResult>;
}

export interface SignedTokenAuthenticatorOptions {
  /** HMAC secret shared by every server instance */
  secret: string;
  /** Token lifetime in seconds. @default 3600 */
  ttlSeconds?: number;
  /** Clock override for tests */
  now?: () => Date;
}

interface TokenClaims {
  sub: string;
  iat: number;
  exp: number;
}

const DEFAULT_TTL_SECONDS = 60 * 60;

function isTokenClaims(value: unknown): value is TokenClaims {
  if (typeof value !== 'object' || value === null) return false;
  if (!('sub' in value) || !('iat' in value) || !('exp' in value)) return false;
  const { sub, iat, exp } = value;
  return typeof sub === 'string'
    && typeof iat === 'number' && Number.isInteger(iat)
    && typeof exp === 'number' && Number.isInteger(exp);
}

/**
 * HMAC-signed token authenticator.
 */
export class SignedTokenAuthenticator implements TokenAuthenticator {
  private readonly secret: string;
  private readonly ttlSeconds: number;
  private readonly now: () => Date;

  constructor(options: SignedTokenAuthenticatorOptions) {
    if (!options.secret) {
      throw new Error('Token secret must not be empty');
    }
    this.secret = options.secret;
    this.ttlSeconds = options.ttlSeconds ?? DEFAULT_TTL_SECONDS;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Issue a token bound to a player.
   */
  issue(playerId: string): IssuedToken {
    const iat = Math.floor(this.now().getTime() / 1000);
    const claims: TokenClaims = { sub: playerId, iat, exp: iat + this.ttlSeconds };
    const encoded = Buffer.from(JSON.stringify(claims), 'utf-8').toString('base64url');
    authLog('Issued token for %s, expires %d', playerId, claims.exp);
    return {
      token: `${encoded}.${this.sign(encoded)}`,
      playerId,
      expiresAt: new Date(claims.exp * 1000),
    };
  }

  async authenticate(playerId: string, token: string | undefined): Promise<AuthResult> {
    if (!token) {
      return { ok: false, reason: 'An authentication token is required' };
    }

    const parts = token.split('.');
    if (parts.length !== 2 || !parts[0] || !parts[1]) {
      return { ok: false, reason: 'Malformed authentication token' };
    }
    const [encoded, signature] = parts;

    const expected = Buffer.from(this.sign(encoded), 'utf-8');
    const presented = Buffer.from(signature, 'utf-8');
    if (expected.length !== presented.length || !timingSafeEqual(expected, presented)) {
      authLog('Signature mismatch for claimed player %s', playerId);
      return { ok: false, reason: 'Malformed authentication token' };
    }

    let claims: unknown;
    try {
      claims = JSON.parse(Buffer.from(encoded, 'base64url').toString('utf-8'));
    } catch {
      return { ok: false, reason: 'Malformed authentication token' };
    }
    if (!isTokenClaims(claims)) {
      return { ok: false, reason: 'Malformed authentication token' };
    }

    const nowSeconds = Math.floor(this.now().getTime() / 1000);
    if (claims.exp <= nowSeconds) {
      return { ok: false, reason: 'Authentication is invalid or has expired' };
    }
    if (claims.sub !== playerId) {
      authLog('Token for %s presented for %s', claims.sub, playerId);
      return { ok: false, reason: 'The provided authentication is not valid for the requested player' };
    }

    return { ok: true, playerId: claims.sub, expiresAt: new Date(claims.exp * 1000) };
  }

  private sign(encodedClaims: string): string {
    return createHmac('sha256', this.secret).update(encodedClaims).digest('base64url');
  }
}
