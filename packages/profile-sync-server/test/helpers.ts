/**
 * Shared fixtures for server tests.
 */

import { mergeConfig, DEFAULT_CONFIG, type PartialServerConfig, type ServerConfig } from '../src/config/index.js';
import { InvalidAuthenticationError, type SessionVerifier } from '../src/auth/session-verifier.js';

export const PLAYER_1 = '0f6a3b2c-1d4e-4f50-9a6b-7c8d9e0f1a2b';
export const PLAYER_2 = '5e4d3c2b-1a09-4877-8665-544332211000';

export function testConfig(overrides: PartialServerConfig = {}): ServerConfig {
  return mergeConfig(
    DEFAULT_CONFIG,
    { auth: { tokenSecret: 'test-secret' }, logging: { level: 'warn' } },
    overrides
  );
}

export function base64(text: string): string {
  return Buffer.from(text, 'utf-8').toString('base64');
}

/** Fixed clock at 2026-01-01T00:00:00Z. */
export class TestClock {
  current = new Date('2026-01-01T00:00:00Z');

  readonly now = (): Date => new Date(this.current);

  advanceSeconds(seconds: number): void {
    this.current = new Date(this.current.getTime() + seconds * 1000);
  }
}

/**
 * Session verifier that knows a fixed username -> player table for one server ID.
 */
export class FakeSessionVerifier implements SessionVerifier {
  readonly calls: Array<{ username: string; serverId: string }> = [];
  failWith?: Error;

  constructor(
    private readonly players: Record<string, string>,
    private readonly serverId = 'test-server'
  ) {}

  async verify(username: string, serverId: string): Promise<string> {
    this.calls.push({ username, serverId });
    if (this.failWith) throw this.failWith;

    const playerId = this.players[username];
    if (!playerId || serverId !== this.serverId) {
      throw new InvalidAuthenticationError();
    }
    return playerId;
  }
}
