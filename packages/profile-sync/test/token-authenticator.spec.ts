/**
 * Tests for SignedTokenAuthenticator.
 */

import { expect } from 'chai';
import { SignedTokenAuthenticator } from '../src/auth/token-authenticator.js';
import { TestClock } from './helpers.js';

describe('SignedTokenAuthenticator', () => {
  let clock: TestClock;
  let authenticator: SignedTokenAuthenticator;

  beforeEach(() => {
    clock = new TestClock();
    authenticator = new SignedTokenAuthenticator({ secret: 'test-secret', ttlSeconds: 3600, now: clock.now });
  });

  it('should refuse an empty secret', () => {
    expect(() => new SignedTokenAuthenticator({ secret: '' })).to.throw('Token secret must not be empty');
  });

  describe('issue', () => {
    it('should issue a token expiring after the TTL', () => {
      const issued = authenticator.issue('P1');
      expect(issued.playerId).to.equal('P1');
      expect(issued.expiresAt).to.deep.equal(new Date('2026-01-01T01:00:00Z'));
      expect(issued.token.split('.')).to.have.length(2);
    });

    it('should default to a one hour lifetime', () => {
      const defaults = new SignedTokenAuthenticator({ secret: 'test-secret', now: clock.now });
      expect(defaults.issue('P1').expiresAt).to.deep.equal(new Date('2026-01-01T01:00:00Z'));
    });
  });

  describe('authenticate', () => {
    it('should accept a fresh token for its own player', async () => {
      const { token } = authenticator.issue('P1');
      const result = await authenticator.authenticate('P1', token);
      expect(result).to.deep.equal({
        ok: true,
        playerId: 'P1',
        expiresAt: new Date('2026-01-01T01:00:00Z'),
      });
    });

    it('should reject a missing or empty token', async () => {
      expect(await authenticator.authenticate('P1', undefined)).to.deep.equal({
        ok: false,
        reason: 'An authentication token is required',
      });
      expect((await authenticator.authenticate('P1', '')).ok).to.be.false;
    });

    it('should reject a token bound to another player', async () => {
      const { token } = authenticator.issue('P2');
      expect(await authenticator.authenticate('P1', token)).to.deep.equal({
        ok: false,
        reason: 'The provided authentication is not valid for the requested player',
      });
    });

    it('should reject an expired token', async () => {
      const { token } = authenticator.issue('P1');
      clock.advanceSeconds(3599);
      expect((await authenticator.authenticate('P1', token)).ok).to.be.true;
      clock.advanceSeconds(1);
      expect(await authenticator.authenticate('P1', token)).to.deep.equal({
        ok: false,
        reason: 'Authentication is invalid or has expired',
      });
    });

    it('should reject malformed tokens', async () => {
      for (const token of ['no-dot', 'a.b.c', '.sig', 'claims.']) {
        expect(await authenticator.authenticate('P1', token)).to.deep.equal({
          ok: false,
          reason: 'Malformed authentication token',
        });
      }
    });

    it('should reject a token signed with another secret', async () => {
      const other = new SignedTokenAuthenticator({ secret: 'other-secret', now: clock.now });
      const { token } = other.issue('P1');
      expect((await authenticator.authenticate('P1', token)).ok).to.be.false;
    });

    it('should reject tampered claims', async () => {
      const { token } = authenticator.issue('P2');
      const [, signature] = token.split('.');
      const forged = Buffer.from(JSON.stringify({ sub: 'P1', iat: 0, exp: 9999999999 })).toString('base64url');
      expect(await authenticator.authenticate('P1', `${forged}.${signature}`)).to.deep.equal({
        ok: false,
        reason: 'Malformed authentication token',
      });
    });
  });
});
