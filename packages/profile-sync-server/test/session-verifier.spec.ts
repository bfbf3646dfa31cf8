/**
 * Tests for session-server verification.
 */

import { expect } from 'chai';
import {
  AuthServerError,
  InvalidAuthenticationError,
  SessionServerVerifier,
  canonicalPlayerId,
  type FetchFunction,
} from '../src/auth/session-verifier.js';

const SESSION_URL = 'https://session.test/session/minecraft/hasJoined';

describe('canonicalPlayerId', () => {
  it('should dash and lowercase an undashed UUID', () => {
    expect(canonicalPlayerId('0F6A3B2C1D4E4F509A6B7C8D9E0F1A2B')).to.equal('0f6a3b2c-1d4e-4f50-9a6b-7c8d9e0f1a2b');
  });

  it('should lowercase a dashed UUID', () => {
    expect(canonicalPlayerId('0F6A3B2C-1D4E-4F50-9A6B-7C8D9E0F1A2B')).to.equal('0f6a3b2c-1d4e-4f50-9a6b-7c8d9e0f1a2b');
  });

  it('should leave other identifiers alone', () => {
    expect(canonicalPlayerId('P1')).to.equal('P1');
  });
});

describe('SessionServerVerifier', () => {
  let requested: string[];

  function verifierReturning(respond: () => Promise<Response>): SessionServerVerifier {
    const fetchStub: FetchFunction = async (input) => {
      requested.push(String(input));
      return respond();
    };
    return new SessionServerVerifier({ url: SESSION_URL, timeoutMs: 1000, fetch: fetchStub });
  }

  beforeEach(() => {
    requested = [];
  });

  it('should return the canonical player ID of a confirmed join', async () => {
    const verifier = verifierReturning(async () =>
      new Response(JSON.stringify({ id: '0f6a3b2c1d4e4f509a6b7c8d9e0f1a2b', name: 'Steve' }), { status: 200 })
    );

    const playerId = await verifier.verify('Steve', 'abc123');
    expect(playerId).to.equal('0f6a3b2c-1d4e-4f50-9a6b-7c8d9e0f1a2b');
    expect(requested).to.deep.equal([`${SESSION_URL}?username=Steve&serverId=abc123`]);
  });

  it('should reject an unconfirmed join (204 with no body)', async () => {
    const verifier = verifierReturning(async () => new Response(null, { status: 204 }));
    try {
      await verifier.verify('Steve', 'abc123');
      expect.fail('Should have thrown');
    } catch (err) {
      expect(err).to.be.instanceOf(InvalidAuthenticationError);
      expect((err as InvalidAuthenticationError).statusCode).to.equal(403);
      expect((err as Error).message).to.equal("Couldn't authenticate with Mojang");
    }
  });

  it('should reject a body without an id', async () => {
    const verifier = verifierReturning(async () => new Response('{"name":"Steve"}', { status: 200 }));
    try {
      await verifier.verify('Steve', 'abc123');
      expect.fail('Should have thrown');
    } catch (err) {
      expect(err).to.be.instanceOf(InvalidAuthenticationError);
    }
  });

  it('should report an error status as a session server failure', async () => {
    const verifier = verifierReturning(async () => new Response('busy', { status: 502 }));
    try {
      await verifier.verify('Steve', 'abc123');
      expect.fail('Should have thrown');
    } catch (err) {
      expect(err).to.be.instanceOf(AuthServerError);
      expect((err as AuthServerError).statusCode).to.equal(503);
      expect((err as Error).message).to.equal('Session servers returned an unexpected response status 502');
    }
  });

  it('should report a network failure as a session server failure', async () => {
    const verifier = verifierReturning(async () => {
      throw new TypeError('fetch failed');
    });
    try {
      await verifier.verify('Steve', 'abc123');
      expect.fail('Should have thrown');
    } catch (err) {
      expect(err).to.be.instanceOf(AuthServerError);
      expect((err as Error).message).to.equal("Couldn't reach authentication servers");
      expect((err as AuthServerError).cause?.message).to.equal('fetch failed');
    }
  });

  it('should report a body that fails to arrive as a session server failure', async () => {
    class AbortedBody extends Response {
      override async text(): Promise<string> {
        throw Object.assign(new Error('The operation was aborted due to timeout'), { name: 'TimeoutError' });
      }
    }
    const verifier = verifierReturning(async () => new AbortedBody(null, { status: 200 }));
    try {
      await verifier.verify('Steve', 'abc123');
      expect.fail('Should have thrown');
    } catch (err) {
      expect(err).to.be.instanceOf(AuthServerError);
      expect((err as AuthServerError).statusCode).to.equal(503);
      expect((err as Error).message).to.equal("Couldn't read the authentication server response");
      expect((err as AuthServerError).cause?.name).to.equal('TimeoutError');
    }
  });
});
