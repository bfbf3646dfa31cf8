/**
 * Tests for SyncCoordinator.
 */

import { expect } from 'chai';
import { SyncCoordinator, type SyncState } from '../src/coordinator/sync-coordinator.js';
import { SignedTokenAuthenticator } from '../src/auth/token-authenticator.js';
import { InMemoryVersionStore } from '../src/store/memory-store.js';
import type { VersionStore, WriteOptions, WriteResult } from '../src/store/version-store.js';
import type { ProfileSnapshot } from '../src/model/types.js';
import {
  InvalidRequestError,
  InvalidVersionError,
  PayloadTooLargeError,
  StoreUnavailableError,
  UnauthorizedError,
  VersionConflictError,
} from '../src/common/errors.js';
import { bytes, expectOutcome, text, TestClock } from './helpers.js';

/**
 * Delegating store whose behaviour individual tests override.
 */
class ScriptedStore implements VersionStore {
  readonly inner: InMemoryVersionStore;
  writeCalls = 0;

  constructor(inner: InMemoryVersionStore) {
    this.inner = inner;
  }

  read(playerId: string): Promise<ProfileSnapshot> {
    return this.inner.read(playerId);
  }

  conditionalWrite(playerId: string, expectedVersion: number, payload: Uint8Array, options?: WriteOptions): Promise<WriteResult> {
    this.writeCalls++;
    return this.inner.conditionalWrite(playerId, expectedVersion, payload, options);
  }

  readMany(playerIds: readonly string[]): Promise<Map<string, ProfileSnapshot>> {
    return this.inner.readMany(playerIds);
  }

  count(): Promise<number> {
    return this.inner.count();
  }

  close(): Promise<void> {
    return this.inner.close();
  }
}

describe('SyncCoordinator', () => {
  let clock: TestClock;
  let store: InMemoryVersionStore;
  let authenticator: SignedTokenAuthenticator;
  let coordinator: SyncCoordinator;
  let token: string;

  beforeEach(() => {
    clock = new TestClock();
    store = new InMemoryVersionStore({ now: clock.now });
    authenticator = new SignedTokenAuthenticator({ secret: 'test-secret', now: clock.now });
    coordinator = new SyncCoordinator({ store, authenticator });
    token = authenticator.issue('P1').token;
  });

  afterEach(async () => {
    await store.close();
  });

  describe('two-device scenario', () => {
    it('should accept, reject the stale device, then accept its re-based push', async () => {
      const initial = await coordinator.fetch('P1', token);
      expect(initial.outcome).to.equal('ok');
      if (initial.outcome !== 'ok') return;
      expect(initial.snapshot.version).to.equal(0);
      expect(text(initial.snapshot.payload)).to.equal('');

      const first = expectOutcome(
        await coordinator.sync({ playerId: 'P1', token, baseVersion: 0, payload: bytes('A') }),
        'accepted'
      );
      expect(first.snapshot.version).to.equal(1);
      expect(text(first.snapshot.payload)).to.equal('A');

      const stale = expectOutcome(
        await coordinator.sync({ playerId: 'P1', token, baseVersion: 0, payload: bytes('B') }),
        'conflict'
      );
      expect(stale.snapshot.version).to.equal(1);
      expect(text(stale.snapshot.payload)).to.equal('A');

      const rebased = expectOutcome(
        await coordinator.sync({ playerId: 'P1', token, baseVersion: 1, payload: bytes('B') }),
        'accepted'
      );
      expect(rebased.snapshot.version).to.equal(2);
      expect(text(rebased.snapshot.payload)).to.equal('B');
    });
  });

  describe('versioning', () => {
    it('should increase the version by exactly one per accepted push', async () => {
      const versions: number[] = [];
      for (let base = 0; base < 5; base++) {
        const result = expectOutcome(
          await coordinator.sync({ playerId: 'P1', token, baseVersion: base, payload: bytes(`edit ${base}`) }),
          'accepted'
        );
        versions.push(result.snapshot.version);
      }
      expect(versions).to.deep.equal([1, 2, 3, 4, 5]);
    });

    it('should return exactly the stored snapshot on a stale push', async () => {
      await coordinator.sync({ playerId: 'P1', token, baseVersion: 0, payload: bytes('A'), deviceHint: 'laptop' });
      await coordinator.sync({ playerId: 'P1', token, baseVersion: 1, payload: bytes('B'), deviceHint: 'laptop' });

      const result = expectOutcome(
        await coordinator.sync({ playerId: 'P1', token, baseVersion: 1, payload: bytes('C') }),
        'conflict'
      );
      expect(result.snapshot).to.deep.equal(await store.read('P1'));
      expect(result.reason).to.equal('Base version 1 is behind the current version 2');
    });

    it('should reject a future base version without touching the store', async () => {
      await coordinator.sync({ playerId: 'P1', token, baseVersion: 0, payload: bytes('A') });

      const result = expectOutcome(
        await coordinator.sync({ playerId: 'P1', token, baseVersion: 7, payload: bytes('Z') }),
        'invalid'
      );
      expect(result.snapshot?.version).to.equal(1);

      const stored = await store.read('P1');
      expect(stored.version).to.equal(1);
      expect(text(stored.payload)).to.equal('A');
    });

    it('should treat a replayed push as a conflict', async () => {
      const request = { playerId: 'P1', token, baseVersion: 0, payload: bytes('A') };
      expectOutcome(await coordinator.sync(request), 'accepted');
      const replay = expectOutcome(await coordinator.sync(request), 'conflict');
      expect(replay.snapshot.version).to.equal(1);
      expect(await store.count()).to.equal(1);
    });

    it('should record the device hint on the accepted snapshot', async () => {
      const result = expectOutcome(
        await coordinator.sync({ playerId: 'P1', token, baseVersion: 0, payload: bytes('A'), deviceHint: 'steam-deck' }),
        'accepted'
      );
      expect(result.snapshot.ownerDeviceHint).to.equal('steam-deck');
      expect((await store.read('P1')).ownerDeviceHint).to.equal('steam-deck');
    });
  });

  describe('concurrency', () => {
    it('should accept exactly one of N concurrent pushes from the same base', async () => {
      const results = await Promise.all(
        ['a', 'b', 'c', 'd', 'e'].map(p =>
          coordinator.sync({ playerId: 'P1', token, baseVersion: 0, payload: bytes(p) })
        )
      );

      const accepted = results.filter(r => r.outcome === 'accepted');
      const conflicts = results.filter(r => r.outcome === 'conflict');
      expect(accepted).to.have.length(1);
      expect(conflicts).to.have.length(4);
      expect((await store.read('P1')).version).to.equal(1);
    });

    it('should keep players independent', async () => {
      const tokenP2 = authenticator.issue('P2').token;
      const [p1, p2] = await Promise.all([
        coordinator.sync({ playerId: 'P1', token, baseVersion: 0, payload: bytes('one') }),
        coordinator.sync({ playerId: 'P2', token: tokenP2, baseVersion: 0, payload: bytes('two') }),
      ]);
      expect(p1.outcome).to.equal('accepted');
      expect(p2.outcome).to.equal('accepted');
    });

    it('should retry after losing a commit race and report the winner', async () => {
      const scripted = new ScriptedStore(store);
      let raced = false;
      scripted.conditionalWrite = async (playerId, expectedVersion, payload, options) => {
        scripted.writeCalls++;
        if (!raced) {
          raced = true;
          await store.conditionalWrite(playerId, expectedVersion, bytes('other device'));
        }
        return store.conditionalWrite(playerId, expectedVersion, payload, options);
      };

      const states: SyncState[] = [];
      const retries: number[] = [];
      const racing = new SyncCoordinator({
        store: scripted,
        authenticator,
        hooks: {
          onTransition: (_playerId, state) => states.push(state),
          onCommitRetry: (_playerId, attempt) => retries.push(attempt),
        },
      });

      const result = expectOutcome(
        await racing.sync({ playerId: 'P1', token, baseVersion: 0, payload: bytes('mine') }),
        'conflict'
      );
      expect(result.attempts).to.equal(2);
      expect(result.snapshot.version).to.equal(1);
      expect(text(result.snapshot.payload)).to.equal('other device');
      expect(retries).to.deep.equal([1]);
      expect(states).to.deep.equal([
        'authenticating', 'reading', 'deciding', 'committing',
        'reading', 'deciding', 'rejected',
      ]);
    });

    it('should give up after the attempt bound when every commit loses', async () => {
      await store.conditionalWrite('P1', 0, bytes('A'));
      const scripted = new ScriptedStore(store);
      let reads = 0;
      // The first three reads come from a lagging replica.
      scripted.read = async (playerId) => {
        reads++;
        return reads <= 3 ? { version: 0, payload: new Uint8Array(0) } : store.read(playerId);
      };

      const retries: number[] = [];
      const bounded = new SyncCoordinator({
        store: scripted,
        authenticator,
        maxCommitAttempts: 3,
        hooks: { onCommitRetry: (_playerId, attempt) => retries.push(attempt) },
      });

      const result = expectOutcome(
        await bounded.sync({ playerId: 'P1', token, baseVersion: 0, payload: bytes('B') }),
        'conflict'
      );
      expect(result.attempts).to.equal(3);
      expect(retries).to.deep.equal([1, 2, 3]);
      expect(scripted.writeCalls).to.equal(3);
      expect(result.snapshot.version).to.equal(1);
      expect(text(result.snapshot.payload)).to.equal('A');
      expect(result.reason).to.equal('Version conflict for P1: expected 0, store is at 1');
    });
  });

  describe('authentication', () => {
    it('should reject a token for another player before reading', async () => {
      const states: SyncState[] = [];
      const scripted = new ScriptedStore(store);
      let reads = 0;
      scripted.read = async (playerId) => {
        reads++;
        return store.read(playerId);
      };
      const gated = new SyncCoordinator({
        store: scripted,
        authenticator,
        hooks: { onTransition: (_playerId, state) => states.push(state) },
      });

      const result = expectOutcome(
        await gated.sync({ playerId: 'P2', token, baseVersion: 0, payload: bytes('A') }),
        'unauthorized'
      );
      expect(result.reason).to.equal('The provided authentication is not valid for the requested player');
      expect(states).to.deep.equal(['authenticating', 'unauthorized']);
      expect(reads).to.equal(0);
      expect(await store.count()).to.equal(0);
    });

    it('should reject an expired token', async () => {
      clock.advanceSeconds(3600);
      expectOutcome(
        await coordinator.sync({ playerId: 'P1', token, baseVersion: 0, payload: bytes('A') }),
        'unauthorized'
      );
    });

    it('should require authentication for fetch', async () => {
      const result = await coordinator.fetch('P1', undefined);
      expect(result).to.deep.equal({ outcome: 'unauthorized', reason: 'An authentication token is required' });
    });
  });

  describe('payload bound', () => {
    it('should reject an oversized payload with the current snapshot', async () => {
      const small = new SyncCoordinator({ store, authenticator, maxPayloadBytes: 4 });
      expectOutcome(await small.sync({ playerId: 'P1', token, baseVersion: 0, payload: bytes('1234') }), 'accepted');

      const result = expectOutcome(
        await small.sync({ playerId: 'P1', token, baseVersion: 1, payload: bytes('12345') }),
        'payload_too_large'
      );
      expect(result.reason).to.equal('Payload of 5 bytes exceeds the limit of 4 bytes');
      expect(result.snapshot?.version).to.equal(1);
      expect(text((await store.read('P1')).payload)).to.equal('1234');
    });
  });

  describe('store failures', () => {
    it('should surface a read timeout as unavailable', async () => {
      const scripted = new ScriptedStore(store);
      scripted.read = () => new Promise<ProfileSnapshot>(() => {});
      const slow = new SyncCoordinator({ store: scripted, authenticator, storeTimeoutMs: 20 });

      const result = expectOutcome(
        await slow.sync({ playerId: 'P1', token, baseVersion: 0, payload: bytes('A') }),
        'unavailable'
      );
      expect(result.reason).to.equal('read P1 timed out after 20ms');
      expect(await store.count()).to.equal(0);
    });

    it('should surface a failed write as unavailable, never as success', async () => {
      const scripted = new ScriptedStore(store);
      scripted.conditionalWrite = async () => {
        throw new StoreUnavailableError('write P1: connection reset');
      };
      const flaky = new SyncCoordinator({ store: scripted, authenticator });

      const result = expectOutcome(
        await flaky.sync({ playerId: 'P1', token, baseVersion: 0, payload: bytes('A') }),
        'unavailable'
      );
      expect(result.reason).to.equal('write P1: connection reset');
    });

    it('should report unavailability on fetch', async () => {
      const scripted = new ScriptedStore(store);
      scripted.read = async () => {
        throw new StoreUnavailableError('read P1: no primary');
      };
      const flaky = new SyncCoordinator({ store: scripted, authenticator });
      expect(await flaky.fetch('P1', token)).to.deep.equal({ outcome: 'unavailable', reason: 'read P1: no primary' });
    });

    it('should propagate unexpected errors', async () => {
      const scripted = new ScriptedStore(store);
      scripted.read = async () => {
        throw new Error('boom');
      };
      const broken = new SyncCoordinator({ store: scripted, authenticator });

      try {
        await broken.sync({ playerId: 'P1', token, baseVersion: 0, payload: bytes('A') });
        expect.fail('Should have thrown');
      } catch (err) {
        expect((err as Error).message).to.equal('boom');
      }
    });

    it('should honour a single-attempt bound', async () => {
      const scripted = new ScriptedStore(store);
      scripted.conditionalWrite = async (playerId, expectedVersion) => {
        scripted.writeCalls++;
        throw new VersionConflictError(playerId, expectedVersion, expectedVersion + 1);
      };
      const single = new SyncCoordinator({ store: scripted, authenticator, maxCommitAttempts: 1 });

      const result = expectOutcome(
        await single.sync({ playerId: 'P1', token, baseVersion: 0, payload: bytes('A') }),
        'conflict'
      );
      expect(result.attempts).to.equal(1);
      expect(scripted.writeCalls).to.equal(1);
    });
  });

  describe('error mapping', () => {
    it('should return the stored snapshot with an invalid version claim', async () => {
      await coordinator.sync({ playerId: 'P1', token, baseVersion: 0, payload: bytes('A'), deviceHint: 'laptop' });
      const states: SyncState[] = [];
      const observed = new SyncCoordinator({
        store,
        authenticator,
        hooks: { onTransition: (_playerId, state) => states.push(state) },
      });

      const result = expectOutcome(
        await observed.sync({ playerId: 'P1', token, baseVersion: 2.5, payload: bytes('Z') }),
        'invalid'
      );
      expect(result.reason).to.equal('Base version must be a non-negative integer, got 2.5');
      expect(result.snapshot).to.deep.equal(await store.read('P1'));
      expect(states).to.deep.equal(['authenticating', 'reading', 'deciding', 'invalid']);
    });

    it('should reject an oversized payload without a snapshot while the store is down', async () => {
      const scripted = new ScriptedStore(store);
      scripted.read = async () => {
        throw new StoreUnavailableError('read P1: no primary');
      };
      const small = new SyncCoordinator({ store: scripted, authenticator, maxPayloadBytes: 4 });

      const result = await small.sync({ playerId: 'P1', token, baseVersion: 0, payload: bytes('12345') });
      expect(result).to.deep.equal({
        outcome: 'payload_too_large',
        reason: 'Payload of 5 bytes exceeds the limit of 4 bytes',
      });
      expect(scripted.writeCalls).to.equal(0);
    });

    it('should map engine errors raised by the store', async () => {
      const scripted = new ScriptedStore(store);
      const mapped = new SyncCoordinator({ store: scripted, authenticator });
      const cases: Array<[Error, string]> = [
        [new InvalidRequestError('payload rejected by store'), 'invalid'],
        [new InvalidVersionError(4, 'version 4 was never written'), 'invalid'],
        [new PayloadTooLargeError(9, 8), 'payload_too_large'],
        [new UnauthorizedError('credential revoked'), 'unauthorized'],
      ];

      for (const [error, outcome] of cases) {
        scripted.conditionalWrite = async () => {
          throw error;
        };
        const result = await mapped.sync({ playerId: 'P1', token, baseVersion: 0, payload: bytes('A') });
        expect(result).to.deep.equal({ outcome, reason: error.message });
      }
    });

    it('should report an authenticator that throws UnauthorizedError', async () => {
      const rejecting = new SyncCoordinator({
        store,
        authenticator: {
          authenticate: async () => {
            throw new UnauthorizedError();
          },
        },
      });

      expect(await rejecting.fetch('P1', token)).to.deep.equal({
        outcome: 'unauthorized',
        reason: 'Authentication is invalid or has expired',
      });
      const result = expectOutcome(
        await rejecting.sync({ playerId: 'P1', token, baseVersion: 0, payload: bytes('A') }),
        'unauthorized'
      );
      expect(result.reason).to.equal('Authentication is invalid or has expired');
    });
  });
});
