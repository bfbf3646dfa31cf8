/**
 * MongoDB-backed VersionStore.
 *
 * One document per player:
 *   { _id: playerId, version, payload: Binary, updatedAt, deviceHint? }
 *
 * Compare-and-swap is a single-document operation: `insertOne` when the
 * caller expects version 0 (a duplicate key means someone else created it),
 * otherwise `findOneAndUpdate` filtered on the expected version. All
 * operations run with majority read and write concern against the primary,
 * so an acknowledged write is visible to every subsequent read.
 */

import {
  Binary,
  MongoClient,
  MongoError,
  MongoNetworkError,
  MongoServerError,
  MongoServerSelectionError,
  type WithId,
} from 'mongodb';
import {
  ProfileSyncError,
  StoreUnavailableError,
  VersionConflictError,
  toError,
} from '../common/errors.js';
import { storeLog } from '../common/logger.js';
import { emptySnapshot, type ProfileSnapshot } from '../model/types.js';
import type { VersionStore, WriteOptions, WriteResult } from './version-store.js';

/**
 * Persisted profile document.
 */
export interface ProfileDocument {
  _id: string;
  version: number;
  payload: Binary;
  updatedAt: Date;
  deviceHint?: string;
}

/**
 * Update applied by a compare-and-swap: new payload and timestamp, version
 * bumped by one, device hint replaced or cleared.
 */
export type ProfileUpdate = {
  $set: { payload: Binary; updatedAt: Date; deviceHint?: string };
  $unset?: { deviceHint: '' };
  $inc: { version: 1 };
};

/**
 * The collection operations the store uses. A driver
 * `Collection<ProfileDocument>` satisfies it.
 */
export interface ProfileCollection {
  findOne(filter: { _id: string }, options: { maxTimeMS: number }): Promise<WithId<ProfileDocument> | null>;
  findOneAndUpdate(
    filter: { _id: string; version: number },
    update: ProfileUpdate,
    options: { returnDocument: 'after'; maxTimeMS: number }
  ): Promise<WithId<ProfileDocument> | null>;
  insertOne(doc: ProfileDocument): Promise<unknown>;
  find(filter: { _id: { $in: string[] } }, options: { maxTimeMS: number }): AsyncIterable<WithId<ProfileDocument>>;
  countDocuments(filter: object, options: { maxTimeMS: number }): Promise<number>;
}

export interface MongoVersionStoreOptions {
  /** Server-side time limit per operation, in milliseconds. @default 5000 */
  maxTimeMS?: number;
  /** Client to close when the store is closed (set when the store opened it) */
  ownedClient?: MongoClient;
}

export interface MongoConnectOptions {
  url: string;
  database: string;
  /** @default 'profiles' */
  collection?: string;
  /** Used for server selection, connect, wtimeout and maxTimeMS. @default 5000 */
  timeoutMs?: number;
}

const DUPLICATE_KEY = 11000;

/** Server error codes that indicate a transient condition */
const TRANSIENT_SERVER_CODES = new Set([
  50,    // MaxTimeMSExpired
  64,    // WriteConcernFailed
  91,    // ShutdownInProgress
  189,   // PrimarySteppedDown
  10107, // NotWritablePrimary
  11600, // InterruptedAtShutdown
  11602, // InterruptedDueToReplStateChange
  13435, // NotPrimaryNoSecondaryOk
]);

export function isDuplicateKeyError(err: unknown): boolean {
  return err instanceof MongoServerError && err.code === DUPLICATE_KEY;
}

/**
 * Translate a driver error into the engine's taxonomy.
 * Transient conditions become StoreUnavailableError; engine errors pass
 * through; anything else is returned unchanged.
 */
export function translateMongoError(err: unknown, context: string): Error {
  if (err instanceof ProfileSyncError) {
    return err;
  }
  if (err instanceof MongoNetworkError || err instanceof MongoServerSelectionError) {
    return new StoreUnavailableError(`${context}: ${err.message}`, err);
  }
  if (err instanceof MongoServerError && typeof err.code === 'number' && TRANSIENT_SERVER_CODES.has(err.code)) {
    return new StoreUnavailableError(`${context}: ${err.message}`, err);
  }
  if (err instanceof MongoError && err.hasErrorLabel('RetryableWriteError')) {
    return new StoreUnavailableError(`${context}: ${err.message}`, err);
  }
  return toError(err);
}

function toSnapshot(doc: WithId<ProfileDocument>): ProfileSnapshot {
  const snapshot: ProfileSnapshot = {
    version: doc.version,
    payload: new Uint8Array(doc.payload.buffer.subarray(0, doc.payload.length())),
    lastModified: doc.updatedAt,
  };
  if (doc.deviceHint !== undefined) {
    snapshot.ownerDeviceHint = doc.deviceHint;
  }
  return snapshot;
}

export class MongoVersionStore implements VersionStore {
  private readonly maxTimeMS: number;
  private readonly ownedClient?: MongoClient;

  constructor(
    private readonly collection: ProfileCollection,
    options: MongoVersionStoreOptions = {}
  ) {
    this.maxTimeMS = options.maxTimeMS ?? 5000;
    this.ownedClient = options.ownedClient;
  }

  /**
   * Connect to MongoDB and open the profile collection.
   */
  static async connect(options: MongoConnectOptions): Promise<MongoVersionStore> {
    const timeoutMs = options.timeoutMs ?? 5000;
    const client = new MongoClient(options.url, {
      serverSelectionTimeoutMS: timeoutMs,
      connectTimeoutMS: timeoutMs,
      readPreference: 'primary',
      readConcern: { level: 'majority' },
      writeConcern: { w: 'majority', journal: true, wtimeoutMS: timeoutMs },
    });

    try {
      await client.connect();
    } catch (err) {
      await client.close();
      throw translateMongoError(err, 'connect');
    }

    const collectionName = options.collection ?? 'profiles';
    storeLog('Connected to MongoDB database %s, collection %s', options.database, collectionName);
    const collection = client.db(options.database).collection<ProfileDocument>(collectionName);
    return new MongoVersionStore(collection, { maxTimeMS: timeoutMs, ownedClient: client });
  }

  async read(playerId: string): Promise<ProfileSnapshot> {
    try {
      const doc = await this.collection.findOne({ _id: playerId }, { maxTimeMS: this.maxTimeMS });
      return doc ? toSnapshot(doc) : emptySnapshot();
    } catch (err) {
      throw translateMongoError(err, `read ${playerId}`);
    }
  }

  async conditionalWrite(
    playerId: string,
    expectedVersion: number,
    payload: Uint8Array,
    options: WriteOptions = {}
  ): Promise<WriteResult> {
    const updatedAt = new Date();

    if (expectedVersion === 0) {
      return this.insertFirst(playerId, payload, updatedAt, options);
    }

    const stored = new Binary(payload);
    const update: ProfileUpdate = options.deviceHint !== undefined
      ? { $set: { payload: stored, updatedAt, deviceHint: options.deviceHint }, $inc: { version: 1 } }
      : { $set: { payload: stored, updatedAt }, $unset: { deviceHint: '' }, $inc: { version: 1 } };

    let updated: WithId<ProfileDocument> | null;
    try {
      updated = await this.collection.findOneAndUpdate(
        { _id: playerId, version: expectedVersion },
        update,
        { returnDocument: 'after', maxTimeMS: this.maxTimeMS }
      );
    } catch (err) {
      throw translateMongoError(err, `write ${playerId}`);
    }

    if (!updated) {
      const current = await this.read(playerId);
      storeLog('CAS miss for %s: expected %d, at %d', playerId, expectedVersion, current.version);
      throw new VersionConflictError(playerId, expectedVersion, current.version);
    }

    storeLog('Stored %s at version %d', playerId, updated.version);
    return { accepted: true, newVersion: updated.version, lastModified: updated.updatedAt };
  }

  async readMany(playerIds: readonly string[]): Promise<Map<string, ProfileSnapshot>> {
    const result = new Map<string, ProfileSnapshot>();
    if (playerIds.length === 0) return result;

    try {
      const cursor = this.collection.find(
        { _id: { $in: [...playerIds] } },
        { maxTimeMS: this.maxTimeMS }
      );
      for await (const doc of cursor) {
        result.set(doc._id, toSnapshot(doc));
      }
    } catch (err) {
      throw translateMongoError(err, 'readMany');
    }
    return result;
  }

  async count(): Promise<number> {
    try {
      return await this.collection.countDocuments({}, { maxTimeMS: this.maxTimeMS });
    } catch (err) {
      throw translateMongoError(err, 'count');
    }
  }

  async close(): Promise<void> {
    if (this.ownedClient) {
      await this.ownedClient.close();
    }
  }

  private async insertFirst(
    playerId: string,
    payload: Uint8Array,
    updatedAt: Date,
    options: WriteOptions
  ): Promise<WriteResult> {
    const doc: ProfileDocument = { _id: playerId, version: 1, payload: new Binary(payload), updatedAt };
    if (options.deviceHint !== undefined) {
      doc.deviceHint = options.deviceHint;
    }

    try {
      await this.collection.insertOne(doc);
    } catch (err) {
      if (isDuplicateKeyError(err)) {
        const current = await this.read(playerId);
        storeLog('First write for %s lost the race, store at %d', playerId, current.version);
        throw new VersionConflictError(playerId, 0, current.version);
      }
      throw translateMongoError(err, `insert ${playerId}`);
    }

    storeLog('Created %s at version 1', playerId);
    return { accepted: true, newVersion: 1, lastModified: updatedAt };
  }
}
