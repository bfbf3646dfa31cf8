/**
 * Store module exports.
 */

export {
  type VersionStore,
  type WriteOptions,
  type WriteResult,
} from './version-store.js';

export {
  type InMemoryVersionStoreOptions,
  InMemoryVersionStore,
} from './memory-store.js';

export {
  type ProfileDocument,
  type ProfileUpdate,
  type ProfileCollection,
  type MongoVersionStoreOptions,
  type MongoConnectOptions,
  MongoVersionStore,
  isDuplicateKeyError,
  translateMongoError,
} from './mongo-store.js';
