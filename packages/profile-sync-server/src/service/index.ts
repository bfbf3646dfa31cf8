/**
 * Service module exports.
 */

export {
  ProfileSyncService,
  type ProfileSyncServiceOptions,
} from './profile-service.js';

export { openVersionStore } from './store-factory.js';

export type {
  PushCredentials,
  PushInput,
  PushResponse,
  SyncStats,
  ServiceStatus,
  BulkQueryResult,
} from './types.js';
