/**
 * Server module exports.
 */

export {
  createProfileSyncServer,
  type ProfileSyncServerOptions,
  type ProfileSyncServer,
} from './server.js';

export { registerRoutes } from './routes.js';

export {
  type WireSnapshot,
  type PushBody,
  encodePayload,
  decodePayload,
  toWireSnapshot,
  parsePlayerId,
  parsePushBody,
  formatExpiry,
} from './wire.js';
