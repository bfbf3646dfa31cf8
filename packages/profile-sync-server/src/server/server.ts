/**
 * Fastify server setup for profile-sync-server.
 */

import Fastify, { type FastifyInstance } from 'fastify';
import fastifyCors from '@fastify/cors';
import type { VersionStore } from '@profile-sync/core';
import type { ServerConfig } from '../config/types.js';
import type { SyncMetrics } from '../metrics/index.js';
import type { SessionVerifier } from '../auth/session-verifier.js';
import { ProfileSyncService } from '../service/profile-service.js';
import { registerRoutes, snapshotForOversizedPush } from './routes.js';
import { httpLog, serverLog } from '../common/logger.js';

export interface ProfileSyncServerOptions {
  config: ServerConfig;
  /** Store override; the configured backend is opened when omitted */
  store?: VersionStore;
  sessionVerifier?: SessionVerifier;
  metrics?: SyncMetrics;
  now?: () => Date;
}

export interface ProfileSyncServer {
  app: FastifyInstance;
  service: ProfileSyncService;
  start(): Promise<string>;
  stop(): Promise<void>;
}

/**
 * Request body limit: the base64 form of the largest allowed payload plus
 * room for the JSON envelope.
 */
function bodyLimitFor(config: ServerConfig): number {
  return Math.ceil(config.sync.maxPayloadBytes / 3) * 4 + 16 * 1024;
}

export async function createProfileSyncServer(
  options: ProfileSyncServerOptions
): Promise<ProfileSyncServer> {
  const { config } = options;

  serverLog('Creating profile sync server');

  const app = Fastify({
    logger: config.logging.level === 'debug',
    bodyLimit: bodyLimitFor(config),
  });

  await app.register(fastifyCors, {
    origin: config.cors.origin,
    credentials: config.cors.credentials,
    exposedHeaders: ['Auth-Token', 'Auth-Expires', 'Retry-After'],
  });

  const service = new ProfileSyncService({
    config,
    store: options.store,
    sessionVerifier: options.sessionVerifier,
    metrics: options.metrics,
    now: options.now,
  });
  await service.initialize();

  const metrics = service.getMetrics();
  app.addHook('onResponse', async (request, reply) => {
    metrics.registry.incCounter(metrics.httpRequestsTotal, {
      method: request.method,
      status: String(reply.statusCode),
    });
  });

  app.setErrorHandler(async (error, request, reply) => {
    const status = error.statusCode !== undefined && error.statusCode >= 400 && error.statusCode < 500
      ? error.statusCode
      : 500;
    if (status === 500) {
      httpLog('Unhandled error: %O', error);
      return reply.status(500).send({
        ok: false,
        error: { code: 'INTERNAL_ERROR', message: 'Internal server error' },
      });
    }
    if (status === 413) {
      const data = await snapshotForOversizedPush(service, request, config.basePath);
      return reply.status(413).send({
        ok: false,
        error: { code: 'PAYLOAD_TOO_LARGE', message: error.message },
        ...(data ? { data } : {}),
      });
    }
    return reply.status(status).send({
      ok: false,
      error: { code: 'BAD_REQUEST', message: error.message },
    });
  });

  registerRoutes(app, service, config.basePath);
  serverLog('Routes registered at %s', config.basePath);

  const start = async () => {
    const address = await app.listen({ host: config.host, port: config.port });
    serverLog('Server listening at %s', address);
    return address;
  };

  const stop = async () => {
    serverLog('Stopping server');
    await app.close();
    await service.shutdown();
    serverLog('Server stopped');
  };

  return { app, service, start, stop };
}
