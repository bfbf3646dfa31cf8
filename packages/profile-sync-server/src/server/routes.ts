/**
 * HTTP routes for profile sync.
 */

import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { InvalidRequestError, ProfileSyncError, type IssuedToken } from '@profile-sync/core';
import type { ProfileSyncService } from '../service/profile-service.js';
import type { PushCredentials } from '../service/types.js';
import { AuthServerError, SessionAuthError } from '../auth/session-verifier.js';
import { httpLog } from '../common/logger.js';
import {
  codeForOutcome,
  formatExpiry,
  parsePlayerId,
  parsePushBody,
  statusForOutcome,
  toWireSnapshot,
  type WireSnapshot,
} from './wire.js';

interface PlayerParams {
  playerId: string;
}

interface AuthQuery {
  serverId?: string;
  username?: string;
}

const ERROR_STATUS: Record<string, number> = {
  UNAUTHORIZED: 401,
  VERSION_CONFLICT: 409,
  INVALID_VERSION: 422,
  STORE_UNAVAILABLE: 503,
  PAYLOAD_TOO_LARGE: 413,
  INVALID_REQUEST: 400,
};

function headerValue(request: FastifyRequest, name: string): string | undefined {
  const value = request.headers[name];
  const first = Array.isArray(value) ? value[0] : value;
  return first ? first : undefined;
}

/**
 * Bearer token from `Authorization`, falling back to an `Auth-Token` header.
 */
function requestToken(request: FastifyRequest): string | undefined {
  const authorization = headerValue(request, 'authorization');
  if (authorization?.startsWith('Bearer ')) {
    return authorization.slice(7).trim() || undefined;
  }
  return headerValue(request, 'auth-token');
}

function setIssuedHeaders(reply: FastifyReply, issued: IssuedToken): void {
  reply.header('Auth-Token', issued.token);
  reply.header('Auth-Expires', formatExpiry(issued.expiresAt));
}

/**
 * Current snapshot for a push refused by the body limit, when the request
 * targets the player route with a token valid for that player.
 */
export async function snapshotForOversizedPush(
  service: ProfileSyncService,
  request: FastifyRequest,
  basePath: string
): Promise<WireSnapshot | undefined> {
  if (request.method !== 'POST' || request.routeOptions.url !== `${basePath}/:playerId`) {
    return undefined;
  }
  const params = request.params;
  if (typeof params !== 'object' || params === null || !('playerId' in params) || typeof params.playerId !== 'string') {
    return undefined;
  }

  let playerId: string;
  try {
    playerId = parsePlayerId(params.playerId);
  } catch (err) {
    if (err instanceof InvalidRequestError) return undefined;
    throw err;
  }
  const snapshot = await service.rejectOversizedPush(playerId, requestToken(request));
  return snapshot ? toWireSnapshot(snapshot) : undefined;
}

/**
 * Register profile sync routes.
 */
export function registerRoutes(
  app: FastifyInstance,
  service: ProfileSyncService,
  basePath: string
): void {
  const errorResponse = (
    reply: FastifyReply,
    code: string,
    message: string,
    status = 400,
    data?: WireSnapshot
  ) => {
    return reply.status(status).send({
      ok: false,
      error: { code, message },
      ...(data ? { data } : {}),
    });
  };

  // Known failures become error bodies; anything else goes to the error handler
  const sendError = (reply: FastifyReply, err: unknown, invalidRequestStatus = 400) => {
    if (err instanceof SessionAuthError) {
      const code = err instanceof AuthServerError ? 'AUTH_SERVER_ERROR' : 'INVALID_AUTHENTICATION';
      return errorResponse(reply, code, err.message, err.statusCode);
    }
    if (err instanceof ProfileSyncError) {
      const status = err instanceof InvalidRequestError ? invalidRequestStatus : ERROR_STATUS[err.code] ?? 500;
      if (status === 503) reply.header('Retry-After', '1');
      return errorResponse(reply, err.code, err.message, status);
    }
    throw err;
  };

  // GET /status - Health check
  app.get(`${basePath}/status`, async (_request, reply) => {
    httpLog('GET %s/status', basePath);
    return reply.send({ ok: true, data: service.getStatus() });
  });

  // GET /metrics - Prometheus metrics
  app.get(`${basePath}/metrics`, async (_request, reply) => {
    httpLog('GET %s/metrics', basePath);
    return reply
      .header('Content-Type', 'text/plain; version=0.0.4; charset=utf-8')
      .send(service.getMetrics().registry.format());
  });

  // GET /stats - Number of synced players
  app.get(`${basePath}/stats`, async (_request, reply) => {
    httpLog('GET %s/stats', basePath);
    try {
      const stats = await service.getStats();
      return reply.send({
        ok: true,
        data: { syncedUsers: stats.syncedUsers, timestamp: stats.timestamp.toISOString() },
      });
    } catch (err) {
      return sendError(reply, err);
    }
  });

  // GET /auth - Exchange a session-server join for a sync token
  app.get<{ Querystring: AuthQuery }>(`${basePath}/auth`, async (request, reply) => {
    httpLog('GET %s/auth', basePath);
    const { serverId, username } = request.query;
    if (!serverId || !username) {
      return errorResponse(reply, 'INVALID_REQUEST', 'serverId and username are required', 422);
    }

    try {
      const issued = await service.authenticateSession(username, serverId);
      setIssuedHeaders(reply, issued);
      return reply.send({
        ok: true,
        data: { token: issued.token, account: issued.playerId, expires: formatExpiry(issued.expiresAt) },
      });
    } catch (err) {
      return sendError(reply, err);
    }
  });

  // POST /bulk-query - Unauthenticated read of several profiles
  app.post<{ Body: unknown }>(`${basePath}/bulk-query`, async (request, reply) => {
    httpLog('POST %s/bulk-query', basePath);
    const body = request.body;
    if (!Array.isArray(body) || !body.every((id): id is string => typeof id === 'string')) {
      return errorResponse(reply, 'INVALID_REQUEST', 'Request body must be an array of player IDs');
    }

    try {
      const playerIds = body.map(parsePlayerId);
      const profiles = await service.bulkQuery(playerIds);
      const users: Record<string, WireSnapshot> = {};
      for (const [playerId, snapshot] of profiles) {
        users[playerId] = toWireSnapshot(snapshot);
      }
      return reply.send({ ok: true, data: { users } });
    } catch (err) {
      return sendError(reply, err);
    }
  });

  // GET /:playerId - Authenticated read of one profile
  app.get<{ Params: PlayerParams }>(`${basePath}/:playerId`, async (request, reply) => {
    httpLog('GET %s/%s', basePath, request.params.playerId);

    try {
      const playerId = parsePlayerId(request.params.playerId);
      const result = await service.fetch(playerId, requestToken(request));
      switch (result.outcome) {
        case 'ok':
          return reply.send({ ok: true, data: toWireSnapshot(result.snapshot) });
        case 'unauthorized':
          return errorResponse(reply, 'UNAUTHORIZED', result.reason, 401);
        case 'unavailable':
          reply.header('Retry-After', '1');
          return errorResponse(reply, 'STORE_UNAVAILABLE', result.reason, 503);
      }
    } catch (err) {
      return sendError(reply, err, 422);
    }
  });

  // POST /:playerId - Push a profile against a base version
  app.post<{ Params: PlayerParams; Body: unknown }>(`${basePath}/:playerId`, async (request, reply) => {
    httpLog('POST %s/%s', basePath, request.params.playerId);

    try {
      const playerId = parsePlayerId(request.params.playerId);
      const body = parsePushBody(request.body);
      const credentials: PushCredentials = {
        token: requestToken(request),
        username: headerValue(request, 'moj-auth-username'),
        serverId: headerValue(request, 'moj-auth-server'),
      };

      const { result, issued, presented } = await service.push({
        playerId,
        credentials,
        baseVersion: body.baseVersion,
        payload: body.payload,
        deviceHint: body.deviceHint,
      });

      if (issued) setIssuedHeaders(reply, issued);

      if (result.outcome === 'accepted') {
        if (!issued && presented) setIssuedHeaders(reply, presented);
        return reply.send({ ok: true, data: toWireSnapshot(result.snapshot) });
      }

      const status = statusForOutcome(result.outcome);
      if (status === 503) reply.header('Retry-After', '1');
      const snapshot = 'snapshot' in result && result.snapshot ? toWireSnapshot(result.snapshot) : undefined;
      return errorResponse(reply, codeForOutcome(result.outcome), result.reason, status, snapshot);
    } catch (err) {
      return sendError(reply, err, 422);
    }
  });
}
