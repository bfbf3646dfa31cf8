/**
 * HTTP client for the profile sync server.
 *
 * Features:
 * - Token or session-server authentication
 * - Fetch-rebase-retry on version conflicts
 * - Exponential backoff while the server reports itself unavailable
 */

import debug from 'debug';
import type {
  FetchFunction,
  LocalProfile,
  ProfileSyncClientOptions,
  PushOutcome,
  RebaseFunction,
  RemoteProfile,
  SessionToken,
  SyncEvent,
} from './types.js';

const log = debug('profile-sync-client');

const DEFAULT_MAX_ATTEMPTS = 5;
const DEFAULT_RETRY_DELAY_MS = 500;
const DEFAULT_MAX_RETRY_DELAY_MS = 8000;

/**
 * A response the client could not turn into an outcome.
 */
export class ProfileSyncClientError extends Error {
  constructor(
    message: string,
    public readonly status: number,
    public readonly code: string
  ) {
    super(message);
    this.name = 'ProfileSyncClientError';
  }
}

interface Envelope {
  ok: boolean;
  data?: unknown;
  error?: { code: string; message: string };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toEnvelope(value: unknown): Envelope | undefined {
  if (!isRecord(value) || typeof value.ok !== 'boolean') return undefined;
  const envelope: Envelope = { ok: value.ok, data: value.data };
  const error = value.error;
  if (isRecord(error) && typeof error.code === 'string' && typeof error.message === 'string') {
    envelope.error = { code: error.code, message: error.message };
  }
  return envelope;
}

function toProfile(value: unknown): RemoteProfile | undefined {
  if (!isRecord(value) || typeof value.version !== 'number' || typeof value.payload !== 'string') {
    return undefined;
  }
  return { version: value.version, payload: new Uint8Array(Buffer.from(value.payload, 'base64')) };
}

const defaultSleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

export class ProfileSyncClient {
  private readonly baseUrl: string;
  private readonly deviceHint: string | undefined;
  private readonly maxAttempts: number;
  private readonly retryDelayMs: number;
  private readonly maxRetryDelayMs: number;
  private readonly onSyncEvent: ((event: SyncEvent) => void) | undefined;
  private readonly fetchImpl: FetchFunction;
  private readonly sleep: (ms: number) => Promise<void>;
  private currentToken: string | undefined;

  constructor(options: ProfileSyncClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.currentToken = options.token;
    this.deviceHint = options.deviceHint;
    this.maxAttempts = Math.max(1, options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS);
    this.retryDelayMs = options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS;
    this.maxRetryDelayMs = options.maxRetryDelayMs ?? DEFAULT_MAX_RETRY_DELAY_MS;
    this.onSyncEvent = options.onSyncEvent;
    this.fetchImpl = options.fetch ?? fetch;
    this.sleep = options.sleep ?? defaultSleep;
  }

  /** Token sent with authenticated requests */
  get token(): string | undefined {
    return this.currentToken;
  }

  setToken(token: string | undefined): void {
    this.currentToken = token;
  }

  /**
   * Exchange a session-server join for a sync token and keep it for later requests.
   */
  async authenticate(username: string, serverId: string): Promise<SessionToken> {
    const query = new URLSearchParams({ serverId, username });
    const { status, envelope } = await this.request('GET', `/auth?${query.toString()}`);

    const data = envelope?.data;
    if (status !== 200 || !envelope?.ok || !isRecord(data)) {
      throw this.errorFor(status, envelope);
    }
    const { token, account, expires } = data;
    if (typeof token !== 'string' || typeof account !== 'string' || typeof expires !== 'string') {
      throw new ProfileSyncClientError('Malformed authentication response', status, 'BAD_RESPONSE');
    }

    this.currentToken = token;
    log('Authenticated %s as %s until %s', username, account, expires);
    return { token, playerId: account, expiresAt: new Date(expires) };
  }

  /**
   * Current server copy; version 0 with an empty payload for a new player.
   */
  async fetchProfile(playerId: string): Promise<RemoteProfile> {
    const { status, envelope } = await this.request('GET', `/${encodeURIComponent(playerId)}`);
    const profile = envelope?.ok ? toProfile(envelope.data) : undefined;
    if (status !== 200 || !profile) {
      throw this.errorFor(status, envelope);
    }
    return profile;
  }

  /**
   * Push once. Every server decision is returned as an outcome; only
   * unexpected responses throw.
   */
  async pushProfile(playerId: string, local: LocalProfile): Promise<PushOutcome> {
    const body = {
      baseVersion: local.baseVersion,
      payload: Buffer.from(local.payload).toString('base64'),
      ...(this.deviceHint !== undefined ? { deviceHint: this.deviceHint } : {}),
    };
    const { status, envelope } = await this.request('POST', `/${encodeURIComponent(playerId)}`, body);
    const profile = toProfile(envelope?.data);
    const message = envelope?.error?.message ?? `HTTP ${status}`;

    switch (status) {
      case 200:
        if (profile) return { status: 'accepted', profile };
        break;
      case 409:
        if (profile) return { status: 'conflict', profile, message };
        break;
      case 422:
        return { status: 'invalid', profile, message };
      case 413:
        return { status: 'too_large', profile, message };
      case 401:
        return { status: 'unauthorized', message };
      case 403:
        return { status: 'forbidden', message };
      case 503:
        return { status: 'unavailable', message };
    }
    throw this.errorFor(status, envelope);
  }

  /**
   * Push a local edit, rebasing onto the server copy after each conflict and
   * backing off while the server is unavailable. Returns the last outcome.
   */
  async sync(playerId: string, local: LocalProfile, rebase: RebaseFunction): Promise<PushOutcome> {
    let current = local;
    let attempt = 1;
    let outages = 0;
    let outcome = await this.pushProfile(playerId, current);

    while (true) {
      if (outcome.status === 'accepted') {
        this.emit({ type: 'accepted', playerId, attempt, message: `Stored version ${outcome.profile.version}` });
        return outcome;
      }
      if (outcome.status !== 'conflict' && outcome.status !== 'unavailable') {
        return outcome;
      }
      if (attempt >= this.maxAttempts) {
        this.emit({ type: 'gave-up', playerId, attempt, message: outcome.message });
        return outcome;
      }

      if (outcome.status === 'conflict') {
        this.emit({ type: 'conflict', playerId, attempt, message: outcome.message });
        current = {
          baseVersion: outcome.profile.version,
          payload: await rebase(outcome.profile, current.payload),
        };
      } else {
        // Exponential backoff: 500ms, 1s, 2s, ... up to max
        const delay = Math.min(this.retryDelayMs * 2 ** outages, this.maxRetryDelayMs);
        outages++;
        this.emit({ type: 'retry', playerId, attempt, message: `Retrying in ${delay}ms: ${outcome.message}` });
        await this.sleep(delay);
      }

      attempt++;
      outcome = await this.pushProfile(playerId, current);
    }
  }

  private async request(
    method: 'GET' | 'POST',
    path: string,
    body?: object
  ): Promise<{ status: number; envelope: Envelope | undefined }> {
    const headers: Record<string, string> = {};
    if (this.currentToken) headers.authorization = `Bearer ${this.currentToken}`;
    if (body) headers['content-type'] = 'application/json';

    log('%s %s', method, path);
    const response = await this.fetchImpl(`${this.baseUrl}${path}`, {
      method,
      headers,
      body: body ? JSON.stringify(body) : undefined,
    });

    const text = await response.text();
    let parsed: unknown;
    try {
      parsed = text ? JSON.parse(text) : undefined;
    } catch {
      log('Non-JSON response (%d) for %s %s', response.status, method, path);
      parsed = undefined;
    }
    return { status: response.status, envelope: toEnvelope(parsed) };
  }

  private errorFor(status: number, envelope: Envelope | undefined): ProfileSyncClientError {
    const code = envelope?.error?.code ?? 'UNEXPECTED_RESPONSE';
    const message = envelope?.error?.message ?? `Unexpected response status ${status}`;
    return new ProfileSyncClientError(message, status, code);
  }

  private emit(event: SyncEvent): void {
    log('%s %s (attempt %d): %s', event.type, event.playerId, event.attempt, event.message);
    this.onSyncEvent?.(event);
  }
}
