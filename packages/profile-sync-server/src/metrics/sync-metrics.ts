/**
 * Profile sync metric definitions.
 */

import { MetricsRegistry } from './registry.js';
import { PAYLOAD_SIZE_BUCKETS } from './types.js';

/**
 * Create profile sync metrics on a registry (a fresh one when omitted).
 */
export function createSyncMetrics(registry: MetricsRegistry = new MetricsRegistry()) {
  // HTTP
  const httpRequestsTotal = registry.registerCounter(
    'sync_http_requests_total',
    'Total HTTP requests by method and status'
  );

  // Push / fetch outcomes
  const pushOutcomesTotal = registry.registerCounter(
    'sync_push_outcomes_total',
    'Profile pushes by outcome'
  );

  const fetchOutcomesTotal = registry.registerCounter(
    'sync_fetch_outcomes_total',
    'Profile fetches by outcome'
  );

  const commitRetriesTotal = registry.registerCounter(
    'sync_commit_retries_total',
    'Compare-and-swap races retried by the coordinator'
  );

  const pushDuration = registry.registerHistogram(
    'sync_push_duration_seconds',
    'Time to process a profile push'
  );

  const pushPayloadBytes = registry.registerHistogram(
    'sync_push_payload_bytes',
    'Size of pushed profile payloads',
    PAYLOAD_SIZE_BUCKETS
  );

  const bulkQueriesTotal = registry.registerCounter(
    'sync_bulk_queries_total',
    'Total bulk profile queries'
  );

  // Auth
  const authAttemptsTotal = registry.registerCounter(
    'sync_auth_attempts_total',
    'Session-server authentication attempts'
  );

  const authFailuresTotal = registry.registerCounter(
    'sync_auth_failures_total',
    'Session-server authentication failures by reason'
  );

  const tokensIssuedTotal = registry.registerCounter(
    'sync_tokens_issued_total',
    'Sync tokens issued after session-server verification'
  );

  return {
    httpRequestsTotal,
    pushOutcomesTotal,
    fetchOutcomesTotal,
    commitRetriesTotal,
    pushDuration,
    pushPayloadBytes,
    bulkQueriesTotal,
    authAttemptsTotal,
    authFailuresTotal,
    tokensIssuedTotal,
    registry,
  };
}

export type SyncMetrics = ReturnType<typeof createSyncMetrics>;
