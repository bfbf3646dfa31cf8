/**
 * Debug logger setup for profile-sync.
 *
 * Uses the 'debug' library for configurable, namespace-based logging.
 */

import debug from 'debug';

const ROOT_NAMESPACE = 'profile-sync';

/**
 * Create a namespaced logger.
 *
 * @param namespace - Sub-namespace (e.g., 'store', 'coordinator')
 */
export function createLogger(namespace: string): debug.Debugger {
  return debug(`${ROOT_NAMESPACE}:${namespace}`);
}

export const coordinatorLog = createLogger('coordinator');
export const storeLog = createLogger('store');
export const authLog = createLogger('auth');
