/**
 * Debug logger setup for profile-sync-server.
 */

import debug from 'debug';

const ROOT_NAMESPACE = 'profile-sync-server';

/**
 * Create a namespaced logger.
 *
 * @param namespace - Sub-namespace (e.g., 'server', 'http')
 */
export function createLogger(namespace: string): debug.Debugger {
  return debug(`${ROOT_NAMESPACE}:${namespace}`);
}

export const serverLog = createLogger('server');
export const httpLog = createLogger('http');
export const serviceLog = createLogger('service');
export const sessionLog = createLogger('session');
export const configLog = createLogger('config');
