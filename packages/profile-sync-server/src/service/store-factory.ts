/**
 * Opens the configured VersionStore backend.
 */

import { InMemoryVersionStore, MongoVersionStore, type VersionStore } from '@profile-sync/core';
import type { StoreConfig } from '../config/types.js';
import { serviceLog } from '../common/logger.js';

export async function openVersionStore(config: StoreConfig): Promise<VersionStore> {
  switch (config.backend) {
    case 'memory':
      serviceLog('Using in-memory version store; profiles are lost on restart');
      return new InMemoryVersionStore();
    case 'mongodb':
      return MongoVersionStore.connect({
        url: config.mongoUrl,
        database: config.database,
        collection: config.collection,
        timeoutMs: config.timeoutMs,
      });
  }
}
