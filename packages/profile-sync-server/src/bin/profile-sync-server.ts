#!/usr/bin/env node
/**
 * CLI entry point for profile-sync-server.
 */

import 'dotenv/config';
import { Command } from 'commander';
import debug from 'debug';
import {
  loadConfig,
  parseCorsOrigin,
  parseStoreBackend,
  type PartialServerConfig,
} from '../config/index.js';
import { createSyncMetrics, defaultRegistry } from '../metrics/index.js';
import { createProfileSyncServer } from '../server/server.js';

interface CliOptions {
  config?: string;
  host?: string;
  port?: number;
  basePath?: string;
  store?: string;
  mongoUrl?: string;
  corsOrigin?: string;
  debug?: string;
}

function parsePort(value: string): number {
  const port = Number(value);
  if (!Number.isSafeInteger(port)) {
    throw new Error(`Invalid port: ${value}`);
  }
  return port;
}

const program = new Command();

program
  .name('profile-sync-server')
  .description('Versioned player-profile sync server')
  .version('0.1.0')
  .option('-c, --config <path>', 'Path to config file (JSON)')
  .option('-H, --host <host>', 'Host to bind to')
  .option('-p, --port <port>', 'Port to listen on', parsePort)
  .option('-b, --base-path <path>', 'Base path for all routes')
  .option('-s, --store <backend>', 'Version store backend: memory or mongodb')
  .option('--mongo-url <url>', 'MongoDB connection string')
  .option('--cors-origin <origins>', 'CORS allowed origins (comma-separated, or "true"/"false")')
  .option('--debug <namespaces>', 'Debug namespaces (e.g., "profile-sync*")')
  .action(async (options: CliOptions) => {
    if (options.debug) {
      debug.enable(options.debug);
    }

    const overrides: PartialServerConfig = {};
    if (options.host) overrides.host = options.host;
    if (options.port !== undefined) overrides.port = options.port;
    if (options.basePath) overrides.basePath = options.basePath;
    if (options.corsOrigin) overrides.cors = { origin: parseCorsOrigin(options.corsOrigin) };
    if (options.store || options.mongoUrl) {
      overrides.store = {};
      if (options.store) overrides.store.backend = parseStoreBackend(options.store);
      if (options.mongoUrl) overrides.store.mongoUrl = options.mongoUrl;
    }

    try {
      const config = loadConfig({ configPath: options.config, overrides });
      if (config.logging.namespaces && !options.debug) {
        debug.enable(config.logging.namespaces);
      }

      console.log('Starting profile-sync-server...');
      console.log(`  Host: ${config.host}`);
      console.log(`  Port: ${config.port}`);
      console.log(`  Base path: ${config.basePath}`);
      console.log(`  Store: ${config.store.backend}`);

      const server = await createProfileSyncServer({
        config,
        metrics: createSyncMetrics(defaultRegistry),
      });

      const shutdown = async () => {
        console.log('\nShutting down...');
        try {
          await server.stop();
          process.exit(0);
        } catch (err) {
          console.error('Failed to shut down cleanly:', err);
          process.exit(1);
        }
      };

      process.on('SIGINT', () => void shutdown());
      process.on('SIGTERM', () => void shutdown());

      const address = await server.start();
      console.log(`Profile sync server listening at ${address}${config.basePath}`);
    } catch (err) {
      console.error('Failed to start server:', err);
      process.exit(1);
    }
  });

await program.parseAsync();
