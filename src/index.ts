#!/usr/bin/env node
// Loaded first so the logger sees .env settings when it reads its config
import 'dotenv/config';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';

import { closeStores, createStores } from './backends/index.js';
import { loadBackendConfig, sanitizeConnectionString } from './config/backend.js';
import { createSqlBridgeServer } from './server/SqlBridgeServer.js';
import { logger } from './utils/logger.js';

async function main(): Promise<void> {
  const backend = loadBackendConfig();
  const stores = createStores(backend);

  logger.info('backends configured', {
    mongo: sanitizeConnectionString(backend.mongoUri),
    postgres: sanitizeConnectionString(backend.postgresUri),
  });

  const server = createSqlBridgeServer({ ...stores, backend });

  const shutdown = (signal: string) => {
    logger.info(`received ${signal}, shutting down`);
    server
      .close()
      .then(() => closeStores(stores))
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error('shutdown failed', { error });
        process.exit(1);
      });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  await server.connect(new StdioServerTransport());
  logger.info('sqlbridge MCP server running on stdio');
}

main().catch((error: unknown) => {
  logger.error('fatal startup error', { error });
  process.exit(1);
});
