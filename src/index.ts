#!/usr/bin/env node
// Loaded before anything else so the logger sees .env settings
import 'dotenv/config';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';

import { createCatalogServer } from './server/CatalogServer.js';
import { logger } from './utils/logger.js';

async function main(): Promise<void> {
  const server = createCatalogServer();
  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info('Catalog filter MCP server listening on stdio');
}

main().catch((error: unknown) => {
  logger.error('Server failed to start', { error });
  process.exit(1);
});
