#!/usr/bin/env node

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';

import { loadConfig } from './config.js';
import { createServer } from './server.js';
import { createLogger } from './utils/logger.js';

// ---------------------------------------------------------------------------
// Server
// ---------------------------------------------------------------------------

const config = loadConfig();
const logger = createLogger(config.logLevel);
const server: Server = createServer(config, logger);

// ---------------------------------------------------------------------------
// Start
// ---------------------------------------------------------------------------

async function main(): Promise<void> {
  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info(`Server started on stdio (date-only strings as UTC: ${config.dateOnlyAsUtc})`);
}

async function shutdown(signal: string): Promise<void> {
  logger.info(`Shutting down (${signal})...`);
  await server.close();
  process.exit(0);
}

process.on('SIGINT', () => {
  shutdown('SIGINT').catch((error: unknown) => {
    logger.error('Shutdown failed:', error);
    process.exit(1);
  });
});

process.on('SIGTERM', () => {
  shutdown('SIGTERM').catch((error: unknown) => {
    logger.error('Shutdown failed:', error);
    process.exit(1);
  });
});

main().catch((error: unknown) => {
  logger.error('Fatal error:', error);
  process.exit(1);
});
