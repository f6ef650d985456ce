#!/usr/bin/env node
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { loadConfiguration } from './config.js';
import { createConsoleLogger, parseLogLevel } from './logger.js';
import { validateCatalog } from './algorithms/shape-catalog.js';
import { createServer } from './server.js';

async function main() {
  const level = parseLogLevel(process.env.TANGRAM_LOG_LEVEL);
  const logger = createConsoleLogger(level, 'SERVER');
  const config = loadConfiguration(process.env);

  const catalog = validateCatalog(config.unit);
  if (!catalog.ok) {
    throw catalog.error;
  }

  const server = createServer(config, createConsoleLogger(level, 'GEOMETRY'));
  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info('Tangram kernel MCP server running on stdio', { unit: config.unit });
}

main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
