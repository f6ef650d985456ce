import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { type Configuration } from './config.js';
import { type Logger, silentLogger } from './logger.js';
import { registerGeometryTool } from './tools/geometry.js';
import { registerCollisionTool } from './tools/collision.js';
import { registerPieceTool } from './tools/piece.js';
import { registerCatalogTool } from './tools/catalog.js';
import { registerCompareTool } from './tools/compare.js';

export const SERVER_NAME = 'tangram-kernel';
export const SERVER_VERSION = '1.0.0';

/**
 * Builds an MCP server exposing the kernel's tools. Nothing is connected yet.
 */
export function createServer(config: Configuration, logger: Logger = silentLogger): McpServer {
  const server = new McpServer({
    name: SERVER_NAME,
    version: SERVER_VERSION,
  });

  registerGeometryTool(server, config, logger);
  registerCollisionTool(server, config, logger);
  registerPieceTool(server, config, logger);
  registerCatalogTool(server, config, logger);
  registerCompareTool(server, logger);

  return server;
}
