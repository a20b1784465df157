import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { registerSceneTool } from './tools/scene.js';
import { registerHitboxTool } from './tools/hitbox.js';
import { registerCollisionTool } from './tools/collision.js';

/**
 * Builds the MCP server with every tool registered.
 */
export function createServer(): McpServer {
  const server = new McpServer({
    name: 'hitboxmcp',
    version: '1.0.0',
  });

  registerSceneTool(server);
  registerHitboxTool(server);
  registerCollisionTool(server);

  return server;
}
