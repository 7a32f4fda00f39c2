import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { registerConvertTool } from './tools/convert.js';

export const SERVER_NAME = 'svg-path-lottie';
export const SERVER_VERSION = '1.0.0';

export function createServer(): McpServer {
  const server = new McpServer({
    name: SERVER_NAME,
    version: SERVER_VERSION,
  });

  registerConvertTool(server);

  return server;
}
