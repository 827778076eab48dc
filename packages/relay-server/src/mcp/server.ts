import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { IMessageStore } from '../store/index.js';
import type { Logger } from '../logger.js';
import { registerTools } from './tools.js';

export function createRelayMcpServer(store: IMessageStore, logger: Logger): McpServer {
  const server = new McpServer({
    name: 'agent-relay',
    version: '0.1.0',
  });

  registerTools(server, store, logger);
  return server;
}
