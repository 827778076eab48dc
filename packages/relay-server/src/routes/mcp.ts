import { Router } from 'express';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import type { IMessageStore } from '../store/index.js';
import type { Logger } from '../logger.js';
import { createRelayMcpServer } from '../mcp/server.js';

const methodNotAllowed = {
  jsonrpc: '2.0',
  error: { code: -32000, message: 'Method not allowed.' },
  id: null,
};

/**
 * Stateless Streamable HTTP endpoint: every POST gets its own MCP server and
 * transport bound to the shared store, answered with a plain JSON response.
 */
export function mcpRouter(store: IMessageStore, logger: Logger): Router {
  const router = Router();

  router.post('/', async (req, res, next) => {
    const server = createRelayMcpServer(store, logger);
    const transport = new StreamableHTTPServerTransport({
      sessionIdGenerator: undefined,
      enableJsonResponse: true,
    });

    res.on('close', () => {
      Promise.all([transport.close(), server.close()]).catch((err: unknown) => {
        logger.warn({ error: err }, 'failed to close MCP transport');
      });
    });

    try {
      await server.connect(transport);
      await transport.handleRequest(req, res, req.body);
    } catch (err) {
      next(err);
    }
  });

  // No server-initiated streams or sessions in stateless mode
  router.get('/', (_req, res) => {
    res.status(405).json(methodNotAllowed);
  });
  router.delete('/', (_req, res) => {
    res.status(405).json(methodNotAllowed);
  });

  return router;
}
