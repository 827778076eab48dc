import express from 'express';
import cors from 'cors';
import type { IMessageStore } from './store/index.js';
import type { Logger } from './logger.js';
import { requestLogger } from './middleware/request-logger.js';
import { errorHandler } from './middleware/error-handler.js';
import { apiRouter } from './routes/api.js';
import { healthRouter } from './routes/health.js';
import { homeRouter } from './routes/home.js';
import { mcpRouter } from './routes/mcp.js';

export interface AppOptions {
  store: IMessageStore;
  logger: Logger;
  mcpPath: string;
  corsOrigins: string;
  /** Channel the polling API and page fall back to when no target is given. */
  defaultTarget: string;
}

export function createApp(opts: AppOptions): express.Express {
  const { store, logger, corsOrigins } = opts;
  const app = express();

  app.use(cors({ origin: corsOrigins === '*' ? '*' : corsOrigins.split(',').map((o) => o.trim()) }));
  app.use(express.json({ limit: '4mb' }));
  app.use(requestLogger(logger));

  app.use('/', homeRouter(opts.mcpPath));
  app.use('/', healthRouter(store));
  app.use('/api', apiRouter(store, { defaultTarget: opts.defaultTarget }));
  app.use(opts.mcpPath, mcpRouter(store, logger));

  app.use((_req, res) => {
    res.status(404).json({ error: 'Not found' });
  });

  app.use(errorHandler(logger));

  return app;
}
