import { Router } from 'express';
import type { IMessageStore } from '../store/index.js';

export function healthRouter(store: IMessageStore): Router {
  const router = Router();

  router.get('/health', async (_req, res, next) => {
    try {
      const stats = await store.stats();
      res.json({ status: 'ok', uptime: process.uptime(), ...stats });
    } catch (err) {
      next(err);
    }
  });

  router.get('/healthz', (_req, res) => {
    res.type('text/plain').send('ok');
  });

  return router;
}
