import { Router } from 'express';
import type { IMessageStore } from '../store/index.js';
import { validateQuery, messagesQuerySchema, type MessagesQuery } from '../middleware/validation.js';
import { toWireMessage } from '../types.js';

export interface ApiRouterOptions {
  /** Channel shown when the query names none. */
  defaultTarget: string;
}

export function apiRouter(store: IMessageStore, opts: ApiRouterOptions): Router {
  const router = Router();

  // GET /api/messages — read-only polling; never creates a channel
  router.get('/messages', validateQuery(messagesQuerySchema), async (_req, res, next) => {
    const { target = opts.defaultTarget, since_id, limit } = res.locals['query'] as MessagesQuery;

    try {
      // Without a cursor the page wants the tail of the channel; with one, the next unseen batch.
      const messages =
        since_id === undefined
          ? await store.fetchMessages(target, { limit, window: 'latest' })
          : await store.fetchMessages(target, { sinceId: since_id, limit });

      res.json({
        target,
        messages: messages.map(toWireMessage),
        latest_id: messages.at(-1)?.id ?? since_id ?? 0,
      });
    } catch (err) {
      next(err);
    }
  });

  router.get('/channels', async (_req, res, next) => {
    try {
      res.json({ channels: await store.listChannels() });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
