import { z } from 'zod';
import type { Request, Response, NextFunction } from 'express';

export const DEFAULT_PAGE_LIMIT = 200;
export const MAX_PAGE_LIMIT = 500;

// Query strings arrive as strings; coerce before range checks.
export const messagesQuerySchema = z.object({
  target: z.string().min(1).optional(),
  since_id: z.coerce.number().int().min(0).optional(),
  limit: z.coerce
    .number()
    .int()
    .default(DEFAULT_PAGE_LIMIT)
    .transform((n) => Math.max(1, Math.min(n, MAX_PAGE_LIMIT))),
});

export type MessagesQuery = z.infer<typeof messagesQuerySchema>;

/** Validates `req.query`, leaving the parsed value in `res.locals.query`. */
export function validateQuery(schema: z.ZodSchema) {
  return (req: Request, res: Response, next: NextFunction): void => {
    const result = schema.safeParse(req.query);
    if (!result.success) {
      res.status(400).json({ error: 'Validation failed', details: result.error.flatten() });
      return;
    }
    res.locals['query'] = result.data;
    next();
  };
}
