import { describe, it, expect, vi } from 'vitest';
import type { Request, Response, NextFunction } from 'express';
import type { Logger } from '../logger.js';
import { requestLogger } from './request-logger.js';

function createMockRes(): Response {
  const listeners: Record<string, (() => void)[]> = {};
  return {
    statusCode: 200,
    on(event: string, cb: () => void) {
      (listeners[event] ??= []).push(cb);
      return this;
    },
    emit(event: string) {
      listeners[event]?.forEach((cb) => cb());
    },
  } as unknown as Response;
}

describe('requestLogger', () => {
  it('calls next immediately and logs only once the response finishes', () => {
    const logger = { debug: vi.fn() } as unknown as Logger;
    const next: NextFunction = vi.fn();
    const res = createMockRes();
    res.statusCode = 404;

    requestLogger(logger)({ method: 'GET', path: '/api/messages' } as Request, res, next);
    expect(next).toHaveBeenCalledOnce();
    expect(logger.debug).not.toHaveBeenCalled();

    res.emit('finish');

    expect(logger.debug).toHaveBeenCalledOnce();
    const [fields, msg] = vi.mocked(logger.debug).mock.calls[0] as unknown as [Record<string, unknown>, string];
    expect(msg).toBe('request');
    expect(fields).toMatchObject({ method: 'GET', path: '/api/messages', status: 404 });
    expect(typeof fields['ms']).toBe('number');
  });
});
