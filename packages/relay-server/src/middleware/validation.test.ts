import { describe, it, expect } from 'vitest';
import { messagesQuerySchema } from './validation.js';

describe('messagesQuerySchema', () => {
  it('applies the default limit and leaves since_id unset', () => {
    expect(messagesQuerySchema.parse({ target: 'proj-x' })).toEqual({ target: 'proj-x', limit: 200 });
  });

  it('coerces numeric strings', () => {
    expect(messagesQuerySchema.parse({ target: 'proj-x', since_id: '12', limit: '5' })).toEqual({
      target: 'proj-x',
      since_id: 12,
      limit: 5,
    });
  });

  it('clamps limit into 1..500', () => {
    expect(messagesQuerySchema.parse({ limit: '0' }).limit).toBe(1);
    expect(messagesQuerySchema.parse({ limit: '9000' }).limit).toBe(500);
  });

  it('rejects a negative since_id', () => {
    expect(messagesQuerySchema.safeParse({ since_id: '-1' }).success).toBe(false);
  });

  it('rejects a non-numeric limit', () => {
    expect(messagesQuerySchema.safeParse({ limit: 'lots' }).success).toBe(false);
  });

  it('rejects an empty target', () => {
    expect(messagesQuerySchema.safeParse({ target: '' }).success).toBe(false);
  });

  it('allows the target to be omitted', () => {
    expect(messagesQuerySchema.safeParse({}).success).toBe(true);
  });
});
