import { describe, it, expect } from 'vitest';
import { ZodError } from 'zod';
import { resolvePollerSettings } from './config.js';

describe('resolvePollerSettings', () => {
  const required = { RELAY_URL: 'http://127.0.0.1:8010', LASTFILE: '/tmp/relay-last' };

  it('applies defaults for target and interval', () => {
    expect(resolvePollerSettings(required)).toEqual({
      relayUrl: 'http://127.0.0.1:8010',
      target: 'proj-x',
      intervalMs: 20_000,
      lastFile: '/tmp/relay-last',
    });
  });

  it('reads target and interval from the environment', () => {
    const settings = resolvePollerSettings({ ...required, TARGET: 'review', INTERVAL: '2.5' });
    expect(settings.target).toBe('review');
    expect(settings.intervalMs).toBe(2500);
  });

  it('treats empty variables as unset', () => {
    expect(resolvePollerSettings({ ...required, TARGET: '' }).target).toBe('proj-x');
  });

  it('requires RELAY_URL and LASTFILE', () => {
    expect(() => resolvePollerSettings({})).toThrow(ZodError);
    expect(() => resolvePollerSettings({ RELAY_URL: 'http://x' })).toThrow(ZodError);
  });

  it('rejects a non-positive interval', () => {
    expect(() => resolvePollerSettings({ ...required, INTERVAL: '0' })).toThrow(ZodError);
  });
});
