import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import path from 'path';
import os from 'os';
import { ZodError } from 'zod';
import { ConfigLoader } from './loader.js';
import { resolveSettings } from './settings.js';

describe('resolveSettings', () => {
  let tmpDir: string;

  const load = (props: string) => {
    fs.writeFileSync(path.join(tmpDir, 'config.props'), props, 'utf-8');
    return new ConfigLoader(undefined, tmpDir);
  };

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'relay-settings-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true });
  });

  it('falls back to built-in defaults', () => {
    const settings = resolveSettings(load(''), {});
    expect(settings).toEqual({
      host: '127.0.0.1',
      port: 8010,
      corsOrigins: '*',
      mcpPath: '/mcp',
      channels: ['proj-x', 'codex', 'claude'],
      maxMessagesPerChannel: 0,
      log: { level: 'info', file: 'relay.log', maxSize: '5m', backupCount: 10 },
    });
  });

  it('prefers the environment over defaults', () => {
    const settings = resolveSettings(load(''), { RELAY_CHANNELS: 'alpha, beta', RELAY_PORT: '9100' });
    expect(settings.channels).toEqual(['alpha', 'beta']);
    expect(settings.port).toBe(9100);
  });

  it('prefers the config file over the environment', () => {
    const settings = resolveSettings(load('[relay]\nchannels=from-file\n'), { RELAY_CHANNELS: 'from-env' });
    expect(settings.channels).toEqual(['from-file']);
  });

  it('ignores an empty environment variable', () => {
    const settings = resolveSettings(load(''), { RELAY_CHANNELS: '' });
    expect(settings.channels).toEqual(['proj-x', 'codex', 'claude']);
  });

  it('preserves configured channel order and drops blanks', () => {
    const settings = resolveSettings(load('[relay]\nchannels=zeta,,alpha, mid\n'), {});
    expect(settings.channels).toEqual(['zeta', 'alpha', 'mid']);
  });

  it('reads log and retention settings', () => {
    const settings = resolveSettings(
      load('[relay]\nmax_messages_per_channel=500\n[log]\nlevel=debug\nmax_size=10m\nbackup_count=3\n'),
      {},
    );
    expect(settings.maxMessagesPerChannel).toBe(500);
    expect(settings.log).toEqual({ level: 'debug', file: 'relay.log', maxSize: '10m', backupCount: 3 });
  });

  it('rejects a non-numeric port', () => {
    expect(() => resolveSettings(load('[server]\nport=abc\n'), {})).toThrow(ZodError);
  });

  it('rejects an MCP path without a leading slash', () => {
    expect(() => resolveSettings(load(''), { RELAY_MCP_PATH: 'mcp' })).toThrow(ZodError);
  });

  it('rejects an unknown log level', () => {
    expect(() => resolveSettings(load('[log]\nlevel=loud\n'), {})).toThrow(ZodError);
  });
});
