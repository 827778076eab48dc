import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import pino from 'pino';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { CallToolResultSchema } from '@modelcontextprotocol/sdk/types.js';
import { MemoryStore } from '../store/index.js';
import { createRelayMcpServer } from './server.js';
import { clampLimit } from './tools.js';

describe('clampLimit', () => {
  it('keeps values inside the range', () => {
    expect(clampLimit(50)).toBe(50);
  });

  it('raises values below 1', () => {
    expect(clampLimit(0)).toBe(1);
    expect(clampLimit(-5)).toBe(1);
  });

  it('caps values above 200', () => {
    expect(clampLimit(10_000)).toBe(200);
  });
});

describe('relay MCP tools', () => {
  let store: MemoryStore;
  let client: Client;

  async function call(name: string, args: Record<string, unknown> = {}) {
    const result = CallToolResultSchema.parse(await client.callTool({ name, arguments: args }));
    const first = result.content[0];
    if (first?.type !== 'text') throw new Error(`expected text content from ${name}`);
    return { isError: result.isError ?? false, body: JSON.parse(first.text) as Record<string, unknown> };
  }

  beforeEach(async () => {
    store = new MemoryStore({ channels: ['proj-x', 'codex', 'claude'] });
    const server = createRelayMcpServer(store, pino({ level: 'silent' }));
    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    client = new Client({ name: 'relay-test', version: '0.0.0' });
    await server.connect(serverTransport);
    await client.connect(clientTransport);
  });

  afterEach(async () => {
    await client.close();
  });

  it('exposes the three relay tools', async () => {
    const { tools } = await client.listTools();
    expect(tools.map((t) => t.name).sort()).toEqual(['fetch_messages', 'list_channels', 'post_message']);
  });

  it('post_message returns the assigned id', async () => {
    const { isError, body } = await call('post_message', { target: 'proj-x', sender: 'claude', text: 'hello' });
    expect(isError).toBe(false);
    expect(body).toMatchObject({ ok: true, posted: 1, message: { id: 1, sender: 'claude', text: 'hello' } });
  });

  it('post_message reports an empty sender as a validation fault', async () => {
    const { isError, body } = await call('post_message', { target: 'proj-x', sender: '', text: 'hello' });
    expect(isError).toBe(true);
    expect(body).toEqual({ error: 'validation', message: 'sender must not be empty' });
  });

  it('fetch_messages returns messages after since_id and the latest id', async () => {
    await store.postMessage('proj-x', 'claude', 'hello');
    await store.postMessage('proj-x', 'codex', 'ack');

    const all = await call('fetch_messages', { target: 'proj-x' });
    expect(all.body['latest_id']).toBe(2);
    expect(all.body['messages']).toEqual([
      expect.objectContaining({ id: 1, sender: 'claude', text: 'hello' }),
      expect.objectContaining({ id: 2, sender: 'codex', text: 'ack' }),
    ]);

    const newer = await call('fetch_messages', { target: 'proj-x', since_id: 1 });
    expect(newer.body['messages']).toEqual([expect.objectContaining({ id: 2 })]);
  });

  it('fetch_messages echoes since_id as latest_id when nothing is new', async () => {
    await store.postMessage('proj-x', 'claude', 'hello');
    const { body } = await call('fetch_messages', { target: 'proj-x', since_id: 7 });
    expect(body).toEqual({ messages: [], latest_id: 7 });
  });

  it('fetch_messages clamps a zero limit to one message', async () => {
    await store.postMessage('proj-x', 'claude', 'a');
    await store.postMessage('proj-x', 'claude', 'b');
    const { body } = await call('fetch_messages', { target: 'proj-x', limit: 0 });
    expect(body['messages']).toEqual([expect.objectContaining({ id: 1 })]);
    expect(body['latest_id']).toBe(1);
  });

  it('fetch_messages reports an unknown channel as not_found without creating it', async () => {
    const { isError, body } = await call('fetch_messages', { target: 'ghost' });
    expect(isError).toBe(true);
    expect(body).toEqual({ error: 'not_found', message: 'unknown channel "ghost"' });
    expect(await store.listChannels()).toEqual(['proj-x', 'codex', 'claude']);
  });

  it('list_channels lists seeded channels then posted ones', async () => {
    await call('post_message', { target: 'review', sender: 'codex', text: 'x' });
    const { body } = await call('list_channels');
    expect(body).toEqual({ channels: ['proj-x', 'codex', 'claude', 'review'] });
  });
});
