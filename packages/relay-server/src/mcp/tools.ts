import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import type { IMessageStore } from '../store/index.js';
import type { Logger } from '../logger.js';
import { RelayError } from '../errors.js';
import { toWireMessage } from '../types.js';

export const DEFAULT_FETCH_LIMIT = 50;
export const MAX_FETCH_LIMIT = 200;

type ToolResult = {
  content: { type: 'text'; text: string }[];
  isError?: boolean;
};

function reply(body: unknown): ToolResult {
  return { content: [{ type: 'text' as const, text: JSON.stringify(body) }] };
}

// Store errors become tool faults the calling agent can read; anything else is a bug and propagates.
function fault(err: unknown): ToolResult {
  if (!(err instanceof RelayError)) throw err;
  return { ...reply({ error: err.kind, message: err.message }), isError: true };
}

export function clampLimit(limit: number): number {
  return Math.max(1, Math.min(Math.trunc(limit), MAX_FETCH_LIMIT));
}

export function registerTools(server: McpServer, store: IMessageStore, logger: Logger): void {
  server.tool(
    'post_message',
    'Post a message into a target inbox (channel). Typical targets: "codex", "claude", or a shared channel like "proj-x".',
    {
      target: z.string().describe('Channel name; created on first post'),
      sender: z.string().describe('Who is posting, e.g. "claude" or "codex"'),
      text: z.string().describe('Message body; may span lines and contain code fences'),
    },
    async ({ target, sender, text }) => {
      try {
        const msg = await store.postMessage(target, sender, text);
        return reply({ ok: true, posted: msg.id, message: toWireMessage(msg) });
      } catch (err) {
        return fault(err);
      }
    }
  );

  server.tool(
    'fetch_messages',
    'Fetch messages for a target with id > since_id, oldest first. Pass the returned latest_id as since_id next time.',
    {
      target: z.string().describe('Channel name'),
      since_id: z.number().int().min(0).default(0).describe('Only messages newer than this id'),
      limit: z.number().int().default(DEFAULT_FETCH_LIMIT).describe(`At most this many messages (1-${MAX_FETCH_LIMIT})`),
    },
    async ({ target, since_id, limit }) => {
      const capped = clampLimit(limit);
      try {
        const messages = await store.fetchMessages(target, { sinceId: since_id, limit: capped });
        const latestId = messages.at(-1)?.id ?? since_id;
        logger.info(
          { target, since_id, limit: capped, returned: messages.length, latest_id: latestId },
          'fetch_messages',
        );
        return reply({ messages: messages.map(toWireMessage), latest_id: latestId });
      } catch (err) {
        return fault(err);
      }
    }
  );

  server.tool(
    'list_channels',
    'List known channels: the configured ones first, then any created by posts.',
    {},
    async () => reply({ channels: await store.listChannels() })
  );
}
