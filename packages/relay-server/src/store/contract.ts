import { describe, it, expect, beforeEach } from 'vitest';
import type { IMessageStore } from './types.js';
import { NotFoundError, ValidationError } from '../errors.js';

const SEED = ['proj-x', 'codex', 'claude'];

/**
 * Shared contract tests — every IMessageStore implementation must pass these.
 * The factory receives the seed channel list and returns a fresh store.
 */
export function runStoreContractTests(
  label: string,
  factory: (channels: string[]) => Promise<IMessageStore>,
): void {
  describe(label, () => {
    let store: IMessageStore;
    beforeEach(async () => { store = await factory([...SEED]); });

    // ─── Posting ────────────────────────────────────────────────────────────

    describe('postMessage', () => {
      it('assigns ids starting from 1', async () => {
        const first = await store.postMessage('proj-x', 'claude', 'hello');
        const second = await store.postMessage('proj-x', 'codex', 'ack');
        expect(first).toMatchObject({ id: 1, channel: 'proj-x', sender: 'claude', text: 'hello' });
        expect(second).toMatchObject({ id: 2, channel: 'proj-x', sender: 'codex', text: 'ack' });
      });

      it('shares one id sequence across channels', async () => {
        await store.postMessage('proj-x', 'claude', 'a');
        const other = await store.postMessage('codex', 'claude', 'b');
        expect(other.id).toBe(2);
      });

      it('accepts empty text', async () => {
        const msg = await store.postMessage('proj-x', 'claude', '');
        expect(msg.text).toBe('');
      });

      it('keeps multi-line text with code fences verbatim', async () => {
        const text = 'see:\n```ts\nconst x = 1;\n```\n';
        await store.postMessage('proj-x', 'codex', text);
        const [msg] = await store.fetchMessages('proj-x');
        expect(msg.text).toBe(text);
      });

      it('rejects an empty channel name without changing state', async () => {
        await expect(store.postMessage('', 'claude', 'x')).rejects.toBeInstanceOf(ValidationError);
        expect(await store.listChannels()).toEqual(SEED);
        const next = await store.postMessage('proj-x', 'claude', 'x');
        expect(next.id).toBe(1);
      });

      it('rejects a blank sender', async () => {
        await expect(store.postMessage('proj-x', '   ', 'x')).rejects.toBeInstanceOf(ValidationError);
        expect(await store.fetchMessages('proj-x')).toEqual([]);
      });

      it('creates an unseen channel at the end of the listing', async () => {
        await store.postMessage('review', 'codex', 'x');
        expect(await store.listChannels()).toEqual([...SEED, 'review']);
      });
    });

    // ─── Fetching ───────────────────────────────────────────────────────────

    describe('fetchMessages', () => {
      beforeEach(async () => {
        await store.postMessage('proj-x', 'claude', 'hello');
        await store.postMessage('proj-x', 'codex', 'ack');
      });

      it('returns everything after since_id 0', async () => {
        const msgs = await store.fetchMessages('proj-x', { sinceId: 0 });
        expect(msgs.map((m) => m.id)).toEqual([1, 2]);
      });

      it('excludes since_id itself', async () => {
        const msgs = await store.fetchMessages('proj-x', { sinceId: 1 });
        expect(msgs.map((m) => m.id)).toEqual([2]);
      });

      it('returns an empty list for a since_id beyond every id', async () => {
        expect(await store.fetchMessages('proj-x', { sinceId: 1_000_000 })).toEqual([]);
      });

      it('returns an empty list for a seeded channel with no posts', async () => {
        expect(await store.fetchMessages('claude')).toEqual([]);
      });

      it('only returns messages of the requested channel', async () => {
        await store.postMessage('codex', 'claude', 'elsewhere');
        const msgs = await store.fetchMessages('proj-x');
        expect(msgs.map((m) => m.channel)).toEqual(['proj-x', 'proj-x']);
      });

      it('caps from the tail by default, so the oldest unseen messages come first', async () => {
        await store.postMessage('proj-x', 'claude', 'third');
        const msgs = await store.fetchMessages('proj-x', { sinceId: 0, limit: 2 });
        expect(msgs.map((m) => m.id)).toEqual([1, 2]);
      });

      it('keeps the newest messages with the latest window', async () => {
        await store.postMessage('proj-x', 'claude', 'third');
        const msgs = await store.fetchMessages('proj-x', { limit: 2, window: 'latest' });
        expect(msgs.map((m) => m.id)).toEqual([2, 3]);
      });

      it('fails with NotFoundError for an unseen channel and does not create it', async () => {
        await expect(store.fetchMessages('ghost')).rejects.toBeInstanceOf(NotFoundError);
        expect(await store.listChannels()).not.toContain('ghost');
      });

      it('rejects a negative since_id', async () => {
        await expect(store.fetchMessages('proj-x', { sinceId: -1 })).rejects.toBeInstanceOf(ValidationError);
      });

      it('rejects a zero limit', async () => {
        await expect(store.fetchMessages('proj-x', { limit: 0 })).rejects.toBeInstanceOf(ValidationError);
      });
    });

    // ─── Listing ────────────────────────────────────────────────────────────

    describe('listChannels', () => {
      it('lists seeded channels in configured order', async () => {
        expect(await store.listChannels()).toEqual(['proj-x', 'codex', 'claude']);
      });

      it('returns identical output on repeated calls', async () => {
        await store.postMessage('later', 'codex', 'x');
        const a = await store.listChannels();
        const b = await store.listChannels();
        expect(b).toEqual(a);
      });

      it('does not add seeded channels twice when posting to them', async () => {
        await store.postMessage('codex', 'claude', 'x');
        expect(await store.listChannels()).toEqual(SEED);
      });
    });

    // ─── Concurrency ────────────────────────────────────────────────────────

    describe('concurrent callers', () => {
      it('creates an unseen channel exactly once for N concurrent posts', async () => {
        const posts = Array.from({ length: 25 }, (_, i) => store.postMessage('burst', `agent-${i % 2}`, `m${i}`));
        const results = await Promise.all(posts);

        expect((await store.listChannels()).filter((c) => c === 'burst')).toHaveLength(1);
        expect(await store.fetchMessages('burst')).toHaveLength(25);
        expect(new Set(results.map((m) => m.id)).size).toBe(25);
      });

      it('keeps ids distinct and ascending within each channel under interleaved posts', async () => {
        const posts = Array.from({ length: 40 }, (_, i) =>
          store.postMessage(i % 2 === 0 ? 'proj-x' : 'codex', 'claude', `m${i}`),
        );
        const results = await Promise.all(posts);
        expect(new Set(results.map((m) => m.id)).size).toBe(40);

        for (const channel of ['proj-x', 'codex']) {
          const ids = (await store.fetchMessages(channel)).map((m) => m.id);
          expect(ids).toHaveLength(20);
          expect(ids).toEqual([...ids].sort((a, b) => a - b));
        }
      });

      it('incremental readers see every message exactly once while posts interleave', async () => {
        const seen: number[] = [];

        const writer = async () => {
          for (let i = 0; i < 20; i++) {
            await store.postMessage('proj-x', 'codex', `m${i}`);
            await Promise.resolve();
          }
        };
        const reader = async () => {
          let cursor = 0;
          for (let polls = 0; seen.length < 20 && polls < 1000; polls++) {
            const batch = await store.fetchMessages('proj-x', { sinceId: cursor, limit: 3 });
            for (const m of batch) seen.push(m.id);
            cursor = batch.at(-1)?.id ?? cursor;
          }
        };

        await Promise.all([writer(), reader()]);
        expect(seen).toEqual(Array.from({ length: 20 }, (_, i) => i + 1));
      });
    });

    it('runs the seeded scenario end to end', async () => {
      const hello = await store.postMessage('proj-x', 'claude', 'hello');
      const ack = await store.postMessage('proj-x', 'codex', 'ack');
      expect(hello.id).toBe(1);
      expect(ack.id).toBe(2);
      expect((await store.fetchMessages('proj-x', { sinceId: 0 })).map((m) => [m.id, m.sender])).toEqual([
        [1, 'claude'],
        [2, 'codex'],
      ]);
      expect((await store.fetchMessages('proj-x', { sinceId: 1 })).map((m) => m.text)).toEqual(['ack']);
      expect(await store.listChannels()).toEqual(['proj-x', 'codex', 'claude']);
    });
  });
}
