import type { Message } from '../types.js';
import { NotFoundError, ValidationError } from '../errors.js';
import { IdentityAllocator, monotonicClock, type Clock } from './allocator.js';
import { ChannelRegistry } from './registry.js';
import type { FetchOptions, IMessageStore, PostListener, StoreStats } from './types.js';

export interface MemoryStoreOptions {
  /** Channels to create up front, listed first and in this order. */
  channels?: readonly string[];
  /** Per-channel cap; the oldest message is dropped past it. 0 keeps everything. */
  maxMessagesPerChannel?: number;
  now?: Clock;
}

/**
 * In-process message store. Every operation runs to completion without
 * yielding to the event loop, so a post's validation, id allocation and
 * append form one critical section and fetches always see a whole prefix.
 */
export class MemoryStore implements IMessageStore {
  private readonly allocator = new IdentityAllocator();
  private readonly registry: ChannelRegistry;
  private readonly listeners = new Set<PostListener>();

  constructor(opts: MemoryStoreOptions = {}) {
    this.registry = new ChannelRegistry({
      allocator: this.allocator,
      clock: monotonicClock(opts.now),
      maxMessages: opts.maxMessagesPerChannel ?? 0,
    });
    this.registry.seed(opts.channels ?? []);
  }

  /** Registers a listener for successful posts; returns its unsubscribe function. */
  onPost(listener: PostListener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  async postMessage(channel: string, sender: string, text: string): Promise<Message> {
    const name = channel.trim();
    if (!name) throw new ValidationError('channel name must not be empty');
    if (!sender.trim()) throw new ValidationError('sender must not be empty');

    const msg = this.registry.getOrCreate(name).append(sender, text);
    this.notify(msg);
    return msg;
  }

  async fetchMessages(channel: string, opts: FetchOptions = {}): Promise<Message[]> {
    const { sinceId = 0, limit, window = 'oldest' } = opts;
    if (!Number.isInteger(sinceId) || sinceId < 0) {
      throw new ValidationError(`since_id must be a non-negative integer, got ${sinceId}`);
    }
    if (limit !== undefined && (!Number.isInteger(limit) || limit < 1)) {
      throw new ValidationError(`limit must be a positive integer, got ${limit}`);
    }

    // Names are stored trimmed, as seed and postMessage leave them
    const found = this.registry.get(channel.trim());
    if (!found) throw new NotFoundError(`unknown channel "${channel}"`);
    return found.messagesSince(sinceId, limit, window);
  }

  async listChannels(): Promise<string[]> {
    return this.registry.listNames();
  }

  async stats(): Promise<StoreStats> {
    const channels = this.registry.all();
    return {
      channels: channels.length,
      messages: channels.reduce((n, c) => n + c.size, 0),
      lastId: this.allocator.current(),
    };
  }

  private notify(msg: Message): void {
    for (const listener of this.listeners) {
      try {
        listener(msg);
      } catch (err) {
        // The post has already happened; a broken sink only earns a warning.
        process.emitWarning(err instanceof Error ? err : String(err), 'PostListenerWarning');
      }
    }
  }
}
