import type { Message } from '../types.js';
import type { IdentityAllocator, Clock } from './allocator.js';
import type { FetchWindow } from './types.js';

export interface ChannelDeps {
  allocator: IdentityAllocator;
  clock: Clock;
  // 0 keeps everything
  maxMessages: number;
}

export class Channel {
  // Live messages are messages[head..]; evicted ones ahead of head are compacted away in bulk.
  private messages: Message[] = [];
  private head = 0;

  constructor(
    readonly name: string,
    private readonly deps: ChannelDeps,
  ) {}

  get size(): number {
    return this.messages.length - this.head;
  }

  get lastId(): number {
    return this.size > 0 ? (this.messages.at(-1)?.id ?? 0) : 0;
  }

  append(sender: string, text: string): Message {
    const msg: Message = Object.freeze({
      id: this.deps.allocator.next(),
      channel: this.name,
      sender,
      text,
      createdAt: this.deps.clock(),
    });
    this.messages.push(msg);
    const { maxMessages } = this.deps;
    if (maxMessages > 0 && this.size > maxMessages) this.evictOldest();
    return msg;
  }

  /**
   * Messages with `id > sinceId` in ascending id order. `limit` caps the
   * result; `window` picks which end of the qualifying range is kept.
   */
  messagesSince(sinceId: number, limit?: number, window: FetchWindow = 'oldest'): Message[] {
    const start = this.firstIndexAfter(sinceId);
    const end = this.messages.length;
    if (limit === undefined || end - start <= limit) return this.messages.slice(start);
    return window === 'oldest' ? this.messages.slice(start, start + limit) : this.messages.slice(end - limit);
  }

  private evictOldest(): void {
    this.head += 1;
    if (this.head * 2 >= this.messages.length) {
      this.messages = this.messages.slice(this.head);
      this.head = 0;
    }
  }

  // Ids are strictly increasing, so the first id past the cursor is found by bisection.
  private firstIndexAfter(sinceId: number): number {
    let lo = this.head;
    let hi = this.messages.length;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      if (this.messages[mid].id <= sinceId) lo = mid + 1;
      else hi = mid;
    }
    return lo;
  }
}
