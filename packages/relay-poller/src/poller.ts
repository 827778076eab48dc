import type { Logger } from 'pino';
import type { MessagesPage, WireMessage } from './types.js';

export const PAGE_LIMIT = 200;
const HEARTBEAT_EVERY = 3;

export interface MessageSource {
  fetchMessages(target: string, sinceId: number, limit: number): Promise<MessagesPage>;
  listChannels(): Promise<string[]>;
}

export interface CursorStore {
  load(): number;
  save(lastId: number): void;
}

export interface PollerOptions {
  source: MessageSource;
  cursor: CursorStore;
  target: string;
  logger: Logger;
  /** Receives each output line without a trailing newline. */
  write: (line: string) => void;
  now?: () => Date;
}

/** `#12 [codex] first line of the text` */
export function formatMessage(msg: WireMessage): string {
  const firstLine = msg.text.split('\n', 1)[0] ?? '';
  return `#${msg.id} [${msg.sender}] ${firstLine}`;
}

/**
 * Tails one channel: each tick fetches everything past the cursor, prints it,
 * and persists the new cursor. Survives relay outages by retrying next tick.
 */
export class Poller {
  private last: number;
  private iterations = 0;

  constructor(private readonly opts: PollerOptions) {
    this.last = opts.cursor.load();
  }

  get lastId(): number {
    return this.last;
  }

  start(details: Record<string, string | number>): void {
    const fields = Object.entries({ ...details, target: this.opts.target, last: this.last })
      .map(([k, v]) => `${k}=${v}`)
      .join(' ');
    this.opts.write(`${this.stamp()} poller_start ${fields}`);
  }

  /**
   * Warns when the relay does not list the target. Polling goes on regardless,
   * since a post may still create the channel.
   */
  async checkTarget(): Promise<boolean> {
    const { target, logger } = this.opts;
    try {
      const channels = await this.opts.source.listChannels();
      if (channels.includes(target)) return true;
      logger.warn({ target, channels }, 'target channel unknown to relay');
    } catch (err) {
      logger.warn({ error: err, target }, 'channel check failed');
    }
    return false;
  }

  stop(): void {
    this.opts.write(`${this.stamp()} poller_term last=${this.last}`);
  }

  /** Runs one poll; returns how many new messages were printed. */
  async tick(): Promise<number> {
    const at = this.stamp();
    let printed = 0;

    try {
      printed = await this.drain(at);
    } catch (err) {
      this.opts.logger.warn({ error: err, target: this.opts.target, last: this.last }, 'poll failed');
    }

    this.iterations += 1;
    if (this.iterations % HEARTBEAT_EVERY === 0) {
      this.opts.write(`${at} heartbeat last=${this.last}`);
    }
    return printed;
  }

  // Pages until the relay has nothing newer, so a burst larger than one page is not delayed a tick.
  private async drain(at: string): Promise<number> {
    let printed = 0;
    for (;;) {
      const page = await this.opts.source.fetchMessages(this.opts.target, this.last, PAGE_LIMIT);
      const fresh = page.messages.filter((m) => m.id > this.last);
      if (fresh.length === 0) return printed;

      if (printed === 0) this.opts.write(`${at} new_messages`);
      for (const msg of fresh) this.opts.write(formatMessage(msg));
      printed += fresh.length;

      this.last = fresh[fresh.length - 1].id;
      this.opts.cursor.save(this.last);
      if (page.messages.length < PAGE_LIMIT) return printed;
    }
  }

  private stamp(): string {
    return (this.opts.now?.() ?? new Date()).toISOString();
  }
}
