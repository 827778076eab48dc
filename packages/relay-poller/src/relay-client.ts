import { fetch, type Dispatcher } from 'undici';
import type { MessagesPage } from './types.js';

export interface RelayClientOptions {
  baseUrl: string;
  /** Overrides undici's global dispatcher (tests pass a MockAgent). */
  dispatcher?: Dispatcher;
  timeoutMs?: number;
}

export class RelayRequestError extends Error {
  constructor(
    message: string,
    public readonly status: number,
  ) {
    super(message);
    this.name = 'RelayRequestError';
  }
}

/** Read-only client for the relay's polling API. */
export class RelayClient {
  private readonly baseUrl: string;

  constructor(private readonly opts: RelayClientOptions) {
    this.baseUrl = opts.baseUrl.replace(/\/+$/, '');
  }

  async fetchMessages(target: string, sinceId: number, limit: number): Promise<MessagesPage> {
    const query = new URLSearchParams({ target, since_id: String(sinceId), limit: String(limit) });
    return this.get<MessagesPage>(`/api/messages?${query.toString()}`);
  }

  async listChannels(): Promise<string[]> {
    const body = await this.get<{ channels: string[] }>('/api/channels');
    return body.channels;
  }

  private async get<T>(path: string): Promise<T> {
    const res = await fetch(`${this.baseUrl}${path}`, {
      dispatcher: this.opts.dispatcher,
      signal: AbortSignal.timeout(this.opts.timeoutMs ?? 10_000),
    });

    if (!res.ok) {
      const body = await res.json().catch(() => ({})) as { message?: string; error?: string };
      throw new RelayRequestError(`GET ${path} failed: ${body.message ?? body.error ?? res.statusText}`, res.status);
    }

    return res.json() as Promise<T>;
  }
}
