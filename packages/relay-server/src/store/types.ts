import type { Message } from '../types.js';

/**
 * Which end of the qualifying range survives when more than `limit`
 * messages are newer than `sinceId`.
 *
 * - `oldest`: the first `limit` messages (incremental readers never skip
 *   anything they have not seen).
 * - `latest`: the last `limit` messages (tail view).
 */
export type FetchWindow = 'oldest' | 'latest';

export interface FetchOptions {
  sinceId?: number;
  limit?: number;
  window?: FetchWindow;
}

export type PostListener = (msg: Message) => void;

export interface StoreStats {
  channels: number;
  messages: number;
  lastId: number;
}

export interface IMessageStore {
  postMessage(channel: string, sender: string, text: string): Promise<Message>;
  fetchMessages(channel: string, opts?: FetchOptions): Promise<Message[]>;
  listChannels(): Promise<string[]>;
  stats(): Promise<StoreStats>;
}
