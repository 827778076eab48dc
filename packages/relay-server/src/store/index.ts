export { MemoryStore } from './memory.js';
export type { MemoryStoreOptions } from './memory.js';
export type { IMessageStore, FetchOptions, FetchWindow, PostListener, StoreStats } from './types.js';
