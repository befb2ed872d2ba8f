import { LRUCache } from 'lru-cache';

export interface MemoCacheOptions {
  maxEntries: number;
  ttlMs: number;
}

/** Bounded, expiring process-wide memo. Entries are shared between sessions. */
export const createMemoCache = <V extends {}>(options: MemoCacheOptions): LRUCache<string, V> =>
  new LRUCache<string, V>({ max: options.maxEntries, ttl: options.ttlMs, updateAgeOnGet: false });
