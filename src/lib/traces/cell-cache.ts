/**
 * Per-session cache of geohash cell query results
 *
 * Uses Map insertion order for LRU eviction:
 * - get() deletes and re-inserts to move entry to end (most recent)
 * - set() evicts oldest (first) entry when over maxSize
 *
 * Owned by the map session and handed to the orchestrator on every cycle, so cells
 * fetched during a pan are not re-queried until their TTL lapses.
 */

import type { TraceRecord } from './types';

interface CacheEntry {
  records: readonly TraceRecord[];
  expiresAt: number;
}

export interface CellCache {
  get(prefix: string, limit: number): readonly TraceRecord[] | undefined;
  set(prefix: string, limit: number, records: readonly TraceRecord[]): void;
  /** Drops expired entries */
  sweep(): void;
  clear(): void;
  /** Exposed for testing */
  readonly size: number;
}

function cacheKey(prefix: string, limit: number): string {
  return `${prefix}:${limit}`;
}

export function createCellCache(ttlMs: number, maxSize: number = 512): CellCache {
  const store = new Map<string, CacheEntry>();

  return {
    get(prefix: string, limit: number): readonly TraceRecord[] | undefined {
      const key = cacheKey(prefix, limit);
      const entry = store.get(key);
      if (!entry) return undefined;

      if (Date.now() > entry.expiresAt) {
        store.delete(key);
        return undefined;
      }

      // LRU: delete and re-insert to move to end
      store.delete(key);
      store.set(key, entry);
      return entry.records;
    },

    set(prefix: string, limit: number, records: readonly TraceRecord[]): void {
      const key = cacheKey(prefix, limit);
      if (store.has(key)) {
        store.delete(key);
      }

      while (store.size >= maxSize) {
        const oldest = store.keys().next().value;
        if (oldest === undefined) break;
        store.delete(oldest);
      }

      store.set(key, { records, expiresAt: Date.now() + ttlMs });
    },

    sweep(): void {
      const now = Date.now();
      for (const [key, entry] of store) {
        if (now > entry.expiresAt) {
          store.delete(key);
        }
      }
    },

    clear(): void {
      store.clear();
    },

    get size(): number {
      return store.size;
    },
  };
}
