/**
 * In-process Map-based backend. Entries are never persisted.
 *
 * Optional `maxSize` enables LRU eviction: when the backend is full,
 * the least-recently-used entry is evicted before inserting a new one.
 * Without it the map grows until entries are pruned.
 *
 * Entries are copied on the way in and out so callers cannot mutate
 * what is stored.
 */
import type { CacheBackend, CacheEntry } from "./types";

export interface MemoryCacheBackendOptions {
  maxSize?: number;
}

export class MemoryCacheBackend implements CacheBackend {
  private entries = new Map<string, CacheEntry<unknown>>();
  private maxSize: number | undefined;

  constructor(options?: MemoryCacheBackendOptions) {
    this.maxSize = options?.maxSize;
  }

  get size(): number {
    return this.entries.size;
  }

  async get(key: string): Promise<CacheEntry<unknown> | null> {
    const entry = this.entries.get(key);
    if (!entry) return null;
    // LRU: move to end (most recently used)
    if (this.maxSize) {
      this.entries.delete(key);
      this.entries.set(key, entry);
    }
    return structuredClone(entry);
  }

  async set(key: string, entry: CacheEntry<unknown>): Promise<void> {
    this.entries.delete(key);
    if (this.maxSize && this.entries.size >= this.maxSize) {
      const oldest = this.entries.keys().next();
      if (!oldest.done) this.entries.delete(oldest.value);
    }
    this.entries.set(key, structuredClone(entry));
  }

  async delete(key: string): Promise<void> {
    this.entries.delete(key);
  }

  async keys(): Promise<string[]> {
    return [...this.entries.keys()];
  }

  async clear(): Promise<void> {
    this.entries.clear();
  }

  async close(): Promise<void> {
    this.entries.clear();
  }
}
