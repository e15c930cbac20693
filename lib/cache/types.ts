/**
 * Pluggable storage backend for translation result caching.
 * LocalCacheBackend keeps one JSON file per key on disk;
 * MemoryCacheBackend keeps entries in-process with optional LRU bounds.
 */
export interface CacheBackend {
  /** Returns the stored record as-is, or null when the key is absent. */
  get(key: string): Promise<unknown>;
  set(key: string, entry: CacheEntry<unknown>): Promise<void>;
  delete(key: string): Promise<void>;
  keys(): Promise<string[]>;
  clear(): Promise<void>;
  close(): Promise<void>;
}

/** A cached value with the time it was written. Entries are never mutated. */
export interface CacheEntry<T> {
  key: string;
  value: T;
  createdAt: number; // epoch ms
}

export interface TranslationCacheOptions {
  /** Entries older than this are treated as absent. Defaults to 24 hours. */
  ttlMs?: number;
  now?: () => number;
}
