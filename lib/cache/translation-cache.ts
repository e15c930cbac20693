/**
 * Content-addressed, time-bounded memo store for translation results.
 *
 * The cache is best-effort: every backend failure is wrapped in a
 * CacheError, logged, and treated as a miss (reads) or dropped (writes).
 * Expired entries are ignored on read but only reclaimed by `prune()`.
 */
import { mapSettled } from "@/lib/concurrency";
import { CacheError, errorMessage } from "@/lib/sign/errors";
import { isTranslationResult, type TranslationResult } from "@/lib/sign/types";
import { cacheKey } from "./hash";
import type { CacheBackend, CacheEntry, TranslationCacheOptions } from "./types";

export const DEFAULT_TTL_MS = 24 * 60 * 60 * 1000;

const PRUNE_CONCURRENCY = 20;

function isCacheEntry(value: unknown): value is CacheEntry<unknown> {
  if (typeof value !== "object" || value === null) return false;
  return "key" in value && typeof value.key === "string" && "createdAt" in value && typeof value.createdAt === "number" && "value" in value;
}

function logCacheError(err: CacheError): void {
  console.warn(`[translation-cache] ${err.operation} failed: ${err.message}`);
}

export class TranslationCache {
  private backend: CacheBackend;
  readonly ttlMs: number;
  private now: () => number;

  constructor(backend: CacheBackend, options?: TranslationCacheOptions) {
    this.backend = backend;
    this.ttlMs = options?.ttlMs ?? DEFAULT_TTL_MS;
    this.now = options?.now ?? (() => Date.now());
  }

  private isFresh(entry: CacheEntry<unknown>): boolean {
    return this.now() - entry.createdAt < this.ttlMs;
  }

  /**
   * Look up a cached result. Returns null on a miss, an expired entry,
   * a malformed record, or any backend failure.
   */
  async get(text: string, language: string): Promise<TranslationResult | null> {
    const key = cacheKey(text, language);
    let record: unknown;
    try {
      record = await this.backend.get(key);
    } catch (err) {
      logCacheError(new CacheError("read", `${key}: ${errorMessage(err)}`, { cause: err }));
      return null;
    }
    if (record === null || record === undefined) return null;
    if (!isCacheEntry(record) || record.key !== key || !isTranslationResult(record.value)) {
      logCacheError(new CacheError("read", `${key}: malformed entry`));
      return null;
    }
    if (!this.isFresh(record)) return null;
    return record.value;
  }

  /**
   * Store a result unconditionally. Deciding what is worth caching is the
   * caller's job. Errors are logged, never thrown.
   */
  async set(text: string, language: string, result: TranslationResult): Promise<void> {
    const key = cacheKey(text, language);
    const entry: CacheEntry<TranslationResult> = { key, value: result, createdAt: this.now() };
    try {
      await this.backend.set(key, entry);
    } catch (err) {
      logCacheError(new CacheError("write", `${key}: ${errorMessage(err)}`, { cause: err }));
    }
  }

  /**
   * Delete every expired or unreadable entry. Returns how many were removed.
   */
  async prune(): Promise<number> {
    let keys: string[];
    try {
      keys = await this.backend.keys();
    } catch (err) {
      logCacheError(new CacheError("prune", errorMessage(err), { cause: err }));
      return 0;
    }

    const results = await mapSettled(keys, PRUNE_CONCURRENCY, async (key) => {
      let record: unknown;
      try {
        record = await this.backend.get(key);
      } catch {
        // Unreadable entries are pruned along with expired ones
        record = null;
      }
      if (isCacheEntry(record) && this.isFresh(record)) return false;
      await this.backend.delete(key);
      return true;
    });

    let removed = 0;
    for (const r of results) {
      if (r.status === "fulfilled") {
        if (r.value) removed++;
      } else {
        logCacheError(new CacheError("prune", errorMessage(r.reason), { cause: r.reason }));
      }
    }
    return removed;
  }

  async clear(): Promise<void> {
    try {
      await this.backend.clear();
    } catch (err) {
      logCacheError(new CacheError("clear", errorMessage(err), { cause: err }));
    }
  }

  async close(): Promise<void> {
    await this.backend.close();
  }
}
