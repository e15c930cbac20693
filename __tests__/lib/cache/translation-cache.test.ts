import { describe, it, expect, vi, beforeEach, afterAll } from "vitest";
import { mkdtemp, rm, writeFile } from "fs/promises";
import { join } from "path";
import { tmpdir } from "os";
import { TranslationCache, DEFAULT_TTL_MS } from "@/lib/cache/translation-cache";
import { MemoryCacheBackend } from "@/lib/cache/memory-backend";
import { LocalCacheBackend } from "@/lib/cache/local-backend";
import { cacheKey } from "@/lib/cache/hash";
import type { CacheBackend } from "@/lib/cache/types";
import type { TranslationResult } from "@/lib/sign/types";

function makeResult(overrides: Partial<TranslationResult> = {}): TranslationResult {
  return {
    success: true,
    language: "isl",
    assetRef: "isl_1700000000.txt",
    gloss: "I RICE EAT",
    glossTokens: ["I", "RICE", "EAT"],
    processingTimeMs: 3,
    error: null,
    errorKind: null,
    cached: false,
    ...overrides,
  };
}

function failingBackend(): CacheBackend {
  const fail = () => Promise.reject(new Error("disk on fire"));
  return { get: fail, set: fail, delete: fail, keys: fail, clear: fail, close: () => Promise.resolve() };
}

describe("TranslationCache", () => {
  let clock: number;
  const warnSpy = vi.spyOn(console, "warn").mockImplementation(() => {});

  beforeEach(() => {
    clock = 1_700_000_000_000;
    warnSpy.mockClear();
  });

  afterAll(() => {
    warnSpy.mockRestore();
  });

  function makeCache(backend: CacheBackend = new MemoryCacheBackend(), ttlMs?: number) {
    return new TranslationCache(backend, { ttlMs, now: () => clock });
  }

  it("defaults the TTL to 24 hours", () => {
    expect(makeCache().ttlMs).toBe(86_400_000);
    expect(DEFAULT_TTL_MS).toBe(86_400_000);
  });

  it("returns null on a miss", async () => {
    expect(await makeCache().get("I eat rice", "isl")).toBeNull();
  });

  it("round-trips a result while fresh", async () => {
    const cache = makeCache();
    const result = makeResult();
    await cache.set("I eat rice", "isl", result);
    expect(await cache.get("I eat rice", "isl")).toEqual(result);
  });

  it("keys by normalized text and language", async () => {
    const cache = makeCache();
    await cache.set("I eat rice", "isl", makeResult());
    expect(await cache.get("  i EAT   rice ", "isl")).toEqual(makeResult());
    expect(await cache.get("I eat rice", "asl")).toBeNull();
  });

  it("serves an entry just before the TTL elapses", async () => {
    const cache = makeCache();
    await cache.set("I eat rice", "isl", makeResult());
    clock += DEFAULT_TTL_MS - 1;
    expect(await cache.get("I eat rice", "isl")).not.toBeNull();
  });

  it("treats an entry as absent once the TTL has elapsed", async () => {
    const cache = makeCache();
    await cache.set("I eat rice", "isl", makeResult());
    clock += DEFAULT_TTL_MS;
    expect(await cache.get("I eat rice", "isl")).toBeNull();
  });

  it("expires lazily: the stale entry stays in the backend", async () => {
    const backend = new MemoryCacheBackend();
    const cache = makeCache(backend);
    await cache.set("I eat rice", "isl", makeResult());
    clock += DEFAULT_TTL_MS + 1;
    await cache.get("I eat rice", "isl");
    expect(backend.size).toBe(1);
  });

  it("honours a custom TTL", async () => {
    const cache = makeCache(new MemoryCacheBackend(), 1000);
    await cache.set("hello", "asl", makeResult({ language: "asl" }));
    clock += 999;
    expect(await cache.get("hello", "asl")).not.toBeNull();
    clock += 1;
    expect(await cache.get("hello", "asl")).toBeNull();
  });

  it("stores failed results too when asked (policy is the caller's)", async () => {
    const cache = makeCache();
    const failed = makeResult({ success: false, assetRef: null, gloss: null, glossTokens: null, error: "boom", errorKind: "rendering" });
    await cache.set("x", "isl", failed);
    expect(await cache.get("x", "isl")).toEqual(failed);
  });

  it("rewriting a key replaces the entry and restarts its TTL", async () => {
    const cache = makeCache();
    await cache.set("hi", "isl", makeResult({ gloss: "OLD" }));
    clock += DEFAULT_TTL_MS - 10;
    await cache.set("hi", "isl", makeResult({ gloss: "NEW" }));
    clock += 100;
    expect((await cache.get("hi", "isl"))?.gloss).toBe("NEW");
  });

  describe("failure handling", () => {
    it("get returns null and logs when the backend throws", async () => {
      const cache = makeCache(failingBackend());
      await expect(cache.get("I eat rice", "isl")).resolves.toBeNull();
      expect(warnSpy).toHaveBeenCalledTimes(1);
      expect(String(warnSpy.mock.calls[0][0])).toContain("[translation-cache] read failed");
    });

    it("set swallows and logs backend errors", async () => {
      const cache = makeCache(failingBackend());
      await expect(cache.set("I eat rice", "isl", makeResult())).resolves.toBeUndefined();
      expect(String(warnSpy.mock.calls[0][0])).toContain("[translation-cache] write failed");
    });

    it("treats a malformed record as absent", async () => {
      const backend = new MemoryCacheBackend();
      const key = cacheKey("I eat rice", "isl");
      await backend.set(key, { key, value: { nope: true }, createdAt: clock });
      await expect(makeCache(backend).get("I eat rice", "isl")).resolves.toBeNull();
      expect(String(warnSpy.mock.calls[0][0])).toContain("malformed entry");
    });

    it("treats a record mixing success and error fields as absent", async () => {
      const backend = new MemoryCacheBackend();
      const key = cacheKey("I eat rice", "isl");
      await backend.set(key, { key, value: makeResult({ gloss: null, error: "x" }), createdAt: clock });
      await expect(makeCache(backend).get("I eat rice", "isl")).resolves.toBeNull();
      expect(warnSpy).toHaveBeenCalledWith(`[translation-cache] read failed: ${key}: malformed entry`);
    });

    it("treats a corrupt cache file as absent", async () => {
      const dir = await mkdtemp(join(tmpdir(), "signgloss-cache-test-"));
      try {
        const cache = makeCache(new LocalCacheBackend(dir));
        await writeFile(join(dir, `${cacheKey("I eat rice", "isl")}.json`), "{garbage", "utf-8");
        await expect(cache.get("I eat rice", "isl")).resolves.toBeNull();
      } finally {
        await rm(dir, { recursive: true, force: true });
      }
    });

    it("clear swallows backend errors", async () => {
      await expect(makeCache(failingBackend()).clear()).resolves.toBeUndefined();
    });
  });

  describe("prune", () => {
    it("removes expired entries and keeps fresh ones", async () => {
      const backend = new MemoryCacheBackend();
      const cache = makeCache(backend);
      await cache.set("old", "isl", makeResult());
      clock += DEFAULT_TTL_MS / 2;
      await cache.set("new", "isl", makeResult());
      clock += DEFAULT_TTL_MS / 2;

      expect(await cache.prune()).toBe(1);
      expect(await backend.keys()).toEqual([cacheKey("new", "isl")]);
    });

    it("removes unreadable files from a local backend", async () => {
      const dir = await mkdtemp(join(tmpdir(), "signgloss-cache-test-"));
      try {
        const cache = makeCache(new LocalCacheBackend(dir));
        await cache.set("fine", "asl", makeResult({ language: "asl" }));
        await writeFile(join(dir, "deadbeef.json"), "{garbage", "utf-8");

        expect(await cache.prune()).toBe(1);
        expect(await cache.get("fine", "asl")).not.toBeNull();
      } finally {
        await rm(dir, { recursive: true, force: true });
      }
    });

    it("returns 0 and logs when keys cannot be listed", async () => {
      await expect(makeCache(failingBackend()).prune()).resolves.toBe(0);
      expect(String(warnSpy.mock.calls[0][0])).toContain("[translation-cache] prune failed");
    });
  });

  it("clear empties the backend", async () => {
    const backend = new MemoryCacheBackend();
    const cache = makeCache(backend);
    await cache.set("a", "isl", makeResult());
    await cache.clear();
    expect(backend.size).toBe(0);
  });
});
