import { readFile, writeFile, rename, unlink, readdir, rm, mkdir } from "fs/promises";
import { randomUUID } from "crypto";
import { join } from "path";
import { getDefaultCachePath } from "@/lib/paths";
import type { CacheBackend, CacheEntry } from "./types";

const ENTRY_SUFFIX = ".json";

/**
 * One JSON file per key under `basePath`. Keys are hex digests, so they
 * are always safe file names.
 *
 * Unlike the memory backend this one throws on I/O failure; the
 * TranslationCache decides what a failure means.
 */
export class LocalCacheBackend implements CacheBackend {
  private basePath: string;

  constructor(basePath?: string) {
    this.basePath = basePath || getDefaultCachePath();
  }

  private keyToPath(key: string): string {
    return join(this.basePath, `${key}${ENTRY_SUFFIX}`);
  }

  async get(key: string): Promise<unknown> {
    let content: string;
    try {
      content = await readFile(this.keyToPath(key), "utf-8");
    } catch (err) {
      if (isMissingFile(err)) return null;
      throw err;
    }
    // Shape is checked by the caller; a parse error propagates as a read failure
    const parsed: unknown = JSON.parse(content);
    return parsed;
  }

  async set(key: string, entry: CacheEntry<unknown>): Promise<void> {
    await mkdir(this.basePath, { recursive: true });
    // Each writer gets its own temp file; the rename replaces the entry whole
    const tempPath = `${this.keyToPath(key)}.${randomUUID()}.tmp`;
    try {
      await writeFile(tempPath, JSON.stringify(entry), "utf-8");
      await rename(tempPath, this.keyToPath(key));
    } catch (err) {
      await rm(tempPath, { force: true });
      throw err;
    }
  }

  async delete(key: string): Promise<void> {
    try {
      await unlink(this.keyToPath(key));
    } catch (err) {
      if (!isMissingFile(err)) throw err;
    }
  }

  async keys(): Promise<string[]> {
    let names: string[];
    try {
      names = await readdir(this.basePath);
    } catch (err) {
      if (isMissingFile(err)) return [];
      throw err;
    }
    return names
      .filter((name) => name.endsWith(ENTRY_SUFFIX))
      .map((name) => name.slice(0, -ENTRY_SUFFIX.length));
  }

  /** Remove the entire cache directory. */
  async clear(): Promise<void> {
    await rm(this.basePath, { recursive: true, force: true });
  }

  async close(): Promise<void> {
    // No-op for file backend
  }
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}
