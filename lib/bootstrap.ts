/**
 * Process-level wiring. The caller owns the returned cache and must
 * `close()` it on shutdown; nothing here is stored in module state.
 */
import { LocalCacheBackend } from "./cache/local-backend";
import { MemoryCacheBackend } from "./cache/memory-backend";
import { TranslationCache } from "./cache/translation-cache";
import { loadConfig, type SignGlossConfig } from "./config";
import { TextRenderer, type SignRenderer } from "./sign/renderer";
import { SignLanguageTranslator } from "./sign/translator";

export interface SignGlossRuntime {
  config: SignGlossConfig;
  cache: TranslationCache | null;
  translator: SignLanguageTranslator;
  close(): Promise<void>;
}

export function createCache(config: SignGlossConfig): TranslationCache | null {
  const ttlMs = config.cacheTtlSeconds * 1000;
  switch (config.cacheMode) {
    case "off":
      return null;
    case "memory":
      return new TranslationCache(new MemoryCacheBackend({ maxSize: config.cacheMaxEntries }), { ttlMs });
    case "on":
      return new TranslationCache(new LocalCacheBackend(config.cachePath), { ttlMs });
    default: {
      const unreachable: never = config.cacheMode;
      return unreachable;
    }
  }
}

export function createRuntime(
  config: SignGlossConfig = loadConfig(),
  renderer: SignRenderer = new TextRenderer(config.assetsPath),
): SignGlossRuntime {
  const cache = createCache(config);
  const translator = new SignLanguageTranslator({ cache, renderer, naming: config.naming });
  return {
    config,
    cache,
    translator,
    async close() {
      if (cache) await cache.close();
    },
  };
}
