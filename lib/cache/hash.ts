import { createHash } from "crypto";

/**
 * Collapses whitespace and case so that "I  eat rice " and "i eat rice"
 * share a cache entry. The tokenizer lowercases anyway, so this never
 * merges inputs that would translate differently.
 */
export function normalizeText(text: string): string {
  return text.trim().replace(/\s+/g, " ").toLowerCase();
}

/**
 * Content key for a (text, language) pair: SHA-256 hex of
 * `${normalizedText}_${language}`.
 */
export function cacheKey(text: string, language: string): string {
  const content = `${normalizeText(text)}_${language.toLowerCase()}`;
  return createHash("sha256").update(content, "utf-8").digest("hex");
}

/** Short content hash of a gloss sequence, used by the content naming strategy. */
export function hashGloss(gloss: readonly string[]): string {
  return createHash("sha256").update(gloss.join(" "), "utf-8").digest("hex").slice(0, 8);
}
