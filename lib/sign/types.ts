/**
 * Standalone type definitions for the translation pipeline.
 */

export const SIGN_LANGUAGES = ["isl", "asl"] as const;

/** Target signed language. Add a code here and a variant in variants.ts to extend. */
export type SignLanguage = (typeof SIGN_LANGUAGES)[number];

/** Grammatical bucket a token is reordered by. */
export type TokenCategory = "subject" | "object" | "verb" | "other";

/** Coarse part of speech produced by a tagger. */
export type WordClass =
  | "pronoun"
  | "noun"
  | "verb"
  | "adjective"
  | "adverb"
  | "determiner"
  | "preposition"
  | "conjunction"
  | "numeral"
  | "other";

export interface Token {
  readonly text: string;
  readonly category: TokenCategory;
}

/** Ordered, upper-cased glosses. */
export type GlossSequence = readonly string[];

/** How raw text is split into tokens. */
export type TaggingMode = "grammatical" | "whitespace";

/** How tokens are ordered into a gloss sequence. */
export type GrammarRule = "subject-object-verb" | "source-order";

export type NamingStrategy = "timestamp" | "content";

/** Injected part-of-speech model. Receives lowercase alphanumeric words. */
export interface PartOfSpeechTagger {
  tag(words: readonly string[]): WordClass[];
}

export type TranslationErrorKind = "tagging" | "composition" | "naming" | "rendering" | "cancelled";

/** Public, JSON-serializable result of a translation. */
export interface TranslationResult {
  success: boolean;
  language: SignLanguage;
  assetRef: string | null;
  gloss: string | null;
  glossTokens: string[] | null;
  processingTimeMs: number | null;
  error: string | null;
  errorKind: TranslationErrorKind | null;
  cached: boolean;
}

export interface TranslateOptions {
  /** Checked before rendering; an aborted signal yields a cancelled result. */
  signal?: AbortSignal;
}

export function isSignLanguage(value: string): value is SignLanguage {
  return SIGN_LANGUAGES.some((language) => language === value);
}

const ERROR_KINDS: readonly string[] = ["tagging", "composition", "naming", "rendering", "cancelled"];

function isStringOrNull(value: unknown): value is string | null {
  return value === null || typeof value === "string";
}

/** Structural check for results read back from a cache backend. */
export function isTranslationResult(value: unknown): value is TranslationResult {
  if (typeof value !== "object" || value === null) return false;
  const r: Record<string, unknown> = Object.fromEntries(Object.entries(value));
  return (
    typeof r.success === "boolean" &&
    typeof r.language === "string" &&
    isSignLanguage(r.language) &&
    isStringOrNull(r.assetRef) &&
    isStringOrNull(r.gloss) &&
    (r.glossTokens === null ||
      (Array.isArray(r.glossTokens) && r.glossTokens.every((t) => typeof t === "string"))) &&
    (r.processingTimeMs === null || typeof r.processingTimeMs === "number") &&
    isStringOrNull(r.error) &&
    (r.errorKind === null || (typeof r.errorKind === "string" && ERROR_KINDS.includes(r.errorKind))) &&
    typeof r.cached === "boolean" &&
    hasConsistentOutcome(r)
  );
}

/** A success carries the asset and gloss and no error; a failure the reverse. */
function hasConsistentOutcome(r: Record<string, unknown>): boolean {
  if (r.success) {
    return r.assetRef !== null && r.gloss !== null && r.glossTokens !== null && r.error === null && r.errorKind === null;
  }
  return r.assetRef === null && r.gloss === null && r.glossTokens === null && r.error !== null && r.errorKind !== null;
}
