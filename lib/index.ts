/**
 * Public API: the translation pipeline, its cache and process wiring.
 */
export { SignLanguageTranslator } from "./sign/translator";
export type { SignLanguageTranslatorOptions, PipelineOutcome } from "./sign/translator";
export { tagText, splitWordUnits, splitOnWhitespace, classifyWordClass, isAlphanumeric } from "./sign/tokenizer";
export { LexiconTagger, DEFAULT_LEXICON } from "./sign/lexicon-tagger";
export type { Lexicon } from "./sign/lexicon-tagger";
export { composeGloss, SOV_ORDER } from "./sign/composer";
export { nameAsset } from "./sign/namer";
export { TextRenderer, describeGloss } from "./sign/renderer";
export type { SignRenderer } from "./sign/renderer";
export { DEFAULT_VARIANTS } from "./sign/variants";
export type { VariantDefinition, VariantRegistry } from "./sign/variants";
export { parseTranslateRequest, DEFAULT_LANGUAGE } from "./sign/request";
export type { TranslateRequest } from "./sign/request";
export {
  ValidationError,
  UnsupportedLanguageError,
  PipelineError,
  RenderError,
  CacheError,
} from "./sign/errors";
export { SIGN_LANGUAGES, isSignLanguage, isTranslationResult } from "./sign/types";
export type {
  SignLanguage,
  TokenCategory,
  WordClass,
  Token,
  GlossSequence,
  TaggingMode,
  GrammarRule,
  NamingStrategy,
  PartOfSpeechTagger,
  TranslationErrorKind,
  TranslationResult,
  TranslateOptions,
} from "./sign/types";
export type { CacheBackend, CacheEntry, TranslationCacheOptions } from "./cache/types";
export { cacheKey, normalizeText } from "./cache/hash";
export { LocalCacheBackend } from "./cache/local-backend";
export { MemoryCacheBackend } from "./cache/memory-backend";
export type { MemoryCacheBackendOptions } from "./cache/memory-backend";
export { TranslationCache, DEFAULT_TTL_MS } from "./cache/translation-cache";
export { loadConfig } from "./config";
export type { SignGlossConfig, CacheMode } from "./config";
export { createCache, createRuntime } from "./bootstrap";
export type { SignGlossRuntime } from "./bootstrap";
