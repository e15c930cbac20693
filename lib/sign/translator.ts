/**
 * Public entry point: text + language in, TranslationResult out.
 *
 * Pipeline: cache lookup → tag → compose → name → render → cache store.
 * Every stage runs inside `attempt()`, which turns a throw into a
 * PipelineError outcome, so this class is the only place where internal
 * failures become the public result shape. The one exception that escapes
 * is UnsupportedLanguageError, raised before any work starts.
 */
import type { TranslationCache } from "@/lib/cache/translation-cache";
import { composeGloss } from "./composer";
import { PipelineError, UnsupportedLanguageError, errorMessage } from "./errors";
import { LexiconTagger } from "./lexicon-tagger";
import { nameAsset } from "./namer";
import { TextRenderer, type SignRenderer } from "./renderer";
import { tagText } from "./tokenizer";
import { DEFAULT_VARIANTS, type VariantRegistry } from "./variants";
import {
  SIGN_LANGUAGES,
  isSignLanguage,
  type GlossSequence,
  type NamingStrategy,
  type PartOfSpeechTagger,
  type SignLanguage,
  type TranslateOptions,
  type TranslationErrorKind,
  type TranslationResult,
} from "./types";

export type PipelineOutcome<T> = { ok: true; value: T } | { ok: false; error: PipelineError };

export interface SignLanguageTranslatorOptions {
  /** Pass null to run without memoization. */
  cache?: TranslationCache | null;
  renderer?: SignRenderer;
  tagger?: PartOfSpeechTagger;
  naming?: NamingStrategy;
  variants?: VariantRegistry;
  now?: () => number;
}

async function attempt<T>(stage: TranslationErrorKind, fn: () => T | Promise<T>): Promise<PipelineOutcome<T>> {
  try {
    return { ok: true, value: await fn() };
  } catch (err) {
    const error = err instanceof PipelineError ? err : new PipelineError(stage, errorMessage(err), { cause: err });
    return { ok: false, error };
  }
}

interface RenderedGloss {
  gloss: GlossSequence;
  assetRef: string;
}

export class SignLanguageTranslator {
  private cache: TranslationCache | null;
  private renderer: SignRenderer;
  private tagger: PartOfSpeechTagger;
  private naming: NamingStrategy;
  private variants: VariantRegistry;
  private now: () => number;

  constructor(options: SignLanguageTranslatorOptions = {}) {
    this.cache = options.cache ?? null;
    this.renderer = options.renderer ?? new TextRenderer();
    this.tagger = options.tagger ?? new LexiconTagger();
    this.naming = options.naming ?? "timestamp";
    this.variants = options.variants ?? DEFAULT_VARIANTS;
    this.now = options.now ?? (() => Date.now());
  }

  supportedLanguages(): SignLanguage[] {
    return [...SIGN_LANGUAGES];
  }

  /** Case-insensitive; throws UnsupportedLanguageError for unknown codes. */
  resolveLanguage(language: string): SignLanguage {
    const code = language.trim().toLowerCase();
    if (!isSignLanguage(code)) {
      throw new UnsupportedLanguageError(language, SIGN_LANGUAGES);
    }
    return code;
  }

  async translate(text: string, language: string, options?: TranslateOptions): Promise<TranslationResult> {
    const lang = this.resolveLanguage(language);

    if (this.cache) {
      const cached = await this.cache.get(text, lang);
      if (cached) return { ...cached, cached: true };
    }

    const start = performance.now();
    const outcome = await this.runPipeline(text, lang, options?.signal);
    const processingTimeMs = Math.round(performance.now() - start);

    if (!outcome.ok) {
      const { stage, message } = outcome.error;
      console.error(`[translator] ${lang} ${stage} failed: ${message}`);
      return {
        success: false,
        language: lang,
        assetRef: null,
        gloss: null,
        glossTokens: null,
        processingTimeMs,
        error: message,
        errorKind: stage,
        cached: false,
      };
    }

    const { gloss, assetRef } = outcome.value;
    const result: TranslationResult = {
      success: true,
      language: lang,
      assetRef,
      gloss: gloss.join(" "),
      glossTokens: [...gloss],
      processingTimeMs,
      error: null,
      errorKind: null,
      cached: false,
    };

    if (this.cache) await this.cache.set(text, lang, result);
    return result;
  }

  private async runPipeline(
    text: string,
    language: SignLanguage,
    signal: AbortSignal | undefined,
  ): Promise<PipelineOutcome<RenderedGloss>> {
    const variant = this.variants[language];

    const tokens = await attempt("tagging", () => tagText(text, variant.tagging, this.tagger));
    if (!tokens.ok) return tokens;

    const gloss = await attempt("composition", () => composeGloss(tokens.value, variant.grammar));
    if (!gloss.ok) return gloss;

    // Cancellation is only honoured up to this point
    if (signal?.aborted) {
      return { ok: false, error: new PipelineError("cancelled", "Translation cancelled before rendering") };
    }

    const assetId = await attempt("naming", () => nameAsset(gloss.value, language, this.now(), this.naming));
    if (!assetId.ok) return assetId;

    const renderer = variant.renderer ?? this.renderer;
    const assetRef = await attempt("rendering", () => renderer.render(gloss.value, assetId.value, language));
    if (!assetRef.ok) return assetRef;

    return { ok: true, value: { gloss: gloss.value, assetRef: assetRef.value } };
  }
}
