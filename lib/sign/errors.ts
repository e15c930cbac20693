import type { TranslationErrorKind } from "./types";

/** Caller-facing input problem. Raised before any work is done; not retried. */
export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}

export class UnsupportedLanguageError extends ValidationError {
  readonly language: string;

  constructor(language: string, supported: readonly string[]) {
    super(`Unsupported language '${language}'. Use ${supported.map((l) => `'${l}'`).join(" or ")}`);
    this.name = "UnsupportedLanguageError";
    this.language = language;
  }
}

/** Failure inside one stage of the pipeline. Never escapes the translator. */
export class PipelineError extends Error {
  readonly stage: TranslationErrorKind;

  constructor(stage: TranslationErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "PipelineError";
    this.stage = stage;
  }
}

/** Thrown by renderers when an asset cannot be produced. */
export class RenderError extends Error {
  readonly assetId: string;

  constructor(assetId: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "RenderError";
    this.assetId = assetId;
  }
}

/** Backend read/write failure. Logged and swallowed by the cache. */
export class CacheError extends Error {
  readonly operation: "read" | "write" | "prune" | "clear";

  constructor(operation: CacheError["operation"], message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "CacheError";
    this.operation = operation;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
