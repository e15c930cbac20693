import { ValidationError } from "./errors";

export interface TranslateRequest {
  text: string;
  language: string;
}

export const DEFAULT_LANGUAGE = "isl";

/**
 * Validates a raw `{ text, language? }` payload, e.g. a parsed JSON body.
 * Text is trimmed and must be non-empty; language defaults to ISL and is
 * lowercased. Whether the language is supported is the translator's call.
 */
export function parseTranslateRequest(body: unknown): TranslateRequest {
  if (typeof body !== "object" || body === null || !("text" in body) || body.text === undefined || body.text === null) {
    throw new ValidationError("No text provided");
  }
  if (typeof body.text !== "string") {
    throw new ValidationError("Text must be a string");
  }
  const text = body.text.trim();
  if (!text) {
    throw new ValidationError("Empty text provided");
  }

  let language = DEFAULT_LANGUAGE;
  if ("language" in body && body.language !== undefined && body.language !== null) {
    if (typeof body.language !== "string") {
      throw new ValidationError("Language must be a string");
    }
    language = body.language.trim().toLowerCase() || DEFAULT_LANGUAGE;
  }

  return { text, language };
}
