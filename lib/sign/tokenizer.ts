/**
 * Text → tagged tokens.
 *
 * Two modes:
 * - `grammatical` splits like a Treebank word tokenizer (edge punctuation
 *   and clitics become their own units) and tags every word.
 * - `whitespace` only splits on whitespace and skips tagging; "rice." is a
 *   single unit there and gets dropped by the alphanumeric filter.
 */
import type { PartOfSpeechTagger, TaggingMode, Token, TokenCategory, WordClass } from "./types";

const ALPHANUMERIC = /^[\p{L}\p{N}]+$/u;
const EDGES = /^([^\p{L}\p{N}]*)(.*?)([^\p{L}\p{N}]*)$/su;
const CLITIC = /^(.+?)(n't|'s|'re|'ve|'ll|'d|'m)$/u;

// Stems left behind by "can't" and "won't"
const IRREGULAR_NEGATIONS: Record<string, string> = { ca: "can", wo: "will" };

export function isAlphanumeric(unit: string): boolean {
  return ALPHANUMERIC.test(unit);
}

/** Pronoun → subject, noun → object, verb → verb, everything else → other. */
export function classifyWordClass(wordClass: WordClass): TokenCategory {
  switch (wordClass) {
    case "pronoun":
      return "subject";
    case "noun":
      return "object";
    case "verb":
      return "verb";
    case "adjective":
    case "adverb":
    case "determiner":
    case "preposition":
    case "conjunction":
    case "numeral":
    case "other":
      return "other";
    default: {
      const unreachable: never = wordClass;
      return unreachable;
    }
  }
}

/**
 * Lowercases and splits text into word units, punctuation included.
 * "Don't stop." → ["do", "n't", "stop", "."]
 */
export function splitWordUnits(text: string): string[] {
  const units: string[] = [];
  const chunks = text.toLowerCase().replace(/[‘’]/g, "'").split(/[\s,;]+/);
  for (const chunk of chunks) {
    if (!chunk) continue;
    const match = EDGES.exec(chunk);
    if (!match) continue;
    const [, leading, core, trailing] = match;
    if (leading) units.push(leading);
    if (core) {
      const clitic = CLITIC.exec(core);
      if (clitic) {
        const [, stem, suffix] = clitic;
        units.push(suffix === "n't" ? (IRREGULAR_NEGATIONS[stem] ?? stem) : stem, suffix);
      } else {
        units.push(core);
      }
    }
    if (trailing) units.push(trailing);
  }
  return units;
}

/** Lowercase whitespace split, alphanumeric units only. */
export function splitOnWhitespace(text: string): string[] {
  return text.toLowerCase().split(/\s+/).filter(isAlphanumeric);
}

/**
 * Tokenize and categorize text. Returns [] for blank input and never
 * throws on malformed text; only the injected tagger can throw.
 */
export function tagText(text: string, mode: TaggingMode, tagger: PartOfSpeechTagger): Token[] {
  switch (mode) {
    case "whitespace":
      return splitOnWhitespace(text).map((word): Token => ({ text: word, category: "other" }));
    case "grammatical": {
      const words = splitWordUnits(text).filter(isAlphanumeric);
      if (words.length === 0) return [];
      const classes = tagger.tag(words);
      if (classes.length !== words.length) {
        throw new Error(`Tagger returned ${classes.length} tags for ${words.length} words`);
      }
      return words.map((word, i): Token => ({ text: word, category: classifyWordClass(classes[i]) }));
    }
    default: {
      const unreachable: never = mode;
      return unreachable;
    }
  }
}
