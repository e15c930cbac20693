/**
 * Dictionary-and-suffix part-of-speech tagger.
 *
 * Closed word classes come from lexicon.json. Unknown words fall through
 * a short list of suffix rules and default to noun, so open-class words
 * the lexicon has never seen still land in the object bucket.
 */
import lexiconData from "./lexicon.json";
import type { PartOfSpeechTagger, WordClass } from "./types";

export interface Lexicon {
  pronoun: readonly string[];
  possessive: readonly string[];
  determiner: readonly string[];
  preposition: readonly string[];
  conjunction: readonly string[];
  numeral: readonly string[];
  adverb: readonly string[];
  adjective: readonly string[];
  verb: readonly string[];
}

export const DEFAULT_LEXICON: Lexicon = lexiconData;

// Checked in this order; the first list containing the word wins.
const LOOKUP_ORDER = [
  "pronoun",
  "determiner",
  "preposition",
  "conjunction",
  "numeral",
  "adverb",
  "adjective",
  "verb",
] as const satisfies readonly WordClass[];

const ADJECTIVE_SUFFIXES = ["ous", "ful", "able", "ible", "ive", "less", "ish"];

const DIGITS = /^\p{N}+$/u;

export class LexiconTagger implements PartOfSpeechTagger {
  private classes: Map<string, WordClass>;
  private verbs: Set<string>;
  private possessives: Set<string>;

  constructor(lexicon: Lexicon = DEFAULT_LEXICON) {
    this.classes = new Map();
    // Reverse so earlier classes in LOOKUP_ORDER overwrite later ones
    for (const wordClass of [...LOOKUP_ORDER].reverse()) {
      for (const word of lexicon[wordClass]) this.classes.set(word, wordClass);
    }
    this.verbs = new Set(lexicon.verb);
    this.possessives = new Set(lexicon.possessive);
  }

  tag(words: readonly string[]): WordClass[] {
    const tags: WordClass[] = [];
    for (let i = 0; i < words.length; i++) {
      const prevWord = i > 0 ? words[i - 1] : undefined;
      const prevTag = i > 0 ? tags[i - 1] : undefined;
      tags.push(this.tagWord(words[i], prevWord, prevTag));
    }
    return tags;
  }

  private tagWord(word: string, prevWord: string | undefined, prevTag: WordClass | undefined): WordClass {
    if (DIGITS.test(word)) return "numeral";

    const nounContext =
      prevTag === "determiner" ||
      prevTag === "adjective" ||
      (prevWord !== undefined && this.possessives.has(prevWord));

    const known = this.classes.get(word);
    if (known) {
      // "the work", "my sign"
      if (known === "verb" && nounContext) return "noun";
      return known;
    }

    if (this.isInflectedVerb(word)) return nounContext ? "noun" : "verb";

    const suffixClass = classifyBySuffix(word);
    if (suffixClass) return suffixClass;

    // "they paint houses": an unknown word right after a subject pronoun
    if (prevTag === "pronoun" && prevWord !== undefined && !this.possessives.has(prevWord)) {
      return "verb";
    }
    return "noun";
  }

  /** Third-person forms of known verbs: "reads", "watches". */
  private isInflectedVerb(word: string): boolean {
    if (word.length < 3 || !word.endsWith("s")) return false;
    if (this.verbs.has(word.slice(0, -1))) return true;
    return word.endsWith("es") && this.verbs.has(word.slice(0, -2));
  }
}

function classifyBySuffix(word: string): WordClass | null {
  if (word.length > 4 && word.endsWith("ly")) return "adverb";
  if (word.length > 5 && word.endsWith("ing")) return "verb";
  if (word.length > 4 && word.endsWith("ed")) return "verb";
  for (const suffix of ADJECTIVE_SUFFIXES) {
    if (word.length > suffix.length + 3 && word.endsWith(suffix)) return "adjective";
  }
  return null;
}
