/**
 * Per-language pipeline wiring. Each variant names its tagging mode and
 * grammar rule, and may bring its own renderer.
 */
import type { SignRenderer } from "./renderer";
import type { GrammarRule, SignLanguage, TaggingMode } from "./types";

export interface VariantDefinition {
  language: SignLanguage;
  label: string;
  tagging: TaggingMode;
  grammar: GrammarRule;
  /** Falls back to the translator's renderer when omitted. */
  renderer?: SignRenderer;
}

export type VariantRegistry = Record<SignLanguage, VariantDefinition>;

export const DEFAULT_VARIANTS: VariantRegistry = {
  // Indian Sign Language: subject-object-verb
  isl: { language: "isl", label: "Indian Sign Language", tagging: "grammatical", grammar: "subject-object-verb" },
  // American Sign Language: cheaper path, words kept in source order
  asl: { language: "asl", label: "American Sign Language", tagging: "whitespace", grammar: "source-order" },
};
