import type { GlossSequence, GrammarRule, Token, TokenCategory } from "./types";

/** Bucket order for subject-object-verb grammars. */
export const SOV_ORDER: readonly TokenCategory[] = ["subject", "object", "verb", "other"];

function bucketIndex(category: TokenCategory): number {
  switch (category) {
    case "subject":
      return 0;
    case "object":
      return 1;
    case "verb":
      return 2;
    case "other":
      return 3;
    default: {
      const unreachable: never = category;
      return unreachable;
    }
  }
}

function toGloss(token: Token): string {
  return token.text.toUpperCase().replace(/\s+/g, "");
}

/**
 * Orders tokens into glosses. `subject-object-verb` is a stable partition
 * (input order kept within each bucket); `source-order` keeps the input as-is.
 */
export function composeGloss(tokens: readonly Token[], grammar: GrammarRule): GlossSequence {
  switch (grammar) {
    case "source-order":
      return tokens.map(toGloss);
    case "subject-object-verb": {
      const buckets: string[][] = SOV_ORDER.map(() => []);
      for (const token of tokens) {
        buckets[bucketIndex(token.category)].push(toGloss(token));
      }
      return buckets.flat();
    }
    default: {
      const unreachable: never = grammar;
      return unreachable;
    }
  }
}
