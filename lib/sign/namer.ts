/**
 * Asset identifiers.
 *
 * `timestamp` ids (`isl_1699999999`) repeat when two translations for the
 * same language finish within one second, and the later render overwrites
 * the earlier one. `content` appends a gloss hash so only identical glosses
 * can share an id.
 */
import { hashGloss } from "@/lib/cache/hash";
import type { GlossSequence, NamingStrategy, SignLanguage } from "./types";

export function nameAsset(
  gloss: GlossSequence,
  language: SignLanguage,
  generatedAt: number,
  strategy: NamingStrategy = "timestamp",
): string {
  const unixSeconds = Math.floor(generatedAt / 1000);
  switch (strategy) {
    case "timestamp":
      return `${language}_${unixSeconds}`;
    case "content":
      return `${language}_${unixSeconds}_${hashGloss(gloss)}`;
    default: {
      const unreachable: never = strategy;
      return unreachable;
    }
  }
}
