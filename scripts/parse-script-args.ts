/**
 * CLI argument parser for scripts/translate.ts.
 * Handles --lang / -l, cache, asset and output flags, returning parsed
 * values and the remaining arguments, which form the text to translate.
 */
import { resolve } from "path";
import { isCacheMode, isNamingStrategy, type CacheMode } from "../lib/config";
import type { NamingStrategy } from "../lib/sign/types";

export interface ParsedScriptArgs {
  language: string | undefined;
  cacheMode: CacheMode | undefined;
  cachePath: string | undefined;
  assetsPath: string | undefined;
  cacheTtl: number | undefined;
  naming: NamingStrategy | undefined;
  json: boolean;
  prune: boolean;
  remainingArgs: string[];
}

function parseStringFlag(
  flagName: string,
  errorLabel: string,
  inlineValue: string | null,
  args: string[],
  index: number,
  options?: { resolve?: boolean },
): { value: string; spliceCount: number } {
  const raw = inlineValue ?? args[index + 1];
  if (raw === undefined || (inlineValue === null && raw.startsWith("-"))) {
    console.error(`Error: ${flagName} requires ${errorLabel}`);
    process.exit(1);
  }
  const value = options?.resolve ? resolve(raw) : raw;
  return { value, spliceCount: inlineValue !== null ? 1 : 2 };
}

function parsePositiveIntFlag(
  flagName: string,
  inlineValue: string | null,
  args: string[],
  index: number,
): { value: number; spliceCount: number } {
  const raw = inlineValue ?? args[index + 1];
  if (raw === undefined || (inlineValue === null && raw.startsWith("-"))) {
    console.error(`Error: ${flagName} requires a positive integer`);
    process.exit(1);
  }
  if (!/^\d+$/.test(raw)) {
    console.error(`Error: ${flagName} must be a positive integer`);
    process.exit(1);
  }
  const parsed = parseInt(raw, 10);
  if (parsed <= 0) {
    console.error(`Error: ${flagName} must be a positive integer`);
    process.exit(1);
  }
  return { value: parsed, spliceCount: inlineValue !== null ? 1 : 2 };
}

export function parseScriptArgs(argv: string[]): ParsedScriptArgs {
  const args = [...argv];
  let language: string | undefined;
  let cacheMode: CacheMode | undefined;
  let cachePath: string | undefined;
  let assetsPath: string | undefined;
  let cacheTtl: number | undefined;
  let naming: NamingStrategy | undefined;
  let json = false;
  let prune = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    // Everything after "--" is text, even if it looks like a flag
    if (arg === "--") {
      args.splice(i, 1);
      break;
    }

    // Split on first '=' to support --flag=value format uniformly
    const eqIdx = arg.indexOf("=");
    const flag = eqIdx >= 0 ? arg.slice(0, eqIdx) : arg;
    const inlineValue = eqIdx >= 0 ? arg.slice(eqIdx + 1) : null;

    if (flag === "--lang" || flag === "-l") {
      const { value, spliceCount } = parseStringFlag(flag, "a language code", inlineValue, args, i);
      language = value;
      args.splice(i, spliceCount);
      i--;
      continue;
    }

    if (flag === "--cache") {
      const { value, spliceCount } = parseStringFlag(flag, "a value (on|off|memory)", inlineValue, args, i);
      if (!isCacheMode(value)) {
        console.error(`Error: --cache must be one of on, off, memory`);
        process.exit(1);
      }
      cacheMode = value;
      args.splice(i, spliceCount);
      i--;
      continue;
    }

    if (flag === "--cache-path") {
      const { value, spliceCount } = parseStringFlag(flag, "a path argument", inlineValue, args, i, { resolve: true });
      cachePath = value;
      args.splice(i, spliceCount);
      i--;
      continue;
    }

    if (flag === "--assets-path") {
      const { value, spliceCount } = parseStringFlag(flag, "a path argument", inlineValue, args, i, { resolve: true });
      assetsPath = value;
      args.splice(i, spliceCount);
      i--;
      continue;
    }

    if (flag === "--cache-ttl") {
      const { value, spliceCount } = parsePositiveIntFlag(flag, inlineValue, args, i);
      cacheTtl = value;
      args.splice(i, spliceCount);
      i--;
      continue;
    }

    if (flag === "--naming") {
      const { value, spliceCount } = parseStringFlag(flag, "a value (timestamp|content)", inlineValue, args, i);
      if (!isNamingStrategy(value)) {
        console.error(`Error: --naming must be one of timestamp, content`);
        process.exit(1);
      }
      naming = value;
      args.splice(i, spliceCount);
      i--;
      continue;
    }

    if (arg === "--json") {
      json = true;
      args.splice(i, 1);
      i--;
      continue;
    }

    if (arg === "--prune") {
      prune = true;
      args.splice(i, 1);
      i--;
      continue;
    }
  }

  return { language, cacheMode, cachePath, assetsPath, cacheTtl, naming, json, prune, remainingArgs: args };
}
