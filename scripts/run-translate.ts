import { createRuntime } from "../lib/bootstrap";
import { loadConfig, type SignGlossConfig } from "../lib/config";
import { parseTranslateRequest, type TranslateRequest } from "../lib/sign/request";
import { ValidationError } from "../lib/sign/errors";
import { parseScriptArgs } from "./parse-script-args";

export const USAGE = `Usage: translate [--lang isl|asl] [--cache on|off|memory] [--cache-path <dir>]
                 [--assets-path <dir>] [--cache-ttl <seconds>] [--naming timestamp|content]
                 [--json] [--prune] <text...>`;

/**
 * Runs one CLI invocation and resolves to its exit code. Flags override
 * the environment config.
 */
export async function runTranslate(argv: string[], env: NodeJS.ProcessEnv = process.env): Promise<number> {
  const parsed = parseScriptArgs(argv);
  const config: SignGlossConfig = {
    ...loadConfig(env),
    ...(parsed.cacheMode ? { cacheMode: parsed.cacheMode } : {}),
    ...(parsed.cachePath ? { cachePath: parsed.cachePath } : {}),
    ...(parsed.assetsPath ? { assetsPath: parsed.assetsPath } : {}),
    ...(parsed.cacheTtl ? { cacheTtlSeconds: parsed.cacheTtl } : {}),
    ...(parsed.naming ? { naming: parsed.naming } : {}),
  };

  const runtime = createRuntime(config);
  try {
    if (parsed.prune) {
      if (runtime.cache) {
        const removed = await runtime.cache.prune();
        console.log(`Pruned ${removed} expired cache ${removed === 1 ? "entry" : "entries"}`);
      } else {
        console.log("Cache disabled, nothing to prune");
      }
      if (parsed.remainingArgs.length === 0) return 0;
    }

    let request: TranslateRequest;
    try {
      request = parseTranslateRequest({ text: parsed.remainingArgs.join(" "), language: parsed.language });
    } catch (err) {
      if (err instanceof ValidationError) {
        console.error(`Error: ${err.message}`);
        console.error(USAGE);
        return 1;
      }
      throw err;
    }

    const result = await runtime.translator.translate(request.text, request.language);

    if (parsed.json) {
      console.log(JSON.stringify(result, null, 2));
    } else if (result.success) {
      console.log(`Gloss:  ${result.gloss}`);
      console.log(`Asset:  ${result.assetRef}`);
      const timing = result.processingTimeMs === null ? "n/a" : `${result.processingTimeMs}ms`;
      console.log(`Time:   ${timing}${result.cached ? " (cached)" : ""}`);
    } else {
      console.error(`Translation failed (${result.errorKind}): ${result.error}`);
    }
    return result.success ? 0 : 1;
  } finally {
    await runtime.close();
  }
}
