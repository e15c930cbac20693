import { mkdir, writeFile } from "fs/promises";
import { join } from "path";
import { getDefaultAssetsPath } from "@/lib/paths";
import { RenderError, errorMessage } from "./errors";
import type { GlossSequence, SignLanguage } from "./types";

/**
 * Boundary to whatever produces the signed media. Returns a reference the
 * asset-serving layer can resolve (a file name, path or URL).
 * Implementations reject with RenderError.
 */
export interface SignRenderer {
  render(gloss: GlossSequence, assetId: string, language: SignLanguage): Promise<string>;
}

export function describeGloss(gloss: GlossSequence, language: SignLanguage): string {
  return `${language.toUpperCase()} Signs: ${gloss.join(" -> ")}`;
}

/**
 * Default renderer used when no media backend is configured: writes a
 * plain-text description of the signs to `<outputDir>/<assetId>.txt` and
 * returns the file name.
 */
export class TextRenderer implements SignRenderer {
  readonly outputDir: string;

  constructor(outputDir?: string) {
    this.outputDir = outputDir || getDefaultAssetsPath();
  }

  async render(gloss: GlossSequence, assetId: string, language: SignLanguage): Promise<string> {
    const fileName = `${assetId}.txt`;
    try {
      await mkdir(this.outputDir, { recursive: true });
      await writeFile(join(this.outputDir, fileName), describeGloss(gloss, language), "utf-8");
    } catch (err) {
      throw new RenderError(assetId, `Failed to write ${fileName}: ${errorMessage(err)}`, { cause: err });
    }
    return fileName;
  }
}
