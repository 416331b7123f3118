import { createRequire } from "node:module";
import path from "node:path";
import kuromoji from "kuromoji";
import type { IpadicFeatures } from "kuromoji";
import { MorphToken, Tokenizer } from "../../domain/types.js";

export interface KuromojiEngine {
  tokenize(text: string): Array<Pick<IpadicFeatures, "surface_form" | "pos">>;
}

export class KuromojiTokenizer implements Tokenizer {
  constructor(private readonly engine: KuromojiEngine) {}

  tokenize(text: string): MorphToken[] {
    return this.engine.tokenize(text).map((token) => ({
      surface: token.surface_form,
      partOfSpeech: token.pos,
    }));
  }
}

/** The IPADIC dictionary that ships inside the kuromoji package. */
export function resolveBundledDictionaryPath(): string {
  const require = createRequire(import.meta.url);
  return path.join(path.dirname(require.resolve("kuromoji/package.json")), "dict");
}

export function buildKuromojiTokenizer(dicPath?: string | null): Promise<KuromojiTokenizer> {
  const resolvedPath = dicPath ?? resolveBundledDictionaryPath();

  return new Promise((resolve, reject) => {
    kuromoji.builder({ dicPath: resolvedPath }).build((error, engine) => {
      if (error) {
        reject(new Error(`Failed to build kuromoji tokenizer from ${resolvedPath}: ${error.message}`));
        return;
      }
      resolve(new KuromojiTokenizer(engine));
    });
  });
}
