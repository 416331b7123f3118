import { Tokenizer } from "../domain/types.js";
import {
  decodeMarkup,
  sanitizeText,
  splitOnWhitespace,
  STOP_WORDS,
  stripEdgePunctuation,
} from "../utils/text.js";

export const MAX_TOKENS_SCANNED = 100;
export const MAX_KEYWORDS = 20;

const KEYWORD_PARTS_OF_SPEECH = new Set(["名詞", "形容詞"]);

export interface KeywordStrategy {
  readonly name: "morphological" | "lightweight";
  extract(text: string): Set<string>;
}

/** Nouns and adjectives from a morphological tokenizer. */
export class MorphologicalKeywordStrategy implements KeywordStrategy {
  readonly name = "morphological";

  constructor(private readonly tokenizer: Tokenizer) {}

  extract(text: string): Set<string> {
    const keywords = new Set<string>();
    const tokens = this.tokenizer.tokenize(text).slice(0, MAX_TOKENS_SCANNED);

    for (const token of tokens) {
      if (!KEYWORD_PARTS_OF_SPEECH.has(token.partOfSpeech)) {
        continue;
      }
      if (token.surface.length <= 1) {
        continue;
      }
      keywords.add(token.surface);
      if (keywords.size >= MAX_KEYWORDS) {
        break;
      }
    }

    return keywords;
  }
}

/** Used while no morphological tokenizer is available. */
export class LightweightKeywordStrategy implements KeywordStrategy {
  readonly name = "lightweight";

  extract(text: string): Set<string> {
    const keywords = new Set<string>();
    for (const part of splitOnWhitespace(text)) {
      const word = stripEdgePunctuation(part);
      if (word.length <= 1 || STOP_WORDS.has(word.toLowerCase())) {
        continue;
      }
      keywords.add(word);
    }
    return keywords;
  }
}

/** Must not block: returns null while the tokenizer is still loading. */
export type TokenizerSource = () => Tokenizer | null;

export class KeywordExtractor {
  private readonly fallback = new LightweightKeywordStrategy();

  constructor(private readonly tokenizerSource: TokenizerSource) {}

  async extract(text: unknown): Promise<Set<string>> {
    const sanitized = sanitizeText(text);
    if (!sanitized) {
      return new Set();
    }

    // The sanitizer gates the text; its entities are not part of the question.
    return this.resolveStrategy().extract(decodeMarkup(sanitized));
  }

  private resolveStrategy(): KeywordStrategy {
    const tokenizer = this.tokenizerSource();
    return tokenizer ? new MorphologicalKeywordStrategy(tokenizer) : this.fallback;
  }
}
