export interface ProductEntry {
  readonly name: string;
  readonly description: string;
  readonly notes: string;
  readonly link: string;
}

export interface FaqEntry {
  readonly question: string;
  readonly answer: string;
  readonly relatedWords: readonly string[];
  readonly relatedLinks: string;
}

export interface ScoredProduct {
  kind: "product";
  name: string;
  description: string;
  notes: string;
  link: string;
  score: number;
}

export interface ScoredFaq {
  kind: "faq";
  question: string;
  answer: string;
  relatedLinks: string;
  score: number;
}

export type RankedItem = ScoredProduct | ScoredFaq;

export interface MorphToken {
  surface: string;
  /** Coarse part of speech, e.g. "名詞" or "形容詞". */
  partOfSpeech: string;
}

export interface Tokenizer {
  tokenize(text: string): MorphToken[];
}
