import { FaqEntry, ProductEntry, ScoredFaq, ScoredProduct } from "../domain/types.js";
import { ResourceCache } from "../infra/cache/resourceCache.js";
import { KeywordExtractor } from "./keywords.js";

const PRODUCT_NAME_HIT = 5;
const PRODUCT_TEXT_HIT = 2;
const FAQ_QUESTION_HIT = 5;
const FAQ_ANSWER_HIT = 4;
const FAQ_TEXT_HIT = 3;

export interface ProductRankOptions {
  scoreThreshold: number;
  topN: number;
  scanLimit: number;
}

export interface FaqRankOptions {
  scoreThreshold: number;
  topN: number;
  scoreGapThreshold: number;
  scanLimit: number;
}

export const DEFAULT_PRODUCT_RANK_OPTIONS: ProductRankOptions = {
  scoreThreshold: 2,
  topN: 3,
  scanLimit: 100,
};

export const DEFAULT_FAQ_RANK_OPTIONS: FaqRankOptions = {
  scoreThreshold: 5,
  topN: 2,
  scoreGapThreshold: 5,
  scanLimit: 50,
};

export function scoreProduct(product: ProductEntry, keywords: Iterable<string>): number {
  const combined = `${product.name} ${product.description} ${product.notes}`;
  let score = 0;
  for (const keyword of keywords) {
    if (product.name.includes(keyword)) {
      score += PRODUCT_NAME_HIT;
    } else if (combined.includes(keyword)) {
      score += PRODUCT_TEXT_HIT;
    }
  }
  return score;
}

// The question hit adds to the answer/text hit; only answer vs. text is exclusive.
export function scoreFaq(faq: FaqEntry, keywords: Iterable<string>): number {
  const combined = `${faq.question} ${faq.answer} ${faq.relatedWords.join(" ")} ${faq.relatedLinks}`;
  let score = 0;
  for (const keyword of keywords) {
    if (faq.question.includes(keyword)) {
      score += FAQ_QUESTION_HIT;
    }
    if (faq.answer.includes(keyword)) {
      score += FAQ_ANSWER_HIT;
    } else if (combined.includes(keyword)) {
      score += FAQ_TEXT_HIT;
    }
  }
  return score;
}

/**
 * Keeps the first `topN` items of a list sorted by descending score, plus any
 * item tied with the score at rank `topN`.
 */
export function selectTopWithTies<T extends { score: number }>(sorted: T[], topN: number): T[] {
  const limit = Math.max(1, Math.floor(topN));
  if (sorted.length <= limit) {
    return sorted;
  }
  const minScore = sorted[limit - 1].score;
  return sorted.filter((item) => item.score >= minScore);
}

/** Gap rule first, then the top-N cut. */
export function collapseFaqResults(
  sorted: ScoredFaq[],
  topN: number,
  scoreGapThreshold: number,
): ScoredFaq[] {
  if (sorted.length < 2) {
    return sorted;
  }
  const [first, second] = sorted;
  if (first.score - second.score >= scoreGapThreshold) {
    return [first];
  }
  return selectTopWithTies(sorted, topN);
}

export function rankProductEntries(
  products: readonly ProductEntry[],
  keywords: ReadonlySet<string>,
  options: ProductRankOptions = DEFAULT_PRODUCT_RANK_OPTIONS,
): ScoredProduct[] {
  if (keywords.size === 0 || products.length === 0) {
    return [];
  }

  const results: ScoredProduct[] = [];
  for (const product of products.slice(0, options.scanLimit)) {
    const score = scoreProduct(product, keywords);
    if (score >= options.scoreThreshold) {
      results.push({
        kind: "product",
        name: product.name,
        description: product.description,
        notes: product.notes,
        link: product.link,
        score,
      });
    }
  }

  results.sort((a, b) => b.score - a.score);
  return selectTopWithTies(results, options.topN);
}

export function rankFaqEntries(
  faqs: readonly FaqEntry[],
  keywords: ReadonlySet<string>,
  options: FaqRankOptions = DEFAULT_FAQ_RANK_OPTIONS,
): ScoredFaq[] {
  if (keywords.size === 0 || faqs.length === 0) {
    return [];
  }

  const results: ScoredFaq[] = [];
  for (const faq of faqs.slice(0, options.scanLimit)) {
    const score = scoreFaq(faq, keywords);
    if (score >= options.scoreThreshold) {
      results.push({
        kind: "faq",
        question: faq.question,
        answer: faq.answer,
        relatedLinks: faq.relatedLinks,
        score,
      });
    }
  }

  results.sort((a, b) => b.score - a.score);
  return collapseFaqResults(results, options.topN, options.scoreGapThreshold);
}

export interface RankerLimits {
  productScanLimit: number;
  faqScanLimit: number;
}

export class RelevanceRanker {
  constructor(
    private readonly resources: Pick<ResourceCache, "get">,
    private readonly keywordExtractor: KeywordExtractor,
    private readonly limits: RankerLimits = {
      productScanLimit: DEFAULT_PRODUCT_RANK_OPTIONS.scanLimit,
      faqScanLimit: DEFAULT_FAQ_RANK_OPTIONS.scanLimit,
    },
  ) {}

  async rankProducts(
    question: string,
    options: Partial<Omit<ProductRankOptions, "scanLimit">> = {},
  ): Promise<ScoredProduct[]> {
    return this.rankProductsByKeywords(await this.keywordExtractor.extract(question), options);
  }

  async rankFaqs(
    question: string,
    options: Partial<Omit<FaqRankOptions, "scanLimit">> = {},
  ): Promise<ScoredFaq[]> {
    return this.rankFaqsByKeywords(await this.keywordExtractor.extract(question), options);
  }

  /** For callers that have already extracted the keywords of a question. */
  async rankProductsByKeywords(
    keywords: ReadonlySet<string>,
    options: Partial<Omit<ProductRankOptions, "scanLimit">> = {},
  ): Promise<ScoredProduct[]> {
    if (keywords.size === 0) {
      return [];
    }
    const products = await this.resources.get("products");
    if (!products) {
      return [];
    }
    return rankProductEntries(products, keywords, {
      ...DEFAULT_PRODUCT_RANK_OPTIONS,
      ...options,
      scanLimit: this.limits.productScanLimit,
    });
  }

  async rankFaqsByKeywords(
    keywords: ReadonlySet<string>,
    options: Partial<Omit<FaqRankOptions, "scanLimit">> = {},
  ): Promise<ScoredFaq[]> {
    if (keywords.size === 0) {
      return [];
    }
    const faqs = await this.resources.get("faqs");
    if (!faqs) {
      return [];
    }
    return rankFaqEntries(faqs, keywords, {
      ...DEFAULT_FAQ_RANK_OPTIONS,
      ...options,
      scanLimit: this.limits.faqScanLimit,
    });
  }
}
