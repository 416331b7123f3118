import { ScoredFaq, ScoredProduct } from "../domain/types.js";
import {
  RESOURCE_KINDS,
  ResourceCache,
  ResourceCacheStatus,
  ResourceKind,
} from "../infra/cache/resourceCache.js";
import { AnswerComposer } from "../pipelines/answering.js";
import { KeywordExtractor } from "../pipelines/keywords.js";
import { RelevanceRanker } from "../pipelines/ranking.js";
import { createLogger, describeError, Logger } from "../utils/logger.js";

export interface SearchRelatedResult {
  question: string;
  keywords: string[];
  products: ScoredProduct[];
  faqs: ScoredFaq[];
}

export interface GenerateAnswerResult {
  answer: string;
}

export interface AskResult {
  products: ScoredProduct[];
  faqs: ScoredFaq[];
  answer: string;
}

export interface StatusResult {
  ready: boolean;
  resources: ResourceCacheStatus;
  requests_since_release: number;
}

export interface ReleaseResourcesResult {
  released: ResourceKind[];
}

export interface ProductQaServiceOptions {
  /** Release every cached resource after this many requests; 0 disables. */
  releaseAfterRequests: number;
  productScanLimit: number;
  faqScanLimit: number;
}

export class ProductQaService {
  private readonly keywordExtractor: KeywordExtractor;

  private readonly ranker: RelevanceRanker;

  private readonly composer: AnswerComposer;

  private requestsSinceRelease = 0;

  constructor(
    private readonly resources: ResourceCache,
    private readonly options: ProductQaServiceOptions,
    private readonly logger: Logger = createLogger("service"),
  ) {
    this.keywordExtractor = new KeywordExtractor(() => resources.peek("tokenizer"));
    this.ranker = new RelevanceRanker(resources, this.keywordExtractor, {
      productScanLimit: options.productScanLimit,
      faqScanLimit: options.faqScanLimit,
    });
    this.composer = new AnswerComposer(() => resources.get("answerClient"));
  }

  async searchRelated(question: string): Promise<SearchRelatedResult> {
    return this.track("search_related", async () => {
      const keywords = await this.keywordExtractor.extract(question);
      const { products, faqs } = await this.rankByKeywords(keywords);
      return {
        question,
        keywords: [...keywords],
        products,
        faqs,
      };
    });
  }

  async generateAnswer(question: string): Promise<GenerateAnswerResult> {
    return this.track("generate_answer", async () => {
      const { answer } = await this.rankAndCompose(question);
      return { answer };
    });
  }

  async ask(question: string): Promise<AskResult> {
    return this.track("ask_question", () => this.rankAndCompose(question));
  }

  /** `ready` needs every resource loaded and both corpora non-empty. */
  status(): StatusResult {
    const resources = this.resources.describe();
    const corpusSizes = this.resources.corpusSizes();
    return {
      ready:
        RESOURCE_KINDS.every((kind) => resources[kind].loaded) &&
        corpusSizes.products > 0 &&
        corpusSizes.faqs > 0,
      resources,
      requests_since_release: this.requestsSinceRelease,
    };
  }

  releaseResources(): ReleaseResourcesResult {
    this.requestsSinceRelease = 0;
    return { released: this.resources.releaseAll() };
  }

  private async rankByKeywords(
    keywords: ReadonlySet<string>,
  ): Promise<{ products: ScoredProduct[]; faqs: ScoredFaq[] }> {
    const [products, faqs] = await Promise.all([
      this.ranker.rankProductsByKeywords(keywords),
      this.ranker.rankFaqsByKeywords(keywords),
    ]);
    return { products, faqs };
  }

  private async rankAndCompose(question: string): Promise<AskResult> {
    const keywords = await this.keywordExtractor.extract(question);
    const { products, faqs } = await this.rankByKeywords(keywords);
    const answer = await this.composer.compose(question, [...products, ...faqs]);
    return { products, faqs, answer };
  }

  private async track<T>(operation: string, task: () => Promise<T>): Promise<T> {
    let result: T;
    try {
      result = await task();
    } catch (error) {
      this.logger.error("Request failed; releasing cached resources", {
        operation,
        reason: describeError(error),
      });
      this.releaseResources();
      throw error;
    }

    this.countRequest();
    return result;
  }

  private countRequest(): void {
    if (this.options.releaseAfterRequests <= 0) {
      return;
    }
    this.requestsSinceRelease += 1;
    if (this.requestsSinceRelease >= this.options.releaseAfterRequests) {
      this.logger.info("Request budget reached; releasing cached resources", {
        requests: this.requestsSinceRelease,
      });
      this.releaseResources();
    }
  }
}
