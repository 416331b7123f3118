import { AppConfig } from "../../config/env.js";
import { createLogger } from "../../utils/logger.js";
import { createAnswerGenerator } from "../ai/createAnswerGenerator.js";
import { loadFaqCorpus, loadProductCorpus } from "../corpus/corpusLoader.js";
import { buildKuromojiTokenizer } from "../tokenizer/kuromojiTokenizer.js";
import { ResourceCache } from "./resourceCache.js";

export function createResourceCache(config: AppConfig): ResourceCache {
  const corpusLogger = createLogger("corpus");

  return new ResourceCache(
    {
      products: () => loadProductCorpus(config.productsFile, corpusLogger),
      faqs: () => loadFaqCorpus(config.faqsFile, corpusLogger),
      tokenizer: () => buildKuromojiTokenizer(config.kuromojiDictPath),
      answerClient: async () => createAnswerGenerator(config),
    },
    {
      ttlMs: config.resourceTtlMs,
      logger: createLogger("resource-cache"),
    },
  );
}
