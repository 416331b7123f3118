import { describe, expect, it, vi } from "vitest";
import { MorphToken, ProductEntry, Tokenizer } from "../src/domain/types.js";
import { NO_RELATED_INFO_MESSAGE } from "../src/pipelines/answering.js";
import { ProductQaService } from "../src/services/productQaService.js";
import {
  createFakeGenerator,
  createTestCache,
  createTestLogger,
  faq,
  FakeTokenizer,
  noun,
  product,
} from "./support/fakes.js";

const CATALOGUE: ProductEntry[] = [
  product({ name: "保温ボトル", description: "温かい飲み物を保温", link: "https://shop.example.com/b" }),
  product({ name: "折りたたみ傘", description: "軽量" }),
];

const FAQS = [
  faq({ question: "返品方法は？", answer: "30日以内に連絡してください" }),
  faq({ question: "送料はいくらですか？", answer: "550円です" }),
];

function createService(options: {
  tokens?: MorphToken[];
  tokenizer?: Tokenizer;
  catalogue?: ProductEntry[];
  releaseAfterRequests?: number;
  reply?: string | Error;
}) {
  const { generator, generate } = createFakeGenerator(options.reply);
  const products = vi.fn(async () => options.catalogue ?? CATALOGUE);
  const { cache } = createTestCache({
    products,
    faqs: async () => FAQS,
    tokenizer: async () => options.tokenizer ?? new FakeTokenizer(options.tokens ?? []),
    answerClient: async () => generator,
  });
  const service = new ProductQaService(
    cache,
    {
      releaseAfterRequests: options.releaseAfterRequests ?? 0,
      productScanLimit: 100,
      faqScanLimit: 50,
    },
    createTestLogger(),
  );
  return { service, cache, generate, products };
}

describe("ProductQaService", () => {
  it("returns related products and FAQ entries for a question", async () => {
    const { service, cache } = createService({ tokens: [noun("保温"), noun("ボトル")] });
    await cache.get("tokenizer");

    const result = await service.searchRelated("保温ボトル");

    expect(result.question).toBe("保温ボトル");
    expect(result.keywords).toEqual(["保温", "ボトル"]);
    expect(result.products).toEqual([
      {
        kind: "product",
        name: "保温ボトル",
        description: "温かい飲み物を保温",
        notes: "",
        link: "https://shop.example.com/b",
        score: 10,
      },
    ]);
    expect(result.faqs).toEqual([]);
  });

  it("answers with the matches as context", async () => {
    const { service, cache, generate } = createService({
      tokens: [noun("返品")],
      reply: "30日以内にご連絡ください。",
    });
    await cache.get("tokenizer");

    const result = await service.ask("返品したい");

    expect(result.products).toEqual([]);
    expect(result.faqs.map((item) => item.question)).toEqual(["返品方法は？"]);
    expect(result.answer).toBe("30日以内にご連絡ください。");
    expect(generate).toHaveBeenCalledTimes(1);
    expect(generate.mock.calls[0][0]).toContain("質問: 返品方法は？, 回答: 30日以内に連絡してください\n");
  });

  it("does not call the model when nothing matches", async () => {
    const { service, cache, generate } = createService({ tokens: [noun("ギフト")] });
    await cache.get("tokenizer");

    expect(await service.generateAnswer("ギフト")).toEqual({ answer: NO_RELATED_INFO_MESSAGE });
    expect(generate).not.toHaveBeenCalled();
  });

  it("releases cached resources after the configured number of requests", async () => {
    const { service, cache, products } = createService({
      tokens: [noun("保温")],
      releaseAfterRequests: 2,
    });
    await cache.get("tokenizer");

    await service.searchRelated("保温");
    expect(service.status().requests_since_release).toBe(1);
    await service.searchRelated("保温");
    expect(service.status().requests_since_release).toBe(0);
    expect(service.status().resources.products.loaded).toBe(false);

    await service.searchRelated("保温");
    expect(products).toHaveBeenCalledTimes(2);
  });

  it("releases cached resources and rethrows when a request fails", async () => {
    const tokenizer: Tokenizer = {
      tokenize: () => {
        throw new Error("tokenizer crashed");
      },
    };
    const { service, cache } = createService({ tokenizer });
    await cache.warmUp();
    expect(service.status().ready).toBe(true);

    await expect(service.ask("保温")).rejects.toThrow("tokenizer crashed");
    expect(service.status().ready).toBe(false);
    expect(service.status().resources.products.loaded).toBe(false);
  });

  it("reports readiness and supports an explicit release", async () => {
    const { service, cache } = createService({});
    expect(service.status().ready).toBe(false);

    await cache.warmUp();
    expect(service.status().ready).toBe(true);

    expect(service.releaseResources()).toEqual({
      released: ["products", "faqs", "tokenizer", "answerClient"],
    });
    expect(service.status().ready).toBe(false);
  });

  it("extracts keywords once per request and ranks with that same set", async () => {
    const tokenizer = new FakeTokenizer([noun("保温")]);
    const { service, cache } = createService({ tokenizer });
    await cache.get("tokenizer");

    const result = await service.searchRelated("保温");
    expect(tokenizer.inputs).toEqual(["保温"]);
    expect(result.keywords).toEqual(["保温"]);
    expect(result.products.map((item) => item.name)).toEqual(["保温ボトル"]);

    await service.ask("保温");
    expect(tokenizer.inputs).toHaveLength(2);
  });

  it("answers with the lightweight keywords before the tokenizer has loaded", async () => {
    const { service } = createService({ tokens: [] });

    const result = await service.searchRelated("保温 ボトル");
    expect(result.keywords).toEqual(["保温", "ボトル"]);
    expect(result.products.map((item) => item.score)).toEqual([10]);
  });

  it("is not ready while a corpus is empty", async () => {
    const { service, cache } = createService({ catalogue: [] });
    await cache.warmUp();

    expect(service.status().resources.products.loaded).toBe(true);
    expect(service.status().ready).toBe(false);
  });
});
