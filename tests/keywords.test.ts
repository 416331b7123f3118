import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { Tokenizer } from "../src/domain/types.js";
import {
  KeywordExtractor,
  LightweightKeywordStrategy,
  MAX_KEYWORDS,
  MAX_TOKENS_SCANNED,
  MorphologicalKeywordStrategy,
} from "../src/pipelines/keywords.js";
import { adjective, createTestCache, FakeTokenizer, noun, particle } from "./support/fakes.js";

describe("MorphologicalKeywordStrategy", () => {
  it("keeps deduplicated nouns and adjectives longer than one character", () => {
    const tokenizer = new FakeTokenizer([
      adjective("青い"),
      noun("ウィジェット"),
      particle("を"),
      { surface: "買い", partOfSpeech: "動詞" },
      noun("円"),
      noun("ウィジェット"),
    ]);

    const keywords = new MorphologicalKeywordStrategy(tokenizer).extract("青いウィジェットを買い");
    expect(keywords).toEqual(new Set(["青い", "ウィジェット"]));
  });

  it("stops reading after the token cap", () => {
    const tokens = [
      ...Array.from({ length: MAX_TOKENS_SCANNED }, () => particle("から")),
      noun("送料"),
    ];
    const keywords = new MorphologicalKeywordStrategy(new FakeTokenizer(tokens)).extract("x");
    expect(keywords.size).toBe(0);
  });

  it("returns at most the keyword cap", () => {
    const tokens = Array.from({ length: 30 }, (_, index) => noun(`k${index}`));
    const keywords = new MorphologicalKeywordStrategy(new FakeTokenizer(tokens)).extract("x");
    expect(keywords.size).toBe(MAX_KEYWORDS);
    expect(keywords.has("k0")).toBe(true);
    expect(keywords.has("k19")).toBe(true);
    expect(keywords.has("k20")).toBe(false);
  });
});

describe("LightweightKeywordStrategy", () => {
  it("splits on whitespace and drops stop-words, punctuation and single characters", () => {
    const keywords = new LightweightKeywordStrategy().extract(
      "返品 の 方法 を 教えて ください ！ a 返品",
    );
    expect(keywords).toEqual(new Set(["返品", "方法"]));
  });

  it("matches stop-words case-insensitively", () => {
    expect(new LightweightKeywordStrategy().extract("What is the price?")).toEqual(
      new Set(["price"]),
    );
  });
});

describe("KeywordExtractor", () => {
  beforeEach(() => {
    vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("uses the morphological tokenizer on sanitized text when available", async () => {
    const tokenizer = new FakeTokenizer([adjective("青い"), noun("ウィジェット")]);
    const extractor = new KeywordExtractor(() => tokenizer);

    const keywords = await extractor.extract("  青いウィジェット ");
    expect(keywords).toEqual(new Set(["青い", "ウィジェット"]));
    expect(tokenizer.inputs).toEqual(["青いウィジェット"]);
  });

  it("falls back to the lightweight strategy without a tokenizer", async () => {
    const extractor = new KeywordExtractor(() => null);
    expect(await extractor.extract("保温 ボトル の 容量")).toEqual(
      new Set(["保温", "ボトル", "容量"]),
    );
  });

  it("returns an empty set for rejected input without asking for a tokenizer", async () => {
    const source = vi.fn(() => null);
    const extractor = new KeywordExtractor(source);

    expect((await extractor.extract("rm -rf /; echo")).size).toBe(0);
    expect((await extractor.extract(12345)).size).toBe(0);
    expect(source).not.toHaveBeenCalled();
  });

  it("hands the tokenizer the question without the sanitizer's entities", async () => {
    const tokenizer = new FakeTokenizer([noun("Tom"), noun("バッグ")]);
    const extractor = new KeywordExtractor(() => tokenizer);

    await extractor.extract(`Tom's "防水" バッグ`);
    expect(tokenizer.inputs).toEqual([`Tom's "防水" バッグ`]);
  });

  it("strips quotes around keywords in the lightweight strategy", async () => {
    const extractor = new KeywordExtractor(() => null);
    expect(await extractor.extract(`"防水" Tom's`)).toEqual(new Set(["防水", "Tom's"]));
  });

  it("does not wait for a tokenizer that is still loading", async () => {
    const { cache } = createTestCache({
      tokenizer: () => new Promise<Tokenizer>(() => undefined),
    });
    void cache.warmUp();
    const extractor = new KeywordExtractor(() => cache.peek("tokenizer"));

    expect(await extractor.extract("保温 ボトル")).toEqual(new Set(["保温", "ボトル"]));
  });
});
