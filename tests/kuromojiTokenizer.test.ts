import path from "node:path";
import { describe, expect, it } from "vitest";
import {
  buildKuromojiTokenizer,
  KuromojiTokenizer,
  resolveBundledDictionaryPath,
} from "../src/infra/tokenizer/kuromojiTokenizer.js";

describe("KuromojiTokenizer", () => {
  it("maps kuromoji features to surface and coarse part of speech", () => {
    const tokenizer = new KuromojiTokenizer({
      tokenize: () => [
        { surface_form: "返品", pos: "名詞" },
        { surface_form: "は", pos: "助詞" },
      ],
    });

    expect(tokenizer.tokenize("返品は")).toEqual([
      { surface: "返品", partOfSpeech: "名詞" },
      { surface: "は", partOfSpeech: "助詞" },
    ]);
  });

  it("locates the dictionary bundled with kuromoji", () => {
    expect(path.basename(resolveBundledDictionaryPath())).toBe("dict");
  });

  it("tags nouns with the bundled dictionary", async () => {
    const tokenizer = await buildKuromojiTokenizer();
    const tokens = tokenizer.tokenize("返品方法");

    expect(tokens.map((token) => token.surface).join("")).toBe("返品方法");
    expect(tokens.find((token) => token.surface === "返品")?.partOfSpeech).toBe("名詞");
  }, 30_000);

  it("rejects when the dictionary cannot be read", async () => {
    await expect(buildKuromojiTokenizer(path.resolve(".tmp-missing-dict"))).rejects.toThrow(
      "Failed to build kuromoji tokenizer",
    );
  });
});
