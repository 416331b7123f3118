import { RankedItem } from "../domain/types.js";
import { AnswerGenerator } from "../infra/ai/types.js";
import { createLogger, describeError, Logger } from "../utils/logger.js";
import { escapeMarkup, sanitizeText } from "../utils/text.js";

export const MAX_CONTEXT_ITEMS = 8;

export const INVALID_INPUT_MESSAGE = "入力が無効です。質問内容を確認してください。";
export const MODEL_NOT_LOADED_MESSAGE =
  "AIモデルがロードされていないため、回答を生成できません。しばらくお待ちください。";
export const NO_RELATED_INFO_MESSAGE = "関連情報が見つかりませんでした。";
export const GENERATION_FAILED_MESSAGE =
  "回答生成中にエラーが発生しました。しばらくしてから再度お試しください。";

export function buildContext(items: readonly RankedItem[]): string {
  return items
    .slice(0, MAX_CONTEXT_ITEMS)
    .map((item) => {
      if (item.kind === "product") {
        return `商品名: ${escapeMarkup(item.name)}, 説明: ${escapeMarkup(item.description)}, その他: ${escapeMarkup(item.notes)}`;
      }
      return `質問: ${escapeMarkup(item.question)}, 回答: ${escapeMarkup(item.answer)}`;
    })
    .map((line) => `${line}\n`)
    .join("");
}

export function buildPrompt(sanitizedQuestion: string, context: string): string {
  return `以下の関連情報に基づいて、質問「${sanitizedQuestion}」への回答を生成してください。\n\n${context}\n\n回答:`;
}

export type AnswerGeneratorSource = () => Promise<AnswerGenerator | null>;

export class AnswerComposer {
  constructor(
    private readonly answerGeneratorSource: AnswerGeneratorSource,
    private readonly logger: Logger = createLogger("answer"),
  ) {}

  async compose(question: unknown, rankedItems: readonly RankedItem[]): Promise<string> {
    const sanitized = sanitizeText(question);
    if (!sanitized) {
      return INVALID_INPUT_MESSAGE;
    }

    const generator = await this.answerGeneratorSource();
    if (!generator) {
      return MODEL_NOT_LOADED_MESSAGE;
    }

    if (rankedItems.length === 0) {
      return NO_RELATED_INFO_MESSAGE;
    }

    const prompt = buildPrompt(sanitized, buildContext(rankedItems));
    try {
      const generated = await generator.generate(prompt);
      return generated.trim();
    } catch (error) {
      this.logger.error("Answer generation failed", {
        provider: generator.provider,
        reason: describeError(error),
      });
      return GENERATION_FAILED_MESSAGE;
    }
  }
}
