import { AppConfig } from "../../config/env.js";
import { ResourceUnavailableError } from "../../domain/errors.js";
import { GeminiClient } from "./geminiClient.js";
import { OllamaClient } from "./ollamaClient.js";
import { AnswerGenerator } from "./types.js";

type AnswerGeneratorConfig = Pick<
  AppConfig,
  "answerProvider" | "geminiApiKey" | "geminiModel" | "geminiBaseUrl" | "ollamaBaseUrl" | "ollamaChatModel"
>;

export function createAnswerGenerator(config: AnswerGeneratorConfig): AnswerGenerator {
  if (config.answerProvider === "ollama") {
    return new OllamaClient({
      baseUrl: config.ollamaBaseUrl,
      chatModel: config.ollamaChatModel,
    });
  }

  if (!config.geminiApiKey) {
    throw new ResourceUnavailableError("GEMINI_API_KEY is not set.");
  }

  return new GeminiClient({
    apiKey: config.geminiApiKey,
    model: config.geminiModel,
    baseUrl: config.geminiBaseUrl,
  });
}
