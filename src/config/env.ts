import { z } from "zod";

const envSchema = z.object({
  ANSWER_PROVIDER: z.enum(["gemini", "ollama"]).default("gemini"),
  GEMINI_API_KEY: z.string().optional(),
  GEMINI_MODEL: z.string().default("gemini-2.5-flash"),
  GEMINI_BASE_URL: z
    .string()
    .default("https://generativelanguage.googleapis.com/v1beta"),
  OLLAMA_BASE_URL: z.string().default("http://127.0.0.1:11434"),
  OLLAMA_CHAT_MODEL: z.string().default("qwen2.5:7b-instruct"),
  PRODUCTS_FILE: z.string().default("data/products.json"),
  FAQS_FILE: z.string().default("data/faqs.json"),
  KUROMOJI_DICT_PATH: z.string().optional(),
  RESOURCE_TTL_SECONDS: z.coerce.number().positive().default(300),
  RELEASE_AFTER_REQUESTS: z.coerce.number().int().nonnegative().default(100),
  PRODUCT_SCAN_LIMIT: z.coerce.number().int().positive().default(100),
  FAQ_SCAN_LIMIT: z.coerce.number().int().positive().default(50),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
});

export type AnswerProvider = "gemini" | "ollama";

export interface AppConfig {
  answerProvider: AnswerProvider;
  geminiApiKey: string | null;
  geminiModel: string;
  geminiBaseUrl: string;
  ollamaBaseUrl: string;
  ollamaChatModel: string;
  productsFile: string;
  faqsFile: string;
  kuromojiDictPath: string | null;
  resourceTtlMs: number;
  releaseAfterRequests: number;
  productScanLimit: number;
  faqScanLimit: number;
  logLevel: "debug" | "info" | "warn" | "error";
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.parse(env);

  return {
    answerProvider: parsed.ANSWER_PROVIDER,
    // An empty key in .env means "not configured".
    geminiApiKey: parsed.GEMINI_API_KEY?.trim() || null,
    geminiModel: parsed.GEMINI_MODEL,
    geminiBaseUrl: parsed.GEMINI_BASE_URL.replace(/\/+$/, ""),
    ollamaBaseUrl: parsed.OLLAMA_BASE_URL.replace(/\/+$/, ""),
    ollamaChatModel: parsed.OLLAMA_CHAT_MODEL,
    productsFile: parsed.PRODUCTS_FILE,
    faqsFile: parsed.FAQS_FILE,
    kuromojiDictPath: parsed.KUROMOJI_DICT_PATH?.trim() || null,
    resourceTtlMs: parsed.RESOURCE_TTL_SECONDS * 1000,
    releaseAfterRequests: parsed.RELEASE_AFTER_REQUESTS,
    productScanLimit: parsed.PRODUCT_SCAN_LIMIT,
    faqScanLimit: parsed.FAQ_SCAN_LIMIT,
    logLevel: parsed.LOG_LEVEL,
  };
}
