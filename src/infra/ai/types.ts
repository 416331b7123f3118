export interface AnswerGenerator {
  readonly provider: "gemini" | "ollama";
  generate(prompt: string): Promise<string>;
}
