import { AnswerGenerator } from "./types.js";

interface GeminiClientOptions {
  apiKey: string;
  model: string;
  baseUrl: string;
}

interface GenerateContentResponse {
  candidates?: Array<{
    content?: {
      parts?: Array<{
        text?: string;
      }>;
    };
  }>;
}

export class GeminiClient implements AnswerGenerator {
  readonly provider = "gemini";

  constructor(private readonly options: GeminiClientOptions) {}

  async generate(prompt: string): Promise<string> {
    const response = await fetch(
      `${this.options.baseUrl}/models/${encodeURIComponent(this.options.model)}:generateContent`,
      {
        method: "POST",
        headers: {
          "x-goog-api-key": this.options.apiKey,
          "Content-Type": "application/json",
        },
        body: JSON.stringify({
          contents: [
            {
              role: "user",
              parts: [{ text: prompt }],
            },
          ],
          generationConfig: {
            temperature: 0.2,
          },
        }),
      },
    );

    if (!response.ok) {
      throw new Error(
        `Gemini generateContent failed (${response.status}): ${await response.text()}`,
      );
    }

    const data = (await response.json()) as GenerateContentResponse;
    const text = (data.candidates?.[0]?.content?.parts ?? [])
      .map((part) => part.text ?? "")
      .join("")
      .trim();
    if (!text) {
      throw new Error("Gemini returned an empty answer.");
    }
    return text;
  }
}
