import { AnswerGenerator } from "./types.js";

interface OllamaClientOptions {
  baseUrl: string;
  chatModel: string;
}

interface OllamaChatResponse {
  message?: {
    content?: string;
  };
}

export class OllamaClient implements AnswerGenerator {
  readonly provider = "ollama";

  constructor(private readonly options: OllamaClientOptions) {}

  async generate(prompt: string): Promise<string> {
    const response = await fetch(`${this.options.baseUrl}/api/chat`, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
      },
      body: JSON.stringify({
        model: this.options.chatModel,
        stream: false,
        keep_alive: "30m",
        options: {
          temperature: 0.2,
          top_p: 0.9,
        },
        messages: [
          {
            role: "system",
            content: [
              "You are a shop assistant.",
              "Answer only from the related information in the prompt.",
              "Reply in the language of the question.",
            ].join(" "),
          },
          {
            role: "user",
            content: prompt,
          },
        ],
      }),
    });

    if (!response.ok) {
      throw new Error(
        `Ollama chat failed (${response.status}): ${await response.text()}`,
      );
    }

    const data = (await response.json()) as OllamaChatResponse;
    const text = data.message?.content?.trim() ?? "";
    if (!text) {
      throw new Error("Ollama returned an empty answer.");
    }
    return text;
  }
}
