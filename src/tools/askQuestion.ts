import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { ProductQaService } from "../services/productQaService.js";

export function registerAskQuestionTool(server: McpServer, service: ProductQaService) {
  server.registerTool(
    "ask_question",
    {
      title: "Ask Question",
      description: "Returns matching products, matching FAQ entries and a generated answer.",
      inputSchema: {
        question: z.string().min(1).describe("Customer question"),
      },
    },
    async ({ question }) => {
      const startedAt = Date.now();
      const result = await service.ask(question);

      return {
        content: [
          {
            type: "text",
            text: JSON.stringify(
              {
                products: result.products,
                faqs: result.faqs,
                answer: result.answer,
                latency_ms: Date.now() - startedAt,
              },
              null,
              2,
            ),
          },
        ],
      };
    },
  );
}
